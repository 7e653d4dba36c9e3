import { z } from 'zod';
import * as dotenv from 'dotenv';
import { ConfigurationError } from './errors.js';
import type { Holding } from './protocol.js';

const numberFromEnv = (fallback: number) =>
  z.preprocess(
    (val) => (val === undefined || val === '' ? undefined : Number(val)),
    z.number().int().positive().default(fallback),
  );

const holdingSchema = z.object({
  symbol: z.object({
    value: z.string().min(1),
    securityType: z.enum(['crypto', 'forex', 'equity', 'future', 'option']),
    market: z.string().min(1),
  }),
  quantity: z.number(),
  averagePrice: z.number(),
  marketPrice: z.number().optional(),
  unrealizedPnl: z.number().optional(),
});

const configSchema = z.object({
  BITFINEX_API_KEY: z.string().min(1, 'BITFINEX_API_KEY is required'),
  BITFINEX_API_SECRET: z.string().min(1, 'BITFINEX_API_SECRET is required'),
  BITFINEX_REST_URL: z.string().url().default('https://api.bitfinex.com'),
  BITFINEX_WS_URL: z.string().url().default('wss://api.bitfinex.com/ws/2'),
  BITFINEX_ACCOUNT_TYPE: z.enum(['cash', 'margin']).default('cash'),
  LIVE_HOLDINGS: z.string().optional(),
  REST_RATE_LIMIT: numberFromEnv(10),
  REST_RATE_INTERVAL_MS: numberFromEnv(1000),
  CONNECT_RATE_LIMIT: numberFromEnv(5),
  CONNECT_RATE_WINDOW_MS: numberFromEnv(60_000),
  AUTH_TIMEOUT_MS: numberFromEnv(10_000),
  ORDER_ACK_TIMEOUT_MS: numberFromEnv(10_000),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type AccountType = 'cash' | 'margin';

export interface RateLimitSettings {
  capacity: number;
  intervalMs: number;
}

export interface ConnectorConfig {
  apiKey: string;
  apiSecret: string;
  restUrl: string;
  wsUrl: string;
  accountType: AccountType;
  /** Pre-seeded holdings reported for cash accounts */
  liveHoldings: Holding[];
  restRateLimit: RateLimitSettings;
  connectRateLimit: RateLimitSettings;
  authTimeoutMs: number;
  orderAckTimeoutMs: number;
  logLevel: string;
}

function parseLiveHoldings(raw: string | undefined): Holding[] {
  if (!raw) {
    return [];
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`LIVE_HOLDINGS is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = z.array(holdingSchema).safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`LIVE_HOLDINGS is malformed: ${issues}`);
  }
  return result.data;
}

export function loadConfig(envOverrides?: Record<string, string | undefined>): ConnectorConfig {
  if (!envOverrides) {
    dotenv.config();
  }
  const env = envOverrides ?? process.env;

  const result = configSchema.safeParse(env);
  if (!result.success) {
    const missing = result.error.issues.map((i) => i.path.join('.')).join(', ');
    throw new ConfigurationError(`Invalid connector configuration: ${missing}`);
  }
  const core = result.data;

  return {
    apiKey: core.BITFINEX_API_KEY,
    apiSecret: core.BITFINEX_API_SECRET,
    restUrl: core.BITFINEX_REST_URL,
    wsUrl: core.BITFINEX_WS_URL,
    accountType: core.BITFINEX_ACCOUNT_TYPE,
    liveHoldings: parseLiveHoldings(core.LIVE_HOLDINGS),
    restRateLimit: { capacity: core.REST_RATE_LIMIT, intervalMs: core.REST_RATE_INTERVAL_MS },
    connectRateLimit: { capacity: core.CONNECT_RATE_LIMIT, intervalMs: core.CONNECT_RATE_WINDOW_MS },
    authTimeoutMs: core.AUTH_TIMEOUT_MS,
    orderAckTimeoutMs: core.ORDER_ACK_TIMEOUT_MS,
    logLevel: core.LOG_LEVEL,
  };
}
