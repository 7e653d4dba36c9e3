import { z } from 'zod';
import { createLogger, RequestFailedError, TokenBucket } from '@cryptobridge/core';
import { API_VERSION, buildAuthHeaders, defaultNonce, type NonceGenerator } from './bitfinex-auth.js';
import {
  orderSchema,
  positionSchema,
  walletSchema,
  candleSchema,
  type BitfinexOrder,
  type BitfinexPosition,
  type BitfinexWallet,
  type BitfinexCandle,
} from './types.js';

const logger = createLogger('BitfinexApi');

export const HISTORY_PAGE_LIMIT = 1000;

export interface BitfinexApiConfig {
  restUrl: string;
  apiKey: string;
  apiSecret: string;
  /** General REST bucket; one token per request */
  rateLimiter: TokenBucket;
  nonce?: NonceGenerator;
  requestTimeoutMs?: number;
}

export type HttpMethod = 'GET' | 'POST';

export interface ApiRequest {
  /** Path below the API version, e.g. "auth/r/orders" */
  endpoint: string;
  method: HttpMethod;
  body?: Record<string, unknown>;
  /** Query string appended to the endpoint, without "?" */
  query?: string;
  authenticated: boolean;
}

const rowsSchema = z.array(z.unknown());

export class BitfinexApi {
  private readonly restUrl: string;
  private readonly apiKey: string;
  private readonly apiSecret: string;
  private readonly rateLimiter: TokenBucket;
  private readonly nonce: NonceGenerator;
  private readonly requestTimeoutMs: number;

  constructor(config: BitfinexApiConfig) {
    this.restUrl = config.restUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.apiSecret = config.apiSecret;
    this.rateLimiter = config.rateLimiter;
    this.nonce = config.nonce ?? defaultNonce;
    this.requestTimeoutMs = config.requestTimeoutMs ?? 15_000;
  }

  /**
   * All orders not yet closed
   */
  async getOpenOrders(): Promise<BitfinexOrder[]> {
    const rows = await this.execute({ endpoint: 'auth/r/orders', method: 'POST', body: {}, authenticated: true }, rowsSchema);
    return decodeRows(rows, orderSchema, 'order');
  }

  /**
   * Open margin positions
   */
  async getPositions(): Promise<BitfinexPosition[]> {
    const rows = await this.execute({ endpoint: 'auth/r/positions', method: 'POST', body: {}, authenticated: true }, rowsSchema);
    return decodeRows(rows, positionSchema, 'position');
  }

  /**
   * Wallet balances of every wallet type
   */
  async getWallets(): Promise<BitfinexWallet[]> {
    const rows = await this.execute({ endpoint: 'auth/r/wallets', method: 'POST', body: {}, authenticated: true }, rowsSchema);
    return decodeRows(rows, walletSchema, 'wallet');
  }

  /**
   * One page of trade candles between start and end (inclusive), oldest first
   */
  async getCandles(resolutionToken: string, venueSymbol: string, startMs: number, endMs: number): Promise<BitfinexCandle[]> {
    const rows = await this.execute(
      {
        endpoint: `candles/trade:${resolutionToken}:${venueSymbol}/hist`,
        method: 'GET',
        query: `limit=${HISTORY_PAGE_LIMIT}&sort=1&start=${startMs}&end=${endMs}`,
        authenticated: false,
      },
      rowsSchema,
    );
    return decodeRows(rows, candleSchema, 'candle');
  }

  /**
   * Execute a request after taking a token from the REST bucket.
   * Never retries: callers decide, so order-changing calls are not repeated.
   */
  async execute<S extends z.ZodTypeAny>(request: ApiRequest, schema: S): Promise<z.output<S>> {
    await this.rateLimiter.consume();

    const path = request.query ? `${request.endpoint}?${request.query}` : request.endpoint;
    const url = `${this.restUrl}/${API_VERSION}/${path}`;
    const body = request.body !== undefined ? JSON.stringify(request.body) : '';

    const headers: Record<string, string> = request.authenticated
      ? buildAuthHeaders(this.apiKey, this.apiSecret, request.endpoint, body, this.nonce.next())
      : { Accept: 'application/json' };

    let response: Response;
    try {
      response = await fetch(url, {
        method: request.method,
        headers,
        body: request.method === 'POST' ? body : undefined,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      const transportError = error instanceof Error ? error.message : String(error);
      logger.error({ endpoint: request.endpoint, err: transportError }, 'Request transport failure');
      throw new RequestFailedError(request.endpoint, 0, '', transportError, 'bitfinex');
    }

    const text = await response.text();

    if (!response.ok) {
      logger.warn({ endpoint: request.endpoint, status: response.status }, 'Request failed');
      throw new RequestFailedError(request.endpoint, response.status, text, response.statusText, 'bitfinex');
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new RequestFailedError(request.endpoint, response.status, text, 'non-JSON response', 'bitfinex');
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new RequestFailedError(request.endpoint, response.status, text, 'unexpected response shape', 'bitfinex');
    }
    return parsed.data;
  }
}

/**
 * Decode each row independently; a malformed row is logged and skipped.
 */
function decodeRows<S extends z.ZodTypeAny>(rows: unknown[], schema: S, kind: string): z.output<S>[] {
  const items: z.output<S>[] = [];
  for (const row of rows) {
    const parsed = schema.safeParse(row);
    if (parsed.success) {
      items.push(parsed.data);
    } else {
      logger.warn({ kind, issues: parsed.error.issues.length }, 'Skipping malformed row');
    }
  }
  return items;
}
