import pino from 'pino';

const redactPaths = [
  'BITFINEX_API_KEY',
  'BITFINEX_API_SECRET',
  'apiKey',
  'apiSecret',
  'api_key',
  'api_secret',
  'authSig',
  'signature',
  'authorization',
  'headers["bfx-apikey"]',
  'headers["bfx-signature"]',
  '*.BITFINEX_API_KEY',
  '*.BITFINEX_API_SECRET',
  '*.apiKey',
  '*.apiSecret',
  '*.api_key',
  '*.api_secret',
  '*.authSig',
  '*.signature',
  '*.authorization',
  '*.headers["bfx-apikey"]',
  '*.headers["bfx-signature"]',
];

export function createLogger(name: string, options?: { destination?: pino.DestinationStream; level?: string }): pino.Logger {
  return pino({
    name,
    level: options?.level ?? process.env.LOG_LEVEL ?? 'info',
    redact: {
      paths: redactPaths,
      censor: '[REDACTED]',
    },
  }, options?.destination);
}

/**
 * Strip query string from a URL for safe logging.
 */
export function sanitizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
  } catch {
    // Not an absolute URL: strip everything after ?
    const qIndex = url.indexOf('?');
    return qIndex >= 0 ? url.substring(0, qIndex) : url;
  }
}
