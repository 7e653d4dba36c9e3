// Shared
export * from './shared/protocol.js';
export * from './shared/config.js';
export * from './shared/errors.js';
export { createLogger, sanitizeUrl } from './shared/logger.js';
export { TokenBucket, type TokenBucketConfig } from './shared/rate-limiter.js';
export { resolutionToMs, roundDown } from './shared/resolution.js';

// Features: execution
export type { Brokerage, StartupCheck } from './features/execution/brokerage.js';
export type { SymbolMapper, CurrencyPair } from './features/execution/symbol-mapper.js';
