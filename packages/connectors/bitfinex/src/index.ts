export { BitfinexBrokerage } from './bitfinex-connector.js';
export type { BitfinexBrokerageConfig } from './bitfinex-connector.js';
export { BitfinexApi, HISTORY_PAGE_LIMIT } from './bitfinex-api.js';
export type { BitfinexApiConfig, ApiRequest, HttpMethod } from './bitfinex-api.js';
export { BitfinexSession } from './bitfinex-session.js';
export type { BitfinexSessionConfig, SessionState, SessionDisconnect } from './bitfinex-session.js';
export { BitfinexOrderManager, CorrelationIdAllocator } from './bitfinex-order-manager.js';
export type { OrderManagerConfig, OrderTransport, OpenOrderSource, CachedOrderSnapshot } from './bitfinex-order-manager.js';
export { BitfinexAccount } from './bitfinex-account.js';
export type { BitfinexAccountConfig, AccountSource } from './bitfinex-account.js';
export { BitfinexHistoryProvider, CandlePager, RESOLUTION_TOKENS } from './bitfinex-history.js';
export type { CandleSource, HistoryProviderConfig } from './bitfinex-history.js';
export { JsonSymbolMapper, loadSymbolData, symbolDataSchema } from './json-symbol-mapper.js';
export type { SymbolData } from './json-symbol-mapper.js';
export { NonceGenerator, buildAuthHeaders, buildWsAuthPayload, signPayload } from './bitfinex-auth.js';
export { decodeFrame, encodeOrderCommand } from './bitfinex-messages.js';
export type { StreamEvent } from './bitfinex-messages.js';
export * from './bitfinex-orders.js';
export * from './types.js';
