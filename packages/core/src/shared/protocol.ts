// --- Instruments ---

export type SecurityType = 'crypto' | 'forex' | 'equity' | 'future' | 'option';

export interface Instrument {
  /** Host ticker, e.g. "ETHUSD" */
  value: string;
  securityType: SecurityType;
  market: string;
}

// --- Orders (host-owned; the connector only mirrors them) ---

export type OrderType = 'market' | 'limit' | 'stop_market' | 'stop_limit' | 'trailing_stop';

export type OrderStatus =
  | 'new'
  | 'submitted'
  | 'partially_filled'
  | 'filled'
  | 'canceled'
  | 'invalid'
  | 'unknown';

export interface OrderProperties {
  hidden?: boolean;
  postOnly?: boolean;
}

export interface Order {
  id: string;
  symbol: Instrument;
  type: OrderType;
  /** Signed quantity: positive buys, negative sells */
  quantity: number;
  status: OrderStatus;
  /** Venue-assigned ids, in assignment order */
  brokerIds: string[];
  limitPrice?: number;
  stopPrice?: number;
  /** Last known price reported for the order */
  price?: number;
  filledQuantity?: number;
  createdAt?: number;
  properties?: OrderProperties;
}

export interface OrderEvent {
  orderId: string;
  status: OrderStatus;
  venueOrderId?: string;
  /** Quantity filled by this event (signed like the order) */
  fillQuantity: number;
  fillPrice?: number;
  fee?: number;
  feeCurrency?: string;
  message?: string;
  timestamp: number;
}

const OPEN_STATUSES: ReadonlySet<OrderStatus> = new Set(['new', 'submitted', 'partially_filled']);

export function isOpenStatus(status: OrderStatus): boolean {
  return OPEN_STATUSES.has(status);
}

// --- Account ---

export interface Holding {
  symbol: Instrument;
  quantity: number;
  averagePrice: number;
  marketPrice?: number;
  unrealizedPnl?: number;
}

export interface CashAmount {
  currency: string;
  amount: number;
}

// --- Market data ---

export type Resolution = 'tick' | 'second' | 'minute' | 'hour' | 'daily';

export type TickType = 'trade' | 'quote' | 'open_interest';

export interface HistoryRequest {
  symbol: Instrument;
  resolution: Resolution;
  tickType: TickType;
  startUtc: Date;
  endUtc: Date;
}

export interface Bar {
  symbol: Instrument;
  /** Open time, epoch milliseconds */
  time: number;
  /** time + periodMs */
  endTime: number;
  periodMs: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  value: number;
}

// --- Host message channel ---

export type BrokerageMessageType = 'information' | 'warning' | 'error' | 'reconnect' | 'disconnect';

export interface BrokerageMessage {
  type: BrokerageMessageType;
  code: string;
  message: string;
}
