import type {
  Order,
  OrderEvent,
  Holding,
  CashAmount,
  HistoryRequest,
  Bar,
  BrokerageMessage,
  Instrument,
} from '../../shared/protocol.js';

/**
 * Contract between a venue connector and the trading host.
 *
 * Order commands return as soon as the request is handed to the venue;
 * the outcome arrives later through onOrderEvent().
 */
export interface Brokerage {
  readonly venue: string;
  readonly isConnected: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  placeOrder(order: Order): boolean;
  updateOrder(order: Order): boolean;
  cancelOrder(order: Order): boolean;
  getOpenOrders(): Promise<Order[]>;
  getAccountHoldings(): Promise<Holding[]>;
  getCashBalance(): Promise<CashAmount[]>;
  /** null when the request shape is not supported by the venue */
  getHistory(request: HistoryRequest): AsyncIterable<Bar> | null;
  canSubscribe(symbol: Instrument): boolean;
  onOrderEvent(callback: (event: OrderEvent) => void): void;
  onMessage(callback: (message: BrokerageMessage) => void): void;
}

/**
 * Runs once before the first connection, outside the trading data path
 * (for example a licence or entitlement check). Rejecting aborts connect().
 */
export type StartupCheck = () => Promise<void>;
