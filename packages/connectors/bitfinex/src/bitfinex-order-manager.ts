// ============================================================
// BitfinexOrderManager: order lifecycle and reconciliation
// Owns the correlation-id -> order map. Every mutation happens
// inside one synchronous method call, so stream dispatch and
// caller commands are serialized by the event loop; REST polls
// await first and merge in a single step afterwards.
// ============================================================

import { EventEmitter } from 'events';
import {
  BrokerageError,
  ConfigurationError,
  UnsupportedOperationError,
  createLogger,
  isOpenStatus,
  type AccountType,
  type BrokerageMessage,
  type Instrument,
  type Order,
  type OrderEvent,
  type OrderStatus,
  type SymbolMapper,
} from '@cryptobridge/core';
import type { StreamEvent } from './bitfinex-messages.js';
import {
  belongsToAccount,
  filledQuantity,
  formatDecimal,
  fromVenueOrderType,
  isSupportedOrderType,
  orderFlags,
  orderPrice,
  toOrderStatus,
  toVenueOrderType,
} from './bitfinex-orders.js';
import type {
  BitfinexNotification,
  BitfinexOrder,
  BitfinexTrade,
  NewOrderPayload,
  OrderCommandCode,
  OrderCommandPayloads,
} from './types.js';

const logger = createLogger('BitfinexOrderManager');

/** What the manager needs from the streaming session */
export interface OrderTransport {
  readonly isAuthenticated: boolean;
  sendOrderCommand<C extends OrderCommandCode>(code: C, payload: OrderCommandPayloads[C]): boolean;
  drop(reason: string): void;
}

export interface OpenOrderSource {
  getOpenOrders(): Promise<BitfinexOrder[]>;
}

export interface OrderManagerConfig {
  transport: OrderTransport;
  openOrders: OpenOrderSource;
  symbolMapper: SymbolMapper;
  accountType: AccountType;
  orderAckTimeoutMs: number;
}

/**
 * Venue view of an open order from the last poll.
 */
export interface CachedOrderSnapshot {
  venueOrderId: number;
  cid: number | null;
  filledQuantity: number;
  remainingQuantity: number;
  status: OrderStatus;
  type: string;
  price: number;
}

interface TrackedOrder {
  cid: number;
  /** Connector-side mirror of the host order */
  order: Order;
  venueOrderId?: number;
  /** Sum of `te` executions seen for the order */
  tradeFilled: number;
}

interface ClosedOrder {
  entry: TrackedOrder;
  closedAt: number;
}

const QUANTITY_EPSILON = 1e-10;

/** How long a closed order still absorbs its late `te` / `oc` messages */
export const CLOSED_ORDER_RETENTION_MS = 60_000;

/**
 * Monotonic correlation ids seeded from the clock; two calls in the same
 * millisecond still get distinct ids.
 */
export class CorrelationIdAllocator {
  private last = 0;

  next(): number {
    const now = Date.now();
    this.last = now > this.last ? now : this.last + 1;
    return this.last;
  }
}

/**
 * Events:
 * - 'order_event': (OrderEvent) - status change of a tracked order
 * - 'message': (BrokerageMessage) - warnings and errors for the host
 */
export class BitfinexOrderManager extends EventEmitter {
  private readonly transport: OrderTransport;
  private readonly openOrders: OpenOrderSource;
  private readonly symbolMapper: SymbolMapper;
  private readonly accountType: AccountType;
  private readonly orderAckTimeoutMs: number;
  private readonly ids = new CorrelationIdAllocator();

  private readonly tracked = new Map<number, TrackedOrder>();
  private readonly cidByVenueId = new Map<number, number>();
  private readonly ackTimers = new Map<number, NodeJS.Timeout>();
  private readonly recentlyClosed = new Map<number, ClosedOrder>();
  private snapshot = new Map<number, CachedOrderSnapshot>();

  constructor(config: OrderManagerConfig) {
    super();
    this.transport = config.transport;
    this.openOrders = config.openOrders;
    this.symbolMapper = config.symbolMapper;
    this.accountType = config.accountType;
    this.orderAckTimeoutMs = config.orderAckTimeoutMs;
  }

  get pendingCount(): number {
    return this.tracked.size;
  }

  /**
   * Mirror of a tracked order by host order id.
   */
  getTrackedOrder(orderId: string): Order | undefined {
    for (const entry of this.tracked.values()) {
      if (entry.order.id === orderId) {
        return { ...entry.order, brokerIds: [...entry.order.brokerIds] };
      }
    }
    return undefined;
  }

  getCachedSnapshot(): CachedOrderSnapshot[] {
    return [...this.snapshot.values()];
  }

  /**
   * Submit a new order. Returns once the command is on the wire; the venue
   * acknowledgement arrives later as an order event.
   */
  place(order: Order): boolean {
    const type = order.type;
    if (!isSupportedOrderType(type)) {
      this.rejectOrder(order, 'UnsupportedOrderType', `Order type ${type} is not supported by Bitfinex`);
      return false;
    }

    const price = orderPrice(order);
    if (price === null) {
      this.rejectOrder(order, 'InvalidOrderPrice', `Order ${order.id} of type ${type} has no price`);
      return false;
    }

    // Unknown symbols are configuration errors and propagate
    const symbol = this.symbolMapper.getVenueSymbol(order.symbol);

    if (!this.transport.isAuthenticated) {
      this.publish({ type: 'warning', code: 'Disconnected', message: `Order ${order.id} not placed: stream is not authenticated` });
      return false;
    }

    const cid = this.ids.next();
    const payload: NewOrderPayload = {
      symbol,
      amount: formatDecimal(order.quantity),
      type: toVenueOrderType(this.accountType, type),
      price: formatDecimal(price),
      cid,
    };
    const flags = orderFlags(order);
    if (type === 'limit' && order.properties) {
      payload.flags = flags;
    }

    this.tracked.set(cid, {
      cid,
      order: { ...order, brokerIds: [...order.brokerIds], filledQuantity: order.filledQuantity ?? 0 },
      tradeFilled: 0,
    });

    if (!this.transport.sendOrderCommand('on', payload)) {
      this.tracked.delete(cid);
      return false;
    }

    logger.info({ orderId: order.id, cid, symbol, type: payload.type }, 'Order submitted');
    return true;
  }

  /**
   * Resend quantity and price under the existing venue id.
   */
  update(order: Order): boolean {
    if (order.brokerIds.length === 0) {
      throw new BrokerageError(`Order ${order.id} has no venue id to update`, 'bitfinex');
    }
    if (order.brokerIds.length > 1) {
      throw new UnsupportedOperationError(
        'Multiple orders update not supported. Please cancel and re-create.',
        'bitfinex',
      );
    }

    const venueOrderId = Number(order.brokerIds[0]);
    const price = orderPrice(order);
    if (price === null) {
      this.publish({ type: 'warning', code: 'InvalidOrderPrice', message: `Order ${order.id} update has no price` });
      return false;
    }

    const sent = this.transport.sendOrderCommand('ou', {
      id: venueOrderId,
      amount: formatDecimal(order.quantity),
      price: formatDecimal(price),
    });
    if (sent) {
      this.startAckTimer(venueOrderId, 'update');
      const entry = this.findByVenueId(venueOrderId);
      if (entry) {
        entry.order.quantity = order.quantity;
        entry.order.limitPrice = order.limitPrice;
        entry.order.stopPrice = order.stopPrice;
      }
    }
    return sent;
  }

  /**
   * Request cancellation. Orders the venue has not assigned an id to yet
   * cannot be cancelled and return false.
   */
  cancel(order: Order): boolean {
    if (order.brokerIds.length === 0) {
      logger.info({ orderId: order.id }, 'Unable to cancel order without venue id');
      return false;
    }

    const venueOrderId = Number(order.brokerIds[0]);
    const sent = this.transport.sendOrderCommand('oc', { id: venueOrderId });
    if (sent) {
      this.startAckTimer(venueOrderId, 'cancel');
    }
    return sent;
  }

  /**
   * Route one decoded stream event to the order it concerns.
   */
  handleStreamEvent(event: StreamEvent): void {
    switch (event.kind) {
      case 'order-new':
        this.onOrderNew(event.order);
        break;
      case 'order-update':
        this.onOrderUpdate(event.order);
        break;
      case 'order-cancel':
        this.onOrderClosed(event.order);
        break;
      case 'order-snapshot':
        this.onOrderSnapshot(event.orders);
        break;
      case 'trade-executed':
        this.onTradeExecuted(event.trade);
        break;
      case 'trade-update':
        logger.debug({ orderId: event.trade.orderId, fee: event.trade.fee }, 'Trade update');
        break;
      case 'notification':
        this.onNotification(event.notification);
        break;
      case 'error':
        this.publish({ type: 'error', code: 'VenueError', message: `${event.code ?? ''} ${event.message}`.trim() });
        break;
      case 'info':
      case 'auth':
      case 'heartbeat':
      case 'ignored':
        break;
    }
  }

  /**
   * The stream went away: every tracked order's outcome is now unknown.
   * Explicit teardown also forgets the correlations.
   */
  handleDisconnect(explicit: boolean): void {
    for (const timer of this.ackTimers.values()) {
      clearTimeout(timer);
    }
    this.ackTimers.clear();

    let affected = 0;
    for (const entry of this.tracked.values()) {
      if (entry.order.status === 'unknown') {
        continue;
      }
      affected++;
      this.applyStatus(entry, 'unknown', { message: 'Stream disconnected before the order outcome was known' });
    }

    if (affected > 0) {
      this.publish({
        type: 'warning',
        code: 'OrderStatusUnknown',
        message: `${affected} order(s) have unknown status after disconnect`,
      });
    }

    if (explicit) {
      this.tracked.clear();
      this.cidByVenueId.clear();
      this.recentlyClosed.clear();
    }
  }

  /**
   * Poll every open order, map it to a host order and merge it into the
   * tracked state. A tracked order matched by venue id (or, before its
   * acknowledgement, by correlation id) keeps its host linkage.
   */
  async reconcileOpenOrders(): Promise<Order[]> {
    const rows = await this.openOrders.getOpenOrders();

    const fresh = new Map<number, CachedOrderSnapshot>();
    const result: Order[] = [];

    for (const row of rows) {
      if (!belongsToAccount(this.accountType, row.type)) {
        continue;
      }

      const polled = this.toHostOrder(row);
      if (!polled) {
        continue;
      }

      fresh.set(row.id, {
        venueOrderId: row.id,
        cid: row.cid,
        filledQuantity: filledQuantity(row),
        remainingQuantity: row.amount,
        status: polled.status,
        type: row.type,
        price: row.price,
      });

      const entry = this.findForMerge(row);
      if (entry && isOpenStatus(polled.status)) {
        this.link(entry, row.id);
        entry.order.price = row.price;
        if (entry.order.status !== polled.status) {
          this.applyStatus(entry, polled.status, { message: 'Reconciled with open orders' });
        }
        entry.order.filledQuantity = polled.filledQuantity;
        result.push({ ...entry.order, brokerIds: [...entry.order.brokerIds] });
      } else {
        result.push(polled);
      }
    }

    this.snapshot = fresh;
    return result;
  }

  // --- Stream handlers ---

  private onOrderNew(row: BitfinexOrder): void {
    const entry = this.resolve(row.cid, row.id);
    if (!entry) {
      this.reportUnmatched('new order', row.id);
      return;
    }

    this.link(entry, row.id);
    entry.order.price = row.price;
    // Fill quantities are reported from `te` and `oc`, never from the acknowledgement
    const status = toOrderStatus(row);
    const acknowledged = status === null || status === 'filled' || status === 'partially_filled' ? 'submitted' : status;
    this.applyStatus(entry, acknowledged);
  }

  private onOrderUpdate(row: BitfinexOrder): void {
    this.clearAckTimer(row.id);

    const entry = this.resolve(row.cid, row.id);
    if (!entry) {
      this.reportUnmatched('order update', row.id);
      return;
    }

    this.link(entry, row.id);
    entry.order.quantity = row.amountOrig;
    entry.order.price = row.price;
    this.emitOrderEvent(entry, { message: 'Order updated' });
  }

  private onOrderClosed(row: BitfinexOrder): void {
    this.clearAckTimer(row.id);

    const entry = this.resolve(row.cid, row.id);
    if (!entry) {
      if (this.findClosed(row.id)) {
        logger.debug({ venueOrderId: row.id, status: row.status }, 'Close of an already completed order');
      } else {
        this.reportUnmatched('order close', row.id);
      }
      return;
    }

    this.link(entry, row.id);
    const status = toOrderStatus(row);

    if (status === 'filled') {
      // Fills not yet seen as trades are reported from the closing state
      const outstanding = filledQuantity(row) - (entry.order.filledQuantity ?? 0);
      if (Math.abs(outstanding) > QUANTITY_EPSILON) {
        entry.order.filledQuantity = filledQuantity(row);
        this.applyStatus(entry, 'filled', { fillQuantity: outstanding, fillPrice: row.priceAvg });
      }
    } else if (status === null) {
      this.publish({
        type: 'warning',
        code: 'UnknownOrderStatus',
        message: `Unrecognised status "${row.status}" for closed order ${row.id}`,
      });
      this.applyStatus(entry, 'unknown', { message: row.status });
    } else {
      this.applyStatus(entry, status, { message: row.status });
    }

    this.untrack(entry);
  }

  private onOrderSnapshot(rows: BitfinexOrder[]): void {
    // Sent after each authentication: recover orders left unknown by a drop
    for (const row of rows) {
      const entry = this.resolve(row.cid, row.id);
      if (!entry || entry.order.status !== 'unknown') {
        continue;
      }
      const status = toOrderStatus(row);
      if (!status) {
        continue;
      }
      this.link(entry, row.id);
      entry.order.filledQuantity = filledQuantity(row);
      this.applyStatus(entry, status, { message: 'Recovered from order snapshot' });
    }
  }

  private onTradeExecuted(trade: BitfinexTrade): void {
    const entry = this.findByVenueId(trade.orderId);
    if (!entry) {
      const closed = this.findClosed(trade.orderId);
      if (closed) {
        this.onLateTrade(closed, trade);
      } else {
        this.reportUnmatched('trade', trade.orderId);
      }
      return;
    }

    entry.tradeFilled += trade.execAmount;
    const filled = (entry.order.filledQuantity ?? 0) + trade.execAmount;
    entry.order.filledQuantity = filled;
    const complete = Math.abs(filled) >= Math.abs(entry.order.quantity) - QUANTITY_EPSILON;

    this.applyStatus(entry, complete ? 'filled' : 'partially_filled', {
      fillQuantity: trade.execAmount,
      fillPrice: trade.execPrice,
      fee: trade.fee ?? undefined,
      feeCurrency: trade.feeCurrency ?? undefined,
    });

    if (complete) {
      this.untrack(entry);
    }
  }

  /**
   * A trade for an order already closed by `oc`. The close reported the
   * fill without a fee, so only the part not yet reported is a fill here.
   */
  private onLateTrade(entry: TrackedOrder, trade: BitfinexTrade): void {
    entry.tradeFilled += trade.execAmount;
    const unreported = entry.tradeFilled - (entry.order.filledQuantity ?? 0);
    const fillQuantity = Math.abs(unreported) > QUANTITY_EPSILON ? unreported : 0;
    if (fillQuantity !== 0) {
      entry.order.filledQuantity = entry.tradeFilled;
    }

    if (fillQuantity === 0 && trade.fee === null) {
      logger.debug({ venueOrderId: trade.orderId }, 'Trade of an already completed order');
      return;
    }

    this.emitOrderEvent(entry, {
      fillQuantity,
      fillPrice: trade.execPrice,
      fee: trade.fee ?? undefined,
      feeCurrency: trade.feeCurrency ?? undefined,
      message: 'Trade reported after order close',
    });
  }

  private onNotification(notification: BitfinexNotification): void {
    const failed = notification.status === 'ERROR' || notification.status === 'FAILURE';
    if (!failed) {
      logger.debug({ type: notification.type, status: notification.status }, 'Notification');
      return;
    }

    const row = notification.order;
    if (notification.type === 'on-req') {
      const entry = row ? this.resolve(row.cid, null) : undefined;
      if (entry) {
        this.applyStatus(entry, 'invalid', { message: notification.text });
        this.untrack(entry);
      }
      this.publish({ type: 'warning', code: 'OrderRejected', message: `New order rejected: ${notification.text}` });
      return;
    }

    if (row) {
      this.clearAckTimer(row.id);
    }
    this.publish({
      type: 'warning',
      code: 'VenueError',
      message: `${notification.type} failed${row ? ` for order ${row.id}` : ''}: ${notification.text}`,
    });
  }

  // --- Correlation bookkeeping ---

  private resolve(cid: number | null, venueOrderId: number | null): TrackedOrder | undefined {
    if (cid !== null) {
      const byCid = this.tracked.get(cid);
      if (byCid && (byCid.venueOrderId === undefined || venueOrderId === null || byCid.venueOrderId === venueOrderId)) {
        return byCid;
      }
    }
    return venueOrderId !== null ? this.findByVenueId(venueOrderId) : undefined;
  }

  private findByVenueId(venueOrderId: number): TrackedOrder | undefined {
    const cid = this.cidByVenueId.get(venueOrderId);
    if (cid !== undefined) {
      return this.tracked.get(cid);
    }
    // Orders the host already knew the venue id of (e.g. placed in an earlier session)
    for (const entry of this.tracked.values()) {
      if (entry.order.brokerIds.includes(String(venueOrderId))) {
        return entry;
      }
    }
    return undefined;
  }

  private findForMerge(row: BitfinexOrder): TrackedOrder | undefined {
    const byVenueId = this.findByVenueId(row.id);
    if (byVenueId) {
      return byVenueId;
    }
    if (row.cid === null) {
      return undefined;
    }
    const byCid = this.tracked.get(row.cid);
    return byCid && byCid.venueOrderId === undefined ? byCid : undefined;
  }

  private link(entry: TrackedOrder, venueOrderId: number): void {
    entry.venueOrderId = venueOrderId;
    this.cidByVenueId.set(venueOrderId, entry.cid);
    const brokerId = String(venueOrderId);
    if (!entry.order.brokerIds.includes(brokerId)) {
      entry.order.brokerIds.push(brokerId);
    }
  }

  private untrack(entry: TrackedOrder): void {
    this.tracked.delete(entry.cid);
    if (entry.venueOrderId !== undefined) {
      this.cidByVenueId.delete(entry.venueOrderId);
      this.clearAckTimer(entry.venueOrderId);
      this.pruneClosed();
      this.recentlyClosed.set(entry.venueOrderId, { entry, closedAt: Date.now() });
    }
  }

  private findClosed(venueOrderId: number): TrackedOrder | undefined {
    this.pruneClosed();
    return this.recentlyClosed.get(venueOrderId)?.entry;
  }

  private pruneClosed(): void {
    const cutoff = Date.now() - CLOSED_ORDER_RETENTION_MS;
    // Insertion order is closing order
    for (const [venueOrderId, closed] of this.recentlyClosed) {
      if (closed.closedAt >= cutoff) {
        break;
      }
      this.recentlyClosed.delete(venueOrderId);
    }
  }

  private startAckTimer(venueOrderId: number, operation: 'update' | 'cancel'): void {
    this.clearAckTimer(venueOrderId);
    const timer = setTimeout(() => {
      this.ackTimers.delete(venueOrderId);
      this.publish({
        type: 'warning',
        code: 'AckTimeout',
        message: `No ${operation} acknowledgement for order ${venueOrderId} within ${this.orderAckTimeoutMs}ms`,
      });
      this.transport.drop(`${operation} acknowledgement timeout`);
    }, this.orderAckTimeoutMs);
    this.ackTimers.set(venueOrderId, timer);
  }

  private clearAckTimer(venueOrderId: number): void {
    const timer = this.ackTimers.get(venueOrderId);
    if (timer) {
      clearTimeout(timer);
      this.ackTimers.delete(venueOrderId);
    }
  }

  // --- Mapping ---

  private toHostOrder(row: BitfinexOrder): Order | null {
    const type = fromVenueOrderType(row.type);
    if (!type) {
      this.publish({
        type: 'error',
        code: 'UnsupportedOrderType',
        message: `Unsupported order type returned from brokerage: ${row.type}`,
      });
      return null;
    }

    const status = toOrderStatus(row);
    if (!status) {
      this.publish({
        type: 'warning',
        code: 'UnknownOrderStatus',
        message: `Unrecognised status "${row.status}" for order ${row.id}`,
      });
      return null;
    }

    let symbol: Instrument;
    try {
      symbol = this.symbolMapper.getHostSymbol(row.symbol);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) {
        throw error;
      }
      this.publish({ type: 'warning', code: 'UnknownSymbol', message: `Skipping order ${row.id}: ${error.message}` });
      return null;
    }

    return {
      id: `bitfinex-${row.id}`,
      symbol,
      type,
      quantity: row.amountOrig,
      status,
      brokerIds: [String(row.id)],
      price: row.price,
      limitPrice: type === 'limit' ? row.price : undefined,
      stopPrice: type === 'stop_market' ? row.price : undefined,
      filledQuantity: filledQuantity(row),
      createdAt: row.mtsCreate,
    };
  }

  // --- Notifications ---

  private applyStatus(entry: TrackedOrder, status: OrderStatus, detail: Partial<OrderEvent> = {}): void {
    entry.order.status = status;
    this.emitOrderEvent(entry, detail);
  }

  private emitOrderEvent(entry: TrackedOrder, detail: Partial<OrderEvent>): void {
    const event: OrderEvent = {
      orderId: entry.order.id,
      status: entry.order.status,
      venueOrderId: entry.venueOrderId !== undefined ? String(entry.venueOrderId) : undefined,
      fillQuantity: 0,
      timestamp: Date.now(),
      ...detail,
    };
    this.emit('order_event', event);
  }

  private rejectOrder(order: Order, code: string, message: string): void {
    this.emit('order_event', {
      orderId: order.id,
      status: 'invalid',
      fillQuantity: 0,
      message,
      timestamp: Date.now(),
    } satisfies OrderEvent);
    this.publish({ type: 'warning', code, message });
  }

  private reportUnmatched(what: string, venueOrderId: number): void {
    logger.warn({ venueOrderId }, `Unmatched ${what} event`);
    this.publish({
      type: 'warning',
      code: 'UnmatchedEvent',
      message: `Received ${what} for order ${venueOrderId} not placed in this session`,
    });
  }

  private publish(message: BrokerageMessage): void {
    this.emit('message', message);
  }
}
