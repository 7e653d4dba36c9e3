// Tests cover: correlation ids, order placement, acknowledgement routing,
// fills, disconnect handling, update/cancel rules and open-order reconciliation.

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// Silence pino logger
vi.mock('pino', () => {
  const noop = () => {};
  const logger: Record<string, unknown> = {
    info: noop,
    warn: noop,
    error: noop,
    debug: noop,
    trace: noop,
    child: () => logger,
  };
  return { default: () => logger };
});

import {
  BrokerageError,
  ConfigurationError,
  RequestFailedError,
  UnsupportedOperationError,
  type BrokerageMessage,
  type Order,
  type OrderEvent,
} from '@cryptobridge/core';
import {
  BitfinexOrderManager,
  CLOSED_ORDER_RETENTION_MS,
  CorrelationIdAllocator,
  type OpenOrderSource,
  type OrderTransport,
} from '../bitfinex-order-manager.js';
import { JsonSymbolMapper } from '../json-symbol-mapper.js';
import { notificationSchema, type BitfinexOrder, type OrderCommandCode, type OrderCommandPayloads } from '../types.js';
import { order, orderRow, trade } from './fixtures/venue-rows.js';

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

class FakeTransport implements OrderTransport {
  isAuthenticated = true;
  accept = true;
  sent: Array<{ code: OrderCommandCode; payload: unknown }> = [];
  drops: string[] = [];

  sendOrderCommand<C extends OrderCommandCode>(code: C, payload: OrderCommandPayloads[C]): boolean {
    if (this.accept) {
      this.sent.push({ code, payload });
    }
    return this.accept;
  }

  drop(reason: string): void {
    this.drops.push(reason);
  }
}

class FakeOpenOrders implements OpenOrderSource {
  rows: BitfinexOrder[] = [];
  failure: Error | null = null;

  async getOpenOrders(): Promise<BitfinexOrder[]> {
    if (this.failure) {
      throw this.failure;
    }
    return this.rows;
  }
}

const NOW = Date.UTC(2024, 0, 1);
const ACK_TIMEOUT_MS = 3000;

function hostOrder(overrides: Partial<Order> = {}): Order {
  return {
    id: 'host-1',
    symbol: { value: 'ETHUSD', securityType: 'crypto', market: 'bitfinex' },
    type: 'limit',
    quantity: 1.5,
    status: 'new',
    brokerIds: [],
    limitPrice: 2000,
    ...overrides,
  };
}

let transport: FakeTransport;
let openOrders: FakeOpenOrders;
let manager: BitfinexOrderManager;
let events: OrderEvent[];
let messages: BrokerageMessage[];

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(NOW);

  transport = new FakeTransport();
  openOrders = new FakeOpenOrders();
  manager = new BitfinexOrderManager({
    transport,
    openOrders,
    symbolMapper: new JsonSymbolMapper(),
    accountType: 'cash',
    orderAckTimeoutMs: ACK_TIMEOUT_MS,
  });

  events = [];
  messages = [];
  manager.on('order_event', (event: OrderEvent) => events.push(event));
  manager.on('message', (message: BrokerageMessage) => messages.push(message));
});

afterEach(() => {
  vi.useRealTimers();
});

/** Place host-1 and acknowledge it with venue id 101 */
function placeAndAck(): void {
  manager.place(hostOrder());
  manager.handleStreamEvent({ kind: 'order-new', order: order({ id: 101, cid: NOW }) });
  events.length = 0;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('CorrelationIdAllocator', () => {
  it('gives distinct increasing ids within the same millisecond', () => {
    const ids = new CorrelationIdAllocator();

    expect([ids.next(), ids.next(), ids.next()]).toEqual([NOW, NOW + 1, NOW + 2]);
  });

  it('follows the clock once it moves past the last id', () => {
    const ids = new CorrelationIdAllocator();
    ids.next();
    vi.setSystemTime(NOW + 50);

    expect(ids.next()).toBe(NOW + 50);
  });
});

describe('place', () => {
  it('sends the new-order command with a correlation id', () => {
    expect(manager.place(hostOrder())).toBe(true);

    expect(transport.sent).toEqual([
      {
        code: 'on',
        payload: { symbol: 'tETHUSD', amount: '1.5', type: 'EXCHANGE LIMIT', price: '2000', cid: NOW },
      },
    ]);
    expect(manager.pendingCount).toBe(1);
  });

  it('two placements in the same millisecond get distinct correlation ids', () => {
    manager.place(hostOrder({ id: 'host-1' }));
    manager.place(hostOrder({ id: 'host-2', quantity: -0.5 }));

    expect(transport.sent.map((s) => s.payload)).toMatchObject([{ cid: NOW }, { cid: NOW + 1, amount: '-0.5' }]);
  });

  it('adds hidden and post-only flags to limit orders', () => {
    manager.place(hostOrder({ properties: { hidden: true, postOnly: true } }));

    expect(transport.sent[0]?.payload).toMatchObject({ flags: 4160 });
  });

  it('sends market orders with price 0', () => {
    manager.place(hostOrder({ type: 'market', limitPrice: undefined }));

    expect(transport.sent[0]?.payload).toMatchObject({ type: 'EXCHANGE MARKET', price: '0' });
  });

  it('rejects unsupported order types with an invalid event and a warning', () => {
    expect(manager.place(hostOrder({ type: 'trailing_stop' }))).toBe(false);

    expect(transport.sent).toEqual([]);
    expect(events).toEqual([
      {
        orderId: 'host-1',
        status: 'invalid',
        fillQuantity: 0,
        message: 'Order type trailing_stop is not supported by Bitfinex',
        timestamp: NOW,
      },
    ]);
    expect(messages.map((m) => m.code)).toEqual(['UnsupportedOrderType']);
  });

  it('throws ConfigurationError for unknown symbols', () => {
    const symbol = { value: 'XYZUSD', securityType: 'crypto' as const, market: 'bitfinex' };

    expect(() => manager.place(hostOrder({ symbol }))).toThrow(ConfigurationError);
    expect(manager.pendingCount).toBe(0);
  });

  it('returns false when the stream is not authenticated', () => {
    transport.isAuthenticated = false;

    expect(manager.place(hostOrder())).toBe(false);
    expect(transport.sent).toEqual([]);
    expect(manager.pendingCount).toBe(0);
  });

  it('forgets the correlation when the send fails', () => {
    transport.accept = false;

    expect(manager.place(hostOrder())).toBe(false);
    expect(manager.pendingCount).toBe(0);
  });
});

describe('acknowledgements and fills', () => {
  it('links the venue id on the new-order acknowledgement', () => {
    manager.place(hostOrder());
    manager.handleStreamEvent({ kind: 'order-new', order: order({ id: 101, cid: NOW }) });

    expect(events).toEqual([
      { orderId: 'host-1', status: 'submitted', venueOrderId: '101', fillQuantity: 0, timestamp: NOW },
    ]);
    expect(manager.getTrackedOrder('host-1')?.brokerIds).toEqual(['101']);
  });

  it('reports partial then complete fills from executed trades', () => {
    placeAndAck();

    manager.handleStreamEvent({ kind: 'trade-executed', trade: trade(101, 0.5, 2001) });
    manager.handleStreamEvent({ kind: 'trade-executed', trade: trade(101, 1, 2002) });

    expect(events.map((e) => [e.status, e.fillQuantity, e.fillPrice])).toEqual([
      ['partially_filled', 0.5, 2001],
      ['filled', 1, 2002],
    ]);
    expect(events[0]).toMatchObject({ fee: -0.2, feeCurrency: 'USD', venueOrderId: '101' });
    expect(manager.pendingCount).toBe(0);
  });

  it('trade updates do not count as fills', () => {
    placeAndAck();

    manager.handleStreamEvent({ kind: 'trade-update', trade: trade(101, 0.5, 2001) });

    expect(events).toEqual([]);
  });

  it('reports a venue-side cancel and drops the correlation', () => {
    placeAndAck();

    manager.handleStreamEvent({ kind: 'order-cancel', order: order({ id: 101, cid: NOW, status: 'CANCELED' }) });

    expect(events).toEqual([
      { orderId: 'host-1', status: 'canceled', venueOrderId: '101', fillQuantity: 0, message: 'CANCELED', timestamp: NOW },
    ]);
    expect(manager.pendingCount).toBe(0);
  });

  it('reports the unseen fill when the order closes executed', () => {
    placeAndAck();

    manager.handleStreamEvent({
      kind: 'order-cancel',
      order: order({ id: 101, cid: NOW, status: 'EXECUTED @ 1999.5(1.5)', amount: 0, amountOrig: 1.5, priceAvg: 1999.5 }),
    });

    expect(events).toEqual([
      { orderId: 'host-1', status: 'filled', venueOrderId: '101', fillQuantity: 1.5, fillPrice: 1999.5, timestamp: NOW },
    ]);
  });

  it('an acknowledgement that already reports execution leaves the fill to trades', () => {
    manager.place(hostOrder());
    manager.handleStreamEvent({
      kind: 'order-new',
      order: order({ id: 101, cid: NOW, status: 'EXECUTED @ 2000(1.5)', amount: 0, amountOrig: 1.5, priceAvg: 2000 }),
    });

    expect(events.map((e) => [e.status, e.fillQuantity])).toEqual([['submitted', 0]]);
  });

  describe('trade and close of a filled order in either order', () => {
    const executedClose = () =>
      manager.handleStreamEvent({
        kind: 'order-cancel',
        order: order({ id: 101, cid: NOW, status: 'EXECUTED @ 2000(1.5)', amount: 0, amountOrig: 1.5, priceAvg: 2000 }),
      });

    it('trade first: the close is absorbed', () => {
      placeAndAck();

      manager.handleStreamEvent({ kind: 'trade-executed', trade: trade(101, 1.5, 2000) });
      executedClose();

      expect(events.map((e) => [e.status, e.fillQuantity, e.fee])).toEqual([['filled', 1.5, -0.2]]);
      expect(messages).toEqual([]);
    });

    it('close first: the late trade only adds its fee', () => {
      placeAndAck();

      executedClose();
      manager.handleStreamEvent({ kind: 'trade-executed', trade: trade(101, 1.5, 2000) });

      expect(events.map((e) => [e.status, e.fillQuantity, e.fee])).toEqual([
        ['filled', 1.5, undefined],
        ['filled', 0, -0.2],
      ]);
      expect(events[1]).toMatchObject({ feeCurrency: 'USD', venueOrderId: '101', message: 'Trade reported after order close' });
      expect(messages).toEqual([]);
    });

    it('partial trade, close, then the remaining trade', () => {
      placeAndAck();

      manager.handleStreamEvent({ kind: 'trade-executed', trade: trade(101, 0.5, 2001) });
      executedClose();
      manager.handleStreamEvent({ kind: 'trade-executed', trade: trade(101, 1, 2002) });

      expect(events.map((e) => [e.status, e.fillQuantity, e.fee])).toEqual([
        ['partially_filled', 0.5, -0.2],
        ['filled', 1, undefined],
        ['filled', 0, -0.2],
      ]);
      expect(messages).toEqual([]);
    });

    it('messages arriving after the retention window are unmatched again', () => {
      placeAndAck();

      manager.handleStreamEvent({ kind: 'trade-executed', trade: trade(101, 1.5, 2000) });
      vi.setSystemTime(NOW + CLOSED_ORDER_RETENTION_MS + 1);
      executedClose();

      expect(messages).toEqual([
        { type: 'warning', code: 'UnmatchedEvent', message: 'Received order close for order 101 not placed in this session' },
      ]);
    });
  });

  it('rejected new orders become invalid', () => {
    manager.place(hostOrder());
    const notification = notificationSchema.parse([
      NOW,
      'on-req',
      null,
      null,
      orderRow({ id: 0, cid: NOW }),
      null,
      'ERROR',
      'Invalid order: minimum size for ETHUSD is 0.04',
    ]);

    manager.handleStreamEvent({ kind: 'notification', notification });

    expect(events.map((e) => [e.status, e.message])).toEqual([
      ['invalid', 'Invalid order: minimum size for ETHUSD is 0.04'],
    ]);
    expect(messages).toEqual([
      { type: 'warning', code: 'OrderRejected', message: 'New order rejected: Invalid order: minimum size for ETHUSD is 0.04' },
    ]);
    expect(manager.pendingCount).toBe(0);
  });

  it('events for orders not placed in this session are warnings', () => {
    manager.handleStreamEvent({ kind: 'trade-executed', trade: trade(999, 1, 2000) });

    expect(events).toEqual([]);
    expect(messages).toEqual([
      { type: 'warning', code: 'UnmatchedEvent', message: 'Received trade for order 999 not placed in this session' },
    ]);
  });

  it('venue error events reach the message channel', () => {
    manager.handleStreamEvent({ kind: 'error', message: 'nonce: small', code: 10114 });

    expect(messages).toEqual([{ type: 'error', code: 'VenueError', message: '10114 nonce: small' }]);
  });
});

describe('disconnect', () => {
  it('a pending unacknowledged order becomes unknown, not filled or canceled', () => {
    manager.place(hostOrder());

    manager.handleDisconnect(false);

    expect(events.map((e) => e.status)).toEqual(['unknown']);
    expect(manager.getTrackedOrder('host-1')?.status).toBe('unknown');
    expect(messages).toEqual([
      { type: 'warning', code: 'OrderStatusUnknown', message: '1 order(s) have unknown status after disconnect' },
    ]);
  });

  it('does not report the same order twice', () => {
    manager.place(hostOrder());

    manager.handleDisconnect(false);
    manager.handleDisconnect(false);

    expect(events).toHaveLength(1);
    expect(messages).toHaveLength(1);
  });

  it('explicit disconnect also forgets the correlations', () => {
    manager.place(hostOrder());

    manager.handleDisconnect(true);

    expect(events.map((e) => e.status)).toEqual(['unknown']);
    expect(manager.pendingCount).toBe(0);
  });

  it('the order snapshot after re-authentication resolves unknown orders', () => {
    manager.place(hostOrder());
    manager.handleDisconnect(false);
    events.length = 0;

    manager.handleStreamEvent({ kind: 'order-snapshot', orders: [order({ id: 101, cid: NOW, status: 'ACTIVE' })] });

    expect(events.map((e) => [e.status, e.venueOrderId])).toEqual([['submitted', '101']]);
    expect(manager.getTrackedOrder('host-1')?.brokerIds).toEqual(['101']);
  });
});

describe('update', () => {
  it('requires a venue id', () => {
    expect(() => manager.update(hostOrder())).toThrow(BrokerageError);
  });

  it('rejects orders with more than one venue id', () => {
    expect(() => manager.update(hostOrder({ brokerIds: ['101', '102'] }))).toThrow(UnsupportedOperationError);
    expect(() => manager.update(hostOrder({ brokerIds: ['101', '102'] }))).toThrow(
      'Multiple orders update not supported. Please cancel and re-create.',
    );
  });

  it('resends quantity and price under the venue id', () => {
    expect(manager.update(hostOrder({ brokerIds: ['101'], quantity: 2, limitPrice: 2100 }))).toBe(true);

    expect(transport.sent).toEqual([{ code: 'ou', payload: { id: 101, amount: '2', price: '2100' } }]);
  });

  it('a missing acknowledgement drops the stream', () => {
    manager.update(hostOrder({ brokerIds: ['101'] }));

    vi.advanceTimersByTime(ACK_TIMEOUT_MS);

    expect(messages).toEqual([
      { type: 'warning', code: 'AckTimeout', message: 'No update acknowledgement for order 101 within 3000ms' },
    ]);
    expect(transport.drops).toEqual(['update acknowledgement timeout']);
  });

  it('an acknowledgement clears the timer', () => {
    placeAndAck();
    manager.update(hostOrder({ brokerIds: ['101'], quantity: 2 }));

    manager.handleStreamEvent({ kind: 'order-update', order: order({ id: 101, cid: NOW, amount: 2, amountOrig: 2 }) });
    vi.advanceTimersByTime(ACK_TIMEOUT_MS);

    expect(transport.drops).toEqual([]);
    expect(events.map((e) => [e.status, e.message])).toEqual([['submitted', 'Order updated']]);
  });
});

describe('cancel', () => {
  it('returns false without sending when no venue id is assigned', () => {
    expect(manager.cancel(hostOrder())).toBe(false);
    expect(transport.sent).toEqual([]);
  });

  it('sends the cancel command under the venue id', () => {
    expect(manager.cancel(hostOrder({ brokerIds: ['101'] }))).toBe(true);

    expect(transport.sent).toEqual([{ code: 'oc', payload: { id: 101 } }]);
  });

  it('a missing cancel acknowledgement drops the stream', () => {
    manager.cancel(hostOrder({ brokerIds: ['101'] }));

    vi.advanceTimersByTime(ACK_TIMEOUT_MS);

    expect(transport.drops).toEqual(['cancel acknowledgement timeout']);
  });
});

describe('reconcileOpenOrders', () => {
  it('merging a poll that contains an unacknowledged order keeps the host linkage', async () => {
    manager.place(hostOrder());
    openOrders.rows = [order({ id: 555, cid: NOW, status: 'ACTIVE' })];

    const result = await manager.reconcileOpenOrders();

    expect(result).toHaveLength(1);
    expect(result[0]).toMatchObject({ id: 'host-1', brokerIds: ['555'], status: 'submitted' });
    expect(manager.getTrackedOrder('host-1')?.brokerIds).toEqual(['555']);

    // Later fills route to the host order through the merged venue id
    manager.handleStreamEvent({ kind: 'trade-executed', trade: trade(555, 1.5, 2000) });
    expect(events.at(-1)).toMatchObject({ orderId: 'host-1', status: 'filled', fillQuantity: 1.5 });
  });

  it('maps orders not tracked in this session to new host orders', async () => {
    openOrders.rows = [order({ id: 777, amount: 1, amountOrig: 1.5, price: 1950 })];

    const result = await manager.reconcileOpenOrders();

    expect(result).toEqual([
      {
        id: 'bitfinex-777',
        symbol: { value: 'ETHUSD', securityType: 'crypto', market: 'bitfinex' },
        type: 'limit',
        quantity: 1.5,
        status: 'partially_filled',
        brokerIds: ['777'],
        price: 1950,
        limitPrice: 1950,
        stopPrice: undefined,
        filledQuantity: 0.5,
        createdAt: 1_700_000_000_000,
      },
    ]);
  });

  it('skips other wallets and reports unmappable orders without aborting', async () => {
    openOrders.rows = [
      order({ id: 1, type: 'LIMIT' }),
      order({ id: 2, type: 'EXCHANGE TRAILING STOP' }),
      order({ id: 3, symbol: 'tXYZUSD' }),
      order({ id: 4, status: 'WEIRD' }),
      order({ id: 5 }),
    ];

    const result = await manager.reconcileOpenOrders();

    expect(result.map((o) => o.id)).toEqual(['bitfinex-5']);
    expect(messages.map((m) => m.code)).toEqual(['UnsupportedOrderType', 'UnknownSymbol', 'UnknownOrderStatus']);
    expect(manager.getCachedSnapshot().map((s) => s.venueOrderId)).toEqual([5]);
  });

  it('rebuilds the cached snapshot on every poll', async () => {
    openOrders.rows = [order({ id: 5 })];
    await manager.reconcileOpenOrders();
    openOrders.rows = [order({ id: 6, amount: 0.5, amountOrig: 1.5 })];
    await manager.reconcileOpenOrders();

    expect(manager.getCachedSnapshot()).toEqual([
      {
        venueOrderId: 6,
        cid: null,
        filledQuantity: 1,
        remainingQuantity: 0.5,
        status: 'partially_filled',
        type: 'EXCHANGE LIMIT',
        price: 2000,
      },
    ]);
  });

  it('propagates request failures', async () => {
    openOrders.failure = new RequestFailedError('auth/r/orders', 500, '', 'Internal Server Error', 'bitfinex');

    await expect(manager.reconcileOpenOrders()).rejects.toThrow(RequestFailedError);
  });
});
