import { z } from 'zod';
import {
  orderSchema,
  tradeSchema,
  notificationSchema,
  authEventSchema,
  infoEventSchema,
  errorEventSchema,
  type BitfinexOrder,
  type BitfinexTrade,
  type BitfinexNotification,
  type OrderCommandCode,
  type OrderCommandPayloads,
} from './types.js';

export type StreamEvent =
  | { kind: 'info'; version?: number; code?: number; message?: string }
  | { kind: 'auth'; ok: boolean; message?: string; code?: number }
  | { kind: 'error'; message: string; code?: number }
  | { kind: 'heartbeat'; channel: number }
  | { kind: 'order-snapshot'; orders: BitfinexOrder[] }
  | { kind: 'order-new'; order: BitfinexOrder }
  | { kind: 'order-update'; order: BitfinexOrder }
  | { kind: 'order-cancel'; order: BitfinexOrder }
  | { kind: 'trade-executed'; trade: BitfinexTrade }
  | { kind: 'trade-update'; trade: BitfinexTrade }
  | { kind: 'notification'; notification: BitfinexNotification }
  | { kind: 'ignored'; channel: number; type: string };

const frameSchema = z.tuple([z.number(), z.string()]).rest(z.unknown());

const ORDER_EVENTS = {
  on: 'order-new',
  ou: 'order-update',
  oc: 'order-cancel',
} as const;

const TRADE_EVENTS = {
  te: 'trade-executed',
  tu: 'trade-update',
} as const;

function isOrderEventType(type: string): type is keyof typeof ORDER_EVENTS {
  return Object.hasOwn(ORDER_EVENTS, type);
}

function isTradeEventType(type: string): type is keyof typeof TRADE_EVENTS {
  return Object.hasOwn(TRADE_EVENTS, type);
}

/**
 * Decode one raw frame. Returns null for frames that are not valid JSON or
 * whose payload does not have the expected shape.
 */
export function decodeFrame(raw: string): StreamEvent | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  if (Array.isArray(json)) {
    return decodeChannelFrame(json);
  }
  return decodeEventFrame(json);
}

function decodeEventFrame(json: unknown): StreamEvent | null {
  const auth = authEventSchema.safeParse(json);
  if (auth.success) {
    return { kind: 'auth', ok: auth.data.status === 'OK', message: auth.data.msg, code: auth.data.code };
  }

  const info = infoEventSchema.safeParse(json);
  if (info.success) {
    return { kind: 'info', version: info.data.version, code: info.data.code, message: info.data.msg };
  }

  const error = errorEventSchema.safeParse(json);
  if (error.success) {
    return { kind: 'error', message: error.data.msg, code: error.data.code };
  }

  return null;
}

function decodeChannelFrame(json: unknown[]): StreamEvent | null {
  const frame = frameSchema.safeParse(json);
  if (!frame.success) {
    return null;
  }

  const [channel, type] = frame.data;
  const payload: unknown = frame.data[2];

  if (type === 'hb') {
    return { kind: 'heartbeat', channel };
  }

  // Only the authenticated channel carries account events
  if (channel !== 0) {
    return { kind: 'ignored', channel, type };
  }

  if (type === 'os') {
    const orders = z.array(orderSchema).safeParse(payload);
    return orders.success ? { kind: 'order-snapshot', orders: orders.data } : null;
  }

  if (isOrderEventType(type)) {
    const order = orderSchema.safeParse(payload);
    return order.success ? { kind: ORDER_EVENTS[type], order: order.data } : null;
  }

  if (isTradeEventType(type)) {
    const trade = tradeSchema.safeParse(payload);
    return trade.success ? { kind: TRADE_EVENTS[type], trade: trade.data } : null;
  }

  if (type === 'n') {
    const notification = notificationSchema.safeParse(payload);
    return notification.success ? { kind: 'notification', notification: notification.data } : null;
  }

  return { kind: 'ignored', channel, type };
}

/**
 * Envelope an order command: `[0, code, null, payload]`.
 */
export function encodeOrderCommand<C extends OrderCommandCode>(code: C, payload: OrderCommandPayloads[C]): string {
  return JSON.stringify([0, code, null, payload]);
}
