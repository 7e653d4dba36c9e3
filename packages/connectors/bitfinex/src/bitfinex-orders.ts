// ============================================================
// Order vocabulary: host order types and statuses <-> venue tokens.
// The type table is closed; both directions derive from it.
// ============================================================

import type { AccountType, Order, OrderStatus, OrderType } from '@cryptobridge/core';
import type { BitfinexOrder } from './types.js';

export const ORDER_FLAGS = {
  hidden: 64,
  postOnly: 4096,
} as const;

const EXCHANGE_PREFIX = 'EXCHANGE ';

export const VENUE_ORDER_TYPES = {
  market: 'MARKET',
  limit: 'LIMIT',
  stop_market: 'STOP',
} as const satisfies Partial<Record<OrderType, string>>;

export type SupportedOrderType = keyof typeof VENUE_ORDER_TYPES;

type VenueOrderToken = (typeof VENUE_ORDER_TYPES)[SupportedOrderType];

function buildReverseTable(): ReadonlyMap<string, SupportedOrderType> {
  const reverse = new Map<string, SupportedOrderType>();
  for (const hostType of supportedOrderTypes()) {
    const token: VenueOrderToken = VENUE_ORDER_TYPES[hostType];
    if (reverse.has(token)) {
      throw new Error(`Venue order token ${token} is mapped twice`);
    }
    reverse.set(token, hostType);
  }
  return reverse;
}

export function supportedOrderTypes(): SupportedOrderType[] {
  return ['market', 'limit', 'stop_market'];
}

const HOST_ORDER_TYPES = buildReverseTable();

export function isSupportedOrderType(type: OrderType): type is SupportedOrderType {
  return supportedOrderTypes().some((supported) => supported === type);
}

/**
 * Venue token for a host order type; cash accounts trade on the
 * exchange wallet and use the "EXCHANGE " variants.
 */
export function toVenueOrderType(accountType: AccountType, type: SupportedOrderType): string {
  const token = VENUE_ORDER_TYPES[type];
  return accountType === 'cash' ? `${EXCHANGE_PREFIX}${token}` : token;
}

/**
 * Host order type for a venue token, or null for tokens outside the table
 * (trailing stops, fill-or-kill, OCO legs, ...).
 */
export function fromVenueOrderType(token: string): SupportedOrderType | null {
  const bare = token.startsWith(EXCHANGE_PREFIX) ? token.slice(EXCHANGE_PREFIX.length) : token;
  return HOST_ORDER_TYPES.get(bare) ?? null;
}

/**
 * Whether a venue order belongs to the wallet this account trades from.
 */
export function belongsToAccount(accountType: AccountType, token: string): boolean {
  const isExchange = token.startsWith(EXCHANGE_PREFIX);
  return accountType === 'cash' ? isExchange : !isExchange;
}

export function orderFlags(order: Order): number {
  let flags = 0;
  if (order.type !== 'limit' || !order.properties) {
    return flags;
  }
  if (order.properties.hidden) flags |= ORDER_FLAGS.hidden;
  if (order.properties.postOnly) flags |= ORDER_FLAGS.postOnly;
  return flags;
}

/**
 * Price sent with an order; market orders carry 0.
 * Returns null when the price the type needs is missing.
 */
export function orderPrice(order: Order): number | null {
  switch (order.type) {
    case 'limit':
      return order.limitPrice ?? null;
    case 'stop_market':
      return order.stopPrice ?? null;
    case 'market':
      return 0;
    default:
      return null;
  }
}

/**
 * Decimal string without exponent notation or trailing zeros.
 */
export function formatDecimal(value: number): string {
  const fixed = value.toFixed(8).replace(/\.?0+$/, '');
  return fixed === '-0' ? '0' : fixed;
}

/**
 * Filled quantity of a venue order, signed like the order.
 */
export function filledQuantity(order: BitfinexOrder): number {
  return order.amountOrig - order.amount;
}

/**
 * Leading status token: "EXECUTED @ 107.6(-0.2)" -> "EXECUTED",
 * "CANCELED was: PARTIALLY FILLED @ ..." -> "CANCELED".
 */
export function statusToken(rawStatus: string): string {
  const cut = rawStatus.search(/ @|,| was:/);
  return (cut === -1 ? rawStatus : rawStatus.slice(0, cut)).trim();
}

/**
 * Host status from the venue status and the filled quantity; null when the
 * venue status is not recognised.
 */
export function toOrderStatus(order: BitfinexOrder): OrderStatus | null {
  const filled = filledQuantity(order);

  const token = statusToken(order.status);
  // "INSUFFICIENT BALANCE (U1)", "INSUFFICIENT MARGIN (G1)", ...
  if (token.startsWith('INSUFFICIENT ')) {
    return 'invalid';
  }

  switch (token) {
    case 'ACTIVE':
      return filled !== 0 ? 'partially_filled' : 'submitted';
    case 'PARTIALLY FILLED':
      return 'partially_filled';
    case 'EXECUTED':
      return 'filled';
    case 'CANCELED':
    case 'POSTONLY CANCELED':
    case 'RSN_DUST':
    case 'RSN_PAUSE':
      return 'canceled';
    default:
      return null;
  }
}
