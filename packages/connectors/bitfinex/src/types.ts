// Bitfinex v2 wire shapes. The venue sends fixed-position arrays; each schema
// validates the positions we read and turns them into named records.

import { z } from 'zod';

const nullableNumber = z.number().nullable();

/**
 * [ID, GID, CID, SYMBOL, MTS_CREATE, MTS_UPDATE, AMOUNT, AMOUNT_ORIG, TYPE,
 *  TYPE_PREV, MTS_TIF, _, FLAGS, STATUS, _, _, PRICE, PRICE_AVG, ...]
 */
export const orderSchema = z
  .tuple([
    z.number(),
    nullableNumber,
    nullableNumber,
    z.string(),
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.string(),
    z.string().nullable(),
    nullableNumber,
    z.unknown(),
    nullableNumber,
    z.string(),
    z.unknown(),
    z.unknown(),
    z.number(),
    nullableNumber,
  ])
  .rest(z.unknown())
  .transform((row) => ({
    id: row[0],
    gid: row[1],
    cid: row[2],
    symbol: row[3],
    mtsCreate: row[4],
    mtsUpdate: row[5],
    /** Remaining amount, signed */
    amount: row[6],
    /** Original amount, signed */
    amountOrig: row[7],
    type: row[8],
    typePrev: row[9],
    flags: row[12] ?? 0,
    status: row[13],
    price: row[16],
    priceAvg: row[17] ?? 0,
  }));

export type BitfinexOrder = z.output<typeof orderSchema>;

/**
 * [ID, SYMBOL, MTS_CREATE, ORDER_ID, EXEC_AMOUNT, EXEC_PRICE, ORDER_TYPE,
 *  ORDER_PRICE, MAKER, FEE, FEE_CURRENCY, CID]
 */
export const tradeSchema = z
  .tuple([
    z.number(),
    z.string(),
    z.number(),
    z.number(),
    z.number(),
    z.number(),
    z.string().nullable(),
    nullableNumber,
    nullableNumber,
    nullableNumber,
    z.string().nullable(),
  ])
  .rest(z.unknown())
  .transform((row) => ({
    id: row[0],
    symbol: row[1],
    mtsCreate: row[2],
    orderId: row[3],
    execAmount: row[4],
    execPrice: row[5],
    orderType: row[6],
    fee: row[9],
    feeCurrency: row[10],
  }));

export type BitfinexTrade = z.output<typeof tradeSchema>;

/**
 * [SYMBOL, STATUS, AMOUNT, BASE_PRICE, MARGIN_FUNDING, MARGIN_FUNDING_TYPE,
 *  PL, PL_PERC, PRICE_LIQ, LEVERAGE, ...]
 */
export const positionSchema = z
  .tuple([
    z.string(),
    z.string(),
    z.number(),
    z.number(),
    nullableNumber,
    nullableNumber,
    nullableNumber,
    nullableNumber,
    nullableNumber,
    nullableNumber,
  ])
  .rest(z.unknown())
  .transform((row) => ({
    symbol: row[0],
    status: row[1],
    amount: row[2],
    basePrice: row[3],
    profitLoss: row[6],
    liquidationPrice: row[8],
    leverage: row[9],
  }));

export type BitfinexPosition = z.output<typeof positionSchema>;

/**
 * [WALLET_TYPE, CURRENCY, BALANCE, UNSETTLED_INTEREST, AVAILABLE_BALANCE, ...]
 */
export const walletSchema = z
  .tuple([z.string(), z.string(), z.number(), nullableNumber])
  .rest(z.unknown())
  .transform((row) => ({
    walletType: row[0],
    currency: row[1],
    balance: row[2],
  }));

export type BitfinexWallet = z.output<typeof walletSchema>;

/**
 * [MTS, OPEN, CLOSE, HIGH, LOW, VOLUME]
 */
export const candleSchema = z
  .tuple([z.number(), z.number(), z.number(), z.number(), z.number(), z.number()])
  .rest(z.unknown())
  .transform((row) => ({
    timestamp: row[0],
    open: row[1],
    close: row[2],
    high: row[3],
    low: row[4],
    volume: row[5],
  }));

export type BitfinexCandle = z.output<typeof candleSchema>;

/**
 * [MTS, TYPE, MESSAGE_ID, _, NOTIFY_INFO, CODE, STATUS, TEXT]
 */
export const notificationSchema = z
  .tuple([
    z.number(),
    z.string(),
    z.unknown(),
    z.unknown(),
    z.unknown(),
    nullableNumber,
    z.string(),
    z.string().nullable(),
  ])
  .rest(z.unknown())
  .transform((row) => {
    const info = orderSchema.safeParse(row[4]);
    return {
      mts: row[0],
      type: row[1],
      order: info.success ? info.data : undefined,
      code: row[5],
      status: row[6],
      text: row[7] ?? '',
    };
  });

export type BitfinexNotification = z.output<typeof notificationSchema>;

export const authEventSchema = z.object({
  event: z.literal('auth'),
  status: z.string(),
  msg: z.string().optional(),
  code: z.number().optional(),
  userId: z.number().optional(),
});

export const infoEventSchema = z.object({
  event: z.literal('info'),
  version: z.number().optional(),
  code: z.number().optional(),
  msg: z.string().optional(),
});

export const errorEventSchema = z.object({
  event: z.literal('error'),
  msg: z.string(),
  code: z.number().optional(),
});

// --- Outbound order command payloads ---

export type OrderCommandCode = 'on' | 'ou' | 'oc';

export interface NewOrderPayload {
  symbol: string;
  /** Signed decimal string */
  amount: string;
  type: string;
  price: string;
  flags?: number;
  cid: number;
}

export interface UpdateOrderPayload {
  id: number;
  amount: string;
  price: string;
}

export interface CancelOrderPayload {
  id: number;
}

export interface OrderCommandPayloads {
  on: NewOrderPayload;
  ou: UpdateOrderPayload;
  oc: CancelOrderPayload;
}
