import { z } from 'zod';
import { ASSETS, INTERVALS, ORDER_SIDES, ORDER_TYPES, SYMBOLS } from '../../types/index.js';

// ─── 인자 ─────────────────────────────────────────────────────────────────

export const symbolSchema = z.enum(SYMBOLS);
export const assetSchema = z.enum(ASSETS);
export const intervalSchema = z.enum(INTERVALS);
export const orderSideSchema = z.enum(ORDER_SIDES);
export const orderTypeSchema = z.enum(ORDER_TYPES);

export const positiveNumberSchema = z.number().finite().positive();
export const limitSchema = z.number().int().positive();
export const idSchema = z.number().int().nonnegative();
export const timeSchema = z.number().int().nonnegative();
export const receiveWindowSchema = z.number().int().positive().optional();
export const addressSchema = z.string().trim().min(1);

export const orderRequestSchema = z
  .object({
    symbol: symbolSchema,
    side: orderSideSchema,
    type: orderTypeSchema,
    quantity: positiveNumberSchema,
    price: positiveNumberSchema.optional(),
    receiveWindow: receiveWindowSchema,
  })
  .refine((o) => o.type !== 'LMT' || o.price !== undefined, {
    message: 'price is required for LMT orders',
    path: ['price'],
  });

// ─── 응답 ─────────────────────────────────────────────────────────────────
// 식별 필드(id, asset, 목록)만 필수. 나머지는 거래소가 null을 보내거나 생략할 수 있다.
// 문서에 없는 필드는 그대로 통과.

/** 가격/수량은 문자열 소수 */
const decimal = z.string();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** 상태 변경 응답의 필드: 형식이 달라도 실패하지 않고 undefined */
function tolerant<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().catch(undefined);
}

/**
 * 상태 변경(주문/취소/출금) 응답. 거래소가 2xx로 이미 처리했으므로 파싱이 실패하면 안 된다.
 * 객체가 아닌 본문은 { payload }로 감싼다.
 */
function acknowledgement<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess((v) => (isRecord(v) ? v : { payload: v }), z.object(shape).passthrough());
}

export const symbolInfoSchema = z
  .object({
    symbol: z.string(),
    status: z.string().nullish(),
    baseAsset: z.string().nullish(),
    basePrecision: z.number().nullish(),
    quoteAsset: z.string().nullish(),
    quotePrecision: z.number().nullish(),
    orderTypes: z.array(z.string()).nullish(),
  })
  .passthrough();

export const exchangeInfoSchema = z
  .object({
    timezone: z.string().nullish(),
    serverTime: z.number().nullish(),
    symbols: z.array(symbolInfoSchema),
  })
  .passthrough();

/** [가격, 수량] */
export const priceLevelSchema = z.tuple([decimal, decimal]);

export const depthSchema = z
  .object({
    lastEventId: z.number().nullish(),
    bids: z.array(priceLevelSchema),
    asks: z.array(priceLevelSchema),
  })
  .passthrough();

export const tradeSchema = z
  .object({
    tradeId: z.number(),
    price: decimal.nullish(),
    quantity: decimal.nullish(),
    quoteQuantity: decimal.nullish(),
    createdAt: z.number().nullish(),
    isBuyerMaker: z.boolean().nullish(),
  })
  .passthrough();
export const tradesSchema = z.array(tradeSchema);

export const klineSchema = z
  .object({
    openTime: z.number(),
    closeTime: z.number().nullish(),
    openPrice: decimal.nullish(),
    highPrice: decimal.nullish(),
    lowPrice: decimal.nullish(),
    closePrice: decimal.nullish(),
    volume: decimal.nullish(),
    quoteVolume: decimal.nullish(),
    numberOfTrades: z.number().nullish(),
  })
  .passthrough();
export const klinesSchema = z.array(klineSchema);

export const tickerDaySchema = z
  .object({
    volumeWeightedAveragePrice: decimal.nullish(),
    priceChange: decimal.nullish(),
    priceChangePercent: decimal.nullish(),
    openPrice: decimal.nullish(),
    highPrice: decimal.nullish(),
    lowPrice: decimal.nullish(),
    closePrice: decimal.nullish(),
    volume: decimal.nullish(),
    quoteVolume: decimal.nullish(),
    openTime: z.number().nullish(),
    closeTime: z.number().nullish(),
    firstTradeId: z.number().nullish(),
    lastTradeId: z.number().nullish(),
    numberOfTrades: z.number().nullish(),
  })
  .passthrough();

export const tickerPriceSchema = z.object({ price: decimal.nullish() }).passthrough();

export const tickerBookSchema = z
  .object({
    bidPrice: decimal.nullish(),
    bidQuantity: decimal.nullish(),
    askPrice: decimal.nullish(),
    askQuantity: decimal.nullish(),
  })
  .passthrough();

export const tickerSupplySchema = z
  .object({
    height: z.number().nullish(),
    circulatingSupply: decimal.nullish(),
  })
  .passthrough();

export const fillSchema = z
  .object({
    price: decimal.nullish(),
    quantity: decimal.nullish(),
    quoteQuantity: decimal.nullish(),
    commission: decimal.nullish(),
    commissionAsset: z.string().nullish(),
  })
  .passthrough();

export const orderSchema = z
  .object({
    orderId: z.number(),
    price: decimal.nullish(),
    originalQuantity: decimal.nullish(),
    executedQuantity: decimal.nullish(),
    status: z.string().nullish(),
    type: z.string().nullish(),
    side: z.string().nullish(),
    createdAt: z.number().nullish(),
    updatedAt: z.number().nullish(),
    fills: z.array(fillSchema).nullish(),
  })
  .passthrough();
export const ordersSchema = z.array(orderSchema);

/** placeOrder / cancelOrder 응답 */
export const orderAckSchema = acknowledgement({
  orderId: tolerant(z.number()),
  price: tolerant(decimal),
  originalQuantity: tolerant(decimal),
  executedQuantity: tolerant(decimal),
  status: tolerant(z.string()),
  type: tolerant(z.string()),
  side: tolerant(z.string()),
  createdAt: tolerant(z.number()),
  updatedAt: tolerant(z.number()),
  fills: tolerant(z.array(fillSchema)),
});

export const balanceSchema = z
  .object({
    asset: z.string(),
    unlocked: decimal.nullish(),
    lockedInOrders: decimal.nullish(),
    canDeposit: z.boolean().nullish(),
    canWithdraw: z.boolean().nullish(),
  })
  .passthrough();

export const accountSchema = z
  .object({
    makerFee: z.number().nullish(),
    takerFee: z.number().nullish(),
    canTrade: z.boolean().nullish(),
    balances: z.array(balanceSchema),
  })
  .passthrough();

export const withdrawalLimitSchema = z
  .object({
    asset: z.string(),
    totalWithdrawn: decimal.nullish(),
    withdrawalLimit: decimal.nullish(),
  })
  .passthrough();

export const accountLimitsSchema = z
  .object({
    startTime: z.number().nullish(),
    endTime: z.number().nullish(),
    withdrawalLimits: z.array(withdrawalLimitSchema),
  })
  .passthrough();

export const accountTradeSchema = z
  .object({
    tradeId: z.number(),
    orderId: z.number().nullish(),
    price: decimal.nullish(),
    quantity: decimal.nullish(),
    quoteQuantity: decimal.nullish(),
    commission: decimal.nullish(),
    commissionAsset: z.string().nullish(),
    createdAt: z.number().nullish(),
    isBuyer: z.boolean().nullish(),
    isMaker: z.boolean().nullish(),
  })
  .passthrough();
export const accountTradesSchema = z.array(accountTradeSchema);

/** 주소 발급도 상태 변경이므로 응답 검증으로 실패시키지 않는다 */
export const depositAddressSchema = acknowledgement({
  address: tolerant(z.string()),
  success: tolerant(z.boolean()),
  asset: tolerant(z.string()),
});

export const withdrawResultSchema = acknowledgement({
  message: tolerant(z.string()),
  success: tolerant(z.boolean()),
  id: tolerant(z.string()),
});

export const depositSchema = z
  .object({
    asset: z.string(),
    amount: decimal.nullish(),
    address: z.string().nullish(),
    txHash: z.string().nullish(),
    createdAt: z.number().nullish(),
  })
  .passthrough();
export const depositHistorySchema = z.array(depositSchema);

export const withdrawalSchema = z
  .object({
    id: z.string(),
    asset: z.string().nullish(),
    amount: decimal.nullish(),
    minerFee: decimal.nullish(),
    address: z.string().nullish(),
    txHash: z.string().nullish(),
    createdAt: z.number().nullish(),
  })
  .passthrough();
export const withdrawHistorySchema = z.array(withdrawalSchema);

// ─── 응답 타입 ────────────────────────────────────────────────────────────

export type ExchangeInfo = z.infer<typeof exchangeInfoSchema>;
export type Depth = z.infer<typeof depthSchema>;
export type Trade = z.infer<typeof tradeSchema>;
export type Kline = z.infer<typeof klineSchema>;
export type TickerDay = z.infer<typeof tickerDaySchema>;
export type TickerPrice = z.infer<typeof tickerPriceSchema>;
export type TickerBook = z.infer<typeof tickerBookSchema>;
export type TickerSupply = z.infer<typeof tickerSupplySchema>;
export type Order = z.infer<typeof orderSchema>;
export type OrderAck = z.infer<typeof orderAckSchema>;
export type Balance = z.infer<typeof balanceSchema>;
export type AccountInfo = z.infer<typeof accountSchema>;
export type AccountLimits = z.infer<typeof accountLimitsSchema>;
export type AccountTrade = z.infer<typeof accountTradeSchema>;
export type DepositAddress = z.infer<typeof depositAddressSchema>;
export type WithdrawResult = z.infer<typeof withdrawResultSchema>;
export type Deposit = z.infer<typeof depositSchema>;
export type Withdrawal = z.infer<typeof withdrawalSchema>;
