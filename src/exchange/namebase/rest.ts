/**
 * Namebase Exchange REST API — endpoints 상수 + RequestClient + zod 검증.
 * 모든 경로는 endpoints.ts에서만 가져온다.
 */

import type { z } from 'zod';
import { InvalidArgumentError } from '../../errors.js';
import type { Asset, Interval, OrderRequest, TradingSymbol } from '../../types/index.js';
import { RequestClient, type ClientOptions, type RequestOptions } from './client.js';
import {
  PUBLIC_INFO,
  PUBLIC_DEPTH,
  PUBLIC_KLINES,
  PUBLIC_TICKER_DAY,
  PUBLIC_TICKER_PRICE,
  PUBLIC_TICKER_BOOK,
  PUBLIC_TICKER_SUPPLY,
  PRIVATE_TRADES,
  PRIVATE_TRADES_ACCOUNT,
  PRIVATE_TRADES_ORDER,
  PRIVATE_ORDER,
  PRIVATE_ORDERS_OPEN,
  PRIVATE_ORDERS_ALL,
  PRIVATE_ACCOUNT,
  PRIVATE_ACCOUNT_LIMITS,
  PRIVATE_DEPOSIT_ADDRESS,
  PRIVATE_DEPOSIT_HISTORY,
  PRIVATE_WITHDRAW,
  PRIVATE_WITHDRAW_HISTORY,
} from './endpoints.js';
import type { HttpMethod } from './transport.js';
import {
  symbolSchema,
  assetSchema,
  intervalSchema,
  positiveNumberSchema,
  limitSchema,
  idSchema,
  timeSchema,
  receiveWindowSchema,
  addressSchema,
  orderRequestSchema,
  exchangeInfoSchema,
  depthSchema,
  tradesSchema,
  klinesSchema,
  tickerDaySchema,
  tickerPriceSchema,
  tickerBookSchema,
  tickerSupplySchema,
  orderSchema,
  orderAckSchema,
  ordersSchema,
  accountSchema,
  accountLimitsSchema,
  accountTradesSchema,
  depositAddressSchema,
  withdrawResultSchema,
  depositHistorySchema,
  withdrawHistorySchema,
  type AccountInfo,
  type AccountLimits,
  type AccountTrade,
  type Balance,
  type Deposit,
  type DepositAddress,
  type Depth,
  type ExchangeInfo,
  type Kline,
  type Order,
  type OrderAck,
  type TickerBook,
  type TickerDay,
  type TickerPrice,
  type TickerSupply,
  type Trade,
  type Withdrawal,
  type WithdrawResult,
} from './schemas.js';

const DEFAULT_LIMIT = 100;

export interface ReceiveWindowOptions {
  /** 요청 유효 시간(ms) */
  receiveWindow?: number;
}

export interface TradeQueryOptions extends ReceiveWindowOptions {
  /** 지정 시 tradeId 이상만 */
  tradeId?: number;
  limit?: number;
}

export interface OrderQueryOptions extends ReceiveWindowOptions {
  /** 지정 시 orderId 이상만 */
  orderId?: number;
  limit?: number;
}

export interface TimeRangeOptions extends ReceiveWindowOptions {
  startTime?: number;
  endTime?: number;
}

export interface KlineOptions {
  startTime?: number;
  endTime?: number;
  limit?: number;
}

/** zod 검증 실패 → InvalidArgumentError. 네트워크 호출 전에 실행된다 */
function arg<S extends z.ZodTypeAny>(schema: S, value: unknown, name: string): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  const issue = result.error.issues[0];
  const detail = issue ? issue.message : 'invalid value';
  throw new InvalidArgumentError(`Invalid ${name}: ${detail}`);
}

/**
 * Namebase Exchange 클라이언트 — 엔드포인트당 메서드 하나.
 *
 * 인증: Authorization Basic (auth.ts)
 * 서명이 필요한 엔드포인트는 timestamp(ms)를 자동으로 붙인다.
 * 호출은 서로 독립적이며 재시도하지 않는다.
 */
export class NamebaseExchange {
  private readonly http: RequestClient;

  constructor(options: ClientOptions = {}) {
    this.http = new RequestClient(options);
  }

  // ─── MARKET DATA ──────────────────────────────────────────────────────

  /** 거래 규칙 및 심볼 정보. 연결 확인용 */
  async getExchangeInfo(): Promise<ExchangeInfo> {
    return this.http.sendValidated('GET', PUBLIC_INFO, {}, exchangeInfoSchema);
  }

  /** 호가 깊이: bids/asks = [가격, 수량][] */
  async getDepth(symbol: TradingSymbol, limit: number = DEFAULT_LIMIT): Promise<Depth> {
    const query = {
      symbol: arg(symbolSchema, symbol, 'symbol'),
      limit: arg(limitSchema, limit, 'limit'),
    };
    return this.http.sendValidated('GET', PUBLIC_DEPTH, { query }, depthSchema);
  }

  /** 과거 체결 */
  async getTrades(symbol: TradingSymbol, options: TradeQueryOptions = {}): Promise<Trade[]> {
    const query = {
      symbol: arg(symbolSchema, symbol, 'symbol'),
      limit: arg(limitSchema, options.limit ?? DEFAULT_LIMIT, 'limit'),
      tradeId: arg(idSchema.optional(), options.tradeId, 'tradeId'),
      receiveWindow: arg(receiveWindowSchema, options.receiveWindow, 'receiveWindow'),
    };
    return this.http.sendValidated('GET', PRIVATE_TRADES, { query, signed: true }, tradesSchema);
  }

  /** 캔들 */
  async getKlines(symbol: TradingSymbol, interval: Interval, options: KlineOptions = {}): Promise<Kline[]> {
    const query = {
      symbol: arg(symbolSchema, symbol, 'symbol'),
      interval: arg(intervalSchema, interval, 'interval'),
      limit: arg(limitSchema, options.limit ?? DEFAULT_LIMIT, 'limit'),
      startTime: arg(timeSchema.optional(), options.startTime, 'startTime'),
      endTime: arg(timeSchema.optional(), options.endTime, 'endTime'),
    };
    return this.http.sendValidated('GET', PUBLIC_KLINES, { query }, klinesSchema);
  }

  /** 24시간 롤링 통계 */
  async getTickerDay(symbol: TradingSymbol): Promise<TickerDay> {
    const query = { symbol: arg(symbolSchema, symbol, 'symbol') };
    return this.http.sendValidated('GET', PUBLIC_TICKER_DAY, { query }, tickerDaySchema);
  }

  async getTickerPrice(symbol: TradingSymbol): Promise<TickerPrice> {
    const query = { symbol: arg(symbolSchema, symbol, 'symbol') };
    return this.http.sendValidated('GET', PUBLIC_TICKER_PRICE, { query }, tickerPriceSchema);
  }

  /** 최우선 매수/매도 호가 */
  async getTickerBook(symbol: TradingSymbol): Promise<TickerBook> {
    const query = { symbol: arg(symbolSchema, symbol, 'symbol') };
    return this.http.sendValidated('GET', PUBLIC_TICKER_BOOK, { query }, tickerBookSchema);
  }

  /** 자산 유통량 */
  async getTickerSupply(asset: Asset): Promise<TickerSupply> {
    const query = { asset: arg(assetSchema, asset, 'asset') };
    return this.http.sendValidated('GET', PUBLIC_TICKER_SUPPLY, { query }, tickerSupplySchema);
  }

  // ─── ORDERS ───────────────────────────────────────────────────────────

  /**
   * 신규 주문. price는 LMT 주문에만 필수.
   * 검증 실패 시 네트워크 호출 없이 InvalidArgumentError.
   * 2xx 응답은 필드가 비거나 형식이 달라도 그대로 돌려준다 (주문은 이미 접수됨).
   */
  async placeOrder(order: OrderRequest): Promise<OrderAck> {
    const o = arg(orderRequestSchema, order, 'order');
    const body = {
      symbol: o.symbol,
      side: o.side,
      type: o.type,
      quantity: o.quantity,
      price: o.price,
      receiveWindow: o.receiveWindow,
    };
    return this.http.sendValidated('POST', PRIVATE_ORDER, { body, signed: true }, orderAckSchema);
  }

  /** 주문 상태 조회 */
  async getOrder(symbol: TradingSymbol, orderId: number, options: ReceiveWindowOptions = {}): Promise<Order> {
    const query = {
      symbol: arg(symbolSchema, symbol, 'symbol'),
      orderId: arg(idSchema, orderId, 'orderId'),
      receiveWindow: arg(receiveWindowSchema, options.receiveWindow, 'receiveWindow'),
    };
    return this.http.sendValidated('GET', PRIVATE_ORDER, { query, signed: true }, orderSchema);
  }

  /** 활성 주문 취소 — DELETE, 파라미터는 JSON 본문 */
  async cancelOrder(
    symbol: TradingSymbol,
    orderId: number,
    options: ReceiveWindowOptions = {},
  ): Promise<OrderAck> {
    const body = {
      symbol: arg(symbolSchema, symbol, 'symbol'),
      orderId: arg(idSchema, orderId, 'orderId'),
      receiveWindow: arg(receiveWindowSchema, options.receiveWindow, 'receiveWindow'),
    };
    return this.http.sendValidated('DELETE', PRIVATE_ORDER, { body, signed: true }, orderAckSchema);
  }

  /** 미체결 주문 (최대 500건) */
  async getOpenOrders(symbol: TradingSymbol, options: ReceiveWindowOptions = {}): Promise<Order[]> {
    const query = {
      symbol: arg(symbolSchema, symbol, 'symbol'),
      receiveWindow: arg(receiveWindowSchema, options.receiveWindow, 'receiveWindow'),
    };
    return this.http.sendValidated('GET', PRIVATE_ORDERS_OPEN, { query, signed: true }, ordersSchema);
  }

  /** 활성/취소/체결 전체 주문 */
  async getAllOrders(symbol: TradingSymbol, options: OrderQueryOptions = {}): Promise<Order[]> {
    const query = {
      symbol: arg(symbolSchema, symbol, 'symbol'),
      limit: arg(limitSchema, options.limit ?? DEFAULT_LIMIT, 'limit'),
      orderId: arg(idSchema.optional(), options.orderId, 'orderId'),
      receiveWindow: arg(receiveWindowSchema, options.receiveWindow, 'receiveWindow'),
    };
    return this.http.sendValidated('GET', PRIVATE_ORDERS_ALL, { query, signed: true }, ordersSchema);
  }

  // ─── ACCOUNT ──────────────────────────────────────────────────────────

  /** 수수료(bp), 거래 가능 여부, 자산별 잔고 */
  async getAccountInfo(options: ReceiveWindowOptions = {}): Promise<AccountInfo> {
    const query = { receiveWindow: arg(receiveWindowSchema, options.receiveWindow, 'receiveWindow') };
    return this.http.sendValidated('GET', PRIVATE_ACCOUNT, { query, signed: true }, accountSchema);
  }

  /** 계정 정보 중 잔고만 */
  async getBalances(options: ReceiveWindowOptions = {}): Promise<Balance[]> {
    const account = await this.getAccountInfo(options);
    return account.balances;
  }

  /** 24시간 롤링 출금 한도 */
  async getAccountLimits(options: ReceiveWindowOptions = {}): Promise<AccountLimits> {
    const query = { receiveWindow: arg(receiveWindowSchema, options.receiveWindow, 'receiveWindow') };
    return this.http.sendValidated('GET', PRIVATE_ACCOUNT_LIMITS, { query, signed: true }, accountLimitsSchema);
  }

  async getAccountTrades(symbol: TradingSymbol, options: TradeQueryOptions = {}): Promise<AccountTrade[]> {
    const query = {
      symbol: arg(symbolSchema, symbol, 'symbol'),
      limit: arg(limitSchema, options.limit ?? DEFAULT_LIMIT, 'limit'),
      tradeId: arg(idSchema.optional(), options.tradeId, 'tradeId'),
      receiveWindow: arg(receiveWindowSchema, options.receiveWindow, 'receiveWindow'),
    };
    return this.http.sendValidated('GET', PRIVATE_TRADES_ACCOUNT, { query, signed: true }, accountTradesSchema);
  }

  async getOrderTrades(
    symbol: TradingSymbol,
    orderId: number,
    options: ReceiveWindowOptions = {},
  ): Promise<AccountTrade[]> {
    const query = {
      symbol: arg(symbolSchema, symbol, 'symbol'),
      orderId: arg(idSchema, orderId, 'orderId'),
      receiveWindow: arg(receiveWindowSchema, options.receiveWindow, 'receiveWindow'),
    };
    return this.http.sendValidated('GET', PRIVATE_TRADES_ORDER, { query, signed: true }, accountTradesSchema);
  }

  // ─── WALLET ───────────────────────────────────────────────────────────

  async generateDepositAddress(asset: Asset, options: ReceiveWindowOptions = {}): Promise<DepositAddress> {
    const body = {
      asset: arg(assetSchema, asset, 'asset'),
      receiveWindow: arg(receiveWindowSchema, options.receiveWindow, 'receiveWindow'),
    };
    return this.http.sendValidated('POST', PRIVATE_DEPOSIT_ADDRESS, { body, signed: true }, depositAddressSchema);
  }

  async withdraw(
    asset: Asset,
    address: string,
    amount: number,
    options: ReceiveWindowOptions = {},
  ): Promise<WithdrawResult> {
    const body = {
      asset: arg(assetSchema, asset, 'asset'),
      address: arg(addressSchema, address, 'address'),
      amount: arg(positiveNumberSchema, amount, 'amount'),
      receiveWindow: arg(receiveWindowSchema, options.receiveWindow, 'receiveWindow'),
    };
    return this.http.sendValidated('POST', PRIVATE_WITHDRAW, { body, signed: true }, withdrawResultSchema);
  }

  async getDepositHistory(asset: Asset, options: TimeRangeOptions = {}): Promise<Deposit[]> {
    const query = this.historyQuery(asset, options);
    return this.http.sendValidated('GET', PRIVATE_DEPOSIT_HISTORY, { query, signed: true }, depositHistorySchema);
  }

  async getWithdrawHistory(asset: Asset, options: TimeRangeOptions = {}): Promise<Withdrawal[]> {
    const query = this.historyQuery(asset, options);
    return this.http.sendValidated('GET', PRIVATE_WITHDRAW_HISTORY, { query, signed: true }, withdrawHistorySchema);
  }

  // ─── RAW ──────────────────────────────────────────────────────────────

  /** 문서화되지 않은 엔드포인트용. 응답 형태는 검증하지 않는다 */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    return this.http.send(method, path, options);
  }

  private historyQuery(asset: Asset, options: TimeRangeOptions) {
    return {
      asset: arg(assetSchema, asset, 'asset'),
      startTime: arg(timeSchema.optional(), options.startTime, 'startTime'),
      endTime: arg(timeSchema.optional(), options.endTime, 'endTime'),
      receiveWindow: arg(receiveWindowSchema, options.receiveWindow, 'receiveWindow'),
    };
  }
}
