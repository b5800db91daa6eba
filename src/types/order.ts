import type { TradingSymbol } from './market.js';

export const ORDER_SIDES = ['BUY', 'SELL'] as const;
export type OrderSide = (typeof ORDER_SIDES)[number];

/** LMT = 지정가, MKT = 시장가 */
export const ORDER_TYPES = ['LMT', 'MKT'] as const;
export type OrderType = (typeof ORDER_TYPES)[number];

export interface OrderRequest {
  readonly symbol: TradingSymbol;
  readonly side: OrderSide;
  readonly type: OrderType;
  readonly quantity: number;     // base asset(HNS) 수량
  readonly price?: number;       // quote asset(BTC) 단가, LMT 필수
  readonly receiveWindow?: number;
}
