export { SYMBOLS, ASSETS, INTERVALS } from './market.js';
export type { TradingSymbol, Asset, Interval, WsState, StreamEndpoint } from './market.js';
export { ORDER_SIDES, ORDER_TYPES } from './order.js';
export type { OrderSide, OrderType, OrderRequest } from './order.js';
