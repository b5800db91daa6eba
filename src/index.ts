export { NamebaseExchange } from './exchange/namebase/rest.js';
export type {
  ReceiveWindowOptions,
  TradeQueryOptions,
  OrderQueryOptions,
  TimeRangeOptions,
  KlineOptions,
} from './exchange/namebase/rest.js';
export { marketBuy, marketSell, limitBuy, limitSell } from './exchange/namebase/orders.js';
export type { OrderPlacer } from './exchange/namebase/orders.js';
export { RequestClient } from './exchange/namebase/client.js';
export type { ClientOptions, RequestOptions, Params, ParamValue } from './exchange/namebase/client.js';
export { UndiciTransport } from './exchange/namebase/transport.js';
export type { Transport, TransportRequest, TransportResponse, HttpMethod } from './exchange/namebase/transport.js';
export { assertCredentials, encodeCredentials, signRequest, createAuthHeaders } from './exchange/namebase/auth.js';
export type { Credentials } from './exchange/namebase/auth.js';
export { decodeResponse } from './exchange/namebase/decoder.js';
export * as endpoints from './exchange/namebase/endpoints.js';
export type {
  ExchangeInfo,
  Depth,
  Trade,
  Kline,
  TickerDay,
  TickerPrice,
  TickerBook,
  TickerSupply,
  Order,
  OrderAck,
  Balance,
  AccountInfo,
  AccountLimits,
  AccountTrade,
  DepositAddress,
  WithdrawResult,
  Deposit,
  Withdrawal,
} from './exchange/namebase/schemas.js';
export { NamebaseWsClient } from './market/ws-client.js';
export type { WsClientOptions } from './market/ws-client.js';
export {
  NamebaseError,
  InvalidCredentialsError,
  InvalidArgumentError,
  NetworkError,
  DecodeError,
  ExchangeError,
} from './errors.js';
export * from './types/index.js';
