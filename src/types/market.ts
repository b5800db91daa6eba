/** 거래 페어 — 현재 HNS/BTC 하나 */
export const SYMBOLS = ['HNSBTC'] as const;
export type TradingSymbol = (typeof SYMBOLS)[number];

export const ASSETS = ['HNS', 'BTC'] as const;
export type Asset = (typeof ASSETS)[number];

/** 캔들 간격 */
export const INTERVALS = ['1m', '5m', '15m', '1h', '4h', '12h', '1d', '1w'] as const;
export type Interval = (typeof INTERVALS)[number];

/** WebSocket 연결 상태 */
export type WsState = 'CONNECTING' | 'CONNECTED' | 'RECONNECTING' | 'CLOSED';

/** 스트림 경로 (wss 베이스 뒤에 붙음) */
export type StreamEndpoint =
  | '/ws/v0/stream/trades'
  | `/ws/v0/ticker/kline_${Interval}`
  | '/ws/v0/ticker/day'
  | '/ws/v0/ticker/depth';
