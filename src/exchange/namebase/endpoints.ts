/**
 * Namebase Exchange REST / WebSocket 경로 — 단일 정의.
 * 코드 어디에서도 문자열 경로를 직접 쓰지 않고 이 상수만 사용한다.
 */

import type { Interval, StreamEndpoint } from '../../types/index.js';

export const NAMEBASE_API_ROOT = 'https://www.namebase.io/api';
export const NAMEBASE_API_VERSION = '/v0';
export const NAMEBASE_WS_BASE = 'wss://app.namebase.io:443';

// ─── MARKET DATA ─────────────────────────────────────────────────────────

/** GET 거래 규칙 및 심볼 정보 (연결 확인용) */
export const PUBLIC_INFO = '/info';

/** GET 호가 깊이 */
export const PUBLIC_DEPTH = '/depth';

/** GET 캔들 */
export const PUBLIC_KLINES = '/ticker/klines';

/** GET 24시간 롤링 통계 */
export const PUBLIC_TICKER_DAY = '/ticker/day';

/** GET 최근 체결가 */
export const PUBLIC_TICKER_PRICE = '/ticker/price';

/** GET 최우선 호가 */
export const PUBLIC_TICKER_BOOK = '/ticker/book';

/** GET 유통량 */
export const PUBLIC_TICKER_SUPPLY = '/ticker/supply';

// ─── TRADE ───────────────────────────────────────────────────────────────

/** GET 과거 체결 */
export const PRIVATE_TRADES = '/trade';

/** GET 계정 체결 */
export const PRIVATE_TRADES_ACCOUNT = '/trade/account';

/** GET 주문별 체결 */
export const PRIVATE_TRADES_ORDER = '/trade/order';

/** POST 주문 / GET 조회 / DELETE 취소 — 같은 경로 */
export const PRIVATE_ORDER = '/order';

/** GET 미체결 주문 */
export const PRIVATE_ORDERS_OPEN = '/order/open';

/** GET 전체 주문 */
export const PRIVATE_ORDERS_ALL = '/order/all';

// ─── ACCOUNT ─────────────────────────────────────────────────────────────

/** GET 계정 정보(잔고 포함) */
export const PRIVATE_ACCOUNT = '/account';

/** GET 출금 한도 */
export const PRIVATE_ACCOUNT_LIMITS = '/account/limits';

/** POST 입금 주소 생성 */
export const PRIVATE_DEPOSIT_ADDRESS = '/deposit/address';

/** GET 입금 내역 */
export const PRIVATE_DEPOSIT_HISTORY = '/deposit/history';

/** POST 출금 */
export const PRIVATE_WITHDRAW = '/withdraw';

/** GET 출금 내역 */
export const PRIVATE_WITHDRAW_HISTORY = '/withdraw/history';

// ─── STREAM ──────────────────────────────────────────────────────────────

export const STREAM_TRADES: StreamEndpoint = '/ws/v0/stream/trades';
export const STREAM_TICKER_DAY: StreamEndpoint = '/ws/v0/ticker/day';
export const STREAM_DEPTH: StreamEndpoint = '/ws/v0/ticker/depth';

export function streamKlines(interval: Interval): StreamEndpoint {
  return `/ws/v0/ticker/kline_${interval}`;
}
