import { request as undiciRequest, type Dispatcher } from 'undici';
import { NetworkError } from '../../errors.js';
import { createChildLogger } from '../../logger.js';

const log = createChildLogger('namebase-transport');

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface TransportRequest {
  readonly method: HttpMethod;
  /** 쿼리 포함 전체 URL */
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body?: string;
  readonly timeoutMs: number;
}

export interface TransportResponse {
  readonly statusCode: number;
  readonly body: string;
}

/**
 * HTTP 한 번 왕복. 재시도 없음 — 실패는 NetworkError로 그대로 올린다.
 */
export interface Transport {
  request(req: TransportRequest): Promise<TransportResponse>;
}

const TIMEOUT_CODES = new Set([
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function isTimeout(err: unknown): boolean {
  if (err instanceof Error && err.name === 'TimeoutError') return true;
  const code = errorCode(err);
  return code !== undefined && TIMEOUT_CODES.has(code);
}

export class UndiciTransport implements Transport {
  private readonly dispatcher: Dispatcher | undefined;

  /** dispatcher 미지정 시 undici 전역 Agent 사용 */
  constructor(options: { dispatcher?: Dispatcher } = {}) {
    this.dispatcher = options.dispatcher;
  }

  async request(req: TransportRequest): Promise<TransportResponse> {
    try {
      const res = await undiciRequest(req.url, {
        method: req.method,
        headers: req.headers,
        body: req.body,
        bodyTimeout: req.timeoutMs,
        headersTimeout: req.timeoutMs,
        dispatcher: this.dispatcher,
      });
      const body = await res.body.text();
      return { statusCode: res.statusCode, body };
    } catch (err) {
      if (isTimeout(err)) {
        log.warn({ method: req.method, timeoutMs: req.timeoutMs }, 'Request timed out');
        throw new NetworkError(`Namebase request timed out after ${req.timeoutMs}ms`, err);
      }
      const reason = err instanceof Error ? err.message : String(err);
      log.warn({ method: req.method, err }, 'Request failed');
      throw new NetworkError(`Namebase request failed: ${reason}`, err);
    }
  }
}
