import type { z } from 'zod';
import { config } from '../../config.js';
import { DecodeError, ExchangeError } from '../../errors.js';
import { createChildLogger } from '../../logger.js';
import { assertCredentials, createAuthHeaders, type Credentials } from './auth.js';
import { decodeResponse } from './decoder.js';
import { UndiciTransport, type HttpMethod, type Transport } from './transport.js';

const log = createChildLogger('namebase-client');

export type ParamValue = string | number | boolean | undefined;
export type Params = Record<string, ParamValue>;

export interface RequestOptions {
  /** GET 쿼리 */
  query?: Params;
  /** POST/DELETE JSON 본문 */
  body?: Params;
  /** true면 timestamp(ms) 자동 추가 */
  signed?: boolean;
}

export interface ClientOptions {
  accessKey?: string;
  secretKey?: string;
  apiRoot?: string;
  apiVersion?: string;
  timeoutMs?: number;
  transport?: Transport;
  /** 현재 시각(ms). 테스트에서 고정용 */
  now?: () => number;
}

/**
 * 인증 요청 한 건을 조립해서 보내고 응답을 디코딩한다.
 * 요청 간 상태는 자격 증명뿐이며 재시도는 하지 않는다.
 */
export class RequestClient {
  private readonly credentials: Credentials;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly transport: Transport;
  private readonly now: () => number;

  constructor(options: ClientOptions = {}) {
    this.credentials = Object.freeze({
      accessKey: options.accessKey ?? config.namebase.accessKey,
      secretKey: options.secretKey ?? config.namebase.secretKey,
    });
    assertCredentials(this.credentials);

    const apiRoot = (options.apiRoot ?? config.namebase.apiRoot).replace(/\/+$/, '');
    const apiVersion = options.apiVersion ?? config.namebase.apiVersion;
    this.baseUrl = apiRoot + apiVersion;
    this.timeoutMs = options.timeoutMs ?? config.namebase.timeoutMs;
    this.transport = options.transport ?? new UndiciTransport();
    this.now = options.now ?? Date.now;
  }

  /** 요청 → 디코딩된 JSON (검증 없음) */
  async send(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const timestamp = this.now();
    let query = options.query;
    let body = options.body;
    if (options.signed) {
      if (method === 'GET') query = { ...query, timestamp };
      else body = { ...body, timestamp };
    }

    const url = new URL(this.baseUrl + path);
    for (const [k, v] of Object.entries(query ?? {})) {
      if (v !== undefined) url.searchParams.append(k, String(v));
    }
    const bodyText = body ? JSON.stringify(stripUndefined(body)) : undefined;

    const headers: Record<string, string> = {
      ...createAuthHeaders(this.credentials),
      Accept: 'application/json',
      'Content-Type': 'application/json',
    };

    log.debug({ method, path, signed: options.signed === true }, 'Namebase request');
    const res = await this.transport.request({
      method,
      url: url.toString(),
      headers,
      body: bodyText,
      timeoutMs: this.timeoutMs,
    });

    try {
      return decodeResponse(res.statusCode, res.body);
    } catch (err) {
      if (err instanceof ExchangeError) {
        log.warn(
          { statusCode: err.status, path, code: err.code, errorMessage: err.message },
          'Namebase request rejected',
        );
      } else if (err instanceof DecodeError) {
        log.warn({ statusCode: res.statusCode, path, rawLength: err.rawBody.length }, 'Malformed response');
      }
      throw err;
    }
  }

  /** 요청 + zod 검증. 형태가 다르면 DecodeError */
  async sendValidated<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    options: RequestOptions,
    schema: S,
  ): Promise<z.output<S>> {
    const raw = await this.send(method, path, options);
    const result = schema.safeParse(raw);
    if (result.success) return result.data;
    log.warn({ path, issues: result.error.issues.length }, 'Response validation failed');
    throw new DecodeError(`Namebase response validation failed: ${result.error.message}`, JSON.stringify(raw));
  }
}

function stripUndefined(params: Params): Record<string, string | number | boolean> {
  const out: Record<string, string | number | boolean> = {};
  for (const [k, v] of Object.entries(params)) {
    if (v !== undefined) out[k] = v;
  }
  return out;
}
