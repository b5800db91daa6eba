import { DecodeError, ExchangeError } from '../../errors.js';

interface ErrorIndicator {
  code?: string;
  message: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
  const v = obj[key];
  return typeof v === 'string' ? v : undefined;
}

/**
 * payload의 error 필드 해석. 비어 있지 않은 문자열이나 객체만 에러로 본다.
 *   { error: "insufficient funds" }
 *   { error: { code | name, message } }
 */
function readErrorField(payload: unknown): ErrorIndicator | undefined {
  if (!isRecord(payload)) return undefined;
  const err = payload['error'];
  if (typeof err === 'string') {
    return err.trim() ? { code: stringField(payload, 'code'), message: err } : undefined;
  }
  if (isRecord(err)) {
    const code = stringField(err, 'code') ?? stringField(err, 'name');
    const message = stringField(err, 'message') ?? code ?? JSON.stringify(err);
    return { code, message };
  }
  // null, false, 0 등은 에러 표시가 아니다
  return undefined;
}

/** non-2xx 응답의 에러 정보 — error 필드, 없으면 { code, message } */
function readFailure(status: number, payload: unknown): ErrorIndicator {
  const fromField = readErrorField(payload);
  if (fromField) return fromField;
  if (isRecord(payload)) {
    const message = stringField(payload, 'message');
    if (message) return { code: stringField(payload, 'code'), message };
  }
  return { message: `HTTP ${status}` };
}

/**
 * 응답 본문 → JSON.
 * 2xx + 빈 본문은 {}. 2xx + 파싱 실패는 DecodeError.
 * non-2xx 이거나 error 필드가 있으면 ExchangeError.
 */
export function decodeResponse(statusCode: number, rawBody: string): unknown {
  const ok = statusCode >= 200 && statusCode < 300;

  let payload: unknown;
  if (rawBody.trim() === '') {
    payload = ok ? {} : undefined;
  } else {
    try {
      payload = JSON.parse(rawBody);
    } catch {
      if (!ok) {
        throw new ExchangeError(statusCode, `HTTP ${statusCode}`, undefined, rawBody);
      }
      throw new DecodeError('Namebase response is not valid JSON', rawBody);
    }
  }

  if (!ok) {
    const failure = readFailure(statusCode, payload);
    throw new ExchangeError(statusCode, failure.message, failure.code, payload);
  }

  const indicator = readErrorField(payload);
  if (indicator) {
    throw new ExchangeError(statusCode, indicator.message, indicator.code, payload);
  }
  return payload;
}
