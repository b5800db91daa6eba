/**
 * 라이브러리 에러 계층. 모든 에러는 호출자에게 그대로 전파되며
 * 재시도나 복구는 하지 않는다.
 */
export class NamebaseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NamebaseError';
  }
}

/** access/secret key 누락 또는 형식 오류 */
export class InvalidCredentialsError extends NamebaseError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCredentialsError';
  }
}

/** 심볼/수량/가격 등 인자 검증 실패 — 네트워크 호출 전에 발생 */
export class InvalidArgumentError extends NamebaseError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/** 연결 실패, 타임아웃 */
export class NetworkError extends NamebaseError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'NetworkError';
  }
}

/** 응답 본문이 JSON이 아니거나 기대한 형태가 아님 */
export class DecodeError extends NamebaseError {
  constructor(
    message: string,
    public readonly rawBody: string,
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

/** 거래소가 돌려준 에러 응답 (non-2xx 또는 error 필드) */
export class ExchangeError extends NamebaseError {
  constructor(
    public readonly status: number,
    message: string,
    public readonly code: string | undefined,
    public readonly payload: unknown,
  ) {
    super(message);
    this.name = 'ExchangeError';
  }
}
