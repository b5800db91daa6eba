import { createHmac } from 'node:crypto';
import { InvalidCredentialsError } from '../../errors.js';

export interface Credentials {
  readonly accessKey: string;
  readonly secretKey: string;
}

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

/**
 * 키 형식 검증. access key의 ':'는 Basic 자격 증명을 깨뜨리므로 거부.
 */
export function assertCredentials(credentials: Credentials): void {
  const { accessKey, secretKey } = credentials;
  if (!accessKey.trim() || !secretKey.trim()) {
    throw new InvalidCredentialsError('Namebase API keys not configured');
  }
  if (accessKey.includes(':')) {
    throw new InvalidCredentialsError('Namebase access key must not contain ":"');
  }
  if (CONTROL_CHARS.test(accessKey) || CONTROL_CHARS.test(secretKey)) {
    throw new InvalidCredentialsError('Namebase API keys contain control characters');
  }
}

/** base64("accessKey:secretKey") — 거래소가 검증하는 Basic 자격 증명 */
export function encodeCredentials(accessKey: string, secretKey: string): string {
  return Buffer.from(`${accessKey}:${secretKey}`, 'utf8').toString('base64');
}

/**
 * HMAC-SHA256(secret, timestamp + METHOD + path + body) → 소문자 hex.
 * path는 쿼리 포함 전송 그대로, body는 전송 JSON (없으면 '').
 * 같은 입력이면 항상 같은 서명. 요청 헤더에는 쓰이지 않는다.
 */
export function signRequest(
  secretKey: string,
  timestamp: number,
  method: string,
  path: string,
  body: string,
): string {
  if (!secretKey.trim()) {
    throw new InvalidCredentialsError('Namebase secret key not configured');
  }
  const message = `${timestamp}${method.toUpperCase()}${path}${body}`;
  return createHmac('sha256', secretKey).update(message).digest('hex');
}

/** 요청별 인증 헤더. 거래소는 Basic 자격 증명만 받는다 */
export function createAuthHeaders(credentials: Credentials): Record<string, string> {
  assertCredentials(credentials);
  return {
    Authorization: `Basic ${encodeCredentials(credentials.accessKey, credentials.secretKey)}`,
  };
}
