import WebSocket from 'ws';
import { EventEmitter } from 'node:events';
import { createChildLogger } from '../logger.js';
import { config } from '../config.js';
import type { StreamEndpoint, WsState } from '../types/index.js';

const log = createChildLogger('ws');

interface WsClientEvents {
  message: [unknown];
  raw: [string];
  stateChange: [WsState];
  error: [Error];
}

export interface WsClientOptions {
  /** 기본: config.namebase.wsUrl */
  baseUrl?: string;
  /** 끊기면 지수 백오프로 재연결. 기본 false */
  reconnect?: boolean;
  /** 재연결 지연: baseMs * 2^attempt, 최대 maxMs */
  backoff?: { baseMs?: number; maxMs?: number };
  /** 연속 재연결 실패 한도. 넘으면 CLOSED. 기본 무제한 */
  maxReconnectAttempts?: number;
  /** ping 주기. 0이면 heartbeat 없음 */
  heartbeatIntervalMs?: number;
}

/** attempt번째(0부터) 재연결 지연 */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(baseMs * 2 ** attempt, maxMs);
}

/**
 * Namebase 마켓 데이터 스트림 클라이언트
 * wss://app.namebase.io:443 + 스트림 경로
 *
 *   /ws/v0/stream/trades       체결
 *   /ws/v0/ticker/kline_<int>  캔들
 *   /ws/v0/ticker/day          24시간 통계
 *   /ws/v0/ticker/depth        호가
 *
 * 구독 메시지 없이 경로만으로 스트림이 선택된다. 수신한 JSON은 그대로 'message'로 전달.
 */
export class NamebaseWsClient extends EventEmitter<WsClientEvents> {
  private ws: WebSocket | null = null;
  private state: WsState = 'CLOSED';
  private reconnectAttempts = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private awaitingPong = false;
  private destroyed = false;

  private readonly url: string;
  private readonly reconnect: boolean;
  private readonly backoffBaseMs: number;
  private readonly backoffMaxMs: number;
  private readonly maxReconnectAttempts: number;
  private readonly heartbeatIntervalMs: number;

  constructor(
    readonly endpoint: StreamEndpoint,
    options: WsClientOptions = {},
  ) {
    super();
    const base = (options.baseUrl ?? config.namebase.wsUrl).replace(/\/+$/, '');
    this.url = base + endpoint;
    this.reconnect = options.reconnect ?? false;
    this.backoffBaseMs = options.backoff?.baseMs ?? 1_000;
    this.backoffMaxMs = options.backoff?.maxMs ?? 60_000;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? Number.POSITIVE_INFINITY;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30_000;
  }

  connect(): void {
    if (this.destroyed) return;
    this.setState('CONNECTING');

    this.ws = new WebSocket(this.url);

    this.ws.on('open', () => {
      log.info({ endpoint: this.endpoint }, 'WebSocket connected');
      this.setState('CONNECTED');
      this.reconnectAttempts = 0;
      this.startHeartbeat();
    });

    this.ws.on('message', (raw: WebSocket.Data) => {
      this.handleMessage(raw.toString());
    });

    this.ws.on('pong', () => {
      this.awaitingPong = false;
    });

    this.ws.on('close', (code, reason) => {
      log.warn({ code, reason: reason.toString() }, 'WebSocket closed');
      this.cleanup();
      this.ws = null;
      if (this.destroyed || !this.reconnect) {
        this.setState('CLOSED');
      } else if (this.reconnectAttempts >= this.maxReconnectAttempts) {
        log.error({ attempts: this.reconnectAttempts }, 'Reconnect attempts exhausted');
        this.setState('CLOSED');
        this.emit('error', new Error(`Stream reconnect failed after ${this.reconnectAttempts} attempts`));
      } else {
        this.scheduleReconnect();
      }
    });

    this.ws.on('error', (err) => {
      log.error({ err }, 'WebSocket error');
      this.emit('error', err);
    });
  }

  destroy(): void {
    this.destroyed = true;
    this.cleanup();
    if (this.ws) {
      this.ws.close(1000, 'Client shutdown');
      this.ws = null;
    }
    this.setState('CLOSED');
  }

  getState(): WsState {
    return this.state;
  }

  getUrl(): string {
    return this.url;
  }

  // ── 메시지 핸들링 ──────────────────────────────────────────────
  private handleMessage(raw: string): void {
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (err) {
      log.warn({ err, length: raw.length }, 'Non-JSON WS message');
      this.emit('raw', raw);
      return;
    }
    this.emit('message', payload);
  }

  // ── Heartbeat: 이전 ping의 pong이 없으면 연결을 끊는다 ────────
  private startHeartbeat(): void {
    this.stopHeartbeat();
    if (this.heartbeatIntervalMs <= 0) return;
    this.awaitingPong = false;
    this.heartbeatTimer = setInterval(() => this.beat(), this.heartbeatIntervalMs);
  }

  private beat(): void {
    const ws = this.ws;
    if (!ws) return;
    if (this.awaitingPong) {
      log.warn({ endpoint: this.endpoint }, 'Stream heartbeat missed, terminating');
      this.emit('error', new Error('Stream heartbeat timed out'));
      ws.terminate();
      return;
    }
    this.awaitingPong = true;
    ws.ping();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  // ── 재연결 (reconnect: true 일 때만) ───────────────────────────
  private scheduleReconnect(): void {
    this.setState('RECONNECTING');
    const delay = backoffDelay(this.reconnectAttempts, this.backoffBaseMs, this.backoffMaxMs);
    this.reconnectAttempts++;
    log.info({ delay, attempt: this.reconnectAttempts }, 'Scheduling reconnect');

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  private cleanup(): void {
    this.stopHeartbeat();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private setState(state: WsState): void {
    if (this.state !== state) {
      this.state = state;
      this.emit('stateChange', state);
    }
  }
}
