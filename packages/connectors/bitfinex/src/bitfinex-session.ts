// ============================================================
// BitfinexSession: the authenticated streaming connection
// DISCONNECTED -> CONNECTING -> CONNECTED -> AUTHENTICATED
// Carries order commands out and account events in; reconnects
// with exponential backoff, bounded by the connection bucket.
// ============================================================

import { EventEmitter } from 'events';
import WebSocket from 'ws';
import { createLogger, sanitizeUrl, SessionError, type TokenBucket } from '@cryptobridge/core';
import { buildWsAuthPayload, defaultNonce, type NonceGenerator } from './bitfinex-auth.js';
import { decodeFrame, encodeOrderCommand, type StreamEvent } from './bitfinex-messages.js';
import type { OrderCommandCode, OrderCommandPayloads } from './types.js';

const logger = createLogger('BitfinexSession');

export type SessionState = 'DISCONNECTED' | 'CONNECTING' | 'CONNECTED' | 'AUTHENTICATED';

export interface SessionDisconnect {
  reason: string;
  /** true when disconnect() was called, false for transport or auth failures */
  explicit: boolean;
}

export interface BitfinexSessionConfig {
  wsUrl: string;
  apiKey: string;
  apiSecret: string;
  /** Handshake bucket; one token per connection attempt */
  connectRateLimiter: TokenBucket;
  authTimeoutMs: number;
  /** Drop the connection when nothing arrives for this long */
  staleTimeoutMs?: number;
  nonce?: NonceGenerator;
}

interface PendingConnect {
  promise: Promise<void>;
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Events:
 * - 'authenticated': () - auth acknowledged, order commands accepted
 * - 'event': (StreamEvent) - decoded account event, in arrival order
 * - 'disconnected': (SessionDisconnect)
 * - 'auth_failed': (string) - venue refused the credentials
 */
export class BitfinexSession extends EventEmitter {
  private ws: WebSocket | null = null;
  private readonly config: BitfinexSessionConfig;
  private readonly nonce: NonceGenerator;
  private _state: SessionState = 'DISCONNECTED';
  private authTimeout: NodeJS.Timeout | null = null;
  private staleTimeout: NodeJS.Timeout | null = null;
  private reconnectTimeout: NodeJS.Timeout | null = null;
  private reconnectDelay = 1000; // Start at 1s
  private readonly maxReconnectDelay = 60000; // Max 60s
  private readonly staleTimeoutMs: number;
  private shouldReconnect = false;
  private pendingConnect: PendingConnect | null = null;

  constructor(config: BitfinexSessionConfig) {
    super();
    this.config = config;
    this.nonce = config.nonce ?? defaultNonce;
    this.staleTimeoutMs = config.staleTimeoutMs ?? 60_000;
  }

  get state(): SessionState {
    return this._state;
  }

  get isAuthenticated(): boolean {
    return this._state === 'AUTHENTICATED';
  }

  /**
   * Open and authenticate the connection. Resolves once authenticated;
   * rejects on the first failed attempt, while reconnection continues
   * in the background until disconnect() is called.
   */
  connect(): Promise<void> {
    if (this._state === 'AUTHENTICATED') {
      return Promise.resolve();
    }

    this.shouldReconnect = true;
    if (this.pendingConnect) {
      return this.pendingConnect.promise;
    }

    let resolveConnect: () => void = () => undefined;
    let rejectConnect: (error: Error) => void = () => undefined;
    const promise = new Promise<void>((resolve, reject) => {
      resolveConnect = resolve;
      rejectConnect = reject;
    });
    this.pendingConnect = { promise, resolve: resolveConnect, reject: rejectConnect };

    if (this._state === 'DISCONNECTED') {
      this.clearReconnectTimeout();
      this.startAttempt();
    }
    return promise;
  }

  /**
   * Close the connection and stop reconnection attempts.
   */
  disconnect(): void {
    logger.info('Disconnecting from Bitfinex stream');
    this.shouldReconnect = false;
    this.clearReconnectTimeout();
    this.teardown({ reason: 'disconnect requested', explicit: true });
    this.settleConnect(new SessionError('Session disconnected before authentication', 'bitfinex'));
  }

  /**
   * Force the transport closed and reconnect, e.g. after an order
   * acknowledgement timed out.
   */
  drop(reason: string): void {
    if (this._state === 'DISCONNECTED') {
      return;
    }
    logger.warn({ reason }, 'Dropping stream connection');
    this.handleFailure(reason);
  }

  /**
   * Send an order command on the authenticated channel.
   * Returns false when the session cannot carry it.
   */
  sendOrderCommand<C extends OrderCommandCode>(code: C, payload: OrderCommandPayloads[C]): boolean {
    if (this._state !== 'AUTHENTICATED') {
      logger.warn({ state: this._state, command: code }, 'Cannot send order command: not authenticated');
      return false;
    }

    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      logger.warn({ command: code }, 'Cannot send order command: WebSocket not open');
      return false;
    }

    this.ws.send(encodeOrderCommand(code, payload));
    logger.debug({ command: code }, 'Sent order command');
    return true;
  }

  private startAttempt(): void {
    this.open().catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error({ err: reason }, 'Connection attempt failed');
      this.handleFailure(reason);
    });
  }

  private async open(): Promise<void> {
    this._state = 'CONNECTING';

    await this.config.connectRateLimiter.consume();
    if (!this.shouldReconnect || this._state !== 'CONNECTING') {
      return;
    }

    logger.info({ url: sanitizeUrl(this.config.wsUrl) }, 'Connecting to Bitfinex stream');
    // The auth timer only runs after open
    const ws = new WebSocket(this.config.wsUrl, { handshakeTimeout: this.config.authTimeoutMs });
    this.ws = ws;

    ws.on('open', () => {
      logger.info('WebSocket connection opened');
      this._state = 'CONNECTED';
      this.touch();
      this.authenticate();
    });

    ws.on('message', (data: WebSocket.Data) => {
      this.handleMessage(data.toString());
    });

    ws.on('close', (code: number, reason: Buffer) => {
      logger.info({ code, reason: reason.toString() }, 'WebSocket closed');
      this.handleFailure(`connection closed (${code})`);
    });

    ws.on('error', (err: Error) => {
      logger.error({ err }, 'WebSocket error');
      this.handleFailure(err.message);
    });
  }

  private authenticate(): void {
    if (!this.ws) {
      return;
    }

    const payload = buildWsAuthPayload(this.config.apiKey, this.config.apiSecret, this.nonce.next());
    this.ws.send(JSON.stringify(payload));

    this.authTimeout = setTimeout(() => {
      this.authTimeout = null;
      logger.error({ timeout_ms: this.config.authTimeoutMs }, 'Authentication timed out');
      this.handleFailure('authentication timeout');
    }, this.config.authTimeoutMs);
  }

  private handleMessage(raw: string): void {
    this.touch();

    const event = decodeFrame(raw);
    if (!event) {
      logger.warn({ frame: raw.slice(0, 200) }, 'Dropping undecodable frame');
      return;
    }

    if (event.kind === 'auth') {
      this.handleAuth(event);
      return;
    }

    if (event.kind === 'info' && event.code !== undefined) {
      // 20051: venue asks clients to reconnect
      logger.info({ code: event.code, msg: event.message }, 'Venue info event');
      if (event.code === 20051) {
        this.handleFailure('venue requested reconnect');
        return;
      }
    }

    this.emit('event', event);
  }

  private handleAuth(event: Extract<StreamEvent, { kind: 'auth' }>): void {
    this.clearAuthTimeout();

    if (!event.ok) {
      const message = event.message ?? 'authentication refused';
      logger.error({ code: event.code, msg: message }, 'Authentication failed');
      this.emit('auth_failed', message);
      this.handleFailure(`authentication failed: ${message}`);
      return;
    }

    this._state = 'AUTHENTICATED';
    this.reconnectDelay = 1000; // Reset backoff on successful authentication
    logger.info('Authenticated');
    this.emit('authenticated');
    this.settleConnect();
  }

  private handleFailure(reason: string): void {
    if (this._state === 'DISCONNECTED') {
      return;
    }

    this.teardown({ reason, explicit: false });
    this.settleConnect(new SessionError(`Bitfinex session failed: ${reason}`, 'bitfinex'));

    if (this.shouldReconnect) {
      this.scheduleReconnect();
    }
  }

  private teardown(info: SessionDisconnect): void {
    this.clearAuthTimeout();
    this.clearStaleTimeout();

    const wasOpen = this._state !== 'DISCONNECTED';
    this._state = 'DISCONNECTED';

    if (this.ws) {
      this.ws.removeAllListeners();
      // Swallow late socket errors once listeners are gone
      this.ws.on('error', () => undefined);
      this.ws.close();
      this.ws = null;
    }

    if (wasOpen) {
      this.emit('disconnected', info);
    }
  }

  private settleConnect(error?: Error): void {
    const pending = this.pendingConnect;
    if (!pending) {
      return;
    }
    this.pendingConnect = null;
    if (error) {
      pending.reject(error);
    } else {
      pending.resolve();
    }
  }

  private scheduleReconnect(): void {
    this.clearReconnectTimeout();

    logger.info({ delay_ms: this.reconnectDelay }, 'Scheduling reconnection');

    this.reconnectTimeout = setTimeout(() => {
      this.reconnectTimeout = null;
      if (this.shouldReconnect && this._state === 'DISCONNECTED') {
        this.startAttempt();
      }
    }, this.reconnectDelay);

    // Exponential backoff with max cap
    this.reconnectDelay = Math.min(this.reconnectDelay * 2, this.maxReconnectDelay);
  }

  private touch(): void {
    this.clearStaleTimeout();
    this.staleTimeout = setTimeout(() => {
      this.staleTimeout = null;
      this.handleFailure('no messages received');
    }, this.staleTimeoutMs);
  }

  private clearAuthTimeout(): void {
    if (this.authTimeout) {
      clearTimeout(this.authTimeout);
      this.authTimeout = null;
    }
  }

  private clearStaleTimeout(): void {
    if (this.staleTimeout) {
      clearTimeout(this.staleTimeout);
      this.staleTimeout = null;
    }
  }

  private clearReconnectTimeout(): void {
    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }
  }
}
