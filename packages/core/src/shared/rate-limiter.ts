// ============================================================
// Token bucket rate limiting
// One bucket per API surface (REST calls, connection attempts).
// Callers await consume(); exhaustion blocks, it never throws.
// ============================================================

import { createLogger } from './logger.js';

const logger = createLogger('RateLimiter');

export interface TokenBucketConfig {
  /** Bucket name used in logs */
  name: string;
  /** Maximum tokens held */
  capacity: number;
  /** Tokens added per elapsed interval (defaults to capacity) */
  refillAmount?: number;
  refillIntervalMs: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class TokenBucket {
  readonly name: string;
  private readonly capacity: number;
  private readonly refillAmount: number;
  private readonly refillIntervalMs: number;
  private tokens: number;
  private lastRefill: number;
  // Waiters are served in arrival order
  private tail: Promise<void> = Promise.resolve();

  constructor(config: TokenBucketConfig) {
    if (config.capacity <= 0 || config.refillIntervalMs <= 0) {
      throw new RangeError(`TokenBucket ${config.name}: capacity and refill interval must be positive`);
    }
    this.name = config.name;
    this.capacity = config.capacity;
    this.refillAmount = config.refillAmount ?? config.capacity;
    this.refillIntervalMs = config.refillIntervalMs;
    this.tokens = config.capacity;
    this.lastRefill = Date.now();
  }

  get available(): number {
    this.refill();
    return this.tokens;
  }

  /**
   * Take tokens if they are available right now.
   */
  tryConsume(tokens = 1): boolean {
    this.assertSatisfiable(tokens);
    this.refill();
    if (this.tokens >= tokens) {
      this.tokens -= tokens;
      return true;
    }
    return false;
  }

  /**
   * Take tokens, waiting for refills when the bucket is empty.
   */
  consume(tokens = 1): Promise<void> {
    this.assertSatisfiable(tokens);
    const turn = this.tail.then(() => this.waitFor(tokens));
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  /**
   * Milliseconds until the requested tokens can be taken (0 = now).
   */
  msUntilAvailable(tokens = 1): number {
    this.refill();
    if (this.tokens >= tokens) {
      return 0;
    }
    const intervals = Math.ceil((tokens - this.tokens) / this.refillAmount);
    return Math.max(1, this.lastRefill + intervals * this.refillIntervalMs - Date.now());
  }

  private async waitFor(tokens: number): Promise<void> {
    while (!this.tryConsume(tokens)) {
      const delay = this.msUntilAvailable(tokens);
      logger.debug({ bucket: this.name, delay_ms: delay }, 'Rate limit reached, waiting for refill');
      await sleep(delay);
    }
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = now - this.lastRefill;
    if (elapsed < this.refillIntervalMs) {
      return;
    }
    const intervals = Math.floor(elapsed / this.refillIntervalMs);
    this.tokens = Math.min(this.capacity, this.tokens + intervals * this.refillAmount);
    this.lastRefill += intervals * this.refillIntervalMs;
  }

  private assertSatisfiable(tokens: number): void {
    if (tokens > this.capacity) {
      throw new RangeError(`TokenBucket ${this.name}: ${tokens} tokens exceed capacity ${this.capacity}`);
    }
  }
}
