import { systemClock, type Clock } from './clock.js';
import { RateLimitTimeout } from './errors.js';

export interface RateLimiter {
  acquire(signal?: AbortSignal): Promise<void>;
}

export interface TokenBucketOptions {
  /** Milliseconds to refill one token. Zero or less disables limiting. */
  intervalMs: number;
  burst?: number;
  maxWaitMs?: number;
  clock?: Clock;
}

/**
 * Process-wide token bucket. Callers that find the bucket empty reserve the
 * next token by driving the balance negative; each reservation waits for the
 * refill time of every reservation queued ahead of it, so concurrent callers
 * are released one interval apart in arrival order.
 */
export class TokenBucket implements RateLimiter {
  private readonly intervalMs: number;
  private readonly capacity: number;
  private readonly maxWaitMs: number;
  private readonly clock: Clock;
  private tokens: number;
  private lastRefill: number;

  constructor(options: TokenBucketOptions) {
    this.intervalMs = options.intervalMs;
    this.capacity = Math.max(1, Math.floor(options.burst ?? 1));
    this.maxWaitMs = options.maxWaitMs ?? Number.POSITIVE_INFINITY;
    this.clock = options.clock ?? systemClock;
    this.tokens = this.capacity;
    this.lastRefill = this.clock.now();
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (this.intervalMs <= 0) {
      return;
    }

    this.refill();
    this.tokens -= 1;
    if (this.tokens >= 0) {
      return;
    }

    const waitMs = Math.ceil(-this.tokens * this.intervalMs);
    if (waitMs > this.maxWaitMs) {
      this.tokens += 1;
      throw new RateLimitTimeout(waitMs, this.maxWaitMs);
    }

    try {
      await this.clock.sleep(waitMs, signal);
    } catch (error) {
      this.tokens += 1;
      throw error;
    }
  }

  /** Tokens currently available; negative while reservations are queued. */
  available(): number {
    if (this.intervalMs <= 0) {
      return this.capacity;
    }
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + elapsed / this.intervalMs);
      this.lastRefill = now;
    }
  }
}
