export type Clock = () => number;
export type RandomSource = () => number;

type TokenBucketOptions = {
  tokensPerSecond: number;
  capacity: number;
  clock?: Clock;
};

/**
 * Steady-state politeness. Tokens refill continuously at `tokensPerSecond`
 * up to `capacity`; each request takes one.
 */
export class TokenBucket {
  readonly tokensPerSecond: number;
  readonly capacity: number;
  private tokens: number;
  private lastRefill: number;
  private clock: Clock;

  constructor(opts: TokenBucketOptions) {
    this.tokensPerSecond = opts.tokensPerSecond;
    this.capacity = Math.max(1, opts.capacity);
    this.clock = opts.clock ?? Date.now;
    this.tokens = this.capacity;
    this.lastRefill = this.clock();
  }

  get available(): number {
    return this.tokens;
  }

  /** Takes a token if one is there. Returns 0, or the ms until one will be. The balance never goes below zero. */
  consume(): number {
    const now = this.clock();
    const elapsedSec = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSec * this.tokensPerSecond);
    this.lastRefill = now;

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return 0;
    }
    return ((1 - this.tokens) / this.tokensPerSecond) * 1000;
  }
}

export function withJitter(delayMs: number, factor: number, random: RandomSource = Math.random): number {
  const jitter = delayMs * factor * (2 * random() - 1);
  return Math.max(0, delayMs + jitter);
}

export type ThrottleOptions = {
  tokensPerSecond?: number;
  capacity?: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  jitter?: number;
  clock?: Clock;
  random?: RandomSource;
};

export type ThrottleMode = 'normal' | 'cooloff';

const RATE_LIMIT_MULTIPLIER = 2;
const UNAVAILABLE_MULTIPLIER = 1.5;
const RECOVERY_FACTOR = 0.9;

/**
 * Token bucket with a cool-off state on top. While cooling off every
 * acquire() waits out the remaining cool-off; once it expires the backoff
 * resets and the bucket governs again.
 */
export class AdaptiveThrottler {
  private bucket: TokenBucket;
  private clock: Clock;
  private random: RandomSource;
  private jitter: number;
  readonly initialBackoffMs: number;
  readonly maxBackoffMs: number;
  private backoffMs: number;
  private cooloffUntil = 0;
  private cooling = false;

  constructor(opts: ThrottleOptions = {}) {
    this.clock = opts.clock ?? Date.now;
    this.random = opts.random ?? Math.random;
    this.jitter = opts.jitter ?? 0.1;
    this.bucket = new TokenBucket({
      tokensPerSecond: opts.tokensPerSecond ?? 0.67,
      capacity: opts.capacity ?? 8,
      clock: this.clock
    });
    this.initialBackoffMs = opts.initialBackoffMs ?? 2000;
    this.maxBackoffMs = Math.max(this.initialBackoffMs, opts.maxBackoffMs ?? 60000);
    this.backoffMs = this.initialBackoffMs;
  }

  get mode(): ThrottleMode {
    return this.inCooloff() ? 'cooloff' : 'normal';
  }

  get currentBackoffMs(): number {
    return this.backoffMs;
  }

  get tokens(): number {
    return this.bucket.available;
  }

  /** Milliseconds the caller should wait before sending its request. */
  acquire(): number {
    if (this.cooling) {
      const now = this.clock();
      if (now < this.cooloffUntil) return this.cooloffUntil - now;
      this.cooling = false;
      this.backoffMs = this.initialBackoffMs;
    }
    return withJitter(this.bucket.consume(), this.jitter, this.random);
  }

  reportRateLimit() {
    this.enterCooloff(RATE_LIMIT_MULTIPLIER);
  }

  reportServiceUnavailable() {
    this.enterCooloff(UNAVAILABLE_MULTIPLIER);
  }

  /**
   * Shrinks the escalated backoff. Successes that land while a cool-off is
   * still running leave it alone.
   */
  reportSuccess() {
    if (!this.inCooloff() && this.backoffMs > this.initialBackoffMs) {
      this.backoffMs = Math.max(this.initialBackoffMs, this.backoffMs * RECOVERY_FACTOR);
    }
  }

  private inCooloff(): boolean {
    return this.cooling && this.clock() < this.cooloffUntil;
  }

  private enterCooloff(multiplier: number) {
    this.cooling = true;
    this.cooloffUntil = this.clock() + this.backoffMs;
    this.backoffMs = Math.min(this.maxBackoffMs, this.backoffMs * multiplier);
  }
}
