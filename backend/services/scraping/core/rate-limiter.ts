import { log } from "backend/utils/log";

// =====================================================
// TOKEN BUCKET RATE LIMITER
// =====================================================

export interface RateLimitOptions {
  requestsPerMinute: number;
  burst?: number;          // Bucket capacity, defaults to a tenth of the per-minute budget
  identifier?: string;     // Used in log lines only
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RateLimiterStats {
  identifier: string;
  requestsPerMinute: number;
  capacity: number;
  availableTokens: number;
  totalWaits: number;
  totalWaitMs: number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Per-source token bucket. Tokens refill continuously at
 * requestsPerMinute / 60 per second up to the bucket capacity.
 */
export class TokenBucketRateLimiter {
  private readonly capacity: number;
  private readonly refillPerMs: number;
  private readonly identifier: string;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private tokens: number;
  private lastRefill: number;
  private totalWaits = 0;
  private totalWaitMs = 0;

  // Callers wait in turn so tokens go out in request order
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RateLimitOptions) {
    if (!Number.isFinite(options.requestsPerMinute) || options.requestsPerMinute <= 0) {
      throw new RangeError(`requestsPerMinute must be positive, got ${options.requestsPerMinute}`);
    }

    this.capacity = Math.max(1, options.burst ?? Math.floor(options.requestsPerMinute / 10));
    this.refillPerMs = options.requestsPerMinute / 60000;
    this.identifier = options.identifier ?? 'default';
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;

    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  private refill() {
    const current = this.now();
    const elapsed = Math.max(0, current - this.lastRefill);
    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillPerMs);
    this.lastRefill = current;
  }

  /**
   * Milliseconds until one token is available (0 when one is ready now)
   */
  timeUntilNextToken(): number {
    this.refill();
    if (this.tokens >= 1) return 0;
    return Math.ceil((1 - this.tokens) / this.refillPerMs);
  }

  /**
   * Take a token without waiting. Returns false when the bucket is empty.
   */
  tryAcquire(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /**
   * Wait until a token is available and take it
   */
  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.takeToken());
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  private async takeToken(): Promise<void> {
    while (!this.tryAcquire()) {
      const waitMs = this.timeUntilNextToken();
      this.totalWaits++;
      this.totalWaitMs += waitMs;
      log(`Rate limit reached for ${this.identifier}. Waiting ${waitMs}ms`, "rate-limiter", 'debug');
      await this.sleep(waitMs);
    }
  }

  getStats(): RateLimiterStats {
    this.refill();
    return {
      identifier: this.identifier,
      requestsPerMinute: this.refillPerMs * 60000,
      capacity: this.capacity,
      availableTokens: Math.floor(this.tokens),
      totalWaits: this.totalWaits,
      totalWaitMs: this.totalWaitMs,
    };
  }
}
