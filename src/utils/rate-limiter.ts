/**
 * Sliding Window Rate Limiter
 *
 * Grants at most `maxRequests` acquisitions in any rolling window of `windowMs`.
 * Used with a one-minute window for Gemini and a one-second window for Notion.
 * One instance is shared by every caller of a given service.
 *
 * acquire() never fails: when the ceiling is reached it waits until the oldest
 * grant leaves the window. Each wait is bounded by `windowMs`.
 */

export interface RateLimiterOptions {
  maxRequests: number;
  windowMs: number;
  /** Label used in log lines */
  name?: string;
  /** Replaceable for tests */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface RateLimiterStatus {
  requestsRemaining: number;
  resetInMs: number;
}

export class SlidingWindowRateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;
  private readonly name: string;
  private readonly now: () => number;
  private readonly sleepFn: (ms: number) => Promise<void>;

  /** Grant timestamps inside the current window, oldest first */
  private grants: number[] = [];

  /**
   * Mutex queue to serialize acquire() calls.
   * Prevents concurrent callers from all passing the ceiling check
   * before any of them records its grant.
   */
  private acquireQueue: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.maxRequests) || options.maxRequests < 1) {
      throw new Error(`maxRequests must be a positive integer, got ${options.maxRequests}`);
    }
    if (!(options.windowMs > 0)) {
      throw new Error(`windowMs must be positive, got ${options.windowMs}`);
    }
    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowMs;
    this.name = options.name ?? 'RateLimiter';
    this.now = options.now ?? Date.now;
    this.sleepFn =
      options.sleep ?? ((ms: number) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * Wait for a slot and record the grant.
   */
  async acquire(): Promise<void> {
    const prev = this.acquireQueue;
    let release!: () => void;
    this.acquireQueue = new Promise<void>((r) => {
      release = r;
    });

    try {
      await prev;
      await this.doAcquire();
    } finally {
      release();
    }
  }

  /**
   * Must only be called from the serialized queue.
   */
  private async doAcquire(): Promise<void> {
    for (;;) {
      const now = this.now();
      this.evict(now);

      if (this.grants.length < this.maxRequests) {
        this.grants.push(now);
        return;
      }

      const waitMs = this.grants[0] + this.windowMs - now;
      console.error(`[${this.name}] Rate limit reached (${this.maxRequests}/${this.windowMs}ms), waiting ${waitMs}ms`);
      await this.sleepFn(waitMs);
    }
  }

  /** Drop grants that are no longer inside (now - windowMs, now] */
  private evict(now: number): void {
    const cutoff = now - this.windowMs;
    while (this.grants.length > 0 && this.grants[0] <= cutoff) {
      this.grants.shift();
    }
  }

  getStatus(): RateLimiterStatus {
    const now = this.now();
    this.evict(now);
    return {
      requestsRemaining: Math.max(0, this.maxRequests - this.grants.length),
      resetInMs: this.grants.length > 0 ? this.grants[0] + this.windowMs - now : 0,
    };
  }
}
