/** A blocking token source gating one class of remote call */
export interface RateLimiter {
  acquire(): Promise<void>;
}

/** The two independent budgets a publish run draws from */
export interface RateLimiters {
  /** Consumed before every GitHub API call */
  api: RateLimiter;
  /** Consumed once before attempting to create a pull request */
  push: RateLimiter;
}

export interface IntervalRateLimiterOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Hands out one token per interval, first come first served.
 *
 * The first token is available immediately. Each later caller reserves the
 * slot `interval` after the previous one (or now, if that slot has passed)
 * and sleeps until it. Slots are reserved synchronously, so concurrent
 * callers queue up without a lock and no timer outlives a pending acquire.
 */
export class IntervalRateLimiter implements RateLimiter {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastSlot: number | null = null;

  constructor(intervalMs: number, options: IntervalRateLimiterOptions = {}) {
    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw new RangeError(`Rate limit interval must be a non-negative number, got ${intervalMs}`);
    }
    this.intervalMs = intervalMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async acquire(): Promise<void> {
    const now = this.now();
    const slot = this.lastSlot === null ? now : Math.max(now, this.lastSlot + this.intervalMs);
    this.lastSlot = slot;

    const wait = slot - now;
    if (wait > 0) {
      await this.sleep(wait);
    }
  }
}

/** Never blocks */
export const unlimitedRateLimiter: RateLimiter = {
  acquire: async () => {},
};

export function createRateLimiters(apiIntervalMs: number, pushIntervalMs: number): RateLimiters {
  return {
    api: new IntervalRateLimiter(apiIntervalMs),
    push: new IntervalRateLimiter(pushIntervalMs),
  };
}
