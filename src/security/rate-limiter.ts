import { logger } from '../observability/logger';

export interface RateDecision {
  allowed: boolean;
  remaining: number;
  retryAfterMs: number;
}

const PRUNE_EVERY = 500;

/**
 * In-memory rolling-window rate limiter.
 * Keeps the timestamps of admitted hits per key; rejected hits are not counted.
 */
export class RateLimiter {
  private readonly hits = new Map<string, number[]>();
  private readonly windowMs: number;
  private checksSincePrune = 0;

  constructor(
    private readonly maxRequests: number,
    windowSeconds: number,
    private readonly now: () => number = Date.now,
  ) {
    this.windowMs = windowSeconds * 1000;
  }

  check(key: string): RateDecision {
    const now = this.now();
    const windowStart = now - this.windowMs;
    const recent = (this.hits.get(key) ?? []).filter((ts) => ts > windowStart);

    if (++this.checksSincePrune >= PRUNE_EVERY) this.prune(windowStart);

    if (recent.length >= this.maxRequests) {
      this.hits.set(key, recent);
      const retryAfterMs = recent[0] + this.windowMs - now;
      logger.warn({ key, count: recent.length, limit: this.maxRequests }, 'Rate limit exceeded');
      return { allowed: false, remaining: 0, retryAfterMs };
    }

    recent.push(now);
    this.hits.set(key, recent);
    return {
      allowed: true,
      remaining: this.maxRequests - recent.length,
      retryAfterMs: 0,
    };
  }

  reset(key?: string): void {
    if (key) this.hits.delete(key);
    else this.hits.clear();
  }

  private prune(windowStart: number): void {
    this.checksSincePrune = 0;
    for (const [key, stamps] of this.hits) {
      if (stamps.every((ts) => ts <= windowStart)) this.hits.delete(key);
    }
  }
}
