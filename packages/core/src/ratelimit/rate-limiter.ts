import { cacheKeys } from '../cache/keys.js';
import type { CounterStore } from '../cache/types.js';

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Seconds until the current window closes */
  resetSeconds: number;
}

/**
 * Fixed-window limiter over the shared counter store. Each bucket has its
 * own limit and window; subjects are user ids or client IPs.
 */
export class RateLimiter {
  constructor(
    private readonly counters: CounterStore,
    private readonly bucket: string,
    readonly limit: number,
    private readonly windowSeconds: number
  ) {}

  async consume(subject: string): Promise<RateLimitDecision> {
    const state = await this.counters.increment(cacheKeys.rateLimit(this.bucket, subject), this.windowSeconds);
    return {
      allowed: state.count <= this.limit,
      limit: this.limit,
      remaining: Math.max(0, this.limit - state.count),
      resetSeconds: state.ttlSeconds,
    };
  }
}
