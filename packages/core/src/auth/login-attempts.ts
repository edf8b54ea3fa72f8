import { cacheKeys } from '../cache/keys.js';
import type { CounterStore } from '../cache/types.js';
import { AccountLockedError } from '../errors.js';
import { scoped } from '../logger.js';

const log = scoped('login-attempts');

export interface LoginAttemptOptions {
  maxFailures: number;
  lockoutSeconds: number;
}

/**
 * Counts sign-in attempts per client in the shared store. An attempt is
 * counted before its token is checked, so concurrent attempts cannot get
 * past `maxFailures` together. The window opens on the first attempt;
 * a success clears it, an attempt that failed for reasons other than bad
 * credentials is handed back with `release`, and a client over the limit
 * stays locked until the window closes.
 */
export class LoginAttemptTracker {
  constructor(
    private readonly counters: CounterStore,
    private readonly options: LoginAttemptOptions
  ) {}

  /**
   * Count one attempt and return its number in the window.
   * Throws AccountLockedError once the window already holds `maxFailures`.
   */
  async begin(identity: string): Promise<number> {
    const state = await this.counters.increment(cacheKeys.authFailures(identity), this.options.lockoutSeconds);
    if (state.count > this.options.maxFailures) {
      if (state.count === this.options.maxFailures + 1) {
        log.warn('locked after repeated failures', { identity, seconds: state.ttlSeconds });
      }
      throw new AccountLockedError(state.ttlSeconds);
    }
    return state.count;
  }

  async release(identity: string): Promise<void> {
    await this.counters.decrement(cacheKeys.authFailures(identity));
  }

  async recordSuccess(identity: string): Promise<void> {
    await this.counters.reset(cacheKeys.authFailures(identity));
  }
}
