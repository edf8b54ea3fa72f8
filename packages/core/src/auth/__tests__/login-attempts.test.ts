import { describe, it, expect, beforeEach } from 'vitest';
import { LoginAttemptTracker } from '../login-attempts.js';
import { MemoryCounterStore } from '../../cache/memory.js';
import { AccountLockedError } from '../../errors.js';

describe('LoginAttemptTracker', () => {
  let clock: number;
  let tracker: LoginAttemptTracker;

  async function attempts(identity: string, count: number): Promise<void> {
    for (let i = 0; i < count; i++) await tracker.begin(identity);
  }

  beforeEach(() => {
    clock = 5_000_000;
    tracker = new LoginAttemptTracker(new MemoryCounterStore(() => clock), { maxFailures: 5, lockoutSeconds: 900 });
  });

  it('begin_UpToLimit_ReturnsAttemptNumber', async () => {
    await attempts('10.0.0.1', 4);
    expect(await tracker.begin('10.0.0.1')).toBe(5);
  });

  it('begin_PastLimit_ThrowsWithRetryAfter', async () => {
    await attempts('10.0.0.1', 5);

    const attempt = tracker.begin('10.0.0.1');
    await expect(attempt).rejects.toBeInstanceOf(AccountLockedError);
    await expect(tracker.begin('10.0.0.1')).rejects.toMatchObject({ retryAfterSeconds: 900 });
  });

  it('begin_ConcurrentAttempts_OnlyLimitGetThrough', async () => {
    const results = await Promise.allSettled(Array.from({ length: 8 }, () => tracker.begin('10.0.0.1')));

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(5);
    expect(results.filter((r) => r.status === 'rejected')).toHaveLength(3);
  });

  it('begin_AfterLockoutWindow_Passes', async () => {
    await attempts('10.0.0.1', 5);
    clock += 900_000;
    expect(await tracker.begin('10.0.0.1')).toBe(1);
  });

  it('release_HandsAttemptBack', async () => {
    await attempts('10.0.0.1', 5);
    await tracker.release('10.0.0.1');
    expect(await tracker.begin('10.0.0.1')).toBe(5);
  });

  it('recordSuccess_ClearsAttempts', async () => {
    await attempts('10.0.0.1', 4);
    await tracker.recordSuccess('10.0.0.1');
    expect(await tracker.begin('10.0.0.1')).toBe(1);
  });

  it('begin_OtherClient_CountedSeparately', async () => {
    await attempts('10.0.0.1', 5);
    expect(await tracker.begin('10.0.0.2')).toBe(1);
  });
});
