import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimiter } from '../rate-limiter.js';
import { MemoryCounterStore } from '../../cache/memory.js';

describe('RateLimiter', () => {
  let clock: number;
  let limiter: RateLimiter;

  beforeEach(() => {
    clock = 0;
    limiter = new RateLimiter(new MemoryCounterStore(() => clock), 'api', 2, 3600);
  });

  it('consume_UpToLimit_Allows', async () => {
    expect(await limiter.consume('u1')).toEqual({ allowed: true, limit: 2, remaining: 1, resetSeconds: 3600 });
    expect(await limiter.consume('u1')).toEqual({ allowed: true, limit: 2, remaining: 0, resetSeconds: 3600 });
  });

  it('consume_OverLimit_Denies', async () => {
    await limiter.consume('u1');
    await limiter.consume('u1');
    clock += 600_000;

    expect(await limiter.consume('u1')).toEqual({ allowed: false, limit: 2, remaining: 0, resetSeconds: 3000 });
  });

  it('consume_NewWindow_AllowsAgain', async () => {
    await limiter.consume('u1');
    await limiter.consume('u1');
    await limiter.consume('u1');
    clock += 3_600_000;

    expect((await limiter.consume('u1')).allowed).toBe(true);
  });

  it('consume_SubjectsAreIndependent', async () => {
    await limiter.consume('u1');
    await limiter.consume('u1');
    expect((await limiter.consume('u2')).remaining).toBe(1);
  });
});
