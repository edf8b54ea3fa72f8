import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryCacheStore, MemoryCounterStore } from '../memory.js';

describe('MemoryCacheStore', () => {
  let clock: number;
  let cache: MemoryCacheStore;

  beforeEach(() => {
    clock = 1_000_000;
    cache = new MemoryCacheStore(() => clock);
  });

  it('get_BeforeAndAfterExpiry_ReturnsValueThenNull', async () => {
    await cache.set('k', 'v', 10);
    expect(await cache.get('k')).toBe('v');

    clock += 10_000;
    expect(await cache.get('k')).toBeNull();
  });

  it('setField_SecondField_KeepsFirstExpiry', async () => {
    await cache.setField('h', 'a', '1', 10);
    clock += 5_000;
    await cache.setField('h', 'b', '2', 10);

    expect(await cache.getField('h', 'b')).toBe('2');
    clock += 5_000;
    expect(await cache.getField('h', 'a')).toBeNull();
    expect(await cache.getField('h', 'b')).toBeNull();
  });

  it('del_RemovesPlainAndHashKeys', async () => {
    await cache.set('k', 'v', 10);
    await cache.setField('h', 'a', '1', 10);

    await cache.del(['k', 'h']);

    expect(await cache.get('k')).toBeNull();
    expect(await cache.getField('h', 'a')).toBeNull();
  });
});

describe('MemoryCounterStore', () => {
  let clock: number;
  let counters: MemoryCounterStore;

  beforeEach(() => {
    clock = 1_000_000;
    counters = new MemoryCounterStore(() => clock);
  });

  it('increment_WithinWindow_CountsAndKeepsWindow', async () => {
    expect(await counters.increment('c', 60)).toEqual({ count: 1, ttlSeconds: 60 });
    clock += 20_500;
    expect(await counters.increment('c', 60)).toEqual({ count: 2, ttlSeconds: 40 });
  });

  it('increment_AfterWindow_StartsOver', async () => {
    await counters.increment('c', 60);
    await counters.increment('c', 60);
    clock += 60_000;

    expect(await counters.increment('c', 60)).toEqual({ count: 1, ttlSeconds: 60 });
  });

  it('get_Missing_ReturnsNull', async () => {
    expect(await counters.get('missing')).toBeNull();
  });

  it('reset_ClearsCounter', async () => {
    await counters.increment('c', 60);
    await counters.reset('c');
    expect(await counters.get('c')).toBeNull();
  });

  it('decrement_LiveCounter_KeepsWindow', async () => {
    await counters.increment('c', 60);
    await counters.increment('c', 60);
    clock += 20_000;

    await counters.decrement('c');

    expect(await counters.get('c')).toEqual({ count: 1, ttlSeconds: 40 });
  });

  it('decrement_Missing_LeavesItMissing', async () => {
    await counters.decrement('missing');
    expect(await counters.get('missing')).toBeNull();
  });

  it('hasFlag_UntilExpiry_ReturnsTrue', async () => {
    await counters.setFlag('f', 30);
    expect(await counters.hasFlag('f')).toBe(true);
    clock += 30_000;
    expect(await counters.hasFlag('f')).toBe(false);
  });
});
