/**
 * Process-local cache and counters with lazy expiry. State is lost on
 * restart and not shared between instances.
 */

import type { CacheStore, CounterState, CounterStore, SharedBackend } from './types.js';

interface Expiring<T> {
  value: T;
  expiresAt: number;
}

class ExpiringMap<T> {
  private readonly entries = new Map<string, Expiring<T>>();

  constructor(private readonly now: () => number) {}

  get(key: string): Expiring<T> | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  set(key: string, value: T, ttlSeconds: number): void {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  replace(key: string, value: T, expiresAt: number): void {
    this.entries.set(key, { value, expiresAt });
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  remainingSeconds(entry: Expiring<T>): number {
    return Math.max(0, Math.ceil((entry.expiresAt - this.now()) / 1000));
  }
}

export class MemoryCacheStore implements CacheStore {
  private readonly values: ExpiringMap<string>;
  private readonly hashes: ExpiringMap<Map<string, string>>;

  constructor(now: () => number = Date.now) {
    this.values = new ExpiringMap(now);
    this.hashes = new ExpiringMap(now);
  }

  async get(key: string): Promise<string | null> {
    return this.values.get(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.values.set(key, value, ttlSeconds);
  }

  async getField(key: string, field: string): Promise<string | null> {
    return this.hashes.get(key)?.value.get(field) ?? null;
  }

  async setField(key: string, field: string, value: string, ttlSeconds: number): Promise<void> {
    const existing = this.hashes.get(key);
    if (existing) {
      existing.value.set(field, value);
      return;
    }
    this.hashes.set(key, new Map([[field, value]]), ttlSeconds);
  }

  async del(keys: readonly string[]): Promise<void> {
    for (const key of keys) {
      this.values.delete(key);
      this.hashes.delete(key);
    }
  }
}

export class MemoryCounterStore implements CounterStore {
  private readonly counters: ExpiringMap<number>;

  constructor(now: () => number = Date.now) {
    this.counters = new ExpiringMap(now);
  }

  async increment(key: string, ttlSeconds: number): Promise<CounterState> {
    const existing = this.counters.get(key);
    if (!existing) {
      this.counters.set(key, 1, ttlSeconds);
      return { count: 1, ttlSeconds };
    }
    const count = existing.value + 1;
    this.counters.replace(key, count, existing.expiresAt);
    return { count, ttlSeconds: this.counters.remainingSeconds(existing) };
  }

  async get(key: string): Promise<CounterState | null> {
    const entry = this.counters.get(key);
    return entry ? { count: entry.value, ttlSeconds: this.counters.remainingSeconds(entry) } : null;
  }

  async decrement(key: string): Promise<void> {
    const existing = this.counters.get(key);
    if (existing && existing.value > 0) {
      this.counters.replace(key, existing.value - 1, existing.expiresAt);
    }
  }

  async reset(key: string): Promise<void> {
    this.counters.delete(key);
  }

  async setFlag(key: string, ttlSeconds: number): Promise<void> {
    this.counters.set(key, 1, ttlSeconds);
  }

  async hasFlag(key: string): Promise<boolean> {
    return this.counters.get(key) !== undefined;
  }
}

export function createMemoryBackend(now: () => number = Date.now): SharedBackend {
  return {
    kind: 'memory',
    cache: new MemoryCacheStore(now),
    counters: new MemoryCounterStore(now),
    ping: async () => true,
    close: async () => undefined,
  };
}
