/**
 * Key/value stores shared by every server instance: Redis when REDIS_URL
 * is configured, otherwise process-local maps.
 */

export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  /** Read one field of a hash key, used for paged listings under a single key. */
  getField(key: string, field: string): Promise<string | null>;
  /** Write one field; the key's expiry is set by the first write only. */
  setField(key: string, field: string, value: string, ttlSeconds: number): Promise<void>;
  del(keys: readonly string[]): Promise<void>;
}

export interface CounterState {
  count: number;
  /** Seconds until the window closes */
  ttlSeconds: number;
}

export interface CounterStore {
  /** Atomically increment; the first increment opens a window of `ttlSeconds`. */
  increment(key: string, ttlSeconds: number): Promise<CounterState>;
  get(key: string): Promise<CounterState | null>;
  /** Take one back from a live counter, keeping its window; a closed window stays closed. */
  decrement(key: string): Promise<void>;
  reset(key: string): Promise<void>;
  setFlag(key: string, ttlSeconds: number): Promise<void>;
  hasFlag(key: string): Promise<boolean>;
}

/**
 * Connection the cache and counter stores share, so health checks and
 * shutdown see a single backend.
 */
export interface SharedBackend {
  readonly kind: 'redis' | 'memory';
  readonly cache: CacheStore;
  readonly counters: CounterStore;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}
