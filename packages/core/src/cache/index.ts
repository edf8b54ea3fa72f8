export type { CacheStore, CounterState, CounterStore, SharedBackend } from './types.js';
export { cacheKeys } from './keys.js';
export { MemoryCacheStore, MemoryCounterStore, createMemoryBackend } from './memory.js';
export { RedisCacheStore, RedisCounterStore, createRedisBackend } from './redis.js';
export { ListingCache } from './listing-cache.js';
export type { CacheObserver, CacheOutcome } from './listing-cache.js';
