/**
 * Redis-backed cache and counters over one ioredis connection.
 */

import { Redis } from 'ioredis';
import { scoped } from '../logger.js';
import type { CacheStore, CounterState, CounterStore, SharedBackend } from './types.js';

const log = scoped('redis');

type ExecReply = [error: Error | null, result: unknown][] | null;

function unwrap(reply: ExecReply): unknown[] {
  if (!reply) {
    throw new Error('Redis transaction was aborted');
  }
  return reply.map(([error, result]) => {
    if (error) throw error;
    return result;
  });
}

function toNumber(value: unknown): number {
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || Number.isNaN(parsed)) {
    throw new Error(`Unexpected Redis reply: ${String(value)}`);
  }
  return parsed;
}

// DECR alone would recreate an expired key without a TTL
const DECREMENT_LIVE_SCRIPT = `
if redis.call('GET', KEYS[1]) and tonumber(redis.call('GET', KEYS[1])) > 0 then
  return redis.call('DECR', KEYS[1])
end
return 0
`;

export class RedisCacheStore implements CacheStore {
  constructor(private readonly redis: Redis) {}

  get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, 'EX', ttlSeconds);
  }

  getField(key: string, field: string): Promise<string | null> {
    return this.redis.hget(key, field);
  }

  async setField(key: string, field: string, value: string, ttlSeconds: number): Promise<void> {
    unwrap(await this.redis.multi().hset(key, field, value).expire(key, ttlSeconds, 'NX').exec());
  }

  async del(keys: readonly string[]): Promise<void> {
    if (keys.length === 0) return;
    await this.redis.del(...keys);
  }
}

export class RedisCounterStore implements CounterStore {
  constructor(private readonly redis: Redis) {}

  async increment(key: string, ttlSeconds: number): Promise<CounterState> {
    const [count, , ttl] = unwrap(
      await this.redis.multi().incr(key).expire(key, ttlSeconds, 'NX').ttl(key).exec()
    );
    return { count: toNumber(count), ttlSeconds: Math.max(0, toNumber(ttl)) };
  }

  async get(key: string): Promise<CounterState | null> {
    const [count, ttl] = unwrap(await this.redis.multi().get(key).ttl(key).exec());
    if (count === null) return null;
    return { count: toNumber(count), ttlSeconds: Math.max(0, toNumber(ttl)) };
  }

  async decrement(key: string): Promise<void> {
    await this.redis.eval(DECREMENT_LIVE_SCRIPT, 1, key);
  }

  async reset(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async setFlag(key: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, '1', 'EX', ttlSeconds);
  }

  async hasFlag(key: string): Promise<boolean> {
    return (await this.redis.exists(key)) === 1;
  }
}

export function createRedisBackend(url: string): SharedBackend {
  const redis = new Redis(url, { maxRetriesPerRequest: 2 });

  redis.on('error', (err: Error) => {
    log.error('connection error', { error: err.message });
  });
  redis.on('connect', () => {
    log.info('connected');
  });

  return {
    kind: 'redis',
    cache: new RedisCacheStore(redis),
    counters: new RedisCounterStore(redis),
    ping: async () => {
      try {
        return (await redis.ping()) === 'PONG';
      } catch (error) {
        log.warn('ping failed', { error: error instanceof Error ? error.message : String(error) });
        return false;
      }
    },
    close: async () => {
      await redis.quit();
    },
  };
}
