/**
 * Listing Cache
 *
 * Read-through cache for project, specification and item listings. Entries
 * are JSON, checked with zod on the way out so a stale or foreign value is
 * treated as a miss. Backend failures never fail the request: reads fall
 * back to the loader and writes are skipped, both with a warning.
 *
 * Every invalidation stamps `<key>:gen` with a fresh token before deleting.
 * A read that saw a different token before loading removes what it wrote,
 * so a listing loaded before a commit never outlives that commit's
 * invalidation.
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { scoped } from '../logger.js';
import type { Item, ProjectListQuery, ProjectPage, Settings, Specification } from '../types/index.js';
import { cacheKeys } from './keys.js';
import type { CacheStore } from './types.js';

const log = scoped('cache');

const ItemSchema = z.object({
  id: z.number(),
  specId: z.number(),
  content: z.string(),
  orderIndex: z.number(),
  createdAt: z.coerce.date(),
});

const SpecificationSchema = z.object({
  id: z.number(),
  projectId: z.number(),
  content: z.string(),
  orderIndex: z.number(),
  createdAt: z.coerce.date(),
});

const ProjectPageSchema = z.object({
  projects: z.array(
    z.object({
      id: z.number(),
      title: z.string(),
      ownerId: z.string(),
      createdAt: z.coerce.date(),
      updatedAt: z.coerce.date(),
    })
  ),
  total: z.number(),
  page: z.number(),
  pageSize: z.number(),
});

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

interface Slot {
  key: string;
  field?: string;
}

/** Whether a listing was served from the cache or loaded from the store. */
export type CacheOutcome = 'HIT' | 'MISS';

export type CacheObserver = (outcome: CacheOutcome) => void;

const generationKey = (key: string): string => `${key}:gen`;

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ListingCache {
  constructor(
    private readonly store: CacheStore,
    private readonly ttl: Settings['cache']
  ) {}

  items(specId: number, load: () => Promise<Item[]>, observe?: CacheObserver): Promise<Item[]> {
    return this.readThrough(
      { key: cacheKeys.items(specId) },
      z.array(ItemSchema),
      this.ttl.itemTtlSeconds,
      load,
      observe
    );
  }

  specifications(
    projectId: number,
    load: () => Promise<Specification[]>,
    observe?: CacheObserver
  ): Promise<Specification[]> {
    return this.readThrough(
      { key: cacheKeys.specifications(projectId) },
      z.array(SpecificationSchema),
      this.ttl.specificationTtlSeconds,
      load,
      observe
    );
  }

  projects(
    ownerId: string,
    query: ProjectListQuery,
    load: () => Promise<ProjectPage>,
    observe?: CacheObserver
  ): Promise<ProjectPage> {
    return this.readThrough(
      { key: cacheKeys.projects(ownerId), field: `${query.sort}:${query.page}:${query.pageSize}` },
      ProjectPageSchema,
      this.ttl.projectTtlSeconds,
      load,
      observe
    );
  }

  invalidateItems(specId: number): Promise<void> {
    return this.drop([cacheKeys.items(specId)]);
  }

  /** Specification listing of the project, plus item listings of removed specifications. */
  invalidateSpecifications(projectId: number, removedSpecIds: readonly number[] = []): Promise<void> {
    return this.drop([cacheKeys.specifications(projectId), ...removedSpecIds.map((id) => cacheKeys.items(id))]);
  }

  invalidateProjects(ownerId: string, removed?: { projectId: number; specIds: readonly number[] }): Promise<void> {
    const keys = [cacheKeys.projects(ownerId)];
    if (removed) {
      keys.push(cacheKeys.specifications(removed.projectId), ...removed.specIds.map((id) => cacheKeys.items(id)));
    }
    return this.drop(keys);
  }

  private async readThrough<T>(
    slot: Slot,
    schema: Schema<T>,
    ttlSeconds: number,
    load: () => Promise<T>,
    observe?: CacheObserver
  ): Promise<T> {
    const cached = await this.read(slot, schema);
    if (cached !== undefined) {
      observe?.('HIT');
      return cached;
    }
    observe?.('MISS');

    const generation = await this.generation(slot.key);
    const value = await load();
    await this.write(slot, JSON.stringify(value), ttlSeconds);
    if ((await this.generation(slot.key)) !== generation) {
      log.debug('invalidated while loading, discarding', { key: slot.key });
      await this.remove([slot.key]);
    }
    return value;
  }

  private async generation(key: string): Promise<string | null> {
    try {
      return await this.store.get(generationKey(key));
    } catch (error) {
      log.warn('generation read failed', { key, error: describe(error) });
      return null;
    }
  }

  private async read<T>(slot: Slot, schema: Schema<T>): Promise<T | undefined> {
    let raw: string | null;
    try {
      raw = slot.field === undefined ? await this.store.get(slot.key) : await this.store.getField(slot.key, slot.field);
    } catch (error) {
      log.warn('read failed, loading from store', { key: slot.key, error: describe(error) });
      return undefined;
    }
    if (raw === null) {
      return undefined;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      log.warn('discarding unparseable entry', { key: slot.key, error: describe(error) });
      return undefined;
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      log.warn('discarding malformed entry', { key: slot.key });
      return undefined;
    }
    log.debug('hit', { key: slot.key, field: slot.field });
    return parsed.data;
  }

  private async write(slot: Slot, value: string, ttlSeconds: number): Promise<void> {
    try {
      if (slot.field === undefined) {
        await this.store.set(slot.key, value, ttlSeconds);
      } else {
        await this.store.setField(slot.key, slot.field, value, ttlSeconds);
      }
    } catch (error) {
      log.warn('write failed', { key: slot.key, error: describe(error) });
    }
  }

  private async drop(keys: string[]): Promise<void> {
    const token = randomUUID();
    const ttl = Math.max(this.ttl.projectTtlSeconds, this.ttl.specificationTtlSeconds, this.ttl.itemTtlSeconds);
    try {
      // Stamped before the delete so an overlapping read sees the new token after its write
      await Promise.all(keys.map((key) => this.store.set(generationKey(key), token, ttl)));
    } catch (error) {
      log.warn('generation stamp failed', { keys: keys.join(','), error: describe(error) });
    }
    await this.remove(keys);
  }

  private async remove(keys: string[]): Promise<void> {
    try {
      await this.store.del(keys);
    } catch (error) {
      // Entries expire on their own TTL
      log.error('invalidation failed', { keys: keys.join(','), error: describe(error) });
    }
  }
}
