/**
 * In-Process Hierarchy Store
 *
 * Keeps users, projects, specifications and items in maps. Used when no
 * DATABASE_URL is configured and by the test suites.
 *
 * A parent's child collection is serialized through a KeyedMutex keyed by
 * the parent, the counterpart of SELECT ... FOR UPDATE on the parent row in
 * the PostgreSQL store. Every mutation computes the new sibling rows first and
 * writes them without yielding, so a failure never leaves a partial reindex.
 */

import { MAX_ITEMS_PER_SPECIFICATION, DEFAULT_MAX_SPECIFICATIONS_PER_PROJECT } from '../constants.js';
import { InvalidPositionError, NotFoundError } from '../errors.js';
import { scoped } from '../logger.js';
import {
  allocateOrderIndex,
  applyShift,
  assertCapacity,
  assertDenseOrder,
  planDeleteShift,
  planInsertShift,
  planMove,
  resolvePermutation,
  sortByOrder,
} from '../ordering/index.js';
import type {
  ChildKind,
  GoogleIdentity,
  Item,
  OrderMove,
  OrderedEntry,
  Project,
  ProjectListQuery,
  ProjectPage,
  Specification,
  User,
} from '../types/index.js';
import { KeyedMutex } from './keyed-mutex.js';
import type {
  ChildRepository,
  HierarchyLimits,
  HierarchyStore,
  ProjectRepository,
  UserRepository,
} from './types.js';

const log = scoped('memory-store');

export type TableName = 'projects' | 'specifications' | 'items';

/**
 * Source of row ids, the in-process stand-in for SERIAL columns.
 */
export interface IdGenerator {
  next(table: TableName): Promise<number>;
}

export class SequenceIdGenerator implements IdGenerator {
  private readonly counters = new Map<TableName, number>();

  async next(table: TableName): Promise<number> {
    const value = (this.counters.get(table) ?? 0) + 1;
    this.counters.set(table, value);
    return value;
  }
}

export interface InMemoryStoreOptions extends Partial<HierarchyLimits> {
  now?: () => Date;
  ids?: IdGenerator;
}

type LockScope = 'project' | 'specification';

function lockKey(scope: LockScope, id: number): string {
  return `${scope}:${id}`;
}

interface StoredChild extends OrderedEntry {
  parentId: number;
}

interface ChildTableConfig<TChild extends OrderedEntry> {
  kind: ChildKind;
  table: TableName;
  childResource: string;
  parentResource: string;
  /** Lock guarding the parent's child collection */
  parentLock: LockScope;
  /** Lock a child holds over its own children, taken when the child is deleted */
  ownLock?: LockScope;
  maxChildren: number;
  parentExists(parentId: number): boolean;
  build(row: StoredChild): TChild;
  parentIdOf(child: TChild): number;
  onDelete?(childIds: number[]): void;
}

class InMemoryChildRepository<TChild extends OrderedEntry> implements ChildRepository<TChild> {
  private readonly rows = new Map<number, StoredChild>();

  constructor(
    private readonly config: ChildTableConfig<TChild>,
    private readonly mutex: KeyedMutex,
    private readonly ids: IdGenerator,
    private readonly now: () => Date
  ) {}

  get kind(): ChildKind {
    return this.config.kind;
  }

  get maxChildren(): number {
    return this.config.maxChildren;
  }

  parentIdOf(child: TChild): number {
    return this.config.parentIdOf(child);
  }

  async getChild(childId: number): Promise<TChild | null> {
    const row = this.rows.get(childId);
    return row ? this.config.build(row) : null;
  }

  async listChildren(parentId: number): Promise<TChild[]> {
    this.requireParent(parentId);
    return this.siblings(parentId).map((row) => this.config.build(row));
  }

  async createChild(parentId: number, content: string, position?: number): Promise<TChild> {
    return this.mutex.runExclusive(lockKey(this.config.parentLock, parentId), async () => {
      this.requireParent(parentId);
      const id = await this.ids.next(this.config.table);
      // Sibling rows are read only after the last await, so nothing committed meanwhile is overwritten
      this.requireParent(parentId);

      const siblings = this.siblings(parentId);
      assertCapacity(siblings.length, this.config.maxChildren, this.config.kind);
      const orderIndex = allocateOrderIndex(
        siblings.map((row) => row.orderIndex),
        position
      );

      const row: StoredChild = { id, parentId, content, orderIndex, createdAt: this.now() };
      const shifted = applyShift(siblings, planInsertShift(siblings.length, orderIndex));
      this.commit([...shifted, row]);

      log.debug('created child', { kind: this.config.kind, id, parentId, orderIndex });
      return this.config.build(row);
    });
  }

  async updateChildContent(childId: number, content: string): Promise<TChild> {
    const parentId = this.requireChild(childId).parentId;

    return this.mutex.runExclusive(lockKey(this.config.parentLock, parentId), async () => {
      const row = this.requireChild(childId);
      const updated: StoredChild = { ...row, content };
      this.rows.set(childId, updated);
      return this.config.build(updated);
    });
  }

  async deleteChild(childId: number): Promise<number> {
    const parentId = this.requireChild(childId).parentId;
    const keys = [lockKey(this.config.parentLock, parentId)];
    if (this.config.ownLock) {
      keys.push(lockKey(this.config.ownLock, childId));
    }

    return this.mutex.runExclusiveAll(keys, async () => {
      const row = this.requireChild(childId);
      const siblings = this.siblings(parentId);
      const remaining = applyShift(
        siblings.filter((sibling) => sibling.id !== childId),
        planDeleteShift(siblings.length, row.orderIndex)
      );

      this.rows.delete(childId);
      this.config.onDelete?.([childId]);
      this.commit(remaining);

      log.debug('deleted child', { kind: this.config.kind, id: childId, parentId });
      return parentId;
    });
  }

  async moveChild(childId: number, targetIndex: number): Promise<TChild[]> {
    const parentId = this.requireChild(childId).parentId;

    return this.mutex.runExclusive(lockKey(this.config.parentLock, parentId), async () => {
      const row = this.requireChild(childId);
      const siblings = this.siblings(parentId);
      if (!Number.isInteger(targetIndex) || targetIndex < 0 || targetIndex >= siblings.length) {
        throw new InvalidPositionError(targetIndex, siblings.length - 1);
      }

      const shift = planMove(row.orderIndex, targetIndex);
      if (shift === null) {
        return siblings.map((sibling) => this.config.build(sibling));
      }

      const moved = applyShift(siblings, shift, childId).map((sibling) =>
        sibling.id === childId ? { ...sibling, orderIndex: targetIndex } : sibling
      );
      this.commit(moved);

      log.debug('moved child', { kind: this.config.kind, id: childId, from: row.orderIndex, to: targetIndex });
      return sortByOrder(moved).map((sibling) => this.config.build(sibling));
    });
  }

  async reorderChildren(parentId: number, moves: readonly OrderMove[]): Promise<TChild[]> {
    return this.mutex.runExclusive(lockKey(this.config.parentLock, parentId), async () => {
      this.requireParent(parentId);
      const siblings = this.siblings(parentId);
      const assignment = resolvePermutation(
        siblings.map((row) => row.id),
        moves
      );

      const reordered = siblings.map((row) => {
        const orderIndex = assignment.get(row.id);
        return orderIndex === undefined || orderIndex === row.orderIndex ? row : { ...row, orderIndex };
      });
      this.commit(reordered);

      log.debug('reordered children', { kind: this.config.kind, parentId, count: reordered.length });
      return sortByOrder(reordered).map((row) => this.config.build(row));
    });
  }

  /** Child ids under the given parent, used to take cascade locks. */
  idsForParent(parentId: number): number[] {
    return this.siblings(parentId).map((row) => row.id);
  }

  has(childId: number): boolean {
    return this.rows.has(childId);
  }

  /**
   * Remove every child of the given parents. Runs inside the caller's locks.
   */
  removeByParents(parentIds: readonly number[]): void {
    const parents = new Set(parentIds);
    const removed: number[] = [];
    for (const row of this.rows.values()) {
      if (parents.has(row.parentId)) {
        removed.push(row.id);
      }
    }
    for (const id of removed) {
      this.rows.delete(id);
    }
    if (removed.length > 0) {
      this.config.onDelete?.(removed);
    }
  }

  private siblings(parentId: number): StoredChild[] {
    const rows: StoredChild[] = [];
    for (const row of this.rows.values()) {
      if (row.parentId === parentId) rows.push(row);
    }
    return sortByOrder(rows);
  }

  private requireParent(parentId: number): void {
    if (!this.config.parentExists(parentId)) {
      throw new NotFoundError(this.config.parentResource, parentId);
    }
  }

  private requireChild(childId: number): StoredChild {
    const row = this.rows.get(childId);
    if (!row) {
      throw new NotFoundError(this.config.childResource, childId);
    }
    return row;
  }

  private commit(siblings: readonly StoredChild[]): void {
    assertDenseOrder(siblings.map((row) => row.orderIndex));
    for (const row of siblings) {
      this.rows.set(row.id, row);
    }
  }
}

class InMemoryProjectRepository implements ProjectRepository {
  private readonly rows = new Map<number, Project>();

  constructor(
    private readonly ids: IdGenerator,
    private readonly now: () => Date,
    private readonly cascade: {
      mutex: KeyedMutex;
      specificationIds(projectId: number): number[];
      removeSpecifications(projectIds: number[]): void;
    }
  ) {}

  has(projectId: number): boolean {
    return this.rows.has(projectId);
  }

  async create(ownerId: string, title: string): Promise<Project> {
    const id = await this.ids.next('projects');
    const timestamp = this.now();
    const project: Project = { id, title, ownerId, createdAt: timestamp, updatedAt: timestamp };
    this.rows.set(id, project);
    return project;
  }

  async findById(projectId: number): Promise<Project | null> {
    return this.rows.get(projectId) ?? null;
  }

  async listByOwner(ownerId: string, query: ProjectListQuery): Promise<ProjectPage> {
    const direction = query.sort === 'asc' ? 1 : -1;
    const owned = Array.from(this.rows.values())
      .filter((project) => project.ownerId === ownerId)
      .sort(
        (a, b) =>
          direction * (a.createdAt.getTime() - b.createdAt.getTime()) || direction * (a.id - b.id)
      );
    const start = (query.page - 1) * query.pageSize;
    return {
      projects: owned.slice(start, start + query.pageSize),
      total: owned.length,
      page: query.page,
      pageSize: query.pageSize,
    };
  }

  async updateTitle(projectId: number, title: string): Promise<Project> {
    const existing = this.rows.get(projectId);
    if (!existing) {
      throw new NotFoundError('Project', projectId);
    }
    const updated: Project = { ...existing, title, updatedAt: this.now() };
    this.rows.set(projectId, updated);
    return updated;
  }

  async delete(projectId: number): Promise<void> {
    if (!this.rows.has(projectId)) {
      throw new NotFoundError('Project', projectId);
    }
    const keys = [
      lockKey('project', projectId),
      ...this.cascade.specificationIds(projectId).map((id) => lockKey('specification', id)),
    ];
    await this.cascade.mutex.runExclusiveAll(keys, async () => {
      if (!this.rows.delete(projectId)) {
        throw new NotFoundError('Project', projectId);
      }
      this.cascade.removeSpecifications([projectId]);
    });
  }
}

class InMemoryUserRepository implements UserRepository {
  private readonly rows = new Map<string, User>();

  constructor(private readonly now: () => Date) {}

  async upsertFromGoogle(identity: GoogleIdentity): Promise<User> {
    const timestamp = this.now();
    const existing = this.rows.get(identity.googleId);
    const user: User = {
      googleId: identity.googleId,
      email: identity.email,
      name: identity.name,
      createdAt: existing?.createdAt ?? timestamp,
      lastLogin: timestamp,
    };
    this.rows.set(user.googleId, user);
    return user;
  }

  async findByGoogleId(googleId: string): Promise<User | null> {
    return this.rows.get(googleId) ?? null;
  }
}

export class InMemoryStore implements HierarchyStore {
  readonly users: InMemoryUserRepository;
  readonly projects: InMemoryProjectRepository;
  readonly specifications: InMemoryChildRepository<Specification>;
  readonly items: InMemoryChildRepository<Item>;
  readonly mutex = new KeyedMutex();

  constructor(options: InMemoryStoreOptions = {}) {
    const now = options.now ?? (() => new Date());
    const ids = options.ids ?? new SequenceIdGenerator();

    this.items = new InMemoryChildRepository<Item>(
      {
        kind: 'item',
        table: 'items',
        childResource: 'Item',
        parentResource: 'Specification',
        parentLock: 'specification',
        maxChildren: options.maxItemsPerSpecification ?? MAX_ITEMS_PER_SPECIFICATION,
        parentExists: (specId) => this.specifications.has(specId),
        build: (row) => ({
          id: row.id,
          specId: row.parentId,
          content: row.content,
          orderIndex: row.orderIndex,
          createdAt: row.createdAt,
        }),
        parentIdOf: (item) => item.specId,
      },
      this.mutex,
      ids,
      now
    );

    this.specifications = new InMemoryChildRepository<Specification>(
      {
        kind: 'specification',
        table: 'specifications',
        childResource: 'Specification',
        parentResource: 'Project',
        parentLock: 'project',
        ownLock: 'specification',
        maxChildren: options.maxSpecificationsPerProject ?? DEFAULT_MAX_SPECIFICATIONS_PER_PROJECT,
        parentExists: (projectId) => this.projects.has(projectId),
        build: (row) => ({
          id: row.id,
          projectId: row.parentId,
          content: row.content,
          orderIndex: row.orderIndex,
          createdAt: row.createdAt,
        }),
        parentIdOf: (specification) => specification.projectId,
        onDelete: (specIds) => this.items.removeByParents(specIds),
      },
      this.mutex,
      ids,
      now
    );

    this.projects = new InMemoryProjectRepository(ids, now, {
      mutex: this.mutex,
      specificationIds: (projectId) => this.specifications.idsForParent(projectId),
      removeSpecifications: (projectIds) => this.specifications.removeByParents(projectIds),
    });

    this.users = new InMemoryUserRepository(now);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
