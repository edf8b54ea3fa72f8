/**
 * PostgreSQL Hierarchy Store
 *
 * Each child mutation is one transaction that first locks the parent row
 * with SELECT ... FOR UPDATE, then applies the whole index shift in a single
 * UPDATE. The (parent, order_index) unique constraints are deferred to
 * commit, so intermediate collisions inside the UPDATE are allowed.
 */

import { DEFAULT_MAX_SPECIFICATIONS_PER_PROJECT, MAX_ITEMS_PER_SPECIFICATION } from '../constants.js';
import { InvalidPositionError, InvalidReorderError, NotFoundError, PG_ERROR_CODES } from '../errors.js';
import { scoped } from '../logger.js';
import {
  allocateOrderIndex,
  assertCapacity,
  planDeleteShift,
  planInsertShift,
  planMove,
  resolvePermutation,
} from '../ordering/index.js';
import type { IndexShift } from '../ordering/index.js';
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
import { pgErrorCode, withTransaction } from './sql.js';
import type { SqlClient, SqlPool } from './sql.js';
import type {
  ChildRepository,
  HierarchyLimits,
  HierarchyStore,
  ProjectRepository,
  UserRepository,
} from './types.js';

const log = scoped('pg-store');

type ChildRow = {
  id: number;
  parent_id: number;
  content: string;
  order_index: number;
  created_at: Date;
};

type ProjectRow = {
  id: number;
  title: string;
  owner_id: string;
  created_at: Date;
  updated_at: Date;
};

type UserRow = {
  google_id: string;
  email: string;
  name: string | null;
  created_at: Date;
  last_login: Date | null;
};

interface ChildTable<TChild extends OrderedEntry> {
  kind: ChildKind;
  table: 'specifications' | 'items';
  parentTable: 'projects' | 'specifications';
  parentColumn: 'project_id' | 'spec_id';
  childResource: string;
  parentResource: string;
  maxChildren: number;
  toChild(row: ChildRow): TChild;
  parentIdOf(child: TChild): number;
}

function toProject(row: ProjectRow): Project {
  return {
    id: row.id,
    title: row.title,
    ownerId: row.owner_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toUser(row: UserRow): User {
  return {
    googleId: row.google_id,
    email: row.email,
    name: row.name,
    createdAt: row.created_at,
    lastLogin: row.last_login,
  };
}

class PostgresChildRepository<TChild extends OrderedEntry> implements ChildRepository<TChild> {
  private readonly columns: string;

  constructor(private readonly pool: SqlPool, private readonly spec: ChildTable<TChild>) {
    this.columns = `id, ${spec.parentColumn} AS parent_id, content, order_index, created_at`;
  }

  get kind(): ChildKind {
    return this.spec.kind;
  }

  get maxChildren(): number {
    return this.spec.maxChildren;
  }

  parentIdOf(child: TChild): number {
    return this.spec.parentIdOf(child);
  }

  async getChild(childId: number): Promise<TChild | null> {
    const { rows } = await this.pool.query<ChildRow>(
      `SELECT ${this.columns} FROM ${this.spec.table} WHERE id = $1`,
      [childId]
    );
    const row = rows[0];
    return row ? this.spec.toChild(row) : null;
  }

  async listChildren(parentId: number): Promise<TChild[]> {
    const parent = await this.pool.query(`SELECT id FROM ${this.spec.parentTable} WHERE id = $1`, [parentId]);
    if (parent.rowCount === 0) {
      throw new NotFoundError(this.spec.parentResource, parentId);
    }
    const rows = await this.siblings(this.pool, parentId);
    return rows.map((row) => this.spec.toChild(row));
  }

  async createChild(parentId: number, content: string, position?: number): Promise<TChild> {
    return this.transaction(parentId, async (client) => {
      await this.lockParent(client, parentId);
      const siblings = await this.siblings(client, parentId);
      assertCapacity(siblings.length, this.spec.maxChildren, this.spec.kind);
      const orderIndex = allocateOrderIndex(
        siblings.map((row) => row.order_index),
        position
      );

      await this.applyShift(client, parentId, planInsertShift(siblings.length, orderIndex));
      const { rows } = await client.query<ChildRow>(
        `INSERT INTO ${this.spec.table} (${this.spec.parentColumn}, content, order_index)
         VALUES ($1, $2, $3)
         RETURNING ${this.columns}`,
        [parentId, content, orderIndex]
      );
      const row = rows[0];
      if (!row) {
        throw new Error(`Insert into ${this.spec.table} returned no row`);
      }

      log.debug('created child', { kind: this.spec.kind, id: row.id, parentId, orderIndex });
      return this.spec.toChild(row);
    });
  }

  async updateChildContent(childId: number, content: string): Promise<TChild> {
    const { rows } = await this.pool.query<ChildRow>(
      `UPDATE ${this.spec.table} SET content = $2 WHERE id = $1 RETURNING ${this.columns}`,
      [childId, content]
    );
    const row = rows[0];
    if (!row) {
      throw new NotFoundError(this.spec.childResource, childId);
    }
    return this.spec.toChild(row);
  }

  async deleteChild(childId: number): Promise<number> {
    const parentId = await this.requireParentIdOf(childId);

    return this.transaction(parentId, async (client) => {
      await this.lockParent(client, parentId);
      const siblings = await this.siblings(client, parentId);
      const target = siblings.find((row) => row.id === childId);
      if (!target) {
        throw new NotFoundError(this.spec.childResource, childId);
      }

      await client.query(`DELETE FROM ${this.spec.table} WHERE id = $1`, [childId]);
      await this.applyShift(client, parentId, planDeleteShift(siblings.length, target.order_index));

      log.debug('deleted child', { kind: this.spec.kind, id: childId, parentId });
      return parentId;
    });
  }

  async moveChild(childId: number, targetIndex: number): Promise<TChild[]> {
    const parentId = await this.requireParentIdOf(childId);

    return this.transaction(parentId, async (client) => {
      await this.lockParent(client, parentId);
      const siblings = await this.siblings(client, parentId);
      const target = siblings.find((row) => row.id === childId);
      if (!target) {
        throw new NotFoundError(this.spec.childResource, childId);
      }
      if (!Number.isInteger(targetIndex) || targetIndex < 0 || targetIndex >= siblings.length) {
        throw new InvalidPositionError(targetIndex, siblings.length - 1);
      }

      const shift = planMove(target.order_index, targetIndex);
      if (shift === null) {
        return siblings.map((row) => this.spec.toChild(row));
      }

      await client.query(
        `UPDATE ${this.spec.table}
         SET order_index = CASE WHEN id = $2 THEN $3 ELSE order_index + $4 END
         WHERE ${this.spec.parentColumn} = $1
           AND (id = $2 OR order_index BETWEEN $5 AND $6)`,
        [parentId, childId, targetIndex, shift.delta, shift.from, shift.to]
      );

      log.debug('moved child', { kind: this.spec.kind, id: childId, from: target.order_index, to: targetIndex });
      const reordered = await this.siblings(client, parentId);
      return reordered.map((row) => this.spec.toChild(row));
    });
  }

  async reorderChildren(parentId: number, moves: readonly OrderMove[]): Promise<TChild[]> {
    return this.transaction(parentId, async (client) => {
      await this.lockParent(client, parentId);
      const siblings = await this.siblings(client, parentId);
      const assignment = resolvePermutation(
        siblings.map((row) => row.id),
        moves
      );

      if (assignment.size > 0) {
        await client.query(
          `UPDATE ${this.spec.table} AS t
           SET order_index = m.order_index
           FROM unnest($2::int[], $3::int[]) AS m(id, order_index)
           WHERE t.id = m.id AND t.${this.spec.parentColumn} = $1`,
          [parentId, Array.from(assignment.keys()), Array.from(assignment.values())]
        );
      }

      log.debug('reordered children', { kind: this.spec.kind, parentId, count: assignment.size });
      const reordered = await this.siblings(client, parentId);
      return reordered.map((row) => this.spec.toChild(row));
    });
  }

  private async transaction<T>(parentId: number, work: (client: SqlClient) => Promise<T>): Promise<T> {
    try {
      return await withTransaction(this.pool, work);
    } catch (error) {
      throw this.translate(error, parentId);
    }
  }

  private translate(error: unknown, parentId: number): unknown {
    switch (pgErrorCode(error)) {
      case PG_ERROR_CODES.FOREIGN_KEY_VIOLATION:
        return new NotFoundError(this.spec.parentResource, parentId);
      case PG_ERROR_CODES.UNIQUE_VIOLATION:
        return new InvalidReorderError('Order index collision', { parentId });
      default:
        return error;
    }
  }

  private async lockParent(client: SqlClient, parentId: number): Promise<void> {
    const result = await client.query(
      `SELECT id FROM ${this.spec.parentTable} WHERE id = $1 FOR UPDATE`,
      [parentId]
    );
    if (result.rowCount === 0) {
      throw new NotFoundError(this.spec.parentResource, parentId);
    }
  }

  private async siblings(client: SqlClient, parentId: number): Promise<ChildRow[]> {
    const { rows } = await client.query<ChildRow>(
      `SELECT ${this.columns} FROM ${this.spec.table}
       WHERE ${this.spec.parentColumn} = $1
       ORDER BY order_index`,
      [parentId]
    );
    return rows;
  }

  private async applyShift(client: SqlClient, parentId: number, shift: IndexShift | null): Promise<void> {
    if (!shift) return;
    await client.query(
      `UPDATE ${this.spec.table}
       SET order_index = order_index + $2
       WHERE ${this.spec.parentColumn} = $1 AND order_index BETWEEN $3 AND $4`,
      [parentId, shift.delta, shift.from, shift.to]
    );
  }

  private async requireParentIdOf(childId: number): Promise<number> {
    const { rows } = await this.pool.query<{ parent_id: number }>(
      `SELECT ${this.spec.parentColumn} AS parent_id FROM ${this.spec.table} WHERE id = $1`,
      [childId]
    );
    const row = rows[0];
    if (!row) {
      throw new NotFoundError(this.spec.childResource, childId);
    }
    return row.parent_id;
  }
}

const PROJECT_COLUMNS = 'id, title, owner_id, created_at, updated_at';

class PostgresProjectRepository implements ProjectRepository {
  constructor(private readonly pool: SqlPool) {}

  async create(ownerId: string, title: string): Promise<Project> {
    try {
      const { rows } = await this.pool.query<ProjectRow>(
        `INSERT INTO projects (title, owner_id) VALUES ($1, $2) RETURNING ${PROJECT_COLUMNS}`,
        [title, ownerId]
      );
      const row = rows[0];
      if (!row) {
        throw new Error('Insert into projects returned no row');
      }
      return toProject(row);
    } catch (error) {
      if (pgErrorCode(error) === PG_ERROR_CODES.FOREIGN_KEY_VIOLATION) {
        throw new NotFoundError('User', ownerId);
      }
      throw error;
    }
  }

  async findById(projectId: number): Promise<Project | null> {
    const { rows } = await this.pool.query<ProjectRow>(
      `SELECT ${PROJECT_COLUMNS} FROM projects WHERE id = $1`,
      [projectId]
    );
    const row = rows[0];
    return row ? toProject(row) : null;
  }

  async listByOwner(ownerId: string, query: ProjectListQuery): Promise<ProjectPage> {
    const direction = query.sort === 'asc' ? 'ASC' : 'DESC';
    const offset = (query.page - 1) * query.pageSize;

    const [page, count] = await Promise.all([
      this.pool.query<ProjectRow>(
        `SELECT ${PROJECT_COLUMNS} FROM projects
         WHERE owner_id = $1
         ORDER BY created_at ${direction}, id ${direction}
         LIMIT $2 OFFSET $3`,
        [ownerId, query.pageSize, offset]
      ),
      this.pool.query<{ total: number }>('SELECT COUNT(*)::int AS total FROM projects WHERE owner_id = $1', [
        ownerId,
      ]),
    ]);

    return {
      projects: page.rows.map(toProject),
      total: count.rows[0]?.total ?? 0,
      page: query.page,
      pageSize: query.pageSize,
    };
  }

  async updateTitle(projectId: number, title: string): Promise<Project> {
    const { rows } = await this.pool.query<ProjectRow>(
      `UPDATE projects SET title = $2, updated_at = now() WHERE id = $1 RETURNING ${PROJECT_COLUMNS}`,
      [projectId, title]
    );
    const row = rows[0];
    if (!row) {
      throw new NotFoundError('Project', projectId);
    }
    return toProject(row);
  }

  async delete(projectId: number): Promise<void> {
    // specifications and items go with it through ON DELETE CASCADE
    const result = await this.pool.query('DELETE FROM projects WHERE id = $1', [projectId]);
    if (result.rowCount === 0) {
      throw new NotFoundError('Project', projectId);
    }
  }
}

class PostgresUserRepository implements UserRepository {
  constructor(private readonly pool: SqlPool) {}

  async upsertFromGoogle(identity: GoogleIdentity): Promise<User> {
    const { rows } = await this.pool.query<UserRow>(
      `INSERT INTO users (google_id, email, name, last_login)
       VALUES ($1, $2, $3, now())
       ON CONFLICT (google_id) DO UPDATE
         SET email = EXCLUDED.email, name = EXCLUDED.name, last_login = now()
       RETURNING google_id, email, name, created_at, last_login`,
      [identity.googleId, identity.email, identity.name]
    );
    const row = rows[0];
    if (!row) {
      throw new Error('User upsert returned no row');
    }
    return toUser(row);
  }

  async findByGoogleId(googleId: string): Promise<User | null> {
    const { rows } = await this.pool.query<UserRow>(
      'SELECT google_id, email, name, created_at, last_login FROM users WHERE google_id = $1',
      [googleId]
    );
    const row = rows[0];
    return row ? toUser(row) : null;
  }
}

export class PostgresStore implements HierarchyStore {
  readonly users: UserRepository;
  readonly projects: ProjectRepository;
  readonly specifications: ChildRepository<Specification>;
  readonly items: ChildRepository<Item>;

  constructor(private readonly pool: SqlPool, limits: Partial<HierarchyLimits> = {}) {
    this.users = new PostgresUserRepository(pool);
    this.projects = new PostgresProjectRepository(pool);
    this.specifications = new PostgresChildRepository<Specification>(pool, {
      kind: 'specification',
      table: 'specifications',
      parentTable: 'projects',
      parentColumn: 'project_id',
      childResource: 'Specification',
      parentResource: 'Project',
      maxChildren: limits.maxSpecificationsPerProject ?? DEFAULT_MAX_SPECIFICATIONS_PER_PROJECT,
      toChild: (row) => ({
        id: row.id,
        projectId: row.parent_id,
        content: row.content,
        orderIndex: row.order_index,
        createdAt: row.created_at,
      }),
      parentIdOf: (specification) => specification.projectId,
    });
    this.items = new PostgresChildRepository<Item>(pool, {
      kind: 'item',
      table: 'items',
      parentTable: 'specifications',
      parentColumn: 'spec_id',
      childResource: 'Item',
      parentResource: 'Specification',
      maxChildren: limits.maxItemsPerSpecification ?? MAX_ITEMS_PER_SPECIFICATION,
      toChild: (row) => ({
        id: row.id,
        specId: row.parent_id,
        content: row.content,
        orderIndex: row.order_index,
        createdAt: row.created_at,
      }),
      parentIdOf: (item) => item.specId,
    });
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      log.warn('database ping failed', { error: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }

  close(): Promise<void> {
    return this.pool.end();
  }
}
