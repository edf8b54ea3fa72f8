/**
 * SQL Connection Layer
 *
 * Narrow query interface the PostgreSQL repositories are written against,
 * a pg Pool adapter that implements it, and the transaction helper.
 */

import { readFile } from 'fs/promises';
import { Pool } from 'pg';
import type { QueryResultRow } from 'pg';
import { scoped } from '../logger.js';

const log = scoped('db');

export interface SqlResult<R> {
  rows: R[];
  rowCount: number | null;
}

export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<SqlResult<R>>;
}

export interface SqlPoolClient extends SqlClient {
  release(error?: Error): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
  end(): Promise<void>;
}

/**
 * SqlPool backed by a pg Pool.
 */
export class PgConnectionSource implements SqlPool {
  constructor(private readonly pool: Pool) {
    pool.on('error', (err) => {
      log.error('idle client error', { error: err.message });
    });
  }

  static fromUrl(connectionString: string, max: number): PgConnectionSource {
    return new PgConnectionSource(new Pool({ connectionString, max }));
  }

  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<SqlResult<R>> {
    return this.pool.query<R>(text, values);
  }

  async connect(): Promise<SqlPoolClient> {
    const client = await this.pool.connect();
    return {
      query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) =>
        client.query<R>(text, values),
      release: (error?: Error) => client.release(error),
    };
  }

  end(): Promise<void> {
    return this.pool.end();
  }
}

/**
 * Run `work` inside BEGIN/COMMIT on one pooled client. Any error rolls the
 * transaction back and is rethrown unchanged.
 */
export async function withTransaction<T>(pool: SqlPool, work: (client: SqlClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  let broken: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      log.error('rollback failed', { error: broken.message });
    }
    throw error;
  } finally {
    // A client whose rollback failed is discarded instead of returned to the pool
    client.release(broken);
  }
}

/** SQLSTATE of a pg error, if the value carries one. */
export function pgErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

const SCHEMA_URL = new URL('../../sql/schema.sql', import.meta.url);

/**
 * Apply sql/schema.sql. Every statement is idempotent.
 */
export async function migrate(pool: SqlPool, schemaPath: URL | string = SCHEMA_URL): Promise<void> {
  const sql = await readFile(schemaPath, 'utf8');
  await withTransaction(pool, async (client) => {
    await client.query(sql);
  });
  log.info('schema applied');
}
