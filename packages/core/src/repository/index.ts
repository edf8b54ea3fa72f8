export type {
  ChildRepository,
  HierarchyLimits,
  HierarchyStore,
  ItemRepository,
  ProjectRepository,
  SpecificationRepository,
  UserRepository,
} from './types.js';
export { KeyedMutex } from './keyed-mutex.js';
export { InMemoryStore, SequenceIdGenerator } from './memory.js';
export type { IdGenerator, InMemoryStoreOptions, TableName } from './memory.js';
export { PostgresStore } from './postgres.js';
export { PgConnectionSource, migrate, withTransaction } from './sql.js';
export type { SqlClient, SqlPool, SqlPoolClient, SqlResult } from './sql.js';
