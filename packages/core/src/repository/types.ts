/**
 * Repository contracts shared by the PostgreSQL and in-process stores.
 */

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

/**
 * Ordered, capacity-bounded children of one parent kind.
 *
 * Every mutating operation runs in one transaction that holds the parent's
 * lock from the capacity check to the final reindex. Failures leave the
 * collection exactly as it was.
 */
export interface ChildRepository<TChild extends OrderedEntry> {
  readonly kind: ChildKind;
  readonly maxChildren: number;

  parentIdOf(child: TChild): number;

  getChild(childId: number): Promise<TChild | null>;

  /** Children ordered by orderIndex ascending. Throws NotFoundError for a missing parent. */
  listChildren(parentId: number): Promise<TChild[]>;

  createChild(parentId: number, content: string, position?: number): Promise<TChild>;

  updateChildContent(childId: number, content: string): Promise<TChild>;

  /** Returns the id of the parent the child belonged to. */
  deleteChild(childId: number): Promise<number>;

  /** Move a single child; the siblings in between shift by one. */
  moveChild(childId: number, targetIndex: number): Promise<TChild[]>;

  /** Apply a complete new ordering given as a permutation of {0..count-1}. */
  reorderChildren(parentId: number, moves: readonly OrderMove[]): Promise<TChild[]>;
}

export interface ProjectRepository {
  create(ownerId: string, title: string): Promise<Project>;
  findById(projectId: number): Promise<Project | null>;
  listByOwner(ownerId: string, query: ProjectListQuery): Promise<ProjectPage>;
  updateTitle(projectId: number, title: string): Promise<Project>;
  /** Deletes the project with all its specifications and items. */
  delete(projectId: number): Promise<void>;
}

export interface UserRepository {
  upsertFromGoogle(identity: GoogleIdentity): Promise<User>;
  findByGoogleId(googleId: string): Promise<User | null>;
}

export type SpecificationRepository = ChildRepository<Specification>;
export type ItemRepository = ChildRepository<Item>;

/**
 * All repositories backed by one storage engine.
 */
export interface HierarchyStore {
  readonly users: UserRepository;
  readonly projects: ProjectRepository;
  readonly specifications: SpecificationRepository;
  readonly items: ItemRepository;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export interface HierarchyLimits {
  maxItemsPerSpecification: number;
  maxSpecificationsPerProject: number;
}
