// User record keyed by the Google account id
export interface User {
  googleId: string;
  email: string;
  name: string | null;
  createdAt: Date;
  lastLogin: Date | null;
}

// Top-level container owned by a single user
export interface Project {
  id: number;
  title: string;
  ownerId: string;
  createdAt: Date;
  updatedAt: Date;
}

// First-level child of a project, ordered by orderIndex
export interface Specification {
  id: number;
  projectId: number;
  content: string;
  orderIndex: number;
  createdAt: Date;
}

// Second-level child of a specification, ordered by orderIndex
export interface Item {
  id: number;
  specId: number;
  content: string;
  orderIndex: number;
  createdAt: Date;
}

/**
 * Child kinds that live in an ordered, capacity-bounded collection.
 */
export type ChildKind = 'specification' | 'item';

/**
 * Fields shared by every ordered child regardless of its parent.
 */
export interface OrderedEntry {
  id: number;
  content: string;
  orderIndex: number;
  createdAt: Date;
}

/**
 * One entry of a batch reorder: the child and the index it should take.
 */
export interface OrderMove {
  id: number;
  orderIndex: number;
}

export type SortOrder = 'asc' | 'desc';

export interface ProjectListQuery {
  page: number;
  pageSize: number;
  sort: SortOrder;
}

export interface ProjectPage {
  projects: Project[];
  total: number;
  page: number;
  pageSize: number;
}

/**
 * Identity returned by a verified Google ID token.
 */
export interface GoogleIdentity {
  googleId: string;
  email: string;
  name: string | null;
}

/**
 * Claims carried by an access token after verification.
 */
export interface AccessTokenClaims {
  sub: string;
  email: string;
  type: 'access';
  jti: string;
  iat: number;
  exp: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Resolved runtime settings. See settings.ts for sources and defaults.
 */
export interface Settings {
  server: {
    port: number;
    host: string;
    corsOrigins: string[];
    /** Adds Strict-Transport-Security; set from NODE_ENV=production */
    production: boolean;
  };
  database: {
    url: string | null;
    poolSize: number;
  };
  redis: {
    url: string | null;
  };
  auth: {
    jwtSecret: string;
    jwtExpiryHours: number;
    googleClientId: string | null;
    maxFailedAttempts: number;
    lockoutMinutes: number;
  };
  limits: {
    maxSpecificationsPerProject: number;
  };
  rateLimit: {
    requestsPerHour: number;
    authenticatePerHour: number;
  };
  cache: {
    projectTtlSeconds: number;
    specificationTtlSeconds: number;
    itemTtlSeconds: number;
  };
  logLevel: LogLevel;
}
