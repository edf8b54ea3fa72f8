/**
 * Application Context
 *
 * Builds every long-lived dependency from resolved settings: storage,
 * shared cache/counters, auth and the services the routers call.
 */

import {
  AccessGuard,
  DisabledIdentityVerifier,
  GoogleTokenVerifier,
  InMemoryStore,
  ItemService,
  ListingCache,
  LoginAttemptTracker,
  PgConnectionSource,
  PostgresStore,
  ProjectService,
  RateLimiter,
  SpecificationService,
  TokenService,
  UserService,
  createMemoryBackend,
  createRedisBackend,
  logger,
} from '@specnest/core';
import type { HierarchyStore, IdentityVerifier, Settings, SharedBackend } from '@specnest/core';

const log = logger.scoped('context');

const HOUR_SECONDS = 3600;

export interface AppContext {
  settings: Settings;
  store: HierarchyStore;
  backend: SharedBackend;
  tokens: TokenService;
  users: UserService;
  projects: ProjectService;
  specifications: SpecificationService;
  items: ItemService;
  limiters: {
    api: RateLimiter;
    authenticate: RateLimiter;
  };
}

export interface ContextOverrides {
  store?: HierarchyStore;
  backend?: SharedBackend;
  verifier?: IdentityVerifier;
}

function createStore(settings: Settings): HierarchyStore {
  const limits = { maxSpecificationsPerProject: settings.limits.maxSpecificationsPerProject };
  if (settings.database.url) {
    return new PostgresStore(PgConnectionSource.fromUrl(settings.database.url, settings.database.poolSize), limits);
  }
  log.warn('DATABASE_URL not set, data is kept in memory only');
  return new InMemoryStore(limits);
}

function createBackend(settings: Settings): SharedBackend {
  if (settings.redis.url) {
    return createRedisBackend(settings.redis.url);
  }
  log.warn('REDIS_URL not set, cache and rate limits are per process');
  return createMemoryBackend();
}

function createVerifier(settings: Settings): IdentityVerifier {
  if (settings.auth.googleClientId) {
    return new GoogleTokenVerifier(settings.auth.googleClientId);
  }
  log.warn('GOOGLE_CLIENT_ID not set, sign-in is disabled');
  return new DisabledIdentityVerifier();
}

export function createContext(settings: Settings, overrides: ContextOverrides = {}): AppContext {
  const store = overrides.store ?? createStore(settings);
  const backend = overrides.backend ?? createBackend(settings);
  const verifier = overrides.verifier ?? createVerifier(settings);

  const cache = new ListingCache(backend.cache, settings.cache);
  const access = new AccessGuard(store);
  const tokens = new TokenService(backend.counters, {
    secret: settings.auth.jwtSecret,
    expiryHours: settings.auth.jwtExpiryHours,
  });
  const attempts = new LoginAttemptTracker(backend.counters, {
    maxFailures: settings.auth.maxFailedAttempts,
    lockoutSeconds: settings.auth.lockoutMinutes * 60,
  });

  return {
    settings,
    store,
    backend,
    tokens,
    users: new UserService(store, verifier, tokens, attempts),
    projects: new ProjectService(store, cache, access),
    specifications: new SpecificationService(store, cache, access),
    items: new ItemService(store, cache, access),
    limiters: {
      api: new RateLimiter(backend.counters, 'api', settings.rateLimit.requestsPerHour, HOUR_SECONDS),
      authenticate: new RateLimiter(
        backend.counters,
        'authenticate',
        settings.rateLimit.authenticatePerHour,
        HOUR_SECONDS
      ),
    },
  };
}

export async function closeContext(context: AppContext): Promise<void> {
  await Promise.all([context.store.close(), context.backend.close()]);
}
