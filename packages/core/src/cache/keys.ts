import { CACHE_KEY_PREFIX, TOKEN_BLACKLIST_PREFIX } from '../constants.js';

export const cacheKeys = {
  items: (specId: number) => `${CACHE_KEY_PREFIX}:items:${specId}`,
  specifications: (projectId: number) => `${CACHE_KEY_PREFIX}:specs:${projectId}`,
  projects: (ownerId: string) => `${CACHE_KEY_PREFIX}:projects:${ownerId}`,
  blacklist: (jti: string) => `${CACHE_KEY_PREFIX}:${TOKEN_BLACKLIST_PREFIX}:${jti}`,
  authFailures: (identity: string) => `${CACHE_KEY_PREFIX}:auth-failures:${identity}`,
  rateLimit: (bucket: string, subject: string) => `${CACHE_KEY_PREFIX}:ratelimit:${bucket}:${subject}`,
};
