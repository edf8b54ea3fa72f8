import { vi } from 'vitest';
import {
  AuthenticationError,
  InMemoryStore,
  createMemoryBackend,
  logger,
} from '@specnest/core';
import type { GoogleIdentity, Settings } from '@specnest/core';
import { createServer } from '../index.js';

export const TEST_SECRET = 'test-secret-test-secret-test-secret';

export function testSettings(overrides: Partial<Settings['rateLimit']> = {}, production = false): Settings {
  return {
    server: { port: 0, host: '127.0.0.1', corsOrigins: ['*'], production },
    database: { url: null, poolSize: 1 },
    redis: { url: null },
    auth: {
      jwtSecret: TEST_SECRET,
      jwtExpiryHours: 1,
      googleClientId: null,
      maxFailedAttempts: 5,
      lockoutMinutes: 15,
    },
    limits: { maxSpecificationsPerProject: 100 },
    rateLimit: { requestsPerHour: 1000, authenticatePerHour: 20, ...overrides },
    cache: { projectTtlSeconds: 300, specificationTtlSeconds: 120, itemTtlSeconds: 120 },
    logLevel: 'silent',
  };
}

/**
 * Accepts "valid:<googleId>" and rejects anything else.
 */
export function stubVerifier() {
  return {
    verify: vi.fn(async (idToken: string): Promise<GoogleIdentity> => {
      const match = /^valid:(.+)$/.exec(idToken);
      if (!match) {
        throw new AuthenticationError('Invalid Google token');
      }
      return { googleId: match[1], email: `${match[1]}@example.com`, name: null };
    }),
  };
}

export function buildApp(settings: Settings = testSettings()) {
  logger.setLevel('silent');
  const store = new InMemoryStore();
  const backend = createMemoryBackend();
  const verifier = stubVerifier();
  const { app, context } = createServer({ settings, overrides: { store, backend, verifier } });

  /** Bearer header for a user that exists in the store. */
  async function authHeader(googleId: string): Promise<string> {
    const user = await store.users.upsertFromGoogle({ googleId, email: `${googleId}@example.com`, name: null });
    const { token } = context.tokens.issue({ googleId: user.googleId, email: user.email });
    return `Bearer ${token}`;
  }

  return { app, context, store, backend, verifier, authHeader };
}
