import type { Settings } from '@specnest/core';

export function baseSettings(): Settings {
  return {
    server: { port: 3000, host: 'localhost', corsOrigins: ['*'], production: false },
    database: { url: null, poolSize: 10 },
    redis: { url: null },
    auth: {
      jwtSecret: 'test-secret-test-secret-test-secret',
      jwtExpiryHours: 24,
      googleClientId: null,
      maxFailedAttempts: 5,
      lockoutMinutes: 15,
    },
    limits: { maxSpecificationsPerProject: 100 },
    rateLimit: { requestsPerHour: 1000, authenticatePerHour: 20 },
    cache: { projectTtlSeconds: 300, specificationTtlSeconds: 120, itemTtlSeconds: 120 },
    logLevel: 'info',
  };
}
