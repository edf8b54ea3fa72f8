/**
 * Health Route
 *
 * Liveness plus a check of each backing service. Not rate limited and
 * needs no token.
 */

import { Router } from 'express';
import { APP_VERSION } from '@specnest/core';
import type { AppContext } from '../context.js';

export default function createHealthRouter(context: AppContext): Router {
  const router = Router();

  /**
   * GET /api/v1/health
   */
  router.get('/', async (_req, res, next) => {
    try {
      const [database, cache] = await Promise.all([context.store.ping(), context.backend.ping()]);
      const healthy = database && cache;
      res.status(healthy ? 200 : 503).json({
        status: healthy ? 'ok' : 'degraded',
        version: APP_VERSION,
        checks: {
          database: database ? 'ok' : 'unavailable',
          cache: cache ? 'ok' : 'unavailable',
        },
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
