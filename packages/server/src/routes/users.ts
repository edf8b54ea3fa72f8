/**
 * User Routes
 *
 * Google sign-in exchange, profile and logout.
 */

import { Router } from 'express';
import { AuthenticateSchema, parseOrThrow } from '@specnest/core';
import type { AppContext } from '../context.js';
import { currentUser, requireAuth } from '../middleware/authenticate.js';
import { byIp, clientIp, rateLimit } from '../middleware/rate-limit.js';

export default function createUsersRouter(context: AppContext): Router {
  const router = Router();

  /**
   * POST /api/v1/users/authenticate
   * Body: { token } - a Google ID token
   */
  router.post(
    '/authenticate',
    rateLimit(context.limiters.authenticate, { subject: byIp }),
    async (req, res, next) => {
      try {
        const { token } = parseOrThrow(AuthenticateSchema, req.body);
        const result = await context.users.authenticate(token, clientIp(req));
        res.json({
          token: result.token.token,
          expiresAt: result.token.expiresAt,
          user: result.user,
        });
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * GET /api/v1/users/profile
   */
  router.get('/profile', requireAuth(), async (req, res, next) => {
    try {
      const user = await context.users.profile(currentUser(req).sub);
      res.json({ user });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/v1/users/logout
   * Revokes the presented token until it would have expired anyway.
   */
  router.post('/logout', requireAuth(), async (req, res, next) => {
    try {
      await context.users.logout(currentUser(req));
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
