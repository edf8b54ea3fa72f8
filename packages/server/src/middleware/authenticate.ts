/**
 * Authentication Middleware
 *
 * `identify` runs for every request and resolves a Bearer token into
 * req.auth; a bad token is kept on req.authError rather than failing public
 * routes. `requireAuth` guards the routers that need a user.
 */

import type { Request, RequestHandler } from 'express';
import { AuthenticationError } from '@specnest/core';
import type { AccessTokenClaims, TokenService } from '@specnest/core';

// Extend Express Request type
declare global {
  namespace Express {
    interface Request {
      auth?: AccessTokenClaims;
      authError?: AuthenticationError;
    }
  }
}

const BEARER = /^Bearer\s+(\S+)$/i;

export function identify(tokens: TokenService): RequestHandler {
  return async (req, _res, next) => {
    const header = req.headers.authorization;
    if (!header) {
      return next();
    }

    const token = BEARER.exec(header)?.[1];
    if (!token) {
      req.authError = new AuthenticationError('Malformed Authorization header');
      return next();
    }

    try {
      req.auth = await tokens.verify(token);
    } catch (error) {
      if (!(error instanceof AuthenticationError)) {
        return next(error);
      }
      req.authError = error;
    }
    next();
  };
}

export function requireAuth(): RequestHandler {
  return (req, _res, next) => {
    if (req.auth) {
      return next();
    }
    next(req.authError ?? new AuthenticationError('Missing authentication token'));
  };
}

/**
 * Claims of the authenticated caller; only valid behind requireAuth.
 */
export function currentUser(req: Request): AccessTokenClaims {
  if (!req.auth) {
    throw new AuthenticationError('Missing authentication token');
  }
  return req.auth;
}
