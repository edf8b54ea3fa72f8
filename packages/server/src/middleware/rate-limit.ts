import type { Request, RequestHandler } from 'express';
import { RateLimitError, logger } from '@specnest/core';
import type { RateLimitDecision, RateLimiter } from '@specnest/core';

const log = logger.scoped('rate-limit');

export interface RateLimitOptions {
  subject(req: Request): string;
  exempt?(req: Request): boolean;
}

export function clientIp(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

/** Authenticated callers are limited per user, anonymous ones per IP. */
export function userOrIp(req: Request): string {
  return req.auth ? `user:${req.auth.sub}` : `ip:${clientIp(req)}`;
}

export function byIp(req: Request): string {
  return `ip:${clientIp(req)}`;
}

/**
 * Fixed-window limit with X-RateLimit-* headers. When the counter store is
 * unreachable the request goes through.
 */
export function rateLimit(limiter: RateLimiter, options: RateLimitOptions): RequestHandler {
  return async (req, res, next) => {
    if (options.exempt?.(req)) {
      return next();
    }

    let decision: RateLimitDecision;
    try {
      decision = await limiter.consume(options.subject(req));
    } catch (error) {
      log.warn('counter store unavailable, allowing request', {
        error: error instanceof Error ? error.message : String(error),
      });
      return next();
    }

    res.setHeader('X-RateLimit-Limit', String(decision.limit));
    res.setHeader('X-RateLimit-Remaining', String(decision.remaining));
    res.setHeader('X-RateLimit-Reset', String(decision.resetSeconds));

    if (!decision.allowed) {
      return next(new RateLimitError(decision.limit, decision.resetSeconds));
    }
    next();
  };
}
