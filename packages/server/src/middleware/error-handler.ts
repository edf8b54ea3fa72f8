/**
 * Error Mapper
 *
 * Last stage of the chain. Domain errors become
 * { error: { code, message, details?, timestamp } } with their status;
 * anything else is logged and answered with a generic 500.
 */

import type { ErrorRequestHandler, RequestHandler } from 'express';
import { AccountLockedError, NotFoundError, RateLimitError, SpecnestError, logger } from '@specnest/core';
import type { ErrorCode } from '@specnest/core';

const log = logger.scoped('http');

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  VALIDATION_ERROR: 400,
  INVALID_POSITION: 400,
  INVALID_REORDER: 400,
  AUTH_ERROR: 401,
  ACCESS_DENIED: 403,
  NOT_FOUND: 404,
  CAPACITY_EXCEEDED: 409,
  ACCOUNT_LOCKED: 423,
  RATE_LIMITED: 429,
  SETTINGS_ERROR: 500,
};

export function statusFor(error: SpecnestError): number {
  return STATUS_BY_CODE[error.code];
}

// express.json() reports malformed bodies as a SyntaxError carrying status 400
function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'status' in error && error.status === 400;
}

export function notFoundHandler(): RequestHandler {
  return (req, _res, next) => {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
  };
}

export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const timestamp = new Date().toISOString();

    if (err instanceof SpecnestError) {
      const status = statusFor(err);
      if (err instanceof RateLimitError) {
        res.setHeader('Retry-After', String(err.resetSeconds));
      } else if (err instanceof AccountLockedError) {
        res.setHeader('Retry-After', String(err.retryAfterSeconds));
      }
      if (status >= 500) {
        log.error(err.message, { method: req.method, path: req.originalUrl, code: err.code });
      }
      res.status(status).json({
        error: { code: err.code, message: err.message, details: err.details, timestamp },
      });
      return;
    }

    if (isBodyParseError(err)) {
      res.status(400).json({
        error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body', timestamp },
      });
      return;
    }

    log.error('unhandled error', {
      method: req.method,
      path: req.originalUrl,
      error: err instanceof Error ? err.message : String(err),
    });
    res.status(500).json({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error', timestamp },
    });
  };
}
