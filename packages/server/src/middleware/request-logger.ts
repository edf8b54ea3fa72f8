import type { RequestHandler } from 'express';
import { logger } from '@specnest/core';

const log = logger.scoped('http');

/**
 * Logs one line per finished request: method, path, status, duration, the
 * authenticated user when there is one and the request id.
 */
export function requestLogger(): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      const user = req.auth?.sub ?? '-';
      log.info(`${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms ${user}`, {
        requestId: req.requestId,
      });
    });
    next();
  };
}
