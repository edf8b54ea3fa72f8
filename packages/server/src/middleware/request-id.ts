import type { RequestHandler } from 'express';
import { randomUUID } from 'crypto';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export const REQUEST_ID_HEADER = 'X-Request-ID';

// Caller-supplied ids are echoed back, so keep them to a safe token
const ACCEPTED_ID = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Correlates a request with its log line: reuses the caller's X-Request-ID
 * when it is a plain token, otherwise generates one, and echoes it back.
 */
export function requestId(): RequestHandler {
  return (req, res, next) => {
    const incoming = req.get(REQUEST_ID_HEADER);
    const id = incoming !== undefined && ACCEPTED_ID.test(incoming) ? incoming : randomUUID();
    req.requestId = id;
    res.setHeader(REQUEST_ID_HEADER, id);
    next();
  };
}
