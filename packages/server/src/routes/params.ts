import type { Request, Response } from 'express';
import { IdParamSchema, ValidationError, validate } from '@specnest/core';
import type { CacheObserver } from '@specnest/core';

/**
 * Positive integer id from a path parameter.
 */
export function idParam(req: Request, name: string): number {
  const result = validate(IdParamSchema, req.params[name]);
  if (result.ok) {
    return result.value;
  }
  const issues = result.error.issues.map((issue) => ({ path: name, message: issue.message }));
  throw new ValidationError(issues.map((i) => `${i.path} ${i.message}`).join('; '), issues);
}

/** Reports a listing's cache outcome in the X-Cache header. */
export function cacheHeader(res: Response): CacheObserver {
  return (outcome) => {
    res.setHeader('X-Cache', outcome);
  };
}
