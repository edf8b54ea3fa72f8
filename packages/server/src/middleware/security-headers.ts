import type { RequestHandler } from 'express';

const BASE_HEADERS: Readonly<Record<string, string>> = {
  'Content-Security-Policy': "default-src 'self'; script-src 'self'; style-src 'self'; img-src 'self' data:; font-src 'self'",
  'X-Content-Type-Options': 'nosniff',
  'X-Frame-Options': 'DENY',
  'X-XSS-Protection': '1; mode=block',
  'Referrer-Policy': 'strict-origin-when-cross-origin',
  'Permissions-Policy': 'geolocation=(), microphone=(), camera=()',
};

const HSTS = 'max-age=31536000; includeSubDomains';

export interface SecurityHeaderOptions {
  /** Adds Strict-Transport-Security */
  production: boolean;
}

/**
 * Sets the fixed security headers on every response, error responses
 * included.
 */
export function securityHeaders(options: SecurityHeaderOptions): RequestHandler {
  const headers: Record<string, string> = { ...BASE_HEADERS };
  if (options.production) {
    headers['Strict-Transport-Security'] = HSTS;
  }
  return (_req, res, next) => {
    for (const [name, value] of Object.entries(headers)) {
      res.setHeader(name, value);
    }
    next();
  };
}
