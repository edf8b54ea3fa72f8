/**
 * Access Tokens
 *
 * HS256 JWTs carrying the user's Google id as `sub`. Revocation writes the
 * token's `jti` to the shared counter store until the token would have
 * expired anyway.
 */

import { randomUUID } from 'crypto';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { ACCESS_TOKEN_TYPE } from '../constants.js';
import { cacheKeys } from '../cache/keys.js';
import type { CounterStore } from '../cache/types.js';
import { AuthenticationError } from '../errors.js';
import { scoped } from '../logger.js';
import type { AccessTokenClaims } from '../types/index.js';

const log = scoped('tokens');

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
  type: z.literal(ACCESS_TOKEN_TYPE),
  jti: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
});

export interface IssuedToken {
  token: string;
  expiresAt: Date;
  claims: AccessTokenClaims;
}

export interface TokenServiceOptions {
  secret: string;
  expiryHours: number;
}

export class TokenService {
  constructor(
    private readonly counters: CounterStore,
    private readonly options: TokenServiceOptions
  ) {}

  issue(subject: { googleId: string; email: string }): IssuedToken {
    const token = jwt.sign({ email: subject.email, type: ACCESS_TOKEN_TYPE, jti: randomUUID() }, this.options.secret, {
      algorithm: 'HS256',
      subject: subject.googleId,
      expiresIn: Math.round(this.options.expiryHours * 3600),
    });
    const claims = this.decode(jwt.decode(token));
    return { token, expiresAt: new Date(claims.exp * 1000), claims };
  }

  async verify(token: string): Promise<AccessTokenClaims> {
    let payload: unknown;
    try {
      payload = jwt.verify(token, this.options.secret, { algorithms: ['HS256'] });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new AuthenticationError('Token has expired');
      }
      log.debug('rejected token', { reason: error instanceof Error ? error.message : String(error) });
      throw new AuthenticationError();
    }

    const claims = this.decode(payload);
    if (await this.counters.hasFlag(cacheKeys.blacklist(claims.jti))) {
      throw new AuthenticationError('Token has been revoked');
    }
    return claims;
  }

  async revoke(claims: AccessTokenClaims): Promise<void> {
    const remaining = claims.exp - Math.floor(Date.now() / 1000);
    if (remaining <= 0) return;
    await this.counters.setFlag(cacheKeys.blacklist(claims.jti), remaining);
    log.info('revoked token', { sub: claims.sub, ttl: remaining });
  }

  private decode(payload: unknown): AccessTokenClaims {
    const parsed = ClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AuthenticationError('Invalid token claims');
    }
    return parsed.data;
  }
}
