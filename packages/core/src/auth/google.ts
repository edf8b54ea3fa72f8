/**
 * Google Sign-In
 *
 * Verifies Google ID tokens against the configured OAuth client id.
 */

import { OAuth2Client } from 'google-auth-library';
import type { TokenPayload } from 'google-auth-library';
import { AuthenticationError } from '../errors.js';
import { scoped } from '../logger.js';
import type { GoogleIdentity } from '../types/index.js';

const log = scoped('google-auth');

export interface IdentityVerifier {
  verify(idToken: string): Promise<GoogleIdentity>;
}

/**
 * The part of OAuth2Client the verifier calls.
 */
export interface IdTokenClient {
  verifyIdToken(options: { idToken: string; audience: string }): Promise<{ getPayload(): TokenPayload | undefined }>;
}

export class GoogleTokenVerifier implements IdentityVerifier {
  private readonly client: IdTokenClient;

  constructor(private readonly clientId: string, client?: IdTokenClient) {
    this.client = client ?? new OAuth2Client(clientId);
  }

  async verify(idToken: string): Promise<GoogleIdentity> {
    let payload: TokenPayload | undefined;
    try {
      const ticket = await this.client.verifyIdToken({ idToken, audience: this.clientId });
      payload = ticket.getPayload();
    } catch (error) {
      log.debug('verification failed', { reason: error instanceof Error ? error.message : String(error) });
      throw new AuthenticationError('Invalid Google token');
    }

    if (!payload?.sub || !payload.email) {
      throw new AuthenticationError('Google token is missing required claims');
    }
    if (payload.email_verified !== true) {
      throw new AuthenticationError('Google account e-mail is not verified');
    }
    return { googleId: payload.sub, email: payload.email, name: payload.name ?? null };
  }
}

/**
 * Used when GOOGLE_CLIENT_ID is not configured.
 */
export class DisabledIdentityVerifier implements IdentityVerifier {
  async verify(): Promise<GoogleIdentity> {
    throw new AuthenticationError('Google sign-in is not configured');
  }
}
