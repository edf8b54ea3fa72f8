import type { IssuedToken, TokenService } from '../auth/tokens.js';
import type { IdentityVerifier } from '../auth/google.js';
import type { LoginAttemptTracker } from '../auth/login-attempts.js';
import { AuthenticationError, NotFoundError } from '../errors.js';
import { scoped } from '../logger.js';
import type { HierarchyStore } from '../repository/types.js';
import type { AccessTokenClaims, GoogleIdentity, User } from '../types/index.js';

const log = scoped('users');

export interface AuthenticationResult {
  user: User;
  token: IssuedToken;
}

export class UserService {
  constructor(
    private readonly store: HierarchyStore,
    private readonly verifier: IdentityVerifier,
    private readonly tokens: TokenService,
    private readonly attempts: LoginAttemptTracker
  ) {}

  /**
   * Exchange a Google ID token for an access token. `client` identifies the
   * caller for lockout purposes (the request IP).
   */
  async authenticate(idToken: string, client: string): Promise<AuthenticationResult> {
    const attempt = await this.attempts.begin(client);

    let identity: GoogleIdentity;
    try {
      identity = await this.verifier.verify(idToken);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        log.warn('authentication failed', { client, attempt, reason: error.message });
      } else {
        await this.attempts.release(client);
      }
      throw error;
    }

    await this.attempts.recordSuccess(client);
    const user = await this.store.users.upsertFromGoogle(identity);
    const token = this.tokens.issue({ googleId: user.googleId, email: user.email });
    log.info('authenticated', { user: user.googleId });
    return { user, token };
  }

  async profile(googleId: string): Promise<User> {
    const user = await this.store.users.findByGoogleId(googleId);
    if (!user) {
      throw new NotFoundError('User', googleId);
    }
    return user;
  }

  async logout(claims: AccessTokenClaims): Promise<void> {
    await this.tokens.revoke(claims);
    log.info('logged out', { user: claims.sub });
  }
}
