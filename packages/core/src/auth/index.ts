export { TokenService } from './tokens.js';
export type { IssuedToken, TokenServiceOptions } from './tokens.js';
export { GoogleTokenVerifier, DisabledIdentityVerifier } from './google.js';
export type { IdentityVerifier, IdTokenClient } from './google.js';
export { LoginAttemptTracker } from './login-attempts.js';
export type { LoginAttemptOptions } from './login-attempts.js';
