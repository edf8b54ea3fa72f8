export { RateLimiter } from './rate-limiter.js';
export type { RateLimitDecision } from './rate-limiter.js';
