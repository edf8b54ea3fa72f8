// Re-export all types
export * from './types/index.js';

// Constants and errors
export * from './constants.js';
export * from './errors.js';

// Settings
export { loadSettings, redactSettings, getSpecnestDir, getSettingsFilePath } from './settings.js';

// Logger
export * as logger from './logger.js';

// Ordering engine
export * from './ordering/index.js';

// Validation
export * from './validation/schemas.js';

// Storage
export * from './repository/index.js';

// Cache and shared counters
export * from './cache/index.js';
export * from './ratelimit/index.js';

// Auth
export * from './auth/index.js';

// Services
export * from './services/index.js';
