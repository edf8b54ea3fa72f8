import { homedir } from 'os';
import { join } from 'path';
import { readFile } from 'fs/promises';
import { randomBytes } from 'crypto';
import { z } from 'zod';
import {
  DEFAULT_MAX_SPECIFICATIONS_PER_PROJECT,
  MIN_JWT_SECRET_LENGTH,
} from './constants.js';
import { SettingsError } from './errors.js';
import { scoped } from './logger.js';
import { toFieldIssues } from './validation/schemas.js';
import type { Settings } from './types/index.js';

const log = scoped('settings');

/**
 * Get the specnest directory path (~/.specnest)
 * Computed lazily to allow for testing
 */
export function getSpecnestDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.SPECNEST_HOME;
  if (override && override.trim().length > 0) {
    return override;
  }
  return join(homedir(), '.specnest');
}

/**
 * Get the settings file path (~/.specnest/config.json)
 */
export function getSettingsFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getSpecnestDir(env), 'config.json');
}

const positiveInt = () => z.coerce.number().int().positive();

const SettingsSchema = z.object({
  server: z
    .object({
      port: z.coerce.number().int().min(1).max(65535).default(3000),
      host: z.string().min(1).default('localhost'),
      corsOrigins: z.array(z.string().min(1)).min(1).default(['*']),
      production: z.boolean().default(false),
    })
    .default({}),
  database: z
    .object({
      url: z.string().url().nullable().default(null),
      poolSize: positiveInt().default(10),
    })
    .default({}),
  redis: z
    .object({
      url: z.string().url().nullable().default(null),
    })
    .default({}),
  auth: z.object({
    jwtSecret: z
      .string({ required_error: 'is required' })
      .min(MIN_JWT_SECRET_LENGTH, `must be at least ${MIN_JWT_SECRET_LENGTH} characters`),
    jwtExpiryHours: z.coerce.number().positive().default(24),
    googleClientId: z.string().min(1).nullable().default(null),
    maxFailedAttempts: positiveInt().default(5),
    lockoutMinutes: positiveInt().default(15),
  }),
  limits: z
    .object({
      maxSpecificationsPerProject: positiveInt().default(DEFAULT_MAX_SPECIFICATIONS_PER_PROJECT),
    })
    .default({}),
  rateLimit: z
    .object({
      requestsPerHour: positiveInt().default(1000),
      authenticatePerHour: positiveInt().default(20),
    })
    .default({}),
  cache: z
    .object({
      projectTtlSeconds: positiveInt().default(300),
      specificationTtlSeconds: positiveInt().default(120),
      itemTtlSeconds: positiveInt().default(120),
    })
    .default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

type Tree = { [key: string]: unknown };

function isTree(value: unknown): value is Tree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Later sources win; unset and empty values never override
function merge(base: Tree, overrides: Tree): Tree {
  const result: Tree = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined || value === '') continue;
    const current = result[key];
    if (isTree(value)) {
      result[key] = merge(isTree(current) ? current : {}, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function fromEnv(env: NodeJS.ProcessEnv): Tree {
  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      corsOrigins: env.CORS_ORIGINS
        ? env.CORS_ORIGINS.split(',')
            .map((origin) => origin.trim())
            .filter((origin) => origin.length > 0)
        : undefined,
      production: env.NODE_ENV === 'production' ? true : undefined,
    },
    database: { url: env.DATABASE_URL, poolSize: env.DATABASE_POOL_SIZE },
    redis: { url: env.REDIS_URL },
    auth: {
      jwtSecret: env.JWT_SECRET,
      jwtExpiryHours: env.JWT_EXPIRY_HOURS,
      googleClientId: env.GOOGLE_CLIENT_ID,
    },
    limits: { maxSpecificationsPerProject: env.SPECNEST_MAX_SPECIFICATIONS_PER_PROJECT },
    rateLimit: { requestsPerHour: env.RATE_LIMIT_PER_HOUR },
    logLevel: env.SPECNEST_DEBUG === '1' ? 'debug' : env.SPECNEST_LOG_LEVEL?.toLowerCase(),
  };
}

async function readSettingsFile(path: string): Promise<Tree> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    // File doesn't exist - nothing to merge
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    if (isTree(parsed)) {
      return parsed;
    }
    log.warn('settings file is not a JSON object, ignoring', { path });
  } catch (error) {
    log.warn('could not parse settings file, ignoring', {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return {};
}

/**
 * Resolve settings from ~/.specnest/config.json overlaid with environment
 * variables. Throws SettingsError listing every invalid value.
 *
 * Outside production a missing JWT_SECRET is replaced by a random one, so
 * tokens do not survive a restart.
 */
export async function loadSettings(env: NodeJS.ProcessEnv = process.env): Promise<Settings> {
  const file = await readSettingsFile(getSettingsFilePath(env));
  const merged = merge(file, fromEnv(env));

  const auth = isTree(merged.auth) ? merged.auth : {};
  if (auth.jwtSecret === undefined && env.NODE_ENV !== 'production') {
    log.warn('JWT_SECRET not set, using an ephemeral secret');
    merged.auth = { ...auth, jwtSecret: randomBytes(MIN_JWT_SECRET_LENGTH).toString('hex') };
  }

  const result = SettingsSchema.safeParse(merged);
  if (!result.success) {
    throw new SettingsError(toFieldIssues(result.error));
  }
  return result.data;
}

/**
 * Settings with secrets masked, for display.
 */
export function redactSettings(settings: Settings): Settings {
  const mask = (value: string | null): string | null => (value === null ? null : '********');
  return {
    ...settings,
    database: { ...settings.database, url: settings.database.url === null ? null : redactUrl(settings.database.url) },
    redis: { url: settings.redis.url === null ? null : redactUrl(settings.redis.url) },
    auth: { ...settings.auth, jwtSecret: '********', googleClientId: mask(settings.auth.googleClientId) },
  };
}

function redactUrl(raw: string): string {
  try {
    const url = new URL(raw);
    if (url.password) {
      url.password = '****';
    }
    return url.toString();
  } catch {
    return '********';
  }
}
