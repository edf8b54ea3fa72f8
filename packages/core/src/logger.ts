/**
 * Specnest Logger
 *
 * Centralized logger with levels, optional scoping and key=value fields.
 * Env configuration:
 * - SPECNEST_LOG_LEVEL: debug | info | warn | error | silent (default: info)
 * - SPECNEST_DEBUG=1 implies debug level
 */

import type { LogLevel } from './types/index.js';

export type { LogLevel };

export type LogFields = Record<string, string | number | boolean | null | undefined>;

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 90,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

function resolveInitialLevel(): LogLevel {
  if (process.env.SPECNEST_DEBUG === '1') return 'debug';
  const env = (process.env.SPECNEST_LOG_LEVEL || '').toLowerCase();
  return isLogLevel(env) ? env : 'info';
}

let currentLevel: LogLevel = resolveInitialLevel();

export function setLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return currentLevel !== 'silent' && LEVELS[level] >= LEVELS[currentLevel];
}

export function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const text = String(value);
    parts.push(/\s/.test(text) ? `${key}="${text}"` : `${key}=${text}`);
  }
  return parts.length > 0 ? ' ' + parts.join(' ') : '';
}

function format(msg: string, scope?: string, fields?: LogFields): string {
  return (scope ? `[${scope}] ` : '') + msg + formatFields(fields);
}

export function debug(msg: string, scope?: string, fields?: LogFields): void {
  if (!shouldLog('debug')) return;
  // eslint-disable-next-line no-console
  console.debug(format(msg, scope, fields));
}

export function info(msg: string, scope?: string, fields?: LogFields): void {
  if (!shouldLog('info')) return;
  // eslint-disable-next-line no-console
  console.log(format(msg, scope, fields));
}

export function warn(msg: string, scope?: string, fields?: LogFields): void {
  if (!shouldLog('warn')) return;
  // eslint-disable-next-line no-console
  console.warn(format(msg, scope, fields));
}

export function error(msg: string, scope?: string, fields?: LogFields): void {
  if (!shouldLog('error')) return;
  // eslint-disable-next-line no-console
  console.error(format(msg, scope, fields));
}

export interface ScopedLogger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

export function scoped(scope: string): ScopedLogger {
  return {
    debug: (msg, fields) => debug(msg, scope, fields),
    info: (msg, fields) => info(msg, scope, fields),
    warn: (msg, fields) => warn(msg, scope, fields),
    error: (msg, fields) => error(msg, scope, fields),
  };
}
