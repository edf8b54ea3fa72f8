import type { ChildKind } from './types/index.js';

export type ErrorCode =
  | 'CAPACITY_EXCEEDED'
  | 'INVALID_POSITION'
  | 'INVALID_REORDER'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'ACCESS_DENIED'
  | 'AUTH_ERROR'
  | 'ACCOUNT_LOCKED'
  | 'RATE_LIMITED'
  | 'SETTINGS_ERROR';

// Base class for every error the domain raises on purpose
export class SpecnestError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SpecnestError';
  }
}

export class CapacityExceededError extends SpecnestError {
  constructor(public readonly kind: ChildKind, public readonly maxAllowed: number) {
    super(
      'CAPACITY_EXCEEDED',
      kind === 'item'
        ? `Maximum number of items (${maxAllowed}) reached for specification`
        : `Maximum number of specifications (${maxAllowed}) reached for project`,
      { kind, maxAllowed }
    );
    this.name = 'CapacityExceededError';
  }
}

export class InvalidPositionError extends SpecnestError {
  constructor(public readonly position: number, public readonly maxPosition: number) {
    super('INVALID_POSITION', `Position ${position} is outside [0, ${maxPosition}]`, {
      position,
      maxPosition,
    });
    this.name = 'InvalidPositionError';
  }
}

export class InvalidReorderError extends SpecnestError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REORDER', message, details);
    this.name = 'InvalidReorderError';
  }
}

export class NotFoundError extends SpecnestError {
  constructor(public readonly resource: string, public readonly id: number | string) {
    super('NOT_FOUND', `${resource} ${id} not found`, { resource, id });
    this.name = 'NotFoundError';
  }
}

export interface FieldIssue {
  path: string;
  message: string;
}

export class ValidationError extends SpecnestError {
  constructor(message: string, public readonly issues: FieldIssue[] = []) {
    super('VALIDATION_ERROR', message, issues.length > 0 ? { issues } : undefined);
    this.name = 'ValidationError';
  }
}

export class AccessDeniedError extends SpecnestError {
  constructor(message = 'Access denied to project') {
    super('ACCESS_DENIED', message);
    this.name = 'AccessDeniedError';
  }
}

export class AuthenticationError extends SpecnestError {
  constructor(message = 'Invalid or expired authentication token') {
    super('AUTH_ERROR', message);
    this.name = 'AuthenticationError';
  }
}

export class AccountLockedError extends SpecnestError {
  constructor(public readonly retryAfterSeconds: number) {
    super('ACCOUNT_LOCKED', 'Account temporarily locked due to multiple failed attempts', {
      retryAfterSeconds,
    });
    this.name = 'AccountLockedError';
  }
}

export class RateLimitError extends SpecnestError {
  constructor(public readonly limit: number, public readonly resetSeconds: number) {
    super('RATE_LIMITED', 'Rate limit exceeded. Please try again later', { limit, resetSeconds });
    this.name = 'RateLimitError';
  }
}

export class SettingsError extends SpecnestError {
  constructor(public readonly issues: FieldIssue[]) {
    super(
      'SETTINGS_ERROR',
      `Invalid settings: ${issues.map((i) => `${i.path} ${i.message}`).join('; ')}`,
      { issues }
    );
    this.name = 'SettingsError';
  }
}

// Error codes we might receive from PostgreSQL
export const PG_ERROR_CODES = {
  UNIQUE_VIOLATION: '23505',
  FOREIGN_KEY_VIOLATION: '23503',
  NOT_NULL_VIOLATION: '23502',
} as const;
