// =============================================================================
// Service Errors
// =============================================================================

export type ErrorKind = 'validation' | 'not_found' | 'storage' | 'config';

export class ServiceError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly kind: ErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ServiceError';
  }
}

/**
 * Caller passed something outside the documented input range
 */
export class ValidationError extends ServiceError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 400, 'validation');
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ServiceError {
  constructor(message: string) {
    super(message, 404, 'not_found');
    this.name = 'NotFoundError';
  }
}

/**
 * Persistence failure (connection, disk full, constraint).
 * The batch that triggered it was not applied.
 */
export class StoreError extends ServiceError {
  constructor(message: string, cause?: unknown) {
    super(message, 503, 'storage', { cause });
    this.name = 'StoreError';
  }
}

export class ConfigError extends ServiceError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 500, 'config');
    this.name = 'ConfigError';
  }
}

export function requireNonNegativeInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative integer, got ${value}`);
  }
}

export function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`);
  }
}
