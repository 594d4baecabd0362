/**
 * Error codes used throughout embedcache.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'StoreUnavailable'
  | 'ComputationFailed'
  | 'IntegrityError'
  | 'RateLimitError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all embedcache errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('StoreUnavailable', 'batchGet failed', {
 *   cause: driverError,
 *   details: { namespace: 'emb_minilm_0f3a9c21d4e5b6a7' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration or call options are invalid.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when the backing key-value store cannot be reached or a
 * driver call fails. Never retried internally; the caller owns retry policy.
 */
export class StoreUnavailableError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('StoreUnavailable', message, options);
  }
}

/**
 * Error thrown when an embedding provider fails or returns malformed output.
 */
export class ComputationFailedError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ComputationFailed', message, options);
  }
}

/**
 * Error thrown when vector counts or byte lengths disagree with what the
 * namespace requires. Results are never padded or truncated to fit.
 */
export class IntegrityError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('IntegrityError', message, options);
  }
}

/**
 * Error thrown when rate limited by an API.
 * Includes optional retry-after information.
 */
export class RateLimitError extends AppError {
  /** Suggested wait time in seconds before retrying */
  public readonly retryAfter?: number;

  constructor(message: string, options: AppErrorOptions & { retryAfter?: number } = {}) {
    super('RateLimitError', message, options);
    this.retryAfter = options.retryAfter;
  }
}

/**
 * Returns true for errors the user can fix by changing input or configuration.
 */
export function isUserError(error: unknown): boolean {
  return error instanceof ConfigError || error instanceof UsageError;
}
