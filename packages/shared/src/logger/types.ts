import type { CacheEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout embedcache.
 * Supports both structured cache events and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'CacheLookup', ... });
 *
 * // Standard logging
 * logger.info('Opened sqlite store');
 * logger.error(new Error('Failed'), 'batchGet failed');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ namespace: 'emb_minilm_0f3a9c21d4e5b6a7' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured cache event.
   * @param event - The event to log
   */
  log(event: CacheEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   * @param event - The event being traced
   * @param message - Human-readable description
   */
  trace(event: CacheEvent, message: string): MaybePromise<void>;

  /** Log a debug message (lowest priority, typically disabled in production) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
