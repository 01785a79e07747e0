import type { SearchEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout treescout.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'SessionStarted', ... });
 *
 * // Standard logging
 * logger.info('Search completed');
 * logger.error(new Error('Failed'), 'Session failed');
 *
 * // Create a child logger with additional context
 * const sessionLogger = logger.child({ session: 'a1b2' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured search event.
   */
  log(event: SearchEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   */
  trace(event: SearchEvent, message: string): MaybePromise<void>;

  /** Log a debug message (lowest priority, typically disabled) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
