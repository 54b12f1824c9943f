import type { ConstifyEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout constify.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'RunStarted', ... });
 *
 * // Standard logging
 * logger.info('Processing completed');
 * logger.error(new Error('Failed'), 'Commit failed');
 *
 * // Create a child logger with additional context
 * const fileLogger = logger.child({ file: 'src/Main.java' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured event.
   */
  log(event: ConstifyEvent): MaybePromise<void>;

  /** Log a debug message (lowest priority, typically disabled in production) */
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
