import type { RecallEvent } from '../types/events';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout recall.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'IndexingFinished', ... });
 *
 * // Standard logging
 * logger.info('Corpus rebuilt');
 * logger.error(new Error('Failed'), 'Embedding write failed');
 *
 * // Create a child logger with additional context
 * const runLogger = logger.child({ runId: '123' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured event.
   */
  log(event: RecallEvent): MaybePromise<void>;
  /**
   * High-signal trace event with a human-readable message.
   */
  trace(event: RecallEvent, message: string): MaybePromise<void>;
  /** Log a debug message (lowest priority, typically disabled in production) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   */
  error(error: Error, message?: string): MaybePromise<void>;
  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
