import type { LogkbEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout logkb.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ type: 'KnowledgeBaseBuildStarted', ... });
 *
 * // Standard logging
 * logger.info('Embedding 12 chunks');
 * logger.error(new Error('Failed'), 'Batch 3 failed');
 *
 * // Create a child logger with additional context
 * const issueLogger = logger.child({ issueId: 'INC-42' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured event.
   */
  log(event: LogkbEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   */
  trace(event: LogkbEvent, message: string): MaybePromise<void>;

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
   * Create a child logger whose human-readable messages carry the bindings
   * as a `[key=value ...]` prefix.
   */
  child(bindings: Record<string, unknown>): Logger;
}
