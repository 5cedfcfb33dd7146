/**
 * Error codes used throughout recall.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'StoreError'
  | 'CorpusReadError'
  | 'SerializationError'
  | 'ItemPersistenceError'
  | 'IndexingCancelled'
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
 * Base error class for all recall errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('StoreError', 'Message store is closed', {
 *   details: { dbPath: '/tmp/messages.sqlite' }
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
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when a caller passes bad arguments.
 * User-correctable - suggests correct usage.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when the message store is misused or unavailable.
 */
export class StoreError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('StoreError', message, options);
  }
}

/**
 * Error thrown when messages cannot be enumerated for an indexing run.
 * Fatal to the current run only.
 */
export class CorpusReadError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('CorpusReadError', message, options);
  }
}

/**
 * Error raised when a stored vector cannot be decoded.
 */
export class SerializationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SerializationError', message, options);
  }
}

/**
 * Error wrapping a single message that could not be embedded or written.
 * The message stays un-embedded and is retried on the next run.
 */
export class ItemPersistenceError extends AppError {
  /** Id of the message that failed */
  public readonly messageId: string;

  constructor(messageId: string, message: string, options: AppErrorOptions = {}) {
    super('ItemPersistenceError', `Message "${messageId}": ${message}`, options);
    this.messageId = messageId;
  }
}

/**
 * Raised at a batch boundary when an indexing run was asked to stop.
 */
export class IndexingCancelledError extends AppError {
  /** Messages persisted before the run stopped */
  public readonly processed: number;

  constructor(processed: number, options: AppErrorOptions = {}) {
    super('IndexingCancelled', `Indexing cancelled after ${processed} messages`, options);
    this.processed = processed;
  }
}

/**
 * Extracts a readable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
