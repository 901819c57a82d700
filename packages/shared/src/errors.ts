/**
 * Error codes used throughout logkb.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ProviderError'
  | 'RateLimitError'
  | 'TimeoutError'
  | 'ModelMismatchError'
  | 'ConsistencyViolation'
  | 'BuildFailure'
  | 'BuildCancelled'
  | 'StorageError'
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
 * Base error class for all logkb errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ProviderError', 'Embedding request failed', {
 *   cause: originalError,
 *   details: { statusCode: 500, modelId: 'openai:text-embedding-3-small:1536' }
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
 * Invalid or missing configuration: chunking parameters, `topK`, model ids.
 * Raised before a build or query is attempted.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when an embedding provider fails.
 * May be retryable depending on the underlying cause.
 */
export class ProviderError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ProviderError', message, options);
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
 * Error thrown when a single provider call exceeds its time budget.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * Vectors or queries that disagree with the embedding model backing an index.
 */
export class ModelMismatchError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ModelMismatchError', message, options);
  }
}

/**
 * Raised when an issue has no committed knowledge base to query yet.
 */
export class KnowledgeBaseNotFoundError extends ModelMismatchError {
  public readonly issueId: string;

  constructor(issueId: string, options: AppErrorOptions = {}) {
    super(`No knowledge base has been built for issue "${issueId}" yet.`, options);
    this.issueId = issueId;
  }
}

/**
 * A cache write that disagrees with the vector already stored for the same
 * (contentHash, modelId) key.
 */
export class ConsistencyViolationError extends AppError {
  public readonly contentHash: string;
  public readonly modelId: string;

  constructor(contentHash: string, modelId: string, options: AppErrorOptions = {}) {
    super(
      'ConsistencyViolation',
      `Refusing to overwrite cached embedding ${contentHash.slice(0, 12)} for model "${modelId}" with a different vector.`,
      options,
    );
    this.contentHash = contentHash;
    this.modelId = modelId;
  }
}

/**
 * Error thrown when a file or directory of the workspace cannot be read or written.
 */
export class StorageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('StorageError', message, options);
  }
}

/**
 * Error thrown when an issue workspace does not exist.
 */
export class IssueNotFoundError extends StorageError {
  public readonly issueId: string;

  constructor(issueId: string, options: AppErrorOptions = {}) {
    super(`Issue "${issueId}" does not exist.`, options);
    this.issueId = issueId;
  }
}

/**
 * Aggregate failure of a knowledge base build. Nothing was committed; the
 * report tells the caller how much failed so it can decide to retry.
 */
export class BuildFailureError<TReport = unknown> extends AppError {
  public readonly report: TReport;

  constructor(message: string, report: TReport, options: AppErrorOptions = {}) {
    super('BuildFailure', message, options);
    this.report = report;
  }
}

/**
 * A build stopped between batches because its abort signal fired.
 */
export class BuildCancelledError<TReport = unknown> extends AppError {
  public readonly report: TReport;

  constructor(message: string, report: TReport, options: AppErrorOptions = {}) {
    super('BuildCancelled', message, options);
    this.report = report;
  }
}
