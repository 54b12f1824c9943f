/**
 * Error codes used throughout constify.
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
  | 'ScanError'
  | 'CommitError'
  | 'ValidationError'
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
 * Base error class for all constify errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ProviderError', 'Rewrite request failed', {
 *   cause: originalError,
 *   details: { status: 500, path: 'src/Main.java' }
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
 * Error thrown when CLI usage is incorrect, including a missing source root.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when the rewrite service fails.
 * May be retryable depending on the underlying cause.
 */
export class ProviderError extends AppError {
  /** HTTP status reported by the service, when there was a response */
  public readonly status?: number;
  /** Set when the adapter already knows whether another attempt can help */
  public readonly retryable?: boolean;

  constructor(
    message: string,
    options: AppErrorOptions & { status?: number; retryable?: boolean } = {},
  ) {
    super('ProviderError', message, options);
    this.status = options.status;
    this.retryable = options.retryable;
  }
}

/**
 * Error thrown when rate limited by the rewrite service.
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
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * Error raised when a source file cannot be read for scanning.
 */
export class ScanError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ScanError', message, options);
  }
}

/**
 * Error thrown when rewritten content cannot be committed to disk.
 * The original file is left intact whenever this is raised.
 */
export class CommitError extends AppError {
  /** The path that was being committed */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('CommitError', message, options);
    this.path = path;
  }
}

/**
 * Error raised when rewritten output is rejected by the validation policy.
 */
export class ValidationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ValidationError', message, options);
  }
}

/**
 * Best-effort message extraction for values caught in `catch` blocks.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
