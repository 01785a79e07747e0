/**
 * Error codes used throughout treescout.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Session and per-entry errors (exit code 1)
  | 'InvalidRoot'
  | 'InvalidQuery'
  | 'InvalidState'
  | 'AccessDenied'
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
 * Base error class for all treescout errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('InvalidRoot', 'Search root does not exist', {
 *   cause: originalError,
 *   details: { root: '/missing' },
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
 * Error thrown when configuration is invalid.
 * User-correctable - suggests fixing configuration files or flags.
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
 * Error thrown when the search root is missing or is not a directory.
 * Fails the whole session.
 */
export class InvalidRootError extends AppError {
  /** The root path that was rejected */
  public readonly root: string;

  constructor(root: string, message: string, options: AppErrorOptions = {}) {
    super('InvalidRoot', message, { ...options, details: options.details ?? { root } });
    this.root = root;
  }
}

/**
 * Error thrown when a query cannot be compiled (empty text, malformed regex,
 * unknown type category).
 */
export class InvalidQueryError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('InvalidQuery', message, options);
  }
}

/**
 * Error thrown on an illegal session lifecycle transition.
 */
export class InvalidStateError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('InvalidState', message, options);
  }
}

/**
 * Error for a single entry that could not be read because of permissions.
 * Recorded as a diagnostic; never aborts a session.
 */
export class AccessDeniedError extends AppError {
  public readonly path: string;

  constructor(path: string, options: AppErrorOptions = {}) {
    super('AccessDenied', `Access denied: ${path}`, options);
    this.path = path;
  }
}

/**
 * Maps an error to the process exit code the CLI reports.
 */
export function exitCodeForError(error: unknown): number {
  if (error instanceof ConfigError || error instanceof UsageError) {
    return 2;
  }
  return 1;
}

/**
 * Extracts the errno code (`ENOENT`, `EACCES`, ...) from a Node.js system error.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
