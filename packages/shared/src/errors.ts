export type ErrorCode =
  | 'ConfigError'
  | 'UsageError'
  | 'StoreError'
  | 'RateLimitError'
  | 'TimeoutError'
  | 'UnknownError';

/** Codes the user fixes by editing the configuration or the command line. */
const USER_CORRECTABLE: ReadonlySet<ErrorCode> = new Set(['ConfigError', 'UsageError']);

export interface AppErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown> | string;
}

/**
 * Base class of every error contentbench throws on purpose.
 *
 * `exitCode` is what the CLI exits with when the error reaches the top:
 * 2 for configuration and usage problems, 1 for failures at run time.
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown> | string;
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }

  get exitCode(): number {
    return USER_CORRECTABLE.has(this.code) ? 2 : 1;
  }
}

/** Invalid or missing configuration, including missing credentials. */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/** Unknown ids or options on the command line. */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * A result store file is missing, unreadable or does not match its schema.
 */
export class StoreError extends AppError {
  public readonly filePath?: string;

  constructor(message: string, options: AppErrorOptions & { filePath?: string } = {}) {
    super('StoreError', message, options);
    this.filePath = options.filePath;
  }
}

/** HTTP 429 from a provider; always retried. */
export class RateLimitError extends AppError {
  /** Seconds, from the provider's Retry-After header when it sent one */
  public readonly retryAfter?: number;

  constructor(message: string, options: AppErrorOptions & { retryAfter?: number } = {}) {
    super('RateLimitError', message, options);
    this.retryAfter = options.retryAfter;
  }
}

export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/** A model id or provider type that the registry cannot resolve. */
export class RegistryError extends ConfigError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
