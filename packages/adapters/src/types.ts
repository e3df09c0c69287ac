import type { Logger } from '@contentbench/shared';

/**
 * Configuration options for retry behavior on transient failures.
 *
 * These options control how provider API calls are retried when encountering
 * rate limits, timeouts, or server errors.
 *
 * @example
 * ```typescript
 * const retryOptions: RetryOptions = {
 *   maxRetries: 5,        // More attempts for a flaky provider
 *   initialDelayMs: 2000, // Start with longer delay for rate-limited APIs
 *   maxDelayMs: 30000,
 *   backoffFactor: 1.5,
 * };
 * ```
 */
export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 2 */
  maxRetries?: number;
  /** Initial delay in milliseconds before first retry. Default: 1000 */
  initialDelayMs?: number;
  /** Maximum delay cap in milliseconds. Default: 10000 */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff. Default: 2 */
  backoffFactor?: number;
}

/**
 * Context passed to adapter methods for each request.
 * Provides access to logging, cancellation, and execution configuration.
 */
export interface AdapterContext {
  /** Unique identifier for the current CLI invocation */
  runId: string;
  /** Logger instance for this request */
  logger: Logger;
  /** Signal to cancel the request */
  abortSignal?: AbortSignal;
  /** Maximum time in milliseconds for each attempt */
  timeoutMs?: number;
  /** Retry configuration for transient failures */
  retryOptions?: RetryOptions;
  /** Waits between retries; tests pass a no-op */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * The subset of a configured model an adapter needs.
 */
export interface AdapterConfig {
  /** Configured model id; also the API model name unless `model` is set */
  id: string;
  model?: string;
  api_key?: string;
  api_key_env?: string;
}
