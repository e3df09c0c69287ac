import { DEFAULT_API_KEY_ENV, resolveApiKey } from '@contentbench/shared';
import { ConfigError, RateLimitError, TimeoutError } from './errors';
import type { AdapterConfig } from './types';

/** The part of an SDK's API error the mapping reads. */
export interface APIErrorLike {
  status?: number;
  message: string;
  /** Response headers: a `Headers` instance or a plain record, depending on the SDK */
  headers?: unknown;
}

/** SDK-specific checks each adapter supplies. */
export interface ErrorTypeConfig {
  isAPIError: (error: unknown) => error is APIErrorLike;
  isTimeoutError: (error: unknown) => boolean;
}

/** Seconds from a numeric Retry-After header; HTTP-date values are ignored. */
export function retryAfterSeconds(headers: unknown): number | undefined {
  let value: unknown;
  if (headers instanceof Headers) {
    value = headers.get('retry-after');
  } else if (typeof headers === 'object' && headers !== null && 'retry-after' in headers) {
    value = headers['retry-after'];
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * Base class for LLM provider adapters that provides common error mapping logic
 * and credential resolution. Subclasses configure error type checks for their SDK.
 */
export abstract class BaseProviderAdapter {
  protected abstract readonly errorConfig: ErrorTypeConfig;

  /**
   * Resolves the API key from `api_key` or the configured/default env var.
   * @throws ConfigError when no key is available
   */
  protected static requireApiKey(
    config: AdapterConfig,
    type: 'openai' | 'anthropic' | 'gemini',
    label: string,
  ): string {
    const apiKey = resolveApiKey({ type, api_key: config.api_key, api_key_env: config.api_key_env });
    if (!apiKey) {
      const envVar = config.api_key_env ?? DEFAULT_API_KEY_ENV[type];
      throw new ConfigError(
        `Missing API Key for ${label} model '${config.id}'. Checked config.api_key and env var ${envVar}`,
      );
    }
    return apiKey;
  }

  /**
   * 429 becomes RateLimitError (with Retry-After), 401 ConfigError, SDK timeouts TimeoutError.
   * Anything else passes through, wrapped when it is not an Error.
   */
  protected mapError(error: unknown): Error {
    if (this.errorConfig.isAPIError(error)) {
      if (error.status === 429) {
        return new RateLimitError(error.message, {
          cause: error,
          retryAfter: retryAfterSeconds(error.headers),
        });
      }
      if (error.status === 401) {
        return new ConfigError(error.message, { cause: error });
      }
    }

    if (this.errorConfig.isTimeoutError(error)) {
      return new TimeoutError(error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }

    if (error instanceof Error) return error;
    return new Error(String(error));
  }
}
