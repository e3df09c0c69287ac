import type { AdapterContext, RetryOptions } from '../types';
import { RateLimitError, TimeoutError, ConfigError } from '../errors';

/**
 * Provider-level retries, separate from the per-stage retry policies in core.
 *
 * Retried: rate limits, attempt timeouts, 5xx, and ETIMEDOUT / ECONNRESET / ECONNREFUSED
 * (also when nested under `cause`). Never retried: ConfigError, other 4xx, caller aborts.
 *
 * The wait before retry n is `min(maxDelayMs, initialDelayMs * backoffFactor^(n-1))` with
 * ±10% jitter, unless a rate limit came with Retry-After, which is honoured up to `maxDelayMs`.
 */
const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 2,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
};

const RETRIABLE_NETWORK_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED']);

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

function networkCodeOf(error: unknown, depth = 0): string | undefined {
  if (typeof error !== 'object' || error === null || depth > 3) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return networkCodeOf(error.cause, depth + 1);
  return undefined;
}

export function isRetriableError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof TimeoutError) {
    return true;
  }

  const status = statusOf(error);
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = networkCodeOf(error);
  return code !== undefined && RETRIABLE_NETWORK_CODES.has(code);
}

export function retryDelayMs(error: unknown, retry: number, options: Required<RetryOptions>): number {
  if (error instanceof RateLimitError && error.retryAfter !== undefined) {
    return Math.min(options.maxDelayMs, error.retryAfter * 1000);
  }
  const delay = Math.min(
    options.maxDelayMs,
    options.initialDelayMs * Math.pow(options.backoffFactor, retry - 1),
  );
  const jitter = delay * 0.1 * (Math.random() * 2 - 1);
  return Math.max(0, delay + jitter);
}

interface AttemptSignal {
  signal: AbortSignal;
  /** The attempt's own timeout, when that is what aborted it */
  timeout(): TimeoutError | undefined;
  dispose(): void;
}

/** Signal for one attempt: follows the caller's signal and aborts itself after `timeoutMs`. */
function attemptSignal(ctx: AdapterContext): AttemptSignal {
  const controller = new AbortController();
  const parent = ctx.abortSignal;
  const forward = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    forward();
  } else {
    parent?.addEventListener('abort', forward);
  }

  const timeoutMs = ctx.timeoutMs;
  const timer = timeoutMs
    ? setTimeout(() => controller.abort(new TimeoutError(`Request timed out after ${timeoutMs}ms`)), timeoutMs)
    : undefined;

  return {
    signal: controller.signal,
    timeout: () => {
      const reason: unknown = controller.signal.reason;
      return !parent?.aborted && reason instanceof TimeoutError ? reason : undefined;
    },
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', forward);
    },
  };
}

/**
 * Runs one provider call with retries, a per-attempt timeout and the caller's abort signal,
 * logging `ProviderRequestStarted` and one `ProviderRequestFinished`.
 */
export async function executeProviderRequest<T>(
  ctx: AdapterContext,
  provider: string,
  model: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
  optionsOverride: RetryOptions = {},
): Promise<T> {
  const options: Required<RetryOptions> = {
    ...DEFAULT_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };
  const sleep = ctx.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
  const startTime = Date.now();

  const finished = (success: boolean, retries: number, error?: unknown) =>
    ctx.logger.log({
      type: 'ProviderRequestFinished',
      schemaVersion: 1,
      timestamp: new Date().toISOString(),
      runId: ctx.runId,
      payload: {
        provider,
        model,
        durationMs: Date.now() - startTime,
        success,
        retries,
        ...(success ? {} : { error: error instanceof Error ? error.message : String(error) }),
      },
    });

  await ctx.logger.log({
    type: 'ProviderRequestStarted',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    payload: { provider, model },
  });

  for (let retries = 0; ; retries++) {
    const attempt = attemptSignal(ctx);
    let failure: unknown;
    try {
      const result = await requestFn(attempt.signal);
      attempt.dispose();
      await finished(true, retries);
      return result;
    } catch (error: unknown) {
      attempt.dispose();
      if (ctx.abortSignal?.aborted) {
        throw error;
      }
      // SDKs surface their own abort error; report the timeout instead.
      failure = attempt.timeout() ?? error;
    }

    const retriable = !(failure instanceof ConfigError) && isRetriableError(failure);
    if (!retriable || retries >= options.maxRetries) {
      await finished(false, retries, failure);
      throw failure;
    }
    await sleep(retryDelayMs(failure, retries + 1, options));
  }
}
