/**
 * Attempt budget and backoff for whole-operation retries (QC generation and checking).
 * Provider-level transient retries live in `executeProviderRequest`.
 */
export interface RetryPolicy {
  maxAttempts: number;
  /** Delay after failed attempt `attempt` (1-based) */
  backoffMs(attempt: number): number;
}

export type Sleeper = (ms: number) => Promise<void>;

export interface Clock {
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

export const realSleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** `baseMs * 2^(attempt - 1)`: 1s, 2s, 4s... for the default base */
export function exponentialBackoff(maxAttempts: number, baseMs: number): RetryPolicy {
  return {
    maxAttempts,
    backoffMs: (attempt) => baseMs * Math.pow(2, attempt - 1),
  };
}

export interface RetryHooks {
  /** Called after each failed attempt; `error` is undefined when the attempt returned null */
  onFailure?(attempt: number, error: unknown): void | Promise<void>;
}

/**
 * Runs `fn` until it returns a non-null value or the policy is exhausted.
 * A thrown error and a null result both count as a failed attempt. No sleep follows the last attempt.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  sleep: Sleeper,
  fn: (attempt: number) => Promise<T | null>,
  hooks: RetryHooks = {},
): Promise<T | null> {
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    let failure: unknown;
    try {
      const result = await fn(attempt);
      if (result !== null) {
        return result;
      }
    } catch (error) {
      failure = error;
    }
    await hooks.onFailure?.(attempt, failure);

    if (attempt < policy.maxAttempts) {
      await sleep(policy.backoffMs(attempt));
    }
  }
  return null;
}
