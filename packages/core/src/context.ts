import type { Logger, ModelConfig, RetryConfig } from '@contentbench/shared';
import type { AdapterContext } from '@contentbench/adapters';
import type { Sleeper } from './retry';

/**
 * What every stage and capability needs from the current CLI invocation.
 */
export interface RunContext {
  runId: string;
  logger: Logger;
  retry: RetryConfig;
  /** Injected into provider retries and stage delays */
  sleep?: Sleeper;
}

export function adapterContextFor(run: RunContext, model: ModelConfig): AdapterContext {
  return {
    runId: run.runId,
    logger: run.logger.child({ model: model.id }),
    timeoutMs: model.timeoutMs,
    retryOptions: {
      maxRetries: run.retry.maxRetries,
      initialDelayMs: run.retry.initialDelayMs,
    },
    sleep: run.sleep,
  };
}
