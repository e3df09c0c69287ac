import type { BenchEvent } from '../types/events';

export type MaybePromise<T> = T | Promise<T>;

/**
 * Logging seam of every stage.
 *
 * `log` persists a structured event; `trace` persists one and prints a line for it.
 * The level methods only print. Children prefix their lines with their bindings:
 *
 * ```typescript
 * const modelLogger = logger.child({ model: 'gpt-4o-mini' });
 * modelLogger.info('P1: lat=812ms, in=40 tok, out=1800 tok, cost=$0.0063');
 * // [model=gpt-4o-mini] P1: lat=812ms, ...
 * ```
 */
export interface Logger {
  log(event: BenchEvent): MaybePromise<void>;
  trace(event: BenchEvent, message: string): MaybePromise<void>;
  /** Printed only with --verbose */
  debug(message: string): MaybePromise<void>;
  info(message: string): MaybePromise<void>;
  warn(message: string): MaybePromise<void>;
  error(error: Error, message?: string): MaybePromise<void>;
  child(bindings: Record<string, unknown>): Logger;
}
