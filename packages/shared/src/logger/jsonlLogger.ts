import * as fs from 'fs/promises';
import * as path from 'path';
import type { BenchEvent } from '../types/events';
import { redactSecrets } from '../redaction';
import type { Logger } from './types';

/**
 * Appends redacted events to a JSONL file and prints human-readable lines to the console.
 * A quiet logger keeps stdout free (for `--json` output); warnings and errors still go to stderr.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly verbose: boolean;
  private readonly quiet: boolean;

  constructor(filePath: string, bindings: Record<string, unknown> = {}, verbose = false, quiet = false) {
    this.filePath = filePath;
    this.bindings = bindings;
    this.verbose = verbose;
    this.quiet = quiet;
  }

  async log(event: BenchEvent): Promise<void> {
    const redactedEvent = redactSecrets(event);
    const line = JSON.stringify(redactedEvent) + '\n';
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Logging never fails a stage.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: BenchEvent, message: string): Promise<void> {
    await this.log(event);
    this.info(message);
  }

  debug(message: string): void {
    if (this.verbose && !this.quiet) {
      console.debug(this.withPrefix(message));
    }
  }

  info(message: string): void {
    if (this.quiet) return;
    console.info(this.withPrefix(message));
  }

  warn(message: string): void {
    console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(
      this.filePath,
      { ...this.bindings, ...bindings },
      this.verbose,
      this.quiet,
    );
  }

  private withPrefix(message: string): string {
    return prefixMessage(this.bindings, message);
  }
}

/** `[model=gpt stage=judge] message`, or the bare message without bindings. */
export function prefixMessage(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}
