import path from 'path';
import {
  ConfigLoader,
  createDefaultRegistry,
  type LinkChecker,
  type LoadedConfig,
  type ProviderRegistry,
  type RunContext,
  type Sleeper,
} from '@contentbench/core';
import { JsonlLogger, type OutputConfig } from '@contentbench/shared';

export interface GlobalOptions {
  config?: string;
  json?: boolean;
  verbose?: boolean;
  out?: string;
}

/** Seams the tests replace; production uses the defaults. */
export interface CliDeps {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  linkChecker?: LinkChecker;
  sleep?: Sleeper;
  now?: () => Date;
}

export interface StorePaths {
  generation: string;
  analysis: string;
  judgment: string;
  contest: string;
  events: string;
  qcDir: string;
}

export interface Session {
  config: LoadedConfig;
  run: RunContext;
  registry: ProviderRegistry;
  paths: StorePaths;
}

export function resolvePaths(output: OutputConfig, cwd: string): StorePaths {
  const dir = path.resolve(cwd, output.dir);
  return {
    generation: path.join(dir, output.generation),
    analysis: path.join(dir, output.analysis),
    judgment: path.join(dir, output.judgment),
    contest: path.join(dir, output.contest),
    events: path.join(dir, output.events),
    qcDir: path.resolve(cwd, output.qcDir),
  };
}

/**
 * Loads the configuration and wires the logger, registry and run context for one invocation.
 */
export function openSession(options: GlobalOptions, deps: CliDeps = {}): Session {
  const cwd = deps.cwd ?? process.cwd();
  const config = ConfigLoader.load({
    cwd,
    configPath: options.config,
    flags: { outputDir: options.out },
  });
  const paths = resolvePaths(config.output, cwd);
  const runId = Date.now().toString();
  const logger = new JsonlLogger(paths.events, {}, !!options.verbose, !!options.json);

  return {
    config,
    paths,
    registry: createDefaultRegistry(config, deps.env ?? process.env),
    run: { runId, logger, retry: config.retry, sleep: deps.sleep },
  };
}
