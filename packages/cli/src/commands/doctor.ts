import { Command } from 'commander';
import pc from 'picocolors';
import { ConfigLoader, planJudges, type LoadedConfig } from '@contentbench/core';
import { errorMessage, findMissingCredentials } from '@contentbench/shared';
import type { CliDeps, GlobalOptions } from '../session';

const CHECKS = {
  OK: pc.green('✔'),
  WARN: pc.yellow('!'),
  FAIL: pc.red('✖'),
};

export type CheckResult = [status: string, message: string];

function checkModels(config: LoadedConfig): CheckResult {
  if (config.models.length === 0) {
    return [CHECKS.FAIL, 'No models configured. Add entries under `models`.'];
  }
  return [CHECKS.OK, `Models configured: ${config.models.map((m) => m.id).join(', ')}`];
}

function checkPrompts(config: LoadedConfig): CheckResult {
  if (config.prompts.length === 0) {
    return [CHECKS.WARN, 'No prompts configured. `generate` will have nothing to do.'];
  }
  return [CHECKS.OK, `${config.prompts.length} prompt(s) configured`];
}

function checkCredentials(config: LoadedConfig, env: NodeJS.ProcessEnv): CheckResult[] {
  const problems = findMissingCredentials([...config.models, ...config.judges], env);
  if (problems.length === 0) {
    return [[CHECKS.OK, 'API keys found for every model and judge']];
  }
  return problems.map((p): CheckResult => [CHECKS.FAIL, p.message]);
}

function checkJudges(config: LoadedConfig): CheckResult {
  if (config.models.length === 0) {
    return [CHECKS.WARN, 'No models to judge.'];
  }
  try {
    const plan = planJudges(
      config.models.map((m) => m.id),
      config.models,
      config.judges,
    );
    const pairs = [...plan.entries()].map(([model, judge]) => `${model} → ${judge.id}`);
    return [CHECKS.OK, `Judges: ${pairs.join(', ')}`];
  } catch (error) {
    return [CHECKS.FAIL, errorMessage(error)];
  }
}

function checkQc(config: LoadedConfig): CheckResult {
  if (!config.qc) {
    return [CHECKS.WARN, 'No qc section. The `qc` command is unavailable.'];
  }
  return [CHECKS.OK, `QC: ${config.qc.generator} writes, ${config.qc.checker} checks`];
}

/**
 * Runs every check without calling a provider.
 */
export function runDoctorChecks(options: GlobalOptions, deps: CliDeps = {}): CheckResult[] {
  let config: LoadedConfig;
  try {
    config = ConfigLoader.load({ cwd: deps.cwd, configPath: options.config, flags: { outputDir: options.out } });
  } catch (error) {
    return [[CHECKS.FAIL, `Failed to load configuration: ${errorMessage(error)}`]];
  }

  return [
    [CHECKS.OK, `Configuration: ${config.configPath ?? 'built-in defaults'}`],
    checkModels(config),
    checkPrompts(config),
    ...checkCredentials(config, deps.env ?? process.env),
    checkJudges(config),
    checkQc(config),
  ];
}

export function isFailure(result: CheckResult): boolean {
  return result[0] === CHECKS.FAIL;
}

export const registerDoctorCommand = (program: Command, deps: CliDeps = {}) => {
  const command = new Command('doctor');

  command.description('Check configuration, credentials and judge assignment').action(() => {
    console.log(pc.bold('Contentbench Checkup'));
    console.log('---------------------------------');

    const results = runDoctorChecks(program.opts<GlobalOptions>(), deps);
    results.forEach(([status, message]) => {
      console.log(`${status} ${message}`);
    });

    console.log('---------------------------------');
    if (results.some(isFailure)) {
      console.log(pc.red(pc.bold('Doctor checks failed.')) + ' Please resolve the issues marked with ' + CHECKS.FAIL);
    } else {
      console.log(pc.green(pc.bold('All checks passed.')));
    }
  });

  program.addCommand(command);
};
