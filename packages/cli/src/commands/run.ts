import { Command } from 'commander';
import { planJudges } from '@contentbench/core';
import { OutputRenderer } from '../output/renderer';
import { openSession, type CliDeps, type GlobalOptions, type Session } from '../session';
import { executeAnalyze } from './analyze';
import { executeGenerate } from './generate';
import { executeJudge } from './judge';
import { executeScore } from './score';

interface RunOptions {
  onlyMissing?: boolean;
}

/**
 * Checks every writer and every judge the run will call before anything is generated.
 * @throws {ConfigError} on a missing credential, provider type or cross-family judge
 */
export function preflightRun({ config, registry }: Session): void {
  const plan = planJudges(
    config.models.map((m) => m.id),
    config.models,
    config.judges,
  );
  registry.preflight([...config.models.map((m) => m.id), ...[...plan.values()].map((j) => j.id)]);
}

export function registerRunCommand(program: Command, deps: CliDeps = {}) {
  program
    .command('run')
    .description('Run generate, analyze, judge and score in order')
    .option('--only-missing', 'Skip pairs already generated and records already judged')
    .action(async (options: RunOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const session = openSession(globalOpts, deps);
      const renderer = new OutputRenderer(!!globalOpts.json);
      preflightRun(session);

      const generate = await executeGenerate(session, options);
      renderer.generation(generate);

      const analyze = await executeAnalyze(session, deps);
      renderer.analysis(analyze);

      const judge = await executeJudge(session, options);
      renderer.judgment(judge);

      const score = await executeScore(session);
      renderer.contest(score, session.paths.contest);

      renderer.json({ runId: session.run.runId, generate, analyze, judge, score });
    });
}
