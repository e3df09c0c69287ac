import { Command } from 'commander';
import { AdapterJudge, runJudgeStage, type JudgeSummary } from '@contentbench/core';
import { OutputRenderer } from '../output/renderer';
import { openSession, type CliDeps, type GlobalOptions, type Session } from '../session';

export interface JudgeOptions {
  onlyMissing?: boolean;
}

export async function executeJudge(session: Session, options: JudgeOptions): Promise<JudgeSummary> {
  const { config, registry, run, paths } = session;
  return runJudgeStage({
    run,
    inputPath: paths.analysis,
    outputPath: paths.judgment,
    models: config.models,
    judges: config.judges,
    createJudge: (judge) => {
      registry.preflight([judge.id]);
      return new AdapterJudge(registry, run, judge.id, config.judging.temperature);
    },
    delayMs: config.judging.delayMs,
    onlyMissing: options.onlyMissing,
  });
}

export function registerJudgeCommand(program: Command, deps: CliDeps = {}) {
  program
    .command('judge')
    .description('Score every analysed article with a judge from another model family')
    .option('--only-missing', 'Skip records that already have a real judgment')
    .action(async (options: JudgeOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const session = openSession(globalOpts, deps);
      const renderer = new OutputRenderer(!!globalOpts.json);

      const summary = await executeJudge(session, options);
      renderer.judgment(summary);
      renderer.json({ judge: summary });
    });
}
