import { Command } from 'commander';
import { runScoreStage } from '@contentbench/core';
import type { ContestResult } from '@contentbench/shared';
import { OutputRenderer } from '../output/renderer';
import { openSession, type CliDeps, type GlobalOptions, type Session } from '../session';

export async function executeScore(session: Session): Promise<ContestResult> {
  return runScoreStage({
    run: session.run,
    inputPath: session.paths.judgment,
    outputPath: session.paths.contest,
    weights: session.config.scoring.weights,
  });
}

export function registerScoreCommand(program: Command, deps: CliDeps = {}) {
  program
    .command('score')
    .description('Rank the models from the judgment store and pick a winner')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();
      const session = openSession(globalOpts, deps);
      const renderer = new OutputRenderer(!!globalOpts.json);

      const result = await executeScore(session);
      renderer.contest(result, session.paths.contest);
      renderer.json({ score: result });
    });
}
