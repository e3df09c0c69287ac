import { Command } from 'commander';
import { HttpLinkChecker, runAnalysisStage, type AnalysisSummary } from '@contentbench/core';
import { OutputRenderer } from '../output/renderer';
import { openSession, type CliDeps, type GlobalOptions, type Session } from '../session';

export async function executeAnalyze(session: Session, deps: CliDeps): Promise<AnalysisSummary> {
  return runAnalysisStage({
    run: session.run,
    inputPath: session.paths.generation,
    outputPath: session.paths.analysis,
    checker: deps.linkChecker ?? new HttpLinkChecker(),
    analysis: session.config.analysis,
  });
}

export function registerAnalyzeCommand(program: Command, deps: CliDeps = {}) {
  program
    .command('analyze')
    .description('Count words and check cited links for every generated article')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();
      const session = openSession(globalOpts, deps);
      const renderer = new OutputRenderer(!!globalOpts.json);

      const summary = await executeAnalyze(session, deps);
      renderer.analysis(summary);
      renderer.json({ analyze: summary });
    });
}
