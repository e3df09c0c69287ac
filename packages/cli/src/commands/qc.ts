import { Command } from 'commander';
import {
  AdapterContentGenerator,
  AdapterQualityChecker,
  QcLoop,
  exponentialBackoff,
} from '@contentbench/core';
import { UsageError } from '@contentbench/shared';
import { OutputRenderer } from '../output/renderer';
import { openSession, type CliDeps, type GlobalOptions } from '../session';

export function registerQcCommand(program: Command, deps: CliDeps = {}) {
  program
    .command('qc')
    .description('Generate one article, quality-check it and revise it at most once')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();
      const { config, registry, run, paths } = openSession(globalOpts, deps);
      const renderer = new OutputRenderer(!!globalOpts.json);

      const qc = config.qc;
      if (!qc) {
        throw new UsageError('No qc section in the configuration');
      }
      registry.preflight([qc.generator, qc.checker]);

      const outcome = await new QcLoop({
        run,
        generatorModel: qc.generator,
        generator: new AdapterContentGenerator(registry, run),
        checker: new AdapterQualityChecker(registry, run, qc.checker),
        prompt: qc.prompt,
        content: config.content,
        policy: exponentialBackoff(qc.maxAttempts, qc.baseDelayMs),
        outputDir: paths.qcDir,
        now: deps.now,
      }).run();

      renderer.qc(outcome);
      renderer.json({ qc: { status: outcome.status, path: outcome.path } });
    });
}
