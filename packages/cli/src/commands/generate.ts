import { Command } from 'commander';
import {
  AdapterContentGenerator,
  runGenerationStage,
  type GenerationSummary,
} from '@contentbench/core';
import { UsageError } from '@contentbench/shared';
import { OutputRenderer } from '../output/renderer';
import { openSession, type CliDeps, type GlobalOptions, type Session } from '../session';

export interface GenerateOptions {
  model?: string[];
  prompt?: string[];
  onlyMissing?: boolean;
}

function pick<T extends { id: string }>(items: T[], ids: string[] | undefined, kind: string): T[] {
  if (!ids || ids.length === 0) {
    return items;
  }
  const unknown = ids.filter((id) => !items.some((item) => item.id === id));
  if (unknown.length > 0) {
    throw new UsageError(`Unknown ${kind} id(s): ${unknown.join(', ')}`);
  }
  return items.filter((item) => ids.includes(item.id));
}

export async function executeGenerate(session: Session, options: GenerateOptions): Promise<GenerationSummary> {
  const { config, registry, run, paths } = session;
  const models = pick(config.models, options.model, 'model');
  const prompts = pick(config.prompts, options.prompt, 'prompt');
  if (models.length === 0 || prompts.length === 0) {
    throw new UsageError('Nothing to generate: configure at least one model and one prompt');
  }

  registry.preflight(models.map((m) => m.id));

  return runGenerationStage({
    run,
    models,
    prompts,
    content: config.content,
    generator: new AdapterContentGenerator(registry, run),
    outputPath: paths.generation,
    onlyMissing: options.onlyMissing,
  });
}

export function registerGenerateCommand(program: Command, deps: CliDeps = {}) {
  program
    .command('generate')
    .description('Generate one article per (model, prompt) pair and record usage and cost')
    .option('--model <ids...>', 'Only these model ids')
    .option('--prompt <ids...>', 'Only these prompt ids')
    .option('--only-missing', 'Skip pairs already in the generation store')
    .action(async (options: GenerateOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const session = openSession(globalOpts, deps);
      const renderer = new OutputRenderer(!!globalOpts.json);

      const summary = await executeGenerate(session, options);
      renderer.generation(summary);
      renderer.json({ generate: summary });
    });
}
