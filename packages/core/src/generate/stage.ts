import {
  GenerationStoreSchema,
  errorMessage,
  type ContentConfig,
  type GenerationRecord,
  type ModelConfig,
  type Prompt,
} from '@contentbench/shared';
import type { ContentGenerator, GenerationResult } from '../capabilities';
import type { RunContext } from '../context';
import { CostTracker, type CostSummary } from '../cost/tracker';
import { systemClock, type Clock } from '../retry';
import { RecordStore } from '../store/result-store';
import { buildUserInstruction } from './instruction';
import { resolveUsage } from './usage';

export interface GenerationStageOptions {
  run: RunContext;
  models: ModelConfig[];
  prompts: Prompt[];
  content: ContentConfig;
  generator: ContentGenerator;
  outputPath: string;
  /** Skip (model, prompt) pairs already in the store */
  onlyMissing?: boolean;
  clock?: Clock;
}

export interface GenerationSummary {
  generated: number;
  failed: number;
  skipped: number;
  durationMs: number;
  outputPath: string;
  costs: CostSummary;
}

/**
 * Generates one record per (model, prompt) pair, sequentially, rewriting the store after each.
 */
export async function runGenerationStage(options: GenerationStageOptions): Promise<GenerationSummary> {
  const { run, models, prompts, content, generator, outputPath } = options;
  const clock = options.clock ?? systemClock;
  const stageStart = clock.now();
  const tracker = new CostTracker(models);

  await run.logger.log({
    type: 'StageStarted',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: run.runId,
    payload: { stage: 'generate', plannedItems: models.length * prompts.length },
  });

  const store = await RecordStore.open(outputPath, GenerationStoreSchema);
  let generated = 0;
  let failed = 0;
  let skipped = 0;

  for (const model of models) {
    const logger = run.logger.child({ model: model.id });
    await logger.info(`Generating ${prompts.length} article(s)`);

    for (const prompt of prompts) {
      if (options.onlyMissing && store.has(model.id, prompt.id)) {
        skipped++;
        await logger.debug(`${prompt.id}: already generated, skipping`);
        continue;
      }

      const userInstruction = buildUserInstruction(prompt, content);
      const start = clock.now();
      let result: GenerationResult | null = null;
      let failure = 'empty response';
      try {
        result = await generator.generate({
          model: model.id,
          systemInstruction: content.systemInstruction,
          userInstruction,
        });
      } catch (error) {
        failure = errorMessage(error);
      }
      const latencyMs = Math.max(0, Math.round(clock.now() - start));

      if (!result) {
        failed++;
        await logger.log({
          type: 'GenerationFailed',
          schemaVersion: 1,
          timestamp: new Date().toISOString(),
          runId: run.runId,
          payload: { model: model.id, promptId: prompt.id, error: failure },
        });
        await logger.warn(`${prompt.id}: generation failed (${failure})`);
        continue;
      }

      const usage = resolveUsage(model, content.systemInstruction, userInstruction, result);
      if (usage.fellBack) {
        await logger.warn(`${prompt.id}: provider reported no usage, using word-based estimate`);
      }
      const { promptTokens, completionTokens } = usage.tokens;
      const cost = tracker.recordUsage(model.id, usage.tokens);

      const record: GenerationRecord = {
        id: prompt.id,
        title: prompt.title,
        keywords: [...prompt.keywords],
        prompt_tokens: promptTokens,
        completion_tokens: completionTokens,
        total_tokens: promptTokens + completionTokens,
        latency_ms: latencyMs,
        cost_usd: cost,
        response: result.text,
      };
      const replaced = store.upsert(model.id, record);
      await store.save();
      generated++;

      await logger.trace(
        {
          type: 'RecordGenerated',
          schemaVersion: 1,
          timestamp: new Date().toISOString(),
          runId: run.runId,
          payload: {
            model: model.id,
            promptId: prompt.id,
            latencyMs,
            promptTokens,
            completionTokens,
            costUsd: cost,
            replaced,
          },
        },
        `${prompt.id}: lat=${latencyMs}ms, in=${promptTokens} tok, out=${completionTokens} tok, cost=$${cost.toFixed(4)}`,
      );
    }
  }

  // The store file exists after a run even when every pair failed.
  if (generated === 0) {
    await store.save();
  }

  const durationMs = Math.round(clock.now() - stageStart);
  await run.logger.log({
    type: 'StageFinished',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: run.runId,
    payload: { stage: 'generate', succeeded: generated, failed, skipped, durationMs, outputPath },
  });

  return { generated, failed, skipped, durationMs, outputPath, costs: tracker.getSummary() };
}
