import {
  JudgmentStoreSchema,
  writeJsonAtomic,
  type ContestResult,
  type ScoreWeights,
} from '@contentbench/shared';
import type { RunContext } from '../context';
import { systemClock, type Clock } from '../retry';
import { readStore } from '../store/result-store';
import { runContest } from './engine';

export interface ScoreStageOptions {
  run: RunContext;
  inputPath: string;
  outputPath: string;
  weights: ScoreWeights;
  clock?: Clock;
}

/**
 * Ranks the models in the judgment store and overwrites the contest result file.
 */
export async function runScoreStage(options: ScoreStageOptions): Promise<ContestResult> {
  const { run, outputPath } = options;
  const clock = options.clock ?? systemClock;
  const stageStart = clock.now();

  const store = await readStore(options.inputPath, JudgmentStoreSchema);
  await run.logger.log({
    type: 'StageStarted',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: run.runId,
    payload: { stage: 'score', plannedItems: Object.keys(store).length },
  });

  const { result, skippedModels } = runContest(store, options.weights);
  for (const model of skippedModels) {
    await run.logger.warn(`${model}: no judged records, left out of the contest`);
  }

  await writeJsonAtomic(outputPath, result);
  await run.logger.trace(
    {
      type: 'ContestScored',
      schemaVersion: 1,
      timestamp: new Date().toISOString(),
      runId: run.runId,
      payload: { winner: result.winner.model, score: result.winner.score, modelScores: result.model_scores },
    },
    `Winner: ${result.winner.model} with score ${result.winner.score.toFixed(4)}`,
  );

  const scored = Object.keys(result.model_scores).length;
  await run.logger.log({
    type: 'StageFinished',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: run.runId,
    payload: {
      stage: 'score',
      succeeded: scored,
      failed: 0,
      skipped: skippedModels.length,
      durationMs: Math.round(clock.now() - stageStart),
      outputPath,
    },
  });

  return result;
}
