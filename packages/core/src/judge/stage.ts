import {
  AnalysisStoreSchema,
  JudgmentStoreSchema,
  errorMessage,
  type JudgmentRecord,
  type ModelConfig,
} from '@contentbench/shared';
import type { JudgeCapability } from '../capabilities';
import type { RunContext } from '../context';
import { realSleep, systemClock, type Clock } from '../retry';
import { RecordStore, readStore } from '../store/result-store';
import {
  SENTINEL_JUDGMENT,
  hasScores,
  isSentinel,
  parseJudgment,
  toJudgment,
  type Judgment,
} from './parser';
import { planJudges } from './select';

export interface JudgeStageOptions {
  run: RunContext;
  inputPath: string;
  outputPath: string;
  models: ModelConfig[];
  judges: ModelConfig[];
  /** Called once per selected judge before any record is judged */
  createJudge: (judge: ModelConfig) => JudgeCapability;
  /** Pause after each judge call */
  delayMs: number;
  /** Skip records that already have a non-sentinel judgment */
  onlyMissing?: boolean;
  clock?: Clock;
}

export interface JudgeSummary {
  judged: number;
  fallbacks: number;
  skipped: number;
  durationMs: number;
  outputPath: string;
}

interface JudgeOutcome {
  judgment: Judgment;
  /** Why the sentinel was used */
  fallbackReason?: string;
  malformed: string[];
}

async function judgeArticle(judge: JudgeCapability, article: string): Promise<JudgeOutcome> {
  let text: string;
  try {
    text = await judge.judge(article);
  } catch (error) {
    return { judgment: { ...SENTINEL_JUDGMENT }, fallbackReason: errorMessage(error), malformed: [] };
  }
  if (!text.trim()) {
    return { judgment: { ...SENTINEL_JUDGMENT }, fallbackReason: 'empty response', malformed: [] };
  }

  const parsed = parseJudgment(text);
  if (!hasScores(parsed)) {
    return { judgment: { ...SENTINEL_JUDGMENT }, fallbackReason: 'no scores in response', malformed: [] };
  }
  return {
    judgment: toJudgment(parsed),
    malformed: [
      ...parsed.malformed.map((m) => `invalid score value for ${m.key}: ${m.value}`),
      ...parsed.outOfRange.map((m) => `score for ${m.key} outside 0-5: ${m.value}`),
    ],
  };
}

/**
 * Scores every analysed record with a judge from a different family, merging into the
 * judgment store and rewriting it after each record.
 */
export async function runJudgeStage(options: JudgeStageOptions): Promise<JudgeSummary> {
  const { run, outputPath } = options;
  const clock = options.clock ?? systemClock;
  const sleep = run.sleep ?? realSleep;
  const stageStart = clock.now();

  const input = await readStore(options.inputPath, AnalysisStoreSchema);
  const plan = planJudges(Object.keys(input), options.models, options.judges);
  const capabilities = new Map<string, JudgeCapability>();
  for (const judge of plan.values()) {
    if (!capabilities.has(judge.id)) {
      capabilities.set(judge.id, options.createJudge(judge));
    }
  }

  await run.logger.log({
    type: 'StageStarted',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: run.runId,
    payload: {
      stage: 'judge',
      plannedItems: Object.values(input).reduce((n, records) => n + records.length, 0),
    },
  });

  const store = await RecordStore.open(outputPath, JudgmentStoreSchema);
  let judged = 0;
  let fallbacks = 0;
  let skipped = 0;

  for (const [model, records] of Object.entries(input)) {
    const judgeConfig = plan.get(model);
    const judge = judgeConfig && capabilities.get(judgeConfig.id);
    if (!judge) continue;

    const logger = run.logger.child({ model });
    await logger.info(`Judging ${records.length} record(s) with ${judge.judgeId}`);

    for (const analysed of records) {
      const existing = store.get(model, analysed.id);
      if (options.onlyMissing && existing && !isSentinel(existing)) {
        skipped++;
        await logger.debug(`${analysed.id}: already judged, skipping`);
        continue;
      }

      const outcome = await judgeArticle(judge, analysed.response);
      for (const problem of outcome.malformed) {
        await logger.warn(`${analysed.id}: ${problem}`);
      }
      if (outcome.fallbackReason) {
        fallbacks++;
        await logger.warn(`${analysed.id}: judging failed (${outcome.fallbackReason}), storing sentinel scores`);
      }

      const { judgment } = outcome;
      const record: JudgmentRecord = { ...analysed, ...judgment };
      store.upsert(model, record);
      await store.save();
      judged++;

      await logger.trace(
        {
          type: 'RecordJudged',
          schemaVersion: 1,
          timestamp: new Date().toISOString(),
          runId: run.runId,
          payload: {
            model,
            promptId: analysed.id,
            judge: judge.judgeId,
            ...judgment,
            fallback: outcome.fallbackReason !== undefined,
            malformedLines: outcome.malformed.length,
          },
        },
        `${analysed.id}: accuracy ${judgment.accuracy}/5, safety ${judgment.safety}/5, ` +
          `factuality ${judgment.factuality}/5, tone ${judgment.tone}`,
      );

      await sleep(options.delayMs);
    }
  }

  if (judged === 0) {
    await store.save();
  }

  const durationMs = Math.round(clock.now() - stageStart);
  await run.logger.log({
    type: 'StageFinished',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: run.runId,
    payload: { stage: 'judge', succeeded: judged - fallbacks, failed: fallbacks, skipped, durationMs, outputPath },
  });

  return { judged, fallbacks, skipped, durationMs, outputPath };
}
