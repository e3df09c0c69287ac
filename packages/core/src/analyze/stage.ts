import {
  GenerationStoreSchema,
  errorMessage,
  type AnalysisConfig,
  type AnalysisRecord,
  type GenerationRecord,
  type Logger,
} from '@contentbench/shared';
import type { LinkChecker, LinkProbe } from '../capabilities';
import type { RunContext } from '../context';
import { systemClock, type Clock } from '../retry';
import { RecordStore, readStore } from '../store/result-store';
import { runPool } from './pool';
import { countWords, extractUrls } from './text';

export interface RecordAnalysis {
  record: AnalysisRecord;
  urlCount: number;
  probes: LinkProbe[];
  /** Set when the checker rejected for one or more URLs; those URLs count as broken */
  error?: string;
}

/**
 * Adds `words_count` and `broken_links` to one generated record.
 */
export async function analyzeRecord(
  record: GenerationRecord,
  checker: LinkChecker,
  config: AnalysisConfig,
): Promise<RecordAnalysis> {
  const wordsCount = countWords(record.response);
  const urls = extractUrls(record.response);

  const rejected: string[] = [];
  const probes = await runPool(urls, config.concurrency, async (url): Promise<LinkProbe> => {
    try {
      return await checker.probe(url, config.timeoutMs);
    } catch (err) {
      const message = errorMessage(err);
      rejected.push(`${url}: ${message}`);
      return { url, status: 'error', valid: false, error: message };
    }
  });
  const error = rejected.length > 0 ? rejected.join('; ') : undefined;

  return {
    record: {
      ...record,
      words_count: wordsCount,
      broken_links: probes.filter((p) => !p.valid).map((p) => p.url),
    },
    urlCount: urls.length,
    probes,
    error,
  };
}

export interface AnalysisStageOptions {
  run: RunContext;
  inputPath: string;
  outputPath: string;
  checker: LinkChecker;
  analysis: AnalysisConfig;
  clock?: Clock;
}

export interface AnalysisSummary {
  analyzed: number;
  /** Records whose link checks did not complete */
  failed: number;
  brokenLinks: number;
  durationMs: number;
  outputPath: string;
}

async function reportProbes(logger: Logger, promptId: string, probes: LinkProbe[]): Promise<void> {
  if (probes.length === 0) return;
  await logger.debug(`Checking URLs for ${promptId}:`);
  for (const probe of probes) {
    await logger.debug(`  ${probe.url}: ${probe.valid ? '✅' : '❌'} (Status: ${probe.status})`);
  }
}

/**
 * Analyses every record of every model in the generation store and rewrites the analysis
 * store in full.
 */
export async function runAnalysisStage(options: AnalysisStageOptions): Promise<AnalysisSummary> {
  const { run, checker, analysis, outputPath } = options;
  const clock = options.clock ?? systemClock;
  const stageStart = clock.now();

  const input = await readStore(options.inputPath, GenerationStoreSchema);
  const planned = Object.values(input).reduce((n, records) => n + records.length, 0);

  await run.logger.log({
    type: 'StageStarted',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: run.runId,
    payload: { stage: 'analyze', plannedItems: planned },
  });

  const store = RecordStore.empty<AnalysisRecord>(outputPath);
  let analyzed = 0;
  let failed = 0;
  let brokenLinks = 0;

  for (const [model, records] of Object.entries(input)) {
    const logger = run.logger.child({ model });
    await logger.info(`Analyzing ${records.length} record(s)`);

    for (const generated of records) {
      const result = await analyzeRecord(generated, checker, analysis);
      const { record } = result;
      store.upsert(model, record);
      analyzed++;
      brokenLinks += record.broken_links.length;

      if (result.error) {
        failed++;
        await logger.warn(`${record.id}: link check failed (${result.error})`);
      }
      await reportProbes(logger, record.id, result.probes);

      await logger.trace(
        {
          type: 'RecordAnalyzed',
          schemaVersion: 1,
          timestamp: new Date().toISOString(),
          runId: run.runId,
          payload: {
            model,
            promptId: record.id,
            wordsCount: record.words_count,
            urlCount: result.urlCount,
            brokenLinks: record.broken_links,
            ...(result.error ? { error: result.error } : {}),
          },
        },
        `${record.id}: ${record.words_count} words, ${record.broken_links.length} broken links`,
      );
    }
  }

  await store.save();

  const durationMs = Math.round(clock.now() - stageStart);
  await run.logger.log({
    type: 'StageFinished',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: run.runId,
    payload: { stage: 'analyze', succeeded: analyzed - failed, failed, skipped: 0, durationMs, outputPath },
  });

  return { analyzed, failed, brokenLinks, durationMs, outputPath };
}
