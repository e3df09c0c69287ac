import * as path from 'path';
import {
  errorMessage,
  writeJsonAtomic,
  type ContentConfig,
  type Prompt,
  type QcRunSnapshot,
  type QcState,
  type QcStatus,
  type QcTransitionRecord,
  type QcVerdict,
} from '@contentbench/shared';
import type { ContentGenerator, QualityChecker } from '../capabilities';
import type { RunContext } from '../context';
import { buildUserInstruction } from '../generate/instruction';
import { realSleep, withRetry, type RetryPolicy } from '../retry';

export interface QcLoopOptions {
  run: RunContext;
  /** Configured id of the generating model */
  generatorModel: string;
  generator: ContentGenerator;
  checker: QualityChecker;
  prompt: Prompt;
  content: ContentConfig;
  policy: RetryPolicy;
  /** Directory receiving `article_<YYYYMMDD_HHMMSS>.json` */
  outputDir: string;
  now?: () => Date;
}

export interface QcOutcome {
  status: QcStatus;
  path: string;
  snapshot: QcRunSnapshot;
}

const pad = (n: number) => String(n).padStart(2, '0');

/** Local time as `YYYYMMDD_HHMMSS`. */
export function formatSnapshotStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Generate, check, and at most once revise a single article.
 *
 * GENERATING -> QC_CHECKING -> APPROVED | REJECTED
 * REJECTED -> REVISING -> RE_CHECKING -> APPROVED_REVISED | REJECTED_REVISED
 *
 * Every exit writes one snapshot, including early failures.
 */
export class QcLoop {
  private state: QcState | null = null;
  private readonly transitions: QcTransitionRecord[] = [];
  private readonly now: () => Date;

  constructor(private readonly options: QcLoopOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get currentState(): QcState | null {
    return this.state;
  }

  async run(): Promise<QcOutcome> {
    const { logger } = this.options.run;

    await this.transition('GENERATING');
    await logger.info('Generating initial article...');
    const draft = await this.generate();
    if (draft === null) {
      await this.transition('FAILED');
      return this.finish(null, null, 'generation_failed');
    }

    await this.transition('QC_CHECKING');
    await logger.info('Performing quality check...');
    const verdict = await this.check(draft);
    if (verdict === null) {
      await this.transition('FAILED');
      return this.finish(draft, null, 'check_failed');
    }

    if (verdict.verdict === 'APPROVED') {
      await this.transition('APPROVED');
      return this.finish(draft, verdict, 'approved');
    }

    await this.transition('REJECTED');
    await logger.info(`Article rejected: ${verdict.tip || '(no tip)'}`);

    await this.transition('REVISING');
    const revised = await this.generate(verdict.tip);
    if (revised === null) {
      await logger.warn('Failed to generate revised content');
      await this.transition('REJECTED');
      return this.finish(draft, verdict, 'rejected_no_revision');
    }

    await this.transition('RE_CHECKING');
    const revisedVerdict = await this.check(revised);
    if (revisedVerdict === null) {
      await this.transition('FAILED');
      return this.finish(revised, verdict, 'revision_check_failed');
    }

    if (revisedVerdict.verdict === 'APPROVED') {
      await this.transition('APPROVED_REVISED');
      return this.finish(revised, revisedVerdict, 'approved_revised');
    }
    await this.transition('REJECTED_REVISED');
    return this.finish(revised, revisedVerdict, 'rejected_revised');
  }

  private async generate(tip?: string): Promise<string | null> {
    const { run, content, prompt, generatorModel, generator, policy } = this.options;
    const userInstruction = buildUserInstruction(prompt, content, tip);

    const text = await withRetry(
      policy,
      run.sleep ?? realSleep,
      async () => {
        const result = await generator.generate({
          model: generatorModel,
          systemInstruction: content.systemInstruction,
          userInstruction,
        });
        return result && result.text.trim() ? result.text : null;
      },
      { onFailure: (attempt, error) => this.reportFailure('Generation', attempt, error) },
    );
    if (text !== null) {
      await run.logger.info('Generated article');
    }
    return text;
  }

  private async check(draft: string): Promise<QcVerdict | null> {
    const { run, checker, policy } = this.options;
    return withRetry(policy, run.sleep ?? realSleep, () => checker.check(draft), {
      onFailure: (attempt, error) => this.reportFailure('Quality check', attempt, error),
    });
  }

  private async reportFailure(what: string, attempt: number, error: unknown): Promise<void> {
    const reason = error === undefined ? 'no usable result' : errorMessage(error);
    await this.options.run.logger.warn(`${what} attempt ${attempt} failed: ${reason}`);
  }

  private async transition(to: QcState): Promise<void> {
    const from = this.state;
    this.state = to;
    this.transitions.push({ from, to, at: this.now().toISOString() });

    const { run } = this.options;
    await run.logger.log({
      type: 'QcTransition',
      schemaVersion: 1,
      timestamp: new Date().toISOString(),
      runId: run.runId,
      payload: { from, to },
    });
  }

  private async finish(
    content: string | null,
    verdict: QcVerdict | null,
    status: QcStatus,
  ): Promise<QcOutcome> {
    const { run, outputDir } = this.options;
    const stamp = formatSnapshotStamp(this.now());
    const snapshot: QcRunSnapshot = {
      timestamp: stamp,
      content,
      qc_result: verdict,
      status,
      transitions: [...this.transitions],
    };
    const filePath = path.join(outputDir, `article_${stamp}.json`);
    await writeJsonAtomic(filePath, snapshot);

    await run.logger.trace(
      {
        type: 'QcFinished',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId: run.runId,
        payload: { status, path: filePath },
      },
      `Results saved to ${filePath} (${status})`,
    );
    return { status, path: filePath, snapshot };
  }
}
