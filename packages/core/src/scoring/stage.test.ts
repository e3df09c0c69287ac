import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ContestResultSchema,
  DEFAULT_WEIGHTS,
  StoreError,
  writeJsonAtomic,
  type JudgmentRecord,
} from '@contentbench/shared';
import { createMockLogger, createRunContext } from '../test-helpers';
import { runScoreStage } from './stage';

const judged = (id: string, accuracy: number): JudgmentRecord => ({
  id,
  title: id,
  keywords: [],
  prompt_tokens: 1,
  completion_tokens: 1,
  total_tokens: 2,
  latency_ms: 100,
  cost_usd: 0.001,
  response: 'text',
  words_count: 100,
  broken_links: [],
  accuracy,
  safety: 5,
  factuality: 5,
  tone: 'calm',
});

describe('runScoreStage', () => {
  let dir: string;
  let inputPath: string;
  let outputPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bench-score-test-'));
    inputPath = path.join(dir, 'content_with_judgment.json');
    outputPath = path.join(dir, 'contest_results.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('overwrites the contest file and warns about empty models', async () => {
    await fs.writeFile(outputPath, JSON.stringify({ stale: true }));
    await writeJsonAtomic(inputPath, { low: [judged('P1', 2)], high: [judged('P1', 4)], empty: [] });
    const logger = createMockLogger();

    const result = await runScoreStage({
      run: createRunContext(logger),
      inputPath,
      outputPath,
      weights: DEFAULT_WEIGHTS,
    });

    expect(result.winner.model).toBe('high');
    const written = ContestResultSchema.parse(JSON.parse(await fs.readFile(outputPath, 'utf8')));
    expect(written).toEqual(result);
    expect(logger.warn).toHaveBeenCalledWith('empty: no judged records, left out of the contest');
  });

  it('fails with a StoreError when the judgment store is empty', async () => {
    await writeJsonAtomic(inputPath, {});
    await expect(
      runScoreStage({ run: createRunContext(), inputPath, outputPath, weights: DEFAULT_WEIGHTS }),
    ).rejects.toBeInstanceOf(StoreError);
  });
});

