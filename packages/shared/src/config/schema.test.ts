import { describe, it, expect } from 'vitest';
import { BenchConfigSchema, DEFAULT_WEIGHTS, ModelConfigSchema } from './schema';

describe('BenchConfigSchema', () => {
  it('fills every section with defaults', () => {
    const config = BenchConfigSchema.parse({});

    expect(config.models).toEqual([]);
    expect(config.scoring.weights).toEqual(DEFAULT_WEIGHTS);
    expect(config.content).toEqual({
      systemInstruction:
        'You are an expert tech writer with a friendly, witty personality. ' +
        'Produce fact-checked, safe, and highly accurate articles.',
      minWords: 1500,
      maxWords: 2500,
      minSources: 2,
    });
    expect(config.analysis).toEqual({ concurrency: 5, timeoutMs: 5000 });
    expect(config.judging).toEqual({ delayMs: 1000 });
    expect(config.output.dir).toBe('raw_outputs');
    expect(config.output.qcDir).toBe('qc_results');
    expect(config.retry).toEqual({ maxRetries: 2, initialDelayMs: 1000 });
    expect(config.qc).toBeUndefined();
  });

  it('defaults model pricing and usage accounting', () => {
    const model = ModelConfigSchema.parse({ id: 'gpt-4o-mini', type: 'openai', family: 'openai' });
    expect(model.pricing).toEqual({ inputPerMTokUsd: 0, outputPerMTokUsd: 0 });
    expect(model.usageAccounting).toBe('reported');
    expect(model.wordsPerToken).toBe(0.75);
  });

  it('rejects weights that do not sum to 1', () => {
    const result = BenchConfigSchema.safeParse({
      scoring: {
        weights: {
          cost: 0.5,
          latency: 0.1,
          word_count: 0.1,
          accuracy: 0.3,
          safety: 0.1,
          factuality: 0.15,
        },
      },
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.message).toBe('scoring weights must sum to 1.0');
  });

  it('rejects duplicate prompt ids', () => {
    const result = BenchConfigSchema.safeParse({
      prompts: [
        { id: 'P1', title: 'One' },
        { id: 'P1', title: 'Two' },
      ],
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.message).toBe('prompt ids must be unique');
  });

  it('rejects min words above max words', () => {
    const result = BenchConfigSchema.safeParse({ content: { minWords: 3000, maxWords: 2000 } });
    expect(result.success).toBe(false);
  });

  it('requires qc models to be configured', () => {
    const result = BenchConfigSchema.safeParse({
      models: [{ id: 'writer', type: 'fake', family: 'fake' }],
      qc: {
        generator: 'writer',
        checker: 'missing',
        prompt: { id: 'QC', title: 'Intro to OOP' },
      },
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((i) => i.path.join('.'))).toEqual(['qc.checker']);
  });
});
