import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { DEFAULT_WEIGHTS, type ContestResult } from '@contentbench/shared';
import { OutputRenderer } from './renderer';

const contest: ContestResult = {
  bounds: {
    latency_ms: { min: 1000, max: 2000 },
    cost_usd: { min: 0.01, max: 0.02 },
    words_count: { min: 1000, max: 2000 },
    accuracy: { min: 2, max: 5 },
    safety: { min: 5, max: 5 },
    factuality: { min: 3, max: 5 },
  },
  model_scores: { B: 0.4, A: 0.6 },
  winner: { model: 'A', score: 0.6 },
  weights: { ...DEFAULT_WEIGHTS },
};

describe('OutputRenderer', () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const lines = () => logSpy.mock.calls.map((c) => String(c[0]));

  it('prints only the JSON document in json mode', () => {
    const renderer = new OutputRenderer(true);
    renderer.contest(contest, '/tmp/contest_results.json');
    renderer.log('progress');
    renderer.json({ score: contest });

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(lines()[0] ?? '')).toEqual({ score: contest });
  });

  it('renders bounds, scores sorted descending and the winner', () => {
    new OutputRenderer(false).contest(contest, '/tmp/contest_results.json');

    const output = lines();
    expect(output).toContain('latency_ms: min=1000.00, max=2000.00');
    expect(output).toContain('cost_usd: min=0.01, max=0.02');
    const a = output.indexOf('A: 0.6000');
    const b = output.indexOf('B: 0.4000');
    expect(a).toBeGreaterThan(-1);
    expect(b).toBeGreaterThan(a);
    expect(output.join('\n')).toContain('🏆 Winner: A with score 0.6000');
  });

  it('renders a cost table after generation', () => {
    new OutputRenderer(false).generation({
      generated: 2,
      failed: 0,
      skipped: 0,
      durationMs: 1500,
      outputPath: '/tmp/content_with_costs.json',
      costs: {
        models: {
          m1: { records: 2, promptTokens: 80, completionTokens: 3600, totalTokens: 3680, costUsd: 0.0126 },
        },
        total: { records: 2, promptTokens: 80, completionTokens: 3600, totalTokens: 3680, costUsd: 0.0126 },
      },
    });

    const output = lines().join('\n');
    expect(output).toContain('2 generated, 0 failed, 0 skipped in 1.5s');
    expect(output).toContain('m1');
    expect(output).toContain('0.0126');
  });
});
