import { describe, it, expect } from 'vitest';
import { CostTracker, computeCost, roundUsd } from './tracker';
import { modelConfig } from '../test-helpers';

describe('computeCost', () => {
  it('prices tokens per million and rounds to four decimals', () => {
    // 1500/1e6 * 0.15 + 2000/1e6 * 0.6 = 0.000225 + 0.0012 = 0.001425
    expect(
      computeCost(
        { inputPerMTokUsd: 0.15, outputPerMTokUsd: 0.6 },
        { promptTokens: 1500, completionTokens: 2000 },
      ),
    ).toBe(0.0014);
  });

  it('is zero without pricing', () => {
    expect(
      computeCost(
        { inputPerMTokUsd: 0, outputPerMTokUsd: 0 },
        { promptTokens: 10, completionTokens: 10 },
      ),
    ).toBe(0);
  });
});

describe('roundUsd', () => {
  it('keeps four decimals', () => {
    expect(roundUsd(0.123456)).toBe(0.1235);
  });
});

describe('CostTracker', () => {
  it('should start with empty stats', () => {
    const summary = new CostTracker([]).getSummary();

    expect(summary.total).toEqual({
      records: 0,
      promptTokens: 0,
      completionTokens: 0,
      totalTokens: 0,
      costUsd: 0,
    });
    expect(Object.keys(summary.models)).toHaveLength(0);
  });

  it('accumulates usage and cost per model', () => {
    const tracker = new CostTracker([
      modelConfig({ id: 'gpt', pricing: { inputPerMTokUsd: 10, outputPerMTokUsd: 30 } }),
      modelConfig({ id: 'free' }),
    ]);

    expect(tracker.recordUsage('gpt', { promptTokens: 1_000_000, completionTokens: 1_000_000 })).toBe(
      40,
    );
    tracker.recordUsage('gpt', { promptTokens: 100, completionTokens: 0 });
    tracker.recordUsage('free', { promptTokens: 5, completionTokens: 5 });

    const summary = tracker.getSummary();
    expect(summary.models.gpt).toEqual({
      records: 2,
      promptTokens: 1_000_100,
      completionTokens: 1_000_000,
      totalTokens: 2_000_100,
      costUsd: 40.001,
    });
    expect(summary.total.records).toBe(3);
    expect(summary.total.costUsd).toBe(40.001);
  });
});
