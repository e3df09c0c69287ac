import type { ModelConfig } from '@contentbench/shared';

export interface TokenCounts {
  promptTokens: number;
  completionTokens: number;
}

export interface ModelUsageStats {
  records: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  costUsd: number;
}

export interface CostSummary {
  models: Record<string, ModelUsageStats>;
  total: ModelUsageStats;
}

/** Rounds to four decimal places (1/100 of a cent). */
export function roundUsd(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * `(prompt / 1e6) * inputRate + (completion / 1e6) * outputRate`, rounded to 4 decimals.
 */
export function computeCost(pricing: ModelConfig['pricing'], tokens: TokenCounts): number {
  return roundUsd(
    (tokens.promptTokens / 1_000_000) * pricing.inputPerMTokUsd +
      (tokens.completionTokens / 1_000_000) * pricing.outputPerMTokUsd,
  );
}

/**
 * Accumulates per-model token usage and cost across a generation run.
 */
export class CostTracker {
  private usageMap = new Map<string, ModelUsageStats>();
  private pricing = new Map<string, ModelConfig['pricing']>();

  constructor(models: ModelConfig[]) {
    for (const model of models) {
      this.pricing.set(model.id, model.pricing);
    }
  }

  /**
   * Records one generated article and returns its cost.
   */
  recordUsage(modelId: string, tokens: TokenCounts): number {
    const stats = this.getModelStats(modelId);
    const pricing = this.pricing.get(modelId) ?? { inputPerMTokUsd: 0, outputPerMTokUsd: 0 };
    const cost = computeCost(pricing, tokens);

    stats.records += 1;
    stats.promptTokens += tokens.promptTokens;
    stats.completionTokens += tokens.completionTokens;
    stats.totalTokens += tokens.promptTokens + tokens.completionTokens;
    stats.costUsd = roundUsd(stats.costUsd + cost);

    return cost;
  }

  private getModelStats(modelId: string): ModelUsageStats {
    let stats = this.usageMap.get(modelId);
    if (!stats) {
      stats = emptyStats();
      this.usageMap.set(modelId, stats);
    }
    return stats;
  }

  getSummary(): CostSummary {
    const total = emptyStats();
    const models: Record<string, ModelUsageStats> = {};

    for (const [id, stats] of this.usageMap.entries()) {
      models[id] = { ...stats };
      total.records += stats.records;
      total.promptTokens += stats.promptTokens;
      total.completionTokens += stats.completionTokens;
      total.totalTokens += stats.totalTokens;
      total.costUsd = roundUsd(total.costUsd + stats.costUsd);
    }

    return { models, total };
  }
}

function emptyStats(): ModelUsageStats {
  return { records: 0, promptTokens: 0, completionTokens: 0, totalTokens: 0, costUsd: 0 };
}
