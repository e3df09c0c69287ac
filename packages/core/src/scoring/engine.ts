import {
  StoreError,
  type ContestResult,
  type JudgmentRecord,
  type ResultStore,
  type ScoreBounds,
  type ScoreWeights,
  type ScoredMetric,
} from '@contentbench/shared';

/** `(value - min) / (max - min)`; exactly 0.5 when the metric does not discriminate. */
export function normalize(value: number, min: number, max: number): number {
  if (max === min) {
    return 0.5;
  }
  return (value - min) / (max - min);
}

type ScoredFields = Pick<JudgmentRecord, ScoredMetric>;

/**
 * Global min and max of every scored metric over all records of all models.
 * @throws {StoreError} when the store holds no records
 */
export function findBounds(store: ResultStore<JudgmentRecord>): ScoreBounds {
  const records = Object.values(store).flat();
  const [first, ...rest] = records;
  if (!first) {
    throw new StoreError('Judgment store has no records to score');
  }

  const bound = (metric: ScoredMetric) => {
    let min = first[metric];
    let max = first[metric];
    for (const record of rest) {
      min = Math.min(min, record[metric]);
      max = Math.max(max, record[metric]);
    }
    return { min, max };
  };

  return {
    latency_ms: bound('latency_ms'),
    cost_usd: bound('cost_usd'),
    words_count: bound('words_count'),
    accuracy: bound('accuracy'),
    safety: bound('safety'),
    factuality: bound('factuality'),
  };
}

/**
 * Weighted sum of one record's normalized metrics. Latency and cost are inverted
 * since lower is better.
 */
export function scoreRecord(record: ScoredFields, bounds: ScoreBounds, weights: ScoreWeights): number {
  const n = (metric: ScoredMetric) => normalize(record[metric], bounds[metric].min, bounds[metric].max);

  return (
    weights.cost * (1 - n('cost_usd')) +
    weights.latency * (1 - n('latency_ms')) +
    weights.word_count * n('words_count') +
    weights.accuracy * n('accuracy') +
    weights.safety * n('safety') +
    weights.factuality * n('factuality')
  );
}

/** Arithmetic mean of the record scores; undefined for a model without records. */
export function calculateModelScore(
  records: readonly ScoredFields[],
  bounds: ScoreBounds,
  weights: ScoreWeights,
): number | undefined {
  if (records.length === 0) {
    return undefined;
  }
  const total = records.reduce((sum, record) => sum + scoreRecord(record, bounds, weights), 0);
  return total / records.length;
}

/**
 * Strictly greatest score wins; on a tie the model seen first in key order keeps the lead.
 */
export function selectWinner(scores: Record<string, number>): ContestResult['winner'] | undefined {
  let winner: ContestResult['winner'] | undefined;
  for (const [model, score] of Object.entries(scores)) {
    if (!winner || score > winner.score) {
      winner = { model, score };
    }
  }
  return winner;
}

export interface ContestOutcome {
  result: ContestResult;
  /** Models present in the store with no records */
  skippedModels: string[];
}

export function runContest(store: ResultStore<JudgmentRecord>, weights: ScoreWeights): ContestOutcome {
  const bounds = findBounds(store);
  const modelScores: Record<string, number> = {};
  const skippedModels: string[] = [];

  for (const [model, records] of Object.entries(store)) {
    const score = calculateModelScore(records, bounds, weights);
    if (score === undefined) {
      skippedModels.push(model);
    } else {
      modelScores[model] = score;
    }
  }

  const winner = selectWinner(modelScores);
  if (!winner) {
    throw new StoreError('Judgment store has no records to score');
  }

  return {
    result: { bounds, model_scores: modelScores, winner, weights: { ...weights } },
    skippedModels,
  };
}
