import { z } from 'zod';

const generationShape = {
  id: z.string(),
  title: z.string(),
  keywords: z.array(z.string()),
  prompt_tokens: z.number().int().nonnegative(),
  completion_tokens: z.number().int().nonnegative(),
  total_tokens: z.number().int().nonnegative(),
  latency_ms: z.number().int().nonnegative(),
  cost_usd: z.number().nonnegative(),
  response: z.string(),
};

const analysisShape = {
  ...generationShape,
  words_count: z.number().int().nonnegative(),
  broken_links: z.array(z.string()),
};

/** 1-5, with 0 as the failure sentinel */
/** Judges are asked for 0-5; other integers are kept as the judge gave them */
const judgeScore = z.number().int();

const judgmentShape = {
  ...analysisShape,
  accuracy: judgeScore,
  safety: judgeScore,
  factuality: judgeScore,
  tone: z.string(),
};

export const GenerationRecordSchema = z.object(generationShape);
export const AnalysisRecordSchema = z.object(analysisShape);
export const JudgmentRecordSchema = z.object(judgmentShape);

export const GenerationStoreSchema = z.record(z.string(), z.array(GenerationRecordSchema));
export const AnalysisStoreSchema = z.record(z.string(), z.array(AnalysisRecordSchema));
export const JudgmentStoreSchema = z.record(z.string(), z.array(JudgmentRecordSchema));

const boundsShape = z.object({ min: z.number(), max: z.number() });

export const SCORED_METRICS = [
  'latency_ms',
  'cost_usd',
  'words_count',
  'accuracy',
  'safety',
  'factuality',
] as const;

export const ScoreBoundsSchema = z.object({
  latency_ms: boundsShape,
  cost_usd: boundsShape,
  words_count: boundsShape,
  accuracy: boundsShape,
  safety: boundsShape,
  factuality: boundsShape,
});

export const ContestResultSchema = z.object({
  bounds: ScoreBoundsSchema,
  model_scores: z.record(z.string(), z.number()),
  winner: z.object({ model: z.string(), score: z.number() }),
  weights: z.object({
    cost: z.number(),
    latency: z.number(),
    word_count: z.number(),
    accuracy: z.number(),
    safety: z.number(),
    factuality: z.number(),
  }),
});

export const QC_VERDICTS = ['APPROVED', 'REJECTED'] as const;

/** Checker output; the verdict is matched case-insensitively */
export const QcVerdictSchema = z.object({
  verdict: z
    .string()
    .transform((v) => v.trim().toUpperCase())
    .pipe(z.enum(QC_VERDICTS)),
  tip: z.string().default(''),
});

export const QC_STATUSES = [
  'approved',
  'approved_revised',
  'rejected_revised',
  'rejected_no_revision',
  'generation_failed',
  'check_failed',
  'revision_check_failed',
] as const;

export const QC_STATES = [
  'GENERATING',
  'QC_CHECKING',
  'APPROVED',
  'REJECTED',
  'REVISING',
  'RE_CHECKING',
  'APPROVED_REVISED',
  'REJECTED_REVISED',
  'FAILED',
] as const;

export const QcTransitionRecordSchema = z.object({
  from: z.enum(QC_STATES).nullable(),
  to: z.enum(QC_STATES),
  at: z.string(),
});

export const QcRunSnapshotSchema = z.object({
  timestamp: z.string(),
  content: z.string().nullable(),
  qc_result: z.object({ verdict: z.enum(QC_VERDICTS), tip: z.string() }).nullable(),
  status: z.enum(QC_STATUSES),
  transitions: z.array(QcTransitionRecordSchema),
});

export type GenerationRecord = z.infer<typeof GenerationRecordSchema>;
export type AnalysisRecord = z.infer<typeof AnalysisRecordSchema>;
export type JudgmentRecord = z.infer<typeof JudgmentRecordSchema>;
export type GenerationStore = z.infer<typeof GenerationStoreSchema>;
export type AnalysisStore = z.infer<typeof AnalysisStoreSchema>;
export type JudgmentStore = z.infer<typeof JudgmentStoreSchema>;
export type ScoredMetric = (typeof SCORED_METRICS)[number];
export type ScoreBounds = z.infer<typeof ScoreBoundsSchema>;
export type ContestResult = z.infer<typeof ContestResultSchema>;
export type QcVerdict = z.infer<typeof QcVerdictSchema>;
export type QcStatus = (typeof QC_STATUSES)[number];
export type QcState = (typeof QC_STATES)[number];
export type QcTransitionRecord = z.infer<typeof QcTransitionRecordSchema>;
export type QcRunSnapshot = z.infer<typeof QcRunSnapshotSchema>;

/** A store keyed by model id, each holding one record per prompt id */
export type ResultStore<R extends { id: string }> = Record<string, R[]>;
