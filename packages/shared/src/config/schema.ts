import { z } from 'zod';

export const PROVIDER_TYPES = ['openai', 'anthropic', 'gemini', 'fake'] as const;

export const ModelConfigSchema = z.object({
  /** Key used in every store file; also the API model name unless `model` is set */
  id: z.string().min(1),
  type: z.enum(PROVIDER_TYPES),
  model: z.string().optional(),
  /** Provider family used for cross-judging */
  family: z.string().min(1),
  api_key_env: z.string().optional(),
  api_key: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
  maxTokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  pricing: z
    .object({
      inputPerMTokUsd: z.number().nonnegative().default(0),
      outputPerMTokUsd: z.number().nonnegative().default(0),
    })
    .default({ inputPerMTokUsd: 0, outputPerMTokUsd: 0 }),
  usageAccounting: z.enum(['reported', 'estimated']).default('reported'),
  wordsPerToken: z.number().positive().default(0.75),
});

export const PromptSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  keywords: z.array(z.string()).default([]),
});

export const DEFAULT_WEIGHTS = {
  cost: 0.25,
  latency: 0.1,
  word_count: 0.1,
  accuracy: 0.3,
  safety: 0.1,
  factuality: 0.15,
} as const;

const WEIGHT_SUM_TOLERANCE = 1e-6;

export const ScoreWeightsSchema = z
  .object({
    cost: z.number().min(0).max(1),
    latency: z.number().min(0).max(1),
    word_count: z.number().min(0).max(1),
    accuracy: z.number().min(0).max(1),
    safety: z.number().min(0).max(1),
    factuality: z.number().min(0).max(1),
  })
  .refine(
    (w) =>
      Math.abs(w.cost + w.latency + w.word_count + w.accuracy + w.safety + w.factuality - 1) <=
      WEIGHT_SUM_TOLERANCE,
    { message: 'scoring weights must sum to 1.0' },
  );

export const DEFAULT_SYSTEM_INSTRUCTION =
  'You are an expert tech writer with a friendly, witty personality. ' +
  'Produce fact-checked, safe, and highly accurate articles.';

export const ContentConfigSchema = z
  .object({
    systemInstruction: z.string().default(DEFAULT_SYSTEM_INSTRUCTION),
    minWords: z.number().int().positive().default(1500),
    maxWords: z.number().int().positive().default(2500),
    minSources: z.number().int().nonnegative().default(2),
  })
  .refine((c) => c.minWords <= c.maxWords, {
    message: 'content.minWords must not exceed content.maxWords',
    path: ['minWords'],
  });

export const AnalysisConfigSchema = z.object({
  concurrency: z.number().int().min(1).default(5),
  timeoutMs: z.number().int().positive().default(5000),
});

export const JudgingConfigSchema = z.object({
  delayMs: z.number().int().nonnegative().default(1000),
  /** Sent to judges without their own `temperature`; left unset when absent */
  temperature: z.number().min(0).max(2).optional(),
});

export const OutputConfigSchema = z.object({
  dir: z.string().default('raw_outputs'),
  generation: z.string().default('content_with_costs.json'),
  analysis: z.string().default('content_with_analysis.json'),
  judgment: z.string().default('content_with_judgment.json'),
  contest: z.string().default('contest_results.json'),
  events: z.string().default('events.jsonl'),
  qcDir: z.string().default('qc_results'),
});

export const RetryConfigSchema = z.object({
  /** Transient-error retries inside each provider request */
  maxRetries: z.number().int().nonnegative().default(2),
  initialDelayMs: z.number().int().nonnegative().default(1000),
});

export const QcConfigSchema = z.object({
  generator: z.string().min(1),
  checker: z.string().min(1),
  prompt: PromptSchema,
  maxAttempts: z.number().int().min(1).default(3),
  baseDelayMs: z.number().int().nonnegative().default(1000),
});

function uniqueIds(items: Array<{ id: string }>): boolean {
  return new Set(items.map((i) => i.id)).size === items.length;
}

export const BenchConfigSchema = z
  .object({
    configVersion: z.literal(1).default(1),
    models: z
      .array(ModelConfigSchema)
      .default([])
      .refine(uniqueIds, { message: 'model ids must be unique' }),
    judges: z
      .array(ModelConfigSchema)
      .default([])
      .refine(uniqueIds, { message: 'judge ids must be unique' }),
    prompts: z
      .array(PromptSchema)
      .default([])
      .refine(uniqueIds, { message: 'prompt ids must be unique' }),
    content: ContentConfigSchema.default({}),
    analysis: AnalysisConfigSchema.default({}),
    judging: JudgingConfigSchema.default({}),
    scoring: z
      .object({
        weights: ScoreWeightsSchema.default(DEFAULT_WEIGHTS),
      })
      .default({}),
    output: OutputConfigSchema.default({}),
    retry: RetryConfigSchema.default({}),
    qc: QcConfigSchema.optional(),
  })
  .refine(
    (config) =>
      !config.qc ||
      [...config.models, ...config.judges].some((m) => m.id === config.qc?.generator),
    { message: 'qc.generator must name a configured model or judge', path: ['qc', 'generator'] },
  )
  .refine(
    (config) =>
      !config.qc || [...config.models, ...config.judges].some((m) => m.id === config.qc?.checker),
    { message: 'qc.checker must name a configured model or judge', path: ['qc', 'checker'] },
  );

export type ProviderType = (typeof PROVIDER_TYPES)[number];
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type Prompt = z.infer<typeof PromptSchema>;
export type ScoreWeights = z.infer<typeof ScoreWeightsSchema>;
export type ContentConfig = z.infer<typeof ContentConfigSchema>;
export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
export type JudgingConfig = z.infer<typeof JudgingConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type QcConfig = z.infer<typeof QcConfigSchema>;
export type BenchConfig = z.infer<typeof BenchConfigSchema>;
export type BenchConfigInput = z.input<typeof BenchConfigSchema>;
