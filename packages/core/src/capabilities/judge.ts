import type { ProviderRegistry } from '../registry';
import { adapterContextFor, type RunContext } from '../context';

export const JUDGE_SYSTEM_PROMPT =
  'You are an expert content analyzer. Provide scores and tone analysis in the exact format requested.';

export function buildJudgePrompt(article: string): string {
  return [
    'Analyze this article and provide scores (1-5) for accuracy, safety, and factuality, plus a single word for tone.',
    'Format your response exactly like this:',
    'accuracy: [1-5]',
    'safety: [1-5]',
    'factuality: [1-5]',
    'tone: [single word]',
    '',
    'Article:',
    article,
  ].join('\n');
}

/**
 * Scores an article; resolves to the judge's raw text.
 */
export interface JudgeCapability {
  readonly judgeId: string;
  judge(article: string): Promise<string>;
}

export class AdapterJudge implements JudgeCapability {
  constructor(
    private readonly registry: ProviderRegistry,
    private readonly run: RunContext,
    readonly judgeId: string,
    private readonly temperature?: number,
  ) {}

  async judge(article: string): Promise<string> {
    const config = this.registry.getModelConfig(this.judgeId);
    const response = await this.registry.getAdapter(this.judgeId).generate(
      {
        messages: [
          { role: 'system', content: JUDGE_SYSTEM_PROMPT },
          { role: 'user', content: buildJudgePrompt(article) },
        ],
        maxTokens: config.maxTokens,
        temperature: config.temperature ?? this.temperature,
      },
      adapterContextFor(this.run, config),
    );
    return response.text ?? '';
  }
}
