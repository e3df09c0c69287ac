import type { ModelConfig } from '@contentbench/shared';
import type { GenerationResult } from '../capabilities';
import type { TokenCounts } from '../cost/tracker';

export function countWhitespaceWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Word-based token estimate: `floor(words / wordsPerToken)`, at least 1.
 */
export function estimateTokens(text: string, wordsPerToken: number): number {
  return Math.max(1, Math.floor(countWhitespaceWords(text) / wordsPerToken));
}

export interface UsageResolution {
  tokens: TokenCounts;
  /** True when the model is configured `reported` but the provider sent no usage */
  fellBack: boolean;
}

/**
 * Applies the model's usage accounting. Prompt words are counted over `system + " " + user`.
 */
export function resolveUsage(
  model: Pick<ModelConfig, 'usageAccounting' | 'wordsPerToken'>,
  systemInstruction: string,
  userInstruction: string,
  result: GenerationResult,
): UsageResolution {
  if (model.usageAccounting === 'reported' && result.usage) {
    return { tokens: result.usage, fellBack: false };
  }
  return {
    tokens: {
      promptTokens: estimateTokens(`${systemInstruction} ${userInstruction}`, model.wordsPerToken),
      completionTokens: estimateTokens(result.text, model.wordsPerToken),
    },
    fellBack: model.usageAccounting === 'reported',
  };
}
