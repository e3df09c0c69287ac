import {
  QcVerdictSchema,
  errorMessage,
  parseJsonReply,
  type QcVerdict,
} from '@contentbench/shared';
import type { ProviderRegistry } from '../registry';
import { adapterContextFor, type RunContext } from '../context';

export function buildQualityCheckPrompt(draft: string): string {
  return [
    'You are a content quality checker. Analyze this draft and provide a JSON response with:',
    '1. A verdict: "APPROVED" if the content is clear, factual, and safe (all scores ≥4), otherwise "REJECTED"',
    '2. A brief tip for improvement if rejected',
    '',
    'Format your response exactly like this JSON:',
    '{',
    '  "verdict": "APPROVED" or "REJECTED",',
    '  "tip": "your improvement suggestion"',
    '}',
    '',
    'Draft:',
    draft,
  ].join('\n');
}

/**
 * Reviews a draft. Resolves to null when no valid verdict could be obtained.
 */
export interface QualityChecker {
  check(content: string): Promise<QcVerdict | null>;
}

export class AdapterQualityChecker implements QualityChecker {
  constructor(
    private readonly registry: ProviderRegistry,
    private readonly run: RunContext,
    private readonly checkerId: string,
  ) {}

  async check(content: string): Promise<QcVerdict | null> {
    if (!content.trim()) {
      return null;
    }

    const config = this.registry.getModelConfig(this.checkerId);
    const adapter = this.registry.getAdapter(this.checkerId);
    const response = await adapter.generate(
      {
        messages: [{ role: 'user', content: buildQualityCheckPrompt(content) }],
        maxTokens: config.maxTokens,
        temperature: config.temperature,
        jsonMode: adapter.capabilities().supportsJsonMode,
      },
      adapterContextFor(this.run, config),
    );

    if (!response.text) {
      return null;
    }

    let raw: unknown;
    try {
      raw = parseJsonReply(response.text, 'quality check');
    } catch (error) {
      await this.run.logger.warn(errorMessage(error));
      return null;
    }

    const parsed = QcVerdictSchema.safeParse(raw);
    if (!parsed.success) {
      await this.run.logger.warn(
        `Quality check returned an invalid verdict: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
      );
      return null;
    }
    return parsed.data;
  }
}
