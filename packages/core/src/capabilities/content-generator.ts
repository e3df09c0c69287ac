import type { ProviderRegistry } from '../registry';
import { adapterContextFor, type RunContext } from '../context';

export interface GenerationRequest {
  /** Configured model id */
  model: string;
  systemInstruction: string;
  userInstruction: string;
}

export interface GenerationResult {
  text: string;
  /** Present only when the provider reported both token counts */
  usage?: { promptTokens: number; completionTokens: number };
}

/**
 * Produces article text for a model. Resolves to null when the model returned nothing usable.
 */
export interface ContentGenerator {
  generate(request: GenerationRequest): Promise<GenerationResult | null>;
}

export class AdapterContentGenerator implements ContentGenerator {
  constructor(
    private readonly registry: ProviderRegistry,
    private readonly run: RunContext,
  ) {}

  async generate(request: GenerationRequest): Promise<GenerationResult | null> {
    const config = this.registry.getModelConfig(request.model);
    const adapter = this.registry.getAdapter(request.model);

    const response = await adapter.generate(
      {
        messages: [
          { role: 'system', content: request.systemInstruction },
          { role: 'user', content: request.userInstruction },
        ],
        maxTokens: config.maxTokens,
        temperature: config.temperature,
      },
      adapterContextFor(this.run, config),
    );

    const text = response.text;
    if (!text || !text.trim()) {
      return null;
    }

    const usage = adapter.capabilities().reportsUsage ? response.usage : undefined;
    if (usage?.inputTokens !== undefined && usage.outputTokens !== undefined) {
      return {
        text,
        usage: { promptTokens: usage.inputTokens, completionTokens: usage.outputTokens },
      };
    }
    return { text };
  }
}
