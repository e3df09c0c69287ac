import Anthropic from '@anthropic-ai/sdk';
import type {
  ChatMessage,
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
  Usage,
} from '@contentbench/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterConfig, AdapterContext } from '../types';
import { BaseProviderAdapter, type ErrorTypeConfig } from '../base-adapter';
import { executeProviderRequest } from '../common';

const DEFAULT_MAX_TOKENS = 4096;
/** Messages API has no JSON mode; a prefilled brace steers the reply into an object. */
const JSON_PREFILL = '{';

export class AnthropicAdapter extends BaseProviderAdapter implements ProviderAdapter {
  private client: Anthropic;
  private model: string;

  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error): error is InstanceType<typeof Anthropic.APIError> =>
      error instanceof Anthropic.APIError,
    isTimeoutError: (error) => error instanceof Anthropic.APIConnectionTimeoutError,
  };

  constructor(config: AdapterConfig) {
    super();
    const apiKey = BaseProviderAdapter.requireApiKey(config, 'anthropic', 'Anthropic');
    this.model = config.model ?? config.id;
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  id(): string {
    return 'anthropic';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsJsonMode: true,
      reportsUsage: true,
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, 'anthropic', this.model, async (signal) => {
      try {
        const { system, messages } = this.mapMessages(req.messages);
        if (req.jsonMode) {
          messages.push({ role: 'assistant', content: JSON_PREFILL });
        }

        const response = await this.client.messages.create(
          {
            model: this.model,
            max_tokens: req.maxTokens ?? DEFAULT_MAX_TOKENS,
            system,
            messages,
            temperature: req.temperature,
          },
          { signal },
        );

        const reply = response.content.map((b) => (b.type === 'text' ? b.text : '')).join('');
        const text = req.jsonMode ? JSON_PREFILL + reply : reply;

        const usage: Usage = {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
          totalTokens: response.usage.input_tokens + response.usage.output_tokens,
        };

        return {
          text,
          usage,
          raw: response,
        };
      } catch (error) {
        throw this.mapError(error);
      }
    });
  }

  /** System messages are lifted into the top-level `system` parameter. */
  private mapMessages(messages: ChatMessage[]): {
    system?: string;
    messages: Anthropic.MessageParam[];
  } {
    let system: string | undefined;
    const mapped: Anthropic.MessageParam[] = [];

    for (const m of messages) {
      if (m.role === 'system') {
        system = system ? system + '\n' + m.content : m.content;
      } else {
        mapped.push({ role: m.role, content: m.content });
      }
    }

    return { system, messages: mapped };
  }
}
