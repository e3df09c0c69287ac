import OpenAI, { APIError, APIConnectionTimeoutError } from 'openai';
import type {
  ChatMessage,
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
} from '@contentbench/shared';
import type { ProviderAdapter } from '../adapter';
import type { AdapterConfig, AdapterContext } from '../types';
import { BaseProviderAdapter, type ErrorTypeConfig } from '../base-adapter';
import { executeProviderRequest } from '../common';

export class OpenAIAdapter extends BaseProviderAdapter implements ProviderAdapter {
  private client: OpenAI;
  private model: string;

  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error): error is APIError => error instanceof APIError,
    isTimeoutError: (error) => error instanceof APIConnectionTimeoutError,
  };

  constructor(config: AdapterConfig) {
    super();
    const apiKey = BaseProviderAdapter.requireApiKey(config, 'openai', 'OpenAI');
    this.model = config.model ?? config.id;
    // Retries are handled by executeProviderRequest.
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
  }

  id(): string {
    return 'openai';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsJsonMode: true,
      reportsUsage: true,
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, 'openai', this.model, async (signal) => {
      try {
        const completion = await this.client.chat.completions.create(
          {
            model: this.model,
            messages: this.mapMessages(req.messages),
            max_completion_tokens: req.maxTokens,
            temperature: req.temperature,
            response_format: req.jsonMode ? { type: 'json_object' } : undefined,
          },
          { signal },
        );

        const choice = completion.choices[0];
        const usage = completion.usage
          ? {
              inputTokens: completion.usage.prompt_tokens,
              outputTokens: completion.usage.completion_tokens,
              totalTokens: completion.usage.total_tokens,
            }
          : undefined;

        return {
          text: choice?.message.content || undefined,
          usage,
          raw: completion,
        };
      } catch (error) {
        throw this.mapError(error);
      }
    });
  }

  private mapMessages(messages: ChatMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
    return messages.map((m): OpenAI.Chat.ChatCompletionMessageParam => {
      switch (m.role) {
        case 'system':
          return { role: 'system', content: m.content };
        case 'assistant':
          return { role: 'assistant', content: m.content };
        case 'user':
          return { role: 'user', content: m.content };
      }
    });
  }
}
