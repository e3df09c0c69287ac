import { ApiError, GoogleGenAI, type Content } from '@google/genai';
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

/**
 * Google Gemini through `@google/genai`.
 *
 * `usageMetadata` is passed through when present but not advertised as reported usage:
 * it is optional and its candidate count leaves out thinking tokens. Generation falls
 * back to the word-based estimate for Gemini models.
 */
export class GeminiAdapter extends BaseProviderAdapter implements ProviderAdapter {
  private client: GoogleGenAI;
  private model: string;

  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error): error is ApiError => error instanceof ApiError,
    isTimeoutError: (error) => error instanceof Error && error.name === 'TimeoutError',
  };

  constructor(config: AdapterConfig) {
    super();
    const apiKey = BaseProviderAdapter.requireApiKey(config, 'gemini', 'Gemini');
    this.model = config.model ?? config.id;
    this.client = new GoogleGenAI({ apiKey });
  }

  id(): string {
    return 'gemini';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsJsonMode: true,
      reportsUsage: false,
    };
  }

  async generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse> {
    return executeProviderRequest(ctx, 'gemini', this.model, async (signal) => {
      try {
        const { systemInstruction, contents } = this.mapMessages(req.messages);

        const response = await this.client.models.generateContent({
          model: this.model,
          contents,
          config: {
            systemInstruction,
            maxOutputTokens: req.maxTokens,
            temperature: req.temperature,
            responseMimeType: req.jsonMode ? 'application/json' : undefined,
            abortSignal: signal,
          },
        });

        const metadata = response.usageMetadata;
        const usage: Usage | undefined = metadata
          ? {
              inputTokens: metadata.promptTokenCount,
              outputTokens: metadata.candidatesTokenCount,
              totalTokens: metadata.totalTokenCount,
            }
          : undefined;

        return {
          text: response.text || undefined,
          usage,
          raw: response,
        };
      } catch (error) {
        throw this.mapError(error);
      }
    });
  }

  private mapMessages(messages: ChatMessage[]): {
    systemInstruction?: string;
    contents: Content[];
  } {
    let systemInstruction: string | undefined;
    const contents: Content[] = [];

    for (const m of messages) {
      if (m.role === 'system') {
        systemInstruction = systemInstruction ? systemInstruction + '\n' + m.content : m.content;
      } else {
        contents.push({
          role: m.role === 'assistant' ? 'model' : 'user',
          parts: [{ text: m.content }],
        });
      }
    }

    return { systemInstruction, contents };
  }
}
