import { describe, it, expect, vi, beforeEach } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { AnthropicAdapter } from './adapter';
import { RateLimitError, TimeoutError, ConfigError } from '../errors';
import type { AdapterContext } from '../types';
import { createMockLogger } from '@contentbench/shared/test-helpers';

const { mockCreate } = vi.hoisted(() => ({ mockCreate: vi.fn() }));

vi.mock('@anthropic-ai/sdk', () => {
  class MockAnthropic {
    messages = {
      create: mockCreate,
    };

    static APIError = class extends Error {
      status: number | undefined;
      constructor(status: number | undefined, _error: unknown, message: string | undefined) {
        super(message);
        this.status = status;
      }
    };

    static APIConnectionTimeoutError = class extends Error {
      constructor({ message }: { message?: string } = {}) {
        super(message ?? 'Request timed out.');
      }
    };
  }

  return {
    default: MockAnthropic,
  };
});

describe('AnthropicAdapter', () => {
  let adapter: AnthropicAdapter;
  const ctx: AdapterContext = {
    runId: 'test-run',
    logger: createMockLogger(),
    retryOptions: { maxRetries: 0 },
  };

  beforeEach(() => {
    vi.clearAllMocks();

    adapter = new AnthropicAdapter({
      id: 'claude',
      model: 'claude-3-5-haiku-latest',
      api_key: 'test-key',
    });
  });

  it('lifts system messages and joins text blocks', async () => {
    mockCreate.mockResolvedValue({
      content: [
        { type: 'text', text: 'Hello' },
        { type: 'tool_use', id: 't1', name: 'noop', input: {} },
        { type: 'text', text: ' world' },
      ],
      usage: { input_tokens: 10, output_tokens: 5 },
    });

    const result = await adapter.generate(
      {
        messages: [
          { role: 'system', content: 'You are an expert content analyzer.' },
          { role: 'user', content: 'Hi' },
        ],
        temperature: 0.1,
      },
      ctx,
    );

    expect(result.text).toBe('Hello world');
    expect(result.usage).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15 });
    expect(mockCreate).toHaveBeenCalledWith(
      {
        model: 'claude-3-5-haiku-latest',
        max_tokens: 4096,
        system: 'You are an expert content analyzer.',
        messages: [{ role: 'user', content: 'Hi' }],
        temperature: 0.1,
      },
      { signal: expect.any(AbortSignal) },
    );
  });

  it('passes maxTokens through', async () => {
    mockCreate.mockResolvedValue({ content: [], usage: { input_tokens: 1, output_tokens: 0 } });

    const result = await adapter.generate(
      { messages: [{ role: 'user', content: 'Hi' }], maxTokens: 50 },
      ctx,
    );

    expect(result.text).toBe('');
    expect(mockCreate).toHaveBeenCalledWith(
      expect.objectContaining({ max_tokens: 50, system: undefined }),
      expect.anything(),
    );
  });

  it('prefills an opening brace in JSON mode and restores it in the text', async () => {
    mockCreate.mockResolvedValue({
      content: [{ type: 'text', text: '"verdict": "APPROVED", "tip": ""}' }],
      usage: { input_tokens: 3, output_tokens: 9 },
    });

    const result = await adapter.generate(
      { messages: [{ role: 'user', content: 'Check this draft' }], jsonMode: true },
      ctx,
    );

    expect(result.text).toBe('{"verdict": "APPROVED", "tip": ""}');
    expect(mockCreate).toHaveBeenCalledWith(
      expect.objectContaining({
        messages: [
          { role: 'user', content: 'Check this draft' },
          { role: 'assistant', content: '{' },
        ],
      }),
      expect.anything(),
    );
    expect(adapter.capabilities().supportsJsonMode).toBe(true);
  });

  it('maps 429 to RateLimitError', async () => {
    mockCreate.mockRejectedValue(new Anthropic.APIError(429, undefined, 'Slow down', undefined));

    await expect(
      adapter.generate({ messages: [{ role: 'user', content: 'Hi' }] }, ctx),
    ).rejects.toThrow(RateLimitError);
  });

  it('maps 401 to ConfigError', async () => {
    mockCreate.mockRejectedValue(new Anthropic.APIError(401, undefined, 'Bad key', undefined));

    await expect(
      adapter.generate({ messages: [{ role: 'user', content: 'Hi' }] }, ctx),
    ).rejects.toThrow(ConfigError);
  });

  it('maps connection timeouts to TimeoutError', async () => {
    mockCreate.mockRejectedValue(new Anthropic.APIConnectionTimeoutError({ message: 'slow' }));

    await expect(
      adapter.generate({ messages: [{ role: 'user', content: 'Hi' }] }, ctx),
    ).rejects.toThrow(TimeoutError);
  });
});
