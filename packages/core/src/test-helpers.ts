import { vi } from 'vitest';
import {
  ModelConfigSchema,
  RetryConfigSchema,
  type Logger,
  type ModelConfig,
  type ModelRequest,
  type ModelResponse,
  type ProviderCapabilities,
} from '@contentbench/shared';
import type { ProviderAdapter } from '@contentbench/adapters';
import { createMockLogger } from '@contentbench/shared/test-helpers';
import { ProviderRegistry } from './registry';
import type { RunContext } from './context';

export { createMockLogger };

export function createRunContext(logger: Logger = createMockLogger()): RunContext {
  return {
    runId: 'test-run',
    logger,
    retry: RetryConfigSchema.parse({ maxRetries: 0 }),
    sleep: vi.fn().mockResolvedValue(undefined),
  };
}

export function modelConfig(
  input: { id: string; family?: string } & Partial<Omit<ModelConfig, 'id' | 'family'>>,
): ModelConfig {
  return ModelConfigSchema.parse({ type: 'fake', family: input.id, ...input });
}

/**
 * Adapter answering every request through `reply`; requests are recorded.
 */
export class ScriptedAdapter implements ProviderAdapter {
  readonly requests: ModelRequest[] = [];

  constructor(
    private readonly reply: (req: ModelRequest) => ModelResponse | Promise<ModelResponse>,
    private readonly caps: ProviderCapabilities = { supportsJsonMode: true, reportsUsage: true },
  ) {}

  id() {
    return 'scripted';
  }

  capabilities(): ProviderCapabilities {
    return this.caps;
  }

  async generate(req: ModelRequest): Promise<ModelResponse> {
    this.requests.push(req);
    return this.reply(req);
  }
}

/**
 * Registry whose `fake` factory hands out the given adapters by model id.
 */
export function registryWith(
  entries: Array<{ config: ModelConfig; adapter: ProviderAdapter }>,
): ProviderRegistry {
  const registry = new ProviderRegistry(
    entries.map((e) => e.config),
    {},
  );
  const byId = new Map(entries.map((e) => [e.config.id, e.adapter]));
  const factory = (config: ModelConfig): ProviderAdapter => {
    const adapter = byId.get(config.id);
    if (!adapter) throw new Error(`no scripted adapter for ${config.id}`);
    return adapter;
  };
  registry.registerFactory('fake', factory);
  registry.registerFactory('openai', factory);
  registry.registerFactory('anthropic', factory);
  registry.registerFactory('gemini', factory);
  return registry;
}
