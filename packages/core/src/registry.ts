import {
  RegistryError,
  findMissingCredentials,
  resolveApiKey,
  type BenchConfig,
  type ModelConfig,
  type ProviderType,
} from '@contentbench/shared';
import {
  AnthropicAdapter,
  FakeAdapter,
  GeminiAdapter,
  OpenAIAdapter,
  type ProviderAdapter,
} from '@contentbench/adapters';

export { RegistryError } from '@contentbench/shared';

/**
 * Factory function type for creating provider adapters.
 * @param config - The configured model
 */
export type AdapterFactory = (config: ModelConfig) => ProviderAdapter;

/**
 * Registry for managing LLM provider adapters.
 * Handles credential preflight, adapter creation and caching.
 *
 * Models and judges share one id space; when both lists use the same id the
 * entry under `models` wins.
 *
 * @example
 * ```typescript
 * const registry = new ProviderRegistry([...config.models, ...config.judges]);
 * registry.registerFactory('openai', (cfg) => new OpenAIAdapter(cfg));
 *
 * registry.preflight(['gpt-4o-mini', 'o4-mini']);
 * const adapter = registry.getAdapter('gpt-4o-mini');
 * ```
 */
export class ProviderRegistry {
  private factories = new Map<string, AdapterFactory>();
  private adapters = new Map<string, ProviderAdapter>();
  private configs = new Map<string, ModelConfig>();

  constructor(
    models: ModelConfig[],
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {
    for (const model of models) {
      if (!this.configs.has(model.id)) {
        this.configs.set(model.id, model);
      }
    }
  }

  /**
   * Register a factory for creating adapters of a specific type.
   * @param type - The provider type identifier (e.g., 'openai', 'anthropic')
   */
  registerFactory(type: ProviderType, factory: AdapterFactory) {
    this.factories.set(type, factory);
  }

  /**
   * @throws {RegistryError} If the id is not configured
   */
  getModelConfig(modelId: string): ModelConfig {
    const config = this.configs.get(modelId);
    if (!config) {
      throw new RegistryError(`Model '${modelId}' not found in models or judges`);
    }
    return config;
  }

  /**
   * Checks that every id is configured, has a registered factory and resolvable
   * credentials. Reports every problem at once, before any provider is called.
   *
   * @throws {RegistryError}
   */
  preflight(modelIds: Iterable<string>): void {
    const problems: string[] = [];
    const configs: ModelConfig[] = [];

    for (const id of new Set(modelIds)) {
      const config = this.configs.get(id);
      if (!config) {
        problems.push(`Model '${id}' not found in models or judges`);
      } else if (!this.factories.has(config.type)) {
        problems.push(`Unknown provider type '${config.type}' for model '${id}'`);
      } else {
        configs.push(config);
      }
    }

    for (const missing of findMissingCredentials(configs, this.env)) {
      problems.push(missing.message);
    }

    if (problems.length > 0) {
      throw new RegistryError(problems.join('\n'));
    }
  }

  /**
   * Get an adapter instance for the given model id.
   * Creates and caches the adapter if not already instantiated.
   *
   * @throws {RegistryError} If the model is unknown, its factory is not registered, or credentials are missing
   */
  getAdapter(modelId: string): ProviderAdapter {
    const cached = this.adapters.get(modelId);
    if (cached) {
      return cached;
    }

    const config = this.getModelConfig(modelId);

    const factory = this.factories.get(config.type);
    if (!factory) {
      throw new RegistryError(`Unknown provider type '${config.type}' for model '${modelId}'`);
    }

    this.preflight([modelId]);

    const adapter = factory(config);
    this.adapters.set(modelId, adapter);
    return adapter;
  }
}

/**
 * Registry with the built-in OpenAI, Anthropic, Gemini and fake adapters registered.
 */
export function createDefaultRegistry(
  config: Pick<BenchConfig, 'models' | 'judges'>,
  env: NodeJS.ProcessEnv = process.env,
): ProviderRegistry {
  const registry = new ProviderRegistry([...config.models, ...config.judges], env);
  registry.registerFactory('openai', (cfg) => new OpenAIAdapter(withEnvKey(cfg, env)));
  registry.registerFactory('anthropic', (cfg) => new AnthropicAdapter(withEnvKey(cfg, env)));
  registry.registerFactory('gemini', (cfg) => new GeminiAdapter(withEnvKey(cfg, env)));
  registry.registerFactory('fake', (cfg) => new FakeAdapter(cfg, env));
  return registry;
}

/** Keys come from the injected env rather than process.env. */
function withEnvKey(config: ModelConfig, env: NodeJS.ProcessEnv): ModelConfig {
  const apiKey = resolveApiKey(config, env);
  return apiKey ? { ...config, api_key: apiKey } : config;
}
