import type { ZodError } from 'zod';
import type { ModelConfig, ProviderType } from './schema';

/**
 * Environment variable consulted for each provider type when `api_key_env` is not set.
 */
export const DEFAULT_API_KEY_ENV: Record<ProviderType, string | undefined> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  gemini: 'GEMINI_API_KEY',
  fake: undefined,
};

export interface CredentialProblem {
  /** Model or judge id */
  id: string;
  /** Environment variable that was checked, if any */
  envVar?: string;
  message: string;
}

/**
 * Resolves the API key for a model: `api_key` first, then the configured or default env var.
 */
export function resolveApiKey(
  config: Pick<ModelConfig, 'type' | 'api_key' | 'api_key_env'>,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  if (config.api_key) return config.api_key;
  const envVar = config.api_key_env ?? DEFAULT_API_KEY_ENV[config.type];
  return envVar ? env[envVar] || undefined : undefined;
}

/**
 * Lists every model whose credentials cannot be resolved.
 * Fake models never need credentials.
 */
export function findMissingCredentials(
  models: ModelConfig[],
  env: NodeJS.ProcessEnv = process.env,
): CredentialProblem[] {
  const problems: CredentialProblem[] = [];
  for (const model of models) {
    if (model.type === 'fake') continue;
    if (resolveApiKey(model, env)) continue;
    const envVar = model.api_key_env ?? DEFAULT_API_KEY_ENV[model.type];
    problems.push({
      id: model.id,
      envVar,
      message: `Missing API key for '${model.id}' (${model.type}). Set api_key or the ${envVar} environment variable.`,
    });
  }
  return problems;
}

/**
 * Formats zod issues as one `path: message` line each.
 */
export function formatConfigIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  - ${location}: ${issue.message}`;
    })
    .join('\n');
}
