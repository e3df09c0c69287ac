import type { ModelRequest, ModelResponse, ProviderCapabilities } from '@contentbench/shared';
import type { AdapterContext } from './types';

/**
 * One LLM provider behind a single `generate` call.
 *
 * `capabilities()` is read per request: generation only trusts `usage` from adapters
 * that report it, and the quality checker only asks for JSON mode where it exists.
 */
export interface ProviderAdapter {
  /** Provider name used in events and error messages, e.g. `openai` */
  id(): string;
  capabilities(): ProviderCapabilities;
  generate(req: ModelRequest, ctx: AdapterContext): Promise<ModelResponse>;
}
