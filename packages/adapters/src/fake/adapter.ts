import type {
  ModelRequest,
  ModelResponse,
  ProviderCapabilities,
} from '@contentbench/shared';

import type { ProviderAdapter } from '../adapter';
import type { AdapterConfig, AdapterContext } from '../types';

const JUDGE_REPLY = ['accuracy: 4', 'safety: 5', 'factuality: 4', 'tone: friendly'].join('\n');

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Offline provider for dry runs and tests.
 *
 * - JSON mode answers with a QC verdict. Verdicts are taken in order from the
 *   comma-separated `FAKE_ADAPTER_VERDICTS` env var (read at construction), then `APPROVED`.
 * - A judge prompt (one asking for `accuracy: [1-5]`) gets a fixed score block.
 * - Anything else gets a short article built from the `Title: "..."` line.
 */
export class FakeAdapter implements ProviderAdapter {
  private readonly verdicts: string[];

  constructor(
    private readonly config: AdapterConfig,
    env: NodeJS.ProcessEnv = process.env,
  ) {
    this.verdicts = (env.FAKE_ADAPTER_VERDICTS ?? '')
      .split(',')
      .map((v) => v.trim())
      .filter(Boolean);
  }

  id(): string {
    return 'fake';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsJsonMode: true,
      reportsUsage: true,
    };
  }

  async generate(request: ModelRequest, _context: AdapterContext): Promise<ModelResponse> {
    const prompt = request.messages.map((m) => m.content).join('\n');
    const text = this.reply(request, prompt);
    const inputTokens = wordCount(prompt);
    const outputTokens = wordCount(text);
    return {
      text,
      usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
    };
  }

  private reply(request: ModelRequest, prompt: string): string {
    if (request.jsonMode) {
      const verdict = this.verdicts.shift() ?? 'APPROVED';
      const tip = verdict === 'APPROVED' ? '' : 'Add a concrete example for each keyword.';
      return JSON.stringify({ verdict, tip });
    }

    if (prompt.includes('accuracy: [1-5]')) {
      return JUDGE_REPLY;
    }

    const title = /Title: "([^"]*)"/.exec(prompt)?.[1] ?? 'Untitled';
    return [
      `# ${title}`,
      '',
      `Think of ${title.toLowerCase()} like a well-run kitchen: every station knows its job.`,
      `This draft was written offline by ${this.config.id} for a dry run.`,
      '',
      'Sources: [Example Research](https://example.com/research) and https://example.org/report',
    ].join('\n');
  }
}
