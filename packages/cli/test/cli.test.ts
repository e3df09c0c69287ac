import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ContestResultSchema,
  JudgmentStoreSchema,
  QcRunSnapshotSchema,
} from '@contentbench/shared';
import type { LinkChecker } from '@contentbench/core';
import { createProgram } from '../src/program';
import { runDoctorChecks, isFailure } from '../src/commands/doctor';
import type { CliDeps } from '../src/session';

const CONFIG = `
models:
  - id: writer-a
    type: fake
    family: alpha
  - id: writer-b
    type: fake
    family: beta
judges:
  - id: judge-a
    type: fake
    family: alpha
  - id: judge-b
    type: fake
    family: beta
prompts:
  - id: P1
    title: Remote Work
    keywords: [remote work, hybrid teams]
judging:
  delayMs: 0
qc:
  generator: writer-a
  checker: judge-b
  prompt:
    id: QC1
    title: Object-Oriented Design
    keywords: [classes, objects]
  baseDelayMs: 0
`;

const stubChecker: LinkChecker = {
  probe: async (url) =>
    url.includes('example.org') ? { url, status: 404, valid: false } : { url, status: 200, valid: true },
};

describe('contentbench CLI', () => {
  let dir: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bench-cli-test-'));
    await fs.writeFile(path.join(dir, 'contentbench.yaml'), CONFIG);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function runCli(args: string[], deps: Partial<CliDeps> = {}): Promise<unknown> {
    const program = createProgram({
      cwd: dir,
      env: {},
      linkChecker: stubChecker,
      sleep: async () => {},
      ...deps,
    });
    program.exitOverride();
    await program.parseAsync(['node', 'contentbench', '--json', ...args]);
    const last = logSpy.mock.calls.at(-1)?.[0];
    return JSON.parse(String(last));
  }

  it('runs the whole pipeline with fake models', async () => {
    const output = await runCli(['run']);

    expect(output).toMatchObject({
      generate: { generated: 2, failed: 0 },
      analyze: { analyzed: 2, brokenLinks: 2 },
      judge: { judged: 2, fallbacks: 0 },
    });

    const judgments = JudgmentStoreSchema.parse(
      JSON.parse(await fs.readFile(path.join(dir, 'raw_outputs', 'content_with_judgment.json'), 'utf8')),
    );
    expect(Object.keys(judgments)).toEqual(['writer-a', 'writer-b']);
    expect(judgments['writer-a']?.[0]).toMatchObject({
      id: 'P1',
      title: 'Remote Work',
      accuracy: 4,
      safety: 5,
      factuality: 4,
      tone: 'friendly',
      broken_links: ['https://example.org/report'],
    });

    const contest = ContestResultSchema.parse(
      JSON.parse(await fs.readFile(path.join(dir, 'raw_outputs', 'contest_results.json'), 'utf8')),
    );
    expect(['writer-a', 'writer-b']).toContain(contest.winner.model);

    const events = await fs.readFile(path.join(dir, 'raw_outputs', 'events.jsonl'), 'utf8');
    const types = events.trim().split('\n').map((line) => JSON.parse(line).type);
    expect(types.filter((t) => t === 'StageFinished')).toHaveLength(4);
  });

  it('checks judge credentials before generating anything in run', async () => {
    await fs.writeFile(
      path.join(dir, 'contentbench.yaml'),
      CONFIG.replace('  - id: judge-b\n    type: fake', '  - id: judge-b\n    type: openai'),
    );

    await expect(runCli(['run'])).rejects.toThrow(
      "Missing API key for 'judge-b' (openai). Set api_key or the OPENAI_API_KEY environment variable.",
    );
    await expect(fs.access(path.join(dir, 'raw_outputs', 'content_with_costs.json'))).rejects.toThrow();
  });

  it('honours --out for every store file', async () => {
    await runCli(['--out', 'elsewhere', 'generate', '--prompt', 'P1', '--model', 'writer-b']);

    const store = JSON.parse(await fs.readFile(path.join(dir, 'elsewhere', 'content_with_costs.json'), 'utf8'));
    expect(Object.keys(store)).toEqual(['writer-b']);
  });

  it('rejects unknown prompt ids', async () => {
    await expect(runCli(['generate', '--prompt', 'P9'])).rejects.toThrow('Unknown prompt id(s): P9');
  });

  it('revises once in qc when the checker rejects the first draft', async () => {
    const output = await runCli(['qc'], {
      env: { FAKE_ADAPTER_VERDICTS: 'REJECTED,APPROVED' },
      now: () => new Date(2026, 4, 6, 7, 8, 9),
    });

    const file = path.join(dir, 'qc_results', 'article_20260506_070809.json');
    expect(output).toEqual({ qc: { status: 'approved_revised', path: file } });

    const snapshot = QcRunSnapshotSchema.parse(JSON.parse(await fs.readFile(file, 'utf8')));
    expect(snapshot.content).toContain('# Object-Oriented Design');
    expect(snapshot.qc_result).toEqual({ verdict: 'APPROVED', tip: '' });
  });
});

describe('doctor checks', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bench-doctor-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('flags missing keys and models without a cross-family judge', async () => {
    await fs.writeFile(
      path.join(dir, 'contentbench.yaml'),
      [
        'models:',
        '  - { id: gpt, type: openai, family: openai }',
        'judges:',
        '  - { id: o-judge, type: fake, family: openai }',
      ].join('\n'),
    );

    const results = runDoctorChecks({}, { cwd: dir, env: {} });
    const failures = results.filter(isFailure).map(([, message]) => message);

    expect(failures).toEqual([
      "Missing API key for 'gpt' (openai). Set api_key or the OPENAI_API_KEY environment variable.",
      "No judge outside family 'openai' for model 'gpt'",
    ]);
  });

  it('reports a broken configuration file', async () => {
    await fs.writeFile(path.join(dir, 'contentbench.yaml'), 'models: [');

    const results = runDoctorChecks({}, { cwd: dir, env: {} });

    expect(results).toHaveLength(1);
    expect(isFailure(results[0] ?? ['', ''])).toBe(true);
  });
});
