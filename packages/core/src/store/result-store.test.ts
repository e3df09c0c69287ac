import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  GenerationStoreSchema,
  StoreError,
  type GenerationRecord,
} from '@contentbench/shared';
import { RecordStore, readStore } from './result-store';

const record = (id: string, response = `article ${id}`): GenerationRecord => ({
  id,
  title: `Title ${id}`,
  keywords: [],
  prompt_tokens: 1,
  completion_tokens: 2,
  total_tokens: 3,
  latency_ms: 10,
  cost_usd: 0,
  response,
});

describe('RecordStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bench-store-test-'));
    file = path.join(dir, 'raw_outputs', 'content_with_costs.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', async () => {
    const store = await RecordStore.open(file, GenerationStoreSchema);
    expect(store.models()).toEqual([]);
  });

  it('replaces a record in place and appends new prompt ids', async () => {
    const store = RecordStore.empty<GenerationRecord>(file);

    expect(store.upsert('m', record('P1'))).toBe(false);
    expect(store.upsert('m', record('P2'))).toBe(false);
    expect(store.upsert('m', record('P1', 'rewritten'))).toBe(true);

    expect(store.records('m').map((r) => [r.id, r.response])).toEqual([
      ['P1', 'rewritten'],
      ['P2', 'article P2'],
    ]);
    expect(store.has('m', 'P2')).toBe(true);
    expect(store.has('other', 'P2')).toBe(false);
  });

  it('round-trips through an atomic save and merges on reopen', async () => {
    const first = RecordStore.empty<GenerationRecord>(file);
    first.upsert('a', record('P1'));
    first.upsert('b', record('P1'));
    await first.save();

    const reopened = await RecordStore.open(file, GenerationStoreSchema);
    reopened.upsert('a', record('P2'));
    await reopened.save();

    const data = await readStore(file, GenerationStoreSchema);
    expect(Object.keys(data)).toEqual(['a', 'b']);
    expect(data.a?.map((r) => r.id)).toEqual(['P1', 'P2']);
    expect(await fs.readdir(path.dirname(file))).toEqual(['content_with_costs.json']);
  });

  it('snapshot is detached from later upserts', () => {
    const store = RecordStore.empty<GenerationRecord>(file);
    store.upsert('a', record('P1'));
    const snap = store.snapshot();
    store.upsert('a', record('P2'));
    expect(snap.a).toHaveLength(1);
  });
});

describe('readStore', () => {
  it('throws StoreError when the previous stage has not run', async () => {
    const missing = path.join(os.tmpdir(), 'bench-store-test-missing', 'nope.json');
    await expect(readStore(missing, GenerationStoreSchema)).rejects.toBeInstanceOf(StoreError);
    await expect(readStore(missing, GenerationStoreSchema)).rejects.toThrow(
      `Store file not found: ${missing}. Run the previous stage first.`,
    );
  });
});
