import type { ZodType, ZodTypeDef } from 'zod';
import {
  StoreError,
  readJsonFile,
  writeJsonAtomic,
  type ResultStore,
} from '@contentbench/shared';

export type StoreSchema<R extends { id: string }> = ZodType<ResultStore<R>, ZodTypeDef, unknown>;

/**
 * Reads a store written by an earlier stage.
 * @throws {StoreError} when the file is missing or malformed
 */
export async function readStore<R extends { id: string }>(
  filePath: string,
  schema: StoreSchema<R>,
): Promise<ResultStore<R>> {
  const data = await readJsonFile(filePath, schema);
  if (data === undefined) {
    throw new StoreError(`Store file not found: ${filePath}. Run the previous stage first.`, {
      filePath,
    });
  }
  return data;
}

/**
 * A model-keyed store file with at most one record per prompt id in each model's list.
 * Every save rewrites the whole file atomically.
 */
export class RecordStore<R extends { id: string }> {
  private constructor(
    readonly filePath: string,
    private readonly data: ResultStore<R>,
  ) {}

  /** Opens an existing store for merging, or starts an empty one. */
  static async open<R extends { id: string }>(
    filePath: string,
    schema: StoreSchema<R>,
  ): Promise<RecordStore<R>> {
    const data = await readJsonFile(filePath, schema);
    return new RecordStore(filePath, data ?? {});
  }

  static empty<R extends { id: string }>(filePath: string): RecordStore<R> {
    return new RecordStore<R>(filePath, {});
  }

  /**
   * Replaces the record with the same prompt id in place, or appends it.
   * @returns whether an existing record was replaced
   */
  upsert(model: string, record: R): boolean {
    const list = this.data[model] ?? [];
    this.data[model] = list;

    const index = list.findIndex((r) => r.id === record.id);
    if (index >= 0) {
      list[index] = record;
      return true;
    }
    list.push(record);
    return false;
  }

  get(model: string, promptId: string): R | undefined {
    return this.data[model]?.find((r) => r.id === promptId);
  }

  has(model: string, promptId: string): boolean {
    return this.get(model, promptId) !== undefined;
  }

  models(): string[] {
    return Object.keys(this.data);
  }

  records(model: string): readonly R[] {
    return this.data[model] ?? [];
  }

  snapshot(): ResultStore<R> {
    const copy: ResultStore<R> = {};
    for (const [model, records] of Object.entries(this.data)) {
      copy[model] = [...records];
    }
    return copy;
  }

  async save(): Promise<void> {
    await writeJsonAtomic(this.filePath, this.data);
  }
}
