import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir, pathExists } from 'fs-extra';
import type { ZodType, ZodTypeDef } from 'zod';
import { StoreError, errorMessage } from '../errors';
import { toPrettyJson } from '../json-utils';
import { formatConfigIssues } from '../config/validation';

export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes to a temp file beside the target and renames it into place.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path) });
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, path);
}

export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  await atomicWrite(path, toPrettyJson(value));
}

/**
 * Reads and validates a JSON file.
 * Returns `undefined` when the file does not exist; any other failure is a StoreError.
 */
export async function readJsonFile<T>(
  path: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T | undefined> {
  if (!(await pathExists(path))) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(path, 'utf8'));
  } catch (error) {
    throw new StoreError(`Could not read ${path}: ${errorMessage(error)}`, {
      cause: error,
      filePath: path,
    });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new StoreError(`Malformed store file ${path}:\n${formatConfigIssues(result.error)}`, {
      filePath: path,
      cause: result.error,
    });
  }
  return result.data;
}
