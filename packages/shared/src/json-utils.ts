import { errorMessage } from './errors';

const FENCE = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/;

/**
 * Parses the JSON object in a model reply. Accepts a bare object, one wrapped in a
 * ```json fence, or one surrounded by prose (the outermost braces are taken).
 *
 * @param what - Names the reply in error messages, e.g. `quality check`
 */
export function parseJsonReply(text: string, what = 'model'): unknown {
  const trimmed = text.trim();
  const body = FENCE.exec(trimmed)?.[1] ?? trimmed;

  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new Error(`No JSON object in ${what} reply`);
  }

  try {
    return JSON.parse(body.slice(start, end + 1));
  } catch (error) {
    throw new Error(`Unparseable JSON in ${what} reply: ${errorMessage(error)}`, { cause: error });
  }
}

/** Serializes a value the way every store file is written: two-space indent, trailing newline. */
export function toPrettyJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}
