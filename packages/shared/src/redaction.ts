export const REDACTED = '[REDACTED]';

/** Provider key shapes that can surface in SDK error messages. */
const KEY_PATTERNS: RegExp[] = [
  /sk-ant-[A-Za-z0-9-]{20,}/g,
  /sk-(?:proj-)?[A-Za-z0-9-]{20,}/g,
  /AIza[0-9A-Za-z_-]{35}/g,
  /\b[A-Z][A-Z0-9_]*(?:API_KEY|TOKEN|SECRET)\s*=\s*['"]?[^\s'"]+['"]?/g,
];

/** Object keys whose values are dropped whatever they contain. */
const SECRET_KEY = /^(?:api[_-]?key|authorization|token|secret|password)$/i;

export function redactText(text: string): string {
  return KEY_PATTERNS.reduce((acc, pattern) => acc.replace(pattern, REDACTED), text);
}

/**
 * Deep copy of `value` with credentials replaced, for anything written to the event log.
 */
export function redactSecrets(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactText(value);
  }
  if (Array.isArray(value)) {
    return value.map(redactSecrets);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, inner]) => [
        key,
        SECRET_KEY.test(key) && inner !== undefined && inner !== null ? REDACTED : redactSecrets(inner),
      ]),
    );
  }
  return value;
}
