export const SCORE_KEYS = ['accuracy', 'safety', 'factuality'] as const;

export type ScoreKey = (typeof SCORE_KEYS)[number];

export interface Judgment {
  accuracy: number;
  safety: number;
  factuality: number;
  tone: string;
}

/** Stored when the judge failed or said nothing usable. */
export const SENTINEL_JUDGMENT: Readonly<Judgment> = {
  accuracy: 0,
  safety: 0,
  factuality: 0,
  tone: 'unknown',
};

export interface MalformedScore {
  key: ScoreKey;
  value: string;
}

export interface ParsedJudgment {
  scores: Partial<Judgment>;
  /** Non-blank lines without a recognised `key: value` */
  ignoredLines: string[];
  /** Score values that did not parse as integers; each is stored as 0 */
  malformed: MalformedScore[];
  /** Integer scores outside 0-5; stored as given */
  outOfRange: MalformedScore[];
}

const MAX_SCORE = 5;

function isScoreKey(key: string): key is ScoreKey {
  return SCORE_KEYS.some((k) => k === key);
}

function parseScore(value: string): number | undefined {
  return /^[+-]?\d+$/.test(value) ? parseInt(value, 10) : undefined;
}

/**
 * Line parser for `key: value` judge output. Keys are split on the first colon and
 * matched case-insensitively; later lines override earlier ones. Never throws.
 */
export function parseJudgment(text: string): ParsedJudgment {
  const parsed: ParsedJudgment = { scores: {}, ignoredLines: [], malformed: [], outOfRange: [] };

  for (const rawLine of text.trim().split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    const colon = line.indexOf(':');
    const key = colon >= 0 ? line.slice(0, colon).trim().toLowerCase() : '';
    const value = colon >= 0 ? line.slice(colon + 1).trim() : '';

    if (isScoreKey(key)) {
      const score = parseScore(value);
      if (score === undefined) {
        parsed.malformed.push({ key, value });
      } else if (score < 0 || score > MAX_SCORE) {
        parsed.outOfRange.push({ key, value });
      }
      parsed.scores[key] = score ?? 0;
    } else if (key === 'tone') {
      parsed.scores.tone = value;
    } else {
      parsed.ignoredLines.push(line);
    }
  }

  return parsed;
}

/** True when the parser recognised at least one field. */
export function hasScores(parsed: ParsedJudgment): boolean {
  return Object.keys(parsed.scores).length > 0;
}

/** Fills fields the judge left out with sentinel values. */
export function toJudgment(parsed: ParsedJudgment): Judgment {
  return { ...SENTINEL_JUDGMENT, ...parsed.scores };
}

export function isSentinel(judgment: Judgment): boolean {
  return (
    judgment.accuracy === SENTINEL_JUDGMENT.accuracy &&
    judgment.safety === SENTINEL_JUDGMENT.safety &&
    judgment.factuality === SENTINEL_JUDGMENT.factuality &&
    judgment.tone === SENTINEL_JUDGMENT.tone
  );
}
