/**
 * `http(s)://` followed by URL-ish characters. The `$-_` range also admits brackets and
 * trailing punctuation, so `(https://a.io).` yields `https://a.io).`.
 */
export const URL_PATTERN = /https?:\/\/(?:[a-zA-Z]|[0-9]|[$-_@.&+]|[!*\\(),]|(?:%[0-9a-fA-F][0-9a-fA-F]))+/g;

const MARKDOWN_LINK = /\[([^\]]+)\]\([^)]+\)/g;
const NON_WORD = /[^\p{L}\p{N}_\s]/gu;

/**
 * Word count of an article body: markdown links keep their text, bare URLs are dropped,
 * punctuation splits words.
 */
export function countWords(text: string): number {
  const cleaned = text
    .replace(MARKDOWN_LINK, '$1')
    .replace(URL_PATTERN, '')
    .replace(NON_WORD, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  return cleaned ? cleaned.split(' ').length : 0;
}

/** Every URL in the text, in order, duplicates kept. */
export function extractUrls(text: string): string[] {
  return text.match(URL_PATTERN) ?? [];
}
