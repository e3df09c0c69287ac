import type { ContentConfig, Prompt } from '@contentbench/shared';

const NUMBER_WORDS = ['zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine', 'ten'];

function formatCount(n: number): string {
  return n.toLocaleString('en-US');
}

function spellCount(n: number): string {
  return NUMBER_WORDS[n] ?? formatCount(n);
}

/**
 * Deterministic user instruction for one prompt. A non-empty tip becomes a final `- <tip>` bullet.
 */
export function buildUserInstruction(prompt: Prompt, content: ContentConfig, tip?: string): string {
  const lines = [
    `Title: "${prompt.title}"`,
    `- Write a ${formatCount(content.minWords)} - ${formatCount(content.maxWords)} word article.`,
    `- Cite at least ${spellCount(content.minSources)} reputable sources with URLs.`,
    `- Cover these keywords: ${prompt.keywords.join(', ')}.`,
    '- Avoid unsafe, biased, or sensitive content.',
    '- Use a warm, conversational tone with a light joke or analogy.',
  ];
  if (tip && tip.trim()) {
    lines.push(`- ${tip}`);
  }
  return lines.join('\n');
}
