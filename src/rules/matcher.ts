// src/rules/matcher.ts

/**
 * Whole-word keyword matching shared by the classifiers. A keyword ending
 * in `*` is a stem and also matches longer words: `auth*` matches
 * "authentication", `drop` does not match "dropdown".
 */

const patternCache = new Map<string, RegExp>();

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function patternFor(keyword: string): RegExp {
  let pattern = patternCache.get(keyword);
  if (!pattern) {
    const stem = keyword.endsWith('*');
    const word = escapeRegExp(keywordName(keyword).toLowerCase());
    pattern = new RegExp(`(^|[^a-z0-9])${word}${stem ? '' : '(?![a-z0-9])'}`, 'i');
    patternCache.set(keyword, pattern);
  }
  return pattern;
}

/**
 * Keyword as reported in signals, without its stem marker.
 */
export function keywordName(keyword: string): string {
  return keyword.endsWith('*') ? keyword.slice(0, -1) : keyword;
}

export function containsKeyword(text: string, keyword: string): boolean {
  return patternFor(keyword).test(text);
}

export function matchedKeywords(text: string, keywords: Iterable<string>): string[] {
  const matches: string[] = [];
  for (const keyword of keywords) {
    if (containsKeyword(text, keyword)) matches.push(keywordName(keyword));
  }
  return matches;
}

/**
 * Sum of the weights of every matched keyword.
 */
export function weightedSum(text: string, table: Record<string, number>): number {
  let sum = 0;
  for (const [keyword, weight] of Object.entries(table)) {
    if (containsKeyword(text, keyword)) sum += weight;
  }
  return sum;
}

/**
 * Largest weight among matched keywords, 0 when nothing matches.
 */
export function strongestWeight(text: string, table: Record<string, number>): number {
  let strongest = 0;
  for (const [keyword, weight] of Object.entries(table)) {
    if (containsKeyword(text, keyword)) strongest = Math.max(strongest, weight);
  }
  return strongest;
}
