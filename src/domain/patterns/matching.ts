/**
 * Phrase matching helpers shared by every pattern table.
 *
 * Phrases match on letter/digit boundaries so that "java" never matches
 * inside "javascript" and "intern" never matches inside "international".
 */

const LEFT_BOUNDARY = '(?<![\\p{L}\\p{N}_])';
const RIGHT_BOUNDARY = '(?![\\p{L}\\p{N}_])';

const phraseCache = new Map<string, RegExp>();

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function phraseRegExp(phrase: string): RegExp {
  let cached = phraseCache.get(phrase);
  if (!cached) {
    cached = new RegExp(`${LEFT_BOUNDARY}${escapeRegExp(phrase)}${RIGHT_BOUNDARY}`, 'giu');
    phraseCache.set(phrase, cached);
  }
  return cached;
}

/**
 * Offset of the first whole-phrase occurrence, or -1.
 */
export function findPhrase(text: string, phrase: string, fromIndex = 0): number {
  for (const match of text.matchAll(phraseRegExp(phrase))) {
    if (match.index !== undefined && match.index >= fromIndex) {
      return match.index;
    }
  }
  return -1;
}

export function containsPhrase(text: string, phrase: string): boolean {
  return findPhrase(text, phrase) !== -1;
}

export function containsAnyPhrase(text: string, phrases: readonly string[]): boolean {
  return phrases.some((phrase) => containsPhrase(text, phrase));
}

/**
 * Plain substring containment, case-insensitive. Used where the keyword
 * tables hold stems ("supervis", "coordin") rather than whole words.
 */
export function containsKeyword(textLower: string, keyword: string): boolean {
  return textLower.includes(keyword.toLowerCase());
}

export function countKeywords(textLower: string, keywords: readonly string[]): number {
  return keywords.filter((keyword) => containsKeyword(textLower, keyword)).length;
}

export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[\s\-'’])(\p{L})/gu, (_match, separator: string, letter: string) => separator + letter.toUpperCase());
}
