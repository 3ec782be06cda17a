/**
 * Keyword lookups shared by every signal extractor.
 *
 * Matching is plain substring containment on lowercase text ("cry" matches
 * inside "crying"). Each keyword counts at most once per text.
 */

export function matchedKeywords(text: string, keywords: readonly string[]): string[] {
  if (text.length === 0) return [];
  return keywords.filter(kw => text.includes(kw));
}

export function countHits(text: string, keywords: readonly string[]): number {
  return matchedKeywords(text, keywords).length;
}

export function containsAny(text: string, keywords: readonly string[]): boolean {
  return text.length > 0 && keywords.some(kw => text.includes(kw));
}

/** Union of every keyword set in a mapping, first-seen order, no duplicates. */
export function flattenKeywordSets(sets: Readonly<Record<string, readonly string[]>>): string[] {
  return [...new Set(Object.values(sets).flat())];
}
