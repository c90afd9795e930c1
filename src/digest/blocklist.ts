import { containsAny, splitList } from '../utils/text';

/**
 * Static phrases followed by the comma-separated extras, deduplicated
 * case-insensitively. The first spelling seen wins.
 */
export function mergeBlocklist(staticPhrases: readonly string[], extra: string | undefined): string[] {
  const seen = new Set<string>();
  const phrases: string[] = [];
  for (const phrase of [...staticPhrases, ...splitList(extra)]) {
    const key = phrase.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    phrases.push(phrase);
  }
  return phrases;
}

export function isBlocked(title: string, phrases: readonly string[]): boolean {
  return containsAny(title.toLowerCase(), phrases);
}
