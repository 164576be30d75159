/**
 * Correction suggestions for identifiers and document keywords.
 */

/**
 * Levenshtein edit distance.
 */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Closest candidate within `maxDistance` edits (case-insensitive).
 * Ties go to the earlier candidate.
 */
export function nearest(
  word: string,
  candidates: readonly string[],
  maxDistance: number = 2
): string | null {
  const lower = word.toLowerCase();
  let best: string | null = null;
  let bestDistance = maxDistance + 1;
  for (const candidate of candidates) {
    const distance = editDistance(lower, candidate.toLowerCase());
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return best;
}

/**
 * Value stored under `key` in a lookup table, ignoring inherited
 * properties such as `constructor`.
 */
export function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

export type KeywordMatchKind = 'exact' | 'case' | 'known' | 'distance';

export interface KeywordMatch {
  keyword: string;
  kind: KeywordMatchKind;
}

/**
 * Match a word against a keyword table.
 *
 * Order: exact, case-insensitive, known misspelling, edit distance.
 * Short words (4 chars or fewer) only tolerate a single edit.
 */
export function matchKeyword(
  word: string,
  keywords: readonly string[],
  knownMistakes: Readonly<Record<string, string>> = {}
): KeywordMatch | null {
  if (keywords.includes(word)) {
    return { keyword: word, kind: 'exact' };
  }

  const lower = word.toLowerCase();
  const caseMatch = keywords.find((k) => k.toLowerCase() === lower);
  if (caseMatch) {
    return { keyword: caseMatch, kind: 'case' };
  }

  const known = lookup(knownMistakes, lower);
  if (known) {
    return { keyword: known, kind: 'known' };
  }

  const close = nearest(word, keywords, word.length <= 4 ? 1 : 2);
  return close ? { keyword: close, kind: 'distance' } : null;
}
