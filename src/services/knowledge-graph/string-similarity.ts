/**
 * String normalization and set similarity utilities for entity resolution
 *
 * Provides name normalization (case fold, diacritic strip, whitespace collapse),
 * normalized set construction, Jaccard similarity and set intersection checks.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 */

/** Combining diacritical marks left behind by NFKD decomposition */
const COMBINING_MARKS = /[\u0300-\u036f]/g;

/**
 * Normalize a name for equality comparison
 *
 * - NFKD decomposition, then combining marks removed ("Gödel" -> "godel")
 * - Lowercased
 * - Runs of whitespace collapsed to a single space, ends trimmed
 *
 * @param text - Raw name
 * @returns Normalized name ('' for whitespace-only input)
 */
export function normalizeName(text: string): string {
  return text
    .normalize('NFKD')
    .replace(COMBINING_MARKS, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Build a set of normalized, non-empty strings
 */
export function normalizedSet(values: Iterable<string>): Set<string> {
  const result = new Set<string>();
  for (const value of values) {
    const normalized = normalizeName(value);
    if (normalized.length > 0) {
      result.add(normalized);
    }
  }
  return result;
}

/**
 * Jaccard similarity |A ∩ B| / |A ∪ B|
 *
 * Two empty sets have similarity 0: absence of aliases is not evidence of identity.
 *
 * @returns Similarity between 0 and 1
 */
export function jaccardSimilarity(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;

  let intersectionSize = 0;
  for (const value of a) {
    if (b.has(value)) {
      intersectionSize++;
    }
  }
  const unionSize = a.size + b.size - intersectionSize;
  return intersectionSize / unionSize;
}

/**
 * True when the two sets share at least one member
 */
export function setsIntersect(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];
  for (const value of smaller) {
    if (larger.has(value)) return true;
  }
  return false;
}

/**
 * Sorted union of string arrays, exact-string dedup
 */
export function sortedUnion(...lists: ReadonlyArray<readonly string[]>): string[] {
  const merged = new Set<string>();
  for (const list of lists) {
    for (const value of list) merged.add(value);
  }
  return [...merged].sort(compareStrings);
}

/**
 * Locale-independent string comparison (code unit order)
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
