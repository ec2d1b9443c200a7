/**
 * String Similarity Tests
 *
 * Tests name normalization and the set helpers used by entity resolution.
 * NO mocks, NO stubs.
 *
 * @module tests/unit/services/knowledge-graph/string-similarity
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeName,
  normalizedSet,
  jaccardSimilarity,
  setsIntersect,
  sortedUnion,
  compareStrings,
} from '../../../../src/services/knowledge-graph/string-similarity.js';

// =============================================================================
// normalizeName
// =============================================================================

describe('normalizeName', () => {
  it('lowercases and trims', () => {
    expect(normalizeName('  Artificial Intelligence ')).toBe('artificial intelligence');
  });

  it('collapses runs of whitespace', () => {
    expect(normalizeName('machine \t\n learning')).toBe('machine learning');
  });

  it('strips diacritics', () => {
    expect(normalizeName('Gödel')).toBe('godel');
    expect(normalizeName('Café Société')).toBe('cafe societe');
  });

  it('returns empty string for whitespace-only input', () => {
    expect(normalizeName('   ')).toBe('');
  });
});

// =============================================================================
// normalizedSet
// =============================================================================

describe('normalizedSet', () => {
  it('normalizes members and drops empty ones', () => {
    expect([...normalizedSet(['AI', ' ai ', '', 'A.I.'])]).toEqual(['ai', 'a.i.']);
  });
});

// =============================================================================
// jaccardSimilarity
// =============================================================================

describe('jaccardSimilarity', () => {
  it('returns 0 for two empty sets', () => {
    expect(jaccardSimilarity(new Set(), new Set())).toBe(0);
  });

  it('returns 1 for identical sets', () => {
    expect(jaccardSimilarity(new Set(['a', 'b']), new Set(['b', 'a']))).toBe(1);
  });

  it('returns intersection over union', () => {
    expect(jaccardSimilarity(new Set(['a', 'b', 'c']), new Set(['b', 'c', 'd']))).toBe(0.5);
    expect(jaccardSimilarity(new Set(['a']), new Set(['a', 'b', 'c']))).toBeCloseTo(1 / 3, 10);
  });

  it('returns 0 for disjoint sets', () => {
    expect(jaccardSimilarity(new Set(['a']), new Set(['b']))).toBe(0);
  });
});

// =============================================================================
// setsIntersect / sortedUnion / compareStrings
// =============================================================================

describe('setsIntersect', () => {
  it('detects a shared member', () => {
    expect(setsIntersect(new Set(['field', 'topic']), new Set(['topic']))).toBe(true);
  });

  it('is false when either set is empty', () => {
    expect(setsIntersect(new Set(), new Set(['topic']))).toBe(false);
  });
});

describe('sortedUnion', () => {
  it('merges, dedups exactly and sorts', () => {
    expect(sortedUnion(['b', 'a'], ['a', 'c', 'B'])).toEqual(['B', 'a', 'b', 'c']);
  });
});

describe('compareStrings', () => {
  it('orders by code unit, independent of locale', () => {
    expect(['b', 'A', 'a'].sort(compareStrings)).toEqual(['A', 'a', 'b']);
    expect(compareStrings('x', 'x')).toBe(0);
  });
});
