/**
 * Recommendation Generator Tests
 *
 * @module tests/unit/services/coverage/recommendations
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_MAX_RECOMMENDATIONS,
  generateRecommendations,
} from '../../../../src/services/coverage/recommendations.js';
import type { Entity } from '../../../../src/models/knowledge-graph.js';

function entity(id: string, name: string, types: string[], importance: number): Entity {
  return {
    entity_id: id,
    canonical_name: name,
    type_set: types,
    description: null,
    aliases: [],
    provenance: [],
    external_ids: {},
    importance,
  };
}

describe('generateRecommendations', () => {
  const missing = [
    entity('e1', 'Machine Learning', ['Field'], 0.9),
    entity('e2', 'Geoffrey Hinton', ['human'], 0.6),
    entity('e3', 'Deep Learning', ['  TOPIC '], 0.3),
    entity('e4', 'ImageNet', [], 0.1),
  ];

  it('phrases topical entities as subtopics and the rest as entities', () => {
    const recs = generateRecommendations({ missing });
    expect(recs.map((r) => r.text)).toEqual([
      'cover subtopic: Machine Learning',
      'include entity: Geoffrey Hinton',
      'cover subtopic: Deep Learning',
      'include entity: ImageNet',
    ]);
    expect(recs[0]).toEqual({
      kind: 'cover_subtopic',
      entity_id: 'e1',
      canonical_name: 'Machine Learning',
      importance: 0.9,
      text: 'cover subtopic: Machine Learning',
    });
  });

  it('keeps the order of the missing list', () => {
    const recs = generateRecommendations({ missing });
    expect(recs.map((r) => r.entity_id)).toEqual(['e1', 'e2', 'e3', 'e4']);
  });

  it('bounds the list by maxRecommendations', () => {
    expect(generateRecommendations({ missing }, { maxRecommendations: 2 }).map((r) => r.entity_id)).toEqual([
      'e1',
      'e2',
    ]);
    expect(generateRecommendations({ missing }, { maxRecommendations: 0 })).toEqual([]);
    expect(generateRecommendations({ missing }, { maxRecommendations: -3 })).toEqual([]);
  });

  it('defaults to ten recommendations', () => {
    const many = Array.from({ length: 15 }, (_, i) =>
      entity(`id-${String(i).padStart(2, '0')}`, `Entity ${i}`, [], 1 - i / 20)
    );
    expect(DEFAULT_MAX_RECOMMENDATIONS).toBe(10);
    expect(generateRecommendations({ missing: many })).toHaveLength(10);
  });

  it('accepts a custom topical type list', () => {
    const recs = generateRecommendations({ missing }, { topicalTypes: ['Human'] });
    expect(recs.map((r) => r.kind)).toEqual([
      'include_entity',
      'cover_subtopic',
      'include_entity',
      'include_entity',
    ]);
  });

  it('returns nothing when nothing is missing', () => {
    expect(generateRecommendations({ missing: [] })).toEqual([]);
  });
});
