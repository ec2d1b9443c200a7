/**
 * Coverage Tool Handler Tests
 *
 * Tests kg_coverage_score and kg_coverage_audit against a reference graph
 * fused into a REAL in-memory graph store, NO mocks.
 *
 * Reference importance: Artificial Intelligence 0.5, Machine Learning 0.75,
 * Geoffrey Hinton 0 (total 1.25).
 *
 * @module tests/unit/tools/coverage
 */

import { describe, it, expect, beforeEach, afterAll } from 'vitest';
import { handleCoverageAudit, handleCoverageScore } from '../../../src/tools/coverage.js';
import { handleFuse } from '../../../src/tools/fusion.js';
import { requireStore, resetState, updateConfig, useStore } from '../../../src/server/state.js';
import { GraphStore } from '../../../src/services/storage/graph/index.js';
import { CURATED_SOURCE, arrayField, parseResponse } from './helpers.js';

interface RecommendationJson {
  kind: string;
  text: string;
}

const KEYWORD = 'artificial intelligence';

function idOf(name: string): string {
  const entity = requireStore()
    .loadGraph(KEYWORD)
    ?.entities.find((e) => e.canonical_name === name);
  if (!entity) throw new Error(`no entity named ${name}`);
  return entity.entity_id;
}

const DOCUMENT_SOURCE = {
  kind: 'text_extraction',
  payload: {
    entities: [
      { text: 'machine learning', label: 'TOPIC', start: 0, end: 16 },
      { text: 'Geoffrey Hinton', label: 'PERSON', start: 30, end: 45 },
      { text: 'Quantum', label: 'TOPIC', start: 60, end: 67 },
      { text: 'broken', label: 'TOPIC', start: 90, end: 80 },
    ],
  },
};

beforeEach(async () => {
  resetState();
  useStore(GraphStore.inMemory('coverage-tools'));
  await handleFuse({ keyword: KEYWORD, sources: [CURATED_SOURCE] });
});

afterAll(() => {
  resetState();
});

describe('kg_coverage_score', () => {
  it('scores covered importance and recommends what is missing', async () => {
    const response = parseResponse(
      await handleCoverageScore({ keyword: KEYWORD, entity_ids: [idOf('Artificial Intelligence'), 'unknown-id'] })
    );

    expect(response.success).toBe(true);
    expect(response.data?.score).toBeCloseTo(0.4, 10);
    expect(response.data?.total_importance).toBeCloseTo(1.25, 10);
    expect(response.data?.covered_count).toBe(1);
    expect(response.data?.missing_count).toBe(2);
    expect(response.data?.covered_entity_ids).toEqual([idOf('Artificial Intelligence')]);
    expect(arrayField<RecommendationJson>(response, 'recommendations').map((r) => r.text)).toEqual([
      'cover subtopic: Machine Learning',
      'include entity: Geoffrey Hinton',
    ]);
  });

  it('bounds recommendations by max_recommendations', async () => {
    const response = parseResponse(
      await handleCoverageScore({ keyword: KEYWORD, entity_ids: [], max_recommendations: 1 })
    );
    expect(response.data?.score).toBe(0);
    expect(arrayField(response, 'recommendations')).toHaveLength(1);
  });

  it('falls back to the configured max_recommendations', async () => {
    updateConfig({ maxRecommendations: 0 });
    const response = parseResponse(await handleCoverageScore({ keyword: KEYWORD, entity_ids: [] }));
    expect(response.data?.recommendations).toEqual([]);
  });

  it('scores 1.0 when every entity is covered', async () => {
    const response = parseResponse(
      await handleCoverageScore({
        keyword: KEYWORD,
        entity_ids: [idOf('Artificial Intelligence'), idOf('Machine Learning'), idOf('Geoffrey Hinton')],
      })
    );
    expect(response.data?.score).toBe(1.0);
    expect(response.data?.missing).toEqual([]);
  });

  it('fails with GRAPH_NOT_FOUND for an unknown keyword', async () => {
    const response = parseResponse(await handleCoverageScore({ keyword: 'robotics', entity_ids: [] }));
    expect(response.error?.category).toBe('GRAPH_NOT_FOUND');
  });
});

describe('kg_coverage_audit', () => {
  it('resolves document entities against the reference', async () => {
    const response = parseResponse(await handleCoverageAudit({ keyword: KEYWORD, sources: [DOCUMENT_SOURCE] }));

    expect(response.success).toBe(true);
    expect(response.data).toMatchObject({
      candidate_count: 3,
      matched_candidates: 2,
      unmatched_candidates: 1,
      name_fallback_matches: 2,
      malformed_candidates: 0,
      skipped_payload_items: 1,
      covered_count: 2,
      missing_count: 1,
    });
    expect(response.data?.score).toBeCloseTo(0.6, 10);
    expect(arrayField<RecommendationJson>(response, 'recommendations')).toEqual([
      expect.objectContaining({ kind: 'cover_subtopic', text: 'cover subtopic: Artificial Intelligence' }),
    ]);
  });

  it('leaves candidates unmatched without the name-only fallback', async () => {
    const response = parseResponse(
      await handleCoverageAudit({ keyword: KEYWORD, sources: [DOCUMENT_SOURCE], name_only_fallback: false })
    );
    expect(response.data).toMatchObject({ matched_candidates: 0, unmatched_candidates: 3, score: 0 });
  });

  it('accepts already normalized candidates', async () => {
    const response = parseResponse(
      await handleCoverageAudit({
        keyword: KEYWORD,
        entities: [
          { source_id: 'curated_kb', external_ref: 'kb-ml', name: 'ML' },
          { name: 'missing source id' },
        ],
      })
    );
    expect(response.data).toMatchObject({
      candidate_count: 2,
      matched_candidates: 1,
      name_fallback_matches: 0,
      malformed_candidates: 1,
    });
    expect(response.data?.covered_entity_ids).toEqual([idOf('Machine Learning')]);
  });

  it('fails with DATABASE_NOT_SELECTED without a store', async () => {
    resetState();
    const response = parseResponse(await handleCoverageAudit({ keyword: KEYWORD }));
    expect(response.error?.category).toBe('DATABASE_NOT_SELECTED');
  });
});
