/**
 * Fusion Tool Handler Tests
 *
 * Tests kg_normalize and kg_fuse against a REAL in-memory graph store, NO mocks.
 *
 * @module tests/unit/tools/fusion
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { fusionTools, handleFuse, handleNormalize } from '../../../src/tools/fusion.js';
import { resetState, requireStore, useStore } from '../../../src/server/state.js';
import { GraphStore } from '../../../src/services/storage/graph/index.js';
import { CURATED_SOURCE, parseResponse } from './helpers.js';

beforeEach(() => {
  resetState();
});

afterEach(() => {
  resetState();
});

describe('kg_normalize', () => {
  it('normalizes raw payloads without a store', async () => {
    const response = parseResponse(
      await handleNormalize({
        sources: [
          CURATED_SOURCE,
          { kind: 'text_extraction', payload: { entities: [{ text: 'deep learning', label: 'TOPIC', start: 0, end: 13 }, { text: '' }] } },
        ],
      })
    );

    expect(response.success).toBe(true);
    expect(response.data?.entity_count).toBe(4);
    expect(response.data?.relation_count).toBe(2);
    expect(response.data?.skipped).toBe(1);
  });

  it('requires at least one source', async () => {
    const response = parseResponse(await handleNormalize({ sources: [] }));
    expect(response.success).toBe(false);
    expect(response.error?.category).toBe('VALIDATION_ERROR');
  });

  it('rejects an unknown source kind', async () => {
    const response = parseResponse(await handleNormalize({ sources: [{ kind: 'rss', payload: {} }] }));
    expect(response.error?.category).toBe('VALIDATION_ERROR');
  });
});

describe('kg_fuse', () => {
  it('fails with DATABASE_NOT_SELECTED when no store is open', async () => {
    const response = parseResponse(await handleFuse({ keyword: 'ai', sources: [CURATED_SOURCE] }));
    expect(response.success).toBe(false);
    expect(response.error?.category).toBe('DATABASE_NOT_SELECTED');
  });

  describe('with an open store', () => {
    beforeEach(() => {
      useStore(GraphStore.inMemory('fusion-tools'));
    });

    it('fuses sources and stores the graph under the keyword', async () => {
      const response = parseResponse(await handleFuse({ keyword: 'ai', sources: [CURATED_SOURCE] }));

      expect(response.success).toBe(true);
      const report = response.data?.report;
      expect(report).toMatchObject({
        total_entity_candidates: 3,
        entities_created: 3,
        relations_created: 2,
        entity_count: 3,
        relation_count: 2,
        skipped_payload_items: 0,
      });
      expect(response.data?.stored).toMatchObject({ keyword: 'ai', entity_count: 3, relation_count: 2 });
      expect(response.data?.graph).toBeUndefined();
      expect(requireStore().loadGraph('ai')?.entities).toHaveLength(3);
    });

    it('returns the graph when include_graph is set', async () => {
      const response = parseResponse(
        await handleFuse({ keyword: 'ai', sources: [CURATED_SOURCE], include_graph: true })
      );
      const graph = response.data?.graph;
      expect(graph).toMatchObject({ entities: expect.any(Array), relations: expect.any(Array) });
      const ml = requireStore()
        .loadGraph('ai')
        ?.entities.find((e) => e.canonical_name === 'Machine Learning');
      expect(ml?.importance).toBeCloseTo(0.75, 10);
    });

    it('fuses on top of the stored graph', async () => {
      await handleFuse({ keyword: 'ai', sources: [CURATED_SOURCE] });
      const response = parseResponse(
        await handleFuse({
          keyword: 'ai',
          entities: [
            { source_id: 'wikidata', external_ref: 'Q2539', name: 'machine learning', type_hints: ['field'] },
            { source_id: 'wikidata', external_ref: 'Q7', name: 'Robotics', type_hints: ['field'] },
          ],
        })
      );

      expect(response.data?.report).toMatchObject({
        entities_created: 1,
        entity_count: 4,
        relation_count: 2,
        entity_matches: { same_source_ref: 0, cross_source_ref: 0, name_and_type: 1, alias_similarity: 0 },
      });
    });

    it('re-fusing the same source matches every entity by its reference', async () => {
      await handleFuse({ keyword: 'ai', sources: [CURATED_SOURCE] });
      const before = requireStore().loadGraph('ai');
      const response = parseResponse(await handleFuse({ keyword: 'ai', sources: [CURATED_SOURCE] }));

      expect(response.data?.report).toMatchObject({
        entities_created: 0,
        entity_matches: { same_source_ref: 3 },
        relations_created: 0,
        relations_updated: 0,
        entity_count: 3,
      });
      expect(requireStore().loadGraph('ai')).toEqual(before);
    });

    it('rebuild ignores the stored graph', async () => {
      await handleFuse({ keyword: 'ai', entities: [{ source_id: 'curated_kb', name: 'Stale Entity' }] });
      const response = parseResponse(
        await handleFuse({ keyword: 'ai', sources: [CURATED_SOURCE], rebuild: true })
      );

      expect(response.data?.report).toMatchObject({ entities_created: 3, entity_count: 3 });
      const names = requireStore()
        .loadGraph('ai')
        ?.entities.map((e) => e.canonical_name)
        .sort();
      expect(names).toEqual(['Artificial Intelligence', 'Geoffrey Hinton', 'Machine Learning']);
    });

    it('counts malformed candidates instead of failing', async () => {
      const response = parseResponse(
        await handleFuse({
          keyword: 'ai',
          entities: [{ source_id: 'curated_kb', name: 'Valid' }, { name: 'no source' }, 42],
          relations: [{ source_id: 'curated_kb', subject_ref: 'Valid', object_ref: 'Nowhere', relation_type: 'RELATED_TO', evidence_weight: 1 }],
        })
      );

      expect(response.success).toBe(true);
      expect(response.data?.report).toMatchObject({
        malformed_candidates: 2,
        unresolved_references: 1,
        entity_count: 1,
        relation_count: 0,
      });
    });

    it('reports a malformed payload envelope as VALIDATION_ERROR', async () => {
      const response = parseResponse(
        await handleFuse({ keyword: 'ai', sources: [{ kind: 'curated_kb', payload: { items: [] } }] })
      );
      expect(response.success).toBe(false);
      expect(response.error?.category).toBe('VALIDATION_ERROR');
      expect(requireStore().loadGraph('ai')).toBeNull();
    });
  });
});

describe('fusionTools', () => {
  it('registers kg_normalize and kg_fuse', () => {
    expect(Object.keys(fusionTools)).toEqual(['kg_normalize', 'kg_fuse']);
  });
});
