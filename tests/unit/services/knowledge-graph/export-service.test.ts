/**
 * Graph Export Service Tests
 *
 * Tests the JSON shape produced by serializeGraph and the clean-up
 * deserializeGraph applies to externally supplied graphs.
 *
 * @module tests/unit/services/knowledge-graph/export-service
 */

import { describe, it, expect } from 'vitest';
import {
  deserializeGraph,
  serializeEntity,
  serializeGraph,
} from '../../../../src/services/knowledge-graph/export-service.js';
import { fuse } from '../../../../src/services/knowledge-graph/graph-service.js';
import { ValidationError } from '../../../../src/utils/validation.js';

const FUSED = fuse({
  entities: [
    { source_id: 'curated_kb', external_ref: 'kb-ai', name: 'Artificial Intelligence', type_hints: ['field'], description: 'intelligence of machines' },
    { source_id: 'curated_kb', external_ref: 'kb-ml', name: 'Machine Learning', type_hints: ['field'], aliases: ['ML'] },
  ],
  relations: [
    { source_id: 'curated_kb', subject_ref: 'kb-ml', object_ref: 'kb-ai', relation_type: 'PART_OF', evidence_weight: 0.9 },
  ],
}).graph;

describe('serializeEntity', () => {
  it('uses the external JSON field names', () => {
    const ml = FUSED.entities.find((e) => e.canonical_name === 'Machine Learning');
    if (!ml) throw new Error('fixture missing Machine Learning');

    expect(serializeEntity(ml)).toEqual({
      id: ml.entity_id,
      name: 'Machine Learning',
      type: ['field'],
      description: null,
      aliases: ['ML'],
      source: [{ source_id: 'curated_kb', external_ref: 'kb-ml' }],
      external_ids: { curated_kb: ['kb-ml'] },
      importance: 0.5,
    });
  });
});

describe('serializeGraph / deserializeGraph', () => {
  it('serializes relations as source/target/type/weight/evidence', () => {
    const json = serializeGraph(FUSED);
    expect(json.relations).toHaveLength(1);
    expect(Object.keys(json.relations[0]).sort()).toEqual(['evidence', 'source', 'target', 'type', 'weight']);
    expect(json.relations[0].weight).toBeCloseTo(0.9, 10);
  });

  it('reads back the graph it wrote', () => {
    const restored = deserializeGraph(JSON.parse(JSON.stringify(serializeGraph(FUSED))));
    expect(restored).toEqual(FUSED);
  });

  it('drops dangling relations, self-loops and repeated ids', () => {
    const restored = deserializeGraph({
      entities: [
        { id: 'e-1', name: 'First', source: [{ source_id: 'curated_kb', external_ref: null }] },
        { id: 'e-1', name: 'Duplicate', source: [{ source_id: 'curated_kb', external_ref: null }] },
        { id: 'e-2', name: 'Second', source: [{ source_id: 'wikidata', external_ref: 'Q2' }] },
      ],
      relations: [
        { source: 'e-1', target: 'e-2', type: 'RELATED_TO', weight: 0.4 },
        { source: 'e-1', target: 'e-2', type: 'RELATED_TO', weight: 0.9 },
        { source: 'e-1', target: 'e-9', type: 'RELATED_TO', weight: 0.4 },
        { source: 'e-2', target: 'e-2', type: 'PART_OF', weight: 0.4 },
      ],
    });

    expect(restored.entities.map((e) => e.canonical_name)).toEqual(['First', 'Second']);
    expect(restored.relations).toEqual([
      { subject_id: 'e-1', object_id: 'e-2', relation_type: 'RELATED_TO', weight: 0.4, evidence: [] },
    ]);
  });

  it('throws ValidationError on a malformed structure', () => {
    expect(() => deserializeGraph({ entities: [{ id: 'e-1' }] })).toThrow(ValidationError);
    expect(() => deserializeGraph('not a graph')).toThrow(ValidationError);
  });
});
