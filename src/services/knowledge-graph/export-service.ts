/**
 * Knowledge Graph Export Service
 *
 * Converts a FusedGraph to and from the plain JSON shape the surrounding
 * API layer presents:
 *
 *   entities:  { id, name, type, description, aliases, source, external_ids, importance }
 *   relations: { source, target, type, weight, evidence }
 *
 * `type` is the sorted type set and `source` the provenance list in order.
 *
 * @module services/knowledge-graph/export-service
 */

import { relationKey } from '../../models/knowledge-graph.js';
import type { Entity, FusedGraph, Relation } from '../../models/knowledge-graph.js';
import {
  SerializedGraphSchema,
  validateInput,
  type SerializedEntity,
  type SerializedGraph,
  type SerializedRelation,
} from '../../utils/validation.js';
import { compareStrings, sortedUnion } from './string-similarity.js';
import { rerankGraph } from './graph-service.js';

// ============================================================
// Serialization
// ============================================================

export function serializeEntity(entity: Entity): SerializedEntity {
  const external_ids: Record<string, string[]> = {};
  for (const namespace of Object.keys(entity.external_ids).sort(compareStrings)) {
    external_ids[namespace] = [...(entity.external_ids[namespace] ?? [])];
  }
  return {
    id: entity.entity_id,
    name: entity.canonical_name,
    type: [...entity.type_set],
    description: entity.description,
    aliases: [...entity.aliases],
    source: entity.provenance.map((p) => ({ source_id: p.source_id, external_ref: p.external_ref })),
    external_ids,
    importance: entity.importance,
  };
}

export function serializeRelation(relation: Relation): SerializedRelation {
  return {
    source: relation.subject_id,
    target: relation.object_id,
    type: relation.relation_type,
    weight: relation.weight,
    evidence: relation.evidence.map((e) => ({ source_id: e.source_id, evidence_weight: e.evidence_weight })),
  };
}

/**
 * Serialize a fused graph to a JSON-safe structure
 */
export function serializeGraph(graph: FusedGraph): SerializedGraph {
  return {
    entities: graph.entities.map(serializeEntity),
    relations: graph.relations.map(serializeRelation),
  };
}

// ============================================================
// Deserialization
// ============================================================

function deserializeEntity(raw: SerializedEntity): Entity {
  const external_ids: Record<string, string[]> = {};
  for (const [namespace, refs] of Object.entries(raw.external_ids)) {
    if (refs.length > 0) external_ids[namespace] = sortedUnion(refs);
  }
  return {
    entity_id: raw.id,
    canonical_name: raw.name,
    type_set: sortedUnion(raw.type),
    description: raw.description,
    aliases: sortedUnion(raw.aliases),
    provenance: raw.source.map((p) => ({ source_id: p.source_id, external_ref: p.external_ref })),
    external_ids,
    importance: raw.importance,
  };
}

function deserializeRelation(raw: SerializedRelation): Relation {
  return {
    subject_id: raw.source,
    object_id: raw.target,
    relation_type: raw.type,
    weight: raw.weight,
    evidence: raw.evidence.map((e) => ({ source_id: e.source_id, evidence_weight: e.evidence_weight })),
  };
}

/**
 * Parse a serialized graph back into a frozen FusedGraph
 *
 * Relations whose endpoints are not among the entities, self-loops and
 * repeated triples are discarded, and
 * importance is recomputed so the result matches what fuse() would hold.
 *
 * @throws ValidationError when the structure does not match the JSON shape
 */
export function deserializeGraph(input: unknown): FusedGraph {
  const parsed = validateInput(SerializedGraphSchema, input);

  // First occurrence wins for duplicate ids and duplicate relation triples
  const byId = new Map<string, Entity>();
  for (const raw of parsed.entities) {
    if (!byId.has(raw.id)) byId.set(raw.id, deserializeEntity(raw));
  }
  const byTriple = new Map<string, Relation>();
  for (const raw of parsed.relations) {
    const relation = deserializeRelation(raw);
    const key = relationKey(relation.subject_id, relation.object_id, relation.relation_type);
    if (
      byId.has(relation.subject_id) &&
      byId.has(relation.object_id) &&
      relation.subject_id !== relation.object_id &&
      !byTriple.has(key)
    ) {
      byTriple.set(key, relation);
    }
  }
  const entities = [...byId.values()];
  const relations = [...byTriple.values()];

  entities.sort((a, b) => compareStrings(a.entity_id, b.entity_id));
  relations.sort(
    (a, b) =>
      compareStrings(a.subject_id, b.subject_id) ||
      compareStrings(a.object_id, b.object_id) ||
      compareStrings(a.relation_type, b.relation_type)
  );

  return rerankGraph({ entities, relations });
}
