/**
 * Knowledge graph models
 *
 * Canonical entities and relations produced by resolution and fusion,
 * plus the coverage report built on top of a fused graph.
 *
 * @module models/knowledge-graph
 */

import { SOURCE_FAMILIES } from './candidate.js';
import type { RelationType } from './candidate.js';

/**
 * One observation of an entity by a source. Unique per (source_id, external_ref).
 */
export interface ProvenanceEntry {
  source_id: string;
  external_ref: string | null;
}

export interface Entity {
  /** Stable id derived from the first candidate that created the entity */
  entity_id: string;
  canonical_name: string;
  /** Sorted, unique */
  type_set: string[];
  description: string | null;
  /** Sorted, unique */
  aliases: string[];
  /** Append-only */
  provenance: ProvenanceEntry[];
  /** namespace -> sorted unique refs */
  external_ids: Record<string, string[]>;
  importance: number;
}

export interface EvidenceEntry {
  source_id: string;
  evidence_weight: number;
}

export interface Relation {
  subject_id: string;
  object_id: string;
  relation_type: RelationType;
  weight: number;
  evidence: EvidenceEntry[];
}

export interface FusedGraph {
  readonly entities: readonly Entity[];
  readonly relations: readonly Relation[];
}

export const EMPTY_GRAPH: FusedGraph = Object.freeze({
  entities: Object.freeze([]),
  relations: Object.freeze([]),
});

export interface CoverageReport {
  /** In [0, 1] */
  score: number;
  /** Uncovered reference entities, importance desc then entity_id asc */
  missing: Entity[];
  covered: Set<string>;
  covered_importance: number;
  total_importance: number;
  /** Reference graph had no entities at all */
  empty_reference: boolean;
}

/**
 * Injectable fusion configuration
 */
export interface FusionConfig {
  /** Source families in descending priority. Unknown families rank after, alphabetically. */
  sourcePriority: string[];
  /** Reliability coefficient per source family */
  reliability: Record<string, number>;
  /** Reliability for families missing from `reliability` */
  defaultReliability: number;
  /** Minimum alias-set Jaccard similarity for a rule-4 match */
  aliasJaccardThreshold: number;
}

export const DEFAULT_FUSION_CONFIG: FusionConfig = {
  sourcePriority: [...SOURCE_FAMILIES],
  reliability: {
    curated_kb: 1.0,
    wikidata: 0.8,
    text_extraction: 0.5,
  },
  defaultReliability: 0.5,
  aliasJaccardThreshold: 0.5,
};

/**
 * Deep copy of an entity, so callers can mutate without touching a frozen graph
 */
export function cloneEntity(entity: Entity): Entity {
  const external_ids: Record<string, string[]> = {};
  for (const [ns, refs] of Object.entries(entity.external_ids)) {
    external_ids[ns] = [...refs];
  }
  return {
    ...entity,
    type_set: [...entity.type_set],
    aliases: [...entity.aliases],
    provenance: entity.provenance.map((p) => ({ ...p })),
    external_ids,
  };
}

export function cloneRelation(relation: Relation): Relation {
  return {
    ...relation,
    evidence: relation.evidence.map((e) => ({ ...e })),
  };
}

/**
 * Key of a relation triple
 */
export function relationKey(subjectId: string, objectId: string, type: RelationType): string {
  return `${subjectId}\u0000${objectId}\u0000${type}`;
}
