/**
 * Candidate models
 *
 * Ephemeral, per-request observations produced by the source normalizers.
 * Candidates are consumed exactly once by resolution/fusion and discarded.
 *
 * @module models/candidate
 */

/**
 * Relation types accepted by the fusion builder
 */
export const RELATION_TYPES = [
  'RELATED_TO',
  'INSTANCE_OF',
  'SUBCLASS_OF',
  'PART_OF',
  'HAS_PART',
] as const;

export type RelationType = (typeof RELATION_TYPES)[number];

/**
 * Built-in source families. Any other family is accepted and
 * ranked after these (see FusionConfig.sourcePriority).
 */
export const SOURCE_FAMILIES = ['curated_kb', 'wikidata', 'text_extraction'] as const;

export type KnownSourceFamily = (typeof SOURCE_FAMILIES)[number];

/**
 * Identifier in another source family that the reporting source
 * asserts denotes the same real-world thing.
 */
export interface CrossReference {
  namespace: string;
  ref: string;
}

export interface EntityCandidate {
  /** Adapter that produced the observation, e.g. "wikidata" or "wikidata:sparql" */
  source_id: string;
  /** Source-native identifier in the source's own family */
  external_ref: string | null;
  name: string;
  type_hints: string[];
  description: string | null;
  aliases: string[];
  /** 0-1, source-reported or 1.0 */
  confidence: number;
  cross_refs: CrossReference[];
}

export interface RelationCandidate {
  source_id: string;
  subject_ref: string;
  object_ref: string;
  relation_type: RelationType;
  evidence_weight: number;
}

/**
 * Output of a single source normalizer
 */
export interface NormalizedBatch {
  entities: EntityCandidate[];
  relations: RelationCandidate[];
  /** Raw payload items that could not be shaped into candidates */
  skipped: number;
}

/**
 * Source family of a source id: the part before the first ':'
 */
export function sourceFamily(sourceId: string): string {
  const idx = sourceId.indexOf(':');
  return idx === -1 ? sourceId : sourceId.slice(0, idx);
}
