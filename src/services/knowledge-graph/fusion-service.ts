/**
 * Graph Fusion Service
 *
 * Merges relation candidates between resolved entities into canonical weighted
 * edges. At most one edge exists per (subject, object, relation_type); repeated
 * candidates append evidence to it and its weight is recomputed with a noisy-OR:
 *
 *   weight = 1 - Π (1 - reliability(source) × evidence_weight)
 *
 * Adding evidence can only raise the weight, and it never exceeds 1. A
 * (source_id, evidence_weight) pair an existing edge already records is not
 * appended again, so fusing a batch onto its own output changes nothing.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 */

import { sourceFamily } from '../../models/candidate.js';
import type { RelationCandidate } from '../../models/candidate.js';
import {
  DEFAULT_FUSION_CONFIG,
  cloneRelation,
  relationKey,
} from '../../models/knowledge-graph.js';
import type { EvidenceEntry, FusionConfig, Relation } from '../../models/knowledge-graph.js';
import { contractViolationError } from '../../server/errors.js';
import { RelationCandidateSchema, safeValidateInput } from '../../utils/validation.js';
import type { ReferenceIndex } from './resolution-service.js';
import { compareStrings } from './string-similarity.js';

export interface FusionStats {
  total_relation_candidates: number;
  malformed_relations: number;
  unresolved_references: number;
  self_loops_dropped: number;
  relations_created: number;
  relations_updated: number;
}

export interface FusionResult {
  /** Sorted by (subject_id, object_id, relation_type) */
  relations: Relation[];
  stats: FusionStats;
}

/**
 * Relation candidate with both endpoints mapped onto entity ids
 */
interface ResolvedRelation {
  candidate: RelationCandidate;
  subject_id: string;
  object_id: string;
}

/**
 * Edge under construction. `base_weight` carries the weight of an existing
 * edge that arrived without any recorded evidence; `recorded` holds the
 * evidence keys the existing edge already carries.
 */
interface WorkingRelation {
  relation: Relation;
  base_weight: number;
  recorded: Set<string>;
}

function evidenceKey(e: EvidenceEntry): string {
  return `${e.source_id}\u0000${e.evidence_weight}`;
}

function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Reliability coefficient of the source family behind a source id
 */
export function reliabilityOf(sourceId: string, config: FusionConfig = DEFAULT_FUSION_CONFIG): number {
  const coefficient = config.reliability[sourceFamily(sourceId)];
  return clampUnit(coefficient ?? config.defaultReliability);
}

/**
 * Noisy-OR combination of independent pieces of evidence
 *
 * @param evidence - (source, evidence_weight) contributions
 * @param config - Source reliabilities
 * @param baseWeight - Prior weight the evidence is combined with (default 0)
 * @returns Combined weight in [0, 1]
 */
export function combineEvidence(
  evidence: readonly EvidenceEntry[],
  config: FusionConfig = DEFAULT_FUSION_CONFIG,
  baseWeight: number = 0
): number {
  let remaining = 1 - clampUnit(baseWeight);
  for (const e of evidence) {
    remaining *= 1 - clampUnit(reliabilityOf(e.source_id, config) * e.evidence_weight);
  }
  return clampUnit(1 - remaining);
}

function priorityRank(family: string, priority: readonly string[]): number {
  const idx = priority.indexOf(family);
  return idx === -1 ? priority.length : idx;
}

/**
 * Canonical order of resolved relation candidates
 */
function compareResolved(a: ResolvedRelation, b: ResolvedRelation, priority: readonly string[]): number {
  const famA = sourceFamily(a.candidate.source_id);
  const famB = sourceFamily(b.candidate.source_id);
  return (
    priorityRank(famA, priority) - priorityRank(famB, priority) ||
    compareStrings(famA, famB) ||
    compareStrings(a.subject_id, b.subject_id) ||
    compareStrings(a.object_id, b.object_id) ||
    compareStrings(a.candidate.relation_type, b.candidate.relation_type) ||
    a.candidate.evidence_weight - b.candidate.evidence_weight ||
    compareStrings(a.candidate.source_id, b.candidate.source_id)
  );
}

/**
 * Fuse relation candidates into canonical weighted relations
 *
 * Candidates that fail validation, whose endpoints do not resolve, or that
 * would form a self-loop are dropped and counted. Existing relations are
 * cloned and extended, never mutated.
 *
 * @param resolution - Reference index from entity resolution
 * @param relationCandidates - Relation candidates, in any order
 * @param existingRelations - Relations of a previously fused graph
 * @param config - Source reliabilities and priority
 */
export function fuseRelations(
  resolution: { references: ReferenceIndex },
  relationCandidates: readonly unknown[],
  existingRelations: readonly Relation[] = [],
  config: FusionConfig = DEFAULT_FUSION_CONFIG
): FusionResult {
  if (!Array.isArray(relationCandidates)) {
    throw contractViolationError('fuseRelations requires a relation candidate array', {
      received: relationCandidates === null ? 'null' : typeof relationCandidates,
    });
  }

  const stats: FusionStats = {
    total_relation_candidates: relationCandidates.length,
    malformed_relations: 0,
    unresolved_references: 0,
    self_loops_dropped: 0,
    relations_created: 0,
    relations_updated: 0,
  };

  const edges = new Map<string, WorkingRelation>();
  for (const existing of existingRelations) {
    const relation = cloneRelation(existing);
    const key = relationKey(relation.subject_id, relation.object_id, relation.relation_type);
    edges.set(key, {
      relation,
      base_weight: relation.evidence.length === 0 ? relation.weight : 0,
      recorded: new Set(relation.evidence.map(evidenceKey)),
    });
  }

  const existingKeys = new Set(edges.keys());
  const resolved: ResolvedRelation[] = [];
  for (const raw of relationCandidates) {
    const parsed = safeValidateInput(RelationCandidateSchema, raw);
    if (!parsed.success) {
      stats.malformed_relations++;
      continue;
    }
    const candidate = parsed.data;
    const subjectId = resolution.references.lookup(candidate.source_id, candidate.subject_ref);
    const objectId = resolution.references.lookup(candidate.source_id, candidate.object_ref);
    if (subjectId === null || objectId === null) {
      stats.unresolved_references++;
      continue;
    }
    // Self-loops are not part of this graph model
    if (subjectId === objectId) {
      stats.self_loops_dropped++;
      continue;
    }
    resolved.push({ candidate, subject_id: subjectId, object_id: objectId });
  }

  resolved.sort((a, b) => compareResolved(a, b, config.sourcePriority));

  const touched = new Set<string>();
  for (const { candidate, subject_id, object_id } of resolved) {
    const key = relationKey(subject_id, object_id, candidate.relation_type);
    let working = edges.get(key);
    if (!working) {
      working = {
        relation: {
          subject_id,
          object_id,
          relation_type: candidate.relation_type,
          weight: 0,
          evidence: [],
        },
        base_weight: 0,
        recorded: new Set(),
      };
      edges.set(key, working);
      stats.relations_created++;
    }
    const entry: EvidenceEntry = {
      source_id: candidate.source_id,
      evidence_weight: candidate.evidence_weight,
    };
    // Evidence the existing graph already holds is not counted twice
    if (working.recorded.has(evidenceKey(entry))) continue;
    if (!touched.has(key) && existingKeys.has(key)) {
      stats.relations_updated++;
    }
    touched.add(key);
    working.relation.evidence.push(entry);
  }

  const relations: Relation[] = [];
  for (const [key, working] of edges) {
    const { relation } = working;
    if (touched.has(key) || relation.evidence.length > 0) {
      relation.weight = combineEvidence(relation.evidence, config, working.base_weight);
    }
    relations.push(relation);
  }

  relations.sort(
    (a, b) =>
      compareStrings(a.subject_id, b.subject_id) ||
      compareStrings(a.object_id, b.object_id) ||
      compareStrings(a.relation_type, b.relation_type)
  );

  return { relations, stats };
}
