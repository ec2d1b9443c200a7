/**
 * Coverage Scorer
 *
 * Measures how much of a reference graph's total importance an audited
 * entity set covers:
 *
 *   score = Σ importance(covered) / Σ importance(all reference entities)
 *
 * A reference with no entities, or with zero total importance, is trivially
 * covered (score 1.0).
 *
 * @module services/coverage/scorer
 */

import { DEFAULT_FUSION_CONFIG } from '../../models/knowledge-graph.js';
import type { CoverageReport, Entity, FusedGraph, FusionConfig } from '../../models/knowledge-graph.js';
import { contractViolationError } from '../../server/errors.js';
import { resolveEntities, type ResolutionStats } from '../knowledge-graph/resolution-service.js';
import { compareStrings, normalizeName } from '../knowledge-graph/string-similarity.js';
import { EntityCandidateSchema, safeValidateInput } from '../../utils/validation.js';

export interface AuditOptions {
  /**
   * When a candidate resolves to nothing in the reference, also accept a
   * reference entity whose canonical name or alias equals the candidate's
   * normalized name, ignoring types. Extractor labels (ORG, GPE...) rarely
   * share a vocabulary with curated type sets. Default true.
   */
  nameOnlyFallback?: boolean;
}

export interface AuditResult {
  report: CoverageReport;
  /** Document candidate index -> reference entity_id, for candidates that matched the reference */
  matched: Map<number, string>;
  /** Document candidates that matched nothing in the reference */
  unmatched_candidates: number;
  /** Matches made by the name-only fallback */
  name_fallback_matches: number;
  resolution: ResolutionStats;
}

/**
 * Importance descending, then entity_id ascending
 */
export function compareByImportance(a: Entity, b: Entity): number {
  return b.importance - a.importance || compareStrings(a.entity_id, b.entity_id);
}

/**
 * Score an audited entity set against a reference graph
 *
 * Ids in `auditedEntityIds` that are not in the reference are ignored.
 *
 * @param reference - Fused reference graph (e.g. built for a keyword)
 * @param auditedEntityIds - Entity ids found in the audited document
 * @throws MCPError CONTRACT_VIOLATION when either argument is absent
 */
export function scoreCoverage(
  reference: FusedGraph,
  auditedEntityIds: ReadonlySet<string> | readonly string[]
): CoverageReport {
  if (reference === null || reference === undefined || !Array.isArray(reference.entities)) {
    throw contractViolationError('scoreCoverage requires a reference graph');
  }
  if (auditedEntityIds === null || auditedEntityIds === undefined) {
    throw contractViolationError('scoreCoverage requires an audited entity id set');
  }

  const audited: ReadonlySet<string> =
    auditedEntityIds instanceof Set ? auditedEntityIds : new Set(auditedEntityIds);

  let total = 0;
  let coveredImportance = 0;
  const covered = new Set<string>();
  const missing: Entity[] = [];

  for (const entity of reference.entities) {
    total += entity.importance;
    if (audited.has(entity.entity_id)) {
      covered.add(entity.entity_id);
      coveredImportance += entity.importance;
    } else {
      missing.push(entity);
    }
  }
  missing.sort(compareByImportance);

  const emptyReference = reference.entities.length === 0;
  let score: number;
  if (emptyReference || total <= 0) {
    score = 1.0;
  } else if (missing.every((e) => e.importance <= 0)) {
    // Guards against float drift in the division when everything that matters is covered
    score = 1.0;
  } else {
    score = Math.min(1, Math.max(0, coveredImportance / total));
  }

  return {
    score,
    missing,
    covered,
    covered_importance: coveredImportance,
    total_importance: total,
    empty_reference: emptyReference,
  };
}

/**
 * Index reference entities by normalized canonical name and aliases.
 * Each name keeps the most important entity (ties: smallest entity_id).
 */
function buildNameIndex(reference: FusedGraph): Map<string, Entity> {
  const index = new Map<string, Entity>();
  const ordered = [...reference.entities].sort(compareByImportance);
  for (const entity of ordered) {
    for (const name of [entity.canonical_name, ...entity.aliases]) {
      const key = normalizeName(name);
      if (key.length > 0 && !index.has(key)) index.set(key, entity);
    }
  }
  return index;
}

/**
 * Audit a document's extracted entity candidates against a reference graph
 *
 * The candidates are resolved with the reference as the existing graph; every
 * candidate that lands on a reference entity counts that entity as covered.
 * Candidates that would seed new entities fall back to a name-only lookup
 * (see AuditOptions) and are otherwise reported as unmatched.
 *
 * @param reference - Fused reference graph
 * @param documentCandidates - Entity candidates extracted from the document
 * @param config - Fusion configuration used for matching
 */
export function auditDocument(
  reference: FusedGraph,
  documentCandidates: readonly unknown[],
  config: FusionConfig = DEFAULT_FUSION_CONFIG,
  options: AuditOptions = {}
): AuditResult {
  if (reference === null || reference === undefined || !Array.isArray(reference.entities)) {
    throw contractViolationError('auditDocument requires a reference graph');
  }
  const nameOnlyFallback = options.nameOnlyFallback ?? true;

  const resolution = resolveEntities(documentCandidates, reference, config);
  const referenceIds = new Set(reference.entities.map((e) => e.entity_id));
  const nameIndex = nameOnlyFallback ? buildNameIndex(reference) : new Map<string, Entity>();

  const matched = new Map<number, string>();
  let unmatched = 0;
  let fallbackMatches = 0;
  for (const [index, entityId] of resolution.assignments) {
    if (referenceIds.has(entityId)) {
      matched.set(index, entityId);
      continue;
    }
    const parsed = safeValidateInput(EntityCandidateSchema, documentCandidates[index]);
    const byName = parsed.success ? nameIndex.get(normalizeName(parsed.data.name)) : undefined;
    if (byName !== undefined) {
      matched.set(index, byName.entity_id);
      fallbackMatches++;
    } else {
      unmatched++;
    }
  }

  return {
    report: scoreCoverage(reference, new Set(matched.values())),
    matched,
    unmatched_candidates: unmatched,
    name_fallback_matches: fallbackMatches,
    resolution: resolution.stats,
  };
}
