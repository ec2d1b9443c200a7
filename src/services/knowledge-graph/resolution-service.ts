/**
 * Entity Resolution Service
 *
 * Resolves entity candidates from several sources into canonical knowledge graph
 * entities using an ordered cascade of matching rules, first match wins:
 *
 *   1. same_source_ref   - primary external_ref seen before in the same source family
 *   2. cross_source_ref  - any known identifier (primary or cross reference) shared
 *   3. name_and_type     - normalized name equals the entity's canonical name or an
 *                          alias, and type sets intersect
 *   4. alias_similarity  - alias Jaccard >= threshold and type sets intersect
 *
 * Candidates are sorted into a canonical order before matching so that the
 * clustering never depends on the order sources delivered them in.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 */

import { v5 as uuidv5 } from 'uuid';
import { sourceFamily } from '../../models/candidate.js';
import type { EntityCandidate } from '../../models/candidate.js';
import {
  DEFAULT_FUSION_CONFIG,
  EMPTY_GRAPH,
  cloneEntity,
} from '../../models/knowledge-graph.js';
import type { Entity, FusedGraph, FusionConfig } from '../../models/knowledge-graph.js';
import { contractViolationError } from '../../server/errors.js';
import { EntityCandidateSchema, safeValidateInput } from '../../utils/validation.js';
import {
  compareStrings,
  jaccardSimilarity,
  normalizeName,
  normalizedSet,
  setsIntersect,
  sortedUnion,
} from './string-similarity.js';

/** Namespace for deterministic (v5) entity ids */
export const ENTITY_ID_NAMESPACE = '6f1c2d9e-4b7a-4c3e-9a8d-2e4f6b1a7c90';

export type MatchRule = 'same_source_ref' | 'cross_source_ref' | 'name_and_type' | 'alias_similarity';

export interface ResolutionStats {
  total_candidates: number;
  malformed_candidates: number;
  entities_created: number;
  matches: Record<MatchRule, number>;
}

export interface ResolutionResult {
  /** Index into the caller's candidate sequence -> entity_id. Malformed candidates are absent. */
  assignments: Map<number, string>;
  /** Existing entities (cloned, possibly merged into) plus new ones, sorted by entity_id */
  entities: Entity[];
  /** Lookup used by the fusion builder to map relation refs onto entity ids */
  references: ReferenceIndex;
  stats: ResolutionStats;
}

interface IndexedCandidate {
  index: number;
  candidate: EntityCandidate;
}

// ============================================================
// Helpers
// ============================================================

function refKey(namespace: string, ref: string): string {
  return `${namespace}\u0000${ref}`;
}

function addToIndex(index: Map<string, Set<string>>, key: string, entityId: string): void {
  let ids = index.get(key);
  if (!ids) {
    ids = new Set();
    index.set(key, ids);
  }
  ids.add(entityId);
}

/**
 * Smallest entity id in a set, or null for an empty/absent set
 */
function smallestId(ids: Iterable<string> | undefined): string | null {
  if (!ids) return null;
  let best: string | null = null;
  for (const id of ids) {
    if (best === null || compareStrings(id, best) < 0) best = id;
  }
  return best;
}

/**
 * Rank of a source family in the configured priority list.
 * Unknown families share the rank after the last configured one.
 */
function priorityRank(family: string, priority: readonly string[]): number {
  const idx = priority.indexOf(family);
  return idx === -1 ? priority.length : idx;
}

/**
 * Content fingerprint used as the final tiebreaker of the canonical order
 */
function candidateFingerprint(c: EntityCandidate): string {
  return JSON.stringify([
    c.source_id,
    [...c.type_hints].sort(compareStrings),
    [...c.aliases].sort(compareStrings),
    c.description,
    c.confidence,
    c.cross_refs.map((x) => refKey(x.namespace, x.ref)).sort(compareStrings),
  ]);
}

/**
 * Canonical candidate comparator: (source priority, external_ref, name), then content.
 * Candidates with an external_ref sort before those without one.
 */
export function compareCandidates(
  a: EntityCandidate,
  b: EntityCandidate,
  priority: readonly string[] = DEFAULT_FUSION_CONFIG.sourcePriority
): number {
  const famA = sourceFamily(a.source_id);
  const famB = sourceFamily(b.source_id);
  const rankDiff = priorityRank(famA, priority) - priorityRank(famB, priority);
  if (rankDiff !== 0) return rankDiff;
  const famDiff = compareStrings(famA, famB);
  if (famDiff !== 0) return famDiff;

  if (a.external_ref !== b.external_ref) {
    if (a.external_ref === null) return 1;
    if (b.external_ref === null) return -1;
    return compareStrings(a.external_ref, b.external_ref);
  }

  const nameDiff = compareStrings(a.name, b.name);
  if (nameDiff !== 0) return nameDiff;

  return compareStrings(candidateFingerprint(a), candidateFingerprint(b));
}

/**
 * Every identifier a candidate carries, by namespace
 */
function candidateRefs(c: EntityCandidate): Array<{ namespace: string; ref: string }> {
  const refs = c.cross_refs.map((x) => ({ namespace: x.namespace, ref: x.ref }));
  if (c.external_ref !== null) {
    refs.unshift({ namespace: sourceFamily(c.source_id), ref: c.external_ref });
  }
  return refs;
}

function trimmedNonEmpty(values: readonly string[]): string[] {
  return values.map((v) => v.trim()).filter((v) => v.length > 0);
}

// ============================================================
// Reference Index
// ============================================================

/**
 * Maps the references relation candidates use onto resolved entity ids.
 *
 * A reference resolves, in order, as:
 *   1. an entity_id
 *   2. an external id in the relation source's family
 *   3. the normalized name of a candidate the same source produced in this batch
 *   4. the normalized canonical name of exactly one entity
 */
export class ReferenceIndex {
  private readonly entityIds: Set<string>;
  private readonly externalIds: Map<string, Set<string>>;
  private readonly sourceNames: Map<string, string>;
  private readonly canonicalNames: Map<string, Set<string>>;

  constructor(entities: readonly Entity[], sourceNames: Map<string, string>) {
    this.entityIds = new Set();
    this.externalIds = new Map();
    this.canonicalNames = new Map();
    this.sourceNames = sourceNames;

    for (const entity of entities) {
      this.entityIds.add(entity.entity_id);
      for (const [namespace, refs] of Object.entries(entity.external_ids)) {
        for (const ref of refs) {
          addToIndex(this.externalIds, refKey(namespace, ref), entity.entity_id);
        }
      }
      addToIndex(this.canonicalNames, normalizeName(entity.canonical_name), entity.entity_id);
    }
  }

  /**
   * Resolve a relation reference reported by `sourceId`
   *
   * @returns entity_id, or null when the reference names no entity
   */
  lookup(sourceId: string, ref: string): string | null {
    if (this.entityIds.has(ref)) return ref;

    const byExternal = smallestId(this.externalIds.get(refKey(sourceFamily(sourceId), ref)));
    if (byExternal !== null) return byExternal;

    const normalized = normalizeName(ref);
    const bySourceName = this.sourceNames.get(refKey(sourceId, normalized));
    if (bySourceName !== undefined) return bySourceName;

    const byCanonical = this.canonicalNames.get(normalized);
    if (byCanonical && byCanonical.size === 1) {
      return smallestId(byCanonical);
    }
    return null;
  }
}

// ============================================================
// Entity Pool
// ============================================================

/**
 * Working set of entities with the lookup indexes the cascade needs.
 * Lives for one resolveEntities() call only.
 */
class EntityPool {
  readonly entities = new Map<string, Entity>();
  private readonly provenanceRefs = new Map<string, Set<string>>();
  private readonly externalRefs = new Map<string, Set<string>>();
  private readonly names = new Map<string, Set<string>>();
  private readonly normalizedTypes = new Map<string, Set<string>>();
  private readonly normalizedAliases = new Map<string, Set<string>>();

  add(entity: Entity): void {
    this.entities.set(entity.entity_id, entity);
    addToIndex(this.names, normalizeName(entity.canonical_name), entity.entity_id);
    this.reindex(entity);
  }

  /**
   * Refresh the indexes derived from mutable entity fields
   */
  reindex(entity: Entity): void {
    const id = entity.entity_id;
    for (const p of entity.provenance) {
      if (p.external_ref !== null) {
        addToIndex(this.provenanceRefs, refKey(sourceFamily(p.source_id), p.external_ref), id);
      }
    }
    for (const [namespace, refs] of Object.entries(entity.external_ids)) {
      for (const ref of refs) addToIndex(this.externalRefs, refKey(namespace, ref), id);
    }
    this.normalizedTypes.set(id, normalizedSet(entity.type_set));
    const aliases = normalizedSet(entity.aliases);
    this.normalizedAliases.set(id, aliases);
    for (const alias of aliases) addToIndex(this.names, alias, id);
  }

  has(entityId: string): boolean {
    return this.entities.has(entityId);
  }

  matchSameSourceRef(c: EntityCandidate): string | null {
    if (c.external_ref === null) return null;
    return smallestId(this.provenanceRefs.get(refKey(sourceFamily(c.source_id), c.external_ref)));
  }

  matchCrossSourceRef(c: EntityCandidate): string | null {
    const hits = new Set<string>();
    for (const { namespace, ref } of candidateRefs(c)) {
      for (const id of this.externalRefs.get(refKey(namespace, ref)) ?? []) hits.add(id);
    }
    return smallestId(hits);
  }

  matchNameAndType(c: EntityCandidate, types: Set<string>): string | null {
    if (types.size === 0) return null;
    const hits: string[] = [];
    for (const id of this.names.get(normalizeName(c.name)) ?? []) {
      if (setsIntersect(types, this.normalizedTypes.get(id) ?? new Set())) hits.push(id);
    }
    return smallestId(hits);
  }

  matchAliasSimilarity(types: Set<string>, aliases: Set<string>, threshold: number): string | null {
    if (types.size === 0 || aliases.size === 0) return null;
    let bestId: string | null = null;
    let bestScore = -1;
    for (const id of this.entities.keys()) {
      if (!setsIntersect(types, this.normalizedTypes.get(id) ?? new Set())) continue;
      const score = jaccardSimilarity(aliases, this.normalizedAliases.get(id) ?? new Set());
      if (score < threshold) continue;
      if (score > bestScore || (score === bestScore && bestId !== null && compareStrings(id, bestId) < 0)) {
        bestId = id;
        bestScore = score;
      }
    }
    return bestId;
  }
}

// ============================================================
// Entity construction and merging
// ============================================================

/**
 * Deterministic id of the entity a candidate seeds.
 * A salt is appended only when the plain id is already in use.
 */
export function deriveEntityId(c: EntityCandidate, isTaken: (id: string) => boolean): string {
  const key = [
    c.source_id,
    c.external_ref ?? '',
    normalizeName(c.name),
    [...normalizedSet(c.type_hints)].sort(compareStrings).join('|'),
  ].join('\u0000');

  let id = uuidv5(key, ENTITY_ID_NAMESPACE);
  for (let salt = 1; isTaken(id); salt++) {
    id = uuidv5(`${key}#${salt}`, ENTITY_ID_NAMESPACE);
  }
  return id;
}

function addExternalId(entity: Entity, namespace: string, ref: string): void {
  const refs = entity.external_ids[namespace] ?? [];
  if (!refs.includes(ref)) {
    entity.external_ids[namespace] = sortedUnion(refs, [ref]);
  }
}

function buildEntity(c: EntityCandidate, entityId: string): Entity {
  const description = c.description?.trim() ?? '';
  const entity: Entity = {
    entity_id: entityId,
    canonical_name: c.name.trim(),
    type_set: sortedUnion(trimmedNonEmpty(c.type_hints)),
    description: description.length > 0 ? description : null,
    aliases: sortedUnion(trimmedNonEmpty(c.aliases)),
    provenance: [{ source_id: c.source_id, external_ref: c.external_ref }],
    external_ids: {},
    importance: 0,
  };
  for (const { namespace, ref } of candidateRefs(c)) addExternalId(entity, namespace, ref);
  return entity;
}

/**
 * Merge a candidate into an existing entity in place.
 * A candidate name the entity does not already carry is kept as an alias.
 * Provenance is only ever appended; re-adding a known (source, ref) pair is a no-op.
 */
export function mergeCandidate(entity: Entity, c: EntityCandidate): void {
  entity.type_set = sortedUnion(entity.type_set, trimmedNonEmpty(c.type_hints));
  const aliases = sortedUnion(entity.aliases, trimmedNonEmpty(c.aliases));
  const known = normalizedSet([entity.canonical_name, ...aliases]);
  const name = c.name.trim();
  entity.aliases = known.has(normalizeName(name)) ? aliases : sortedUnion(aliases, [name]);

  const description = c.description?.trim() ?? '';
  if ((entity.description === null || entity.description.trim().length === 0) && description.length > 0) {
    entity.description = description;
  }

  const seen = entity.provenance.some(
    (p) => p.source_id === c.source_id && p.external_ref === c.external_ref
  );
  if (!seen) {
    entity.provenance.push({ source_id: c.source_id, external_ref: c.external_ref });
  }

  for (const { namespace, ref } of candidateRefs(c)) addExternalId(entity, namespace, ref);
}

// ============================================================
// Resolution
// ============================================================

/**
 * Resolve entity candidates into canonical entities
 *
 * Existing entities are cloned, never mutated. Malformed candidates are skipped
 * and counted. Throws only when `candidates` itself is not a sequence.
 *
 * @param candidates - Candidate observations, in any order
 * @param existing - Previously fused graph to resolve against (or null)
 * @param config - Fusion configuration (source priority, alias threshold)
 */
export function resolveEntities(
  candidates: readonly unknown[],
  existing: FusedGraph | null = EMPTY_GRAPH,
  config: FusionConfig = DEFAULT_FUSION_CONFIG
): ResolutionResult {
  if (!Array.isArray(candidates)) {
    throw contractViolationError('resolveEntities requires a candidate array', {
      received: candidates === null ? 'null' : typeof candidates,
    });
  }

  const pool = new EntityPool();
  for (const entity of (existing ?? EMPTY_GRAPH).entities) {
    pool.add(cloneEntity(entity));
  }

  const stats: ResolutionStats = {
    total_candidates: candidates.length,
    malformed_candidates: 0,
    entities_created: 0,
    matches: {
      same_source_ref: 0,
      cross_source_ref: 0,
      name_and_type: 0,
      alias_similarity: 0,
    },
  };

  const valid: IndexedCandidate[] = [];
  candidates.forEach((raw, index) => {
    const parsed = safeValidateInput(EntityCandidateSchema, raw);
    if (parsed.success) {
      valid.push({ index, candidate: parsed.data });
    } else {
      stats.malformed_candidates++;
    }
  });

  valid.sort((a, b) => compareCandidates(a.candidate, b.candidate, config.sourcePriority));

  const assignments = new Map<number, string>();
  const sourceNames = new Map<string, string>();

  for (const { index, candidate } of valid) {
    const types = normalizedSet(candidate.type_hints);
    const aliases = normalizedSet(candidate.aliases);

    let rule: MatchRule | null = null;
    let matchId = pool.matchSameSourceRef(candidate);
    if (matchId !== null) {
      rule = 'same_source_ref';
    } else if ((matchId = pool.matchCrossSourceRef(candidate)) !== null) {
      rule = 'cross_source_ref';
    } else if ((matchId = pool.matchNameAndType(candidate, types)) !== null) {
      rule = 'name_and_type';
    } else if ((matchId = pool.matchAliasSimilarity(types, aliases, config.aliasJaccardThreshold)) !== null) {
      rule = 'alias_similarity';
    }

    let entityId: string;
    const target = matchId === null ? undefined : pool.entities.get(matchId);
    if (rule !== null && target !== undefined) {
      mergeCandidate(target, candidate);
      pool.reindex(target);
      stats.matches[rule]++;
      entityId = target.entity_id;
    } else {
      entityId = deriveEntityId(candidate, (id) => pool.has(id));
      pool.add(buildEntity(candidate, entityId));
      stats.entities_created++;
    }

    assignments.set(index, entityId);
    const nameKey = refKey(candidate.source_id, normalizeName(candidate.name));
    if (!sourceNames.has(nameKey)) sourceNames.set(nameKey, entityId);
  }

  const entities = [...pool.entities.values()].sort((a, b) =>
    compareStrings(a.entity_id, b.entity_id)
  );

  return {
    assignments,
    entities,
    references: new ReferenceIndex(entities, sourceNames),
    stats,
  };
}
