/**
 * Knowledge Graph Service - Orchestration layer
 *
 * Ties together entity resolution, relation fusion and importance ranking
 * into a single fuse() call that turns one batch of candidates (plus an
 * optional previously fused graph) into a new, frozen FusedGraph.
 *
 * Pure: no I/O, no logging, no state kept between calls.
 *
 * @module services/knowledge-graph/graph-service
 */

import {
  DEFAULT_FUSION_CONFIG,
  EMPTY_GRAPH,
  cloneEntity,
  cloneRelation,
} from '../../models/knowledge-graph.js';
import type { Entity, FusedGraph, FusionConfig, Relation } from '../../models/knowledge-graph.js';
import { contractViolationError } from '../../server/errors.js';
import { resolveEntities, type MatchRule } from './resolution-service.js';
import { fuseRelations } from './fusion-service.js';
import { computeImportance } from './importance.js';

// ============================================================
// Types
// ============================================================

/**
 * One batch of candidates, in the shape the normalizers produce.
 * Items are validated individually; malformed ones are counted, not thrown.
 */
export interface FuseInput {
  entities: readonly unknown[];
  relations?: readonly unknown[];
}

/**
 * Counts of everything skipped or dropped, for the caller to surface
 */
export interface FuseReport {
  total_entity_candidates: number;
  malformed_candidates: number;
  entities_created: number;
  entity_matches: Record<MatchRule, number>;
  total_relation_candidates: number;
  malformed_relations: number;
  unresolved_references: number;
  self_loops_dropped: number;
  relations_created: number;
  relations_updated: number;
  entity_count: number;
  relation_count: number;
}

export interface FuseResult {
  graph: FusedGraph;
  /** Entity candidate index -> entity_id */
  assignments: Map<number, string>;
  report: FuseReport;
}

// ============================================================
// Helpers
// ============================================================

function freezeEntity(entity: Entity): Entity {
  Object.freeze(entity.type_set);
  Object.freeze(entity.aliases);
  entity.provenance.forEach((p) => Object.freeze(p));
  Object.freeze(entity.provenance);
  Object.values(entity.external_ids).forEach((refs) => Object.freeze(refs));
  Object.freeze(entity.external_ids);
  return Object.freeze(entity);
}

function freezeRelation(relation: Relation): Relation {
  relation.evidence.forEach((e) => Object.freeze(e));
  Object.freeze(relation.evidence);
  return Object.freeze(relation);
}

// ============================================================
// Fusion
// ============================================================

/**
 * Fuse one batch of candidates into a graph
 *
 * To fuse incrementally, pass the previous FusedGraph as `existing`; it is
 * cloned and never mutated. Two calls over the same candidates (in any
 * order) from the same `existing` return identical graphs.
 *
 * @param input - Entity and relation candidates
 * @param existing - Previously fused graph (or null)
 * @param config - Injectable fusion configuration
 * @throws MCPError CONTRACT_VIOLATION when input or its candidate lists are absent
 */
export function fuse(
  input: FuseInput,
  existing: FusedGraph | null = EMPTY_GRAPH,
  config: FusionConfig = DEFAULT_FUSION_CONFIG
): FuseResult {
  if (input === null || typeof input !== 'object') {
    throw contractViolationError('fuse requires an input object with an entities array');
  }
  if (!Array.isArray(input.entities)) {
    throw contractViolationError('fuse requires input.entities to be an array');
  }
  const relationCandidates = input.relations ?? [];
  if (!Array.isArray(relationCandidates)) {
    throw contractViolationError('fuse requires input.relations to be an array when present');
  }

  const base = existing ?? EMPTY_GRAPH;
  const resolution = resolveEntities(input.entities, base, config);
  const fusion = fuseRelations(resolution, relationCandidates, base.relations, config);

  const importance = computeImportance(resolution.entities, fusion.relations);
  for (const entity of resolution.entities) {
    entity.importance = importance.get(entity.entity_id) ?? 0;
  }

  const graph: FusedGraph = Object.freeze({
    entities: Object.freeze(resolution.entities.map(freezeEntity)),
    relations: Object.freeze(fusion.relations.map(freezeRelation)),
  });

  return {
    graph,
    assignments: resolution.assignments,
    report: {
      total_entity_candidates: resolution.stats.total_candidates,
      malformed_candidates: resolution.stats.malformed_candidates,
      entities_created: resolution.stats.entities_created,
      entity_matches: { ...resolution.stats.matches },
      total_relation_candidates: fusion.stats.total_relation_candidates,
      malformed_relations: fusion.stats.malformed_relations,
      unresolved_references: fusion.stats.unresolved_references,
      self_loops_dropped: fusion.stats.self_loops_dropped,
      relations_created: fusion.stats.relations_created,
      relations_updated: fusion.stats.relations_updated,
      entity_count: graph.entities.length,
      relation_count: graph.relations.length,
    },
  };
}

/**
 * Recompute importance over an already fused graph, returning a new frozen graph.
 * Used when a graph is assembled outside fuse() (e.g. deserialized from JSON).
 */
export function rerankGraph(graph: FusedGraph): FusedGraph {
  const importance = computeImportance(graph.entities, graph.relations);
  return Object.freeze({
    entities: Object.freeze(
      graph.entities.map((e) =>
        freezeEntity({ ...cloneEntity(e), importance: importance.get(e.entity_id) ?? 0 })
      )
    ),
    relations: Object.freeze(
      graph.relations.map((r) => freezeRelation(cloneRelation(r)))
    ),
  });
}
