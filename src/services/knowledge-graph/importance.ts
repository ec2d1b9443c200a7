/**
 * Entity importance ranking
 *
 *   importance = 0.5 × minmax(degree) + 0.5 × minmax(incoming weight sum)
 *
 * Both terms are min-max normalized over every entity of the graph.
 * Isolated entities always get 0.
 *
 * @module services/knowledge-graph/importance
 */

import type { Entity, Relation } from '../../models/knowledge-graph.js';

const DEGREE_FACTOR = 0.5;
const INCOMING_WEIGHT_FACTOR = 0.5;

/**
 * Min-max normalize. When every value is equal the term carries no ranking
 * information, so positive values map to 1 and zero maps to 0.
 */
function minMax(value: number, min: number, max: number): number {
  if (max === min) return value > 0 ? 1 : 0;
  return (value - min) / (max - min);
}

/**
 * [min, max] of a non-empty sequence of any length
 */
function range(values: Iterable<number>): [number, number] {
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return [min, max];
}

/**
 * Compute importance for every entity
 *
 * Relations whose endpoints are not among `entities` are ignored.
 *
 * @returns entity_id -> importance in [0, 1]
 */
export function computeImportance(
  entities: readonly Entity[],
  relations: readonly Relation[]
): Map<string, number> {
  const degree = new Map<string, number>();
  const incoming = new Map<string, number>();
  for (const entity of entities) {
    degree.set(entity.entity_id, 0);
    incoming.set(entity.entity_id, 0);
  }

  for (const relation of relations) {
    const subjectDegree = degree.get(relation.subject_id);
    const objectDegree = degree.get(relation.object_id);
    if (subjectDegree === undefined || objectDegree === undefined) continue;
    degree.set(relation.subject_id, subjectDegree + 1);
    degree.set(relation.object_id, (degree.get(relation.object_id) ?? 0) + 1);
    incoming.set(relation.object_id, (incoming.get(relation.object_id) ?? 0) + relation.weight);
  }

  const importance = new Map<string, number>();
  if (entities.length === 0) return importance;

  const [minDegree, maxDegree] = range(degree.values());
  const [minIncoming, maxIncoming] = range(incoming.values());

  for (const entity of entities) {
    const d = degree.get(entity.entity_id) ?? 0;
    if (d === 0) {
      importance.set(entity.entity_id, 0);
      continue;
    }
    const w = incoming.get(entity.entity_id) ?? 0;
    const score =
      DEGREE_FACTOR * minMax(d, minDegree, maxDegree) +
      INCOMING_WEIGHT_FACTOR * minMax(w, minIncoming, maxIncoming);
    importance.set(entity.entity_id, Math.min(1, Math.max(0, score)));
  }
  return importance;
}
