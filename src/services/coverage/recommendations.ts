/**
 * Recommendation Generator
 *
 * Turns the gaps of a CoverageReport into a bounded, ordered list of short
 * suggestions. Pure function of its input.
 *
 * @module services/coverage/recommendations
 */

import type { CoverageReport, Entity } from '../../models/knowledge-graph.js';
import { normalizeName } from '../knowledge-graph/string-similarity.js';

export const DEFAULT_MAX_RECOMMENDATIONS = 10;

/** Types marking an entity as a topic or category rather than a concrete instance */
export const DEFAULT_TOPICAL_TYPES: readonly string[] = [
  'category',
  'topic',
  'field',
  'concept',
  'subject',
  'discipline',
  'academic discipline',
  'field of study',
];

export type RecommendationKind = 'include_entity' | 'cover_subtopic';

export interface Recommendation {
  kind: RecommendationKind;
  entity_id: string;
  canonical_name: string;
  importance: number;
  /** "include entity: <name>" or "cover subtopic: <name>" */
  text: string;
}

export interface RecommendationOptions {
  maxRecommendations?: number;
  topicalTypes?: readonly string[];
}

function isTopical(entity: Entity, topical: ReadonlySet<string>): boolean {
  return entity.type_set.some((t) => topical.has(normalizeName(t)));
}

/**
 * Generate suggestions from the missing entities of a coverage report
 *
 * Entries follow `report.missing` order (importance desc, entity_id asc).
 */
export function generateRecommendations(
  report: Pick<CoverageReport, 'missing'>,
  options: RecommendationOptions = {}
): Recommendation[] {
  const max = Math.max(0, Math.floor(options.maxRecommendations ?? DEFAULT_MAX_RECOMMENDATIONS));
  const topical = new Set((options.topicalTypes ?? DEFAULT_TOPICAL_TYPES).map(normalizeName));

  return report.missing.slice(0, max).map((entity) => {
    const kind: RecommendationKind = isTopical(entity, topical) ? 'cover_subtopic' : 'include_entity';
    const prefix = kind === 'cover_subtopic' ? 'cover subtopic' : 'include entity';
    return {
      kind,
      entity_id: entity.entity_id,
      canonical_name: entity.canonical_name,
      importance: entity.importance,
      text: `${prefix}: ${entity.canonical_name}`,
    };
  });
}
