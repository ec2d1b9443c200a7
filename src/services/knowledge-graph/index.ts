/**
 * Knowledge Graph Services
 *
 * Barrel exports for string similarity utilities, entity resolution,
 * relation fusion, importance ranking, orchestration and JSON export.
 */

export {
  normalizeName,
  normalizedSet,
  jaccardSimilarity,
  setsIntersect,
  sortedUnion,
  compareStrings,
} from './string-similarity.js';

export {
  ENTITY_ID_NAMESPACE,
  ReferenceIndex,
  compareCandidates,
  deriveEntityId,
  mergeCandidate,
  resolveEntities,
} from './resolution-service.js';

export type { MatchRule, ResolutionResult, ResolutionStats } from './resolution-service.js';

export { combineEvidence, fuseRelations, reliabilityOf } from './fusion-service.js';

export type { FusionResult, FusionStats } from './fusion-service.js';

export { computeImportance } from './importance.js';

export { fuse, rerankGraph } from './graph-service.js';

export type { FuseInput, FuseReport, FuseResult } from './graph-service.js';

export { serializeEntity, serializeRelation, serializeGraph, deserializeGraph } from './export-service.js';
