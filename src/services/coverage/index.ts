/**
 * Coverage Services
 *
 * @module services/coverage
 */

export { auditDocument, compareByImportance, scoreCoverage } from './scorer.js';
export type { AuditOptions, AuditResult } from './scorer.js';

export {
  DEFAULT_MAX_RECOMMENDATIONS,
  DEFAULT_TOPICAL_TYPES,
  generateRecommendations,
} from './recommendations.js';
export type { Recommendation, RecommendationKind, RecommendationOptions } from './recommendations.js';
