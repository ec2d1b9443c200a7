/**
 * Semantic Coverage MCP Tools
 *
 * Tools: kg_coverage_score, kg_coverage_audit
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/coverage
 */

import { z } from 'zod';
import type { FusedGraph } from '../models/knowledge-graph.js';
import { graphNotFoundError } from '../server/errors.js';
import { getConfig, requireStore } from '../server/state.js';
import { successResult, type ServerConfig } from '../server/types.js';
import { auditDocument, scoreCoverage } from '../services/coverage/scorer.js';
import {
  generateRecommendations,
  type RecommendationOptions,
} from '../services/coverage/recommendations.js';
import { logger } from '../utils/logger.js';
import { Keyword, validateInput } from '../utils/validation.js';
import {
  SourceInput,
  formatResponse,
  handleError,
  normalizeSources,
  summarizeCoverage,
  type ToolDefinition,
  type ToolResponse,
} from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const MaxRecommendations = z
  .number()
  .int()
  .min(0)
  .max(100)
  .optional()
  .describe('Maximum recommendations to return (default: configured max_recommendations)');

const CoverageScoreInput = z.object({
  keyword: Keyword.describe('Keyword of the reference graph'),
  entity_ids: z.array(z.string()).describe('Entity ids of the reference graph found in the audited document'),
  max_recommendations: MaxRecommendations,
});

const CoverageAuditInput = z.object({
  keyword: Keyword.describe('Keyword of the reference graph'),
  sources: z
    .array(SourceInput)
    .default([])
    .describe('Raw payloads extracted from the audited document (usually text_extraction)'),
  entities: z
    .array(z.unknown())
    .default([])
    .describe('Already normalized entity candidates extracted from the document'),
  name_only_fallback: z
    .boolean()
    .default(true)
    .describe('Match unresolved candidates to reference entities by name or alias alone'),
  max_recommendations: MaxRecommendations,
});

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function loadReference(keyword: string): FusedGraph {
  const graph = requireStore().loadGraph(keyword);
  if (!graph) {
    throw graphNotFoundError(keyword);
  }
  return graph;
}

function recommendationOptions(config: ServerConfig, max: number | undefined): RecommendationOptions {
  return {
    maxRecommendations: max ?? config.maxRecommendations,
    topicalTypes: config.topicalTypes,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle kg_coverage_score - Score a set of entity ids against a stored graph
 */
export async function handleCoverageScore(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(CoverageScoreInput, params);
    const config = getConfig();
    const reference = loadReference(input.keyword);

    const report = scoreCoverage(reference, input.entity_ids);
    const recommendations = generateRecommendations(
      report,
      recommendationOptions(config, input.max_recommendations)
    );

    return formatResponse(
      successResult({
        keyword: input.keyword,
        ...summarizeCoverage(report),
        recommendations,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle kg_coverage_audit - Resolve a document's extracted entities against a
 * stored graph, score the coverage and recommend what is missing
 */
export async function handleCoverageAudit(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(CoverageAuditInput, params);
    const config = getConfig();
    const reference = loadReference(input.keyword);

    const batch = normalizeSources(input.sources);
    const candidates = [...batch.entities, ...input.entities];
    const audit = auditDocument(reference, candidates, config.fusion, {
      nameOnlyFallback: input.name_only_fallback,
    });
    const recommendations = generateRecommendations(
      audit.report,
      recommendationOptions(config, input.max_recommendations)
    );

    logger.info(
      'coverage',
      `Audit against "${input.keyword}": score ${audit.report.score.toFixed(3)}, ` +
        `${audit.matched.size}/${candidates.length} candidates matched`
    );

    return formatResponse(
      successResult({
        keyword: input.keyword,
        ...summarizeCoverage(audit.report),
        candidate_count: candidates.length,
        matched_candidates: audit.matched.size,
        unmatched_candidates: audit.unmatched_candidates,
        name_fallback_matches: audit.name_fallback_matches,
        malformed_candidates: audit.resolution.malformed_candidates,
        skipped_payload_items: batch.skipped,
        recommendations,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Coverage tools collection for MCP server registration
 */
export const coverageTools: Record<string, ToolDefinition> = {
  kg_coverage_score: {
    description:
      'Score how much of the importance of a stored reference graph a set of entity ids covers, with recommendations for what is missing',
    inputSchema: CoverageScoreInput.shape,
    handler: handleCoverageScore,
  },
  kg_coverage_audit: {
    description:
      'Audit a document: resolve its extracted entities against a stored reference graph, score semantic coverage and recommend missing entities or subtopics',
    inputSchema: CoverageAuditInput.shape,
    handler: handleCoverageAudit,
  },
};
