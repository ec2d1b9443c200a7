/**
 * Graph Fusion MCP Tools
 *
 * Tools: kg_normalize, kg_fuse
 *
 * kg_fuse normalizes raw source payloads, resolves and fuses them (on top of
 * the graph already stored under the keyword unless `rebuild` is set) and
 * stores the result.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/fusion
 */

import { z } from 'zod';
import { EMPTY_GRAPH } from '../models/knowledge-graph.js';
import { getConfig, requireStore } from '../server/state.js';
import { successResult } from '../server/types.js';
import { fuse } from '../services/knowledge-graph/graph-service.js';
import { serializeGraph } from '../services/knowledge-graph/export-service.js';
import { logger } from '../utils/logger.js';
import { Keyword, validateInput } from '../utils/validation.js';
import {
  SourceInput,
  formatResponse,
  handleError,
  normalizeSources,
  type ToolDefinition,
  type ToolResponse,
} from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const NormalizeInput = z.object({
  sources: z.array(SourceInput).min(1).describe('Raw source payloads to normalize'),
});

const FuseToolInput = z.object({
  keyword: Keyword.describe('Keyword the fused graph is stored under'),
  sources: z.array(SourceInput).default([]).describe('Raw source payloads to normalize and fuse'),
  entities: z
    .array(z.unknown())
    .default([])
    .describe('Already normalized entity candidates (e.g. from kg_normalize)'),
  relations: z
    .array(z.unknown())
    .default([])
    .describe('Already normalized relation candidates'),
  rebuild: z
    .boolean()
    .default(false)
    .describe('Ignore the graph already stored under the keyword and fuse from scratch'),
  include_graph: z.boolean().default(false).describe('Return the fused graph in the response'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle kg_normalize - Turn raw payloads into entity and relation candidates
 */
export async function handleNormalize(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(NormalizeInput, params);
    const batch = normalizeSources(input.sources);

    return formatResponse(
      successResult({
        entities: batch.entities,
        relations: batch.relations,
        skipped: batch.skipped,
        entity_count: batch.entities.length,
        relation_count: batch.relations.length,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle kg_fuse - Fuse candidates into the graph stored under a keyword
 */
export async function handleFuse(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(FuseToolInput, params);
    const store = requireStore();
    const config = getConfig();

    const batch = normalizeSources(input.sources);
    const existing = input.rebuild ? EMPTY_GRAPH : (store.loadGraph(input.keyword) ?? EMPTY_GRAPH);

    const result = fuse(
      {
        entities: [...batch.entities, ...input.entities],
        relations: [...batch.relations, ...input.relations],
      },
      existing,
      config.fusion
    );
    const stored = store.saveGraph(input.keyword, result.graph);

    logger.info(
      'fusion',
      `Fused "${input.keyword}": ${result.report.entity_count} entities, ${result.report.relation_count} relations ` +
        `(${result.report.malformed_candidates + result.report.malformed_relations} malformed, ` +
        `${result.report.unresolved_references} unresolved)`
    );

    return formatResponse(
      successResult({
        keyword: input.keyword,
        report: { ...result.report, skipped_payload_items: batch.skipped },
        stored,
        ...(input.include_graph ? { graph: serializeGraph(result.graph) } : {}),
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
 * Fusion tools collection for MCP server registration
 */
export const fusionTools: Record<string, ToolDefinition> = {
  kg_normalize: {
    description:
      'Normalize raw curated-KB, Wikidata SPARQL or text-extraction payloads into entity and relation candidates without storing anything',
    inputSchema: NormalizeInput.shape,
    handler: handleNormalize,
  },
  kg_fuse: {
    description:
      'Resolve and fuse source payloads and/or candidates into the knowledge graph stored under a keyword. Fusing the same input twice from the same stored graph yields the same graph.',
    inputSchema: FuseToolInput.shape,
    handler: handleFuse,
  },
};
