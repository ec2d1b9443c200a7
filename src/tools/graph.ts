/**
 * Stored Graph MCP Tools
 *
 * Tools: kg_graph_get, kg_graph_list, kg_graph_delete
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/graph
 */

import { z } from 'zod';
import { graphNotFoundError } from '../server/errors.js';
import { requireStore } from '../server/state.js';
import { successResult } from '../server/types.js';
import { compareByImportance } from '../services/coverage/scorer.js';
import { serializeEntity, serializeGraph } from '../services/knowledge-graph/export-service.js';
import { logger } from '../utils/logger.js';
import { Keyword, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const GraphGetInput = z.object({
  keyword: Keyword.describe('Keyword the graph is stored under'),
  top_entities: z
    .number()
    .int()
    .min(1)
    .max(1000)
    .optional()
    .describe('Also list the N most important entities'),
});

const GraphListInput = z.object({});

const GraphDeleteInput = z.object({
  keyword: Keyword.describe('Keyword of the graph to delete'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle kg_graph_get - Return a stored graph in its JSON shape
 */
export async function handleGraphGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(GraphGetInput, params);
    const graph = requireStore().loadGraph(input.keyword);
    if (!graph) {
      throw graphNotFoundError(input.keyword);
    }

    const top =
      input.top_entities === undefined
        ? undefined
        : [...graph.entities].sort(compareByImportance).slice(0, input.top_entities).map(serializeEntity);

    return formatResponse(
      successResult({
        keyword: input.keyword,
        entity_count: graph.entities.length,
        relation_count: graph.relations.length,
        ...serializeGraph(graph),
        ...(top ? { top_entities: top } : {}),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle kg_graph_list - List stored graphs
 */
export async function handleGraphList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(GraphListInput, params);
    const store = requireStore();
    const graphs = store.listGraphs();

    return formatResponse(successResult({ store: store.name, graphs, total: graphs.length }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle kg_graph_delete - Delete a stored graph
 */
export async function handleGraphDelete(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(GraphDeleteInput, params);
    if (!requireStore().deleteGraph(input.keyword)) {
      throw graphNotFoundError(input.keyword);
    }
    logger.info('graph', `Deleted graph "${input.keyword}"`);

    return formatResponse(successResult({ keyword: input.keyword, deleted: true }));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Stored graph tools collection for MCP server registration
 */
export const graphTools: Record<string, ToolDefinition> = {
  kg_graph_get: {
    description: 'Get the fused graph stored under a keyword: entities with importance, and weighted relations',
    inputSchema: GraphGetInput.shape,
    handler: handleGraphGet,
  },
  kg_graph_list: {
    description: 'List the fused graphs in the open store with entity and relation counts',
    inputSchema: GraphListInput.shape,
    handler: handleGraphList,
  },
  kg_graph_delete: {
    description: 'Delete the fused graph stored under a keyword',
    inputSchema: GraphDeleteInput.shape,
    handler: handleGraphDelete,
  },
};
