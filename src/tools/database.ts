/**
 * Graph Store MCP Tools
 *
 * Tools: kg_db_open
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/database
 */

import { z } from 'zod';
import { openStore } from '../server/state.js';
import { successResult } from '../server/types.js';
import { DatabaseOpenInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

/**
 * Handle kg_db_open - Open (or create) a graph store and make it current
 */
export async function handleDatabaseOpen(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseOpenInput, params);
    const store = openStore(input.name, input.storage_path);
    const graphs = store.listGraphs();

    return formatResponse(
      successResult({
        name: store.name,
        path: store.path,
        opened: true,
        graph_count: graphs.length,
        keywords: graphs.map((g) => g.keyword),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Graph store tools collection for MCP server registration
 */
export const databaseTools: Record<string, ToolDefinition> = {
  kg_db_open: {
    description:
      'Open a graph store by name, creating it when it does not exist. All graph and coverage tools work on the open store.',
    inputSchema: {
      name: z
        .string()
        .min(1)
        .max(64)
        .regex(/^[a-zA-Z0-9_-]+$/)
        .describe('Store name (alphanumeric, underscore, hyphen only)'),
      storage_path: z.string().optional().describe('Optional storage path override'),
    },
    handler: handleDatabaseOpen,
  },
};
