/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used across all tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import { SOURCE_FAMILIES } from '../models/candidate.js';
import type { NormalizedBatch } from '../models/candidate.js';
import type { CoverageReport } from '../models/knowledge-graph.js';
import { MCPError, formatErrorResponse } from '../server/errors.js';
import { getConfig } from '../server/state.js';
import { mergeBatches, normalizeSource } from '../services/normalizers/index.js';
import { logger } from '../utils/logger.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }> };

/** Tool handler function signature */
type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

/** Tool definition with description, schema, and handler */
export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format tool result as MCP content response
 */
export function formatResponse(result: unknown): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
  };
}

/**
 * Handle errors uniformly - FAIL FAST
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error);
  logger.error('ERROR', `${mcpError.category}: ${mcpError.message}`);
  return formatResponse(formatErrorResponse(mcpError));
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED SCHEMAS AND HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One raw payload from a source family
 */
export const SourceInput = z.object({
  kind: z
    .enum(SOURCE_FAMILIES)
    .describe('Source family the payload comes from'),
  payload: z.unknown().describe('Raw payload as returned by the source'),
  source_id: z
    .string()
    .min(1)
    .optional()
    .describe('Source id override, e.g. "wikidata:dump-2024" (default: the family name)'),
});

export type SourceInputValue = z.infer<typeof SourceInput>;

/**
 * Normalize several raw payloads into one candidate batch,
 * using the configured co-occurrence window for text extraction.
 */
export function normalizeSources(sources: readonly SourceInputValue[]): NormalizedBatch {
  const { cooccurrenceWindow } = getConfig();
  return mergeBatches(
    sources.map((source) =>
      normalizeSource(source.kind, source.payload, {
        sourceId: source.source_id,
        cooccurrenceWindow,
      })
    )
  );
}

/**
 * JSON-safe summary of a coverage report
 */
export function summarizeCoverage(report: CoverageReport): Record<string, unknown> {
  return {
    score: report.score,
    empty_reference: report.empty_reference,
    covered_importance: report.covered_importance,
    total_importance: report.total_importance,
    covered_count: report.covered.size,
    missing_count: report.missing.length,
    covered_entity_ids: [...report.covered].sort(),
    missing: report.missing.map((e) => ({
      id: e.entity_id,
      name: e.canonical_name,
      type: [...e.type_set],
      importance: e.importance,
    })),
  };
}
