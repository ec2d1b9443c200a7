/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results, server configuration, and state.
 *
 * @module server/types
 */

import type { ErrorCategory } from './errors.js';
import type { FusionConfig } from '../models/knowledge-graph.js';
import type { GraphStore } from '../services/storage/graph/index.js';
import type { LogLevel } from '../utils/logger.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error structure for failed tool operations
 */
export interface ToolError {
  category: ErrorCategory;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Successful tool result
 */
export interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Failed tool result
 */
export interface ToolResultFailure {
  success: false;
  error: ToolError;
}

/**
 * Union type for all tool results
 */
export type ToolResult<T = unknown> = ToolResultSuccess<T> | ToolResultFailure;

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

/**
 * Helper to create failure result
 */
export function failureResult(
  category: ErrorCategory,
  message: string,
  details?: Record<string, unknown>
): ToolResultFailure {
  return {
    success: false,
    error: { category, message, details },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server configuration options
 */
export interface ServerConfig {
  /** Directory holding graph store files */
  defaultStoragePath: string;

  /** Source priority, reliabilities and alias threshold used by fusion */
  fusion: FusionConfig;

  /** Upper bound on recommendations per audit (default: 10) */
  maxRecommendations: number;

  /** Entity types that turn a recommendation into "cover subtopic" */
  topicalTypes: string[];

  /** Character window for text co-occurrence when no sentence spans are given (default: 250) */
  cooccurrenceWindow: number;

  /** Log level */
  logLevel: LogLevel;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state tracking
 */
export interface ServerState {
  /** Currently open graph store */
  currentStore: GraphStore | null;

  /** Name of the currently open graph store */
  currentStoreName: string | null;

  /** Server configuration */
  config: ServerConfig;
}
