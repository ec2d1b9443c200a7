/**
 * MCP Server Error Handling
 *
 * FAIL FAST on contract violations: errors throw immediately with descriptive context.
 * Recoverable data problems (malformed candidates, unresolved references) are
 * counted by the core and never reach this module.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 * Each category maps to specific failure modes for debugging
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Programming errors: absent or wrongly shaped arguments to the core
  | 'CONTRACT_VIOLATION'

  // Graph store errors
  | 'DATABASE_NOT_SELECTED'
  | 'DATABASE_ERROR'
  | 'GRAPH_NOT_FOUND'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to MCPError categories so clients can
 * programmatically distinguish bad input from storage failures.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',
  GraphStoreError: 'DATABASE_ERROR',
  SqliteError: 'DATABASE_ERROR',
};

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 *
 * Provides category, message, and optional details for debugging.
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      return new MCPError(category, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, and details
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create validation error
 */
export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

/**
 * Create contract violation error (programming error in the caller)
 */
export function contractViolationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONTRACT_VIOLATION', message, details);
}

/**
 * Create database not selected error
 */
export function databaseNotSelectedError(): MCPError {
  return new MCPError(
    'DATABASE_NOT_SELECTED',
    'No graph store open. Use kg_db_open to open or create one.'
  );
}

/**
 * Create graph not found error
 */
export function graphNotFoundError(keyword: string): MCPError {
  return new MCPError(
    'GRAPH_NOT_FOUND',
    `No fused graph stored for keyword "${keyword}". Use kg_graph_list to see stored graphs.`,
    { keyword }
  );
}
