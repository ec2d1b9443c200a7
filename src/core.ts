/**
 * Library entry point
 *
 * The fusion and coverage core without the MCP server: normalizers,
 * resolution and fusion, scoring, recommendations and the graph store.
 *
 * @module core
 */

export * from './models/candidate.js';
export * from './models/knowledge-graph.js';
export * from './services/normalizers/index.js';
export * from './services/knowledge-graph/index.js';
export * from './services/coverage/index.js';
export * from './services/storage/graph/index.js';
export { MCPError, type ErrorCategory } from './server/errors.js';
export { ValidationError } from './utils/validation.js';
