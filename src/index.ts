#!/usr/bin/env node
/**
 * Semantic Coverage MCP Server
 *
 * Entry point for the MCP server using stdio transport.
 * Exposes knowledge-graph fusion, storage and coverage tools via JSON-RPC.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { getConfig, loadConfigFromEnv } from './server/state.js';
import { databaseTools } from './tools/database.js';
import { fusionTools } from './tools/fusion.js';
import { graphTools } from './tools/graph.js';
import { coverageTools } from './tools/coverage.js';
import { configTools } from './tools/config.js';
import type { ToolDefinition } from './tools/shared.js';
import { logger } from './utils/logger.js';

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER INITIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

const server = new McpServer({
  name: 'semantic-coverage-mcp',
  version: '1.0.0',
});

const allTools: Record<string, ToolDefinition> = {
  ...databaseTools,
  ...fusionTools,
  ...graphTools,
  ...coverageTools,
  ...configTools,
};

for (const [name, tool] of Object.entries(allTools)) {
  server.tool(name, tool.description, tool.inputSchema, tool.handler);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STARTUP
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  dotenv.config();
  loadConfigFromEnv();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('server', 'Semantic Coverage MCP Server running on stdio');
  logger.info('server', `Tools registered: ${Object.keys(allTools).length}`);
  logger.debug('server', `Storage path: ${getConfig().defaultStoragePath}`);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
