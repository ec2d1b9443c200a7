/**
 * Tool Definitions Validation Tests
 *
 * Validates that all tool modules export properly shaped tool definitions
 * with description, inputSchema, and handler for each tool.
 */
import { describe, it, expect } from 'vitest';
import { databaseTools } from '../../../src/tools/database.js';
import { fusionTools } from '../../../src/tools/fusion.js';
import { graphTools } from '../../../src/tools/graph.js';
import { coverageTools } from '../../../src/tools/coverage.js';
import { configTools } from '../../../src/tools/config.js';
import type { ToolDefinition } from '../../../src/tools/shared.js';

const toolModules: Array<{ name: string; tools: Record<string, ToolDefinition> }> = [
  { name: 'database', tools: databaseTools },
  { name: 'fusion', tools: fusionTools },
  { name: 'graph', tools: graphTools },
  { name: 'coverage', tools: coverageTools },
  { name: 'config', tools: configTools },
];

describe('Tool definitions validation', () => {
  for (const mod of toolModules) {
    it(`${mod.name} tools have a description, handler and Zod input schema`, () => {
      const toolNames = Object.keys(mod.tools);
      expect(toolNames.length).toBeGreaterThan(0);

      for (const [toolName, tool] of Object.entries(mod.tools)) {
        expect(toolName).toMatch(/^kg_[a-z_]+$/);
        expect(tool.description.length, `${toolName} description empty`).toBeGreaterThan(0);
        expect(typeof tool.handler, `${toolName} handler not function`).toBe('function');
        for (const [fieldName, field] of Object.entries(tool.inputSchema)) {
          // Zod schemas have a _def property
          expect(field._def, `${toolName}.inputSchema.${fieldName} should be a Zod schema`).toBeDefined();
        }
      }
    });
  }

  it('registers every tool name once', () => {
    const names = toolModules.flatMap((m) => Object.keys(m.tools));
    expect(new Set(names).size).toBe(names.length);
    expect(names.sort()).toEqual([
      'kg_config_get',
      'kg_config_set',
      'kg_coverage_audit',
      'kg_coverage_score',
      'kg_db_open',
      'kg_fuse',
      'kg_graph_delete',
      'kg_graph_get',
      'kg_graph_list',
      'kg_normalize',
    ]);
  });
});
