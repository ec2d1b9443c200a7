/**
 * Shared helpers for tool handler tests
 *
 * @module tests/unit/tools/helpers
 */

import type { ToolResponse as McpToolResponse } from '../../../src/tools/shared.js';

export interface ToolResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: {
    category: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export function parseResponse(response: McpToolResponse): ToolResponse {
  return JSON.parse(response.content[0].text);
}

/**
 * Small curated-KB payload:
 *   Machine Learning PART_OF Artificial Intelligence (weight 1)
 *   Geoffrey Hinton RELATED_TO Machine Learning (weight 0.5)
 *
 * Fused importance: Artificial Intelligence 0.5, Machine Learning 0.75, Geoffrey Hinton 0
 */
export const CURATED_PAYLOAD = {
  entities: [
    { id: 'kb-ai', name: 'Artificial Intelligence', types: ['field'], aliases: ['AI'], score: 10 },
    { id: 'kb-ml', name: 'Machine Learning', types: ['field'], score: 5 },
    { id: 'kb-hinton', name: 'Geoffrey Hinton', types: ['human'], score: 2 },
  ],
  relations: [
    { subject: 'kb-ml', object: 'kb-ai', type: 'PART_OF' },
    { subject: 'kb-hinton', object: 'kb-ml', type: 'RELATED_TO', weight: 0.5 },
  ],
};

export const CURATED_SOURCE = { kind: 'curated_kb', payload: CURATED_PAYLOAD };

/**
 * Array field of a successful response's data, or [] when absent
 */
export function arrayField<T>(response: ToolResponse, field: string): T[] {
  const value = response.data?.[field];
  return Array.isArray(value) ? value : [];
}
