/**
 * Configuration Management MCP Tools
 *
 * Tools: kg_config_get, kg_config_set
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/config
 */

import { z } from 'zod';
import { state, getConfig, updateConfig } from '../server/state.js';
import { successResult, type ServerConfig } from '../server/types.js';
import { validationError } from '../server/errors.js';
import { logger } from '../utils/logger.js';
import {
  validateInput,
  ConfigGetInput,
  ConfigSetInput,
  ConfigKey,
  LogLevel,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

type ConfigKeyName = z.infer<typeof ConfigKey>;

// ═══════════════════════════════════════════════════════════════════════════════
// VALUE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const Unit = z.number().min(0).max(1);

const SourcePriorityValue = z
  .array(z.string().min(1))
  .refine((list) => new Set(list).size === list.length, 'source_priority must not repeat a family');
const ReliabilityValue = z.record(Unit);
const ThresholdValue = z.number().gt(0, 'alias_jaccard_threshold must be greater than 0').max(1);
const MaxRecommendationsValue = z.number().int().min(0).max(100);
const TopicalTypesValue = z.array(z.string().min(1));
const CooccurrenceWindowValue = z.number().int().min(1).max(100_000);

function parseValue<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, key: ConfigKeyName, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw validationError(`Invalid value for ${key}: ${result.error.errors.map((e) => e.message).join(', ')}`, {
      key,
      value,
    });
  }
  return result.data;
}

function getConfigValue(key: ConfigKeyName, config: ServerConfig): unknown {
  switch (key) {
    case 'source_priority':
      return config.fusion.sourcePriority;
    case 'reliability':
      return config.fusion.reliability;
    case 'default_reliability':
      return config.fusion.defaultReliability;
    case 'alias_jaccard_threshold':
      return config.fusion.aliasJaccardThreshold;
    case 'max_recommendations':
      return config.maxRecommendations;
    case 'topical_types':
      return config.topicalTypes;
    case 'cooccurrence_window':
      return config.cooccurrenceWindow;
    case 'log_level':
      return config.logLevel;
  }
}

function setConfigValue(key: ConfigKeyName, value: unknown): void {
  switch (key) {
    case 'source_priority':
      updateConfig({ fusion: { sourcePriority: parseValue(SourcePriorityValue, key, value) } });
      return;
    case 'reliability':
      updateConfig({ fusion: { reliability: parseValue(ReliabilityValue, key, value) } });
      return;
    case 'default_reliability':
      updateConfig({ fusion: { defaultReliability: parseValue(Unit, key, value) } });
      return;
    case 'alias_jaccard_threshold':
      updateConfig({ fusion: { aliasJaccardThreshold: parseValue(ThresholdValue, key, value) } });
      return;
    case 'max_recommendations':
      updateConfig({ maxRecommendations: parseValue(MaxRecommendationsValue, key, value) });
      return;
    case 'topical_types':
      updateConfig({ topicalTypes: parseValue(TopicalTypesValue, key, value) });
      return;
    case 'cooccurrence_window':
      updateConfig({ cooccurrenceWindow: parseValue(CooccurrenceWindowValue, key, value) });
      return;
    case 'log_level':
      updateConfig({ logLevel: parseValue(LogLevel, key, value) });
      return;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigGetInput, params);
    const config = getConfig();

    // Return specific key if requested
    if (input.key) {
      return formatResponse(successResult({ key: input.key, value: getConfigValue(input.key, config) }));
    }

    const values: Record<string, unknown> = {};
    for (const key of ConfigKey.options) {
      values[key] = getConfigValue(key, config);
    }
    return formatResponse(
      successResult({
        ...values,
        // Informational only
        storage_path: config.defaultStoragePath,
        current_store: state.currentStoreName,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConfigSet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigSetInput, params);
    setConfigValue(input.key, input.value);
    const value = getConfigValue(input.key, getConfig());
    logger.info('config', `${input.key} set to ${JSON.stringify(value)}`);

    return formatResponse(
      successResult({
        key: input.key,
        value,
        updated: true,
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
 * Config tools collection for MCP server registration
 */
export const configTools: Record<string, ToolDefinition> = {
  kg_config_get: {
    description: 'Get current fusion, coverage and logging configuration',
    inputSchema: {
      key: ConfigKey.optional().describe('Specific config key to retrieve'),
    },
    handler: handleConfigGet,
  },
  kg_config_set: {
    description:
      'Update a configuration setting. Lists for source_priority and topical_types, an object of family -> [0,1] for reliability, numbers or a level name otherwise.',
    inputSchema: {
      key: ConfigKey.describe('Configuration key to update'),
      value: z
        .union([z.string(), z.number(), z.array(z.string()), z.record(z.number())])
        .describe('New value'),
    },
    handler: handleConfigSet,
  },
};
