/**
 * MCP Server State Management
 *
 * Manages global server state including the open graph store and configuration.
 * FAIL FAST: All state access throws immediately if preconditions not met.
 *
 * @module server/state
 */

import { DEFAULT_FUSION_CONFIG } from '../models/knowledge-graph.js';
import type { FusionConfig } from '../models/knowledge-graph.js';
import { DEFAULT_MAX_RECOMMENDATIONS, DEFAULT_TOPICAL_TYPES } from '../services/coverage/recommendations.js';
import { DEFAULT_COOCCURRENCE_WINDOW } from '../services/normalizers/text-extraction.js';
import { DEFAULT_STORAGE_PATH, GraphStore } from '../services/storage/graph/index.js';
import { isLogLevel, logger, setLogLevel } from '../utils/logger.js';
import { databaseNotSelectedError, validationError } from './errors.js';
import type { ServerConfig, ServerState } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

function cloneFusionConfig(config: FusionConfig): FusionConfig {
  return {
    sourcePriority: [...config.sourcePriority],
    reliability: { ...config.reliability },
    defaultReliability: config.defaultReliability,
    aliasJaccardThreshold: config.aliasJaccardThreshold,
  };
}

/**
 * Default server configuration
 */
function defaultConfig(): ServerConfig {
  return {
    defaultStoragePath: DEFAULT_STORAGE_PATH,
    fusion: cloneFusionConfig(DEFAULT_FUSION_CONFIG),
    maxRecommendations: DEFAULT_MAX_RECOMMENDATIONS,
    topicalTypes: [...DEFAULT_TOPICAL_TYPES],
    cooccurrenceWindow: DEFAULT_COOCCURRENCE_WINDOW,
    logLevel: 'info',
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Global server state
 * Mutable state for the open graph store and configuration
 */
export const state: ServerState = {
  currentStore: null,
  currentStoreName: null,
  config: defaultConfig(),
};

// ═══════════════════════════════════════════════════════════════════════════════
// STORE ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Require a graph store to be open - FAIL FAST if not
 *
 * @throws MCPError with DATABASE_NOT_SELECTED if no store is open
 */
export function requireStore(): GraphStore {
  if (!state.currentStore) {
    throw databaseNotSelectedError();
  }
  return state.currentStore;
}

/**
 * Check if a graph store is currently open
 */
export function hasStore(): boolean {
  return state.currentStore !== null;
}

/**
 * Open (creating when absent) a named graph store and make it current
 *
 * @param name - Store name
 * @param storagePath - Optional storage path override
 */
export function openStore(name: string, storagePath?: string): GraphStore {
  const path = storagePath ?? state.config.defaultStoragePath;
  closeStore();

  const store = GraphStore.open(name, path);
  state.currentStore = store;
  state.currentStoreName = name;
  logger.info('state', `Opened graph store "${name}" at ${store.path}`);
  return store;
}

/**
 * Make an already opened store current (used for in-memory stores)
 */
export function useStore(store: GraphStore): void {
  closeStore();
  state.currentStore = store;
  state.currentStoreName = store.name;
}

/**
 * Close the current graph store, if any
 */
export function closeStore(): void {
  if (state.currentStore) {
    state.currentStore.close();
    state.currentStore = null;
    state.currentStoreName = null;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Get current server configuration (a copy; mutating it has no effect)
 */
export function getConfig(): ServerConfig {
  return {
    ...state.config,
    fusion: cloneFusionConfig(state.config.fusion),
    topicalTypes: [...state.config.topicalTypes],
  };
}

/**
 * Update server configuration (merges the nested fusion config)
 */
export function updateConfig(updates: Partial<Omit<ServerConfig, 'fusion'>> & { fusion?: Partial<FusionConfig> }): void {
  const fusion = updates.fusion
    ? cloneFusionConfig({ ...state.config.fusion, ...updates.fusion })
    : state.config.fusion;
  state.config = { ...state.config, ...updates, fusion };
  setLogLevel(state.config.logLevel);
}

/**
 * Apply SEMCOV_* environment overrides to the configuration
 *
 * @throws MCPError VALIDATION_ERROR on a malformed value
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const updates: Partial<Omit<ServerConfig, 'fusion'>> = {};

  if (env.SEMCOV_STORAGE_PATH) {
    updates.defaultStoragePath = env.SEMCOV_STORAGE_PATH;
  }
  if (env.SEMCOV_MAX_RECOMMENDATIONS) {
    const max = Number(env.SEMCOV_MAX_RECOMMENDATIONS);
    if (!Number.isInteger(max) || max < 0) {
      throw validationError('SEMCOV_MAX_RECOMMENDATIONS must be a non-negative integer', {
        value: env.SEMCOV_MAX_RECOMMENDATIONS,
      });
    }
    updates.maxRecommendations = max;
  }
  if (env.SEMCOV_LOG_LEVEL) {
    const level = env.SEMCOV_LOG_LEVEL.toLowerCase();
    if (!isLogLevel(level)) {
      throw validationError('SEMCOV_LOG_LEVEL must be "debug", "info", "warn", or "error"', {
        value: env.SEMCOV_LOG_LEVEL,
      });
    }
    updates.logLevel = level;
  }
  updateConfig(updates);
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export function resetState(): void {
  closeStore();
  state.config = defaultConfig();
  setLogLevel(state.config.logLevel);
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS EXIT CLEANUP
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Close the store on exit so WAL files are checkpointed.
 */
process.on('exit', () => {
  if (state.currentStore) {
    try {
      state.currentStore.close();
    } catch (error) {
      console.error(`[state] Failed to close graph store on exit: ${String(error)}`);
    }
    state.currentStore = null;
    state.currentStoreName = null;
  }
});
