/**
 * MCP Server State Management
 *
 * Holds the server configuration, the summary store and the summarizer.
 * The store opens lazily on first use at config.databasePath.
 *
 * @module server/state
 */

import { SummaryStore, DEFAULT_DATABASE_PATH } from '../services/storage/summary-store.js';
import { OllamaSummarizer } from '../services/summarizer/ollama-summarizer.js';
import type { Summarizer } from '../services/summarizer/types.js';
import { DEFAULT_CHUNK_SIZE, DEFAULT_DOCUMENT_TYPES } from '../utils/validation.js';
import type { ServerConfig, ServerState } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default server configuration
 */
const defaultConfig: ServerConfig = {
  databasePath: DEFAULT_DATABASE_PATH,
  chunkSize: DEFAULT_CHUNK_SIZE,
  validationMode: 'demote',
  documentTypes: [...DEFAULT_DOCUMENT_TYPES],
  maxConsecutivePersistenceFailures: 3,
  readRetryAttempts: 1,
};

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Global server state
 */
export const state: ServerState = {
  store: null,
  summarizer: null,
  config: { ...defaultConfig, documentTypes: [...defaultConfig.documentTypes] },
};

// ═══════════════════════════════════════════════════════════════════════════════
// STORE ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Get the summary store, opening it at config.databasePath on first call.
 *
 * @throws SummaryStoreError if the database cannot be opened
 */
export function requireStore(): SummaryStore {
  if (!state.store) {
    state.store = SummaryStore.open(state.config.databasePath);
    console.error(`[State] Summary database opened at ${state.store.getPath()}`);
  }
  return state.store;
}

/**
 * Close the open store, if any. The next requireStore() reopens it.
 */
export function closeStore(): void {
  if (state.store) {
    state.store.close();
    state.store = null;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SUMMARIZER ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

export function requireSummarizer(): Summarizer {
  if (!state.summarizer) {
    state.summarizer = new OllamaSummarizer();
  }
  return state.summarizer;
}

/**
 * Replace the summarizer used by batch runs (null restores the default)
 */
export function setSummarizer(summarizer: Summarizer | null): void {
  state.summarizer = summarizer;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Get current configuration
 */
export function getConfig(): ServerConfig {
  return { ...state.config, documentTypes: [...state.config.documentTypes] };
}

/**
 * Update configuration. Changing databasePath closes the open store.
 */
export function updateConfig(updates: Partial<ServerConfig>): void {
  if (updates.databasePath !== undefined && updates.databasePath !== state.config.databasePath) {
    closeStore();
  }
  state.config = { ...state.config, ...updates };
}

/**
 * Reset state to initial values (for testing)
 */
export function resetState(): void {
  closeStore();
  state.summarizer = null;
  state.config = { ...defaultConfig, documentTypes: [...defaultConfig.documentTypes] };
}
