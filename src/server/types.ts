/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results, server configuration, and state.
 *
 * @module server/types
 */

import type { ValidationMode } from '../services/batch/types.js';
import type { SummaryStore } from '../services/storage/summary-store.js';
import type { Summarizer } from '../services/summarizer/types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server configuration options
 */
export interface ServerConfig {
  /** SQLite file holding summaries */
  databasePath: string;

  /** Characters requested per read_document_chunk call during a batch run */
  chunkSize: number;

  /** What a batch run does with a summary that fails the schema */
  validationMode: ValidationMode;

  /** Extensions list_directory returns by default */
  documentTypes: string[];

  /** Consecutive save failures that abort a batch run */
  maxConsecutivePersistenceFailures: number;

  /** Attempts per chunk read during a batch run (1 = no retry) */
  readRetryAttempts: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state tracking
 */
export interface ServerState {
  /** Open summary store, created on first use */
  store: SummaryStore | null;

  /** Summarizer used by batch runs, created on first use */
  summarizer: Summarizer | null;

  /** Server configuration */
  config: ServerConfig;
}
