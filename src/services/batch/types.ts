/**
 * Batch run types
 *
 * @module services/batch/types
 */

import type { ErrorCategory } from '../../server/errors.js';
import type { SummaryStatus } from '../../models/summary.js';
import type { BackoffConfig } from '../../utils/backoff.js';

/**
 * One discoverable unit of work. `processed` flips to true exactly once,
 * when the document's summary has been persisted.
 */
export interface DocumentHandle {
  readonly path: string;
  processed: boolean;
}

/**
 * What happens to a record that fails schema validation:
 * - demote: persist a failed record citing the violation (default)
 * - strict: persist nothing and report the document as unresolved
 */
export type ValidationMode = 'demote' | 'strict';

export type DocumentOutcomeStatus = SummaryStatus | 'unresolved';

export interface DocumentOutcome {
  path: string;
  document_id: string;
  filename: string;
  status: DocumentOutcomeStatus;
  /** True when a completed candidate was demoted after failing validation */
  demoted: boolean;
  failure_reason?: string;
  error?: { category: ErrorCategory; message: string };
}

export interface RunResult {
  run_id: string;
  directory: string;
  total: number;
  completed: number;
  failed: number;
  unresolved: number;
  started_at: string;
  finished_at: string | null;
  documents: DocumentOutcome[];
}

export interface ChunkReaderOptions {
  /** Characters requested per read (default: 2000) */
  chunkSize: number;
  /** Consecutive empty non-final chunks tolerated before giving up (default: 3) */
  maxStalledReads: number;
  /** Per-chunk retry policy; maxAttempts 1 disables retries */
  retry: Partial<BackoffConfig>;
}

export interface OrchestratorOptions {
  reader: Partial<ChunkReaderOptions>;
  validationMode: ValidationMode;
  /** Consecutive save failures that abort the run (default: 3) */
  maxConsecutivePersistenceFailures: number;
}

export interface RunOptions {
  signal?: AbortSignal;
  onDocument?: (outcome: DocumentOutcome, index: number, total: number) => void;
}
