/**
 * Batch Orchestrator
 *
 * Lists a directory once, then processes its documents strictly one after
 * another: read the whole document, summarize, validate, persist exactly one
 * record, move on. Failures local to a document become a failed record for
 * that document; only a listing failure, repeated save failures or
 * cancellation end the run early.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/batch/orchestrator
 */

import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { SummaryRecord } from '../../models/summary.js';
import { MCPError } from '../../server/errors.js';
import { documentIdForPath } from '../../utils/hash.js';
import type { DocumentCollaborators } from '../collaborators/types.js';
import type { Summarizer } from '../summarizer/types.js';
import { demoteSummary, failedSummary, validateSummary } from '../summary/validator.js';
import { ChunkReader } from './chunk-reader.js';
import {
  ListingError,
  PersistenceError,
  RunCancelledError,
  SummaryValidationError,
  errorMessage,
} from './errors.js';
import type {
  DocumentHandle,
  DocumentOutcome,
  OrchestratorOptions,
  RunOptions,
  RunResult,
} from './types.js';

export const DEFAULT_ORCHESTRATOR_OPTIONS: OrchestratorOptions = {
  reader: {},
  validationMode: 'demote',
  maxConsecutivePersistenceFailures: 3,
};

interface DocumentIdentity {
  document_id: string;
  filename: string;
}

type BuiltRecord =
  | { kind: 'record'; record: SummaryRecord; demoted: boolean }
  | { kind: 'rejected'; error: SummaryValidationError };

export function filenameForPath(documentPath: string): string {
  return path.basename(documentPath) || documentPath || '(unnamed)';
}

export class BatchOrchestrator {
  private readonly options: OrchestratorOptions;
  private readonly reader: ChunkReader;

  constructor(
    private readonly collaborators: DocumentCollaborators,
    private readonly summarizer: Summarizer,
    options?: Partial<OrchestratorOptions>
  ) {
    this.options = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...options };
    this.reader = new ChunkReader(collaborators, this.options.reader);
  }

  /**
   * Summarize every document the listing collaborator returns for
   * `directoryPath`, in listing order.
   *
   * @throws ListingError if the directory cannot be listed
   * @throws PersistenceError after too many consecutive save failures
   * @throws RunCancelledError if `signal` aborts the run
   */
  async run(directoryPath: string, runOptions: RunOptions = {}): Promise<RunResult> {
    const { signal, onDocument } = runOptions;
    const result: RunResult = {
      run_id: uuidv4(),
      directory: directoryPath,
      total: 0,
      completed: 0,
      failed: 0,
      unresolved: 0,
      started_at: new Date().toISOString(),
      finished_at: null,
      documents: [],
    };

    const handles = await this.listDocuments(directoryPath);
    result.total = handles.length;
    console.error(
      `[BatchOrchestrator] Run ${result.run_id}: ${handles.length} document(s) in ${directoryPath}`
    );

    let consecutiveSaveFailures = 0;

    for (const [index, handle] of handles.entries()) {
      if (signal?.aborted) throw new RunCancelledError(result);

      const outcome = await this.processDocument(handle, result, signal);
      result.documents.push(outcome);
      result[outcome.status]++;
      console.error(
        `[BatchOrchestrator] (${index + 1}/${handles.length}) ${outcome.filename}: ${outcome.status}` +
          (outcome.demoted ? ' (demoted)' : '')
      );
      onDocument?.(outcome, index, handles.length);

      if (outcome.error?.category === 'PERSISTENCE_FAILED') {
        consecutiveSaveFailures++;
        if (consecutiveSaveFailures >= this.options.maxConsecutivePersistenceFailures) {
          result.finished_at = new Date().toISOString();
          throw new PersistenceError(
            `Run ${result.run_id} aborted after ${consecutiveSaveFailures} consecutive save failures: ${outcome.error.message}`,
            { documentId: outcome.document_id, partialResult: result }
          );
        }
      } else {
        consecutiveSaveFailures = 0;
      }
    }

    result.finished_at = new Date().toISOString();
    console.error(
      `[BatchOrchestrator] Run ${result.run_id} finished: ${result.completed} completed, ` +
        `${result.failed} failed, ${result.unresolved} unresolved`
    );
    return result;
  }

  private async listDocuments(directoryPath: string): Promise<DocumentHandle[]> {
    try {
      const listing = await this.collaborators.listDirectory(directoryPath);
      return listing.files
        .filter((entry) => !entry.is_dir)
        .map((entry) => ({ path: entry.path, processed: false }));
    } catch (error) {
      throw new ListingError(directoryPath, errorMessage(error), error);
    }
  }

  private async processDocument(
    handle: DocumentHandle,
    result: RunResult,
    signal: AbortSignal | undefined
  ): Promise<DocumentOutcome> {
    const identity: DocumentIdentity = {
      document_id: documentIdForPath(handle.path),
      filename: filenameForPath(handle.path),
    };
    const base = { path: handle.path, ...identity };

    const built = await this.buildRecord(handle, identity, result, signal);
    if (built.kind === 'rejected') {
      return unresolved(base, built.error);
    }

    // A record that reaches storage must validate at the moment it is saved.
    const check = validateSummary(built.record);
    if (!check.ok) {
      return unresolved(base, new SummaryValidationError(identity.document_id, check.violations));
    }

    if (signal?.aborted) throw new RunCancelledError(result);

    try {
      await this.collaborators.saveSummary(check.record);
    } catch (error) {
      const failure = new PersistenceError(
        `Failed to save summary for ${handle.path}: ${errorMessage(error)}`,
        { cause: error, documentId: identity.document_id }
      );
      console.error(`[BatchOrchestrator] ${failure.message}`);
      return unresolved(base, failure);
    }
    handle.processed = true;

    return {
      ...base,
      status: check.record.status,
      demoted: built.demoted,
      ...(check.record.status === 'failed' && { failure_reason: check.record.failure_reason }),
    };
  }

  private async buildRecord(
    handle: DocumentHandle,
    identity: DocumentIdentity,
    result: RunResult,
    signal: AbortSignal | undefined
  ): Promise<BuiltRecord> {
    let content: string;
    try {
      content = await this.reader.readAll(handle.path, signal);
    } catch (error) {
      if (signal?.aborted) throw new RunCancelledError(result);
      return { kind: 'record', record: failedSummary(identity, errorMessage(error)), demoted: false };
    }

    let candidate: Record<string, unknown>;
    try {
      const draft = await this.summarizer.summarize({ ...identity, path: handle.path, content });
      candidate = { status: 'completed', ...draft, ...identity };
    } catch (error) {
      if (signal?.aborted) throw new RunCancelledError(result);
      return {
        kind: 'record',
        record: failedSummary(identity, `Summarization failed: ${errorMessage(error)}`),
        demoted: false,
      };
    }

    const validation = validateSummary(candidate);
    if (validation.ok) {
      return { kind: 'record', record: validation.record, demoted: false };
    }

    const error = new SummaryValidationError(identity.document_id, validation.violations);
    console.error(`[BatchOrchestrator] ${error.message}`);
    if (this.options.validationMode === 'strict') {
      return { kind: 'rejected', error };
    }
    return { kind: 'record', record: demoteSummary(identity, validation.violations), demoted: true };
  }
}

function unresolved(
  base: { path: string } & DocumentIdentity,
  error: SummaryValidationError | PersistenceError
): DocumentOutcome {
  return {
    ...base,
    status: 'unresolved',
    demoted: false,
    error: { category: MCPError.fromUnknown(error).category, message: error.message },
  };
}
