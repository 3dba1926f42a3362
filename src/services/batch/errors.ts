/**
 * Batch pipeline errors
 *
 * Every error carries a `category` that MCPError.fromUnknown() picks up, so
 * tool responses report the same category the pipeline raised.
 *
 * @module services/batch/errors
 */

import type { ErrorCategory } from '../../server/errors.js';
import type { RunResult } from './types.js';

export abstract class BatchError extends Error {
  abstract readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.details = options?.details;
  }
}

/**
 * The directory could not be enumerated. Fatal to the whole run.
 */
export class ListingError extends BatchError {
  readonly category = 'LISTING_FAILED' as const;

  constructor(
    public readonly directoryPath: string,
    message: string,
    cause?: unknown
  ) {
    super(`Failed to list directory ${directoryPath}: ${message}`, {
      cause,
      details: { directoryPath },
    });
    this.name = 'ListingError';
  }
}

/**
 * A document's content could not be fully accumulated.
 */
export class ReadError extends BatchError {
  readonly category: 'READ_FAILED' | 'DOCUMENT_NOT_FOUND';

  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown; notFound?: boolean; offset?: number }
  ) {
    super(message, { cause: options?.cause, details: { path, offset: options?.offset } });
    this.name = 'ReadError';
    this.category = options?.notFound ? 'DOCUMENT_NOT_FOUND' : 'READ_FAILED';
  }
}

/**
 * The summarization collaborator failed to produce a candidate.
 */
export class SummarizationError extends BatchError {
  readonly category = 'SUMMARIZATION_FAILED' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SummarizationError';
  }
}

/**
 * A produced record violates the summary schema.
 */
export class SummaryValidationError extends BatchError {
  readonly category = 'SUMMARY_INVALID' as const;

  constructor(
    public readonly documentId: string,
    public readonly violations: readonly string[]
  ) {
    super(`Summary for ${documentId} failed schema validation: ${violations.join(', ')}`, {
      details: { documentId, violations: [...violations] },
    });
    this.name = 'SummaryValidationError';
  }
}

/**
 * The final save call failed. When raised out of a run it carries the
 * partial result up to the point of abort.
 */
export class PersistenceError extends BatchError {
  readonly category = 'PERSISTENCE_FAILED' as const;
  public readonly partialResult?: RunResult;

  constructor(
    message: string,
    options?: { cause?: unknown; documentId?: string; partialResult?: RunResult }
  ) {
    super(message, { cause: options?.cause, details: { documentId: options?.documentId } });
    this.name = 'PersistenceError';
    this.partialResult = options?.partialResult;
  }
}

/**
 * The run was aborted through its AbortSignal.
 */
export class RunCancelledError extends BatchError {
  readonly category = 'RUN_CANCELLED' as const;

  constructor(public readonly partialResult: RunResult) {
    super(
      `Run ${partialResult.run_id} cancelled after ${partialResult.documents.length} of ${partialResult.total} documents`
    );
    this.name = 'RunCancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
