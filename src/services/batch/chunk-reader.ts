/**
 * Chunk Reader Adapter
 *
 * Turns repeated bounded `read_document_chunk` calls into a single
 * "read the entire document" operation. Reads start at offset 0 and advance
 * by the length of each returned chunk; the collaborator's `eof` flag ends
 * the read.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/batch/chunk-reader
 */

import { MCPError, type ErrorCategory } from '../../server/errors.js';
import { withRetry } from '../../utils/backoff.js';
import type { DocumentChunk, DocumentCollaborators } from '../collaborators/types.js';
import { ReadError, errorMessage } from './errors.js';
import type { ChunkReaderOptions } from './types.js';

export const DEFAULT_CHUNK_READER_OPTIONS: ChunkReaderOptions = {
  chunkSize: 2000,
  maxStalledReads: 3,
  retry: { maxAttempts: 1 },
};

/** Failures a retry cannot fix */
const NON_RETRYABLE: ReadonlySet<ErrorCategory> = new Set([
  'PATH_NOT_FOUND',
  'PATH_NOT_FILE',
  'PERMISSION_DENIED',
  'VALIDATION_ERROR',
]);

/**
 * Transient accumulation state for one in-progress read.
 */
interface ReadCursor {
  offset: number;
  accumulated: string[];
  endOfFile: boolean;
  stalledReads: number;
}

export class ChunkReader {
  private readonly options: ChunkReaderOptions;

  constructor(
    private readonly collaborators: Pick<DocumentCollaborators, 'readDocumentChunk'>,
    options?: Partial<ChunkReaderOptions>
  ) {
    this.options = { ...DEFAULT_CHUNK_READER_OPTIONS, ...options };
    if (!Number.isInteger(this.options.chunkSize) || this.options.chunkSize < 1) {
      throw new RangeError(`chunkSize must be a positive integer, got ${this.options.chunkSize}`);
    }
  }

  /**
   * Read a document to the end.
   *
   * @throws ReadError when the path is missing, a chunk read fails, the
   *   collaborator answers for the wrong offset or past the length it
   *   reports, or too many empty
   *   non-final chunks arrive in a row
   */
  async readAll(path: string, signal?: AbortSignal): Promise<string> {
    const cursor: ReadCursor = { offset: 0, accumulated: [], endOfFile: false, stalledReads: 0 };

    while (!cursor.endOfFile) {
      if (signal?.aborted) {
        throw new ReadError(path, `Read of ${path} aborted at offset ${cursor.offset}`, {
          offset: cursor.offset,
          cause: signal.reason,
        });
      }

      const chunk = await this.readChunk(path, cursor.offset);

      if (chunk.offset !== cursor.offset) {
        throw new ReadError(
          path,
          `Collaborator returned offset ${chunk.offset} for a read at offset ${cursor.offset} of ${path}`,
          { offset: cursor.offset }
        );
      }

      cursor.accumulated.push(chunk.content);
      cursor.offset += chunk.content.length;
      cursor.endOfFile = chunk.eof;

      if (cursor.offset > chunk.total_length) {
        throw new ReadError(
          path,
          `Collaborator returned content past the reported length ${chunk.total_length} of ${path}`,
          { offset: cursor.offset }
        );
      }

      if (chunk.content.length === 0 && !chunk.eof) {
        cursor.stalledReads++;
        if (cursor.stalledReads >= this.options.maxStalledReads) {
          throw new ReadError(
            path,
            `No progress reading ${path}: ${cursor.stalledReads} empty chunks at offset ${cursor.offset}`,
            { offset: cursor.offset }
          );
        }
      } else {
        cursor.stalledReads = 0;
      }
    }

    return cursor.accumulated.join('');
  }

  private async readChunk(path: string, offset: number): Promise<DocumentChunk> {
    try {
      return await withRetry(
        () =>
          this.collaborators.readDocumentChunk({
            path,
            offset,
            chunk_size: this.options.chunkSize,
          }),
        isRetryableReadFailure,
        { label: 'ChunkReader', ...this.options.retry }
      );
    } catch (error) {
      if (error instanceof ReadError) throw error;
      const category = MCPError.fromUnknown(error).category;
      throw new ReadError(path, `Failed to read ${path} at offset ${offset}: ${errorMessage(error)}`, {
        cause: error,
        offset,
        notFound: category === 'PATH_NOT_FOUND',
      });
    }
  }
}

function isRetryableReadFailure(error: unknown): boolean {
  return !NON_RETRYABLE.has(MCPError.fromUnknown(error).category);
}
