/**
 * Document Reading MCP Tools
 *
 * Tools: read_document_chunk
 *
 * Reads are stateless: each call returns the slice [offset, offset + chunk_size)
 * of the decoded document plus the offset to continue from.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/documents
 */

import { successResult } from '../server/types.js';
import { readDocumentChunk } from '../services/documents/chunks.js';
import { ReadDocumentChunkInput, sanitizePath, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: read_document_chunk
// ═══════════════════════════════════════════════════════════════════════════════

async function handleReadDocumentChunk(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ReadDocumentChunkInput, params);
    const chunk = readDocumentChunk({
      path: sanitizePath(input.path),
      offset: input.offset,
      chunk_size: input.chunk_size,
    });
    return formatResponse(successResult(chunk));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export const documentTools: Record<string, ToolDefinition> = {
  read_document_chunk: {
    description:
      'Read part of a text document. Returns content plus offset, next_offset (null at end of file), total_length, progress and eof. Call again with offset=next_offset until eof is true.',
    inputSchema: {
      path: ReadDocumentChunkInput.shape.path.describe('Document to read'),
      offset: ReadDocumentChunkInput.shape.offset.describe('Character offset to start at'),
      chunk_size: ReadDocumentChunkInput.shape.chunk_size.describe(
        'Maximum characters to return (default: 2000)'
      ),
    },
    handler: handleReadDocumentChunk,
  },
};
