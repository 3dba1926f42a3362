/**
 * Local chunked document reads
 *
 * Each call decodes the whole file as UTF-8 (invalid sequences become U+FFFD)
 * and returns the slice [offset, offset + chunk_size). Offsets count UTF-16
 * code units of the decoded text.
 *
 * @module services/documents/chunks
 */

import fs from 'fs';
import path from 'path';
import { pathNotFileError } from '../../server/errors.js';
import type { ChunkRequest, DocumentChunk } from '../collaborators/types.js';
import { translateFsError } from './directory.js';

/**
 * @throws MCPError PATH_NOT_FOUND, PATH_NOT_FILE or PERMISSION_DENIED
 */
export function readDocumentChunk(request: ChunkRequest): DocumentChunk {
  const filePath = path.resolve(request.path);

  let text: string;
  try {
    if (!fs.statSync(filePath).isFile()) {
      throw pathNotFileError(filePath);
    }
    text = fs.readFileSync(filePath).toString('utf8');
  } catch (error) {
    throw translateFsError(error, filePath);
  }

  const total = text.length;
  const start = Math.max(0, request.offset);
  const end = Math.min(total, start + request.chunk_size);
  const content = text.slice(start, end);
  const eof = end >= total;

  return {
    path: filePath,
    filename: path.basename(filePath),
    offset: start,
    next_offset: eof ? null : end,
    chunk_size: content.length,
    total_length: total,
    progress: formatProgress(end, total),
    eof,
    content,
  };
}

export function formatProgress(end: number, total: number): string {
  if (total === 0) return '0%';
  return `${(Math.round((end / total) * 1000) / 10).toFixed(1)}%`;
}
