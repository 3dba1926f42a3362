/**
 * Collaborator interface
 *
 * The three operations the batch pipeline delegates to external services:
 * directory listing, chunked document reads and summary persistence.
 * Implementations are injected; the pipeline holds no global state.
 *
 * @module services/collaborators/types
 */

import type { SaveAcknowledgement, SummaryRecord } from '../../models/summary.js';

export const COLLABORATOR_TOOL_NAMES = {
  listDirectory: 'list_directory',
  readDocumentChunk: 'read_document_chunk',
  saveSummary: 'save_summary_to_db',
} as const;

export interface DirectoryEntry {
  name: string;
  path: string;
  is_dir: boolean;
  size_bytes: number;
}

export interface DirectoryListing {
  path: string;
  files: DirectoryEntry[];
}

export interface ChunkRequest {
  path: string;
  offset: number;
  chunk_size: number;
}

export interface DocumentChunk {
  path: string;
  filename: string;
  offset: number;
  /** Offset of the following chunk, null once the end of the file is reached */
  next_offset: number | null;
  /** Length of `content` */
  chunk_size: number;
  total_length: number;
  progress: string;
  eof: boolean;
  content: string;
}

export interface DocumentCollaborators {
  listDirectory(path: string): Promise<DirectoryListing>;
  readDocumentChunk(request: ChunkRequest): Promise<DocumentChunk>;
  saveSummary(record: SummaryRecord): Promise<SaveAcknowledgement>;
}
