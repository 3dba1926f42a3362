/**
 * In-process collaborators backed by the filesystem and the summary store.
 * These are the same services the MCP tools expose.
 *
 * @module services/collaborators/local
 */

import type { SaveAcknowledgement, SummaryRecord } from '../../models/summary.js';
import { readDocumentChunk } from '../documents/chunks.js';
import { listDocumentDirectory } from '../documents/directory.js';
import type { SummaryStore } from '../storage/summary-store.js';
import type {
  ChunkRequest,
  DirectoryListing,
  DocumentChunk,
  DocumentCollaborators,
} from './types.js';

export class LocalCollaborators implements DocumentCollaborators {
  constructor(
    private readonly store: SummaryStore,
    private readonly documentTypes?: readonly string[]
  ) {}

  async listDirectory(path: string): Promise<DirectoryListing> {
    return listDocumentDirectory(path, this.documentTypes);
  }

  async readDocumentChunk(request: ChunkRequest): Promise<DocumentChunk> {
    return readDocumentChunk(request);
  }

  async saveSummary(record: SummaryRecord): Promise<SaveAcknowledgement> {
    return this.store.save(record);
  }
}
