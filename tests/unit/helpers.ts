/**
 * Shared test helpers: temp directories, scripted collaborators, stub
 * summarizers and tool response parsing.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type { SaveAcknowledgement, SummaryRecord } from '../../src/models/summary.js';
import type {
  ChunkRequest,
  DirectoryListing,
  DocumentChunk,
  DocumentCollaborators,
} from '../../src/services/collaborators/types.js';
import type { SummarizeInput, Summarizer, SummaryDraft } from '../../src/services/summarizer/types.js';
import type { ToolResponse } from '../../src/tools/shared.js';
import { formatProgress } from '../../src/services/documents/chunks.js';
import { TEST_DIR_PREFIX } from '../global-setup.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEMP DIRECTORIES
// ═══════════════════════════════════════════════════════════════════════════════

export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), TEST_DIR_PREFIX));
}

export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function writeFiles(dir: string, files: Record<string, string>): void {
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(join(dir, name), content, 'utf8');
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESPONSES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Parse the JSON body of a tool response
 */
export function parseResponse(response: ToolResponse): Record<string, unknown> & {
  success: boolean;
  data?: Record<string, unknown>;
  error?: { category: string; message: string; details?: Record<string, unknown> };
} {
  return JSON.parse(response.content[0].text);
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════════════════════

export function completedRecord(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    document_id: 'sha256:doc-1',
    filename: 'paper.md',
    status: 'completed',
    executive_summary: 'A study of pricing under uncertainty.',
    domain: 'economics',
    key_arguments: ['Prices adjust slowly', 'Expectations matter'],
    ...overrides,
  };
}

export function failedRecord(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    document_id: 'sha256:doc-2',
    filename: 'broken.pdf',
    status: 'failed',
    executive_summary: 'No summary available: the document could not be processed.',
    failure_reason: 'Unreadable file',
    ...overrides,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCRIPTED COLLABORATORS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * How a scripted document answers reads: a full text sliced like the local
 * reader, an explicit chunk sequence, or an error thrown on the first read.
 */
export type ScriptedDocument =
  | { text: string }
  | { chunks: Array<{ content: string; eof: boolean }> }
  | { error: Error };

export interface FakeCollaboratorOptions {
  listing?: string[] | Error;
  documents?: Record<string, ScriptedDocument>;
  /** Filenames whose save throws the given error */
  saveErrors?: Record<string, Error>;
  /** Every save throws this error */
  saveError?: Error;
}

export class FakeCollaborators implements DocumentCollaborators {
  readonly calls: string[] = [];
  readonly reads: ChunkRequest[] = [];
  readonly saved: SummaryRecord[] = [];
  listCalls = 0;
  private readonly sequencePosition = new Map<string, number>();

  constructor(private readonly options: FakeCollaboratorOptions = {}) {}

  async listDirectory(path: string): Promise<DirectoryListing> {
    this.listCalls++;
    this.calls.push(`list:${path}`);
    const listing = this.options.listing ?? [];
    if (listing instanceof Error) throw listing;
    return {
      path,
      files: listing.map((p) => ({
        name: p.split('/').pop() ?? p,
        path: p,
        is_dir: false,
        size_bytes: 0,
      })),
    };
  }

  async readDocumentChunk(request: ChunkRequest): Promise<DocumentChunk> {
    this.reads.push(request);
    this.calls.push(`read:${request.path}@${request.offset}`);
    const doc = this.options.documents?.[request.path];
    if (!doc) throw new Error(`No such document: ${request.path}`);
    if ('error' in doc) throw doc.error;

    if ('text' in doc) {
      const total = doc.text.length;
      const end = Math.min(total, request.offset + request.chunk_size);
      const content = doc.text.slice(request.offset, end);
      const eof = end >= total;
      return chunk(request, content, eof, total, end);
    }

    const index = this.sequencePosition.get(request.path) ?? 0;
    this.sequencePosition.set(request.path, index + 1);
    const next = doc.chunks[Math.min(index, doc.chunks.length - 1)];
    const total = doc.chunks.reduce((sum, c) => sum + c.content.length, 0);
    return chunk(request, next.content, next.eof, total, request.offset + next.content.length);
  }

  async saveSummary(record: SummaryRecord): Promise<SaveAcknowledgement> {
    this.calls.push(`save:${record.filename}`);
    const error = this.options.saveError ?? this.options.saveErrors?.[record.filename];
    if (error) throw error;
    this.saved.push(record);
    return {
      document_id: record.document_id,
      filename: record.filename,
      status: record.status,
      saved: true,
    };
  }
}

function chunk(
  request: ChunkRequest,
  content: string,
  eof: boolean,
  total: number,
  end: number
): DocumentChunk {
  return {
    path: request.path,
    filename: request.path.split('/').pop() ?? request.path,
    offset: request.offset,
    next_offset: eof ? null : end,
    chunk_size: content.length,
    total_length: total,
    progress: formatProgress(end, total),
    eof,
    content,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// STUB SUMMARIZERS
// ═══════════════════════════════════════════════════════════════════════════════

export const GOOD_DRAFT: SummaryDraft = {
  executive_summary: 'The document argues a single point clearly.',
  domain: 'science',
  key_arguments: ['First claim', 'Second claim'],
};

export class StubSummarizer implements Summarizer {
  readonly inputs: SummarizeInput[] = [];

  constructor(
    private readonly respond: (input: SummarizeInput) => SummaryDraft | Error = () => GOOD_DRAFT
  ) {}

  async summarize(input: SummarizeInput): Promise<SummaryDraft> {
    this.inputs.push(input);
    const result = this.respond(input);
    if (result instanceof Error) throw result;
    return result;
  }
}
