/**
 * MCP client collaborators
 *
 * Reaches list_directory, read_document_chunk and save_summary_to_db on any
 * MCP server that exposes them, through an @modelcontextprotocol/sdk Client.
 * Tool results are JSON text in the `{ success, data }` / `{ success, error }`
 * envelope this server produces; remote error categories are preserved.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/collaborators/mcp-client
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { z } from 'zod';
import type { SaveAcknowledgement, SummaryRecord } from '../../models/summary.js';
import { MCPError, isErrorCategory } from '../../server/errors.js';
import {
  COLLABORATOR_TOOL_NAMES,
  type ChunkRequest,
  type DirectoryListing,
  type DocumentChunk,
  type DocumentCollaborators,
} from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const ToolCallResult = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()),
  isError: z.boolean().optional(),
});

const ErrorEnvelope = z.object({
  success: z.literal(false),
  error: z.object({
    category: z.string(),
    message: z.string(),
    details: z.record(z.unknown()).optional(),
  }),
});

const SuccessEnvelope = z.object({
  success: z.literal(true),
  data: z.unknown(),
});

const DirectoryListingSchema = z.object({
  path: z.string(),
  files: z.array(
    z.object({
      name: z.string(),
      path: z.string(),
      is_dir: z.boolean(),
      size_bytes: z.number(),
    })
  ),
});

const DocumentChunkSchema = z.object({
  path: z.string(),
  filename: z.string(),
  offset: z.number().int().min(0),
  next_offset: z.number().int().nullable(),
  chunk_size: z.number().int(),
  total_length: z.number().int(),
  progress: z.string(),
  eof: z.boolean(),
  content: z.string(),
});

const SaveAcknowledgementSchema = z.object({
  document_id: z.string(),
  filename: z.string(),
  status: z.enum(['completed', 'failed']),
  saved: z.literal(true),
});

// ═══════════════════════════════════════════════════════════════════════════════
// COLLABORATORS
// ═══════════════════════════════════════════════════════════════════════════════

export class McpToolCollaborators implements DocumentCollaborators {
  constructor(private readonly client: Client) {}

  listDirectory(path: string): Promise<DirectoryListing> {
    return this.call(COLLABORATOR_TOOL_NAMES.listDirectory, { path }, DirectoryListingSchema);
  }

  readDocumentChunk(request: ChunkRequest): Promise<DocumentChunk> {
    return this.call(
      COLLABORATOR_TOOL_NAMES.readDocumentChunk,
      { path: request.path, offset: request.offset, chunk_size: request.chunk_size },
      DocumentChunkSchema
    );
  }

  saveSummary(record: SummaryRecord): Promise<SaveAcknowledgement> {
    return this.call(COLLABORATOR_TOOL_NAMES.saveSummary, { ...record }, SaveAcknowledgementSchema);
  }

  private async call<T>(
    tool: string,
    args: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    let raw: unknown;
    try {
      raw = await this.client.callTool({ name: tool, arguments: args });
    } catch (error) {
      throw new MCPError(
        'COLLABORATOR_ERROR',
        `Tool ${tool} call failed: ${error instanceof Error ? error.message : String(error)}`,
        { tool }
      );
    }

    const envelope = ToolCallResult.safeParse(raw);
    if (!envelope.success) {
      throw new MCPError('COLLABORATOR_ERROR', `Tool ${tool} returned no content`, { tool });
    }

    const text = envelope.data.content
      .filter((part) => part.type === 'text')
      .map((part) => part.text ?? '')
      .join('');

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      // Errors raised by the SDK itself (e.g. input schema rejection) are plain text
      throw new MCPError(
        envelope.data.isError ? 'VALIDATION_ERROR' : 'COLLABORATOR_ERROR',
        `Tool ${tool} returned non-JSON output: ${text.slice(0, 200)}`,
        { tool }
      );
    }

    if (envelope.data.isError) {
      const failure = ErrorEnvelope.safeParse(payload);
      if (!failure.success) {
        throw new MCPError('COLLABORATOR_ERROR', `Tool ${tool} failed without an error payload`, {
          tool,
        });
      }
      const { category, message, details } = failure.data.error;
      throw new MCPError(isErrorCategory(category) ? category : 'COLLABORATOR_ERROR', message, {
        tool,
        remoteCategory: category,
        ...(details && { remoteDetails: details }),
      });
    }

    const success = SuccessEnvelope.safeParse(payload);
    const data = success.success ? schema.safeParse(success.data.data) : null;
    if (!data?.success) {
      const problems = data
        ? data.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')
        : 'missing success envelope';
      throw new MCPError('COLLABORATOR_ERROR', `Tool ${tool} returned an unexpected payload: ${problems}`, {
        tool,
      });
    }
    return data.data;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// STDIO CONNECTION
// ═══════════════════════════════════════════════════════════════════════════════

export interface StdioCollaboratorOptions {
  command: string;
  args?: string[];
  env?: Record<string, string>;
}

export interface RemoteCollaborators {
  collaborators: McpToolCollaborators;
  close: () => Promise<void>;
}

/**
 * Spawn an MCP server over stdio and wrap its tools as collaborators.
 */
export async function connectStdioCollaborators(
  options: StdioCollaboratorOptions
): Promise<RemoteCollaborators> {
  const transport = new StdioClientTransport({
    command: options.command,
    args: options.args ?? [],
    ...(options.env && { env: options.env }),
    stderr: 'inherit',
  });
  const client = new Client({ name: 'directory-summarizer-batch', version: '1.0.0' });
  await client.connect(transport);

  const { tools } = await client.listTools();
  const available = new Set(tools.map((t) => t.name));
  const missing = Object.values(COLLABORATOR_TOOL_NAMES).filter((name) => !available.has(name));
  if (missing.length > 0) {
    await client.close();
    throw new MCPError(
      'COLLABORATOR_ERROR',
      `MCP server "${options.command}" does not expose: ${missing.join(', ')}`,
      { missing }
    );
  }

  console.error(`[McpToolCollaborators] Connected to ${options.command} (${tools.length} tools)`);
  return { collaborators: new McpToolCollaborators(client), close: () => client.close() };
}
