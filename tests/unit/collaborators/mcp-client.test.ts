/**
 * Unit tests for McpToolCollaborators
 *
 * A real McpServer with this project's tools is linked to a Client through the
 * SDK's in-memory transport.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerAllTools } from '../../../src/server/register-tools.js';
import { requireStore, resetState, updateConfig } from '../../../src/server/state.js';
import { MCPError } from '../../../src/server/errors.js';
import { BatchOrchestrator } from '../../../src/services/batch/orchestrator.js';
import { McpToolCollaborators } from '../../../src/services/collaborators/mcp-client.js';
import { documentIdForPath } from '../../../src/utils/hash.js';
import {
  StubSummarizer,
  cleanupTempDir,
  createTempDir,
  parseResponse,
  writeFiles,
} from '../helpers.js';

const TextToolResult = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
  isError: z.boolean().optional(),
});

async function connect(server: McpServer): Promise<Client> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  return client;
}

async function rejection(promise: Promise<unknown>): Promise<MCPError> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e
  );
  if (!(error instanceof MCPError)) throw new Error(`expected an MCPError, got ${String(error)}`);
  return error;
}

describe('McpToolCollaborators against this server', () => {
  let tempDir: string;
  let docsDir: string;
  let server: McpServer;
  let client: Client;
  let collaborators: McpToolCollaborators;

  beforeEach(async () => {
    tempDir = createTempDir();
    docsDir = join(tempDir, 'docs');
    mkdirSync(docsDir);
    writeFiles(docsDir, { 'a.txt': 'Hello World', 'b.md': 'Second document' });
    updateConfig({ databasePath: join(tempDir, 'summaries.db') });

    server = new McpServer({ name: 'test-server', version: '1.0.0' });
    registerAllTools(server);
    client = await connect(server);
    collaborators = new McpToolCollaborators(client);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    resetState();
    cleanupTempDir(tempDir);
  });

  it('lists a directory', async () => {
    const listing = await collaborators.listDirectory(docsDir);
    expect(listing.path).toBe(docsDir);
    expect(listing.files.map((f) => f.name)).toEqual(['a.txt', 'b.md']);
  });

  it('reads a chunk', async () => {
    const chunk = await collaborators.readDocumentChunk({
      path: join(docsDir, 'a.txt'),
      offset: 6,
      chunk_size: 100,
    });
    expect(chunk).toMatchObject({ offset: 6, content: 'World', eof: true, next_offset: null });
  });

  it('saves a record and returns the acknowledgement', async () => {
    const ack = await collaborators.saveSummary({
      document_id: 'sha256:remote',
      filename: 'remote.md',
      status: 'failed',
      executive_summary: 'No summary available.',
      failure_reason: 'Encrypted PDF',
    });
    expect(ack).toEqual({
      document_id: 'sha256:remote',
      filename: 'remote.md',
      status: 'failed',
      saved: true,
    });
    expect(requireStore().get('sha256:remote')?.status).toBe('failed');
  });

  it('preserves the category of a remote validation failure', async () => {
    const error = await rejection(
      collaborators.saveSummary({
        document_id: 'sha256:remote',
        filename: 'remote.md',
        status: 'failed',
        executive_summary: '   ',
        failure_reason: 'Encrypted PDF',
      })
    );
    expect(error.category).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('Summary record failed schema validation: executive_summary');
    expect(error.details).toMatchObject({ tool: 'save_summary_to_db', remoteCategory: 'VALIDATION_ERROR' });
    expect(requireStore().count()).toBe(0);
  });

  it('rejects fields outside the summary schema instead of dropping them', async () => {
    const result = TextToolResult.parse(
      await client.callTool({
        name: 'save_summary_to_db',
        arguments: {
          document_id: 'sha256:remote',
          filename: 'remote.md',
          status: 'completed',
          executive_summary: 'A short overview.',
          domain: 'science',
          key_arguments: ['One claim'],
          summary: 'legacy field',
          confidence: 0.9,
        },
      })
    );

    expect(result.isError).toBe(true);
    expect(parseResponse(result).error).toMatchObject({
      category: 'VALIDATION_ERROR',
      message: 'Summary record failed schema validation: summary, confidence',
      details: { violations: ['summary', 'confidence'] },
    });
    expect(requireStore().count()).toBe(0);
  });

  it('preserves PATH_NOT_FOUND from a remote listing', async () => {
    const error = await rejection(collaborators.listDirectory(join(tempDir, 'missing')));
    expect(error.category).toBe('PATH_NOT_FOUND');
  });

  it('runs a whole batch through the remote tools', async () => {
    const summarizer = new StubSummarizer();
    const orchestrator = new BatchOrchestrator(collaborators, summarizer, {
      reader: { chunkSize: 4 },
    });

    const result = await orchestrator.run(docsDir);

    expect(result).toMatchObject({ total: 2, completed: 2, failed: 0, unresolved: 0 });
    expect(summarizer.inputs.map((i) => i.content)).toEqual(['Hello World', 'Second document']);
    expect(requireStore().get(documentIdForPath(join(docsDir, 'b.md')))).toMatchObject({
      status: 'completed',
      filename: 'b.md',
      domain: 'science',
    });
  });
});

describe('McpToolCollaborators against a misbehaving server', () => {
  let server: McpServer;
  let client: Client;

  beforeEach(() => {
    server = new McpServer({ name: 'odd-server', version: '1.0.0' });
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it('rejects a payload of the wrong shape', async () => {
    server.tool('list_directory', 'wrong shape', { path: z.string() }, async () => ({
      content: [{ type: 'text', text: JSON.stringify({ success: true, data: { entries: [] } }) }],
    }));
    client = await connect(server);

    const error = await rejection(new McpToolCollaborators(client).listDirectory('/docs'));
    expect(error.category).toBe('COLLABORATOR_ERROR');
    expect(error.message).toMatch(/^Tool list_directory returned an unexpected payload: /);
  });

  it('rejects non-JSON output', async () => {
    server.tool('list_directory', 'plain text', { path: z.string() }, async () => ({
      content: [{ type: 'text', text: 'three files' }],
    }));
    client = await connect(server);

    const error = await rejection(new McpToolCollaborators(client).listDirectory('/docs'));
    expect(error.category).toBe('COLLABORATOR_ERROR');
    expect(error.message).toBe('Tool list_directory returned non-JSON output: three files');
  });

  it('maps an unknown remote category to COLLABORATOR_ERROR', async () => {
    server.tool('list_directory', 'odd error', { path: z.string() }, async () => ({
      content: [
        {
          type: 'text',
          text: JSON.stringify({ success: false, error: { category: 'DISK_ON_FIRE', message: 'smoke' } }),
        },
      ],
      isError: true,
    }));
    client = await connect(server);

    const error = await rejection(new McpToolCollaborators(client).listDirectory('/docs'));
    expect(error.category).toBe('COLLABORATOR_ERROR');
    expect(error.message).toBe('smoke');
    expect(error.details).toMatchObject({ remoteCategory: 'DISK_ON_FIRE' });
  });
});
