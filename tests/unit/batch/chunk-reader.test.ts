/**
 * Unit tests for the chunk reader adapter
 */

import { describe, it, expect } from 'vitest';
import { ChunkReader } from '../../../src/services/batch/chunk-reader.js';
import { ReadError } from '../../../src/services/batch/errors.js';
import { MCPError } from '../../../src/server/errors.js';
import { FakeCollaborators } from '../helpers.js';

describe('ChunkReader', () => {
  it('concatenates chunks until eof', async () => {
    const collaborators = new FakeCollaborators({
      documents: {
        '/docs/a.txt': {
          chunks: [
            { content: 'Hello ', eof: false },
            { content: 'World', eof: true },
          ],
        },
      },
    });
    const reader = new ChunkReader(collaborators);

    await expect(reader.readAll('/docs/a.txt')).resolves.toBe('Hello World');
    expect(collaborators.reads.map((r) => r.offset)).toEqual([0, 6]);
  });

  it('advances by the length of each chunk', async () => {
    const text = 'abcdefghij';
    const collaborators = new FakeCollaborators({ documents: { '/d.md': { text } } });
    const reader = new ChunkReader(collaborators, { chunkSize: 4 });

    await expect(reader.readAll('/d.md')).resolves.toBe(text);
    expect(collaborators.reads).toEqual([
      { path: '/d.md', offset: 0, chunk_size: 4 },
      { path: '/d.md', offset: 4, chunk_size: 4 },
      { path: '/d.md', offset: 8, chunk_size: 4 },
    ]);
  });

  it('returns an empty string for an empty document', async () => {
    const collaborators = new FakeCollaborators({ documents: { '/empty.txt': { text: '' } } });
    await expect(new ChunkReader(collaborators).readAll('/empty.txt')).resolves.toBe('');
    expect(collaborators.reads).toHaveLength(1);
  });

  it('stops at eof even when the final chunk is empty', async () => {
    const collaborators = new FakeCollaborators({
      documents: {
        '/e.txt': {
          chunks: [
            { content: 'abc', eof: false },
            { content: '', eof: true },
          ],
        },
      },
    });
    await expect(new ChunkReader(collaborators).readAll('/e.txt')).resolves.toBe('abc');
  });

  it('raises ReadError after repeated empty non-final chunks', async () => {
    const collaborators = new FakeCollaborators({
      documents: { '/stuck.txt': { chunks: [{ content: '', eof: false }] } },
    });
    const reader = new ChunkReader(collaborators, { maxStalledReads: 2 });

    const error = await reader.readAll('/stuck.txt').catch((e: unknown) => e);
    if (!(error instanceof ReadError)) throw new Error('expected a ReadError');
    expect(error.category).toBe('READ_FAILED');
    expect(error.message).toBe('No progress reading /stuck.txt: 2 empty chunks at offset 0');
    expect(collaborators.reads).toHaveLength(2);
  });

  it('raises ReadError when chunks run past the reported total length', async () => {
    const collaborators = new FakeCollaborators({
      documents: { '/loop.txt': { chunks: [{ content: 'abc', eof: false }] } },
    });

    const error = await new ChunkReader(collaborators).readAll('/loop.txt').catch((e: unknown) => e);
    if (!(error instanceof ReadError)) throw new Error('expected a ReadError');
    expect(error.category).toBe('READ_FAILED');
    expect(error.message).toBe('Collaborator returned content past the reported length 3 of /loop.txt');
    expect(collaborators.reads.map((r) => r.offset)).toEqual([0, 3]);
  });

  it('raises ReadError when the collaborator answers for the wrong offset', async () => {
    const reader = new ChunkReader({
      readDocumentChunk: async (request) => ({
        path: request.path,
        filename: 'x.txt',
        offset: request.offset + 1,
        next_offset: null,
        chunk_size: 1,
        total_length: 2,
        progress: '100.0%',
        eof: true,
        content: 'x',
      }),
    });

    await expect(reader.readAll('/x.txt')).rejects.toThrow(
      'Collaborator returned offset 1 for a read at offset 0 of /x.txt'
    );
  });

  it('wraps collaborator failures with the original as cause', async () => {
    const failure = new Error('disk unplugged');
    const collaborators = new FakeCollaborators({ documents: { '/c.pdf': { error: failure } } });

    const error = await new ChunkReader(collaborators).readAll('/c.pdf').catch((e: unknown) => e);
    if (!(error instanceof ReadError)) throw new Error('expected a ReadError');
    expect(error.message).toBe('Failed to read /c.pdf at offset 0: disk unplugged');
    expect(error.cause).toBe(failure);
    expect(error.category).toBe('READ_FAILED');
  });

  it('reports a missing path as DOCUMENT_NOT_FOUND', async () => {
    const collaborators = new FakeCollaborators({
      documents: {
        '/gone.txt': { error: new MCPError('PATH_NOT_FOUND', 'Path does not exist: /gone.txt') },
      },
    });
    const error = await new ChunkReader(collaborators).readAll('/gone.txt').catch((e: unknown) => e);
    if (!(error instanceof ReadError)) throw new Error('expected a ReadError');
    expect(error.category).toBe('DOCUMENT_NOT_FOUND');
  });

  it('retries a transient failure at the same offset when configured', async () => {
    let calls = 0;
    const offsets: number[] = [];
    const reader = new ChunkReader(
      {
        readDocumentChunk: async (request) => {
          calls++;
          offsets.push(request.offset);
          if (calls === 2) throw new Error('connection reset');
          const content = request.offset === 0 ? 'ab' : 'cd';
          return {
            path: request.path,
            filename: 'r.txt',
            offset: request.offset,
            next_offset: request.offset === 0 ? 2 : null,
            chunk_size: 2,
            total_length: 4,
            progress: request.offset === 0 ? '50.0%' : '100.0%',
            eof: request.offset !== 0,
            content,
          };
        },
      },
      { chunkSize: 2, retry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 } }
    );

    await expect(reader.readAll('/r.txt')).resolves.toBe('abcd');
    expect(offsets).toEqual([0, 2, 2]);
  });

  it('does not retry a missing path', async () => {
    let calls = 0;
    const reader = new ChunkReader(
      {
        readDocumentChunk: async () => {
          calls++;
          throw new MCPError('PATH_NOT_FOUND', 'Path does not exist: /nope');
        },
      },
      { retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 } }
    );

    await expect(reader.readAll('/nope')).rejects.toBeInstanceOf(ReadError);
    expect(calls).toBe(1);
  });

  it('stops reading when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const collaborators = new FakeCollaborators({ documents: { '/a.txt': { text: 'abc' } } });

    await expect(new ChunkReader(collaborators).readAll('/a.txt', controller.signal)).rejects.toThrow(
      'Read of /a.txt aborted at offset 0'
    );
    expect(collaborators.reads).toHaveLength(0);
  });

  it('rejects a non-positive chunk size', () => {
    expect(() => new ChunkReader(new FakeCollaborators(), { chunkSize: 0 })).toThrow(RangeError);
  });
});
