/**
 * Directory Summarizer - Zod Validation Schemas
 *
 * Input validation for all MCP tool inputs, plus path sanitization.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as path from 'path';
import { homedir, tmpdir } from 'os';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failing path
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const prefix = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${prefix}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * File extensions listed by default (without the dot)
 */
export const DEFAULT_DOCUMENT_TYPES = ['txt', 'md', 'pdf'];

export const DEFAULT_CHUNK_SIZE = 2000;

export const MAX_CHUNK_SIZE = 100_000;

// ═══════════════════════════════════════════════════════════════════════════════
// COLLABORATOR TOOL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ListDirectoryInput = z.object({
  path: z.string().min(1, 'Directory path is required'),
  file_types: z
    .array(z.string().min(1).regex(/^[a-zA-Z0-9]+$/, 'File types are bare extensions like "md"'))
    .min(1)
    .optional(),
});

export const ReadDocumentChunkInput = z.object({
  path: z.string().min(1, 'Document path is required'),
  offset: z.number().int().min(0, 'Offset must be non-negative').default(0),
  chunk_size: z
    .number()
    .int()
    .min(1, 'Chunk size must be at least 1')
    .max(MAX_CHUNK_SIZE, `Chunk size must be ${MAX_CHUNK_SIZE} or less`)
    .default(DEFAULT_CHUNK_SIZE),
});

// ═══════════════════════════════════════════════════════════════════════════════
// SUMMARY SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const SummaryGetInput = z.object({
  document_id: z.string().min(1, 'Document ID is required'),
});

export const SummaryListInput = z.object({
  status: z.enum(['completed', 'failed']).optional(),
  limit: z.number().int().min(1).max(500).default(50),
  offset: z.number().int().min(0).default(0),
});

export const SummarizeDirectoryInput = z.object({
  path: z.string().min(1, 'Directory path is required'),
  file_types: ListDirectoryInput.shape.file_types,
  chunk_size: z.number().int().min(1).max(MAX_CHUNK_SIZE).optional(),
  validation_mode: z.enum(['demote', 'strict']).optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// PATH SANITIZATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Directories the tools may touch: home, temp, working directory, and any
 * listed in DIRECTORY_SUMMARIZER_ALLOWED_DIRS (comma-separated).
 */
export function getDefaultAllowedBaseDirs(): string[] {
  const dirs = [homedir(), tmpdir(), '/tmp', process.cwd()].map((d) => path.resolve(d));

  const extraDirs = process.env.DIRECTORY_SUMMARIZER_ALLOWED_DIRS;
  if (extraDirs) {
    for (const d of extraDirs.split(',')) {
      const trimmed = d.trim();
      if (trimmed) {
        dirs.push(path.resolve(trimmed));
      }
    }
  }

  return dirs;
}

/**
 * Resolve a user-supplied path and confine it to the allowed directories.
 *
 * @throws ValidationError on null bytes or a path outside every allowed base
 */
export function sanitizePath(filePath: string, allowedBaseDirs?: string[]): string {
  if (filePath.includes('\0')) {
    throw new ValidationError('Path contains null bytes');
  }

  const resolved = path.resolve(filePath);
  const baseDirs =
    allowedBaseDirs && allowedBaseDirs.length > 0 ? allowedBaseDirs : getDefaultAllowedBaseDirs();

  const resolvedBases = baseDirs.map((d) => path.resolve(d));
  const withinAllowed = resolvedBases.some(
    (base) => resolved === base || resolved.startsWith(base + path.sep)
  );
  if (!withinAllowed) {
    throw new ValidationError(
      `Path "${resolved}" is outside allowed directories: ${resolvedBases.join(', ')}. ` +
        `To allow this path, set the DIRECTORY_SUMMARIZER_ALLOWED_DIRS environment variable ` +
        `(comma-separated list of directories).`
    );
  }

  return resolved;
}
