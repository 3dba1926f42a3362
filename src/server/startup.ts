/**
 * Shared Startup Validation
 *
 * Applies environment-driven config overrides and reports problems with
 * them. Warnings only: a bad value falls back to the default.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { z } from 'zod';
import { MAX_CHUNK_SIZE } from '../utils/validation.js';
import { updateConfig } from './state.js';
import type { ServerConfig } from './types.js';

const ChunkSizeEnv = z.coerce.number().int().min(1).max(MAX_CHUNK_SIZE);
const ValidationModeEnv = z.enum(['demote', 'strict']);
const PositiveIntEnv = z.coerce.number().int().min(1);

/**
 * Read DIRECTORY_SUMMARIZER_* variables into the server config.
 *
 * @returns warnings that were printed
 */
export function validateStartupDependencies(env: NodeJS.ProcessEnv = process.env): string[] {
  const warnings: string[] = [];
  const updates: Partial<ServerConfig> = {};

  if (env.DIRECTORY_SUMMARIZER_DB_PATH) {
    updates.databasePath = env.DIRECTORY_SUMMARIZER_DB_PATH;
  }

  if (env.DIRECTORY_SUMMARIZER_CHUNK_SIZE) {
    const parsed = ChunkSizeEnv.safeParse(env.DIRECTORY_SUMMARIZER_CHUNK_SIZE);
    if (parsed.success) {
      updates.chunkSize = parsed.data;
    } else {
      warnings.push(
        `DIRECTORY_SUMMARIZER_CHUNK_SIZE="${env.DIRECTORY_SUMMARIZER_CHUNK_SIZE}" is not an integer in 1..${MAX_CHUNK_SIZE}; using the default`
      );
    }
  }

  if (env.DIRECTORY_SUMMARIZER_VALIDATION_MODE) {
    const parsed = ValidationModeEnv.safeParse(env.DIRECTORY_SUMMARIZER_VALIDATION_MODE);
    if (parsed.success) {
      updates.validationMode = parsed.data;
    } else {
      warnings.push(
        `DIRECTORY_SUMMARIZER_VALIDATION_MODE="${env.DIRECTORY_SUMMARIZER_VALIDATION_MODE}" must be "demote" or "strict"; using "demote"`
      );
    }
  }

  if (env.DIRECTORY_SUMMARIZER_READ_RETRIES) {
    const parsed = PositiveIntEnv.safeParse(env.DIRECTORY_SUMMARIZER_READ_RETRIES);
    if (parsed.success) {
      updates.readRetryAttempts = parsed.data;
    } else {
      warnings.push(
        `DIRECTORY_SUMMARIZER_READ_RETRIES="${env.DIRECTORY_SUMMARIZER_READ_RETRIES}" is not a positive integer; using 1`
      );
    }
  }

  if (!env.OLLAMA_BASE_URL) {
    warnings.push(
      'OLLAMA_BASE_URL is not set. summarize_directory will use http://localhost:11434'
    );
  }

  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  for (const [key, value] of Object.entries(updates)) {
    console.error(`[Config] ${key}=${String(value)}`);
  }
  updateConfig(updates);

  return warnings;
}
