/**
 * Batch Summarization MCP Tools
 *
 * Tools: summarize_directory
 *
 * Runs the batch orchestrator against this server's own collaborators
 * (local filesystem + summary database) and the configured summarizer.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/batch
 */

import { getConfig, requireStore, requireSummarizer } from '../server/state.js';
import { successResult } from '../server/types.js';
import { BatchOrchestrator } from '../services/batch/orchestrator.js';
import { LocalCollaborators } from '../services/collaborators/local.js';
import { SummarizeDirectoryInput, sanitizePath, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: summarize_directory
// ═══════════════════════════════════════════════════════════════════════════════

async function handleSummarizeDirectory(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SummarizeDirectoryInput, params);
    const directory = sanitizePath(input.path);
    const config = getConfig();

    const orchestrator = new BatchOrchestrator(
      new LocalCollaborators(requireStore(), input.file_types ?? config.documentTypes),
      requireSummarizer(),
      {
        reader: {
          chunkSize: input.chunk_size ?? config.chunkSize,
          retry: { maxAttempts: config.readRetryAttempts },
        },
        validationMode: input.validation_mode ?? config.validationMode,
        maxConsecutivePersistenceFailures: config.maxConsecutivePersistenceFailures,
      }
    );

    const result = await orchestrator.run(directory);
    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export const batchTools: Record<string, ToolDefinition> = {
  summarize_directory: {
    description:
      'Summarize every document in a directory, one at a time, and save exactly one record per document (completed, or failed with a reason). Returns per-document outcomes and counts. Long-running: each document is read in full and sent to the summarization model.',
    inputSchema: {
      path: SummarizeDirectoryInput.shape.path.describe('Directory whose documents to summarize'),
      file_types: SummarizeDirectoryInput.shape.file_types.describe(
        'Extensions to include, without the dot (default: txt, md, pdf)'
      ),
      chunk_size: SummarizeDirectoryInput.shape.chunk_size.describe(
        'Characters per read while accumulating each document'
      ),
      validation_mode: SummarizeDirectoryInput.shape.validation_mode.describe(
        'demote (default): save schema-violating summaries as failed records. strict: save nothing for them'
      ),
    },
    handler: handleSummarizeDirectory,
  },
};
