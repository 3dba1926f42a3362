/**
 * Directory MCP Tools
 *
 * Tools: list_directory
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/directory
 */

import { getConfig } from '../server/state.js';
import { successResult } from '../server/types.js';
import { listDocumentDirectory } from '../services/documents/directory.js';
import { ListDirectoryInput, sanitizePath, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: list_directory
// ═══════════════════════════════════════════════════════════════════════════════

async function handleListDirectory(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ListDirectoryInput, params);
    const directory = sanitizePath(input.path);
    const listing = listDocumentDirectory(directory, input.file_types ?? getConfig().documentTypes);

    console.error(`[list_directory] ${listing.files.length} entries in ${listing.path}`);
    return formatResponse(successResult(listing));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export const directoryTools: Record<string, ToolDefinition> = {
  list_directory: {
    description:
      'List the documents in a directory (non-recursive). Returns name, absolute path, is_dir and size for each entry whose extension matches file_types (default: txt, md, pdf), sorted by name.',
    inputSchema: {
      path: ListDirectoryInput.shape.path.describe('Directory to list'),
      file_types: ListDirectoryInput.shape.file_types.describe(
        'Extensions to include, without the dot (default: txt, md, pdf)'
      ),
    },
    handler: handleListDirectory,
  },
};
