/**
 * Health Check MCP Tools
 *
 * Tools: health_check
 *
 * Probes the summary database with SELECT 1 and reports the summarizer
 * endpoint configuration. Makes no call to the summarizer.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/health
 */

import { getToolCount } from '../server/register-tools.js';
import { getConfig, requireStore } from '../server/state.js';
import { successResult } from '../server/types.js';
import { errorMessage } from '../services/batch/errors.js';
import { loadSummarizerConfig } from '../services/summarizer/config.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

export const SERVICE_NAME = 'Directory Summarizer MCP Server';

interface SummarizerStatus {
  base_url: string | null;
  model: string | null;
  error?: string;
}

function summarizerStatus(): SummarizerStatus {
  try {
    const config = loadSummarizerConfig();
    return { base_url: config.baseUrl, model: config.model };
  } catch (error) {
    return { base_url: null, model: null, error: errorMessage(error) };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: health_check
// ═══════════════════════════════════════════════════════════════════════════════

async function handleHealthCheck(_params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const config = getConfig();
    let database: string;
    let healthy = true;
    try {
      database = requireStore().ping() ? 'connected' : 'error: SELECT 1 returned no row';
      healthy = database === 'connected';
    } catch (error) {
      database = `error: ${errorMessage(error)}`;
      healthy = false;
    }

    const summarizer = summarizerStatus();
    if (summarizer.error) healthy = false;

    return formatResponse(
      successResult({
        status: healthy ? 'healthy' : 'unhealthy',
        service: SERVICE_NAME,
        database,
        database_path: config.databasePath,
        summarizer,
        validation_mode: config.validationMode,
        chunk_size: config.chunkSize,
        tool_count: getToolCount(),
        checked_at: new Date().toISOString(),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export const healthTools: Record<string, ToolDefinition> = {
  health_check: {
    description:
      'Report server health: database connectivity (SELECT 1), summarizer endpoint configuration, active settings and tool count',
    inputSchema: {},
    handler: handleHealthCheck,
  },
};
