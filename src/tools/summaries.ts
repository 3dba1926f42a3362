/**
 * Summary MCP Tools
 *
 * Tools: save_summary_to_db, summary_get, summary_list
 *
 * save_summary_to_db only stores records that pass the summary schema;
 * saving the same document_id again replaces the stored record.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/summaries
 */

import { z } from 'zod';
import { SUMMARY_DOMAINS } from '../models/summary.js';
import { summaryNotFoundError, validationError } from '../server/errors.js';
import { requireStore } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateSummary } from '../services/summary/validator.js';
import { SummaryGetInput, SummaryListInput, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Advertised shape of a summary record. Everything past the identity fields is
 * optional here, and unknown keys pass through, so the summary validator, not
 * the transport, reports which fields are wrong.
 */
const SaveSummaryShape = {
  document_id: z.string().describe('Stable document identifier'),
  filename: z.string().describe('Document file name'),
  status: z.enum(['completed', 'failed']).describe('completed or failed'),
  executive_summary: z.string().optional().describe('Short overview of the document'),
  domain: z.enum(SUMMARY_DOMAINS).optional().describe('Subject domain (completed only)'),
  key_arguments: z
    .array(z.string())
    .optional()
    .describe('Main arguments in document order (completed only, required there)'),
  key_models_or_frameworks: z
    .array(z.object({ name: z.string(), description: z.string() }))
    .optional()
    .describe('Models or frameworks the document uses (completed only)'),
  key_variables_or_concepts: z
    .array(z.object({ term: z.string(), explanation: z.string() }))
    .optional()
    .describe('Key terms and their explanations (completed only)'),
  failure_reason: z.string().optional().describe('Why no summary was produced (failed only)'),
};

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: save_summary_to_db
// ═══════════════════════════════════════════════════════════════════════════════

async function handleSaveSummary(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const validation = validateSummary(params);
    if (!validation.ok) {
      throw validationError(
        `Summary record failed schema validation: ${validation.violations.join(', ')}`,
        { violations: validation.violations }
      );
    }
    const ack = requireStore().save(validation.record);
    console.error(`[save_summary_to_db] ${ack.document_id} (${ack.filename}): ${ack.status}`);
    return formatResponse(successResult(ack));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: summary_get
// ═══════════════════════════════════════════════════════════════════════════════

async function handleSummaryGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SummaryGetInput, params);
    const summary = requireStore().get(input.document_id);
    if (!summary) {
      throw summaryNotFoundError(input.document_id);
    }
    return formatResponse(successResult(summary));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: summary_list
// ═══════════════════════════════════════════════════════════════════════════════

async function handleSummaryList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(SummaryListInput, params);
    const store = requireStore();
    const summaries = store.list(input);
    const total = store.count(input.status);

    return formatResponse(
      successResult({
        summaries,
        total,
        limit: input.limit,
        offset: input.offset,
        has_more: input.offset + summaries.length < total,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

export const summaryTools: Record<string, ToolDefinition> = {
  save_summary_to_db: {
    description:
      'Save one summary record. Completed records need executive_summary, domain and key_arguments; failed records need executive_summary and failure_reason and no analytical fields. Non-conforming records are rejected and nothing is stored. Replaces any record with the same document_id.',
    inputSchema: SaveSummaryShape,
    handler: handleSaveSummary,
    passthroughUnknownKeys: true,
  },
  summary_get: {
    description: 'Get the stored summary for a document_id',
    inputSchema: SummaryGetInput.shape,
    handler: handleSummaryGet,
  },
  summary_list: {
    description:
      'List stored summaries, most recently updated first. Filter by status; paginate with limit/offset.',
    inputSchema: SummaryListInput.shape,
    handler: handleSummaryList,
  },
};
