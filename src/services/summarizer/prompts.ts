/**
 * Summary prompt and structured-output schema
 *
 * @module services/summarizer/prompts
 */

import { SUMMARY_DOMAINS } from '../../models/summary.js';

/** Longest document sent to the model, in characters */
export const MAX_DOCUMENT_CHARS = 60_000;

/**
 * JSON schema passed to Ollama's `format` option. Identity and status fields
 * are filled in by the orchestrator, not the model.
 */
export const SUMMARY_OUTPUT_SCHEMA = {
  type: 'object',
  properties: {
    executive_summary: { type: 'string' },
    domain: { type: 'string', enum: [...SUMMARY_DOMAINS] },
    key_arguments: { type: 'array', items: { type: 'string' } },
    key_models_or_frameworks: {
      type: 'array',
      items: {
        type: 'object',
        properties: { name: { type: 'string' }, description: { type: 'string' } },
        required: ['name', 'description'],
      },
    },
    key_variables_or_concepts: {
      type: 'array',
      items: {
        type: 'object',
        properties: { term: { type: 'string' }, explanation: { type: 'string' } },
        required: ['term', 'explanation'],
      },
    },
  },
  required: ['executive_summary', 'domain', 'key_arguments'],
} as const;

export function buildSummaryPrompt(filename: string, content: string): string {
  return `You are summarizing the document "${filename}".

Return ONLY a JSON object with these fields:
- executive_summary: 3-5 sentences covering the document's purpose and conclusions
- domain: one of ${SUMMARY_DOMAINS.join(', ')}
- key_arguments: the main arguments or findings, in the order they appear
- key_models_or_frameworks (optional): [{ "name", "description" }]
- key_variables_or_concepts (optional): [{ "term", "explanation" }]

Omit optional fields rather than returning empty arrays. Do not add other fields.

DOCUMENT:
${content}`;
}
