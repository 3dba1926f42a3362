/**
 * Summary Schema Validator
 *
 * Checks candidate summary records against the field-presence contract
 * before they are considered final. Validation is pure: the input is never
 * mutated and the same input always yields the same result.
 *
 * @module services/summary/validator
 */

import { z } from 'zod';
import { SUMMARY_DOMAINS, type FailedSummary, type SummaryRecord } from '../../models/summary.js';

/** Bumped whenever the record shape changes */
export const SUMMARY_SCHEMA_VERSION = 1;

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const nonEmpty = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .refine((value) => value.trim().length > 0, `${field} must not be empty`);

const KeyModelSchema = z.object({ name: nonEmpty('name'), description: z.string() }).strict();

const KeyConceptSchema = z
  .object({ term: nonEmpty('term'), explanation: z.string() })
  .strict();

export const CompletedSummarySchema = z
  .object({
    document_id: nonEmpty('document_id'),
    filename: nonEmpty('filename'),
    status: z.literal('completed'),
    executive_summary: nonEmpty('executive_summary'),
    domain: z.enum(SUMMARY_DOMAINS),
    key_arguments: z.array(nonEmpty('key_arguments item')).min(1),
    key_models_or_frameworks: z.array(KeyModelSchema).optional(),
    key_variables_or_concepts: z.array(KeyConceptSchema).optional(),
  })
  .strict();

export const FailedSummarySchema = z
  .object({
    document_id: nonEmpty('document_id'),
    filename: nonEmpty('filename'),
    status: z.literal('failed'),
    executive_summary: nonEmpty('executive_summary'),
    failure_reason: nonEmpty('failure_reason'),
  })
  .strict();

export const SummaryRecordSchema = z.discriminatedUnion('status', [
  CompletedSummarySchema,
  FailedSummarySchema,
]);

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

export type ValidationResult =
  | { ok: true; record: SummaryRecord }
  | { ok: false; violations: string[] };

/** Violation name used when the candidate is not an object at all */
export const RECORD_VIOLATION = '(record)';

/**
 * Validate a candidate record.
 *
 * Violations are field names, deduplicated, in first-seen order. Fields the
 * schema does not define for the given status (e.g. `failure_reason` on a
 * completed record) are reported by name.
 */
export function validateSummary(candidate: unknown): ValidationResult {
  const result = SummaryRecordSchema.safeParse(candidate);
  if (result.success) {
    return { ok: true, record: result.data };
  }

  const violations: string[] = [];
  const add = (field: string): void => {
    if (!violations.includes(field)) violations.push(field);
  };

  for (const issue of result.error.issues) {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      issue.keys.forEach(add);
    } else if (issue.path.length > 0) {
      add(String(issue.path[0]));
    } else {
      add(RECORD_VIOLATION);
    }
  }

  return { ok: false, violations };
}

/**
 * Build the only permissible correction for an invalid record: a failed
 * record citing the schema violation. `document_id` and `filename` come from
 * the caller, never from the rejected candidate.
 */
export function demoteSummary(
  identity: { document_id: string; filename: string },
  violations: readonly string[]
): FailedSummary {
  return {
    document_id: identity.document_id,
    filename: identity.filename,
    status: 'failed',
    executive_summary: 'No summary available: the generated summary did not match the schema.',
    failure_reason: `Summary failed schema validation: ${violations.join(', ')}`,
  };
}

/**
 * Build a failed record for a document that could not be read or summarized.
 */
export function failedSummary(
  identity: { document_id: string; filename: string },
  reason: string
): FailedSummary {
  return {
    document_id: identity.document_id,
    filename: identity.filename,
    status: 'failed',
    executive_summary: 'No summary available: the document could not be processed.',
    failure_reason: reason.trim().length > 0 ? reason : 'Unknown error',
  };
}
