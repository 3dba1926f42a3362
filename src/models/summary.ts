/**
 * Summary record interfaces for the Directory Summarizer
 *
 * A SummaryRecord is the single persisted result for one document.
 * It is a tagged union on `status`: completed summaries carry the core
 * analytical fields, failed summaries carry only a failure reason.
 *
 * @module models/summary
 */

/**
 * Terminal status of a summarized document
 */
export type SummaryStatus = 'completed' | 'failed';

/**
 * Subject domains a completed summary can be filed under
 */
export const SUMMARY_DOMAINS = [
  'economics',
  'finance',
  'business',
  'technology',
  'science',
  'mathematics',
  'psychology',
  'philosophy',
  'history',
  'politics',
  'law',
  'literature',
  'other',
] as const;

export type SummaryDomain = (typeof SUMMARY_DOMAINS)[number];

/**
 * Fields that only a completed summary may carry
 */
export const CORE_ANALYTICAL_FIELDS = [
  'domain',
  'key_arguments',
  'key_models_or_frameworks',
  'key_variables_or_concepts',
] as const;

export interface KeyModel {
  name: string;
  description: string;
}

export interface KeyConcept {
  term: string;
  explanation: string;
}

interface SummaryBase {
  /** Stable identifier derived from the document path ('sha256:...') */
  document_id: string;

  /** Base name of the source file */
  filename: string;

  /** One-paragraph overview of the document */
  executive_summary: string;
}

export interface CompletedSummary extends SummaryBase {
  status: 'completed';
  domain: SummaryDomain;

  /** Main arguments, in the order the document develops them */
  key_arguments: string[];
  key_models_or_frameworks?: KeyModel[];
  key_variables_or_concepts?: KeyConcept[];
}

export interface FailedSummary extends SummaryBase {
  status: 'failed';
  failure_reason: string;
}

export type SummaryRecord = CompletedSummary | FailedSummary;

/**
 * Acknowledgement returned once a record has been stored
 */
export interface SaveAcknowledgement {
  document_id: string;
  filename: string;
  status: SummaryStatus;
  saved: true;
}

/**
 * A stored record with its bookkeeping columns
 */
export type StoredSummary = SummaryRecord & {
  schema_version: number;
  created_at: string;
  updated_at: string;
};
