/**
 * Summarization collaborator interface
 *
 * @module services/summarizer/types
 */

export interface SummarizeInput {
  document_id: string;
  filename: string;
  path: string;
  /** Full document content, never a partial read */
  content: string;
}

/**
 * Unvalidated candidate record. The orchestrator fills in identity fields and
 * runs it through the schema validator before anything is persisted.
 */
export type SummaryDraft = Record<string, unknown>;

export interface Summarizer {
  summarize(input: SummarizeInput): Promise<SummaryDraft>;
}
