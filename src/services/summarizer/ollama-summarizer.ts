/**
 * Ollama-backed Summarizer
 *
 * Sends the full document content to the model and parses its JSON reply
 * into an unvalidated draft. Schema enforcement happens downstream. A
 * document over MAX_DOCUMENT_CHARS is refused rather than cut.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/summarizer/ollama-summarizer
 */

import { SummarizationError, errorMessage } from '../batch/errors.js';
import { OllamaClient } from './client.js';
import { MAX_DOCUMENT_CHARS, SUMMARY_OUTPUT_SCHEMA, buildSummaryPrompt } from './prompts.js';
import type { SummarizeInput, Summarizer, SummaryDraft } from './types.js';

/**
 * Parse a model reply as a JSON object, tolerating a surrounding code fence.
 */
export function parseSummaryDraft(text: string): SummaryDraft {
  const trimmed = text.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  const jsonText = fenced ? fenced[1] : trimmed;

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonText);
  } catch (error) {
    throw new SummarizationError(`Model returned invalid JSON: ${errorMessage(error)}`, error);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new SummarizationError('Model returned JSON that is not an object');
  }
  return { ...parsed };
}

export class OllamaSummarizer implements Summarizer {
  constructor(private readonly client: OllamaClient = new OllamaClient()) {}

  async summarize(input: SummarizeInput): Promise<SummaryDraft> {
    if (input.content.trim().length === 0) {
      throw new SummarizationError(`Document ${input.filename} is empty`);
    }
    if (input.content.length > MAX_DOCUMENT_CHARS) {
      throw new SummarizationError(
        `Document ${input.filename} is ${input.content.length} characters; the summarizer accepts at most ${MAX_DOCUMENT_CHARS}`
      );
    }

    let text: string;
    try {
      const response = await this.client.generate(buildSummaryPrompt(input.filename, input.content), {
        format: SUMMARY_OUTPUT_SCHEMA,
      });
      console.error(
        `[OllamaSummarizer] ${input.filename}: ${response.usage.totalTokens} tokens in ${response.processingTimeMs}ms`
      );
      text = response.text;
    } catch (error) {
      throw new SummarizationError(errorMessage(error), error);
    }

    return parseSummaryDraft(text);
  }

  getStatus(): { baseUrl: string; model: string } {
    return this.client.getStatus();
  }
}
