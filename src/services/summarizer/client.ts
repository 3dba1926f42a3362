/**
 * Ollama text generation client
 *
 * Thin wrapper over Ollama's /api/generate endpoint with a request timeout
 * and exponential-backoff retries for transient failures.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/summarizer/client
 */

import { z } from 'zod';
import { withRetry } from '../../utils/backoff.js';
import { MCPError } from '../../server/errors.js';
import { loadSummarizerConfig, type SummarizerConfig, type SummarizerConfigInput } from './config.js';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface GenerateResponse {
  text: string;
  model: string;
  usage: TokenUsage;
  processingTimeMs: number;
}

export interface GenerateOptions {
  /** JSON schema the output must follow; enables Ollama's structured output */
  format?: object;
  maxOutputTokens?: number;
}

const OllamaGenerateResponseSchema = z
  .object({
    model: z.string().optional(),
    response: z.string().optional(),
    done: z.boolean().optional(),
    eval_count: z.number().optional(),
    prompt_eval_count: z.number().optional(),
  })
  .passthrough();

/** Ollama returns 503 while a model is still loading */
const RETRYABLE = /\b(500|502|503|504)\b|ECONNREFUSED|ECONNRESET|ETIMEDOUT|fetch failed|model.*load/i;

export class OllamaClient {
  private readonly config: SummarizerConfig;

  constructor(configOverrides?: SummarizerConfigInput) {
    this.config = loadSummarizerConfig(configOverrides);
  }

  /**
   * Text-only generation
   *
   * @throws MCPError SUMMARIZER_API_ERROR when Ollama is unreachable or errors
   */
  async generate(prompt: string, options: GenerateOptions = {}): Promise<GenerateResponse> {
    const startTime = Date.now();
    const response = await withRetry(
      () => this.callGenerate(prompt, options),
      (error) => error instanceof Error && RETRYABLE.test(error.message),
      { ...this.config.retry, label: 'OllamaClient' }
    ).catch((error: unknown) => {
      throw new MCPError(
        'SUMMARIZER_API_ERROR',
        error instanceof Error ? error.message : String(error),
        { baseUrl: this.config.baseUrl, model: this.config.model }
      );
    });

    return { ...response, processingTimeMs: Date.now() - startTime };
  }

  getStatus(): { baseUrl: string; model: string } {
    return { baseUrl: this.config.baseUrl, model: this.config.model };
  }

  private async callGenerate(
    prompt: string,
    options: GenerateOptions
  ): Promise<Omit<GenerateResponse, 'processingTimeMs'>> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/api/generate`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    let rawResponse: Response;
    try {
      rawResponse = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          prompt,
          stream: false,
          ...(options.format && { format: options.format }),
          options: {
            temperature: this.config.temperature,
            num_predict: options.maxOutputTokens ?? this.config.maxOutputTokens,
          },
        }),
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeoutId);
    }

    if (!rawResponse.ok) {
      const body = await rawResponse.text().catch(() => '');
      throw new Error(
        `Ollama API error ${rawResponse.status}: ${rawResponse.statusText}. ${body.slice(0, 200)}`
      );
    }

    const parsed = OllamaGenerateResponseSchema.safeParse(await rawResponse.json());
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new Error(`Ollama returned an unexpected response body: ${where}${issue.message}`);
    }
    const data = parsed.data;
    const inputTokens = data.prompt_eval_count ?? 0;
    const outputTokens = data.eval_count ?? 0;

    return {
      text: data.response ?? '',
      model: data.model ?? this.config.model,
      usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
    };
  }
}
