/**
 * Ollama summarizer configuration
 *
 * No API key required; Ollama runs locally.
 *
 * @module services/summarizer/config
 */

import { z } from 'zod';
import { configurationError } from '../../server/errors.js';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';

export const DEFAULT_SUMMARIZER_MODEL = 'llama3.1';

export const SummarizerConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_OLLAMA_BASE_URL),
  model: z.string().min(1).default(DEFAULT_SUMMARIZER_MODEL),
  maxOutputTokens: z.number().int().positive().default(4096),
  temperature: z.number().min(0).max(2).default(0.1),
  requestTimeoutMs: z.number().int().positive().default(300_000),

  // Retry configuration for transient HTTP failures
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      baseDelayMs: z.number().int().min(0).default(500),
      maxDelayMs: z.number().int().min(0).default(10000),
    })
    .default({}),
});

export type SummarizerConfig = z.infer<typeof SummarizerConfigSchema>;

export type SummarizerConfigInput = z.input<typeof SummarizerConfigSchema>;

function parseNumberEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw configurationError(`Invalid numeric env var ${name}: "${raw}"`, { name, value: raw });
  }
  return parsed;
}

/**
 * Load summarizer configuration from environment variables.
 *
 * @throws MCPError CONFIGURATION_ERROR on a malformed or out-of-range value
 *
 * Environment variables:
 *   OLLAMA_BASE_URL            Ollama server URL (default: http://localhost:11434)
 *   OLLAMA_MODEL               Text model used for summaries (default: llama3.1)
 *   OLLAMA_TEMPERATURE         Generation temperature (default: 0.1)
 *   OLLAMA_MAX_OUTPUT_TOKENS   Output token cap (default: 4096)
 *   OLLAMA_TIMEOUT_MS          Per-request timeout (default: 300000)
 */
export function loadSummarizerConfig(overrides?: SummarizerConfigInput): SummarizerConfig {
  const envConfig: SummarizerConfigInput = {
    baseUrl: process.env.OLLAMA_BASE_URL || undefined,
    model: process.env.OLLAMA_MODEL || undefined,
    temperature: parseNumberEnv('OLLAMA_TEMPERATURE'),
    maxOutputTokens: parseNumberEnv('OLLAMA_MAX_OUTPUT_TOKENS'),
    requestTimeoutMs: parseNumberEnv('OLLAMA_TIMEOUT_MS'),
  };

  const merged: Record<string, unknown> = {};
  for (const source of [envConfig, overrides ?? {}]) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  const parsed = SummarizerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw configurationError(`Invalid summarizer configuration: ${issues}`);
  }
  return parsed.data;
}
