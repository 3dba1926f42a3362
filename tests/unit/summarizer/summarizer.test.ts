/**
 * Unit tests for the Ollama summarizer: config loading, reply parsing and the
 * HTTP exchange (fetch is stubbed).
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MCPError } from '../../../src/server/errors.js';
import { SummarizationError } from '../../../src/services/batch/errors.js';
import { OllamaClient } from '../../../src/services/summarizer/client.js';
import { loadSummarizerConfig } from '../../../src/services/summarizer/config.js';
import {
  OllamaSummarizer,
  parseSummaryDraft,
} from '../../../src/services/summarizer/ollama-summarizer.js';
import { SUMMARY_OUTPUT_SCHEMA } from '../../../src/services/summarizer/prompts.js';

const OLLAMA_ENV = [
  'OLLAMA_BASE_URL',
  'OLLAMA_MODEL',
  'OLLAMA_TEMPERATURE',
  'OLLAMA_MAX_OUTPUT_TOKENS',
  'OLLAMA_TIMEOUT_MS',
];

const fetchMock = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

function ollamaReply(response: string): Response {
  return new Response(
    JSON.stringify({ model: 'test-model', response, done: true, prompt_eval_count: 120, eval_count: 30 }),
    { status: 200, headers: { 'Content-Type': 'application/json' } }
  );
}

const DRAFT = {
  executive_summary: 'A short paper on tides.',
  domain: 'science',
  key_arguments: ['The moon drives tides'],
};

const INPUT = {
  document_id: 'sha256:tides',
  filename: 'tides.md',
  path: '/docs/tides.md',
  content: 'Some text about tides.',
};

function testClient(): OllamaClient {
  return new OllamaClient({
    baseUrl: 'http://ollama.test:11434/',
    model: 'test-model',
    retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
  });
}

beforeEach(() => {
  for (const name of OLLAMA_ENV) vi.stubEnv(name, '');
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.unstubAllGlobals();
});

function configError(): string {
  try {
    loadSummarizerConfig();
  } catch (error) {
    if (error instanceof MCPError) return `${error.category}: ${error.message}`;
    throw error;
  }
  throw new Error('expected loadSummarizerConfig to throw');
}

describe('loadSummarizerConfig', () => {
  it('falls back to defaults', () => {
    expect(loadSummarizerConfig()).toEqual({
      baseUrl: 'http://localhost:11434',
      model: 'llama3.1',
      maxOutputTokens: 4096,
      temperature: 0.1,
      requestTimeoutMs: 300000,
      retry: { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 10000 },
    });
  });

  it('reads environment variables', () => {
    vi.stubEnv('OLLAMA_BASE_URL', 'http://gpu-box:11434');
    vi.stubEnv('OLLAMA_MODEL', 'mistral');
    vi.stubEnv('OLLAMA_TEMPERATURE', '0.4');

    const config = loadSummarizerConfig();
    expect(config.baseUrl).toBe('http://gpu-box:11434');
    expect(config.model).toBe('mistral');
    expect(config.temperature).toBe(0.4);
  });

  it('lets explicit overrides win over the environment', () => {
    vi.stubEnv('OLLAMA_MODEL', 'mistral');
    expect(loadSummarizerConfig({ model: 'qwen2.5' }).model).toBe('qwen2.5');
  });

  it('rejects a non-numeric value', () => {
    vi.stubEnv('OLLAMA_TEMPERATURE', 'hot');
    expect(configError()).toBe('CONFIGURATION_ERROR: Invalid numeric env var OLLAMA_TEMPERATURE: "hot"');
  });

  it('rejects an invalid base URL', () => {
    vi.stubEnv('OLLAMA_BASE_URL', 'not a url');
    expect(configError()).toBe('CONFIGURATION_ERROR: Invalid summarizer configuration: baseUrl: Invalid url');
  });

  it('rejects an out-of-range temperature', () => {
    vi.stubEnv('OLLAMA_TEMPERATURE', '5');
    expect(configError()).toBe(
      'CONFIGURATION_ERROR: Invalid summarizer configuration: temperature: Number must be less than or equal to 2'
    );
  });
});

describe('parseSummaryDraft', () => {
  it('parses a bare JSON object', () => {
    expect(parseSummaryDraft(JSON.stringify(DRAFT))).toEqual(DRAFT);
  });

  it('strips a json code fence', () => {
    expect(parseSummaryDraft('```json\n{"domain": "law"}\n```')).toEqual({ domain: 'law' });
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseSummaryDraft('Here is your summary')).toThrow(SummarizationError);
    expect(() => parseSummaryDraft('Here is your summary')).toThrow(/^Model returned invalid JSON: /);
  });

  it('rejects JSON that is not an object', () => {
    expect(() => parseSummaryDraft('["a", "b"]')).toThrow('Model returned JSON that is not an object');
  });
});

describe('OllamaSummarizer', () => {
  it('posts the prompt with the structured output schema', async () => {
    fetchMock.mockImplementation(async () => ollamaReply(JSON.stringify(DRAFT)));
    const summarizer = new OllamaSummarizer(testClient());

    await expect(summarizer.summarize(INPUT)).resolves.toEqual(DRAFT);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://ollama.test:11434/api/generate');
    expect(init?.method).toBe('POST');

    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      model: 'test-model',
      stream: false,
      format: SUMMARY_OUTPUT_SCHEMA,
      options: { temperature: 0.1, num_predict: 4096 },
    });
    expect(body).toHaveProperty('prompt', expect.stringContaining('DOCUMENT:\nSome text about tides.'));
  });

  it('rejects empty content without calling the model', async () => {
    const summarizer = new OllamaSummarizer(testClient());
    await expect(summarizer.summarize({ ...INPUT, content: '  \n' })).rejects.toThrow(
      'Document tides.md is empty'
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('refuses a document over the size limit without calling the model', async () => {
    const summarizer = new OllamaSummarizer(testClient());
    const error = await summarizer
      .summarize({ ...INPUT, content: 'x'.repeat(70_000) })
      .catch((e: unknown) => e);

    if (!(error instanceof SummarizationError)) throw new Error('expected a SummarizationError');
    expect(error.message).toBe(
      'Document tides.md is 70000 characters; the summarizer accepts at most 60000'
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('sends a document at the size limit whole', async () => {
    fetchMock.mockImplementation(async () => ollamaReply(JSON.stringify(DRAFT)));
    const content = `${'x'.repeat(59_990)}CONCLUSION`;

    await expect(new OllamaSummarizer(testClient()).summarize({ ...INPUT, content })).resolves.toEqual(
      DRAFT
    );
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body).toHaveProperty('prompt', expect.stringMatching(/x{59990}CONCLUSION$/));
  });

  it('wraps API errors in a SummarizationError', async () => {
    fetchMock.mockImplementation(
      async () => new Response('bad prompt', { status: 400, statusText: 'Bad Request' })
    );
    const summarizer = new OllamaSummarizer(testClient());

    const error = await summarizer.summarize(INPUT).catch((e: unknown) => e);
    if (!(error instanceof SummarizationError)) throw new Error('expected a SummarizationError');
    expect(error.message).toBe('Ollama API error 400: Bad Request. bad prompt');
    expect(error.cause).toBeInstanceOf(MCPError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries while the model is loading', async () => {
    fetchMock
      .mockImplementationOnce(
        async () => new Response('', { status: 503, statusText: 'Service Unavailable' })
      )
      .mockImplementation(async () => ollamaReply(JSON.stringify(DRAFT)));
    const summarizer = new OllamaSummarizer(testClient());

    await expect(summarizer.summarize(INPUT)).resolves.toEqual(DRAFT);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('gives up after maxAttempts connection failures', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const client = testClient();

    const error = await client.generate('prompt').catch((e: unknown) => e);
    if (!(error instanceof MCPError)) throw new Error('expected an MCPError');
    expect(error.category).toBe('SUMMARIZER_API_ERROR');
    expect(error.message).toBe('fetch failed');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('rejects a reply body that is not a generate response', async () => {
    fetchMock.mockImplementation(async () => new Response('null', { status: 200 }));

    const error = await testClient().generate('prompt').catch((e: unknown) => e);
    if (!(error instanceof MCPError)) throw new Error('expected an MCPError');
    expect(error.category).toBe('SUMMARIZER_API_ERROR');
    expect(error.message).toBe('Ollama returned an unexpected response body: Expected object, received null');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('rejects a reply whose response field is not text', async () => {
    fetchMock.mockImplementation(async () => new Response('{"response": 42}', { status: 200 }));

    await expect(testClient().generate('prompt')).rejects.toThrow(
      'Ollama returned an unexpected response body: response: Expected string, received number'
    );
  });

  it('reports token usage from the reply', async () => {
    fetchMock.mockImplementation(async () => ollamaReply('{}'));
    const response = await testClient().generate('prompt');
    expect(response.usage).toEqual({ inputTokens: 120, outputTokens: 30, totalTokens: 150 });
    expect(response.model).toBe('test-model');
  });
});
