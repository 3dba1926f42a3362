/**
 * Batch summarization CLI
 *
 * Runs one batch over a directory, either against this package's own
 * filesystem and database collaborators or against any MCP server that
 * exposes list_directory, read_document_chunk and save_summary_to_db.
 * Progress goes to stderr; the RunResult JSON goes to stdout.
 *
 * Exit codes: 0 every document persisted, 2 some documents unresolved,
 * 1 run aborted or bad arguments.
 *
 * @module cli/batch
 */

import { parseArgs } from 'node:util';
import { MCPError } from '../server/errors.js';
import { PersistenceError, RunCancelledError } from '../services/batch/errors.js';
import { BatchOrchestrator } from '../services/batch/orchestrator.js';
import type { RunResult, ValidationMode } from '../services/batch/types.js';
import { LocalCollaborators } from '../services/collaborators/local.js';
import { connectStdioCollaborators } from '../services/collaborators/mcp-client.js';
import type { DocumentCollaborators } from '../services/collaborators/types.js';
import { SummaryStore, DEFAULT_DATABASE_PATH } from '../services/storage/summary-store.js';
import { OllamaSummarizer } from '../services/summarizer/ollama-summarizer.js';
import type { Summarizer } from '../services/summarizer/types.js';
import { DEFAULT_CHUNK_SIZE, MAX_CHUNK_SIZE } from '../utils/validation.js';

export const HELP = `
Usage:
  directory-summarizer-batch <directory> [options]

Options:
  --db <path>           Summary database (local mode; default: ${DEFAULT_DATABASE_PATH})
  --remote <command>    Use an MCP server started with <command> for listing,
                        reading and saving instead of local collaborators
  --chunk-size <n>      Characters per read (default: ${DEFAULT_CHUNK_SIZE})
  --types <list>        Comma-separated extensions (local mode; default: txt,md,pdf)
  --strict              Do not save summaries that fail the schema
  --read-retries <n>    Attempts per chunk read (default: 1)
  --help                Show this help

Environment Variables:
  OLLAMA_BASE_URL, OLLAMA_MODEL, DIRECTORY_SUMMARIZER_DB_PATH
`;

export interface BatchCliOptions {
  directory: string;
  databasePath: string;
  remoteCommand: string[] | null;
  chunkSize: number;
  documentTypes: string[] | undefined;
  validationMode: ValidationMode;
  readRetries: number;
}

export type ParsedBatchArgs = { help: true } | { help: false; options: BatchCliOptions };

function parsePositiveInt(flag: string, raw: string | undefined, fallback: number, max?: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1 || (max !== undefined && value > max)) {
    throw new MCPError(
      'VALIDATION_ERROR',
      `${flag} must be an integer from 1${max !== undefined ? ` to ${max}` : ''}, got "${raw}"`
    );
  }
  return value;
}

/**
 * @throws MCPError VALIDATION_ERROR on missing or malformed arguments
 */
export function parseBatchArgs(argv: string[]): ParsedBatchArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      db: { type: 'string' },
      remote: { type: 'string' },
      'chunk-size': { type: 'string' },
      types: { type: 'string' },
      strict: { type: 'boolean' },
      'read-retries': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) return { help: true };

  const directory = positionals[0];
  if (!directory) {
    throw new MCPError('VALIDATION_ERROR', 'A directory argument is required');
  }
  if (positionals.length > 1) {
    throw new MCPError('VALIDATION_ERROR', `Unexpected arguments: ${positionals.slice(1).join(' ')}`);
  }

  const remoteCommand = values.remote?.trim().split(/\s+/).filter(Boolean) ?? null;
  if (remoteCommand !== null && remoteCommand.length === 0) {
    throw new MCPError('VALIDATION_ERROR', '--remote needs a command');
  }

  const documentTypes = values.types
    ?.split(',')
    .map((t) => t.trim().replace(/^\./, ''))
    .filter(Boolean);

  return {
    help: false,
    options: {
      directory,
      databasePath: values.db || process.env.DIRECTORY_SUMMARIZER_DB_PATH || DEFAULT_DATABASE_PATH,
      remoteCommand,
      chunkSize: parsePositiveInt('--chunk-size', values['chunk-size'], DEFAULT_CHUNK_SIZE, MAX_CHUNK_SIZE),
      documentTypes: documentTypes && documentTypes.length > 0 ? documentTypes : undefined,
      validationMode: values.strict ? 'strict' : 'demote',
      readRetries: parsePositiveInt('--read-retries', values['read-retries'], 1),
    },
  };
}

interface CollaboratorSession {
  collaborators: DocumentCollaborators;
  close: () => Promise<void>;
}

async function openCollaborators(options: BatchCliOptions): Promise<CollaboratorSession> {
  if (options.remoteCommand) {
    const [command, ...args] = options.remoteCommand;
    return connectStdioCollaborators({ command, args });
  }
  const store = SummaryStore.open(options.databasePath);
  return {
    collaborators: new LocalCollaborators(store, options.documentTypes),
    close: async () => store.close(),
  };
}

export function exitCodeFor(result: RunResult): number {
  return result.unresolved > 0 ? 2 : 0;
}

/**
 * Run one batch and write the RunResult to `out`.
 *
 * @returns the process exit code
 */
export async function runBatchCli(
  argv: string[],
  deps: {
    summarizer?: Summarizer;
    signal?: AbortSignal;
    out?: (text: string) => void;
  } = {}
): Promise<number> {
  const out = deps.out ?? ((text: string) => process.stdout.write(text));

  let parsed: ParsedBatchArgs;
  try {
    parsed = parseBatchArgs(argv);
  } catch (error) {
    console.error(`[batch] ${error instanceof Error ? error.message : String(error)}`);
    console.error(HELP);
    return 1;
  }
  if (parsed.help) {
    out(HELP);
    return 0;
  }
  const { options } = parsed;

  let session: CollaboratorSession;
  try {
    session = await openCollaborators(options);
  } catch (error) {
    const mcpError = MCPError.fromUnknown(error);
    console.error(`[batch] ${mcpError.category}: ${mcpError.message}`);
    return 1;
  }

  try {
    const orchestrator = new BatchOrchestrator(
      session.collaborators,
      deps.summarizer ?? new OllamaSummarizer(),
      {
        reader: { chunkSize: options.chunkSize, retry: { maxAttempts: options.readRetries } },
        validationMode: options.validationMode,
      }
    );
    const result = await orchestrator.run(options.directory, {
      signal: deps.signal,
      onDocument: (outcome, index, total) => {
        const suffix = outcome.error ? ` - ${outcome.error.message}` : '';
        console.error(`[batch] ${index + 1}/${total} ${outcome.filename}: ${outcome.status}${suffix}`);
      },
    });
    out(`${JSON.stringify(result, null, 2)}\n`);
    return exitCodeFor(result);
  } catch (error) {
    const mcpError = MCPError.fromUnknown(error);
    console.error(`[batch] ${mcpError.category}: ${mcpError.message}`);
    if (error instanceof PersistenceError && error.partialResult) {
      out(`${JSON.stringify(error.partialResult, null, 2)}\n`);
    } else if (error instanceof RunCancelledError) {
      out(`${JSON.stringify(error.partialResult, null, 2)}\n`);
    }
    return 1;
  } finally {
    await session.close();
  }
}
