/**
 * SummaryStore - SQLite persistence for summary records
 *
 * One row per document_id. Saving a record for an existing document_id
 * replaces its content and keeps the original created_at. List fields are
 * stored as JSON text.
 *
 * @module services/storage/summary-store
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import { homedir } from 'os';
import path from 'path';
import type {
  SaveAcknowledgement,
  StoredSummary,
  SummaryRecord,
  SummaryStatus,
} from '../../models/summary.js';
import { validationError } from '../../server/errors.js';
import { SUMMARY_SCHEMA_VERSION, validateSummary } from '../summary/validator.js';

/**
 * Default database location
 */
export const DEFAULT_DATABASE_PATH =
  process.env.DIRECTORY_SUMMARIZER_DB_PATH ||
  path.join(homedir(), '.directory-summarizer', 'summaries.db');

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS summaries (
  document_id TEXT PRIMARY KEY,
  filename TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('completed', 'failed')),
  executive_summary TEXT NOT NULL,
  domain TEXT,
  key_arguments TEXT,
  key_models_or_frameworks TEXT,
  key_variables_or_concepts TEXT,
  failure_reason TEXT,
  schema_version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_summaries_status ON summaries(status);
CREATE INDEX IF NOT EXISTS idx_summaries_updated_at ON summaries(updated_at);
`;

interface SummaryRow {
  document_id: string;
  filename: string;
  status: string;
  executive_summary: string;
  domain: string | null;
  key_arguments: string | null;
  key_models_or_frameworks: string | null;
  key_variables_or_concepts: string | null;
  failure_reason: string | null;
  schema_version: number;
  created_at: string;
  updated_at: string;
}

type SummaryParams = [
  string,
  string,
  string,
  string,
  string | null,
  string | null,
  string | null,
  string | null,
  string | null,
  number,
  string,
  string,
];

export interface ListSummariesOptions {
  status?: SummaryStatus;
  limit?: number;
  offset?: number;
}

export class SummaryStoreError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'SummaryStoreError';
  }
}

export class SummaryStore {
  private constructor(
    private readonly db: Database.Database,
    private readonly dbPath: string
  ) {}

  /**
   * Open (creating if needed) the database at dbPath. ':memory:' is accepted.
   */
  static open(dbPath: string = DEFAULT_DATABASE_PATH): SummaryStore {
    let db: Database.Database;
    try {
      if (dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      db = new Database(dbPath);
    } catch (error) {
      throw new SummaryStoreError(
        `Cannot open summary database at ${dbPath}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
    db.exec(SCHEMA_SQL);
    return new SummaryStore(db, dbPath);
  }

  getPath(): string {
    return this.dbPath;
  }

  /**
   * Insert or replace the record for record.document_id.
   *
   * @throws MCPError VALIDATION_ERROR if the record does not match the schema
   */
  save(record: SummaryRecord): SaveAcknowledgement {
    const validation = validateSummary(record);
    if (!validation.ok) {
      throw validationError(
        `Summary record failed schema validation: ${validation.violations.join(', ')}`,
        { violations: validation.violations }
      );
    }
    const valid = validation.record;
    const now = new Date().toISOString();

    const params: SummaryParams =
      valid.status === 'completed'
        ? [
            valid.document_id,
            valid.filename,
            valid.status,
            valid.executive_summary,
            valid.domain,
            JSON.stringify(valid.key_arguments),
            valid.key_models_or_frameworks ? JSON.stringify(valid.key_models_or_frameworks) : null,
            valid.key_variables_or_concepts ? JSON.stringify(valid.key_variables_or_concepts) : null,
            null,
            SUMMARY_SCHEMA_VERSION,
            now,
            now,
          ]
        : [
            valid.document_id,
            valid.filename,
            valid.status,
            valid.executive_summary,
            null,
            null,
            null,
            null,
            valid.failure_reason,
            SUMMARY_SCHEMA_VERSION,
            now,
            now,
          ];

    this.db
      .prepare<SummaryParams>(
        `INSERT INTO summaries (
           document_id, filename, status, executive_summary, domain, key_arguments,
           key_models_or_frameworks, key_variables_or_concepts, failure_reason,
           schema_version, created_at, updated_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(document_id) DO UPDATE SET
           filename = excluded.filename,
           status = excluded.status,
           executive_summary = excluded.executive_summary,
           domain = excluded.domain,
           key_arguments = excluded.key_arguments,
           key_models_or_frameworks = excluded.key_models_or_frameworks,
           key_variables_or_concepts = excluded.key_variables_or_concepts,
           failure_reason = excluded.failure_reason,
           schema_version = excluded.schema_version,
           updated_at = excluded.updated_at`
      )
      .run(...params);

    return {
      document_id: valid.document_id,
      filename: valid.filename,
      status: valid.status,
      saved: true,
    };
  }

  get(documentId: string): StoredSummary | null {
    const row = this.db
      .prepare<[string], SummaryRow>('SELECT * FROM summaries WHERE document_id = ?')
      .get(documentId);
    return row ? rowToSummary(row) : null;
  }

  list(options: ListSummariesOptions = {}): StoredSummary[] {
    const limit = options.limit ?? 50;
    const offset = options.offset ?? 0;
    const rows = options.status
      ? this.db
          .prepare<[string, number, number], SummaryRow>(
            'SELECT * FROM summaries WHERE status = ? ORDER BY updated_at DESC, document_id LIMIT ? OFFSET ?'
          )
          .all(options.status, limit, offset)
      : this.db
          .prepare<[number, number], SummaryRow>(
            'SELECT * FROM summaries ORDER BY updated_at DESC, document_id LIMIT ? OFFSET ?'
          )
          .all(limit, offset);
    return rows.map(rowToSummary);
  }

  count(status?: SummaryStatus): number {
    const row = status
      ? this.db
          .prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM summaries WHERE status = ?')
          .get(status)
      : this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM summaries').get();
    return row?.n ?? 0;
  }

  /**
   * Connectivity check used by health_check
   */
  ping(): boolean {
    const row = this.db.prepare<[], { ok: number }>('SELECT 1 AS ok').get();
    return row?.ok === 1;
  }

  close(): void {
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[SummaryStore] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }
}

function parseJsonColumn(value: string | null, column: string, documentId: string): unknown {
  if (value === null) return undefined;
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new SummaryStoreError(`Corrupt ${column} column for ${documentId}`, error);
  }
}

function rowToSummary(row: SummaryRow): StoredSummary {
  const candidate: Record<string, unknown> = {
    document_id: row.document_id,
    filename: row.filename,
    status: row.status,
    executive_summary: row.executive_summary,
  };
  const optional: Record<string, unknown> = {
    domain: row.domain ?? undefined,
    key_arguments: parseJsonColumn(row.key_arguments, 'key_arguments', row.document_id),
    key_models_or_frameworks: parseJsonColumn(
      row.key_models_or_frameworks,
      'key_models_or_frameworks',
      row.document_id
    ),
    key_variables_or_concepts: parseJsonColumn(
      row.key_variables_or_concepts,
      'key_variables_or_concepts',
      row.document_id
    ),
    failure_reason: row.failure_reason ?? undefined,
  };
  for (const [key, value] of Object.entries(optional)) {
    if (value !== undefined) candidate[key] = value;
  }

  const validation = validateSummary(candidate);
  if (!validation.ok) {
    throw new SummaryStoreError(
      `Stored summary ${row.document_id} does not match the schema: ${validation.violations.join(', ')}`
    );
  }
  return {
    ...validation.record,
    schema_version: row.schema_version,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}
