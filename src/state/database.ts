/**
 * SQLite store handle
 * Uses sql.js for cross-platform compatibility (pure JS, no native compilation)
 */

import initSqlJs, { Database as SqlJsDatabase, SqlJsStatic, SqlValue } from 'sql.js';
import * as fs from 'fs';
import * as path from 'path';
import { ensureDir } from '../lib/env';
import { logger } from '../lib/logger';
import { StoreUnavailableError, errorMessage } from '../lib/errors';

export type Row = Record<string, SqlValue>;
export type Param = SqlValue | boolean | undefined;

const SCHEMA = `
-- Leads, one row per identity key
CREATE TABLE IF NOT EXISTS leads (
  identity_key TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  address TEXT NOT NULL,
  phone TEXT,
  email TEXT,
  website TEXT,
  category TEXT,
  rating REAL,
  source_provider TEXT NOT NULL,
  session_id TEXT NOT NULL,
  attributes TEXT DEFAULT '{}',
  status TEXT DEFAULT 'new',
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_leads_session ON leads(session_id);
CREATE INDEX IF NOT EXISTS idx_leads_updated ON leads(updated_at);

-- Ingestion sessions
CREATE TABLE IF NOT EXISTS sessions (
  session_id TEXT PRIMARY KEY,
  status TEXT NOT NULL,
  requested_count INTEGER DEFAULT 0,
  inserted_count INTEGER DEFAULT 0,
  updated_count INTEGER DEFAULT 0,
  verified_count INTEGER DEFAULT 0,
  failed_count INTEGER DEFAULT 0,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  last_error TEXT,
  metadata TEXT
);

CREATE INDEX IF NOT EXISTS idx_sessions_created ON sessions(created_at);

-- Per-lead pipeline runs
CREATE TABLE IF NOT EXISTS pipeline_runs (
  run_id TEXT PRIMARY KEY,
  lead_id TEXT NOT NULL,
  session_id TEXT NOT NULL,
  stage TEXT NOT NULL,
  stage_status TEXT NOT NULL,
  stages TEXT DEFAULT '[]',
  branch_decision TEXT,
  classification_note TEXT,
  call_outcome TEXT,
  call_id TEXT,
  transcript TEXT,
  email_sent INTEGER,
  email_recipient TEXT,
  meeting_id TEXT,
  started_at INTEGER NOT NULL,
  completed_at INTEGER,
  error TEXT
);

CREATE INDEX IF NOT EXISTS idx_runs_session ON pipeline_runs(session_id);
CREATE INDEX IF NOT EXISTS idx_runs_lead ON pipeline_runs(lead_id);

-- Idempotency keys for events and side effects
CREATE TABLE IF NOT EXISTS processed_events (
  event_key TEXT PRIMARY KEY,
  scope TEXT NOT NULL,
  processed_at INTEGER NOT NULL
);
`;

let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs();
  }
  return sqlJs;
}

export interface StoreOptions {
  // Omit for an in-memory store
  path?: string;
}

export class Store {
  private db: SqlJsDatabase | null;
  private readonly filePath?: string;

  private constructor(db: SqlJsDatabase, filePath?: string) {
    this.db = db;
    this.filePath = filePath;
  }

  static async open(options: StoreOptions = {}): Promise<Store> {
    const SQL = await loadSqlJs();
    let db: SqlJsDatabase;

    if (options.path) {
      ensureDir(path.dirname(options.path));
      if (fs.existsSync(options.path)) {
        db = new SQL.Database(fs.readFileSync(options.path));
        logger.info(`Loaded existing database at ${options.path}`);
      } else {
        db = new SQL.Database();
        logger.info(`Created new database at ${options.path}`);
      }
    } else {
      db = new SQL.Database();
    }

    // Initialize schema
    db.exec(SCHEMA);

    const store = new Store(db, options.path);
    store.flush();
    return store;
  }

  // Throws StoreUnavailableError once the handle is closed
  connection(): SqlJsDatabase {
    if (!this.db) {
      throw new StoreUnavailableError('Store is closed');
    }
    return this.db;
  }

  prepare(sql: string): StatementWrapper {
    return new StatementWrapper(this, sql);
  }

  // Persist to disk; a no-op for in-memory stores
  flush(): void {
    if (!this.db || !this.filePath) return;
    try {
      fs.writeFileSync(this.filePath, Buffer.from(this.db.export()));
    } catch (error) {
      throw new StoreUnavailableError(`Could not write ${this.filePath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  close(): void {
    const db = this.db;
    if (!db) return;
    try {
      this.flush();
    } finally {
      db.close();
      this.db = null;
      logger.debug('Database connection closed');
    }
  }
}

// Convert undefined to null and booleans to 0/1 for sql.js
function sanitizeParams(params: Param[]): SqlValue[] {
  return params.map((p) => {
    if (p === undefined) return null;
    if (typeof p === 'boolean') return p ? 1 : 0;
    return p;
  });
}

export class StatementWrapper {
  private readonly store: Store;
  private readonly sql: string;

  constructor(store: Store, sql: string) {
    this.store = store;
    this.sql = sql;
  }

  run(...params: Param[]): { changes: number } {
    const db = this.store.connection();
    db.run(this.sql, sanitizeParams(params));
    const changes = db.getRowsModified();
    this.store.flush();
    return { changes };
  }

  get(...params: Param[]): Row | undefined {
    const stmt = this.store.connection().prepare(this.sql);
    try {
      stmt.bind(sanitizeParams(params));
      return stmt.step() ? stmt.getAsObject() : undefined;
    } finally {
      stmt.free();
    }
  }

  all(...params: Param[]): Row[] {
    const results: Row[] = [];
    const stmt = this.store.connection().prepare(this.sql);
    try {
      stmt.bind(sanitizeParams(params));
      while (stmt.step()) {
        results.push(stmt.getAsObject());
      }
    } finally {
      stmt.free();
    }
    return results;
  }
}

// Column readers; sql.js hands back SqlValue for every cell
export function readText(row: Row, column: string): string {
  const value = row[column];
  return typeof value === 'string' ? value : value === null || value === undefined ? '' : String(value);
}

export function readOptionalText(row: Row, column: string): string | undefined {
  const value = row[column];
  if (value === null || value === undefined) return undefined;
  return typeof value === 'string' ? value : String(value);
}

export function readNumber(row: Row, column: string): number {
  const value = row[column];
  return typeof value === 'number' ? value : Number(value ?? 0);
}

export function readOptionalNumber(row: Row, column: string): number | undefined {
  const value = row[column];
  return typeof value === 'number' ? value : undefined;
}

export function readJson(row: Row, column: string): unknown {
  const value = row[column];
  if (typeof value !== 'string' || value === '') return undefined;
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
