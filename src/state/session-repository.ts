/**
 * Session repository - ingestion session records on the sql.js store
 */

import { Store, Row, readText, readOptionalText, readNumber, readJson, isRecord } from './database';
import { SessionRepository } from './ports';
import { Session, SessionMetadata, SessionStatus } from './types';

function toStatus(value: string): SessionStatus {
  return value === 'completed' || value === 'failed' ? value : 'uploading';
}

function toMetadata(value: unknown): SessionMetadata | undefined {
  if (!isRecord(value)) return undefined;
  const metadata: SessionMetadata = {};
  if (typeof value.query === 'string') metadata.query = value.query;
  if (typeof value.location === 'string') metadata.location = value.location;
  if (Array.isArray(value.sources)) {
    metadata.sources = value.sources.filter((s): s is string => typeof s === 'string');
  }
  return metadata;
}

function rowToSession(row: Row): Session {
  return {
    sessionId: readText(row, 'session_id'),
    status: toStatus(readText(row, 'status')),
    requestedCount: readNumber(row, 'requested_count'),
    insertedCount: readNumber(row, 'inserted_count'),
    updatedCount: readNumber(row, 'updated_count'),
    verifiedCount: readNumber(row, 'verified_count'),
    failedCount: readNumber(row, 'failed_count'),
    createdAt: readNumber(row, 'created_at'),
    updatedAt: readNumber(row, 'updated_at'),
    lastError: readOptionalText(row, 'last_error'),
    metadata: toMetadata(readJson(row, 'metadata')),
  };
}

export class SqlSessionRepository implements SessionRepository {
  constructor(private readonly store: Store) {}

  async get(sessionId: string): Promise<Session | null> {
    const row = this.store.prepare('SELECT * FROM sessions WHERE session_id = ?').get(sessionId);
    return row ? rowToSession(row) : null;
  }

  // Upsert by session id
  async save(session: Session): Promise<void> {
    const stmt = this.store.prepare(`
      INSERT INTO sessions (
        session_id, status, requested_count, inserted_count, updated_count,
        verified_count, failed_count, created_at, updated_at, last_error, metadata
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(session_id) DO UPDATE SET
        status = excluded.status,
        requested_count = excluded.requested_count,
        inserted_count = excluded.inserted_count,
        updated_count = excluded.updated_count,
        verified_count = excluded.verified_count,
        failed_count = excluded.failed_count,
        updated_at = excluded.updated_at,
        last_error = excluded.last_error,
        metadata = excluded.metadata
    `);

    stmt.run(
      session.sessionId,
      session.status,
      session.requestedCount,
      session.insertedCount,
      session.updatedCount,
      session.verifiedCount,
      session.failedCount,
      session.createdAt,
      session.updatedAt,
      session.lastError,
      session.metadata ? JSON.stringify(session.metadata) : null
    );
  }

  async listRecent(limit: number): Promise<Session[]> {
    return this.store
      .prepare('SELECT * FROM sessions ORDER BY created_at DESC, rowid DESC LIMIT ?')
      .all(limit)
      .map(rowToSession);
  }
}
