/**
 * Lead store writer
 * Idempotent, session-tagged upsert of one producer batch, verified by an independent re-count
 */

import { LeadRepository } from '../../state/ports';
import { SessionService } from '../../state/session-service';
import {
  Lead,
  NormalizedRecord,
  RecordValidationError,
  RecordWriteFailure,
  SessionMetadata,
  WriteReport,
} from '../../state/types';
import { parseRecord } from './normalize';
import { dedupeBatch } from './dedupe';
import {
  errorMessage,
  SessionClosedError,
  StoreUnavailableError,
  ValidationError,
  WriteError,
} from '../../lib/errors';
import { Clock } from '../../lib/utils';
import { logger } from '../../lib/logger';

// Same-key insert races are retried as merges this many times
const MAX_WRITE_ATTEMPTS = 3;

type WriteOutcome = 'inserted' | 'updated';

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && /UNIQUE constraint failed/i.test(error.message);
}

export function leadFromRecord(record: NormalizedRecord, sessionId: string, now: number): Lead {
  return {
    identityKey: record.identityKey,
    name: record.name,
    address: record.address,
    phone: record.phone,
    email: record.email,
    website: record.website,
    category: record.category,
    rating: record.rating,
    sourceProvider: record.sourceProvider,
    sessionId,
    attributes: { ...record.attributes },
    status: 'new',
    createdAt: now,
    updatedAt: now,
  };
}

// Incoming non-null values win; missing values never erase what is stored
export function mergeLead(existing: Lead, incoming: NormalizedRecord, sessionId: string, now: number): Lead {
  return {
    ...existing,
    name: incoming.name,
    address: incoming.address,
    phone: incoming.phone ?? existing.phone,
    email: incoming.email ?? existing.email,
    website: incoming.website ?? existing.website,
    category: incoming.category ?? existing.category,
    rating: incoming.rating ?? existing.rating,
    sourceProvider: incoming.sourceProvider,
    sessionId,
    attributes: { ...existing.attributes, ...incoming.attributes },
    updatedAt: now,
  };
}

export interface LeadStoreWriterDeps {
  leads: LeadRepository;
  sessions: SessionService;
  now?: Clock;
}

export class LeadStoreWriter {
  private readonly leads: LeadRepository;
  private readonly sessions: SessionService;
  private readonly now: Clock;

  constructor(deps: LeadStoreWriterDeps) {
    this.leads = deps.leads;
    this.sessions = deps.sessions;
    this.now = deps.now ?? Date.now;
  }

  async upsert(sessionId: string, batch: readonly unknown[], metadata?: SessionMetadata): Promise<WriteReport> {
    const log = logger.child({ stage: 'ingest', sessionId });

    try {
      await this.sessions.open(sessionId, batch.length, metadata);
    } catch (error) {
      if (error instanceof SessionClosedError) {
        await this.refuse(sessionId);
        throw error;
      }
      throw await this.abort(sessionId, error);
    }

    const validationErrors: RecordValidationError[] = [];
    const valid: NormalizedRecord[] = [];

    batch.forEach((raw, index) => {
      try {
        valid.push(parseRecord(raw, index));
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        validationErrors.push({ index: error.index, name: error.recordName, reason: error.message });
        log.logFailure(`record ${index}`, 'validation', { name: error.recordName, reason: error.message });
      }
    });

    const { records, collapsed } = dedupeBatch(valid);
    log.info(`Writing ${records.length} leads`, {
      requested: batch.length,
      rejected: validationErrors.length,
      collapsed,
    });

    const failures: RecordWriteFailure[] = [];
    let insertedCount = 0;
    let updatedCount = 0;

    for (const record of records) {
      try {
        const outcome = await this.writeOne(record, sessionId);
        if (outcome === 'inserted') insertedCount++;
        else updatedCount++;
      } catch (error) {
        if (error instanceof StoreUnavailableError) {
          throw await this.abort(sessionId, error, { insertedCount, updatedCount });
        }
        failures.push({ identityKey: record.identityKey, name: record.name, error: errorMessage(error) });
        log.logFailure(record.identityKey, 'merge', { name: record.name, error: errorMessage(error) });
      }
    }

    // Count what is actually visible rather than trusting the counters above
    let verifiedCount: number;
    try {
      verifiedCount = await this.leads.countBySession(sessionId);
    } catch (error) {
      throw await this.abort(sessionId, error, { insertedCount, updatedCount });
    }

    const failedCount = validationErrors.length + failures.length;
    const counts = { insertedCount, updatedCount, verifiedCount, failedCount };

    let lastError: string | undefined;
    try {
      if (verifiedCount > 0) {
        await this.sessions.complete(sessionId, counts);
      } else {
        lastError = `No leads visible for session after write (${validationErrors.length} rejected, ${failures.length} failed)`;
        await this.sessions.fail(sessionId, lastError, counts);
      }
    } catch (error) {
      throw await this.abort(sessionId, error, counts);
    }

    const report: WriteReport = {
      sessionId,
      status: verifiedCount > 0 ? 'completed' : 'failed',
      requestedCount: batch.length,
      validCount: valid.length,
      collapsedCount: collapsed,
      insertedCount,
      updatedCount,
      failedCount,
      verifiedCount,
      validationErrors,
      failures,
      lastError,
    };

    log.info('Batch written', { ...counts, status: report.status });
    return report;
  }

  private async writeOne(record: NormalizedRecord, sessionId: string): Promise<WriteOutcome> {
    for (let attempt = 1; ; attempt++) {
      const now = this.now();
      const existing = await this.leads.findByIdentityKey(record.identityKey);

      try {
        if (existing) {
          await this.leads.update(mergeLead(existing, record, sessionId, now));
          return 'updated';
        }
        await this.leads.insert(leadFromRecord(record, sessionId, now));
        return 'inserted';
      } catch (error) {
        // Another writer inserted the same key between our read and write
        if (!existing && isUniqueViolation(error) && attempt < MAX_WRITE_ATTEMPTS) {
          continue;
        }
        throw error;
      }
    }
  }

  // A finished session keeps its status; the late attempt only shows up in updatedAt
  private async refuse(sessionId: string): Promise<void> {
    try {
      await this.sessions.touch(sessionId);
    } catch (error) {
      throw await this.abort(sessionId, error);
    }
    logger.warn('Refused write into a finished session', { sessionId });
  }

  // Marks the session failed where possible and returns the error to throw
  private async abort(
    sessionId: string,
    cause: unknown,
    counts?: { insertedCount?: number; updatedCount?: number; verifiedCount?: number; failedCount?: number }
  ): Promise<Error> {
    if (!(cause instanceof StoreUnavailableError)) {
      return cause instanceof Error ? cause : new Error(String(cause));
    }

    const message = `Store unavailable: ${cause.message}`;
    try {
      await this.sessions.fail(sessionId, message, counts);
    } catch (error) {
      logger.error('Could not mark session failed', { sessionId, error: errorMessage(error) });
    }
    return new WriteError(sessionId, message, { cause });
  }
}
