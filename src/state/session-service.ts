/**
 * Session service - lifecycle of an ingestion session
 * uploading -> completed | failed, and nothing moves out of a terminal state
 */

import { SessionRepository } from './ports';
import { Session, SessionMetadata, SessionStatus } from './types';
import { InvalidTransitionError, SessionClosedError } from '../lib/errors';
import { Clock } from '../lib/utils';
import { logger } from '../lib/logger';

export interface SessionCounts {
  insertedCount: number;
  updatedCount: number;
  verifiedCount: number;
  failedCount: number;
}

export function isTerminal(status: SessionStatus): boolean {
  return status === 'completed' || status === 'failed';
}

export class SessionService {
  constructor(
    private readonly repository: SessionRepository,
    private readonly now: Clock = Date.now
  ) {}

  get(sessionId: string): Promise<Session | null> {
    return this.repository.get(sessionId);
  }

  // Create (or resume) the session in `uploading` before any lead is written
  async open(sessionId: string, requestedCount: number, metadata?: SessionMetadata): Promise<Session> {
    const existing = await this.repository.get(sessionId);
    if (existing && isTerminal(existing.status)) {
      throw new SessionClosedError(sessionId, existing.status);
    }

    const now = this.now();
    const session: Session = {
      sessionId,
      status: 'uploading',
      requestedCount,
      insertedCount: 0,
      updatedCount: 0,
      verifiedCount: 0,
      failedCount: 0,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
      metadata: metadata ?? existing?.metadata,
    };

    await this.repository.save(session);
    logger.info('Opened session', { sessionId, requestedCount, resumed: existing !== null });
    return session;
  }

  async complete(sessionId: string, counts: SessionCounts): Promise<Session> {
    return this.finish(sessionId, 'completed', counts);
  }

  async fail(sessionId: string, lastError: string, counts?: Partial<SessionCounts>): Promise<Session> {
    return this.finish(sessionId, 'failed', counts ?? {}, lastError);
  }

  // Terminal sessions only ever get their updatedAt bumped
  async touch(sessionId: string): Promise<void> {
    const session = await this.repository.get(sessionId);
    if (!session) return;
    await this.repository.save({ ...session, updatedAt: this.now() });
  }

  private async finish(
    sessionId: string,
    status: Exclude<SessionStatus, 'uploading'>,
    counts: Partial<SessionCounts>,
    lastError?: string
  ): Promise<Session> {
    const current = await this.repository.get(sessionId);
    if (!current) {
      throw new InvalidTransitionError(`Session ${sessionId} does not exist`);
    }
    if (isTerminal(current.status)) {
      throw new InvalidTransitionError(
        `Session ${sessionId} cannot move from ${current.status} to ${status}`
      );
    }

    const session: Session = {
      ...current,
      ...counts,
      status,
      lastError,
      updatedAt: this.now(),
    };

    await this.repository.save(session);
    if (status === 'completed') {
      logger.info('Completed session', { sessionId, verifiedCount: session.verifiedCount });
    } else {
      logger.error('Session failed', { sessionId, lastError });
    }
    return session;
  }
}
