/**
 * Write verifier
 * Blocks a consumer until a session's leads are durably visible, or gives up after maxWaitMs.
 * The live row count outranks the session status: a dropped status update never hides written leads.
 */

import { LeadRepository, SessionRepository } from '../../state/ports';
import { SessionStatus } from '../../state/types';
import { VerificationTimeoutError, errorMessage } from '../../lib/errors';
import { Clock, Sleep, sleep } from '../../lib/utils';
import { logger } from '../../lib/logger';

export type VerifyReason = 'completed' | 'failed' | 'timeout_with_rows' | 'timeout_empty';

export interface VerifyResult {
  ready: boolean;
  verifiedCount: number;
  status: SessionStatus | 'missing';
  reason: VerifyReason;
  polls: number;
  waitedMs: number;
}

export interface PollObservation {
  poll: number;
  status: SessionStatus | 'missing';
  count: number;
  verifiedCount: number;
}

export interface WriteVerifierOptions {
  pollIntervalMs?: number;
  maxWaitMs?: number;
  sleep?: Sleep;
  now?: Clock;
  onPoll?: (observation: PollObservation) => void;
}

export class WriteVerifier {
  private readonly pollIntervalMs: number;
  private readonly maxWaitMs: number;
  private readonly sleep: Sleep;
  private readonly now: Clock;
  private readonly onPoll?: (observation: PollObservation) => void;

  constructor(
    private readonly leads: LeadRepository,
    private readonly sessions: SessionRepository,
    options: WriteVerifierOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.maxWaitMs = options.maxWaitMs ?? 30000;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.onPoll = options.onPoll;
  }

  async waitForSessionReady(sessionId: string, maxWaitMs = this.maxWaitMs): Promise<VerifyResult> {
    const log = logger.child({ stage: 'verify', sessionId });
    const startedAt = this.now();
    let verifiedCount = 0;
    let status: SessionStatus | 'missing' = 'missing';
    let polls = 0;

    for (;;) {
      polls++;
      let count = 0;

      // A failed read counts as an empty poll; the deadline still bounds the wait
      try {
        const session = await this.sessions.get(sessionId);
        status = session ? session.status : 'missing';
        count = await this.leads.countBySession(sessionId);
      } catch (error) {
        log.warn('Verification poll failed', { poll: polls, error: errorMessage(error) });
      }

      verifiedCount = Math.max(verifiedCount, count);
      this.onPoll?.({ poll: polls, status, count, verifiedCount });

      const waitedMs = this.now() - startedAt;

      if (status === 'completed' && verifiedCount > 0) {
        return this.finish(log, { ready: true, verifiedCount, status, reason: 'completed', polls, waitedMs });
      }
      if (status === 'failed') {
        return this.finish(log, { ready: false, verifiedCount, status, reason: 'failed', polls, waitedMs });
      }

      if (waitedMs >= maxWaitMs) {
        const ready = verifiedCount > 0;
        return this.finish(log, {
          ready,
          verifiedCount,
          status,
          reason: ready ? 'timeout_with_rows' : 'timeout_empty',
          polls,
          waitedMs,
        });
      }

      log.debug('Session not ready yet', { status, verifiedCount, waitedMs });
      await this.sleep(Math.min(this.pollIntervalMs, maxWaitMs - waitedMs));
    }
  }

  // Same wait, but a session that never becomes ready is an error
  async requireSessionReady(sessionId: string, maxWaitMs = this.maxWaitMs): Promise<VerifyResult> {
    const result = await this.waitForSessionReady(sessionId, maxWaitMs);
    if (!result.ready) {
      throw new VerificationTimeoutError(sessionId, result.verifiedCount, result.waitedMs);
    }
    return result;
  }

  private finish(log: typeof logger, result: VerifyResult): VerifyResult {
    if (result.ready) {
      log.info('Session verified', { reason: result.reason, verifiedCount: result.verifiedCount, polls: result.polls });
    } else {
      log.warn('Session not verified', { reason: result.reason, status: result.status, polls: result.polls });
    }
    return result;
  }
}
