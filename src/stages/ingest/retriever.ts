/**
 * Lead retriever
 * Fetches a session's leads through a fallback cascade, retrying on errors and empty reads
 */

import { LeadRepository } from '../../state/ports';
import { Lead, LeadQuery } from '../../state/types';
import { errorMessage } from '../../lib/errors';
import { Sleep, backoffDelay, sleep, withDeadline } from '../../lib/utils';
import { logger } from '../../lib/logger';

export type RetrievalStrategy = 'session_with_email' | 'session_any' | 'recent_with_email' | 'recent_any';

export interface RetrievalResult {
  leads: Lead[];
  strategy: RetrievalStrategy | null;
  attempts: number;
}

export interface LeadRetrieverOptions {
  attempts?: number;
  backoffMs?: number;
  attemptTimeoutMs?: number;
  sleep?: Sleep;
}

interface Step {
  strategy: RetrievalStrategy;
  query: (sessionId: string, limit: number) => LeadQuery;
}

// Narrowest first; the last two steps fall back to leads from any session
const CASCADE: Step[] = [
  { strategy: 'session_with_email', query: (sessionId, limit) => ({ sessionId, requireEmail: true, limit }) },
  { strategy: 'session_any', query: (sessionId, limit) => ({ sessionId, limit }) },
  { strategy: 'recent_with_email', query: (_, limit) => ({ requireEmail: true, limit }) },
  { strategy: 'recent_any', query: (_, limit) => ({ limit }) },
];

export class LeadRetriever {
  private readonly attempts: number;
  private readonly backoffMs: number;
  private readonly attemptTimeoutMs: number;
  private readonly sleep: Sleep;

  constructor(
    private readonly leads: LeadRepository,
    options: LeadRetrieverOptions = {}
  ) {
    this.attempts = options.attempts ?? 5;
    this.backoffMs = options.backoffMs ?? 1000;
    this.attemptTimeoutMs = options.attemptTimeoutMs ?? 10000;
    this.sleep = options.sleep ?? sleep;
  }

  async fetchSessionLeads(sessionId: string, limit: number): Promise<Lead[]> {
    const result = await this.retrieve(sessionId, limit);
    return result.leads;
  }

  async retrieve(sessionId: string, limit: number): Promise<RetrievalResult> {
    const log = logger.child({ stage: 'retrieve', sessionId });
    let lastError: unknown;
    let erroredAttempts = 0;

    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      try {
        const found = await withDeadline(() => this.runCascade(sessionId, limit), this.attemptTimeoutMs);
        if (found) {
          log.info(`Retrieved ${found.leads.length} leads`, { strategy: found.strategy, attempt });
          return { ...found, attempts: attempt };
        }
        log.debug('Cascade returned no leads', { attempt });
      } catch (error) {
        lastError = error;
        erroredAttempts++;
        log.warn('Retrieval attempt failed', { attempt, error: errorMessage(error) });
      }

      if (attempt < this.attempts) {
        await this.sleep(backoffDelay(attempt, this.backoffMs, 'linear'));
      }
    }

    // Nothing but errors: the caller should hear about it rather than see an empty session
    if (erroredAttempts === this.attempts && lastError !== undefined) {
      throw lastError;
    }

    log.warn('No leads found after all attempts', { attempts: this.attempts });
    return { leads: [], strategy: null, attempts: this.attempts };
  }

  private async runCascade(
    sessionId: string,
    limit: number
  ): Promise<{ leads: Lead[]; strategy: RetrievalStrategy } | null> {
    for (const step of CASCADE) {
      const leads = await this.leads.query(step.query(sessionId, limit));
      if (leads.length > 0) {
        return { leads, strategy: step.strategy };
      }
    }
    return null;
  }
}
