/**
 * Storage ports
 * Components take these in their constructors; the sql.js classes are one implementation
 */

import { Lead, LeadQuery, PipelineRun, Session } from './types';

export interface LeadRepository {
  findByIdentityKey(identityKey: string): Promise<Lead | null>;
  insert(lead: Lead): Promise<void>;
  update(lead: Lead): Promise<void>;
  countBySession(sessionId: string): Promise<number>;
  // Newest first by updatedAt
  query(query: LeadQuery): Promise<Lead[]>;
}

export interface SessionRepository {
  get(sessionId: string): Promise<Session | null>;
  save(session: Session): Promise<void>;
  listRecent(limit: number): Promise<Session[]>;
}

export interface PipelineRunRepository {
  save(run: PipelineRun): Promise<void>;
  get(runId: string): Promise<PipelineRun | null>;
  listBySession(sessionId: string): Promise<PipelineRun[]>;
  latestForLead(leadId: string): Promise<PipelineRun | null>;
}

export interface IdempotencyGuard {
  // True when this caller is the first to claim the key
  claim(key: string, scope: string): Promise<boolean>;
  release(key: string): Promise<void>;
  has(key: string): Promise<boolean>;
}
