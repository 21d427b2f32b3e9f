/**
 * Shared fixtures for the test suites
 */

import { Store } from './state/database';
import { SqlLeadRepository } from './state/lead-repository';
import { SqlSessionRepository } from './state/session-repository';
import { SqlPipelineRunRepository } from './state/pipeline-run-repository';
import { SqlIdempotencyGuard } from './state/idempotency-service';
import { SessionService } from './state/session-service';
import { Lead, Session, SessionStatus } from './state/types';
import { Sleep } from './lib/utils';

export interface TestStore {
  store: Store;
  leads: SqlLeadRepository;
  sessionRepository: SqlSessionRepository;
  sessions: SessionService;
  runs: SqlPipelineRunRepository;
  guard: SqlIdempotencyGuard;
  clock: FakeClock;
}

// Time only moves when a test (or an injected sleep) moves it
export class FakeClock {
  constructor(public current = 1_700_000_000_000) {}

  readonly now = (): number => this.current;

  readonly sleep: Sleep = async (ms) => {
    this.current += ms;
  };

  advance(ms: number): void {
    this.current += ms;
  }
}

export async function openTestStore(): Promise<TestStore> {
  const store = await Store.open();
  const clock = new FakeClock();
  const sessionRepository = new SqlSessionRepository(store);
  return {
    store,
    leads: new SqlLeadRepository(store),
    sessionRepository,
    sessions: new SessionService(sessionRepository, clock.now),
    runs: new SqlPipelineRunRepository(store),
    guard: new SqlIdempotencyGuard(store, clock.now),
    clock,
  };
}

export function makeLead(overrides: Partial<Lead> = {}): Lead {
  return {
    identityKey: 'a1b2c3d4e5f60718',
    name: "Joe's Cafe",
    address: '1 Main St',
    phone: '555-111-2222',
    sourceProvider: 'map_search',
    sessionId: 'S1',
    attributes: {},
    status: 'new',
    createdAt: 1_700_000_000_000,
    updatedAt: 1_700_000_000_000,
    ...overrides,
  };
}

export function makeSession(status: SessionStatus, overrides: Partial<Session> = {}): Session {
  return {
    sessionId: 'S1',
    status,
    requestedCount: 1,
    insertedCount: 0,
    updatedCount: 0,
    verifiedCount: 0,
    failedCount: 0,
    createdAt: 1_700_000_000_000,
    updatedAt: 1_700_000_000_000,
    ...overrides,
  };
}
