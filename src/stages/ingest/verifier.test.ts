import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PollObservation, WriteVerifier } from './verifier';
import { LeadStoreWriter, leadFromRecord } from './writer';
import { normalizeRecord } from './normalize';
import { LeadRepository, SessionRepository } from '../../state/ports';
import { Session } from '../../state/types';
import { VerificationTimeoutError } from '../../lib/errors';
import { FakeClock, TestStore, makeLead, makeSession, openTestStore } from '../../test-helpers';

describe('WriteVerifier', () => {
  let t: TestStore;

  beforeEach(async () => {
    t = await openTestStore();
  });

  afterEach(() => {
    t.store.close();
  });

  function verifier(options: { maxWaitMs?: number; onPoll?: (o: PollObservation) => void } = {}): WriteVerifier {
    return new WriteVerifier(t.leads, t.sessionRepository, {
      pollIntervalMs: 1000,
      maxWaitMs: options.maxWaitMs ?? 30000,
      sleep: t.clock.sleep,
      now: t.clock.now,
      onPoll: options.onPoll,
    });
  }

  it('is ready at once for a completed session with leads', async () => {
    const writer = new LeadStoreWriter({ leads: t.leads, sessions: t.sessions, now: t.clock.now });
    await writer.upsert('S1', [{ name: "Joe's Cafe", address: '1 Main St', sourceProvider: 'map_search' }]);

    const result = await verifier().waitForSessionReady('S1');

    expect(result).toMatchObject({ ready: true, reason: 'completed', verifiedCount: 1, polls: 1, waitedMs: 0 });
  });

  it('gives up at once on a failed session', async () => {
    await t.sessions.open('S1', 3);
    await t.sessions.fail('S1', 'upstream error');

    const result = await verifier().waitForSessionReady('S1');

    expect(result).toMatchObject({ ready: false, reason: 'failed', status: 'failed', polls: 1 });
  });

  it('trusts the row count when the completion update was dropped', async () => {
    await t.sessions.open('S1', 1);
    const normalized = normalizeRecord({ name: "Joe's Cafe", address: '1 Main St', sourceProvider: 'map_search' }, 0);
    if (!normalized.ok) throw new Error('fixture should be valid');
    await t.leads.insert(leadFromRecord(normalized.record, 'S1', t.clock.now()));

    const result = await verifier({ maxWaitMs: 5000 }).waitForSessionReady('S1');

    expect(result).toMatchObject({
      ready: true,
      reason: 'timeout_with_rows',
      status: 'uploading',
      verifiedCount: 1,
      polls: 6,
      waitedMs: 5000,
    });
  });

  it('is not ready when nothing shows up before the deadline', async () => {
    const result = await verifier({ maxWaitMs: 3000 }).waitForSessionReady('S-missing');

    expect(result).toMatchObject({ ready: false, reason: 'timeout_empty', status: 'missing', verifiedCount: 0, polls: 4 });
  });

  it('never reports a lower count than an earlier poll', async () => {
    const counts = [0, 2, 1, 3];
    const statuses: Session['status'][] = ['uploading', 'uploading', 'uploading', 'completed'];
    let poll = 0;

    const leads: LeadRepository = {
      findByIdentityKey: async () => null,
      insert: async () => undefined,
      update: async () => undefined,
      countBySession: async () => counts[Math.min(poll, counts.length - 1)],
      query: async () => [],
    };
    const sessions: SessionRepository = {
      get: async () => makeSession(statuses[Math.min(poll, statuses.length - 1)]),
      save: async () => undefined,
      listRecent: async () => [],
    };

    const clock = new FakeClock();
    const observed: number[] = [];
    const result = await new WriteVerifier(leads, sessions, {
      pollIntervalMs: 1000,
      maxWaitMs: 30000,
      sleep: clock.sleep,
      now: clock.now,
      onPoll: (observation) => {
        observed.push(observation.verifiedCount);
        poll++;
      },
    }).waitForSessionReady('S1');

    expect(observed).toEqual([0, 2, 2, 3]);
    expect(result).toMatchObject({ ready: true, reason: 'completed', verifiedCount: 3, polls: 4 });
  });

  it('treats a failed poll as an empty one and keeps polling', async () => {
    let calls = 0;
    const leads: LeadRepository = {
      findByIdentityKey: async () => null,
      insert: async () => undefined,
      update: async () => undefined,
      countBySession: async () => {
        calls++;
        if (calls === 1) throw new Error('read timeout');
        return 1;
      },
      query: async () => [],
    };
    const sessions: SessionRepository = {
      get: async () => makeSession('completed'),
      save: async () => undefined,
      listRecent: async () => [],
    };
    const clock = new FakeClock();

    const result = await new WriteVerifier(leads, sessions, { sleep: clock.sleep, now: clock.now }).waitForSessionReady('S1');

    expect(result).toMatchObject({ ready: true, verifiedCount: 1, polls: 2 });
  });

  it('throws from requireSessionReady when the session never becomes ready', async () => {
    await expect(verifier({ maxWaitMs: 2000 }).requireSessionReady('S-missing')).rejects.toBeInstanceOf(
      VerificationTimeoutError
    );
  });

  it('does not count leads from other sessions', async () => {
    await t.sessions.open('S1', 1);
    await t.leads.insert(makeLead({ sessionId: 'S2' }));

    const result = await verifier({ maxWaitMs: 1000 }).waitForSessionReady('S1');

    expect(result).toMatchObject({ ready: false, reason: 'timeout_empty', verifiedCount: 0 });
  });
});
