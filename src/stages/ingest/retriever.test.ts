import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { LeadRetriever } from './retriever';
import { LeadRepository } from '../../state/ports';
import { Lead, LeadQuery } from '../../state/types';
import { TestStore, makeLead, openTestStore } from '../../test-helpers';

describe('LeadRetriever', () => {
  let t: TestStore;
  let delays: number[];

  beforeEach(async () => {
    t = await openTestStore();
    delays = [];
  });

  afterEach(() => {
    t.store.close();
  });

  function retriever(leads: LeadRepository = t.leads, attempts = 3): LeadRetriever {
    return new LeadRetriever(leads, {
      attempts,
      backoffMs: 1000,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });
  }

  it('prefers session leads that have an email', async () => {
    await t.leads.insert(makeLead({ identityKey: 'k1', name: 'With Email', email: 'a@shop.example', updatedAt: 1 }));
    await t.leads.insert(makeLead({ identityKey: 'k2', name: 'No Email', updatedAt: 2 }));

    const result = await retriever().retrieve('S1', 10);

    expect(result.strategy).toBe('session_with_email');
    expect(result.leads.map((l) => l.name)).toEqual(['With Email']);
    expect(result.attempts).toBe(1);
  });

  it('falls back to any lead of the session', async () => {
    await t.leads.insert(makeLead({ identityKey: 'k1', email: 'n/a' }));

    const result = await retriever().retrieve('S1', 10);

    expect(result.strategy).toBe('session_any');
    expect(result.leads).toHaveLength(1);
  });

  it('reaches recent leads with email from other sessions', async () => {
    await t.leads.insert(makeLead({ identityKey: 'k1', sessionId: 'S1', email: 'a@shop.example' }));
    await t.leads.insert(makeLead({ identityKey: 'k2', sessionId: 'S2' }));

    const result = await retriever().retrieve('S3', 10);

    expect(result.strategy).toBe('recent_with_email');
    expect(result.leads.map((l) => l.identityKey)).toEqual(['k1']);
  });

  it('ends with the most recent leads overall', async () => {
    await t.leads.insert(makeLead({ identityKey: 'old', sessionId: 'S1', updatedAt: 100 }));
    await t.leads.insert(makeLead({ identityKey: 'new', sessionId: 'S2', updatedAt: 200 }));

    const result = await retriever().retrieve('S3', 1);

    expect(result.strategy).toBe('recent_any');
    expect(result.leads.map((l) => l.identityKey)).toEqual(['new']);
  });

  it('retries with linear backoff when the store errors', async () => {
    let failures = 2;
    const flaky: LeadRepository = {
      findByIdentityKey: (key: string) => t.leads.findByIdentityKey(key),
      insert: (lead: Lead) => t.leads.insert(lead),
      update: (lead: Lead) => t.leads.update(lead),
      countBySession: (sessionId: string) => t.leads.countBySession(sessionId),
      query: async (query: LeadQuery) => {
        if (failures > 0) {
          failures--;
          throw new Error('connection reset');
        }
        return t.leads.query(query);
      },
    };
    await t.leads.insert(makeLead());

    const result = await retriever(flaky).retrieve('S1', 10);

    expect(result.attempts).toBe(3);
    expect(result.leads).toHaveLength(1);
    expect(delays).toEqual([1000, 2000]);
  });

  it('returns nothing after retrying an empty store', async () => {
    const result = await retriever().retrieve('S1', 10);

    expect(result).toEqual({ leads: [], strategy: null, attempts: 3 });
    expect(delays).toEqual([1000, 2000]);
  });

  it('throws when every attempt failed', async () => {
    const broken: LeadRepository = {
      findByIdentityKey: async () => null,
      insert: async () => undefined,
      update: async () => undefined,
      countBySession: async () => 0,
      query: async () => {
        throw new Error('store offline');
      },
    };

    await expect(retriever(broken, 2).fetchSessionLeads('S1', 10)).rejects.toThrow('store offline');
  });
});
