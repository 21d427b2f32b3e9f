import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TestStore, openTestStore } from '../test-helpers';

describe('SqlIdempotencyGuard', () => {
  let t: TestStore;

  beforeEach(async () => {
    t = await openTestStore();
  });

  afterEach(() => {
    t.store.close();
  });

  it('lets only the first caller claim a key', async () => {
    expect(await t.guard.claim('email:k1', 'email')).toBe(true);
    expect(await t.guard.claim('email:k1', 'email')).toBe(false);
    expect(await t.guard.has('email:k1')).toBe(true);
  });

  it('keeps keys independent', async () => {
    await t.guard.claim('email:k1', 'email');

    expect(await t.guard.claim('email:k2', 'email')).toBe(true);
    expect(await t.guard.has('reply:k1')).toBe(false);
  });

  it('allows a released key to be claimed again', async () => {
    await t.guard.claim('pipeline:S1:k1', 'pipeline');
    await t.guard.release('pipeline:S1:k1');

    expect(await t.guard.has('pipeline:S1:k1')).toBe(false);
    expect(await t.guard.claim('pipeline:S1:k1', 'pipeline')).toBe(true);
  });
});
