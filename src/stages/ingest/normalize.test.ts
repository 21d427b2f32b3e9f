import { describe, it, expect } from 'vitest';
import { computeIdentityKey, normalizeKeyPart, normalizeRecord, parseRecord } from './normalize';
import { ValidationError } from '../../lib/errors';

describe('normalizeKeyPart', () => {
  it('folds accents, drops apostrophes and collapses punctuation', () => {
    expect(normalizeKeyPart('  Joe’s Café & Bar ')).toBe('joes cafe bar');
  });

  it('keeps digits and letters from other scripts', () => {
    expect(normalizeKeyPart('12-B, Straße')).toBe('12 b straße');
  });
});

describe('computeIdentityKey', () => {
  it('gives the same key for differently formatted copies of a place', () => {
    const a = computeIdentityKey("Joe's Cafe", '12 Main St.');
    const b = computeIdentityKey('JOE’S CAFÉ', '12 main st');
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{16}$/);
  });

  it('separates places that only share a name', () => {
    expect(computeIdentityKey('Joe Cafe', '1 Main St')).not.toBe(computeIdentityKey('Joe Cafe', '2 Main St'));
  });
});

describe('normalizeRecord', () => {
  it('keeps original casing in stored fields', () => {
    const result = normalizeRecord(
      { name: "  Joe's Cafe ", address: '1 Main St', phone: '555-1111', sourceProvider: 'map_search' },
      0
    );
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record.name).toBe("Joe's Cafe");
    expect(result.record.address).toBe('1 Main St');
    expect(result.record.phone).toBe('555-1111');
    expect(result.record.identityKey).toBe(computeIdentityKey("Joe's Cafe", '1 Main St'));
  });

  it('rejects a record without a name', () => {
    const result = normalizeRecord({ address: '1 Main St', sourceProvider: 'map_search' }, 4);
    expect(result).toEqual({ ok: false, error: { index: 4, name: undefined, reason: 'name is required' } });
  });

  it('treats placeholder strings as missing', () => {
    const result = normalizeRecord({ name: 'N/A', address: '1 Main St', sourceProvider: 'map_search' }, 0);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe('name is required');
  });

  it('rejects ratings outside 0-5', () => {
    const result = normalizeRecord({ name: 'A', address: 'B', sourceProvider: 'map_search', rating: 9 }, 2);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual({ index: 2, name: 'A', reason: 'rating must be between 0 and 5' });
  });

  it('rejects non-numeric ratings', () => {
    const result = normalizeRecord({ name: 'A', address: 'B', sourceProvider: 'map_search', rating: 'great' }, 0);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe('rating must be a number');
  });

  it('parses numeric rating strings', () => {
    const result = normalizeRecord({ name: 'A', address: 'B', sourceProvider: 'map_search', rating: '4.5' }, 0);
    expect(result.ok && result.record.rating).toBe(4.5);
  });

  it('accepts `source` as the provider tag', () => {
    const result = normalizeRecord({ name: 'A', address: 'B', source: 'cluster_search' }, 0);
    expect(result.ok && result.record.sourceProvider).toBe('cluster_search');
  });

  it('drops unusable emails without rejecting the record', () => {
    const placeholder = normalizeRecord({ name: 'A', address: 'B', sourceProvider: 'm', email: 'null' }, 0);
    const malformed = normalizeRecord({ name: 'A', address: 'B', sourceProvider: 'm', email: 'not-an-email' }, 1);
    expect(placeholder.ok && placeholder.record.email).toBeUndefined();
    expect(malformed.ok && malformed.record.email).toBeUndefined();
  });

  it('keeps unknown producer fields as attributes', () => {
    const result = normalizeRecord(
      { name: 'A', address: 'B', sourceProvider: 'map_search', fsqId: 'abc', note: 'n/a', distance: 120 },
      0
    );
    expect(result.ok && result.record.attributes).toEqual({ fsqId: 'abc', distance: 120 });
  });

  it('rejects values that are not objects', () => {
    expect(normalizeRecord('Joe', 3)).toEqual({ ok: false, error: { index: 3, reason: 'record must be an object' } });
  });
});

describe('parseRecord', () => {
  it('returns the normalized record for a valid input', () => {
    const record = parseRecord({ name: "Joe's Cafe", address: '1 Main St', sourceProvider: 'map_search' }, 0);
    expect(record.identityKey).toBe(computeIdentityKey("Joe's Cafe", '1 Main St'));
  });

  it('throws a ValidationError carrying the index, name and reason', () => {
    let caught: unknown;
    try {
      parseRecord({ name: 'Bad Rating', address: '3 Main St', sourceProvider: 'map_search', rating: 9 }, 2);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      code: 'validation',
      index: 2,
      recordName: 'Bad Rating',
      message: 'rating must be between 0 and 5',
    });
  });
});
