import { describe, it, expect } from 'vitest';
import {
  backoffDelay,
  cleanString,
  isBlank,
  isE164,
  isLikelyEmail,
  mapWithConcurrency,
  normalizePhone,
  renderTemplate,
  withDeadline,
} from './utils';
import { TimeoutError } from './errors';

describe('utils', () => {
  describe('placeholders', () => {
    it('treats empty and placeholder strings as blank', () => {
      expect(isBlank(undefined)).toBe(true);
      expect(isBlank(null)).toBe(true);
      expect(isBlank('  N/A ')).toBe(true);
      expect(isBlank('null')).toBe(true);
      expect(isBlank(0)).toBe(false);
      expect(isBlank('cafe')).toBe(false);
    });

    it('cleans strings and stringifies numbers', () => {
      expect(cleanString('  Joe  ')).toBe('Joe');
      expect(cleanString('none')).toBeUndefined();
      expect(cleanString(42)).toBe('42');
      expect(cleanString({})).toBeUndefined();
    });
  });

  describe('normalizePhone', () => {
    it('produces E.164 for North American numbers', () => {
      expect(normalizePhone('(555) 111-2222')).toBe('+15551112222');
      expect(normalizePhone('1 555 111 2222')).toBe('+15551112222');
      expect(normalizePhone('+44 20 7946 0958')).toBe('+442079460958');
    });

    it('leaves numbers it cannot place untouched', () => {
      expect(normalizePhone(' 555-1111 ')).toBe('555-1111');
      expect(isE164('555-1111')).toBe(false);
      expect(isE164('+15551112222')).toBe(true);
    });
  });

  it('recognizes plausible email addresses', () => {
    expect(isLikelyEmail('owner@joes.example')).toBe(true);
    expect(isLikelyEmail('owner@joes')).toBe(false);
    expect(isLikelyEmail('not an email')).toBe(false);
  });

  it('renders {{placeholders}} and blanks unknown ones', () => {
    expect(renderTemplate('Hi {{ name }}, {{missing}}!', { name: 'Joe' })).toBe('Hi Joe, !');
  });

  it('computes linear and exponential backoff', () => {
    expect([1, 2, 3].map((a) => backoffDelay(a, 100, 'linear'))).toEqual([100, 200, 300]);
    expect([1, 2, 3].map((a) => backoffDelay(a, 100, 'exponential'))).toEqual([100, 200, 400]);
  });

  describe('withDeadline', () => {
    it('returns the result when fn finishes in time', async () => {
      await expect(withDeadline(async () => 'done', 1000)).resolves.toBe('done');
    });

    it('rejects with TimeoutError when fn overruns', async () => {
      const never = new Promise<string>(() => undefined);
      await expect(withDeadline(() => never, 10)).rejects.toBeInstanceOf(TimeoutError);
    });

    it('follows an aborted parent signal', async () => {
      const parent = new AbortController();
      parent.abort(new Error('cancelled'));

      const never = new Promise<boolean>(() => undefined);
      await expect(withDeadline(() => never, 1000, parent.signal)).rejects.toThrow('cancelled');
    });
  });

  it('maps with bounded concurrency and keeps order', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (ms, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, ms));
      inFlight--;
      return index;
    });

    expect(results).toEqual([0, 1, 2, 3]);
    expect(peak).toBe(2);
  });
});
