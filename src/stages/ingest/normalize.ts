/**
 * Record normalizer
 * Turns an untrusted producer record into a NormalizedRecord, or says why it can't
 */

import * as crypto from 'crypto';
import { z } from 'zod';
import { NormalizedRecord, RawRecord, RecordValidationError } from '../../state/types';
import { cleanString, isLikelyEmail } from '../../lib/utils';
import { ValidationError } from '../../lib/errors';

const KNOWN_FIELDS = new Set([
  'name',
  'address',
  'phone',
  'email',
  'website',
  'category',
  'rating',
  'sourceProvider',
  'source',
]);

// The single normalization used for every identity computation
export function normalizeKeyPart(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/['\u2019`]/g, '')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

export function computeIdentityKey(name: string, address: string): string {
  const components = `${normalizeKeyPart(name)}|${normalizeKeyPart(address)}`;
  return crypto.createHash('sha256').update(components).digest('hex').substring(0, 16);
}

function toRating(value: unknown): unknown {
  if (typeof value === 'string') {
    const text = cleanString(value);
    return text === undefined ? undefined : Number(text);
  }
  return value ?? undefined;
}

const requiredText = (field: string) =>
  z.preprocess(cleanString, z.string({ required_error: `${field} is required` }));

const optionalText = z.preprocess(cleanString, z.string().optional());

const rawRecordSchema = z.object({
  name: requiredText('name'),
  address: requiredText('address'),
  sourceProvider: requiredText('sourceProvider'),
  phone: optionalText,
  email: optionalText,
  website: optionalText,
  category: optionalText,
  rating: z.preprocess(
    toRating,
    z
      .number({ invalid_type_error: 'rating must be a number' })
      .min(0, 'rating must be between 0 and 5')
      .max(5, 'rating must be between 0 and 5')
      .optional()
  ),
});

export type NormalizeResult =
  | { ok: true; record: NormalizedRecord }
  | { ok: false; error: RecordValidationError };

function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function collectAttributes(raw: RawRecord): Record<string, unknown> {
  const attributes: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (KNOWN_FIELDS.has(key) || value === null || value === undefined) continue;
    if (typeof value === 'string' && cleanString(value) === undefined) continue;
    attributes[key] = value;
  }
  return attributes;
}

export function normalizeRecord(raw: unknown, index: number): NormalizeResult {
  if (!isRawRecord(raw)) {
    return { ok: false, error: { index, reason: 'record must be an object' } };
  }

  // Producers that predate the sourceProvider field tag records with `source`
  const input = raw.sourceProvider === undefined ? { ...raw, sourceProvider: raw.source } : raw;
  const parsed = rawRecordSchema.safeParse(input);

  if (!parsed.success) {
    return {
      ok: false,
      error: {
        index,
        name: cleanString(raw.name),
        reason: parsed.error.issues.map((issue) => issue.message).join('; '),
      },
    };
  }

  const { name, address, sourceProvider, phone, email, website, category, rating } = parsed.data;

  return {
    ok: true,
    record: {
      identityKey: computeIdentityKey(name, address),
      name,
      address,
      phone,
      email: email !== undefined && isLikelyEmail(email) ? email : undefined,
      website,
      category,
      rating,
      sourceProvider,
      attributes: collectAttributes(raw),
      index,
    },
  };
}

// Throwing form used by the writer
export function parseRecord(raw: unknown, index: number): NormalizedRecord {
  const result = normalizeRecord(raw, index);
  if (!result.ok) {
    throw new ValidationError(result.error.index, result.error.reason, result.error.name);
  }
  return result.record;
}
