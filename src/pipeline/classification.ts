/**
 * Call classification parsing
 * Unparsable or ambiguous classifier output becomes `other`; it is never an error
 */

import { BranchDecision, CALL_CATEGORIES } from '../state/types';
import { cleanString, isLikelyEmail, normalizeEmail } from '../lib/utils';

export interface Classification {
  category: BranchDecision;
  email?: string;
  note?: string;
  ambiguous: boolean;
}

const FENCED = /```(?:json)?\s*([\s\S]*?)```/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCategory(value: unknown): BranchDecision | undefined {
  if (typeof value !== 'string') return undefined;
  const token = value.trim().toLowerCase().replace(/[\s-]+/g, '_');
  return CALL_CATEGORIES.find((category) => category === token);
}

function parseJsonObject(text: string): Record<string, unknown> | null {
  const fenced = FENCED.exec(text);
  const body = fenced ? fenced[1] : text;
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  try {
    const parsed: unknown = JSON.parse(body.slice(start, end + 1));
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

// Longest tokens first so "not interested" is consumed before "interested" can match inside it
function findTokens(text: string): BranchDecision[] {
  let remaining = text.toLowerCase();
  const found: BranchDecision[] = [];
  const ordered = [...CALL_CATEGORIES].sort((a, b) => b.length - a.length);

  for (const category of ordered) {
    const pattern = new RegExp(`(?<![a-z_])${category.replace(/_/g, '[\\s_-]+')}(?![a-z_])`, 'g');
    if (pattern.test(remaining)) {
      found.push(category);
      remaining = remaining.replace(pattern, ' ');
    }
  }

  return found;
}

export function parseClassification(text: string): Classification {
  const json = parseJsonObject(text);

  if (json) {
    const category = toCategory(json.call_category);
    const email = cleanString(json.email);
    const note = cleanString(json.note);
    return {
      category: category ?? 'other',
      email: email !== undefined && isLikelyEmail(email) ? normalizeEmail(email) : undefined,
      note,
      ambiguous: category === undefined,
    };
  }

  const tokens = findTokens(text);
  if (tokens.length === 1) {
    return { category: tokens[0], ambiguous: false };
  }
  return { category: 'other', ambiguous: true };
}
