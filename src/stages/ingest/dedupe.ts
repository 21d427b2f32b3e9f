/**
 * In-batch deduplication
 * Records sharing an identity key collapse to the most complete variant
 */

import { NormalizedRecord, OPTIONAL_LEAD_FIELDS } from '../../state/types';

export interface DedupeResult {
  records: NormalizedRecord[];
  collapsed: number;
}

// Number of optional fields the record actually carries
export function completeness(record: NormalizedRecord): number {
  return OPTIONAL_LEAD_FIELDS.filter((field) => record[field] !== undefined).length;
}

// Winner keeps its values; gaps are filled from the other variants in first-seen order
function fillGaps(winner: NormalizedRecord, variants: NormalizedRecord[]): NormalizedRecord {
  const merged: NormalizedRecord = { ...winner, attributes: { ...winner.attributes } };

  for (const variant of variants) {
    if (variant === winner) continue;
    if (merged.phone === undefined) merged.phone = variant.phone;
    if (merged.email === undefined) merged.email = variant.email;
    if (merged.website === undefined) merged.website = variant.website;
    if (merged.category === undefined) merged.category = variant.category;
    if (merged.rating === undefined) merged.rating = variant.rating;
    for (const [key, value] of Object.entries(variant.attributes)) {
      if (!(key in merged.attributes)) merged.attributes[key] = value;
    }
  }

  return merged;
}

export function dedupeBatch(records: readonly NormalizedRecord[]): DedupeResult {
  const groups = new Map<string, NormalizedRecord[]>();

  for (const record of records) {
    const group = groups.get(record.identityKey);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.identityKey, [record]);
    }
  }

  const survivors: NormalizedRecord[] = [];
  for (const variants of groups.values()) {
    let winner = variants[0];
    for (const candidate of variants.slice(1)) {
      // Strictly greater, so ties stay with the first seen
      if (completeness(candidate) > completeness(winner)) {
        winner = candidate;
      }
    }
    survivors.push(variants.length > 1 ? fillGaps(winner, variants) : winner);
  }

  return { records: survivors, collapsed: records.length - survivors.length };
}
