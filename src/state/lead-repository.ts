/**
 * Lead repository - persistent lead state on the sql.js store
 */

import { Store, Row, readText, readOptionalText, readNumber, readOptionalNumber, readJson, isRecord } from './database';
import { LeadRepository } from './ports';
import { Lead, LeadQuery } from './types';

// Email column holds a usable address, not a placeholder
export const HAS_EMAIL_SQL =
  "email IS NOT NULL AND LOWER(TRIM(email)) NOT IN ('', 'null', 'none', 'n/a', 'undefined')";

// Convert DB row to Lead object
function rowToLead(row: Row): Lead {
  const attributes = readJson(row, 'attributes');
  return {
    identityKey: readText(row, 'identity_key'),
    name: readText(row, 'name'),
    address: readText(row, 'address'),
    phone: readOptionalText(row, 'phone'),
    email: readOptionalText(row, 'email'),
    website: readOptionalText(row, 'website'),
    category: readOptionalText(row, 'category'),
    rating: readOptionalNumber(row, 'rating'),
    sourceProvider: readText(row, 'source_provider'),
    sessionId: readText(row, 'session_id'),
    attributes: isRecord(attributes) ? attributes : {},
    status: 'new',
    createdAt: readNumber(row, 'created_at'),
    updatedAt: readNumber(row, 'updated_at'),
  };
}

export class SqlLeadRepository implements LeadRepository {
  constructor(private readonly store: Store) {}

  async findByIdentityKey(identityKey: string): Promise<Lead | null> {
    const row = this.store.prepare('SELECT * FROM leads WHERE identity_key = ?').get(identityKey);
    return row ? rowToLead(row) : null;
  }

  async insert(lead: Lead): Promise<void> {
    const stmt = this.store.prepare(`
      INSERT INTO leads (
        identity_key, name, address, phone, email, website, category, rating,
        source_provider, session_id, attributes, status, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      lead.identityKey,
      lead.name,
      lead.address,
      lead.phone,
      lead.email,
      lead.website,
      lead.category,
      lead.rating,
      lead.sourceProvider,
      lead.sessionId,
      JSON.stringify(lead.attributes),
      lead.status,
      lead.createdAt,
      lead.updatedAt
    );
  }

  async update(lead: Lead): Promise<void> {
    const stmt = this.store.prepare(`
      UPDATE leads SET
        name = ?,
        address = ?,
        phone = ?,
        email = ?,
        website = ?,
        category = ?,
        rating = ?,
        source_provider = ?,
        session_id = ?,
        attributes = ?,
        status = ?,
        updated_at = ?
      WHERE identity_key = ?
    `);

    stmt.run(
      lead.name,
      lead.address,
      lead.phone,
      lead.email,
      lead.website,
      lead.category,
      lead.rating,
      lead.sourceProvider,
      lead.sessionId,
      JSON.stringify(lead.attributes),
      lead.status,
      lead.updatedAt,
      lead.identityKey
    );
  }

  async countBySession(sessionId: string): Promise<number> {
    const row = this.store.prepare('SELECT COUNT(*) AS count FROM leads WHERE session_id = ?').get(sessionId);
    return row ? readNumber(row, 'count') : 0;
  }

  async query(query: LeadQuery): Promise<Lead[]> {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (query.sessionId !== undefined) {
      conditions.push('session_id = ?');
      params.push(query.sessionId);
    }
    if (query.requireEmail) {
      conditions.push(HAS_EMAIL_SQL);
    }

    let sql = 'SELECT * FROM leads';
    if (conditions.length > 0) {
      sql += ` WHERE ${conditions.join(' AND ')}`;
    }
    sql += ' ORDER BY updated_at DESC, rowid DESC LIMIT ?';
    params.push(query.limit);

    return this.store.prepare(sql).all(...params).map(rowToLead);
  }

  // Get statistics
  async getStats(): Promise<{ total: number; withEmail: number; withPhone: number }> {
    const row = this.store
      .prepare(
        `SELECT COUNT(*) AS total,
          SUM(CASE WHEN ${HAS_EMAIL_SQL} THEN 1 ELSE 0 END) AS with_email,
          SUM(CASE WHEN phone IS NOT NULL AND phone != '' THEN 1 ELSE 0 END) AS with_phone
        FROM leads`
      )
      .get();
    return {
      total: row ? readNumber(row, 'total') : 0,
      withEmail: row ? readNumber(row, 'with_email') : 0,
      withPhone: row ? readNumber(row, 'with_phone') : 0,
    };
  }
}
