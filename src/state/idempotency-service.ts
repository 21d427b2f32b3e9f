/**
 * Idempotency guard - first caller to claim a key wins, repeats are acknowledged
 */

import { Store, readNumber } from './database';
import { IdempotencyGuard } from './ports';
import { Clock } from '../lib/utils';
import { logger } from '../lib/logger';

export class SqlIdempotencyGuard implements IdempotencyGuard {
  constructor(
    private readonly store: Store,
    private readonly now: Clock = Date.now
  ) {}

  async claim(key: string, scope: string): Promise<boolean> {
    const result = this.store
      .prepare('INSERT OR IGNORE INTO processed_events (event_key, scope, processed_at) VALUES (?, ?, ?)')
      .run(key, scope, this.now());

    if (result.changes === 0) {
      logger.debug('Repeat event acknowledged', { key, scope });
      return false;
    }
    return true;
  }

  async release(key: string): Promise<void> {
    this.store.prepare('DELETE FROM processed_events WHERE event_key = ?').run(key);
  }

  async has(key: string): Promise<boolean> {
    const row = this.store.prepare('SELECT COUNT(*) AS count FROM processed_events WHERE event_key = ?').get(key);
    return row ? readNumber(row, 'count') > 0 : false;
  }
}
