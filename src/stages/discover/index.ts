/**
 * DISCOVER Stage
 * Goal: Pull raw business records for a query and location from every enabled search source
 */

import { SourceConfig } from '../../config/types';
import { RawRecord } from '../../state/types';
import { errorMessage } from '../../lib/errors';
import { RateLimiter } from '../../lib/utils';
import { logger } from '../../lib/logger';
import { DiscoverRequest, SourceHandlers, registeredSourceHandlers } from './registry';
import './sources';

export { registerSourceHandler } from './registry';
export type { SourceHandler, DiscoverRequest } from './registry';

export interface DiscoverInput {
  query: string;
  location: string;
  limit: number;
  signal?: AbortSignal;
}

export interface SourceFailure {
  source: string;
  error: string;
}

export interface DiscoverResult {
  records: RawRecord[];
  bySource: Record<string, number>;
  errors: SourceFailure[];
}

export class DiscoverStage {
  private readonly sources: SourceConfig[];
  private readonly handlers: SourceHandlers;

  constructor(sources: SourceConfig[], handlers: SourceHandlers = registeredSourceHandlers()) {
    this.sources = sources;
    this.handlers = handlers;
  }

  // One failing source is recorded and the others still contribute
  async run(input: DiscoverInput): Promise<DiscoverResult> {
    const log = logger.child({ stage: 'discover' });
    const enabled = this.sources.filter((s) => s.enabled);
    const result: DiscoverResult = { records: [], bySource: {}, errors: [] };

    if (enabled.length === 0) {
      log.warn('No enabled sources to discover from');
      return result;
    }

    log.info(`Discovering from ${enabled.length} source(s)`, {
      sources: enabled.map((s) => s.name),
      query: input.query,
      location: input.location,
    });

    for (const source of enabled) {
      const handler = this.handlers.get(source.type);
      if (!handler) {
        log.warn(`No handler for source type: ${source.type}`, { source: source.name });
        result.errors.push({ source: source.name, error: `No handler for source type ${source.type}` });
        continue;
      }

      const rateLimiter = new RateLimiter(source.rateLimit, 60000);
      const request: DiscoverRequest = {
        query: input.query,
        location: input.location,
        limit: input.limit,
        signal: input.signal,
      };
      let count = 0;

      try {
        for await (const record of handler.discover(source, request)) {
          await rateLimiter.acquire();
          result.records.push(record);
          count++;
          if (count >= input.limit) break;
        }
        log.info(`Source complete: ${source.name}`, { discovered: count });
      } catch (error) {
        log.logFailure(source.name, 'discover', { error: errorMessage(error), discovered: count });
        result.errors.push({ source: source.name, error: errorMessage(error) });
      }

      result.bySource[source.name] = count;
    }

    log.info('Discovery complete', { total: result.records.length, bySource: result.bySource });
    return result;
  }
}
