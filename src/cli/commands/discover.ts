/**
 * Discover command - search both producers, ingest into a session, wait for verification
 */

import { AppContext } from '../context';
import { DiscoverResult } from '../../stages/discover';
import { VerifyResult } from '../../stages/ingest';
import { WriteReport } from '../../state/types';
import { generateSessionId } from '../../lib/utils';
import { logger } from '../../lib/logger';
import { printWriteReport } from './ingest';

export interface DiscoverOptions {
  query: string;
  location: string;
  limit?: number;
  session?: string;
}

export interface DiscoverOutcome {
  sessionId: string;
  discovered: DiscoverResult;
  report: WriteReport;
  verification: VerifyResult;
}

export async function runDiscover(ctx: AppContext, options: DiscoverOptions): Promise<DiscoverOutcome> {
  const sessionId = options.session ?? generateSessionId();
  const limit = options.limit ?? ctx.config.ingestion.defaultLimit;
  logger.info('Starting DISCOVER', { sessionId, query: options.query, location: options.location, limit });

  const discovered = await ctx.discover.run({ query: options.query, location: options.location, limit });
  const report = await ctx.writer.upsert(sessionId, discovered.records, {
    query: options.query,
    location: options.location,
    sources: Object.keys(discovered.bySource),
  });
  const verification = await ctx.verifier.waitForSessionReady(sessionId);

  console.log('\n=== Discovery ===');
  for (const [source, count] of Object.entries(discovered.bySource)) {
    console.log(`  ${source}: ${count} records`);
  }
  for (const failure of discovered.errors) {
    console.log(`  ${failure.source}: FAILED (${failure.error})`);
  }
  printWriteReport(report, verification);

  return { sessionId, discovered, report, verification };
}
