/**
 * Run command - discover, ingest and run the pipeline end to end
 */

import { AppContext } from '../context';
import { runDiscover } from './discover';
import { runPipeline } from './pipeline';
import { logger } from '../../lib/logger';

export interface RunOptions {
  query: string;
  location: string;
  limit?: number;
  concurrency?: number;
}

export async function runEndToEnd(ctx: AppContext, options: RunOptions): Promise<void> {
  const { sessionId, verification } = await runDiscover(ctx, options);

  if (!verification.ready) {
    throw new Error(`Session ${sessionId} was not verified (${verification.reason}); pipeline not started`);
  }

  logger.info('Discovery verified, starting pipeline', { sessionId, verifiedCount: verification.verifiedCount });
  await runPipeline(ctx, { session: sessionId, limit: options.limit, concurrency: options.concurrency });
}
