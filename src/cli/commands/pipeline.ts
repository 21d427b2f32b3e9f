/**
 * Pipeline command - retrieve a session's leads and run the outreach pipeline over them
 */

import { AppContext, createOrchestrator } from '../context';
import { LeadRunOutcome, summarizeRuns } from '../../pipeline';
import { printRunSummary } from './status';
import { logger } from '../../lib/logger';

export interface PipelineOptions {
  session: string;
  limit?: number;
  concurrency?: number;
  force?: boolean;
  // Use leads from other sessions when this one yields none
  allowFallback?: boolean;
}

export async function runPipeline(ctx: AppContext, options: PipelineOptions): Promise<LeadRunOutcome[]> {
  const limit = options.limit ?? ctx.config.ingestion.defaultLimit;
  const retrieval = await ctx.retriever.retrieve(options.session, limit);

  const leads = options.allowFallback
    ? retrieval.leads
    : retrieval.leads.filter((lead) => lead.sessionId === options.session);

  if (leads.length < retrieval.leads.length) {
    logger.warn('Ignoring leads from other sessions', {
      strategy: retrieval.strategy,
      ignored: retrieval.leads.length - leads.length,
    });
  }
  if (leads.length === 0) {
    logger.warn('No leads to run', { session: options.session });
    return [];
  }

  const orchestrator = createOrchestrator(ctx, options.concurrency);
  const outcomes = await orchestrator.runLeads(leads, { force: options.force });

  const skipped = outcomes.filter((outcome) => outcome.skipped).length;
  logger.info('PIPELINE complete', { leads: leads.length, skipped });

  printRunSummary(summarizeRuns(await ctx.runs.listBySession(options.session)));
  return outcomes;
}
