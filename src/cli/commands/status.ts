/**
 * Status command - show a session and its pipeline runs, or recent sessions
 */

import { AppContext } from '../context';
import { RunSummary, summarizeRuns } from '../../pipeline';

export function printRunSummary(summary: RunSummary): void {
  console.log('\n=== Pipeline Runs ===');
  console.log(`Total: ${summary.total}  done: ${summary.done}  error: ${summary.error}  in progress: ${summary.inProgress}`);
  if (summary.timedOut > 0) {
    console.log(`Timed out: ${summary.timedOut}`);
  }
  for (const [outcome, count] of Object.entries(summary.calls)) {
    console.log(`  call ${outcome}: ${count}`);
  }
  for (const [decision, count] of Object.entries(summary.decisions)) {
    console.log(`  decision ${decision}: ${count}`);
  }
  console.log(`Emails sent: ${summary.emailsSent}  meetings: ${summary.meetings}`);
  console.log('');
}

export async function showStatus(ctx: AppContext, sessionId?: string): Promise<void> {
  if (!sessionId) {
    const sessions = await ctx.sessionRepository.listRecent(10);
    const stats = await ctx.leads.getStats();
    console.log('\n=== Leads ===');
    console.log(`Total: ${stats.total}  with email: ${stats.withEmail}  with phone: ${stats.withPhone}`);
    console.log('\n=== Recent Sessions ===');
    for (const session of sessions) {
      const mark = session.status === 'completed' ? '✓' : session.status === 'failed' ? '✗' : '...';
      const date = new Date(session.createdAt).toISOString();
      console.log(`[${mark}] ${session.sessionId} @ ${date} - ${session.verifiedCount} verified of ${session.requestedCount}`);
    }
    console.log('');
    return;
  }

  const session = await ctx.sessions.get(sessionId);
  if (!session) {
    throw new Error(`Session ${sessionId} not found`);
  }

  console.log(`\n=== Session ${session.sessionId} ===`);
  console.log(`Status: ${session.status}`);
  console.log(`Requested: ${session.requestedCount}  inserted: ${session.insertedCount}  updated: ${session.updatedCount}`);
  console.log(`Verified: ${session.verifiedCount}  failed: ${session.failedCount}`);
  if (session.metadata?.query) {
    console.log(`Query: ${session.metadata.query} in ${session.metadata.location ?? '?'}`);
  }
  if (session.lastError) {
    console.log(`Last error: ${session.lastError}`);
  }

  printRunSummary(summarizeRuns(await ctx.runs.listBySession(sessionId)));
}
