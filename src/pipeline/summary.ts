/**
 * Workflow summary over a session's pipeline runs
 */

import { BranchDecision, CallStatus, PipelineRun } from '../state/types';

export interface RunSummary {
  total: number;
  done: number;
  error: number;
  inProgress: number;
  timedOut: number;
  calls: Partial<Record<CallStatus, number>>;
  decisions: Partial<Record<BranchDecision, number>>;
  emailsSent: number;
  meetings: number;
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export function summarizeRuns(runs: readonly PipelineRun[]): RunSummary {
  const summary: RunSummary = {
    total: runs.length,
    done: 0,
    error: 0,
    inProgress: 0,
    timedOut: 0,
    calls: {},
    decisions: {},
    emailsSent: 0,
    meetings: 0,
  };

  for (const run of runs) {
    if (run.stage === 'finalize' && run.stageStatus === 'done') summary.done++;
    else if (run.stage === 'finalize' && run.stageStatus === 'error') summary.error++;
    else summary.inProgress++;

    if (run.error === 'timeout') summary.timedOut++;
    if (run.callOutcome) increment(summary.calls, run.callOutcome);
    if (run.branchDecision) increment(summary.decisions, run.branchDecision);
    if (run.emailSent) summary.emailsSent++;
    if (run.meetingId) summary.meetings++;
  }

  return summary;
}
