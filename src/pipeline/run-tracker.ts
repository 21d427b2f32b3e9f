/**
 * Run tracker - owns one lead's PipelineRun and persists every transition
 */

import { PipelineRunRepository } from '../state/ports';
import {
  BranchDecision,
  CallStatus,
  Lead,
  PIPELINE_STAGES,
  PipelineRun,
  PipelineStageName,
  StageRecord,
  TranscriptTurn,
} from '../state/types';
import { InvalidTransitionError } from '../lib/errors';
import { Clock, generateRunId } from '../lib/utils';

export class RunTracker {
  private readonly state: PipelineRun;

  constructor(
    lead: Lead,
    private readonly runs: PipelineRunRepository,
    private readonly now: Clock = Date.now
  ) {
    this.state = {
      runId: generateRunId(),
      leadId: lead.identityKey,
      sessionId: lead.sessionId,
      stage: PIPELINE_STAGES[0],
      stageStatus: 'pending',
      stages: PIPELINE_STAGES.map((stage): StageRecord => ({ stage, status: 'pending' })),
      startedAt: now(),
    };
  }

  get run(): PipelineRun {
    return this.state;
  }

  get runId(): string {
    return this.state.runId;
  }

  get currentStage(): PipelineStageName {
    return this.state.stage;
  }

  private record(stage: PipelineStageName): StageRecord {
    const found = this.state.stages.find((s) => s.stage === stage);
    if (found) return found;
    const created: StageRecord = { stage, status: 'pending' };
    this.state.stages.push(created);
    return created;
  }

  persist(): Promise<void> {
    return this.runs.save({ ...this.state, stages: this.state.stages.map((s) => ({ ...s })) });
  }

  async start(stage: PipelineStageName): Promise<void> {
    const record = this.record(stage);
    record.status = 'running';
    record.startedAt = this.now();
    this.state.stage = stage;
    this.state.stageStatus = 'running';
    await this.persist();
  }

  async complete(stage: PipelineStageName, output?: string): Promise<void> {
    const record = this.record(stage);
    record.status = 'done';
    record.completedAt = this.now();
    record.output = output;
    this.state.stageStatus = 'done';
    await this.persist();
  }

  async skip(stage: PipelineStageName, reason: string): Promise<void> {
    const record = this.record(stage);
    record.status = 'skipped';
    record.completedAt = this.now();
    record.output = reason;
    this.state.stage = stage;
    this.state.stageStatus = 'skipped';
    await this.persist();
  }

  // Marks the stage in error; persisted by finalize
  fail(stage: PipelineStageName, error: string): void {
    const record = this.record(stage);
    record.status = 'error';
    record.completedAt = this.now();
    record.error = error;
    this.state.error = error;
  }

  setCallResult(result: { status: CallStatus; callId: string; transcript: TranscriptTurn[] }): void {
    this.state.callOutcome = result.status;
    this.state.callId = result.callId || undefined;
    this.state.transcript = result.transcript;
  }

  // Set by classify exactly once per run
  setBranchDecision(decision: BranchDecision, note?: string): void {
    if (this.state.branchDecision !== undefined) {
      throw new InvalidTransitionError(
        `Branch decision for run ${this.state.runId} is already ${this.state.branchDecision}`
      );
    }
    this.state.branchDecision = decision;
    this.state.classificationNote = note;
  }

  setEmail(sent: boolean, recipient?: string): void {
    this.state.emailSent = sent;
    this.state.emailRecipient = recipient;
  }

  // Always the last transition: leftover stages are skipped and the run reaches finalize(done|error)
  async finalize(): Promise<PipelineRun> {
    const at = this.now();
    for (const record of this.state.stages) {
      if (record.stage === 'finalize') continue;
      if (record.status === 'pending') {
        record.status = 'skipped';
      } else if (record.status === 'running') {
        record.status = 'error';
        record.completedAt = at;
        record.error = this.state.error;
      }
    }

    const status = this.state.error === undefined ? 'done' : 'error';
    const finalize = this.record('finalize');
    finalize.status = status;
    finalize.startedAt = at;
    finalize.completedAt = at;

    this.state.stage = 'finalize';
    this.state.stageStatus = status;
    this.state.completedAt = at;
    await this.persist();
    return this.run;
  }
}
