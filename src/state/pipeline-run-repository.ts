/**
 * Pipeline run repository - per-lead audit records
 */

import { z } from 'zod';
import { Store, Row, readText, readOptionalText, readNumber, readOptionalNumber, readJson } from './database';
import { PipelineRunRepository } from './ports';
import {
  BranchDecision,
  CALL_CATEGORIES,
  CallStatus,
  PIPELINE_STAGES,
  PipelineRun,
  PipelineStageName,
  StageRecord,
  StageStatus,
  TranscriptTurn,
} from './types';

const stageStatusSchema = z.enum(['pending', 'running', 'done', 'skipped', 'error']);
const stageNameSchema = z.enum(PIPELINE_STAGES);

const stageRecordsSchema = z.array(
  z.object({
    stage: stageNameSchema,
    status: stageStatusSchema,
    startedAt: z.number().optional(),
    completedAt: z.number().optional(),
    output: z.string().optional(),
    error: z.string().optional(),
  })
);

const transcriptSchema = z.array(z.object({ role: z.string(), text: z.string() }));

function parseStages(value: unknown): StageRecord[] {
  const result = stageRecordsSchema.safeParse(value);
  return result.success ? result.data : [];
}

function parseTranscript(value: unknown): TranscriptTurn[] | undefined {
  const result = transcriptSchema.safeParse(value);
  return result.success ? result.data : undefined;
}

function parseStage(value: string): PipelineStageName {
  const result = stageNameSchema.safeParse(value);
  return result.success ? result.data : 'research';
}

function parseStageStatus(value: string): StageStatus {
  const result = stageStatusSchema.safeParse(value);
  return result.success ? result.data : 'pending';
}

function parseDecision(value: string | undefined): BranchDecision | undefined {
  return CALL_CATEGORIES.find((category) => category === value);
}

function parseCallStatus(value: string | undefined): CallStatus | undefined {
  switch (value) {
    case 'done':
    case 'no_answer':
    case 'failed':
    case 'error':
      return value;
    default:
      return undefined;
  }
}

function rowToRun(row: Row): PipelineRun {
  const emailSent = readOptionalNumber(row, 'email_sent');
  return {
    runId: readText(row, 'run_id'),
    leadId: readText(row, 'lead_id'),
    sessionId: readText(row, 'session_id'),
    stage: parseStage(readText(row, 'stage')),
    stageStatus: parseStageStatus(readText(row, 'stage_status')),
    stages: parseStages(readJson(row, 'stages')),
    branchDecision: parseDecision(readOptionalText(row, 'branch_decision')),
    classificationNote: readOptionalText(row, 'classification_note'),
    callOutcome: parseCallStatus(readOptionalText(row, 'call_outcome')),
    callId: readOptionalText(row, 'call_id'),
    transcript: parseTranscript(readJson(row, 'transcript')),
    emailSent: emailSent === undefined ? undefined : emailSent === 1,
    emailRecipient: readOptionalText(row, 'email_recipient'),
    meetingId: readOptionalText(row, 'meeting_id'),
    startedAt: readNumber(row, 'started_at'),
    completedAt: readOptionalNumber(row, 'completed_at'),
    error: readOptionalText(row, 'error'),
  };
}

export class SqlPipelineRunRepository implements PipelineRunRepository {
  constructor(private readonly store: Store) {}

  async save(run: PipelineRun): Promise<void> {
    const stmt = this.store.prepare(`
      INSERT INTO pipeline_runs (
        run_id, lead_id, session_id, stage, stage_status, stages, branch_decision,
        classification_note, call_outcome, call_id, transcript, email_sent,
        email_recipient, meeting_id, started_at, completed_at, error
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(run_id) DO UPDATE SET
        stage = excluded.stage,
        stage_status = excluded.stage_status,
        stages = excluded.stages,
        branch_decision = COALESCE(pipeline_runs.branch_decision, excluded.branch_decision),
        classification_note = excluded.classification_note,
        call_outcome = excluded.call_outcome,
        call_id = excluded.call_id,
        transcript = excluded.transcript,
        email_sent = excluded.email_sent,
        email_recipient = excluded.email_recipient,
        meeting_id = excluded.meeting_id,
        completed_at = excluded.completed_at,
        error = excluded.error
    `);

    stmt.run(
      run.runId,
      run.leadId,
      run.sessionId,
      run.stage,
      run.stageStatus,
      JSON.stringify(run.stages),
      run.branchDecision,
      run.classificationNote,
      run.callOutcome,
      run.callId,
      run.transcript ? JSON.stringify(run.transcript) : null,
      run.emailSent,
      run.emailRecipient,
      run.meetingId,
      run.startedAt,
      run.completedAt,
      run.error
    );
  }

  async get(runId: string): Promise<PipelineRun | null> {
    const row = this.store.prepare('SELECT * FROM pipeline_runs WHERE run_id = ?').get(runId);
    return row ? rowToRun(row) : null;
  }

  async listBySession(sessionId: string): Promise<PipelineRun[]> {
    return this.store
      .prepare('SELECT * FROM pipeline_runs WHERE session_id = ? ORDER BY started_at ASC, rowid ASC')
      .all(sessionId)
      .map(rowToRun);
  }

  async latestForLead(leadId: string): Promise<PipelineRun | null> {
    const row = this.store
      .prepare('SELECT * FROM pipeline_runs WHERE lead_id = ? ORDER BY started_at DESC, rowid DESC LIMIT 1')
      .get(leadId);
    return row ? rowToRun(row) : null;
  }
}
