/**
 * Core type definitions for the outreach pipeline
 * Leads and sessions belong to ingestion; pipeline runs belong to the orchestrator
 */

// Tags the two search producers stamp on their records
export const MAP_SEARCH = 'map_search';
export const CLUSTER_SEARCH = 'cluster_search';

export type SourceProvider = typeof MAP_SEARCH | typeof CLUSTER_SEARCH | (string & {});

// Untrusted record straight from a search producer or an import file
export interface RawRecord {
  name?: unknown;
  address?: unknown;
  phone?: unknown;
  email?: unknown;
  website?: unknown;
  category?: unknown;
  rating?: unknown;
  sourceProvider?: unknown;
  [key: string]: unknown;
}

// Optional fields a producer may or may not populate
export const OPTIONAL_LEAD_FIELDS = ['phone', 'email', 'website', 'category', 'rating'] as const;
export type OptionalLeadField = (typeof OPTIONAL_LEAD_FIELDS)[number];

// Record that passed validation, ready for dedupe
export interface NormalizedRecord {
  identityKey: string;
  name: string;
  address: string;
  phone?: string;
  email?: string;
  website?: string;
  category?: string;
  rating?: number;
  sourceProvider: SourceProvider;
  attributes: Record<string, unknown>;
  // Position in the submitted batch
  index: number;
}

export type LeadStatus = 'new';

export interface Lead {
  identityKey: string;               // Stable hash of normalized name + address
  name: string;
  address: string;
  phone?: string;
  email?: string;
  website?: string;
  category?: string;
  rating?: number;
  sourceProvider: SourceProvider;
  sessionId: string;
  attributes: Record<string, unknown>;  // Producer fields with no column of their own
  status: LeadStatus;
  createdAt: number;
  updatedAt: number;
}

export type SessionStatus = 'uploading' | 'completed' | 'failed';

export interface SessionMetadata {
  query?: string;
  location?: string;
  sources?: string[];
}

export interface Session {
  sessionId: string;
  status: SessionStatus;
  requestedCount: number;
  insertedCount: number;
  updatedCount: number;
  verifiedCount: number;
  failedCount: number;
  createdAt: number;
  updatedAt: number;
  lastError?: string;
  metadata?: SessionMetadata;
}

export interface RecordValidationError {
  index: number;
  name?: string;
  reason: string;
}

export interface RecordWriteFailure {
  identityKey: string;
  name: string;
  error: string;
}

export interface WriteReport {
  sessionId: string;
  status: SessionStatus;
  requestedCount: number;
  validCount: number;
  collapsedCount: number;            // In-batch duplicates folded into a survivor
  insertedCount: number;
  updatedCount: number;
  failedCount: number;
  verifiedCount: number;
  validationErrors: RecordValidationError[];
  failures: RecordWriteFailure[];
  lastError?: string;
}

// Pipeline stages in execution order; email only runs when the branch asks for it
export const PIPELINE_STAGES = [
  'research',
  'draft',
  'review',
  'call',
  'classify',
  'branch',
  'email',
  'finalize',
] as const;

export type PipelineStageName = (typeof PIPELINE_STAGES)[number];

export type StageStatus = 'pending' | 'running' | 'done' | 'skipped' | 'error';

export const CALL_CATEGORIES = [
  'agreed_to_email',
  'interested',
  'not_interested',
  'issue_appeared',
  'other',
] as const;

export type BranchDecision = (typeof CALL_CATEGORIES)[number];

export type CallStatus = 'done' | 'no_answer' | 'failed' | 'error';

export interface TranscriptTurn {
  role: string;
  text: string;
}

export interface StageRecord {
  stage: PipelineStageName;
  status: StageStatus;
  startedAt?: number;
  completedAt?: number;
  output?: string;
  error?: string;
}

// Per-lead execution record
export interface PipelineRun {
  runId: string;
  leadId: string;                    // Lead identity key
  sessionId: string;
  stage: PipelineStageName;
  stageStatus: StageStatus;
  stages: StageRecord[];
  branchDecision?: BranchDecision;
  classificationNote?: string;
  callOutcome?: CallStatus;
  callId?: string;
  transcript?: TranscriptTurn[];
  emailSent?: boolean;
  emailRecipient?: string;
  meetingId?: string;
  startedAt: number;
  completedAt?: number;
  error?: string;
}

export interface LeadQuery {
  sessionId?: string;
  requireEmail?: boolean;
  limit: number;
}
