/**
 * Error taxonomy shared by ingestion and the pipeline
 */

export type ErrorCode =
  | 'validation'
  | 'write'
  | 'store_unavailable'
  | 'session_closed'
  | 'verification_timeout'
  | 'stage'
  | 'timeout'
  | 'invalid_transition'
  | 'config';

export class PipelineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Bad raw record: skip it, keep the batch going
export class ValidationError extends PipelineError {
  readonly index: number;
  readonly recordName?: string;

  constructor(index: number, message: string, recordName?: string) {
    super('validation', message);
    this.index = index;
    this.recordName = recordName;
  }
}

// Raised by repositories when the backing store cannot be reached
export class StoreUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('store_unavailable', message, options);
  }
}

// Batch aborted; the session has been marked failed
export class WriteError extends PipelineError {
  readonly sessionId: string;

  constructor(sessionId: string, message: string, options?: { cause?: unknown }) {
    super('write', message, options);
    this.sessionId = sessionId;
  }
}

export class SessionClosedError extends PipelineError {
  readonly sessionId: string;

  constructor(sessionId: string, status: string) {
    super('session_closed', `Session ${sessionId} is already ${status}`);
    this.sessionId = sessionId;
  }
}

export class VerificationTimeoutError extends PipelineError {
  readonly sessionId: string;
  readonly verifiedCount: number;

  constructor(sessionId: string, verifiedCount: number, waitedMs: number) {
    super('verification_timeout', `Session ${sessionId} not verified after ${waitedMs}ms`);
    this.sessionId = sessionId;
    this.verifiedCount = verifiedCount;
  }
}

// A collaborator failed inside one lead's run; only that lead halts
export class StageError extends PipelineError {
  readonly stage: string;

  constructor(stage: string, message: string, options?: { cause?: unknown }) {
    super('stage', message, options);
    this.stage = stage;
  }
}

export class TimeoutError extends PipelineError {
  constructor(message = 'timeout') {
    super('timeout', message);
  }
}

export class InvalidTransitionError extends PipelineError {
  constructor(message: string) {
    super('invalid_transition', message);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
