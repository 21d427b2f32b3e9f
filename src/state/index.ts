export * from './types';
export * from './ports';
export { Store } from './database';
export { SqlLeadRepository } from './lead-repository';
export { SqlSessionRepository } from './session-repository';
export { SqlPipelineRunRepository } from './pipeline-run-repository';
export { SqlIdempotencyGuard } from './idempotency-service';
export { SessionService } from './session-service';
