export { PipelineOrchestrator, pipelineClaimKey, emailClaimKey } from './orchestrator';
export type { LeadRunOutcome, RunLeadOptions } from './orchestrator';
export { buildStages, buildLeadContext, STAGE_ORDER } from './stages';
export type { StageDefinition } from './stages';
export { parseClassification } from './classification';
export { planBranch, shouldScheduleMeeting } from './branch';
export { summarizeRuns } from './summary';
export type { RunSummary } from './summary';
