/**
 * Pipeline orchestrator
 * Runs research -> draft -> review -> call -> classify -> branch -> (email) -> finalize for each lead.
 * Stages within a lead are sequential; leads run concurrently and fail independently.
 */

import { PipelineConfig, EmailConfig } from '../config/types';
import { IdempotencyGuard, PipelineRunRepository } from '../state/ports';
import { Lead, PIPELINE_STAGES, PipelineRun, PipelineStageName, TranscriptTurn } from '../state/types';
import { EmailSender } from '../collaborators/email';
import { ConfigError, StageError, TimeoutError, errorMessage } from '../lib/errors';
import { Clock, isE164, mapWithConcurrency, normalizePhone, renderTemplate, withDeadline } from '../lib/utils';
import { Logger, logger } from '../lib/logger';
import { CallStage, ClassifyStage, ContentStage, STAGE_ORDER, StageDefinition, buildLeadContext } from './stages';
import { Classification, parseClassification } from './classification';
import { planBranch } from './branch';
import { RunTracker } from './run-tracker';

export interface RunLeadOptions {
  // Run even if this lead already ran for its session
  force?: boolean;
  signal?: AbortSignal;
}

export interface LeadRunOutcome {
  leadId: string;
  skipped: boolean;
  run: PipelineRun | null;
}

export interface PipelineOrchestratorDeps {
  stages: StageDefinition[];
  runs: PipelineRunRepository;
  guard: IdempotencyGuard;
  email: EmailSender;
  config: PipelineConfig;
  emailConfig: EmailConfig;
  now?: Clock;
}

interface LeadScope {
  lead: Lead;
  leadContext: string;
  tracker: RunTracker;
  signal: AbortSignal;
  log: Logger;
  // Set once the calling collaborator has been asked to dial
  dialed: boolean;
}

export function pipelineClaimKey(lead: Lead): string {
  return `pipeline:${lead.sessionId}:${lead.identityKey}`;
}

export function emailClaimKey(lead: Lead): string {
  return `email:${lead.identityKey}`;
}

function formatTranscript(transcript: TranscriptTurn[]): string {
  return transcript.map((turn) => `${turn.role}: ${turn.text}`).join('\n');
}

function assertStageOrder(stages: StageDefinition[]): void {
  const names = stages.map((stage) => stage.name).join(',');
  if (names !== STAGE_ORDER.join(',')) {
    throw new ConfigError(`Pipeline stages must be ${STAGE_ORDER.join(' -> ')}, got ${names || '(none)'}`);
  }
}

export class PipelineOrchestrator {
  private readonly stages: StageDefinition[];
  private readonly runs: PipelineRunRepository;
  private readonly guard: IdempotencyGuard;
  private readonly email: EmailSender;
  private readonly config: PipelineConfig;
  private readonly emailConfig: EmailConfig;
  private readonly now: Clock;

  constructor(deps: PipelineOrchestratorDeps) {
    assertStageOrder(deps.stages);
    this.stages = deps.stages;
    this.runs = deps.runs;
    this.guard = deps.guard;
    this.email = deps.email;
    this.config = deps.config;
    this.emailConfig = deps.emailConfig;
    this.now = deps.now ?? Date.now;
  }

  async runLeads(leads: readonly Lead[], options: RunLeadOptions = {}): Promise<LeadRunOutcome[]> {
    logger.info(`Running pipeline for ${leads.length} leads`, { concurrency: this.config.concurrency });
    return mapWithConcurrency(leads, this.config.concurrency, (lead) => this.runLead(lead, options));
  }

  async runLead(lead: Lead, options: RunLeadOptions = {}): Promise<LeadRunOutcome> {
    const log = logger.child({ stage: 'pipeline', sessionId: lead.sessionId, leadId: lead.identityKey });
    const claimKey = pipelineClaimKey(lead);

    const claimed = await this.guard.claim(claimKey, 'pipeline');
    if (!claimed && !options.force) {
      log.info('Lead already processed for this session, skipping', { name: lead.name });
      return { leadId: lead.identityKey, skipped: true, run: null };
    }

    const tracker = new RunTracker(lead, this.runs, this.now);
    const scopeLog = log.child({ runId: tracker.runId });
    await tracker.persist();

    // Aggregate deadline for the whole lead; also follows the caller's signal
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new TimeoutError('timeout')), this.config.leadTimeoutMs);
    const forward = (): void => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) forward();
    else options.signal?.addEventListener('abort', forward, { once: true });

    const scope: LeadScope = {
      lead,
      leadContext: buildLeadContext(lead),
      tracker,
      signal: controller.signal,
      log: scopeLog,
      dialed: false,
    };

    scopeLog.info(`Starting pipeline for ${lead.name}`);

    try {
      await this.execute(scope);
    } catch (error) {
      const message = error instanceof TimeoutError ? 'timeout' : errorMessage(error);
      const stage: PipelineStageName = error instanceof StageError ? this.stageName(error.stage) : tracker.currentStage;
      tracker.fail(stage, message);
      scopeLog.logFailure(lead.identityKey, stage === 'call' && message !== 'timeout' ? 'call' : 'stage', {
        stage,
        error: message,
      });

      // Nobody was contacted, so the lead may be picked up again
      if (!scope.dialed) {
        await this.guard.release(claimKey);
      }
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', forward);
    }

    const run = await tracker.finalize();
    scopeLog.info(`Pipeline ${run.stageStatus === 'done' ? 'finished' : 'halted'} for ${lead.name}`, {
      decision: run.branchDecision,
      callOutcome: run.callOutcome,
      emailSent: run.emailSent,
      error: run.error,
    });
    return { leadId: lead.identityKey, skipped: false, run };
  }

  private stageName(name: string): PipelineStageName {
    return PIPELINE_STAGES.find((stage) => stage === name) ?? 'finalize';
  }

  private async execute(scope: LeadScope): Promise<void> {
    let prior = '';
    let proposal = '';
    let classification: Classification | undefined;

    for (const stage of this.stages) {
      await scope.tracker.start(stage.name);
      const timeoutMs = stage.kind === 'call' ? this.config.callTimeoutMs : this.config.stageTimeoutMs;

      switch (stage.kind) {
        case 'content':
          prior = await withDeadline((signal) => this.runContent(stage, scope, prior, signal), timeoutMs, scope.signal);
          proposal = prior;
          await scope.tracker.complete(stage.name, prior);
          break;
        case 'call':
          prior = await withDeadline((signal) => this.runCall(stage, scope, prior, signal), timeoutMs, scope.signal);
          await scope.tracker.complete(stage.name, scope.tracker.run.callOutcome);
          break;
        case 'classify':
          classification = await withDeadline(
            (signal) => this.runClassify(stage, scope, prior, signal),
            timeoutMs,
            scope.signal
          );
          await scope.tracker.complete(stage.name, classification.category);
          break;
      }
    }

    if (!classification) {
      throw new StageError('classify', 'Pipeline finished without a classification');
    }

    // Pure dispatch on the decision classify recorded
    await scope.tracker.start('branch');
    const plan = planBranch(classification.category);
    await scope.tracker.complete('branch', plan.sendEmail ? 'send_email' : 'no_action');

    if (!plan.sendEmail) {
      scope.tracker.setEmail(false);
      await scope.tracker.skip('email', `decision ${plan.decision}`);
      return;
    }

    await this.runEmail(scope, classification, proposal);
  }

  private async runContent(stage: ContentStage, scope: LeadScope, prior: string, signal: AbortSignal): Promise<string> {
    const response = await stage.client.generate({
      stage: stage.name,
      prompt: renderTemplate(stage.inputTemplate, { priorStageOutput: prior, leadContext: scope.leadContext }),
      priorStageOutput: prior,
      leadContext: scope.leadContext,
      signal,
    });

    if ('error' in response) {
      throw new StageError(stage.name, response.error);
    }
    scope.log.debug(`Stage ${stage.name} complete`, { length: response.text.length });
    return response.text;
  }

  // Returns the text classify works from; no_answer is an outcome, not a failure
  private async runCall(stage: CallStage, scope: LeadScope, proposal: string, signal: AbortSignal): Promise<string> {
    const phoneNumber = scope.lead.phone ? normalizePhone(scope.lead.phone) : '';
    if (!isE164(phoneNumber)) {
      throw new StageError('call', `Lead has no valid phone number (${scope.lead.phone ?? 'none'})`);
    }

    scope.dialed = true;
    const result = await stage.client.placeCall({
      phoneNumber,
      scriptText: renderTemplate(stage.inputTemplate, { priorStageOutput: proposal, leadContext: scope.leadContext }),
      leadName: scope.lead.name,
      signal,
    });
    scope.tracker.setCallResult(result);
    scope.log.info('Call ended', { status: result.status, callId: result.callId, turns: result.transcript.length });

    if (result.status === 'failed' || result.status === 'error') {
      throw new StageError('call', result.error ?? `Call ${result.status}`);
    }
    if (result.status === 'no_answer') {
      return 'No conversation took place: the call was not answered.';
    }
    return formatTranscript(result.transcript);
  }

  private async runClassify(
    stage: ClassifyStage,
    scope: LeadScope,
    transcript: string,
    signal: AbortSignal
  ): Promise<Classification> {
    const response = await stage.client.generate({
      stage: stage.name,
      prompt: renderTemplate(stage.inputTemplate, { priorStageOutput: transcript, leadContext: scope.leadContext }),
      priorStageOutput: transcript,
      leadContext: scope.leadContext,
      json: true,
      signal,
    });

    if ('error' in response) {
      throw new StageError(stage.name, response.error);
    }

    const classification = parseClassification(response.text);
    if (classification.ambiguous) {
      scope.log.warn('Classification ambiguous, treating as other', { output: response.text.slice(0, 200) });
    }
    scope.tracker.setBranchDecision(classification.category, classification.note);
    return classification;
  }

  private async runEmail(scope: LeadScope, classification: Classification, proposal: string): Promise<void> {
    const { lead, tracker } = scope;
    // A captured address wins; the lead itself is left untouched
    const recipient = classification.email ?? lead.email;

    if (!recipient) {
      tracker.setEmail(false);
      await tracker.skip('email', 'no recipient address');
      scope.log.warn('Lead agreed to email but no address is known');
      return;
    }

    const key = emailClaimKey(lead);
    if (!(await this.guard.claim(key, 'email'))) {
      tracker.setEmail(false, recipient);
      await tracker.skip('email', 'proposal already sent to this lead');
      return;
    }

    await tracker.start('email');
    try {
      const receipt = await withDeadline(
        () =>
          this.email.send({
            to: recipient,
            subject: renderTemplate(this.emailConfig.subjectTemplate, { name: lead.name }),
            body: proposal,
          }),
        this.config.stageTimeoutMs,
        scope.signal
      );
      tracker.setEmail(true, recipient);
      await tracker.complete('email', receipt.messageId);
    } catch (error) {
      await this.guard.release(key);
      tracker.setEmail(false, recipient);
      if (error instanceof TimeoutError) throw error;
      throw new StageError('email', errorMessage(error), { cause: error });
    }
  }
}
