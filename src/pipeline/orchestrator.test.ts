import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PipelineOrchestrator, emailClaimKey, pipelineClaimKey } from './orchestrator';
import { StageDefinition, buildStages } from './stages';
import { ContentClient, ContentRequest, ContentResponse } from '../collaborators/content';
import { CallRequest, CallResult, CallingClient } from '../collaborators/calling';
import { EmailMessage, EmailReceipt, EmailSender, LogEmailSender } from '../collaborators/email';
import { emailConfigSchema, pipelineConfigSchema, PipelineConfig } from '../config/types';
import { ConfigError } from '../lib/errors';
import { Lead } from '../state/types';
import { TestStore, makeLead, openTestStore } from '../test-helpers';

class ScriptedContent implements ContentClient {
  readonly requests: ContentRequest[] = [];

  constructor(
    private readonly classification: string,
    private readonly failFor?: { stage: string; leadName: string }
  ) {}

  async generate(request: ContentRequest): Promise<ContentResponse> {
    this.requests.push(request);
    if (this.failFor && request.stage === this.failFor.stage && request.leadContext.includes(this.failFor.leadName)) {
      return { error: 'model unavailable' };
    }
    if (request.stage === 'classify') {
      return { text: this.classification };
    }
    return { text: `${request.stage} output` };
  }
}

class ScriptedCalls implements CallingClient {
  readonly requests: CallRequest[] = [];

  constructor(private readonly result: Omit<CallResult, 'callId'>) {}

  async placeCall(request: CallRequest): Promise<CallResult> {
    this.requests.push(request);
    return { ...this.result, callId: `call_${this.requests.length}` };
  }
}

// Hangs until the stage deadline aborts it
const silentLine: CallingClient = {
  placeCall: (request) =>
    new Promise<CallResult>((_, reject) => {
      request.signal?.addEventListener('abort', () => reject(request.signal?.reason));
    }),
};

const AGREED = '{"call_category": "agreed_to_email", "email": "owner@joes.example", "note": "Send it over"}';

const answered: Omit<CallResult, 'callId'> = {
  status: 'done',
  transcript: [
    { role: 'agent', text: 'Could I email you our proposal?' },
    { role: 'user', text: 'Sure, owner@joes.example' },
  ],
};

describe('PipelineOrchestrator', () => {
  let t: TestStore;
  let email: LogEmailSender;
  let config: PipelineConfig;

  beforeEach(async () => {
    t = await openTestStore();
    email = new LogEmailSender();
    config = pipelineConfigSchema.parse({ concurrency: 2, stageTimeoutMs: 1000, callTimeoutMs: 1000, leadTimeoutMs: 5000 });
  });

  afterEach(() => {
    t.store.close();
  });

  function orchestrator(
    content: ContentClient,
    calling: CallingClient,
    overrides: { config?: Partial<PipelineConfig>; email?: EmailSender } = {}
  ): PipelineOrchestrator {
    return new PipelineOrchestrator({
      stages: buildStages({ content, calling }),
      runs: t.runs,
      guard: t.guard,
      email: overrides.email ?? email,
      config: { ...config, ...overrides.config },
      emailConfig: emailConfigSchema.parse({}),
      now: t.clock.now,
    });
  }

  it('runs every stage and emails a lead that agreed', async () => {
    const content = new ScriptedContent(AGREED);
    const calls = new ScriptedCalls(answered);

    const outcome = await orchestrator(content, calls).runLead(makeLead());

    expect(outcome.skipped).toBe(false);
    expect(outcome.run).toMatchObject({
      stage: 'finalize',
      stageStatus: 'done',
      branchDecision: 'agreed_to_email',
      classificationNote: 'Send it over',
      callOutcome: 'done',
      callId: 'call_1',
      emailSent: true,
      emailRecipient: 'owner@joes.example',
    });
    expect(outcome.run?.error).toBeUndefined();

    expect(content.requests.map((r) => r.stage)).toEqual(['research', 'draft', 'review', 'classify']);
    expect(content.requests[1].priorStageOutput).toBe('research output');
    expect(content.requests[3].priorStageOutput).toBe(
      'agent: Could I email you our proposal?\nuser: Sure, owner@joes.example'
    );
    expect(calls.requests[0].phoneNumber).toBe('+15551112222');
    expect(calls.requests[0].scriptText).toContain('review output');

    expect(email.sent).toEqual([
      { to: 'owner@joes.example', subject: "A website proposal for Joe's Cafe", body: 'review output' },
    ]);
  });

  it('persists the run with every stage status and a decision that cannot change', async () => {
    const outcome = await orchestrator(new ScriptedContent(AGREED), new ScriptedCalls(answered)).runLead(makeLead());
    const runId = outcome.run?.runId ?? '';

    const stored = await t.runs.get(runId);
    expect(stored?.branchDecision).toBe('agreed_to_email');
    expect(stored?.stages.map((s) => s.status)).toEqual(['done', 'done', 'done', 'done', 'done', 'done', 'done', 'done']);

    if (!stored) throw new Error('run should be stored');
    await t.runs.save({ ...stored, branchDecision: 'not_interested' });
    expect((await t.runs.get(runId))?.branchDecision).toBe('agreed_to_email');
  });

  it('classifies an unanswered call instead of failing it', async () => {
    const content = new ScriptedContent('{"call_category": "other"}');
    const calls = new ScriptedCalls({ status: 'no_answer', transcript: [] });

    const { run } = await orchestrator(content, calls).runLead(makeLead());

    expect(run).toMatchObject({ stageStatus: 'done', callOutcome: 'no_answer', branchDecision: 'other', emailSent: false });
    expect(run?.stages.find((s) => s.stage === 'email')?.status).toBe('skipped');
    expect(content.requests[3].priorStageOutput).toBe('No conversation took place: the call was not answered.');
    expect(email.sent).toEqual([]);
  });

  it('halts only the lead whose stage failed', async () => {
    const content = new ScriptedContent('{"call_category": "interested"}', { stage: 'draft', leadName: 'Broken Bistro' });
    const broken = makeLead({ identityKey: 'broken00000000000', name: 'Broken Bistro' });
    const healthy = makeLead({ identityKey: 'healthy0000000000', name: 'Healthy Diner' });

    const outcomes = await orchestrator(content, new ScriptedCalls(answered)).runLeads([broken, healthy]);

    expect(outcomes[0].run).toMatchObject({ stage: 'finalize', stageStatus: 'error', error: 'model unavailable' });
    expect(outcomes[0].run?.stages.find((s) => s.stage === 'draft')?.status).toBe('error');
    expect(outcomes[0].run?.branchDecision).toBeUndefined();
    expect(outcomes[1].run).toMatchObject({ stageStatus: 'done', branchDecision: 'interested' });

    // Nothing was sent for the broken lead, so it can be picked up again
    expect(await t.guard.has(pipelineClaimKey(broken))).toBe(false);
    expect(await t.guard.has(pipelineClaimKey(healthy))).toBe(true);
  });

  it('finalizes with error "timeout" when the call overruns its deadline', async () => {
    const { run } = await orchestrator(new ScriptedContent(AGREED), silentLine, {
      config: { callTimeoutMs: 20 },
    }).runLead(makeLead());

    expect(run).toMatchObject({ stage: 'finalize', stageStatus: 'error', error: 'timeout' });
    expect(run?.stages.find((s) => s.stage === 'call')?.status).toBe('error');
    expect(run?.stages.find((s) => s.stage === 'classify')?.status).toBe('skipped');
    // The call may have gone through before the deadline hit
    expect(await t.guard.has(pipelineClaimKey(makeLead()))).toBe(true);
  });

  it('enforces the aggregate deadline per lead', async () => {
    const stalled: ContentClient = {
      generate: (request) =>
        new Promise<ContentResponse>((_, reject) => {
          request.signal?.addEventListener('abort', () => reject(request.signal?.reason));
        }),
    };

    const { run } = await orchestrator(stalled, new ScriptedCalls(answered), {
      config: { leadTimeoutMs: 20, stageTimeoutMs: 1000 },
    }).runLead(makeLead());

    expect(run).toMatchObject({ stageStatus: 'error', error: 'timeout' });
    expect(run?.stages.find((s) => s.stage === 'research')?.status).toBe('error');
  });

  it('fails the call stage for a lead without a usable phone number', async () => {
    const calls = new ScriptedCalls(answered);

    const { run } = await orchestrator(new ScriptedContent(AGREED), calls).runLead(makeLead({ phone: undefined }));

    expect(run).toMatchObject({ stageStatus: 'error', error: 'Lead has no valid phone number (none)' });
    expect(run?.stages.find((s) => s.stage === 'call')?.status).toBe('error');
    expect(calls.requests).toEqual([]);
    expect(await t.guard.has(pipelineClaimKey(makeLead()))).toBe(false);
  });

  it('keeps the claim when a placed call fails', async () => {
    const calls = new ScriptedCalls({ status: 'failed', transcript: [], error: 'line busy' });

    const { run } = await orchestrator(new ScriptedContent(AGREED), calls).runLead(makeLead());

    expect(run).toMatchObject({ stageStatus: 'error', error: 'line busy', callOutcome: 'failed' });
    expect(await t.guard.has(pipelineClaimKey(makeLead()))).toBe(true);
  });

  it('skips a lead that already ran for its session unless forced', async () => {
    const pipeline = orchestrator(new ScriptedContent(AGREED), new ScriptedCalls(answered));
    const lead = makeLead();

    await pipeline.runLead(lead);
    const repeat = await pipeline.runLead(lead);
    expect(repeat).toEqual({ leadId: lead.identityKey, skipped: true, run: null });

    const forced = await pipeline.runLead(lead, { force: true });
    expect(forced.run).toMatchObject({ stageStatus: 'done', emailSent: false });
    expect(forced.run?.stages.find((s) => s.stage === 'email')?.output).toBe('proposal already sent to this lead');
    expect(email.sent).toHaveLength(1);
  });

  it('releases the email claim when sending fails', async () => {
    const failing: EmailSender = {
      send: async (_message: EmailMessage): Promise<EmailReceipt> => {
        throw new Error('mailbox unavailable');
      },
    };
    const lead: Lead = makeLead();

    const { run } = await orchestrator(new ScriptedContent(AGREED), new ScriptedCalls(answered), {
      email: failing,
    }).runLead(lead);

    expect(run).toMatchObject({ stageStatus: 'error', error: 'mailbox unavailable', emailSent: false });
    expect(run?.branchDecision).toBe('agreed_to_email');
    expect(await t.guard.has(emailClaimKey(lead))).toBe(false);
  });

  it('falls back to the lead email when the call captured none', async () => {
    const content = new ScriptedContent('{"call_category": "agreed_to_email"}');

    const { run } = await orchestrator(content, new ScriptedCalls(answered)).runLead(
      makeLead({ email: 'hello@joes.example' })
    );

    expect(run?.emailRecipient).toBe('hello@joes.example');
    expect(email.sent[0].to).toBe('hello@joes.example');
  });

  it('refuses stage lists out of order', () => {
    const stages: StageDefinition[] = buildStages({
      content: new ScriptedContent(AGREED),
      calling: new ScriptedCalls(answered),
    }).reverse();

    expect(
      () =>
        new PipelineOrchestrator({
          stages,
          runs: t.runs,
          guard: t.guard,
          email,
          config,
          emailConfig: emailConfigSchema.parse({}),
        })
    ).toThrow(ConfigError);
  });
});
