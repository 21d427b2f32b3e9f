/**
 * Reply triage
 * Handles an inbound reply to a proposal: qualify it, flag hot leads, and book a meeting
 * only when the lead is hot AND asked for one. Each message is processed at most once.
 */

import { z } from 'zod';
import { ContentClient } from '../collaborators/content';
import { CalendarScheduler } from '../collaborators/calendar';
import { IdempotencyGuard, LeadRepository, PipelineRunRepository } from '../state/ports';
import { errorMessage } from '../lib/errors';
import { cleanString, renderTemplate } from '../lib/utils';
import { logger } from '../lib/logger';
import { shouldScheduleMeeting } from '../pipeline/branch';
import { buildLeadContext } from '../pipeline/stages';
import { REPLY_ANALYSIS_TEMPLATE } from '../pipeline/prompts';

export const inboundReplySchema = z.object({
  messageId: z.string().min(1),
  leadId: z.string().min(1),
  from: z.string().min(1),
  subject: z.string().default(''),
  body: z.string().default(''),
  receivedAt: z.coerce.number().optional(),
});

export type InboundReply = z.infer<typeof inboundReplySchema>;

export interface ReplyAnalysis {
  hotLead: boolean;
  meetingRequest: boolean;
  reason?: string;
}

export interface TriageResult {
  messageId: string;
  leadId: string;
  duplicate: boolean;
  hotLead: boolean;
  meetingRequest: boolean;
  meetingScheduled: boolean;
  meetingId?: string;
  reason?: string;
}

const analysisSchema = z.object({
  hot_lead: z.boolean().default(false),
  meeting_request: z.boolean().default(false),
  reason: z.string().nullable().optional(),
});

// Anything that isn't the expected JSON object qualifies nothing
export function parseReplyAnalysis(text: string): ReplyAnalysis {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return { hotLead: false, meetingRequest: false };
  }

  let document: unknown;
  try {
    document = JSON.parse(text.slice(start, end + 1));
  } catch {
    return { hotLead: false, meetingRequest: false };
  }

  const parsed = analysisSchema.safeParse(document);
  if (!parsed.success) {
    return { hotLead: false, meetingRequest: false };
  }
  return {
    hotLead: parsed.data.hot_lead,
    meetingRequest: parsed.data.meeting_request,
    reason: cleanString(parsed.data.reason),
  };
}

export interface ReplyTriageDeps {
  guard: IdempotencyGuard;
  analyzer: ContentClient;
  calendar: CalendarScheduler;
  leads: LeadRepository;
  runs: PipelineRunRepository;
}

export class ReplyTriage {
  constructor(private readonly deps: ReplyTriageDeps) {}

  async handle(reply: InboundReply): Promise<TriageResult> {
    const log = logger.child({ stage: 'triage', leadId: reply.leadId });
    const key = `reply:${reply.messageId}`;

    if (!(await this.deps.guard.claim(key, 'reply'))) {
      log.info('Reply already processed', { messageId: reply.messageId });
      return {
        messageId: reply.messageId,
        leadId: reply.leadId,
        duplicate: true,
        hotLead: false,
        meetingRequest: false,
        meetingScheduled: false,
      };
    }

    try {
      return await this.process(reply, log);
    } catch (error) {
      // Let the message be retried
      await this.deps.guard.release(key);
      log.error('Reply triage failed', { messageId: reply.messageId, error: errorMessage(error) });
      throw error;
    }
  }

  private async process(reply: InboundReply, log: typeof logger): Promise<TriageResult> {
    const lead = await this.deps.leads.findByIdentityKey(reply.leadId);
    const leadContext = lead ? buildLeadContext(lead) : `contact: ${reply.from}`;
    const replyText = `Subject: ${reply.subject}\n\n${reply.body}`;

    const response = await this.deps.analyzer.generate({
      stage: 'reply_analysis',
      prompt: renderTemplate(REPLY_ANALYSIS_TEMPLATE, { priorStageOutput: replyText, leadContext }),
      priorStageOutput: replyText,
      leadContext,
      json: true,
    });

    let analysis: ReplyAnalysis;
    if ('error' in response) {
      log.warn('Reply analysis failed, treating reply as unqualified', { error: response.error });
      analysis = { hotLead: false, meetingRequest: false };
    } else {
      analysis = parseReplyAnalysis(response.text);
    }

    if (analysis.hotLead) {
      log.warn(`Hot lead: ${lead?.name ?? reply.from}`, { from: reply.from, reason: analysis.reason });
    }

    const result: TriageResult = {
      messageId: reply.messageId,
      leadId: reply.leadId,
      duplicate: false,
      hotLead: analysis.hotLead,
      meetingRequest: analysis.meetingRequest,
      meetingScheduled: false,
      reason: analysis.reason,
    };

    if (!shouldScheduleMeeting(analysis)) {
      log.info('No meeting needed', { hotLead: analysis.hotLead, meetingRequest: analysis.meetingRequest });
      return result;
    }

    const meeting = await this.deps.calendar.schedule({
      leadId: reply.leadId,
      leadName: lead?.name ?? reply.from,
      attendeeEmail: reply.from,
      summary: `Website proposal follow-up${lead ? ` with ${lead.name}` : ''}`,
    });

    const run = await this.deps.runs.latestForLead(reply.leadId);
    if (run) {
      await this.deps.runs.save({ ...run, meetingId: meeting.meetingId });
    } else {
      log.warn('No pipeline run to attach the meeting to', { meetingId: meeting.meetingId });
    }

    return { ...result, meetingScheduled: true, meetingId: meeting.meetingId };
  }
}
