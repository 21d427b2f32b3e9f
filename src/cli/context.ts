/**
 * Service wiring for CLI commands
 * Everything is built from one Store handle and one config; nothing is a module-level singleton
 */

import { OutreachConfig } from '../config/types';
import { getConfig } from '../config';
import { env } from '../lib/env';
import {
  Store,
  SqlIdempotencyGuard,
  SqlLeadRepository,
  SqlPipelineRunRepository,
  SqlSessionRepository,
  SessionService,
} from '../state';
import { LeadRetriever, LeadStoreWriter, WriteVerifier } from '../stages/ingest';
import { DiscoverStage } from '../stages/discover';
import { PipelineOrchestrator, buildStages } from '../pipeline';
import { OpenAIContentClient } from '../collaborators/content';
import { ElevenLabsCallingClient } from '../collaborators/calling';
import { createEmailSender } from '../collaborators/email';
import { LogCalendarScheduler } from '../collaborators/calendar';
import { ReplyTriage } from '../lead-manager/reply-triage';

export interface AppContext {
  config: OutreachConfig;
  store: Store;
  leads: SqlLeadRepository;
  sessionRepository: SqlSessionRepository;
  sessions: SessionService;
  runs: SqlPipelineRunRepository;
  guard: SqlIdempotencyGuard;
  writer: LeadStoreWriter;
  verifier: WriteVerifier;
  retriever: LeadRetriever;
  discover: DiscoverStage;
}

export function createContext(store: Store, config: OutreachConfig): AppContext {
  const leads = new SqlLeadRepository(store);
  const sessionRepository = new SqlSessionRepository(store);
  const sessions = new SessionService(sessionRepository);

  return {
    config,
    store,
    leads,
    sessionRepository,
    sessions,
    runs: new SqlPipelineRunRepository(store),
    guard: new SqlIdempotencyGuard(store),
    writer: new LeadStoreWriter({ leads, sessions }),
    verifier: new WriteVerifier(leads, sessionRepository, {
      pollIntervalMs: config.ingestion.verifyPollIntervalMs,
      maxWaitMs: config.ingestion.verifyMaxWaitMs,
    }),
    retriever: new LeadRetriever(leads, {
      attempts: config.ingestion.retrieveAttempts,
      backoffMs: config.ingestion.retrieveBackoffMs,
      attemptTimeoutMs: config.ingestion.retrieveAttemptTimeoutMs,
    }),
    discover: new DiscoverStage(config.sources),
  };
}

// Collaborator clients need credentials, so they are only built by the commands that call out
export function createOrchestrator(ctx: AppContext, concurrency?: number): PipelineOrchestrator {
  const { config } = ctx;
  return new PipelineOrchestrator({
    stages: buildStages({
      content: new OpenAIContentClient(config.content),
      calling: new ElevenLabsCallingClient(config.calling),
    }),
    runs: ctx.runs,
    guard: ctx.guard,
    email: createEmailSender(config.email),
    config: concurrency ? { ...config.pipeline, concurrency } : config.pipeline,
    emailConfig: config.email,
  });
}

export function createReplyTriage(ctx: AppContext): ReplyTriage {
  return new ReplyTriage({
    guard: ctx.guard,
    analyzer: new OpenAIContentClient(ctx.config.content),
    calendar: new LogCalendarScheduler(ctx.config.calendar),
    leads: ctx.leads,
    runs: ctx.runs,
  });
}

// Open the store, run the command, always close the store
export async function withContext<T>(fn: (ctx: AppContext) => Promise<T>): Promise<T> {
  const config = getConfig();
  const store = await Store.open({ path: env.DB_PATH });
  try {
    return await fn(createContext(store, config));
  } finally {
    store.close();
  }
}
