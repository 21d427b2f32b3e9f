/**
 * Configuration type definitions
 * All thresholds, timeouts and collaborator settings are defined here
 */

import { z } from 'zod';

// Source configuration for discovery
export const sourceConfigSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['foursquare', 'overpass']),
  enabled: z.boolean().default(true),
  baseUrl: z.string().url().optional(),
  rateLimit: z.number().int().positive().default(60),  // requests per minute
  radius: z.number().int().positive().default(2000),   // meters
  timeoutMs: z.number().int().positive().default(30000),
});

export const ingestionConfigSchema = z.object({
  verifyPollIntervalMs: z.number().int().positive().default(1000),
  verifyMaxWaitMs: z.number().int().positive().default(30000),
  retrieveAttempts: z.number().int().positive().default(5),
  retrieveBackoffMs: z.number().int().nonnegative().default(1000),
  retrieveAttemptTimeoutMs: z.number().int().positive().default(10000),
  defaultLimit: z.number().int().positive().default(50),
});

export const pipelineConfigSchema = z.object({
  concurrency: z.number().int().positive().default(3),
  stageTimeoutMs: z.number().int().positive().default(120000),
  callTimeoutMs: z.number().int().positive().default(300000),
  leadTimeoutMs: z.number().int().positive().default(600000),
});

export const contentConfigSchema = z.object({
  model: z.string().default('gpt-4o-mini'),
  temperature: z.number().min(0).max(2).default(0.4),
  maxTokens: z.number().int().positive().default(1200),
});

export const callingConfigSchema = z.object({
  baseUrl: z.string().url().default('https://api.elevenlabs.io'),
  agentId: z.string().default(''),
  phoneNumberId: z.string().default(''),
  pollIntervalMs: z.number().int().positive().default(2000),
  pollTimeoutMs: z.number().int().positive().default(240000),
});

export const emailConfigSchema = z.object({
  provider: z.enum(['log', 'ses']).default('log'),
  fromAddress: z.string().default(''),
  region: z.string().default('us-east-1'),
  subjectTemplate: z.string().default('A website proposal for {{name}}'),
});

export const calendarConfigSchema = z.object({
  organizer: z.string().default(''),
  timezone: z.string().default('UTC'),
  meetingDurationMinutes: z.number().int().positive().default(30),
  leadTimeHours: z.number().int().nonnegative().default(24),
});

const DEFAULT_SOURCES: z.input<typeof sourceConfigSchema>[] = [
  { name: 'foursquare', type: 'foursquare' },
  { name: 'openstreetmap', type: 'overpass', radius: 5000 },
];

// Main configuration schema
export const configSchema = z.object({
  version: z.string().default('1.0.0'),
  sources: z.array(sourceConfigSchema).default(DEFAULT_SOURCES),
  ingestion: ingestionConfigSchema.default({}),
  pipeline: pipelineConfigSchema.default({}),
  content: contentConfigSchema.default({}),
  calling: callingConfigSchema.default({}),
  email: emailConfigSchema.default({}),
  calendar: calendarConfigSchema.default({}),
});

export type SourceConfig = z.infer<typeof sourceConfigSchema>;
export type IngestionConfig = z.infer<typeof ingestionConfigSchema>;
export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type ContentConfig = z.infer<typeof contentConfigSchema>;
export type CallingConfig = z.infer<typeof callingConfigSchema>;
export type EmailConfig = z.infer<typeof emailConfigSchema>;
export type CalendarConfig = z.infer<typeof calendarConfigSchema>;
export type OutreachConfig = z.infer<typeof configSchema>;
