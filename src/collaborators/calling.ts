/**
 * Calling collaborator
 * Places an outbound voice call and waits for it to end
 */

import { z } from 'zod';
import { CallingConfig } from '../config/types';
import { CallStatus, TranscriptTurn } from '../state/types';
import { errorMessage } from '../lib/errors';
import { Clock, Sleep, sleep } from '../lib/utils';
import { logger } from '../lib/logger';

export interface CallRequest {
  phoneNumber: string;               // E.164
  scriptText: string;
  leadName: string;
  signal?: AbortSignal;
}

export interface CallResult {
  status: CallStatus;
  transcript: TranscriptTurn[];
  callId: string;
  error?: string;
}

export interface CallingClient {
  placeCall(request: CallRequest): Promise<CallResult>;
}

// Provider statuses folded into the four outcomes the pipeline knows
export function mapCallStatus(providerStatus: string): CallStatus | null {
  switch (providerStatus.toLowerCase()) {
    case 'done':
    case 'completed':
      return 'done';
    case 'no_answer':
    case 'busy':
    case 'rejected':
    case 'declined':
      return 'no_answer';
    case 'failed':
    case 'error':
      return 'failed';
    default:
      return null;
  }
}

const outboundResponseSchema = z
  .object({
    conversation_id: z.string().nullable().optional(),
    callSid: z.string().nullable().optional(),
    message: z.string().optional(),
  })
  .passthrough();

const conversationSchema = z
  .object({
    status: z.string(),
    transcript: z
      .array(
        z
          .object({
            role: z.string().default('unknown'),
            message: z.string().nullable().optional(),
          })
          .passthrough()
      )
      .nullable()
      .optional(),
  })
  .passthrough();

export type FetchFn = typeof fetch;

export interface ElevenLabsOptions {
  apiKey?: string;
  fetch?: FetchFn;
  sleep?: Sleep;
  now?: Clock;
}

export class ElevenLabsCallingClient implements CallingClient {
  private readonly apiKey: string;
  private readonly fetchFn: FetchFn;
  private readonly sleep: Sleep;
  private readonly now: Clock;

  constructor(
    private readonly config: CallingConfig,
    options: ElevenLabsOptions = {}
  ) {
    this.apiKey = options.apiKey ?? process.env.ELEVENLABS_API_KEY ?? '';
    this.fetchFn = options.fetch ?? fetch;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
  }

  async placeCall(request: CallRequest): Promise<CallResult> {
    if (!this.apiKey || !this.config.agentId || !this.config.phoneNumberId) {
      return { status: 'error', transcript: [], callId: '', error: 'Calling provider is not configured' };
    }

    let callId: string;
    try {
      callId = await this.startCall(request);
    } catch (error) {
      return { status: 'error', transcript: [], callId: '', error: errorMessage(error) };
    }

    logger.info('Call initiated', { callId, lead: request.leadName });
    return this.pollUntilEnded(callId, request.signal);
  }

  private async startCall(request: CallRequest): Promise<string> {
    const response = await this.fetchFn(`${this.config.baseUrl}/v1/convai/twilio/outbound-call`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'xi-api-key': this.apiKey },
      body: JSON.stringify({
        agent_id: this.config.agentId,
        agent_phone_number_id: this.config.phoneNumberId,
        to_number: request.phoneNumber,
        conversation_initiation_client_data: {
          conversation_config_override: { agent: { prompt: { prompt: request.scriptText }, language: 'en' } },
          dynamic_variables: { customer_name: request.leadName },
        },
      }),
      signal: request.signal,
    });

    if (!response.ok) {
      throw new Error(`Outbound call failed: ${response.status} ${await response.text()}`);
    }

    const parsed = outboundResponseSchema.safeParse(await response.json());
    const callId = parsed.success ? parsed.data.conversation_id ?? parsed.data.callSid : null;
    if (!callId) {
      throw new Error('Outbound call response carried no conversation id');
    }
    return callId;
  }

  // Poll errors are retried until the poll timeout; an abort from the caller propagates
  private async pollUntilEnded(callId: string, signal?: AbortSignal): Promise<CallResult> {
    const deadline = this.now() + this.config.pollTimeoutMs;
    let transcript: TranscriptTurn[] = [];

    while (this.now() < deadline) {
      await this.sleep(this.config.pollIntervalMs);
      signal?.throwIfAborted();

      try {
        const response = await this.fetchFn(
          `${this.config.baseUrl}/v1/convai/conversations/${encodeURIComponent(callId)}`,
          { headers: { 'xi-api-key': this.apiKey }, signal }
        );
        if (!response.ok) {
          throw new Error(`Conversation lookup failed: ${response.status}`);
        }

        const conversation = conversationSchema.parse(await response.json());
        if (conversation.transcript) {
          transcript = conversation.transcript.map((turn) => ({ role: turn.role, text: turn.message ?? '' }));
        }

        const status = mapCallStatus(conversation.status);
        if (status === 'done') {
          return { status, transcript, callId };
        }
        if (status !== null) {
          return { status, transcript: [], callId, error: `Call ended with status ${conversation.status}` };
        }
      } catch (error) {
        if (signal?.aborted) throw error;
        logger.warn('Error polling conversation', { callId, error: errorMessage(error) });
      }
    }

    return { status: 'error', transcript, callId, error: 'Call status polling timeout' };
  }
}
