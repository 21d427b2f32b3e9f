import { describe, it, expect } from 'vitest';
import { ElevenLabsCallingClient, FetchFn, mapCallStatus } from './calling';
import { callingConfigSchema } from '../config/types';
import { FakeClock } from '../test-helpers';

interface RecordedCall {
  url: string;
  method: string;
  body?: string;
}

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

// Answers the outbound call, then each conversation poll from the list in turn
function fakeProvider(polls: Array<() => Response>, outbound: () => Response = () => json(200, { conversation_id: 'conv_1' })) {
  const calls: RecordedCall[] = [];
  let poll = 0;
  const fetchFn: FetchFn = async (input, init) => {
    const url = String(input);
    calls.push({ url, method: init?.method ?? 'GET', body: typeof init?.body === 'string' ? init.body : undefined });
    if (url.endsWith('/outbound-call')) return outbound();
    const next = polls[Math.min(poll, polls.length - 1)];
    poll++;
    return next();
  };
  return { calls, fetchFn };
}

const config = callingConfigSchema.parse({
  agentId: 'agent-test',
  phoneNumberId: 'phone-test',
  pollIntervalMs: 2000,
  pollTimeoutMs: 6000,
});

const request = { phoneNumber: '+15551112222', scriptText: 'Hello from the agency', leadName: "Joe's Cafe" };

describe('mapCallStatus', () => {
  it('folds provider statuses into pipeline outcomes', () => {
    expect(mapCallStatus('completed')).toBe('done');
    expect(mapCallStatus('DONE')).toBe('done');
    expect(mapCallStatus('busy')).toBe('no_answer');
    expect(mapCallStatus('no_answer')).toBe('no_answer');
    expect(mapCallStatus('failed')).toBe('failed');
    expect(mapCallStatus('in-progress')).toBeNull();
  });
});

describe('ElevenLabsCallingClient', () => {
  it('places the call and returns the transcript once it is done', async () => {
    const clock = new FakeClock();
    const provider = fakeProvider([
      () => json(200, { status: 'in-progress' }),
      () =>
        json(200, {
          status: 'done',
          transcript: [
            { role: 'agent', message: 'Hi, is this the owner?' },
            { role: 'user', message: 'Speaking.' },
            { role: 'agent', message: null },
          ],
        }),
    ]);
    const client = new ElevenLabsCallingClient(config, {
      apiKey: 'test-secret',
      fetch: provider.fetchFn,
      sleep: clock.sleep,
      now: clock.now,
    });

    const result = await client.placeCall(request);

    expect(result).toEqual({
      status: 'done',
      callId: 'conv_1',
      transcript: [
        { role: 'agent', text: 'Hi, is this the owner?' },
        { role: 'user', text: 'Speaking.' },
        { role: 'agent', text: '' },
      ],
    });
    expect(provider.calls.map((c) => [c.method, c.url])).toEqual([
      ['POST', 'https://api.elevenlabs.io/v1/convai/twilio/outbound-call'],
      ['GET', 'https://api.elevenlabs.io/v1/convai/conversations/conv_1'],
      ['GET', 'https://api.elevenlabs.io/v1/convai/conversations/conv_1'],
    ]);
    expect(JSON.parse(provider.calls[0].body ?? '{}')).toMatchObject({
      agent_id: 'agent-test',
      agent_phone_number_id: 'phone-test',
      to_number: '+15551112222',
    });
  });

  it('reports an unanswered call as no_answer with no transcript', async () => {
    const clock = new FakeClock();
    const provider = fakeProvider([() => json(200, { status: 'busy', transcript: [{ role: 'agent', message: 'Hello?' }] })]);
    const client = new ElevenLabsCallingClient(config, {
      apiKey: 'test-secret',
      fetch: provider.fetchFn,
      sleep: clock.sleep,
      now: clock.now,
    });

    const result = await client.placeCall(request);

    expect(result).toEqual({ status: 'no_answer', transcript: [], callId: 'conv_1', error: 'Call ended with status busy' });
  });

  it('gives up when the call never ends, tolerating failed polls', async () => {
    const clock = new FakeClock();
    const provider = fakeProvider([
      () => json(500, { detail: 'unavailable' }),
      () => json(200, { status: 'in-progress' }),
    ]);
    const client = new ElevenLabsCallingClient(config, {
      apiKey: 'test-secret',
      fetch: provider.fetchFn,
      sleep: clock.sleep,
      now: clock.now,
    });

    const result = await client.placeCall(request);

    expect(result).toEqual({ status: 'error', transcript: [], callId: 'conv_1', error: 'Call status polling timeout' });
    expect(provider.calls).toHaveLength(4);
  });

  it('returns an error result when the call cannot be placed', async () => {
    const provider = fakeProvider([], () => json(422, { detail: 'bad number' }));
    const client = new ElevenLabsCallingClient(config, { apiKey: 'test-secret', fetch: provider.fetchFn });

    const result = await client.placeCall(request);

    expect(result).toEqual({
      status: 'error',
      transcript: [],
      callId: '',
      error: 'Outbound call failed: 422 {"detail":"bad number"}',
    });
  });

  it('does not dial without credentials', async () => {
    const provider = fakeProvider([]);
    const client = new ElevenLabsCallingClient(callingConfigSchema.parse({}), { apiKey: 'test-secret', fetch: provider.fetchFn });

    const result = await client.placeCall(request);

    expect(result).toEqual({ status: 'error', transcript: [], callId: '', error: 'Calling provider is not configured' });
    expect(provider.calls).toEqual([]);
  });
});
