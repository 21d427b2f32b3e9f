/**
 * Shared HTTP helper for search sources
 */

import { z } from 'zod';

export type FetchFn = typeof fetch;

export const USER_AGENT = 'outreach-pipeline/1.0';

export class SourceHttpError extends Error {
  constructor(
    readonly source: string,
    readonly status: number,
    body: string
  ) {
    super(`${source} request failed: ${status} ${body.slice(0, 200)}`);
    this.name = 'SourceHttpError';
  }
}

// Fetch JSON and validate it; the request aborts on timeout or when the caller's signal fires
export async function fetchJson<T>(
  fetchFn: FetchFn,
  source: string,
  url: string,
  init: RequestInit,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<T> {
  const timeout = AbortSignal.timeout(timeoutMs);
  const response = await fetchFn(url, {
    ...init,
    signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
  });

  if (!response.ok) {
    throw new SourceHttpError(source, response.status, await response.text());
  }

  const parsed = schema.safeParse(await response.json());
  if (!parsed.success) {
    throw new Error(`${source} returned an unexpected payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}
