/**
 * Utility functions for the outreach pipeline
 */

import * as crypto from 'crypto';
import { TimeoutError } from './errors';

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

// Sleep for specified milliseconds
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type Backoff = 'linear' | 'exponential';

export function backoffDelay(attempt: number, baseDelay: number, backoff: Backoff): number {
  return backoff === 'linear' ? baseDelay * attempt : baseDelay * Math.pow(2, attempt - 1);
}

/**
 * Run fn under its own abort scope that fires after `ms` or when `parent` aborts.
 * Rejects with the abort reason as soon as the scope aborts, even if fn ignores its signal.
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const forward = (): void => controller.abort(parent?.reason);
  const timer = setTimeout(() => controller.abort(new TimeoutError('timeout')), ms);

  if (parent?.aborted) {
    forward();
  } else {
    parent?.addEventListener('abort', forward, { once: true });
  }

  const aborted = new Promise<never>((_, reject) => {
    const fail = (): void => reject(controller.signal.reason);
    if (controller.signal.aborted) {
      fail();
    } else {
      controller.signal.addEventListener('abort', fail, { once: true });
    }
  });

  try {
    return await Promise.race([fn(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', forward);
  }
}

// Run fn over items with at most `limit` in flight, preserving result order
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

// Values producers emit when they mean "nothing"
const PLACEHOLDER_VALUES = new Set(['', 'null', 'none', 'n/a', 'undefined']);

export function isBlank(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string') return PLACEHOLDER_VALUES.has(value.trim().toLowerCase());
  return false;
}

// Trimmed string or undefined for blanks
export function cleanString(value: unknown): string | undefined {
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string' || isBlank(value)) return undefined;
  return value.trim();
}

// Normalize phone number to E.164 format (simplified)
export function normalizePhone(phone: string): string {
  const trimmed = phone.trim();
  const digits = trimmed.replace(/\D/g, '');
  if (trimmed.startsWith('+') && digits.length >= 8 && digits.length <= 15) {
    return `+${digits}`;
  }
  if (digits.length === 10) {
    return `+1${digits}`;
  }
  if (digits.length === 11 && digits.startsWith('1')) {
    return `+${digits}`;
  }
  return trimmed;
}

export function isE164(phone: string): boolean {
  return /^\+[1-9]\d{7,14}$/.test(phone);
}

// Normalize email
export function normalizeEmail(email: string): string {
  return email.toLowerCase().trim();
}

export function isLikelyEmail(value: string): boolean {
  return /^[^\s@]+@[^\s@]+\.[^\s@]{2,}$/.test(value);
}

// Generate a timestamp string for identifiers
export function timestampString(date: Date = new Date()): string {
  return date.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
}

export function generateSessionId(date: Date = new Date()): string {
  return `sess_${timestampString(date)}_${crypto.randomBytes(3).toString('hex')}`;
}

export function generateRunId(): string {
  const timestamp = Date.now().toString(36);
  const random = crypto.randomBytes(4).toString('hex');
  return `run_${timestamp}_${random}`;
}

// Simple {{placeholder}} substitution; unknown placeholders render empty
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (_, key: string) => values[key] ?? '');
}

// Rate limiter helper
export class RateLimiter {
  private queue: number[] = [];
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly wait: Sleep;

  constructor(maxRequests: number, windowMs: number, wait: Sleep = sleep) {
    this.maxRequests = maxRequests;
    this.windowMs = windowMs;
    this.wait = wait;
  }

  async acquire(): Promise<void> {
    const now = Date.now();

    // Remove old entries
    this.queue = this.queue.filter((time) => now - time < this.windowMs);

    if (this.queue.length >= this.maxRequests) {
      // Wait until oldest request expires
      const oldestTime = this.queue[0];
      const waitTime = this.windowMs - (now - oldestTime) + 100; // +100ms buffer
      await this.wait(waitTime);
      return this.acquire();
    }

    this.queue.push(now);
  }
}
