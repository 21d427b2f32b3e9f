/**
 * Ingest command - load raw records from a JSON file into a session
 */

import * as fs from 'fs';
import { AppContext } from '../context';
import { VerifyResult } from '../../stages/ingest';
import { WriteReport } from '../../state/types';
import { generateSessionId } from '../../lib/utils';
import { logger } from '../../lib/logger';

export interface IngestOptions {
  file: string;
  session?: string;
}

// Accepts a bare array or an object with a `records` array
export function readRecordsFile(file: string): unknown[] {
  const document: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  if (Array.isArray(document)) return document;
  if (typeof document === 'object' && document !== null && 'records' in document && Array.isArray(document.records)) {
    return document.records;
  }
  throw new Error(`${file} must contain a JSON array of records or an object with a "records" array`);
}

export function printWriteReport(report: WriteReport, verification: VerifyResult): void {
  console.log(`\n=== Session ${report.sessionId} ===`);
  console.log(`Status: ${report.status}`);
  console.log(`Requested: ${report.requestedCount}  valid: ${report.validCount}  collapsed: ${report.collapsedCount}`);
  console.log(`Inserted: ${report.insertedCount}  updated: ${report.updatedCount}  failed: ${report.failedCount}`);
  console.log(`Verified: ${report.verifiedCount}  ready: ${verification.ready ? 'yes' : 'no'} (${verification.reason})`);
  for (const error of report.validationErrors) {
    console.log(`  [rejected #${error.index}] ${error.name ?? '(unnamed)'}: ${error.reason}`);
  }
  if (report.lastError) {
    console.log(`Last error: ${report.lastError}`);
  }
  console.log('');
}

export async function runIngest(ctx: AppContext, options: IngestOptions): Promise<WriteReport> {
  const sessionId = options.session ?? generateSessionId();
  const records = readRecordsFile(options.file);
  logger.info('Starting INGEST', { sessionId, file: options.file, records: records.length });

  const report = await ctx.writer.upsert(sessionId, records, { sources: ['file'] });
  const verification = await ctx.verifier.waitForSessionReady(sessionId);
  printWriteReport(report, verification);
  return report;
}
