/**
 * Triage command - run reply triage over an inbound reply stored as JSON
 */

import * as fs from 'fs';
import { AppContext, createReplyTriage } from '../context';
import { TriageResult, inboundReplySchema } from '../../lead-manager/reply-triage';

export async function runTriage(ctx: AppContext, file: string): Promise<TriageResult> {
  const document: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  const parsed = inboundReplySchema.safeParse(document);
  if (!parsed.success) {
    throw new Error(`Invalid reply in ${file}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
  }

  const result = await createReplyTriage(ctx).handle(parsed.data);

  console.log(`\n=== Reply ${result.messageId} ===`);
  if (result.duplicate) {
    console.log('Already processed');
  } else {
    console.log(`Hot lead: ${result.hotLead ? 'yes' : 'no'}  meeting requested: ${result.meetingRequest ? 'yes' : 'no'}`);
    console.log(`Meeting: ${result.meetingScheduled ? result.meetingId : 'not scheduled'}`);
    if (result.reason) console.log(`Reason: ${result.reason}`);
  }
  console.log('');
  return result;
}
