/**
 * Branch rules - pure functions, no side effects
 */

import { BranchDecision } from '../state/types';

export interface BranchPlan {
  decision: BranchDecision;
  sendEmail: boolean;
}

// Only an explicit agreement to receive the proposal leads to an email
export function planBranch(decision: BranchDecision): BranchPlan {
  return { decision, sendEmail: decision === 'agreed_to_email' };
}

export interface Qualification {
  hotLead: boolean;
  meetingRequest: boolean;
}

export function shouldScheduleMeeting(qualification: Qualification): boolean {
  return qualification.hotLead && qualification.meetingRequest;
}
