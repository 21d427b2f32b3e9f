import { describe, it, expect } from 'vitest';
import { planBranch, shouldScheduleMeeting } from './branch';
import { CALL_CATEGORIES } from '../state/types';

describe('planBranch', () => {
  it('sends email only for agreed_to_email', () => {
    const emailing = CALL_CATEGORIES.filter((category) => planBranch(category).sendEmail);
    expect(emailing).toEqual(['agreed_to_email']);
  });
});

describe('shouldScheduleMeeting', () => {
  it('needs both a hot lead and a meeting request', () => {
    expect(shouldScheduleMeeting({ hotLead: true, meetingRequest: true })).toBe(true);
    expect(shouldScheduleMeeting({ hotLead: true, meetingRequest: false })).toBe(false);
    expect(shouldScheduleMeeting({ hotLead: false, meetingRequest: true })).toBe(false);
    expect(shouldScheduleMeeting({ hotLead: false, meetingRequest: false })).toBe(false);
  });
});
