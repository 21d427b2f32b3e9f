/**
 * Calendar collaborator
 * Books a follow-up meeting for a hot lead that asked for one
 */

import * as crypto from 'crypto';
import { CalendarConfig } from '../config/types';
import { Clock } from '../lib/utils';
import { logger } from '../lib/logger';

export interface MeetingRequest {
  leadId: string;
  leadName: string;
  attendeeEmail: string;
  summary: string;
}

export interface ScheduledMeeting {
  meetingId: string;
  start: string;
  end: string;
}

export interface CalendarScheduler {
  schedule(request: MeetingRequest): Promise<ScheduledMeeting>;
}

const HOUR_MS = 60 * 60 * 1000;

// First top-of-the-hour slot at least leadTimeHours away
export function nextSlot(now: number, leadTimeHours: number, durationMinutes: number): { start: Date; end: Date } {
  const start = new Date(Math.ceil((now + leadTimeHours * HOUR_MS) / HOUR_MS) * HOUR_MS);
  const end = new Date(start.getTime() + durationMinutes * 60 * 1000);
  return { start, end };
}

// Logs the booking and hands back a generated meeting id
export class LogCalendarScheduler implements CalendarScheduler {
  constructor(
    private readonly config: CalendarConfig,
    private readonly now: Clock = Date.now
  ) {}

  async schedule(request: MeetingRequest): Promise<ScheduledMeeting> {
    const { start, end } = nextSlot(this.now(), this.config.leadTimeHours, this.config.meetingDurationMinutes);
    const meeting: ScheduledMeeting = {
      meetingId: `mtg_${crypto.randomBytes(6).toString('hex')}`,
      start: start.toISOString(),
      end: end.toISOString(),
    };

    logger.info('Meeting scheduled', {
      leadId: request.leadId,
      attendee: request.attendeeEmail,
      organizer: this.config.organizer,
      timezone: this.config.timezone,
      ...meeting,
    });
    return meeting;
  }
}
