import { CalendarDate } from '../../shared/time/calendar-date';

export type DispatchSummary = {
  date: CalendarDate;
  campaignsProcessed: number;
  messagesSent: number;
  /** Recipients that became permanently failed in this cycle. */
  messagesFailed: number;
  /** Recipients left pending because the global quota for the date ran out. */
  messagesDeferred: number;
  heldEventsExpired: number;
};

export type RecipientOutcome = 'sent' | 'failed' | 'retry' | 'deferred' | 'skipped';
