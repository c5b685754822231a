import { ValidationError } from '../errors/dispatch-errors';

/** ISO calendar date, `YYYY-MM-DD`. Lexicographic order equals chronological order. */
export type CalendarDate = string;

export interface Clock {
  now(): Date;
}

export const CLOCK = Symbol('CLOCK');

export const systemClock: Clock = {
  now: () => new Date()
};

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return false;
  }

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return formatUtcDate(date) === value;
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const match = ISO_DATE.exec(date);
  if (!match || !isCalendarDate(date)) {
    throw new ValidationError([`"${date}" is not a calendar date (YYYY-MM-DD)`]);
  }

  const [, year, month, day] = match;
  return formatUtcDate(new Date(Date.UTC(Number(year), Number(month) - 1, Number(day) + days)));
}

export function calendarDateIn(instant: Date, timeZone: string): CalendarDate {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  }).formatToParts(instant);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((item) => item.type === type)?.value ?? '';

  return `${part('year')}-${part('month')}-${part('day')}`;
}

export function laterDate(a: CalendarDate, b: CalendarDate): CalendarDate {
  return a >= b ? a : b;
}

function formatUtcDate(date: Date): CalendarDate {
  return date.toISOString().slice(0, 10);
}
