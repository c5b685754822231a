import { addDays, CalendarDate } from '../../shared/time/calendar-date';
import { NewRecipient } from '../recipients/recipient.model';

export type DayPartition = {
  rows: NewRecipient[];
  days: number;
  firstDate: CalendarDate | null;
  lastDate: CalendarDate | null;
};

export function effectiveDailyCap(dailySendLimit: number, globalDailyCap: number): number {
  return Math.min(dailySendLimit, globalDailyCap);
}

/**
 * Splits phones into consecutive days of at most `dailyCap` each, starting at `startDate`
 * and keeping the given order.
 */
export function partitionByDay(phones: readonly string[], dailyCap: number, startDate: CalendarDate): DayPartition {
  if (!Number.isInteger(dailyCap) || dailyCap < 1) {
    throw new RangeError(`daily cap must be a positive integer, got ${dailyCap}`);
  }

  const rows = phones.map((phone, index) => ({
    phone,
    position: index,
    scheduledDate: addDays(startDate, Math.floor(index / dailyCap))
  }));

  const days = Math.ceil(phones.length / dailyCap);
  return {
    rows,
    days,
    firstDate: days > 0 ? startDate : null,
    lastDate: days > 0 ? addDays(startDate, days - 1) : null
  };
}
