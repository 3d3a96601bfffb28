import { DateTime } from 'luxon';

/** Luxon weekday numbers (Mon=1 ... Sun=7) the render team works. */
export const DEFAULT_WORK_WEEK: readonly number[] = [1, 2, 3, 4, 5];

export function isBusinessDay(date: DateTime, workWeek: readonly number[] = DEFAULT_WORK_WEEK): boolean {
  return workWeek.includes(date.weekday);
}

/**
 * End of the business day that lies `days` working days after `from`,
 * evaluated in the given timezone. Returned as an ISO string with offset.
 */
export function addBusinessDays(
  from: Date,
  days: number,
  timezone: string,
  workWeek: readonly number[] = DEFAULT_WORK_WEEK
): string {
  if (workWeek.length === 0) {
    throw new Error('Work week must contain at least one day');
  }

  let cursor = DateTime.fromJSDate(from).setZone(timezone);
  let remaining = Math.max(0, Math.trunc(days));

  while (remaining > 0) {
    cursor = cursor.plus({ days: 1 });
    if (isBusinessDay(cursor, workWeek)) remaining--;
  }

  return cursor.endOf('day').set({ millisecond: 0 }).toISO({ suppressMilliseconds: true }) ?? cursor.toString();
}
