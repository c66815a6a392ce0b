import { CalendarDate, WeekdayIndex } from '../types';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Build a calendar date, or null when the combination does not exist
 * (e.g. 31 April, 29 February outside leap years, year 0)
 */
export function makeCalendarDate(year: number, month: number, day: number): CalendarDate | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null;
  }
  if (year < 1 || year > 9999 || month < 1 || month > 12 || day < 1) {
    return null;
  }

  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);
  if (utc.getUTCFullYear() !== year || utc.getUTCMonth() !== month - 1 || utc.getUTCDate() !== day) {
    return null;
  }

  return { year, month, day };
}

/**
 * Parse the "YYYY-MM-DD" prefix of a date or timestamp string
 * ("2024-01-03T09:15:00Z" → 2024-01-03)
 */
export function parseIsoDatePrefix(value: string): CalendarDate | null {
  const match = value.slice(0, 10).match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return null;

  return makeCalendarDate(
    parseInt(match[1], 10),
    parseInt(match[2], 10),
    parseInt(match[3], 10)
  );
}

function toUtcMillis(date: CalendarDate): number {
  const utc = new Date(0);
  utc.setUTCFullYear(date.year, date.month - 1, date.day);
  return utc.getTime();
}

function fromUtcMillis(millis: number): CalendarDate {
  const utc = new Date(millis);
  return {
    year: utc.getUTCFullYear(),
    month: utc.getUTCMonth() + 1,
    day: utc.getUTCDate(),
  };
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromUtcMillis(toUtcMillis(date) + days * MS_PER_DAY);
}

/**
 * Weekday with Monday = 0 ... Sunday = 6
 */
export function weekdayIndex(date: CalendarDate): WeekdayIndex {
  const sundayBased = new Date(toUtcMillis(date)).getUTCDay();
  const weekdays: WeekdayIndex[] = [6, 0, 1, 2, 3, 4, 5];
  return weekdays[sundayBased];
}

/**
 * Local calendar date of a timestamp
 */
export function calendarDateOf(moment: Date): CalendarDate {
  return {
    year: moment.getFullYear(),
    month: moment.getMonth() + 1,
    day: moment.getDate(),
  };
}

export function formatCalendarDate(date: CalendarDate): string {
  const yyyy = date.year.toString().padStart(4, '0');
  const mm = date.month.toString().padStart(2, '0');
  const dd = date.day.toString().padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}
