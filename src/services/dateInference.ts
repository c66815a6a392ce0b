import {
  CalendarDate,
  ExplicitDateMatch,
  Resolution,
} from '../types';
import { ScheduleIndex } from './scheduleIndex';
import {
  calendarDateOf,
  formatCalendarDate,
  makeCalendarDate,
  parseIsoDatePrefix,
} from '../utils/calendarDate';
import { logger as defaultLogger, LoggerLike } from '../utils/logger';

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const NEXT_CLASS_PATTERN = /\b(next\s+class|next\s+lecture|next\s+session)\b/i;

const MONTH_ALTERNATION = 'Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec';

interface DatePatternMatcher {
  match(text: string): ExplicitDateMatch | null;
}

function optionalYear(token: string | undefined): number | undefined {
  return token ? parseInt(token, 10) : undefined;
}

// "3rd Oct, 2024", "12 December"
const dayMonthMatcher: DatePatternMatcher = {
  match(text) {
    const pattern = new RegExp(
      `(\\d{1,2})(?:st|nd|rd|th)?\\s+(${MONTH_ALTERNATION})[a-z]*\\s*,?\\s*(\\d{4})?`,
      'i'
    );
    const m = text.match(pattern);
    if (!m) return null;
    return { pattern: 'DAY_MONTH', day: parseInt(m[1], 10), monthToken: m[2], year: optionalYear(m[3]) };
  },
};

// "Oct 3rd 2024", "December 12"
const monthDayMatcher: DatePatternMatcher = {
  match(text) {
    const pattern = new RegExp(
      `(${MONTH_ALTERNATION})[a-z]*\\s+(\\d{1,2})(?:st|nd|rd|th)?\\s*,?\\s*(\\d{4})?`,
      'i'
    );
    const m = text.match(pattern);
    if (!m) return null;
    return { pattern: 'MONTH_DAY', day: parseInt(m[2], 10), monthToken: m[1], year: optionalYear(m[3]) };
  },
};

/** Tried in order; the first match wins */
export const DATE_PATTERN_MATCHERS: readonly DatePatternMatcher[] = [dayMonthMatcher, monthDayMatcher];

export function findExplicitDate(text: string): ExplicitDateMatch | null {
  for (const matcher of DATE_PATTERN_MATCHERS) {
    const found = matcher.match(text);
    if (found) return found;
  }
  return null;
}

export function monthFromToken(token: string): number | null {
  return MONTHS[token.toLowerCase().slice(0, 3)] ?? null;
}

/**
 * Year for a month named without one. An early month read late in the year
 * (more than six months back) refers to the coming year.
 */
export function inferYear(month: number, now: Date): number {
  const currentMonth = now.getMonth() + 1;
  const currentYear = now.getFullYear();

  if (month < currentMonth && currentMonth - month > 6) {
    return currentYear + 1;
  }
  return currentYear;
}

export function mentionsNextClass(text: string): boolean {
  return NEXT_CLASS_PATTERN.test(text);
}

export interface DateInferenceOptions {
  schedule?: ScheduleIndex;
  logger?: LoggerLike;
  /** Clock used for year inference */
  now?: () => Date;
}

/**
 * Resolves the date an announcement refers to.
 *
 * Rules, in order: "next class/lecture/session" via the course schedule,
 * an explicit day/month in the text, then the posted date.
 */
export class DateInferenceEngine {
  private readonly schedule: ScheduleIndex;
  private readonly log: LoggerLike;
  private readonly now: () => Date;

  constructor(options: DateInferenceOptions = {}) {
    this.schedule = options.schedule ?? new ScheduleIndex();
    this.log = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  resolve(text: string | null | undefined, postedValue: string, courseIdentifier = ''): CalendarDate {
    return this.explain(text, postedValue, courseIdentifier).date;
  }

  explain(text: string | null | undefined, postedValue: string, courseIdentifier = ''): Resolution {
    const fallback = this.fallbackDate(postedValue);

    if (!text) {
      return { date: fallback, outcome: 'FALLBACK' };
    }

    try {
      const nextClass = this.resolveNextClass(text, fallback, courseIdentifier);
      if (nextClass) {
        return { date: nextClass, outcome: 'NEXT_CLASS' };
      }

      const explicit = this.resolveExplicitDate(text);
      if (explicit) {
        return { date: explicit, outcome: 'EXPLICIT_DATE' };
      }
    } catch (error) {
      this.log.error('Date inference failed, using posted date', error, { course: courseIdentifier });
    }

    return { date: fallback, outcome: 'FALLBACK' };
  }

  private fallbackDate(postedValue: string): CalendarDate {
    const posted = parseIsoDatePrefix(postedValue);
    if (posted) return posted;

    this.log.warn('Posted date is not YYYY-MM-DD, falling back to today', { postedValue });
    return calendarDateOf(this.now());
  }

  private resolveNextClass(text: string, posted: CalendarDate, courseIdentifier: string): CalendarDate | null {
    if (!mentionsNextClass(text)) return null;

    const next = this.schedule.nextClassAfter(courseIdentifier, posted);
    if (next) {
      this.log.info(`Found 'next class' in ${courseIdentifier}: moved to ${formatCalendarDate(next)}`, {
        course: courseIdentifier,
        posted: formatCalendarDate(posted),
      });
    }
    return next;
  }

  private resolveExplicitDate(text: string): CalendarDate | null {
    const found = findExplicitDate(text);
    if (!found) return null;

    const month = monthFromToken(found.monthToken);
    if (month === null) return null;

    const year = found.year ?? inferYear(month, this.now());
    return makeCalendarDate(year, month, found.day);
  }
}
