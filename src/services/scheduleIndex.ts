import { CalendarDate, ScheduleMap, WeekdayIndex } from '../types';
import { parseScheduleConfig } from '../schemas/schedule';
import { addDays, weekdayIndex } from '../utils/calendarDate';
import { logger as defaultLogger, LoggerLike } from '../utils/logger';

export interface ScheduleEntry {
  courseKey: string;
  weekdays: readonly WeekdayIndex[];
}

/**
 * Weekly meeting days per course, read-only once built.
 *
 * Course keys are matched against a course identifier by substring
 * containment; when several keys are contained in the same identifier the
 * first one in insertion order wins (JavaScript puts integer-like keys such
 * as "363" ahead of all others).
 */
export class ScheduleIndex {
  private readonly entries: readonly ScheduleEntry[];

  constructor(schedule: ScheduleMap = {}) {
    this.entries = Object.freeze(
      Object.entries(schedule).map(([courseKey, weekdays]) =>
        Object.freeze({
          courseKey,
          weekdays: Object.freeze([...new Set(weekdays)].sort((a, b) => a - b)),
        })
      )
    );
  }

  /**
   * Build from the timetable configuration blob. Unparseable configuration
   * yields an empty index and a warning rather than a startup failure.
   */
  static fromConfig(raw: string | undefined, log: LoggerLike = defaultLogger): ScheduleIndex {
    const parsed = parseScheduleConfig(raw);
    if (!parsed.ok) {
      log.warn('Could not parse timetable configuration, next-class lookups are disabled', {
        reason: parsed.reason,
      });
      return new ScheduleIndex();
    }

    log.debug('Timetable configuration loaded', { courses: Object.keys(parsed.schedule) });
    return new ScheduleIndex(parsed.schedule);
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  list(): readonly ScheduleEntry[] {
    return this.entries;
  }

  findEntry(courseIdentifier: string): ScheduleEntry | null {
    return this.entries.find((entry) => courseIdentifier.includes(entry.courseKey)) ?? null;
  }

  /**
   * Next scheduled class strictly after the reference date, or null when the
   * course has no schedule
   */
  nextClassAfter(courseIdentifier: string, referenceDate: CalendarDate): CalendarDate | null {
    if (this.isEmpty) return null;

    const entry = this.findEntry(courseIdentifier);
    if (!entry || entry.weekdays.length === 0) return null;

    const refDay = weekdayIndex(referenceDate);
    const laterThisWeek = entry.weekdays.find((day) => day > refDay);

    const offset = laterThisWeek !== undefined
      ? laterThisWeek - refDay
      : (7 - refDay) + entry.weekdays[0];

    return addDays(referenceDate, offset);
  }
}
