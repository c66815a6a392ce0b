// Core domain types

/** 0 = Monday ... 6 = Sunday */
export type WeekdayIndex = 0 | 1 | 2 | 3 | 4 | 5 | 6;

/** Course key (e.g. "CS 363") → weekdays the course meets */
export type ScheduleMap = Record<string, WeekdayIndex[]>;

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

export type ResolutionOutcome = 'NEXT_CLASS' | 'EXPLICIT_DATE' | 'FALLBACK';

export interface Resolution {
  date: CalendarDate;
  outcome: ResolutionOutcome;
}

export type DatePatternKind = 'DAY_MONTH' | 'MONTH_DAY';

export interface ExplicitDateMatch {
  pattern: DatePatternKind;
  day: number;
  monthToken: string;
  year?: number;
}

// Canvas payloads (only the fields the sync reads)

export interface CanvasCourse {
  id: number;
  name?: string;
  course_code: string;
}

export interface CanvasAssignment {
  id: number;
  name: string;
  due_at: string | null;
  html_url: string;
}

export interface CanvasAnnouncement {
  id: number;
  title: string;
  message: string | null;
  posted_at: string | null;
  html_url: string;
}

export interface CanvasCalendarEvent {
  id: number | string;
  title: string;
  start_at: string | null;
}

export type SyncEventKind = 'assignment' | 'announcement' | 'calendar';

export interface SyncEvent {
  kind: SyncEventKind;
  title: string;
  /** A CalendarDate is an all-day entry, a Date a timed one */
  start: CalendarDate | Date;
  description?: string;
}
