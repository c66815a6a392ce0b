import {
  CanvasAnnouncement,
  CanvasAssignment,
  CanvasCalendarEvent,
  CanvasCourse,
  SyncEvent,
} from '../types';
import { CanvasSource } from './canvasClient';
import { DateInferenceEngine } from './dateInference';
import { addDays, calendarDateOf, formatCalendarDate } from '../utils/calendarDate';
import { logger as defaultLogger, LoggerLike } from '../utils/logger';

export interface SyncOptions {
  lookbackDays: number;
  now?: () => Date;
}

export interface SyncResult {
  events: SyncEvent[];
  courses: number;
  skippedCourses: number;
  assignments: number;
  announcements: number;
  calendarEvents: number;
}

const MESSAGE_PREVIEW_LENGTH = 200;

function parseTimestamp(value: string): Date | null {
  const moment = new Date(value);
  return Number.isNaN(moment.getTime()) ? null : moment;
}

/**
 * Earliest posting date (YYYY-MM-DD) an announcement may have to be synced
 */
export function lookbackStart(now: Date, lookbackDays: number): string {
  return formatCalendarDate(addDays(calendarDateOf(now), -lookbackDays));
}

export class SyncService {
  private readonly log: LoggerLike;

  constructor(
    private readonly canvas: CanvasSource,
    private readonly engine: DateInferenceEngine,
    log?: LoggerLike
  ) {
    this.log = log ?? defaultLogger;
  }

  /**
   * Collect assignments, announcements and calendar events as calendar
   * entries. A course that fails to load is logged and skipped; entries
   * it produced before the failure are kept.
   */
  async collect(options: SyncOptions): Promise<SyncResult> {
    const now = options.now ? options.now() : new Date();
    const startDate = lookbackStart(now, options.lookbackDays);

    const result: SyncResult = {
      events: [],
      courses: 0,
      skippedCourses: 0,
      assignments: 0,
      announcements: 0,
      calendarEvents: 0,
    };

    const courses = await this.canvas.getActiveCourses();
    result.courses = courses.length;

    for (const course of courses) {
      try {
        const assignments = await this.canvas.getUpcomingAssignments(course.id);
        const assignmentEvents = assignments
          .map((assignment) => this.assignmentEvent(course, assignment))
          .filter((event): event is SyncEvent => event !== null);
        result.events.push(...assignmentEvents);
        result.assignments += assignmentEvents.length;

        const announcementEvents = (await this.canvas.getAnnouncements(course.id))
          .filter((ann) => ann.posted_at !== null && ann.posted_at > startDate)
          .map((ann) => this.announcementEvent(course, ann));
        result.events.push(...announcementEvents);
        result.announcements += announcementEvents.length;
      } catch (error) {
        result.skippedCourses++;
        this.log.error(`Skipping course ${course.course_code}`, error, { courseId: course.id });
      }
    }

    try {
      const calendarEvents = (await this.canvas.getCalendarEvents(startDate))
        .map((event) => this.calendarEvent(event))
        .filter((event): event is SyncEvent => event !== null);
      result.events.push(...calendarEvents);
      result.calendarEvents = calendarEvents.length;
    } catch (error) {
      this.log.error('Skipping calendar events', error, { startDate });
    }

    return result;
  }

  private assignmentEvent(course: CanvasCourse, assignment: CanvasAssignment): SyncEvent | null {
    if (!assignment.due_at) return null;

    const due = parseTimestamp(assignment.due_at);
    if (!due) {
      this.log.warn('Ignoring assignment with unreadable due date', {
        assignmentId: assignment.id,
        dueAt: assignment.due_at,
      });
      return null;
    }

    return {
      kind: 'assignment',
      title: `📝 ${assignment.name} (${course.course_code})`,
      start: due,
      description: assignment.html_url,
    };
  }

  private announcementEvent(course: CanvasCourse, ann: CanvasAnnouncement): SyncEvent {
    const postedAt = ann.posted_at ?? '';
    const message = ann.message ?? '';
    const fullText = `${ann.title} ${message}`;

    return {
      kind: 'announcement',
      title: `📢 ${ann.title} (${course.course_code})`,
      start: this.engine.resolve(fullText, postedAt, course.course_code),
      description: `Originally Posted: ${postedAt.slice(0, 10)}\n${ann.html_url}\n\n${message.slice(0, MESSAGE_PREVIEW_LENGTH)}...`,
    };
  }

  private calendarEvent(event: CanvasCalendarEvent): SyncEvent | null {
    const start = event.start_at ? parseTimestamp(event.start_at) : null;
    if (!start) return null;

    return {
      kind: 'calendar',
      title: `🗓️ ${event.title}`,
      start,
    };
  }
}
