import { Router, Request, Response, NextFunction } from 'express';
import { ScheduleIndex } from '../services/scheduleIndex';
import { nextClassQuerySchema } from '../schemas/request';
import { createAppError } from '../middleware/errorHandler';
import { formatCalendarDate, parseIsoDatePrefix } from '../utils/calendarDate';

const WEEKDAY_NAMES = ['MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT', 'SUN'] as const;

export function createScheduleRouter(schedule: ScheduleIndex): Router {
  const router = Router();

  /**
   * GET /api/schedule
   * Configured courses and their meeting days
   */
  router.get('/', (req: Request, res: Response) => {
    const courses = schedule.list().map((entry) => ({
      course: entry.courseKey,
      weekdays: entry.weekdays,
      days: entry.weekdays.map((day) => WEEKDAY_NAMES[day]),
    }));

    res.json({ ok: true, courses, count: courses.length });
  });

  /**
   * GET /api/schedule/next-class?course=CS%20363-001&after=2024-01-03
   */
  router.get('/next-class', (req: Request, res: Response, next: NextFunction) => {
    const validationResult = nextClassQuerySchema.safeParse(req.query);
    if (!validationResult.success) {
      next(createAppError(400, 'VALIDATION_ERROR', 'Invalid query parameters', validationResult.error.errors));
      return;
    }

    const { course, after } = validationResult.data;
    const reference = parseIsoDatePrefix(after);
    if (!reference) {
      next(createAppError(400, 'VALIDATION_ERROR', `Invalid date: "${after}"`));
      return;
    }

    const date = schedule.nextClassAfter(course, reference);
    if (!date) {
      next(createAppError(404, 'NO_SCHEDULED_CLASS', `No schedule configured for "${course}"`));
      return;
    }

    res.json({ ok: true, course, date: formatCalendarDate(date) });
  });

  return router;
}
