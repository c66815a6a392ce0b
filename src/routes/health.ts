import { Router, Request, Response } from 'express';
import { ScheduleIndex } from '../services/scheduleIndex';

export function createHealthRouter(schedule: ScheduleIndex): Router {
  const router = Router();

  /**
   * GET /health
   * Health check endpoint
   */
  router.get('/', (req: Request, res: Response) => {
    res.json({
      ok: true,
      version: '1.0.0',
      timestamp: new Date().toISOString(),
      scheduledCourses: schedule.list().length,
    });
  });

  return router;
}
