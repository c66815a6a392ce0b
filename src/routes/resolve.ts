import { Router, Request, Response, NextFunction } from 'express';
import { DateInferenceEngine } from '../services/dateInference';
import { batchResolveRequestSchema, resolveRequestSchema, ResolveRequest } from '../schemas/request';
import { createAppError } from '../middleware/errorHandler';
import { formatCalendarDate } from '../utils/calendarDate';

function resolveOne(engine: DateInferenceEngine, request: ResolveRequest) {
  const { date, outcome } = engine.explain(request.text, request.postedAt, request.courseCode);
  return {
    date: formatCalendarDate(date),
    outcome,
  };
}

export function createResolveRouter(engine: DateInferenceEngine): Router {
  const router = Router();

  /**
   * POST /api/resolve
   * Infer the date an announcement refers to
   *
   * Request: { "text": "Quiz moved to next class", "postedAt": "2024-01-03T10:00:00Z", "courseCode": "CS 363-001" }
   * Response: { "ok": true, "date": "2024-01-04", "outcome": "NEXT_CLASS" }
   */
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    const validationResult = resolveRequestSchema.safeParse(req.body);
    if (!validationResult.success) {
      next(createAppError(400, 'VALIDATION_ERROR', 'Invalid request data', validationResult.error.errors));
      return;
    }

    res.json({ ok: true, ...resolveOne(engine, validationResult.data) });
  });

  /**
   * POST /api/resolve/batch
   * Request: { "announcements": [{ "text": ..., "postedAt": ..., "courseCode": ... }] }
   */
  router.post('/batch', (req: Request, res: Response, next: NextFunction) => {
    const validationResult = batchResolveRequestSchema.safeParse(req.body);
    if (!validationResult.success) {
      next(createAppError(400, 'VALIDATION_ERROR', 'Invalid request data', validationResult.error.errors));
      return;
    }

    res.json({
      ok: true,
      results: validationResult.data.announcements.map((item) => resolveOne(engine, item)),
    });
  });

  return router;
}
