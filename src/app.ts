import express from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { DateInferenceEngine } from './services/dateInference';
import { ScheduleIndex } from './services/scheduleIndex';
import { createHealthRouter } from './routes/health';
import { createResolveRouter } from './routes/resolve';
import { createScheduleRouter } from './routes/schedule';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { generateRequestId } from './utils/requestId';
import { logger } from './utils/logger';

export interface AppDependencies {
  schedule: ScheduleIndex;
  engine: DateInferenceEngine;
  corsOrigin: string;
}

export function createApp({ schedule, engine, corsOrigin }: AppDependencies): express.Express {
  const app = express();

  // CORS configuration
  const corsOptions: cors.CorsOptions = {
    origin: corsOrigin, // In production, set specific origin
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization']
  };

  app.use(cors(corsOptions));

  // Rate limiting
  const limiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 300,
    message: 'Too many requests from this IP, please try again later.',
    standardHeaders: true,
    legacyHeaders: false
  });

  app.use(limiter);

  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware
  app.use((req, res, next) => {
    const requestId = generateRequestId();
    res.locals.requestId = requestId;

    const startTime = Date.now();

    res.on('finish', () => {
      logger.info(`${req.method} ${req.originalUrl}`, {
        requestId,
        method: req.method,
        path: req.originalUrl,
        statusCode: res.statusCode,
        duration: Date.now() - startTime
      });
    });

    next();
  });

  // Routes
  app.use('/health', createHealthRouter(schedule));
  app.use('/api/resolve', createResolveRouter(engine));
  app.use('/api/schedule', createScheduleRouter(schedule));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
