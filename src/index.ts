/**
 * Main server entry point
 * Express server exposing announcement date inference
 */

import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config/env';
import { DateInferenceEngine } from './services/dateInference';
import { ScheduleIndex } from './services/scheduleIndex';
import { logger } from './utils/logger';

// Load environment variables
dotenv.config();

const config = loadConfig();
const schedule = ScheduleIndex.fromConfig(config.MY_TIMETABLE);
const engine = new DateInferenceEngine({ schedule });

const app = createApp({ schedule, engine, corsOrigin: config.FRONTEND_ORIGIN });

app.listen(config.PORT, () => {
  logger.info(`Server started on port ${config.PORT}`, {
    port: config.PORT,
    nodeEnv: config.NODE_ENV,
    corsOrigin: config.FRONTEND_ORIGIN,
    scheduledCourses: schedule.list().length,
  });

  if (schedule.isEmpty) {
    logger.warn('MY_TIMETABLE not set, "next class" phrases will use the posted date');
  }
});

export default app;
