/**
 * Sync entry point
 * Pulls Canvas assignments, announcements and calendar events into an .ics file
 */

import dotenv from 'dotenv';
import { loadConfig, requireCanvasCredentials } from './config/env';
import { CanvasClient } from './services/canvasClient';
import { DateInferenceEngine } from './services/dateInference';
import { writeIcsFile } from './services/icsExport';
import { ScheduleIndex } from './services/scheduleIndex';
import { SyncService } from './services/syncService';
import { logger } from './utils/logger';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const credentials = requireCanvasCredentials(config);

  const schedule = ScheduleIndex.fromConfig(config.MY_TIMETABLE);
  const engine = new DateInferenceEngine({ schedule });
  const canvas = new CanvasClient(credentials);
  const sync = new SyncService(canvas, engine);

  logger.info('Syncing...', { lookbackDays: config.SYNC_LOOKBACK_DAYS });

  const result = await sync.collect({ lookbackDays: config.SYNC_LOOKBACK_DAYS });
  await writeIcsFile(config.ICS_OUTPUT_PATH, result.events);

  logger.info('Sync complete', {
    courses: result.courses,
    skippedCourses: result.skippedCourses,
    assignments: result.assignments,
    announcements: result.announcements,
    calendarEvents: result.calendarEvents,
    outputPath: config.ICS_OUTPUT_PATH,
  });
}

main().catch((error: unknown) => {
  logger.error('Sync failed', error);
  process.exitCode = 1;
});
