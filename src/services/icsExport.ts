import { writeFile } from 'node:fs/promises';
import { createEvents } from 'ics';
import type { DateArray, EventAttributes } from 'ics';
import { SyncEvent } from '../types';
import { logger } from '../utils/logger';

export class IcsExportError extends Error {
  constructor(message: string, readonly details?: unknown) {
    super(message);
    this.name = 'IcsExportError';
  }
}

function utcDateArray(moment: Date): DateArray {
  return [
    moment.getUTCFullYear(),
    moment.getUTCMonth() + 1,
    moment.getUTCDate(),
    moment.getUTCHours(),
    moment.getUTCMinutes(),
  ];
}

/**
 * Map sync events to ics attributes.
 * All-day events span one day; timed events are one hour, written in UTC.
 */
export function toEventAttributes(event: SyncEvent): EventAttributes {
  if (event.start instanceof Date) {
    return {
      title: event.title,
      start: utcDateArray(event.start),
      startInputType: 'utc',
      startOutputType: 'utc',
      duration: { hours: 1 },
      description: event.description,
    };
  }

  const { year, month, day } = event.start;
  return {
    title: event.title,
    start: [year, month, day],
    duration: { days: 1 },
    description: event.description,
  };
}

/**
 * Render events as an iCalendar document
 */
export function renderIcs(events: SyncEvent[]): string {
  const { error, value } = createEvents(events.map(toEventAttributes));

  if (error || !value) {
    throw new IcsExportError('ICS generation failed', error);
  }
  return value;
}

export async function writeIcsFile(outputPath: string, events: SyncEvent[]): Promise<void> {
  const document = renderIcs(events);
  await writeFile(outputPath, document, 'utf-8');
  logger.info(`Wrote ${events.length} events`, { outputPath });
}
