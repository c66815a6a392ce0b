import { z } from 'zod';
import { ScheduleMap, WeekdayIndex } from '../types';

function isWeekdayIndex(value: number): value is WeekdayIndex {
  return Number.isInteger(value) && value >= 0 && value <= 6;
}

export const weekdayIndexSchema = z
  .number()
  .refine(isWeekdayIndex, { message: 'Weekday must be an integer from 0 (Monday) to 6 (Sunday)' });

// {"CS 363": [1, 3], "MATH 205": [0, 2, 4]}
export const scheduleMapSchema = z.record(z.string().min(1), z.array(weekdayIndexSchema));

export type ScheduleParseResult =
  | { ok: true; schedule: ScheduleMap }
  | { ok: false; reason: string };

/**
 * Decode the timetable configuration blob (JSON text)
 */
export function parseScheduleConfig(raw: string | undefined): ScheduleParseResult {
  if (raw === undefined) {
    return { ok: true, schedule: {} };
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : 'Invalid JSON' };
  }

  const result = scheduleMapSchema.safeParse(decoded);
  if (!result.success) {
    return {
      ok: false,
      reason: result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; '),
    };
  }

  return { ok: true, schedule: result.data };
}
