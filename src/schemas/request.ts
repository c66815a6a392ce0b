import { z } from 'zod';
import { parseIsoDatePrefix } from '../utils/calendarDate';

const isoDatePrefix = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}/, 'Expected a YYYY-MM-DD date or ISO timestamp')
  .refine((value) => parseIsoDatePrefix(value) !== null, { message: 'Not a valid calendar date' });

export const resolveRequestSchema = z.object({
  text: z.string().max(100_000).optional().default(''),
  postedAt: isoDatePrefix,
  courseCode: z.string().optional().default(''),
});

export const batchResolveRequestSchema = z.object({
  announcements: z.array(resolveRequestSchema).min(1).max(100),
});

export const nextClassQuerySchema = z.object({
  course: z.string().min(1),
  after: isoDatePrefix,
});

export type ResolveRequest = z.infer<typeof resolveRequestSchema>;
