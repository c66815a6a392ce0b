import { z } from 'zod';
import {
  CanvasAnnouncement,
  CanvasAssignment,
  CanvasCalendarEvent,
  CanvasCourse,
} from '../types';
import { logger as defaultLogger, LoggerLike } from '../utils/logger';

const courseSchema = z.object({
  id: z.number(),
  name: z.string().optional(),
  course_code: z.string().default(''),
});

const assignmentSchema = z.object({
  id: z.number(),
  name: z.string(),
  due_at: z.string().nullable().default(null),
  html_url: z.string().default(''),
});

const announcementSchema = z.object({
  id: z.number(),
  title: z.string().default(''),
  message: z.string().nullable().default(null),
  posted_at: z.string().nullable().default(null),
  html_url: z.string().default(''),
});

const calendarEventSchema = z.object({
  id: z.union([z.number(), z.string()]),
  title: z.string().default(''),
  start_at: z.string().nullable().default(null),
});

export class CanvasApiError extends Error {
  constructor(message: string, readonly status: number, readonly endpoint: string) {
    super(message);
    this.name = 'CanvasApiError';
  }
}

/** The calls the sync needs from Canvas */
export interface CanvasSource {
  getActiveCourses(): Promise<CanvasCourse[]>;
  getUpcomingAssignments(courseId: number): Promise<CanvasAssignment[]>;
  getAnnouncements(courseId: number): Promise<CanvasAnnouncement[]>;
  getCalendarEvents(startDate: string): Promise<CanvasCalendarEvent[]>;
}

/** The part of the fetch API the client uses */
export interface HttpResponse {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
}

export type FetchLike = (url: string, init: { headers: Record<string, string> }) => Promise<HttpResponse>;

export interface CanvasClientOptions {
  apiUrl: string;
  apiKey: string;
  fetchFn?: FetchLike;
  logger?: LoggerLike;
  perPage?: number;
}

/**
 * Extract the rel="next" URL from a Link header
 */
export function nextPageUrl(linkHeader: string | null): string | null {
  if (!linkHeader) return null;

  for (const part of linkHeader.split(',')) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="?next"?/);
    if (match) return match[1];
  }
  return null;
}

/**
 * Canvas LMS REST client (bearer token, paginated GETs)
 */
export class CanvasClient implements CanvasSource {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly fetchFn: FetchLike;
  private readonly log: LoggerLike;
  private readonly perPage: number;

  constructor(options: CanvasClientOptions) {
    this.baseUrl = options.apiUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.fetchFn = options.fetchFn ?? fetch;
    this.log = options.logger ?? defaultLogger;
    this.perPage = options.perPage ?? 100;
  }

  async getActiveCourses(): Promise<CanvasCourse[]> {
    return this.getAll('/api/v1/courses', { enrollment_state: 'active' }, courseSchema);
  }

  async getUpcomingAssignments(courseId: number): Promise<CanvasAssignment[]> {
    return this.getAll(`/api/v1/courses/${courseId}/assignments`, { bucket: 'upcoming' }, assignmentSchema);
  }

  async getAnnouncements(courseId: number): Promise<CanvasAnnouncement[]> {
    return this.getAll(
      `/api/v1/courses/${courseId}/discussion_topics`,
      { only_announcements: 'true' },
      announcementSchema
    );
  }

  async getCalendarEvents(startDate: string): Promise<CanvasCalendarEvent[]> {
    return this.getAll('/api/v1/users/self/calendar_events', { start_date: startDate }, calendarEventSchema);
  }

  private buildUrl(path: string, params: Record<string, string>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, value);
    }
    url.searchParams.set('per_page', String(this.perPage));
    return url.toString();
  }

  private async getAll<T extends z.ZodTypeAny>(
    path: string,
    params: Record<string, string>,
    itemSchema: T
  ): Promise<z.infer<T>[]> {
    const listSchema = z.array(itemSchema);
    const items: z.infer<T>[] = [];
    let url: string | null = this.buildUrl(path, params);

    while (url) {
      const response = await this.fetchFn(url, {
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          Accept: 'application/json',
        },
      });

      if (!response.ok) {
        throw new CanvasApiError(`Canvas request failed (HTTP ${response.status})`, response.status, path);
      }

      const parsed = listSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new CanvasApiError(`Unexpected Canvas response: ${parsed.error.message}`, response.status, path);
      }

      items.push(...parsed.data);
      url = nextPageUrl(response.headers.get('link'));
    }

    this.log.debug(`Canvas: fetched ${items.length} items`, { endpoint: path });
    return items;
  }
}
