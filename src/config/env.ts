import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  FRONTEND_ORIGIN: z.string().default('*'),
  CANVAS_API_URL: z.string().url().optional(),
  CANVAS_API_KEY: z.string().min(1).optional(),
  MY_TIMETABLE: z.string().optional(),
  ICS_OUTPUT_PATH: z.string().min(1).default('my_schedule.ics'),
  SYNC_LOOKBACK_DAYS: z.coerce.number().int().nonnegative().default(30),
});

export type AppConfig = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(message: string, readonly missing: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Read configuration from the environment (after dotenv has populated it)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Invalid environment configuration: ${details.join('; ')}`);
  }
  return result.data;
}

export interface CanvasCredentials {
  apiUrl: string;
  apiKey: string;
}

export function requireCanvasCredentials(config: AppConfig): CanvasCredentials {
  const missing: string[] = [];
  if (!config.CANVAS_API_URL) missing.push('CANVAS_API_URL');
  if (!config.CANVAS_API_KEY) missing.push('CANVAS_API_KEY');

  if (!config.CANVAS_API_URL || !config.CANVAS_API_KEY) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`, missing);
  }

  return { apiUrl: config.CANVAS_API_URL, apiKey: config.CANVAS_API_KEY };
}
