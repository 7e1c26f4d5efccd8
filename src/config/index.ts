import fs from 'fs';
import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string, readonly issues: z.ZodIssue[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Docker secrets are mounted as files; a value pointing into /run/secrets/
 * is replaced by the file contents. Anything else is taken literally.
 */
export function resolveSecret(value: string): string {
  if (value.startsWith('/run/secrets/')) {
    return fs.readFileSync(value, 'utf8').trim();
  }
  return value;
}

const envSchema = z.object({
  OPENWEATHER_API_KEY: z
    .string({ required_error: 'OPENWEATHER_API_KEY is not set' })
    .min(1, 'OPENWEATHER_API_KEY is not set'),
  OPENWEATHER_BASE_URL: z.string().url().default('http://api.openweathermap.org/data/2.5'),
  GEOCODER_URL: z.string().url().default('https://nominatim.openstreetmap.org/search'),
  GEOCODER_USER_AGENT: z.string().min(1).default('weather_etl_app'),

  RAW_DATA_DIR: z.string().min(1).default('data/raw'),
  PROCESSED_DATA_DIR: z.string().min(1).default('data/processed'),
  DATABASE_PATH: z.string().min(1).default('data/weather_data.db'),

  REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SCHEDULE_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 60_000),
  TASK_RETRIES: z.coerce.number().int().nonnegative().default(1),
  TASK_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(5 * 60_000),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  apiKey: string;
  openWeatherBaseUrl: string;
  geocoderUrl: string;
  geocoderUserAgent: string;
  rawDataDir: string;
  processedDataDir: string;
  databasePath: string;
  requestDelayMs: number;
  httpTimeoutMs: number;
  scheduleIntervalMs: number;
  taskRetries: number;
  taskRetryDelayMs: number;
  nodeEnv: Env['NODE_ENV'];
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const message = parsed.error.issues.map(issue => issue.message).join('; ');
    throw new ConfigError(`Invalid environment: ${message}`, parsed.error.issues);
  }

  const env = parsed.data;

  return {
    apiKey: resolveSecret(env.OPENWEATHER_API_KEY),
    openWeatherBaseUrl: env.OPENWEATHER_BASE_URL,
    geocoderUrl: env.GEOCODER_URL,
    geocoderUserAgent: env.GEOCODER_USER_AGENT,
    rawDataDir: env.RAW_DATA_DIR,
    processedDataDir: env.PROCESSED_DATA_DIR,
    databasePath: env.DATABASE_PATH,
    requestDelayMs: env.REQUEST_DELAY_MS,
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
    scheduleIntervalMs: env.SCHEDULE_INTERVAL_MS,
    taskRetries: env.TASK_RETRIES,
    taskRetryDelayMs: env.TASK_RETRY_DELAY_MS,
    nodeEnv: env.NODE_ENV,
  };
}
