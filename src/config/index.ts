import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

export const logLevelSchema = z
  .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
  .default('warn');

const configSchema = z.object({
  // OpenWeatherMap
  openWeatherApiKey: z.string({ required_error: 'OPENWEATHER_API_KEY is required' }).min(1),
  openWeatherBaseUrl: z.string().url().default('https://api.openweathermap.org/data/2.5'),

  // Requests
  units: z.enum(['metric', 'imperial', 'standard']).default('metric'),
  requestTimeoutMs: z.coerce.number().int().positive().default(5000),
  forecastSlots: z.coerce.number().int().min(1).max(40).default(40), // 3-hour slots, 40 = 5 days

  // App
  logLevel: logLevelSchema,
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key]?.trim();
    return value === '' ? undefined : value;
  };

  const raw = {
    openWeatherApiKey: env('OPENWEATHER_API_KEY') ?? env('WEATHER_API_KEY'),
    openWeatherBaseUrl: env('OPENWEATHER_BASE_URL'),
    units: env('WEATHER_UNITS'),
    requestTimeoutMs: env('WEATHER_TIMEOUT_MS'),
    forecastSlots: env('FORECAST_SLOTS'),
    logLevel: env('LOG_LEVEL'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, {
      cause: result.error,
    });
  }
  return result.data;
}
