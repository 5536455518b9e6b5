import fs from 'fs';
import { z } from 'zod';
import { ConfigError } from '../errors';

export const SOURCE_NAMES = ['openweathermap', 'open-meteo', 'weatherapi'] as const;
export type SourceName = (typeof SOURCE_NAMES)[number];

const csv = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  SERVER_PORT: z.coerce.number().int().min(0).max(65535).default(8080),

  ACTIVE_SOURCES: csv
    .pipe(z.array(z.enum(SOURCE_NAMES)).min(1))
    .default('openweathermap,open-meteo,weatherapi'),
  OPENWEATHER_API_KEY: z.string().optional(),
  WEATHER_API_KEY: z.string().optional(),
  OPENWEATHER_URL: z.string().url().default('https://api.openweathermap.org/data/2.5'),
  OPENMETEO_URL: z.string().url().default('https://api.open-meteo.com/v1'),
  WEATHERAPI_URL: z.string().url().default('https://api.weatherapi.com/v1'),

  FETCH_INTERVAL_MS: z.coerce.number().int().positive().default(15 * 60_000),
  DEFAULT_CITIES: csv.pipe(z.array(z.string().min(1)).min(1)).default('Prague,London,NewYork'),

  CACHE_TTL_MS: z.coerce.number().int().positive().default(10 * 60_000),
  MAX_CACHE_SIZE: z.coerce.number().int().positive().default(1000),
  CACHE_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),

  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  RETRY_MULTIPLIER: z.coerce.number().min(1).default(2),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  CIRCUIT_BREAKER_THRESHOLD: z.coerce.number().int().positive().default(3),
  CIRCUIT_BREAKER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  CIRCUIT_BREAKER_WINDOW_MS: z.coerce.number().int().positive().default(60_000),

  FORECAST_DAYS: z.coerce.number().int().min(1).max(7).default(3),
  MAX_CONCURRENT_FETCHES: z.coerce.number().int().positive().default(10),
  REFRESH_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  ON_DEMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  KAFKA_BROKER_ADDRESS: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface RetryConfig {
  maxRetries: number;
  delayMs: number;
  multiplier: number;
  requestTimeoutMs: number;
}

export interface BreakerConfig {
  minimumRequests: number;
  failureRatio: number;
  cooldownMs: number;
  windowMs: number;
}

export interface AppConfig {
  env: Env['NODE_ENV'];
  port: number;
  sources: {
    active: SourceName[];
    openWeatherApiKey?: string;
    weatherApiKey?: string;
    openWeatherUrl: string;
    openMeteoUrl: string;
    weatherApiUrl: string;
  };
  scheduler: {
    intervalMs: number;
    cities: string[];
    refreshTimeoutMs: number;
  };
  cache: {
    ttlMs: number;
    maxSize: number;
    sweepIntervalMs: number;
  };
  retry: RetryConfig;
  breaker: BreakerConfig;
  coordinator: {
    forecastDays: number;
    maxConcurrentFetches: number;
    onDemandTimeoutMs: number;
  };
  kafkaBroker?: string;
}

/**
 * Accepts either a literal value or a Docker secrets path
 * (`/run/secrets/...`), in which case the file content is used.
 */
export function resolveSecret(value: string | undefined): string | undefined {
  if (!value) return undefined;

  if (value.startsWith('/run/secrets/')) {
    try {
      return fs.readFileSync(value, 'utf8').trim();
    } catch (err) {
      throw new ConfigError(`Unable to read secret file ${value}`, { cause: err });
    }
  }
  return value;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset
  const raw: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== '') raw[key] = value;
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }

  const env = parsed.data;

  return {
    env: env.NODE_ENV,
    port: env.SERVER_PORT,
    sources: {
      active: [...new Set(env.ACTIVE_SOURCES)],
      openWeatherApiKey: resolveSecret(env.OPENWEATHER_API_KEY),
      weatherApiKey: resolveSecret(env.WEATHER_API_KEY),
      openWeatherUrl: env.OPENWEATHER_URL,
      openMeteoUrl: env.OPENMETEO_URL,
      weatherApiUrl: env.WEATHERAPI_URL,
    },
    scheduler: {
      intervalMs: env.FETCH_INTERVAL_MS,
      cities: env.DEFAULT_CITIES,
      refreshTimeoutMs: env.REFRESH_TIMEOUT_MS,
    },
    cache: {
      ttlMs: env.CACHE_TTL_MS,
      maxSize: env.MAX_CACHE_SIZE,
      sweepIntervalMs: env.CACHE_SWEEP_INTERVAL_MS,
    },
    retry: {
      maxRetries: env.MAX_RETRIES,
      delayMs: env.RETRY_DELAY_MS,
      multiplier: env.RETRY_MULTIPLIER,
      requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    },
    breaker: {
      minimumRequests: env.CIRCUIT_BREAKER_THRESHOLD,
      failureRatio: 0.6,
      cooldownMs: env.CIRCUIT_BREAKER_TIMEOUT_MS,
      windowMs: env.CIRCUIT_BREAKER_WINDOW_MS,
    },
    coordinator: {
      forecastDays: env.FORECAST_DAYS,
      maxConcurrentFetches: env.MAX_CONCURRENT_FETCHES,
      onDemandTimeoutMs: env.ON_DEMAND_TIMEOUT_MS,
    },
    kafkaBroker: env.KAFKA_BROKER_ADDRESS,
  };
}
