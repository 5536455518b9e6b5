import fs from 'fs';
import { loadConfig, resolveSecret } from '@/config';
import { ConfigError } from '@/errors';

describe('config (unit)', () => {
  /**
   * Purpose:
   * Verifies Core behavior:
   * - an empty environment yields the documented defaults
   */
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      env: 'production',
      port: 8080,
      sources: {
        active: ['openweathermap', 'open-meteo', 'weatherapi'],
        openMeteoUrl: 'https://api.open-meteo.com/v1',
      },
      scheduler: {
        intervalMs: 900_000,
        cities: ['Prague', 'London', 'NewYork'],
        refreshTimeoutMs: 60_000,
      },
      cache: { ttlMs: 600_000, maxSize: 1000, sweepIntervalMs: 60_000 },
      retry: { maxRetries: 3, delayMs: 1000, multiplier: 2, requestTimeoutMs: 10_000 },
      breaker: { minimumRequests: 3, failureRatio: 0.6, cooldownMs: 30_000, windowMs: 60_000 },
      coordinator: { forecastDays: 3, maxConcurrentFetches: 10, onDemandTimeoutMs: 30_000 },
    });
    expect(config.kafkaBroker).toBeUndefined();
    expect(config.sources.openWeatherApiKey).toBeUndefined();
  });

  it('parses comma separated lists and numbers', () => {
    const config = loadConfig({
      ACTIVE_SOURCES: 'open-meteo, weatherapi,open-meteo',
      DEFAULT_CITIES: ' Tokyo ,Sydney,,',
      FETCH_INTERVAL_MS: '60000',
      MAX_RETRIES: '0',
      WEATHER_API_KEY: 'test-secret',
    });

    expect(config.sources.active).toEqual(['open-meteo', 'weatherapi']);
    expect(config.scheduler.cities).toEqual(['Tokyo', 'Sydney']);
    expect(config.scheduler.intervalMs).toBe(60_000);
    expect(config.retry.maxRetries).toBe(0);
    expect(config.sources.weatherApiKey).toBe('test-secret');
  });

  it('treats empty values as unset', () => {
    const config = loadConfig({ SERVER_PORT: '', KAFKA_BROKER_ADDRESS: '' });

    expect(config.port).toBe(8080);
    expect(config.kafkaBroker).toBeUndefined();
  });

  /**
   * Purpose:
   * Verifies Error handling behavior:
   * - invalid values fail with a ConfigError naming the variable
   */
  it('rejects invalid configuration', () => {
    expect(() => loadConfig({ ACTIVE_SOURCES: 'darksky' })).toThrow(ConfigError);
    expect(() => loadConfig({ SERVER_PORT: 'eighty' })).toThrow(/SERVER_PORT/);
    expect(() => loadConfig({ FORECAST_DAYS: '9' })).toThrow(/FORECAST_DAYS/);
  });

  describe('resolveSecret', () => {
    it('returns literal values unchanged', () => {
      expect(resolveSecret('test-secret')).toBe('test-secret');
      expect(resolveSecret(undefined)).toBeUndefined();
    });

    it('reads docker secret files', () => {
      const read = jest.spyOn(fs, 'readFileSync').mockReturnValue('test-secret\n');

      expect(resolveSecret('/run/secrets/weather_api_key')).toBe('test-secret');
      expect(read).toHaveBeenCalledWith('/run/secrets/weather_api_key', 'utf8');
    });

    it('wraps unreadable secret files in ConfigError', () => {
      jest.spyOn(fs, 'readFileSync').mockImplementation(() => {
        throw new Error('ENOENT');
      });

      expect(() => resolveSecret('/run/secrets/missing')).toThrow(ConfigError);
    });
  });
});
