import { WeatherCache } from '@/cache';
import {
  AllSourcesFailedError,
  NotAvailableError,
  NotFoundError,
  TransportError,
  UpstreamServerError,
  ValidationError,
} from '@/errors';
import { WeatherCoordinator } from '@/modules/coordinator';
import {
  FakeSource,
  deferred,
  makeForecastDays,
  makeReading,
} from '../helpers/factories';

const options = { forecastDays: 3, maxConcurrentFetches: 4, onDemandTimeoutMs: 1_000 };

describe('WeatherCoordinator (unit)', () => {
  let cache: WeatherCache;
  let alpha: FakeSource;
  let beta: FakeSource;
  let gamma: FakeSource;

  function createCoordinator(sources = [alpha, beta, gamma]) {
    return new WeatherCoordinator(sources, cache, options);
  }

  function succeed(source: FakeSource, temperatureC: number) {
    source.fetchCurrent.mockImplementation(async (city) =>
      makeReading({ source: source.name, city, temperatureC })
    );
    source.fetchForecast.mockImplementation(async (_city, days) => makeForecastDays(days));
  }

  function fail(source: FakeSource, error: Error) {
    source.fetchCurrent.mockRejectedValue(error);
    source.fetchForecast.mockRejectedValue(error);
  }

  beforeEach(() => {
    cache = new WeatherCache({ ttlMs: 60_000, maxSize: 100, sweepIntervalMs: 60_000 });
    alpha = new FakeSource('alpha');
    beta = new FakeSource('beta');
    gamma = new FakeSource('gamma');
  });

  afterEach(() => {
    cache.shutdown();
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - failing sources do not sink the city
   * - consensus only lists the source that answered
   */
  it('succeeds with the remaining source when two of three fail', async () => {
    succeed(alpha, 12);
    fail(beta, new UpstreamServerError(503));
    fail(gamma, new NotFoundError('gamma', 'Prague'));
    const coordinator = createCoordinator();

    const result = await coordinator.refresh(['Prague']);

    expect(result).toMatchObject({ status: 'success', succeeded: ['Prague'], failed: [] });

    const current = await coordinator.getCurrent('Prague');
    expect(current).toMatchObject({ temperatureC: 12, confidence: 0.5, sources: ['alpha'] });
    expect(coordinator.getStats()).toMatchObject({ successCount: 1, failureCount: 0 });
  });

  it('averages readings from every answering source', async () => {
    succeed(alpha, 10);
    succeed(beta, 20);
    fail(gamma, new TransportError('socket hang up'));
    const coordinator = createCoordinator();

    await coordinator.refresh(['Prague']);

    const current = await coordinator.getCurrent('Prague');
    expect(current.temperatureC).toBe(15);
    expect(current.confidence).toBeCloseTo(0.1, 10);
    expect([...current.sources].sort()).toEqual(['alpha', 'beta']);
  });

  /**
   * Purpose:
   * Verifies Error handling behavior:
   * - all sources failing surfaces NotAvailableError
   * - the cause carries every per-source failure
   * - exactly one failed cycle is counted
   */
  it('reports NotAvailable when every source fails', async () => {
    const down = new UpstreamServerError(500);
    fail(alpha, down);
    fail(beta, down);
    fail(gamma, down);
    const coordinator = createCoordinator();

    const error = await coordinator.getCurrent('Atlantis').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NotAvailableError);
    expect(error).toHaveProperty('message', 'Weather data not available for Atlantis');
    const cause = error instanceof NotAvailableError ? error.cause : undefined;
    expect(cause).toBeInstanceOf(AllSourcesFailedError);
    expect(cause).toHaveProperty('failures', [
      { source: 'alpha', error: down },
      { source: 'beta', error: down },
      { source: 'gamma', error: down },
    ]);
    expect(coordinator.getStats()).toMatchObject({ successCount: 0, failureCount: 1 });
  });

  it('reports partial failure per city', async () => {
    alpha.fetchCurrent.mockImplementation(async (city) => {
      if (city === 'Atlantis') throw new NotFoundError('alpha', city);
      return makeReading({ city });
    });
    alpha.fetchForecast.mockResolvedValue(makeForecastDays(3));
    const coordinator = createCoordinator([alpha]);

    const result = await coordinator.refresh(['Prague', 'Atlantis']);

    expect(result.status).toBe('partial_failure');
    expect(result.succeeded).toEqual(['Prague']);
    expect(result.failed).toEqual([
      { city: 'Atlantis', reason: 'All sources failed for city Atlantis' },
    ]);
    expect(coordinator.cities()).toEqual(['Prague']);
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - cached reads never reach the sources
   */
  it('serves repeat reads from the cache', async () => {
    succeed(alpha, 12);
    const coordinator = createCoordinator([alpha]);

    await expect(coordinator.resolveCurrent('Prague')).resolves.toMatchObject({ origin: 'refresh' });
    await expect(coordinator.resolveCurrent('Prague')).resolves.toMatchObject({ origin: 'cache' });

    expect(alpha.fetchCurrent).toHaveBeenCalledTimes(1);
  });

  /**
   * Purpose:
   * Verifies Concurrency behavior:
   * - concurrent misses for one city share a single refresh
   */
  it('collapses concurrent cache misses into one refresh', async () => {
    const gate = deferred<ReturnType<typeof makeReading>>();
    alpha.fetchCurrent.mockReturnValue(gate.promise);
    alpha.fetchForecast.mockResolvedValue(makeForecastDays(3));
    const coordinator = createCoordinator([alpha]);

    const first = coordinator.getCurrent('Prague');
    const second = coordinator.getCurrent('Prague');
    gate.resolve(makeReading({ source: 'alpha', temperatureC: 9 }));

    const [a, b] = await Promise.all([first, second]);

    expect(a).toBe(b);
    expect(a.temperatureC).toBe(9);
    expect(alpha.fetchCurrent).toHaveBeenCalledTimes(1);
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - every satisfiable day count is cached after one refresh
   */
  it('aggregates forecasts for each satisfiable day count', async () => {
    succeed(alpha, 12);
    const coordinator = createCoordinator([alpha]);
    await coordinator.refresh(['Prague']);

    for (const days of [1, 2, 3]) {
      const forecast = await coordinator.getForecast('Prague', days);
      expect(forecast.forecast).toHaveLength(days);
    }
    expect(alpha.fetchForecast).toHaveBeenCalledTimes(1);
    expect(alpha.fetchForecast).toHaveBeenCalledWith('Prague', 3, expect.any(AbortSignal));
  });

  it('reports NotAvailable for day counts no source can cover', async () => {
    succeed(alpha, 12);
    const coordinator = createCoordinator([alpha]);
    await coordinator.refresh(['Prague']);

    await expect(coordinator.getForecast('Prague', 5)).rejects.toThrow(
      '5-day forecast not available for Prague'
    );
  });

  it.each([0, 8, 2.5])('rejects %p forecast days before touching sources', async (days) => {
    const coordinator = createCoordinator([alpha]);

    await expect(coordinator.getForecast('Prague', days)).rejects.toBeInstanceOf(ValidationError);
    expect(alpha.fetchCurrent).not.toHaveBeenCalled();
  });

  /**
   * Purpose:
   * Verifies Error handling behavior:
   * - the deadline abandons sources that never answer
   * - the cycle still completes with a failure per city
   */
  it('gives up on pending sources at the deadline', async () => {
    alpha.fetchCurrent.mockReturnValue(new Promise(() => undefined));
    alpha.fetchForecast.mockReturnValue(new Promise(() => undefined));
    const coordinator = createCoordinator([alpha]);

    const result = await coordinator.refresh(['Prague'], { timeoutMs: 20 });

    expect(result.status).toBe('partial_failure');
    expect(result.failed).toEqual([
      { city: 'Prague', reason: 'All sources failed for city Prague' },
    ]);
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - cities finished before the deadline are published and served from cache
   * - only the city still pending at the deadline fails
   */
  it('keeps cities aggregated before the deadline', async () => {
    alpha.fetchCurrent.mockImplementation((city) =>
      city === 'Prague'
        ? Promise.resolve(makeReading({ source: 'alpha', city, temperatureC: 12 }))
        : new Promise<never>(() => undefined)
    );
    alpha.fetchForecast.mockImplementation((city, days) =>
      city === 'Prague'
        ? Promise.resolve(makeForecastDays(days))
        : new Promise<never>(() => undefined)
    );
    const coordinator = createCoordinator([alpha]);

    const result = await coordinator.refresh(['Prague', 'London'], { timeoutMs: 20 });

    expect(result.status).toBe('partial_failure');
    expect(result.succeeded).toEqual(['Prague']);
    expect(result.failed).toEqual([
      { city: 'London', reason: 'All sources failed for city London' },
    ]);
    await expect(coordinator.resolveCurrent('Prague')).resolves.toMatchObject({
      origin: 'cache',
      data: { temperatureC: 12 },
    });
    expect(alpha.fetchCurrent).toHaveBeenCalledTimes(2);
  });

  it('refreshes a repeated city only once per cycle', async () => {
    succeed(alpha, 12);
    const coordinator = createCoordinator([alpha]);

    const result = await coordinator.refresh(['Prague', 'Prague']);

    expect(result.succeeded).toEqual(['Prague']);
    expect(alpha.fetchCurrent).toHaveBeenCalledTimes(1);
    expect(coordinator.getStats()).toMatchObject({ successCount: 1, failureCount: 0 });
  });

  it('skips source calls once the caller has aborted', async () => {
    succeed(alpha, 12);
    const controller = new AbortController();
    controller.abort();
    const coordinator = createCoordinator([alpha]);

    const result = await coordinator.refresh(['Prague'], { signal: controller.signal });

    expect(result.failed).toHaveLength(1);
    expect(alpha.fetchCurrent).not.toHaveBeenCalled();
  });

  it('exposes lifetime statistics', async () => {
    succeed(alpha, 12);
    const coordinator = createCoordinator([alpha, beta]);
    succeed(beta, 14);

    const before = Date.now();
    await coordinator.refresh(['Prague', 'London']);

    const stats = coordinator.getStats();
    expect(stats).toMatchObject({
      successCount: 2,
      failureCount: 0,
      citiesTracked: 2,
      activeSources: ['alpha', 'beta'],
    });
    // current + 3 forecast day counts per city
    expect(stats.cacheOccupancy).toBe(8);
    expect(stats.lastFetchTime).toBeGreaterThanOrEqual(before);
  });
});
