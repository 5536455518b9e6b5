import Bottleneck from 'bottleneck';
import { v4 as uuidv4 } from 'uuid';

import { WeatherCache } from '../cache';
import {
  AllSourcesFailedError,
  CancelledError,
  NotAvailableError,
  SourceFailure,
  ValidationError,
  errorMessage,
} from '../errors';
import { componentLogger } from '../logger';
import { CityFailure, RefreshResult, Stats } from '../interfaces/stats';
import {
  ConsensusCurrent,
  ConsensusForecast,
  ForecastDay,
  Reading,
  Snapshot,
} from '../interfaces/weather';
import { WeatherSource } from '../interfaces/weatherSource';
import { abortable, withDeadline } from '../utils/time';
import { MAX_FORECAST_DAYS, mergeCurrent, mergeForecast } from './aggregation';

const log = componentLogger('coordinator');

/** The slice of Bottleneck the coordinator schedules through. */
export interface TaskPool {
  schedule<R>(fn: () => PromiseLike<R>): Promise<R>;
}

export interface CoordinatorOptions {
  forecastDays: number;
  maxConcurrentFetches: number;
  onDemandTimeoutMs: number;
}

export interface RefreshOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export type Origin = 'cache' | 'refresh';

export interface Resolved<T> {
  data: T;
  origin: Origin;
}

interface SourceOutcome {
  source: string;
  current: Reading | null;
  forecast: ForecastDay[] | null;
  error: Error | null;
}

interface CycleOutcome {
  result: RefreshResult;
  errors: Map<string, Error>;
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

export class WeatherCoordinator {
  private readonly snapshots = new Map<string, Snapshot>();
  private readonly inFlight = new Map<string, Promise<Error | undefined>>();
  private readonly pool: TaskPool;

  private successCount = 0;
  private failureCount = 0;
  private lastFetchTime: number | null = null;

  constructor(
    private readonly sources: readonly WeatherSource[],
    private readonly cache: WeatherCache,
    private readonly options: CoordinatorOptions,
    pool?: TaskPool
  ) {
    this.pool = pool ?? new Bottleneck({ maxConcurrent: options.maxConcurrentFetches });
  }

  get forecastDays(): number {
    return this.options.forecastDays;
  }

  // -------------------------------------------------
  // Refresh cycles
  // -------------------------------------------------
  async refresh(cities: readonly string[], options: RefreshOptions = {}): Promise<RefreshResult> {
    const { result } = await this.runCycle(cities, options);
    return result;
  }

  private async runCycle(requested: readonly string[], options: RefreshOptions): Promise<CycleOutcome> {
    const cities = [...new Set(requested)];
    const cycleId = uuidv4();
    const startedAt = Date.now();
    this.lastFetchTime = startedAt;

    log.info({ cycleId, cities: cities.length, sources: this.sources.length }, 'Refresh cycle started');

    const deadline = withDeadline(options.signal, options.timeoutMs);
    const errors = new Map<string, Error>();
    const succeeded: string[] = [];
    const failed: CityFailure[] = [];

    try {
      const settled = await Promise.allSettled(
        cities.map((city) => this.refreshCity(city, deadline.signal))
      );

      settled.forEach((outcome, i) => {
        const city = cities[i];
        if (outcome.status === 'fulfilled') {
          this.successCount++;
          succeeded.push(city);
          return;
        }

        const error = toError(outcome.reason);
        this.failureCount++;
        errors.set(city, error);
        failed.push({ city, reason: error.message });
        log.warn({ cycleId, city, error: error.message }, 'City refresh failed');
      });
    } finally {
      deadline.dispose();
    }

    const result: RefreshResult = {
      status: failed.length === 0 ? 'success' : 'partial_failure',
      succeeded,
      failed,
      durationMs: Date.now() - startedAt,
    };

    log.info(
      {
        cycleId,
        succeeded: succeeded.length,
        failed: failed.length,
        durationMs: result.durationMs,
      },
      'Refresh cycle completed'
    );

    return { result, errors };
  }

  private async refreshCity(city: string, signal: AbortSignal): Promise<void> {
    const outcomes = await Promise.all(
      this.sources.map((source) =>
        this.pool.schedule(() => this.fetchFromSource(source, city, signal))
      )
    );

    const current = new Map<string, Reading>();
    const forecasts = new Map<string, readonly ForecastDay[]>();
    const failures: SourceFailure[] = [];

    for (const outcome of outcomes) {
      if (outcome.current) current.set(outcome.source, outcome.current);
      if (outcome.forecast) forecasts.set(outcome.source, outcome.forecast);
      if (!outcome.current) {
        failures.push({
          source: outcome.source,
          error: outcome.error ?? new Error('No reading returned'),
        });
      }
    }

    if (current.size === 0) {
      throw new AllSourcesFailedError(city, failures);
    }

    this.publish({ city, current, forecasts, capturedAt: Date.now() });
  }

  /**
   * Current weather and forecast from one source. Failures are folded
   * into the outcome so siblings are unaffected.
   */
  private async fetchFromSource(
    source: WeatherSource,
    city: string,
    signal: AbortSignal
  ): Promise<SourceOutcome> {
    if (signal.aborted) {
      return {
        source: source.name,
        current: null,
        forecast: null,
        error: new CancelledError('Cancelled before source fetch'),
      };
    }

    const [current, forecast] = await Promise.allSettled([
      abortable(source.fetchCurrent(city, signal), signal),
      abortable(source.fetchForecast(city, this.options.forecastDays, signal), signal),
    ]);

    if (current.status === 'rejected') {
      log.warn(
        { city, source: source.name, error: errorMessage(current.reason) },
        'Current weather fetch failed'
      );
    }
    if (forecast.status === 'rejected') {
      log.warn(
        { city, source: source.name, error: errorMessage(forecast.reason) },
        'Forecast fetch failed'
      );
    }

    return {
      source: source.name,
      current: current.status === 'fulfilled' ? current.value : null,
      forecast: forecast.status === 'fulfilled' ? forecast.value : null,
      error: current.status === 'rejected' ? toError(current.reason) : null,
    };
  }

  private publish(snapshot: Snapshot): void {
    this.snapshots.set(snapshot.city, snapshot);

    const current = mergeCurrent(snapshot.city, snapshot.current);
    if (current) {
      this.cache.setCurrent(snapshot.city, current);
    }

    for (let days = 1; days <= MAX_FORECAST_DAYS; days++) {
      const forecast = mergeForecast(snapshot.city, snapshot.forecasts, days, snapshot.capturedAt);
      if (forecast) {
        this.cache.setForecast(snapshot.city, days, forecast);
      }
    }

    log.debug(
      { city: snapshot.city, sources: [...snapshot.current.keys()] },
      'Snapshot aggregated'
    );
  }

  // -------------------------------------------------
  // Reads
  // -------------------------------------------------
  async getCurrent(city: string): Promise<ConsensusCurrent> {
    const { data } = await this.resolveCurrent(city);
    return data;
  }

  async resolveCurrent(city: string): Promise<Resolved<ConsensusCurrent>> {
    const cached = this.cache.getCurrent(city);
    if (cached) return { data: cached, origin: 'cache' };

    const failure = await this.refreshOnDemand(city);

    const fresh = this.cache.getCurrent(city);
    if (fresh) return { data: fresh, origin: 'refresh' };

    throw new NotAvailableError(city, undefined, { cause: failure });
  }

  async getForecast(city: string, days: number): Promise<ConsensusForecast> {
    if (!Number.isInteger(days) || days < 1 || days > MAX_FORECAST_DAYS) {
      throw new ValidationError(`days must be an integer between 1 and ${MAX_FORECAST_DAYS}`);
    }

    const cached = this.cache.getForecast(city, days);
    if (cached) return cached;

    const failure = await this.refreshOnDemand(city);

    const fresh = this.cache.getForecast(city, days);
    if (fresh) return fresh;

    throw new NotAvailableError(
      city,
      `${days}-day forecast not available for ${city}`,
      { cause: failure }
    );
  }

  /** Single-city refresh shared by concurrent cache misses. */
  private refreshOnDemand(city: string): Promise<Error | undefined> {
    const pending = this.inFlight.get(city);
    if (pending) {
      log.debug({ city }, 'Awaiting in-flight refresh');
      return pending;
    }

    const promise = this.runCycle([city], { timeoutMs: this.options.onDemandTimeoutMs })
      .then(({ errors }) => errors.get(city))
      .finally(() => {
        this.inFlight.delete(city);
      });

    this.inFlight.set(city, promise);
    return promise;
  }

  // -------------------------------------------------
  // Introspection
  // -------------------------------------------------
  getStats(): Stats {
    return {
      lastFetchTime: this.lastFetchTime,
      successCount: this.successCount,
      failureCount: this.failureCount,
      citiesTracked: this.snapshots.size,
      cacheOccupancy: this.cache.size(),
      activeSources: this.sources.map((source) => source.name),
      cache: this.cache.stats(),
    };
  }

  cities(): string[] {
    return [...this.snapshots.keys()];
  }
}
