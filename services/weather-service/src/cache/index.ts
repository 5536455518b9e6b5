import { logger } from "../logger";
import { CacheStats } from "../interfaces/stats";
import { ConsensusCurrent, ConsensusForecast } from "../interfaces/weather";
import { toIso } from "../utils/time";

export interface CacheEntry<T> {
  payload: T;
  expiresAt: number;
}

export interface WeatherCacheOptions {
  ttlMs: number;
  maxSize: number;
  sweepIntervalMs: number;
}

type Store = "current" | "forecast";

function forecastKey(city: string, days: number): string {
  return `${city}:${days}`;
}

/**
 * Two keyed stores (current weather by city, forecasts by city + days)
 * sharing one capacity. Reads drop expired entries on the spot; the
 * periodic sweep only reclaims memory.
 */
export class WeatherCache {
  private readonly current = new Map<string, CacheEntry<ConsensusCurrent>>();
  private readonly forecast = new Map<string, CacheEntry<ConsensusForecast>>();
  private readonly sweepTimer: NodeJS.Timeout;
  private evictions = 0;

  constructor(private readonly options: WeatherCacheOptions) {
    this.sweepTimer = setInterval(() => this.sweep(), options.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  // -------------------------
  // Current weather
  // -------------------------
  getCurrent(city: string): ConsensusCurrent | null {
    return this.read(this.current, city);
  }

  setCurrent(city: string, payload: ConsensusCurrent, ttlMs = this.options.ttlMs): void {
    this.write(this.current, city, payload, ttlMs);
    logger.debug({ city, expiresAt: toIso(Date.now() + ttlMs) }, "Current weather cached");
  }

  // -------------------------
  // Forecast
  // -------------------------
  getForecast(city: string, days: number): ConsensusForecast | null {
    return this.read(this.forecast, forecastKey(city, days));
  }

  setForecast(
    city: string,
    days: number,
    payload: ConsensusForecast,
    ttlMs = this.options.ttlMs
  ): void {
    this.write(this.forecast, forecastKey(city, days), payload, ttlMs);
    logger.debug({ city, days, expiresAt: toIso(Date.now() + ttlMs) }, "Forecast cached");
  }

  // -------------------------
  // Housekeeping
  // -------------------------
  sweep(): number {
    const now = Date.now();
    const removed = this.sweepStore(this.current, now) + this.sweepStore(this.forecast, now);

    if (removed > 0) {
      logger.debug({ count: removed }, "Cleaned expired cache items");
    }
    return removed;
  }

  size(): number {
    return this.current.size + this.forecast.size;
  }

  stats(): CacheStats {
    return {
      currentItems: this.current.size,
      forecastItems: this.forecast.size,
      occupancy: this.size(),
      maxSize: this.options.maxSize,
      defaultTtlMs: this.options.ttlMs,
      evictions: this.evictions,
    };
  }

  clear(): void {
    this.current.clear();
    this.forecast.clear();
  }

  shutdown(): void {
    clearInterval(this.sweepTimer);
  }

  private sweepStore<T>(store: Map<string, CacheEntry<T>>, now: number): number {
    let removed = 0;
    for (const [key, entry] of store) {
      if (now > entry.expiresAt) {
        store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  private read<T>(store: Map<string, CacheEntry<T>>, key: string): T | null {
    const entry = store.get(key);
    if (!entry) return null;

    if (Date.now() > entry.expiresAt) {
      store.delete(key);
      return null;
    }
    return entry.payload;
  }

  private write<T>(store: Map<string, CacheEntry<T>>, key: string, payload: T, ttlMs: number): void {
    if (!store.has(key) && this.size() >= this.options.maxSize) {
      this.evictEarliest();
    }
    store.set(key, { payload, expiresAt: Date.now() + ttlMs });
  }

  private evictEarliest(): void {
    let victim: { store: Store; key: string; expiresAt: number } | null = null;

    for (const [key, entry] of this.current) {
      if (!victim || entry.expiresAt < victim.expiresAt) {
        victim = { store: "current", key, expiresAt: entry.expiresAt };
      }
    }
    for (const [key, entry] of this.forecast) {
      if (!victim || entry.expiresAt < victim.expiresAt) {
        victim = { store: "forecast", key, expiresAt: entry.expiresAt };
      }
    }

    if (!victim) return;

    if (victim.store === "current") this.current.delete(victim.key);
    else this.forecast.delete(victim.key);
    this.evictions++;

    logger.debug({ store: victim.store, key: victim.key }, "Evicted earliest-expiring cache entry");
  }
}
