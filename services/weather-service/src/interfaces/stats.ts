export interface CacheStats {
    currentItems: number;
    forecastItems: number;
    occupancy: number;
    maxSize: number;
    defaultTtlMs: number;
    evictions: number;
}

export interface Stats {
    lastFetchTime: number | null;
    successCount: number;
    failureCount: number;
    citiesTracked: number;
    cacheOccupancy: number;
    activeSources: string[];
    cache: CacheStats;
}

export interface CityFailure {
    city: string;
    reason: string;
}

export interface RefreshResult {
    status: 'success' | 'partial_failure';
    succeeded: string[];
    failed: CityFailure[];
    durationMs: number;
}
