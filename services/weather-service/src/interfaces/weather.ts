/* ------------------ Provider readings ------------------ */

export type Reading = Readonly<{
    source: string;
    city: string;
    temperatureC: number;
    feelsLikeC: number;
    humidity: number;
    pressureMb: number;
    windKph: number;
    windDegree: number;
    description: string;
    icon: string;
    /** Observation time, epoch ms */
    observedAt: number;
}>;

export type ForecastDay = Readonly<{
    /** YYYY-MM-DD */
    date: string;
    maxTempC: number;
    minTempC: number;
    avgTempC: number;
    humidity: number;
    precipitationMm: number;
    description: string;
    icon: string;
}>;

/* ------------------ Per-city fetch cycle ------------------ */

export interface Snapshot {
    city: string;
    current: Map<string, Reading>;
    forecasts: Map<string, readonly ForecastDay[]>;
    capturedAt: number;
}

/* ------------------ Consensus records ------------------ */

export type ConsensusCurrent = Readonly<{
    city: string;
    temperatureC: number;
    feelsLikeC: number;
    humidity: number;
    pressureMb: number;
    windKph: number;
    description: string;
    icon: string;
    confidence: number;
    sources: readonly string[];
    lastUpdated: number;
}>;

export type ConsensusForecast = Readonly<{
    city: string;
    days: number;
    forecast: readonly ForecastDay[];
    sources: readonly string[];
    lastUpdated: number;
}>;
