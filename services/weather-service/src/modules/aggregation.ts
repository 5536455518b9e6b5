import {
    ConsensusCurrent,
    ConsensusForecast,
    ForecastDay,
    Reading,
} from '../interfaces/weather';

// -------------------------------------------------
// Confidence scoring
// -------------------------------------------------
const SINGLE_SOURCE_CONFIDENCE = 0.5;
/** Temperature variance (°C²) treated as total disagreement */
const MAX_TEMPERATURE_VARIANCE = 25;
const SOURCE_BONUS = 0.1;

export const MAX_FORECAST_DAYS = 7;

function clamp(value: number, min = 0, max = 1): number {
    return Math.min(Math.max(value, min), max);
}

function mean(values: readonly number[]): number {
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function populationVariance(values: readonly number[]): number {
    const avg = mean(values);
    return mean(values.map((value) => (value - avg) ** 2));
}

/**
 * Agreement on temperature, boosted by the number of sources.
 * A lone source scores 0.5.
 */
export function calculateConfidence(temperatures: readonly number[]): number {
    if (temperatures.length <= 1) return SINGLE_SOURCE_CONFIDENCE;

    const normalizedVariance = clamp(populationVariance(temperatures) / MAX_TEMPERATURE_VARIANCE);
    const bonus = SOURCE_BONUS * (temperatures.length - 1);

    return clamp(1 - normalizedVariance + bonus);
}

/**
 * Most frequent value. Ties go to the value seen first, so the result
 * depends on the order the caller iterates its sources in.
 */
export function mostCommon(values: readonly string[]): string {
    const counts = new Map<string, number>();
    for (const value of values) {
        counts.set(value, (counts.get(value) ?? 0) + 1);
    }

    let best = '';
    let bestCount = 0;
    for (const [value, count] of counts) {
        if (count > bestCount) {
            best = value;
            bestCount = count;
        }
    }
    return best;
}

// -------------------------------------------------
// Current weather
// -------------------------------------------------
export function mergeCurrent(
    city: string,
    readings: ReadonlyMap<string, Reading>
): ConsensusCurrent | null {
    const entries = [...readings.entries()];
    if (entries.length === 0) return null;

    const values = entries.map(([, reading]) => reading);
    const average = (pick: (reading: Reading) => number) => mean(values.map(pick));

    return {
        city,
        temperatureC: average((r) => r.temperatureC),
        feelsLikeC: average((r) => r.feelsLikeC),
        humidity: average((r) => r.humidity),
        pressureMb: average((r) => r.pressureMb),
        windKph: average((r) => r.windKph),
        description: mostCommon(values.map((r) => r.description)),
        // Taken from the first source, not derived from the chosen description
        icon: values[0].icon,
        confidence: calculateConfidence(values.map((r) => r.temperatureC)),
        sources: entries.map(([source]) => source),
        lastUpdated: Math.max(...values.map((r) => r.observedAt)),
    };
}

// -------------------------------------------------
// Forecast
// -------------------------------------------------
export function mergeForecast(
    city: string,
    forecasts: ReadonlyMap<string, readonly ForecastDay[]>,
    days: number,
    now: number = Date.now()
): ConsensusForecast | null {
    const contributing = [...forecasts.entries()].filter(([, forecast]) => forecast.length >= days);
    if (contributing.length === 0) return null;

    const merged: ForecastDay[] = [];

    for (let day = 0; day < days; day++) {
        const slices = contributing.map(([, forecast]) => forecast[day]);
        const first = slices[0];
        const average = (pick: (slice: ForecastDay) => number) => mean(slices.map(pick));

        merged.push({
            date: first.date,
            maxTempC: average((s) => s.maxTempC),
            minTempC: average((s) => s.minTempC),
            avgTempC: average((s) => s.avgTempC),
            humidity: average((s) => s.humidity),
            precipitationMm: average((s) => s.precipitationMm),
            description: mostCommon(slices.map((s) => s.description)),
            icon: first.icon,
        });
    }

    return {
        city,
        days,
        forecast: merged,
        sources: contributing.map(([source]) => source),
        lastUpdated: now,
    };
}
