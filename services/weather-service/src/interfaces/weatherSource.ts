import { ForecastDay, Reading } from './weather';

/**
 * A weather provider. Implementations own their city lookup and wire
 * parsing; an unknown city rejects with `NotFoundError`.
 */
export interface WeatherSource {
    readonly name: string;
    fetchCurrent(city: string, signal?: AbortSignal): Promise<Reading>;
    fetchForecast(city: string, days: number, signal?: AbortSignal): Promise<ForecastDay[]>;
}
