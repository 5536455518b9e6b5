import { ClientRejectedError, NotFoundError } from '../errors';
import { ForecastDay, Reading } from '../interfaces/weather';
import { WeatherSource } from '../interfaces/weatherSource';
import { Fetcher } from '../modules/resilientFetcher';
import { OwmCurrentSchema, OwmForecastSchema, OwmForecastStep } from '../schemas/openWeather.schema';
import { parsePayload, toKph } from './parsePayload';

const STEPS_PER_DAY = 8; // 3-hour steps

export class OpenWeatherSource implements WeatherSource {
  readonly name = 'openweathermap';

  constructor(
    private readonly fetcher: Fetcher,
    private readonly apiKey: string,
    private readonly baseUrl: string
  ) {}

  async fetchCurrent(city: string, signal?: AbortSignal): Promise<Reading> {
    const data = await this.request('weather', city, {}, signal);
    const parsed = parsePayload(OwmCurrentSchema, data, this.name);

    return {
      source: this.name,
      city,
      temperatureC: parsed.main.temp,
      feelsLikeC: parsed.main.feels_like,
      humidity: parsed.main.humidity,
      pressureMb: parsed.main.pressure,
      windKph: toKph(parsed.wind.speed),
      windDegree: parsed.wind.deg,
      description: parsed.weather[0].description,
      icon: parsed.weather[0].icon,
      observedAt: parsed.dt * 1000,
    };
  }

  async fetchForecast(city: string, days: number, signal?: AbortSignal): Promise<ForecastDay[]> {
    const data = await this.request('forecast', city, { cnt: days * STEPS_PER_DAY }, signal);
    const parsed = parsePayload(OwmForecastSchema, data, this.name);

    // Steps arrive in chronological order; Map keeps the day order.
    const byDay = new Map<string, OwmForecastStep[]>();
    for (const step of parsed.list) {
      const date = new Date(step.dt * 1000).toISOString().slice(0, 10);
      const bucket = byDay.get(date) ?? [];
      bucket.push(step);
      byDay.set(date, bucket);
    }

    return [...byDay.entries()].slice(0, days).map(([date, steps]) => summarizeDay(date, steps));
  }

  private async request(
    endpoint: 'weather' | 'forecast',
    city: string,
    extra: Record<string, number>,
    signal?: AbortSignal
  ): Promise<unknown> {
    try {
      return await this.fetcher.fetch(
        {
          url: `${this.baseUrl}/${endpoint}`,
          params: { q: city, appid: this.apiKey, units: 'metric', ...extra },
        },
        signal
      );
    } catch (err) {
      if (err instanceof ClientRejectedError && err.status === 404) {
        throw new NotFoundError(this.name, city);
      }
      throw err;
    }
  }
}

function summarizeDay(date: string, steps: OwmForecastStep[]): ForecastDay {
  const temps = steps.map((step) => step.main.temp);
  const total = (values: number[]) => values.reduce((sum, value) => sum + value, 0);

  return {
    date,
    maxTempC: Math.max(...temps),
    minTempC: Math.min(...temps),
    avgTempC: total(temps) / temps.length,
    humidity: total(steps.map((step) => step.main.humidity)) / steps.length,
    precipitationMm: total(
      steps.map((step) => (step.rain?.['3h'] ?? 0) + (step.snow?.['3h'] ?? 0))
    ),
    description: steps[0].weather[0].description,
    icon: steps[0].weather[0].icon,
  };
}
