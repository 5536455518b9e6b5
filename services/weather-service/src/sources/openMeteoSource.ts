import cities from '../data/cities.json';
import wmoCodes from '../data/wmoCodes.json';
import { NotFoundError, ParseError } from '../errors';
import { ForecastDay, Reading } from '../interfaces/weather';
import { WeatherSource } from '../interfaces/weatherSource';
import { Fetcher } from '../modules/resilientFetcher';
import {
  CityCoordinates,
  CityCoordinatesSchema,
  OpenMeteoCurrentSchema,
  OpenMeteoDailySchema,
  WmoCodesSchema,
} from '../schemas/openMeteo.schema';
import { parsePayload } from './parsePayload';

function isValue(value: number | null | undefined): value is number {
  return typeof value === 'number';
}

function normalizeCity(city: string): string {
  return city.toLowerCase().replace(/[\s_-]+/g, '');
}

const COORDINATES = new Map(
  Object.entries(CityCoordinatesSchema.parse(cities)).map(([name, coords]) => [
    normalizeCity(name),
    coords,
  ])
);

const DESCRIPTIONS = WmoCodesSchema.parse(wmoCodes);

export function describeWeatherCode(code: number): string {
  return DESCRIPTIONS[String(code)] ?? 'Unknown';
}

/** WMO weather code to the OpenWeatherMap icon vocabulary. */
export function weatherCodeToIcon(code: number): string {
  if (code === 0) return '01d';
  if (code <= 3) return '02d';
  if (code <= 48) return '50d';
  if (code <= 67) return '10d';
  if (code <= 77) return '13d';
  if (code <= 82) return '09d';
  if (code <= 86) return '13d';
  return '11d';
}

export class OpenMeteoSource implements WeatherSource {
  readonly name = 'open-meteo';

  constructor(
    private readonly fetcher: Fetcher,
    private readonly baseUrl: string
  ) {}

  async fetchCurrent(city: string, signal?: AbortSignal): Promise<Reading> {
    const coords = this.locate(city);

    const data = await this.fetcher.fetch(
      {
        url: `${this.baseUrl}/forecast`,
        params: {
          ...coords,
          current:
            'temperature_2m,apparent_temperature,relative_humidity_2m,pressure_msl,wind_speed_10m,wind_direction_10m,weather_code',
          timezone: 'GMT',
        },
      },
      signal
    );
    const { current } = parsePayload(OpenMeteoCurrentSchema, data, this.name);

    const observedAt = Date.parse(`${current.time}Z`);

    return {
      source: this.name,
      city,
      temperatureC: current.temperature_2m,
      feelsLikeC: current.apparent_temperature ?? current.temperature_2m,
      humidity: current.relative_humidity_2m,
      pressureMb: current.pressure_msl,
      windKph: current.wind_speed_10m,
      windDegree: current.wind_direction_10m,
      description: describeWeatherCode(current.weather_code),
      icon: weatherCodeToIcon(current.weather_code),
      observedAt: Number.isNaN(observedAt) ? Date.now() : observedAt,
    };
  }

  async fetchForecast(city: string, days: number, signal?: AbortSignal): Promise<ForecastDay[]> {
    const coords = this.locate(city);

    const data = await this.fetcher.fetch(
      {
        url: `${this.baseUrl}/forecast`,
        params: {
          ...coords,
          daily:
            'temperature_2m_max,temperature_2m_min,precipitation_sum,weather_code,relative_humidity_2m_mean',
          forecast_days: days,
          timezone: 'GMT',
        },
      },
      signal
    );
    const { daily } = parsePayload(OpenMeteoDailySchema, data, this.name);

    // Forecast ends at the first day with a gap in any series.
    const forecast: ForecastDay[] = [];
    for (const [i, date] of daily.time.slice(0, days).entries()) {
      const max = daily.temperature_2m_max[i];
      const min = daily.temperature_2m_min[i];
      const precipitation = daily.precipitation_sum[i];
      const code = daily.weather_code[i];
      const humidity = daily.relative_humidity_2m_mean?.[i];

      if (
        !isValue(max) ||
        !isValue(min) ||
        !isValue(precipitation) ||
        !isValue(code) ||
        !isValue(humidity)
      ) {
        break;
      }

      forecast.push({
        date,
        maxTempC: max,
        minTempC: min,
        avgTempC: (max + min) / 2,
        humidity,
        precipitationMm: precipitation,
        description: describeWeatherCode(code),
        icon: weatherCodeToIcon(code),
      });
    }

    if (forecast.length === 0) {
      throw new ParseError(`${this.name} forecast has no complete days`);
    }
    return forecast;
  }

  private locate(city: string): CityCoordinates {
    const coords = COORDINATES.get(normalizeCity(city));
    if (!coords) {
      throw new NotFoundError(this.name, city);
    }
    return coords;
  }
}
