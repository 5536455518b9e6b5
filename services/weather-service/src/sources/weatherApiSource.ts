import { ClientRejectedError, NotFoundError } from '../errors';
import { ForecastDay, Reading } from '../interfaces/weather';
import { WeatherSource } from '../interfaces/weatherSource';
import { Fetcher } from '../modules/resilientFetcher';
import {
  WeatherApiErrorSchema,
  WeatherApiForecastDay,
  WeatherApiResponse,
  WeatherApiSchema,
} from '../schemas/weatherApi.schema';
import { parsePayload } from './parsePayload';

/** WeatherAPI.com error code for "No matching location found." */
const LOCATION_NOT_FOUND = 1006;

export class WeatherApiSource implements WeatherSource {
  readonly name = 'weatherapi';

  constructor(
    private readonly fetcher: Fetcher,
    private readonly apiKey: string,
    private readonly baseUrl: string
  ) {}

  async fetchCurrent(city: string, signal?: AbortSignal): Promise<Reading> {
    const { current } = await this.getForecast(city, 1, signal);

    return {
      source: this.name,
      city,
      temperatureC: current.temp_c,
      feelsLikeC: current.feelslike_c,
      humidity: current.humidity,
      pressureMb: current.pressure_mb,
      windKph: current.wind_kph,
      windDegree: current.wind_degree,
      description: current.condition.text,
      icon: current.condition.icon,
      observedAt: current.last_updated_epoch * 1000,
    };
  }

  async fetchForecast(city: string, days: number, signal?: AbortSignal): Promise<ForecastDay[]> {
    const { forecast } = await this.getForecast(city, days, signal);
    return forecast.forecastday.slice(0, days).map(toForecastDay);
  }

  private async getForecast(
    city: string,
    days: number,
    signal?: AbortSignal
  ): Promise<WeatherApiResponse> {
    let data: unknown;
    try {
      data = await this.fetcher.fetch(
        {
          url: `${this.baseUrl}/forecast.json`,
          params: { q: city, days, aqi: 'no', alerts: 'no', key: this.apiKey },
        },
        signal
      );
    } catch (err) {
      if (err instanceof ClientRejectedError && isLocationNotFound(err.body)) {
        throw new NotFoundError(this.name, city);
      }
      throw err;
    }

    return parsePayload(WeatherApiSchema, data, this.name);
  }
}

function isLocationNotFound(body: unknown): boolean {
  const parsed = WeatherApiErrorSchema.safeParse(body);
  return parsed.success && parsed.data.error.code === LOCATION_NOT_FOUND;
}

function toForecastDay({ date, day }: WeatherApiForecastDay): ForecastDay {
  return {
    date,
    maxTempC: day.maxtemp_c,
    minTempC: day.mintemp_c,
    avgTempC: day.avgtemp_c,
    humidity: day.avghumidity,
    precipitationMm: day.totalprecip_mm,
    description: day.condition.text,
    icon: day.condition.icon,
  };
}
