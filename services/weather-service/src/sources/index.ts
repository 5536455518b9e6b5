import { AppConfig, SourceName } from '../config';
import { WeatherSource } from '../interfaces/weatherSource';
import { logger } from '../logger';
import { BreakerTransition, CircuitState } from '../modules/circuitBreaker';
import { ResilientFetcher } from '../modules/resilientFetcher';
import { OpenMeteoSource } from './openMeteoSource';
import { OpenWeatherSource } from './openWeatherSource';
import { WeatherApiSource } from './weatherApiSource';

export { OpenMeteoSource } from './openMeteoSource';
export { OpenWeatherSource } from './openWeatherSource';
export { WeatherApiSource } from './weatherApiSource';

export interface SourceRegistry {
  sources: WeatherSource[];
  breakers(): CircuitState[];
}

export function createSources(
  config: Pick<AppConfig, 'sources' | 'retry' | 'breaker'>,
  onStateChange?: (transition: BreakerTransition) => void
): SourceRegistry {
  const fetchers: ResilientFetcher[] = [];
  const sources: WeatherSource[] = [];

  const fetcherFor = (name: SourceName) => {
    const fetcher = new ResilientFetcher(name, config.retry, config.breaker, undefined, onStateChange);
    fetchers.push(fetcher);
    return fetcher;
  };

  for (const name of config.sources.active) {
    switch (name) {
      case 'openweathermap': {
        const key = config.sources.openWeatherApiKey;
        if (!key) {
          logger.warn({ source: name }, 'OPENWEATHER_API_KEY not set, source disabled');
          break;
        }
        sources.push(new OpenWeatherSource(fetcherFor(name), key, config.sources.openWeatherUrl));
        break;
      }
      case 'open-meteo':
        sources.push(new OpenMeteoSource(fetcherFor(name), config.sources.openMeteoUrl));
        break;
      case 'weatherapi': {
        const key = config.sources.weatherApiKey;
        if (!key) {
          logger.warn({ source: name }, 'WEATHER_API_KEY not set, source disabled');
          break;
        }
        sources.push(new WeatherApiSource(fetcherFor(name), key, config.sources.weatherApiUrl));
        break;
      }
    }
  }

  logger.info({ sources: sources.map((source) => source.name) }, 'Weather sources initialized');

  return {
    sources,
    breakers: () => fetchers.map((fetcher) => fetcher.breakerState()),
  };
}
