import { Producer, Consumer } from 'kafkajs';
import { CityCommandSchema } from '../interfaces/cityCommand';
import { ConsensusForecast } from '../interfaces/weather';
import { WeatherResult } from '../interfaces/weatherResult';
import { AllSourcesFailedError, NotAvailableError } from '../errors';
import { logger } from '../logger';
import { WeatherCoordinator } from './coordinator';

export const FETCH_TOPIC = 'weather.service.command.fetch';
export const UPDATED_TOPIC = 'weather.service.event.updated';

type WeatherReader = Pick<WeatherCoordinator, 'resolveCurrent' | 'getForecast' | 'forecastDays'>;

async function forecastOrNull(
  coordinator: WeatherReader,
  city: string
): Promise<ConsensusForecast | null> {
  try {
    return await coordinator.getForecast(city, coordinator.forecastDays);
  } catch (err) {
    if (err instanceof NotAvailableError) return null;
    throw err;
  }
}

export async function buildWeatherResult(
  coordinator: WeatherReader,
  city: string
): Promise<WeatherResult> {
  try {
    const current = await coordinator.resolveCurrent(city);
    const forecast = await forecastOrNull(coordinator, city);

    return {
      status: 'success',
      source: current.origin,
      data: { current: current.data, forecast },
      timestamp: Date.now(),
    };
  } catch (err) {
    let reason: 'all_sources_failed' | 'not_available' | 'internal_error' = 'internal_error';
    if (err instanceof NotAvailableError) {
      reason = err.cause instanceof AllSourcesFailedError ? 'all_sources_failed' : 'not_available';
    } else {
      logger.error({ err, city }, 'Unexpected error building weather result');
    }

    return { status: 'unavailable', city, reason, timestamp: Date.now() };
  }
}

export async function startWeatherConsumer(
  consumer: Pick<Consumer, 'subscribe' | 'run'>,
  producer: Pick<Producer, 'send'>,
  coordinator: WeatherReader
) {
  let kafkaAvailable = false;

  await consumer.subscribe({
    topic: FETCH_TOPIC,
    fromBeginning: false,
  });

  await consumer.run({
    eachMessage: async ({ topic, message }) => {
      try {
        if (!kafkaAvailable) {
          kafkaAvailable = true;
          logger.info('Kafka recovered');
        }

        const value = message.value?.toString();
        if (!value) return;

        const raw: unknown = JSON.parse(value);
        const parsed = CityCommandSchema.safeParse(
          typeof raw === 'object' && raw !== null && 'data' in raw ? raw.data : undefined
        );

        if (!parsed.success) {
          logger.warn({ raw }, 'Invalid city command payload');
          return;
        }

        const { city } = parsed.data;
        const response = await buildWeatherResult(coordinator, city);

        await producer.send({
          topic: UPDATED_TOPIC,
          messages: [{ key: city, value: JSON.stringify(response) }],
        });

        logger.info({ city, status: response.status }, 'Weather update published');
      } catch (err) {
        kafkaAvailable = false;
        logger.error(
          { err, topic, value: message.value?.toString() },
          'Weather consumer failed'
        );
      }
    },
  });
}
