import http from 'http';
import { Consumer, Kafka, logLevel, Producer } from 'kafkajs';

import { createApp } from './api/app';
import { WeatherCache } from './cache';
import { loadConfig } from './config';
import { errorMessage } from './errors';
import { logger } from './logger';
import { WeatherCoordinator } from './modules/coordinator';
import { RefreshScheduler } from './modules/scheduler';
import { startWeatherConsumer } from './modules/weatherConsumer';
import { createSources } from './sources';

// -------------------------------------------------
// Config
// -------------------------------------------------
const config = loadConfig();

// -------------------------------------------------
// Core components
// -------------------------------------------------
const registry = createSources(config, (transition) => {
  logger.info(transition, 'Source breaker transition');
});

const cache = new WeatherCache(config.cache);
const coordinator = new WeatherCoordinator(registry.sources, cache, config.coordinator);
const scheduler = new RefreshScheduler(coordinator, config.scheduler);

// -------------------------------------------------
// HTTP Server
// -------------------------------------------------
const app = createApp({ coordinator, scheduler, breakers: registry.breakers });
const server = http.createServer(app);

server.listen(config.port, () => {
  logger.info({ port: config.port }, 'HTTP server listening');
});

scheduler.start();

// -------------------------------------------------
// Kafka (optional)
// -------------------------------------------------
let producer: Producer | null = null;
let consumer: Consumer | null = null;
let kafkaStarting = false;
let kafkaDownLogged = false;
let isShuttingDown = false;

async function initKafkaSafely(broker: string) {
  if (kafkaStarting) return;
  kafkaStarting = true;

  const kafka = new Kafka({
    clientId: 'weather-service',
    brokers: [broker],
    logLevel: logLevel.NOTHING,
  });

  const kafkaProducer = kafka.producer({ idempotent: true });
  const kafkaConsumer = kafka.consumer({ groupId: 'weather-group' });
  producer = kafkaProducer;
  consumer = kafkaConsumer;

  kafkaProducer.on(kafkaProducer.events.CONNECT, () => {
    if (kafkaDownLogged) {
      logger.info('Kafka connection restored');
      kafkaDownLogged = false;
    } else {
      logger.info('Kafka producer connected');
    }
  });

  kafkaProducer.on(kafkaProducer.events.DISCONNECT, () => {
    logger.warn('Kafka producer disconnected');
  });

  while (!isShuttingDown) {
    try {
      await kafkaProducer.connect();
      await kafkaConsumer.connect();

      await startWeatherConsumer(kafkaConsumer, kafkaProducer, coordinator);

      logger.info('Kafka consumer started');
      break;
    } catch (err) {
      if (!kafkaDownLogged) {
        kafkaDownLogged = true;
        logger.warn({ error: errorMessage(err) }, 'Kafka unavailable, retrying every 10s');
      }
      await new Promise((res) => setTimeout(res, 10_000));
    }
  }
}

if (config.kafkaBroker) {
  initKafkaSafely(config.kafkaBroker).catch((err: unknown) => {
    logger.error({ err }, 'Kafka initialization failed');
  });
} else {
  logger.info('KAFKA_BROKER_ADDRESS not set, Kafka consumer disabled');
}

// -------------------------------------------------
// Shutdown
// -------------------------------------------------
async function shutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`Received ${signal}. Shutting down...`);

  try {
    scheduler.stop();
    cache.shutdown();

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

    if (producer) await producer.disconnect();
    if (consumer) await consumer.disconnect();

    logger.info('Shutdown complete');
    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'Shutdown error');
    process.exit(1);
  }
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
