import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';

import { ValidationError } from '../errors';
import { CircuitState } from '../modules/circuitBreaker';
import { WeatherCoordinator } from '../modules/coordinator';
import { RefreshScheduler } from '../modules/scheduler';
import { toIso } from '../utils/time';

const DEFAULT_FORECAST_DAYS = 3;

export interface ApiDeps {
  coordinator: Pick<WeatherCoordinator, 'getCurrent' | 'getForecast' | 'getStats' | 'cities'>;
  scheduler: Pick<RefreshScheduler, 'triggerNow' | 'status'>;
  breakers: () => CircuitState[];
  startedAt?: number;
}

const CityQuerySchema = z.object({
  city: z.string({ required_error: 'city query parameter is required' }).trim().min(1, 'city query parameter is required'),
});

const ForecastQuerySchema = CityQuerySchema.extend({
  days: z.coerce
    .number()
    .int('days must be an integer between 1 and 7')
    .min(1, 'days must be an integer between 1 and 7')
    .max(7, 'days must be an integer between 1 and 7')
    .default(DEFAULT_FORECAST_DAYS),
});

const RefreshBodySchema = z
  .object({
    cities: z.array(z.string().trim().min(1)).min(1).optional(),
  })
  .default({});

function parse<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid request');
  }
  return parsed.data;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected handler promises
function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function weatherRouter(deps: ApiDeps): Router {
  const { coordinator, scheduler, breakers } = deps;
  const startedAt = deps.startedAt ?? Date.now();
  const router = Router();

  router.get('/health', (_req, res) => {
    const stats = coordinator.getStats();
    res.json({
      status: 'healthy',
      timestamp: toIso(Date.now()),
      lastFetch: stats.lastFetchTime === null ? null : toIso(stats.lastFetchTime),
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      stats,
    });
  });

  router.get('/metrics', (_req, res) => {
    res.json({
      stats: coordinator.getStats(),
      scheduler: scheduler.status(),
      breakers: breakers(),
    });
  });

  router.get('/cities', (_req, res) => {
    res.json({
      cities: scheduler.status().cities,
      tracked: coordinator.cities(),
    });
  });

  router.get(
    '/weather/current',
    route(async (req, res) => {
      const { city } = parse(CityQuerySchema, req.query);
      res.json(await coordinator.getCurrent(city));
    })
  );

  router.get(
    '/weather/forecast',
    route(async (req, res) => {
      const { city, days } = parse(ForecastQuerySchema, req.query);
      res.json(await coordinator.getForecast(city, days));
    })
  );

  router.post(
    '/refresh',
    route(async (req, res) => {
      const { cities } = parse(RefreshBodySchema, req.body);
      res.json(await scheduler.triggerNow(cities));
    })
  );

  return router;
}
