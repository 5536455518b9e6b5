import express, { ErrorRequestHandler, Express } from 'express';

import { AggregatorError, NotAvailableError, ValidationError } from '../errors';
import { componentLogger } from '../logger';
import { ApiDeps, weatherRouter } from './routes';

const log = componentLogger('http');

const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (err instanceof ValidationError) {
    res.status(400).json({ error: err.message, code: err.code });
    return;
  }

  // body-parser rejects malformed JSON with a SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Malformed JSON body', code: 'VALIDATION_ERROR' });
    return;
  }

  if (err instanceof NotAvailableError) {
    log.warn({ city: err.city, path: req.path }, 'Weather data not available');
    res.status(503).json({ error: err.message, code: err.code });
    return;
  }

  log.error({ err, path: req.path }, 'Request failed');
  res.status(500).json({
    error: 'Internal server error',
    code: err instanceof AggregatorError ? err.code : 'INTERNAL_ERROR',
  });
};

export function createApp(deps: ApiDeps): Express {
  const app = express();
  app.set('trust proxy', true);
  app.use(express.json());

  app.use('/api/v1', weatherRouter(deps));

  app.use((req, res) => {
    res.status(404).json({ error: `Route ${req.method} ${req.path} not found`, code: 'NOT_FOUND' });
  });

  app.use(errorHandler);

  return app;
}
