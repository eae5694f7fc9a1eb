import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import bodyParser from 'body-parser';
import { AppError, RequestValidationError, UpstreamError, errorMessage } from '../../lib/errors';
import type { Logger } from '../../lib/logger';
import type { RecommendationService } from '../../lib/service';
import { createRouter } from './routes';

export interface AppDeps {
  service: RecommendationService;
  logger: Logger;
}

function isJsonSyntaxError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function createApp({ service, logger }: AppDeps): express.Express {
  const app = express();

  app.use(cors({ origin: true }));
  app.options('*', cors({ origin: true }));

  app.use(bodyParser.json());

  app.use(createRouter(service));

  // Error handler LAST
  const onError: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    if (err instanceof RequestValidationError) {
      res.status(err.status).json({ error: 'Invalid request', details: err.details });
      return;
    }
    if (isJsonSyntaxError(err)) {
      res.status(400).json({ error: 'Invalid request', details: ['body is not valid JSON'] });
      return;
    }
    if (err instanceof UpstreamError) {
      logger.error('Upstream failure on %s %s: %s', req.method, req.path, err.message);
      res.status(err.status).json({ error: 'Upstream error', message: err.message });
      return;
    }

    logger.error('Unhandled error on %s %s', req.method, req.path, err);
    const status = err instanceof AppError ? err.status : 500;
    res.status(status).json({ error: 'Internal Server Error', message: errorMessage(err) });
  };
  app.use(onError);

  return app;
}
