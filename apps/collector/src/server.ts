import express from 'express';
import { ROUTES, type Logger } from '@logsink/shared';
import type { WorkerPool } from '@logsink/pipeline';
import type { CollectorConfig } from './config.js';
import { errorHandler, notFound } from './middleware/error-handler.js';
import { requestLogger } from './middleware/request-logger.js';
import healthRouter from './routes/health.js';
import { createIngestRouter } from './routes/ingest.js';
import { createStatusRouter, type RotationInfo } from './routes/status.js';

declare global {
  namespace Express {
    interface Request {
      log: Logger;
      requestId: string;
    }
  }
}

export interface AppDependencies {
  pool: WorkerPool;
  rotation: RotationInfo;
  config: Pick<CollectorConfig, 'address' | 'ingestMode' | 'bodyLimit'>;
  logger: Logger;
}

export function createApp({ pool, rotation, config, logger }: AppDependencies): express.Application {
  const app = express();
  app.disable('x-powered-by');

  app.use(requestLogger(logger, [ROUTES.INGEST]));

  app.use(ROUTES.HEALTH, healthRouter);
  app.use(ROUTES.STATS, createStatusRouter({ pool, rotation, address: config.address }));
  app.use(ROUTES.INGEST, createIngestRouter({ pool, mode: config.ingestMode, bodyLimit: config.bodyLimit }));

  app.use((req, _res, next) => {
    next(notFound(`Route ${req.method} ${req.path} not found`));
  });

  app.use(errorHandler);

  return app;
}
