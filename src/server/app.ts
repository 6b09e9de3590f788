import express, { type Express } from 'express';
import type { EntityService } from '../entities/EntityService.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';
import { createEntityRoutes } from './routes/entities.routes.js';
import { createHealthRoutes } from './routes/health.routes.js';

export interface AppOptions {
  service: EntityService;
  jsonBodyLimit?: string;
  requestTiming?: boolean;
}

/**
 * Build the Express application. Has no side effects beyond the returned app,
 * so tests can mount it on an ephemeral port.
 */
export function createApp(options: AppOptions): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestLogger(options.requestTiming ?? true));
  app.use(express.json({ limit: options.jsonBodyLimit ?? '1mb' }));

  app.use('/entities', createEntityRoutes(options.service));
  app.use('/health', createHealthRoutes(options.service));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
