/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a fresh app per call; server.ts builds one and integration tests
 * build one per suite.
 *
 * Middleware order:
 *   1. requestTimer  — req.requestStartTime for meta.totalTimeMs
 *   2. helmet / cors / compression
 *   3. express.json()
 *   4. requestLogger
 *   5. routes
 *   6. errorHandler  — must be last
 *
 * `import '@core/container'` bootstraps DI before any controller resolves
 * a service.
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { transportRoutes } from '@interfaces/http/routes/transportRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  app.use(requestTimer);

  app.use(helmet());
  app.use(cors());
  app.use(compression());

  app.use(express.json());

  app.use(requestLogger);

  app.use('/api/v1', healthRoutes);
  app.use('/api/v1/transports', transportRoutes);

  app.use(errorHandler);

  return app;
}
