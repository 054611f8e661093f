/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * pino-http on top of the shared logger: one line per response with method,
 * URL, status and response time. Health checks are skipped to keep monitoring
 * traffic out of the stream.
 */
import { logger } from '@core/logger';
import pinoHttp from 'pino-http';

export const requestLogger = pinoHttp({
  logger,
  autoLogging: {
    ignore: (req) => req.url === '/api/v1/health',
  },
});
