/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * pino-http on the shared logger: one line per request with method, URL,
 * status code and response time, in the same format as the update logs.
 * Health checks are frequent and uninteresting, so they are not logged.
 */
import { logger } from '@core/logger';
import pinoHttp from 'pino-http';

export const requestLogger = pinoHttp({
  logger,
  autoLogging: {
    ignore: (req) => req.url === '/api/v1/health',
  },
});
