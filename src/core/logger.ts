/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per line in production; piped through pino-pretty in
 * development for colours and readable timestamps. Every line carries
 * `service: 'fleet-dispatch'` so the dispatch logs can be filtered out of a
 * shared stream.
 *
 * Application classes receive a `Logger` through TOKENS.Logger; tests pass
 * a silent one.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  level: config.log.level,
  base: { service: 'fleet-dispatch' },
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
