/**
 * Server Entry Point
 * Layer: Entry Point
 *
 * Single process: the dispatch core is synchronous and holds no external
 * resources, so one worker per container is the deployment unit. Startup
 * logs the registered variants; SIGTERM/SIGINT stop accepting connections,
 * let in-flight trips finish, then exit.
 */
import type { TransportFactory } from '@application/factories/TransportFactory';
import { config } from '@core/config';
import { container } from '@core/container';
import { logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { createApp } from '@interfaces/http/app';

const variants = container
  .resolve<TransportFactory>(TOKENS.TransportFactory)
  .list()
  .map((variant) => variant.key);

const server = createApp().listen(config.port, () => {
  logger.info({ port: config.port, variants }, `Fleet dispatch listening on :${config.port}`);
});

let shuttingDown = false;

function shutdown(signal: NodeJS.Signals): void {
  if (shuttingDown) return;
  shuttingDown = true;

  logger.info({ signal }, 'Graceful shutdown initiated');
  server.close((err) => {
    if (err) {
      logger.error({ err }, 'Error while closing HTTP server');
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
