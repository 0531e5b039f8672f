import { buildApp } from './server';
import { closeRedis } from './redis/client';
import { config } from './config';
import { logger } from './logger';

/**
 * Entrypoint for the bin store service.
 * Builds the Fastify app, listens on the configured host/port and closes Redis on shutdown.
 */
async function main() {
  const app = await buildApp({ logger: { level: config.logLevel } });

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, 'Shutting down');
    await app.close();
    await closeRedis();
    process.exit(0);
  };
  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  logger.fatal({ err }, 'Fatal error starting bin store');
  process.exit(1);
});
