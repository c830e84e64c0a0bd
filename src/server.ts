/**
 * Server startup shared by the entry point and `sqlchat serve`.
 */

import { buildApp } from './app.js';
import type { Config } from './config.js';
import { createServices } from './services/index.js';
import { configureLogger, logger } from './utils/logger.js';

/**
 * Build the services and start listening. Closes cleanly on SIGINT/SIGTERM.
 */
export async function startServer(config: Config): Promise<void> {
  const requestLogger = configureLogger(config);
  logger.info('Starting sqlchat API server...');
  const services = createServices(config);
  const fastify = await buildApp(services, { logger: requestLogger });

  const shutdown = (): void => {
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(err);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await fastify.listen({ port: config.PORT, host: config.HOST });
  logger.info(`Server running at http://localhost:${config.PORT}`);
  logger.info(`API docs at http://localhost:${config.PORT}/docs`);
  logger.info(`Database: ${services.store.path}`);
}
