/**
 * Server lifecycle: build the engine, listen, shut down on signals.
 */

import { buildServer } from './app.js';
import { config } from './config.js';
import { createEngine } from './engine.js';
import { logger, loggerConfig } from './utils/logger.js';

/**
 * Start the server.
 */
export async function startServer(port: number = config.PORT): Promise<void> {
  logger.info('Starting crossql API server...');

  const engine = createEngine(config, logger);

  // Refuse to start unless every source answers
  const report = await engine.checkConnections();
  for (const check of report.databases) {
    if (!check.ok) {
      logger.error({ database: check.database }, `Cannot connect to database: ${check.error}`);
    }
  }
  if (!report.healthy) {
    logger.error('Some database connections failed. Please check configuration.');
    await engine.close();
    process.exit(1);
  }
  logger.info('All databases connected successfully');

  const fastify = await buildServer({ engine, logger: loggerConfig });

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down crossql API server...`);
    await fastify.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  try {
    await fastify.listen({ port, host: config.HOST });
    logger.info(`Server running at http://localhost:${port}`);
    logger.info(`API docs at http://localhost:${port}/docs`);
  } catch (err) {
    fastify.log.error(err);
    await engine.close();
    process.exit(1);
  }
}
