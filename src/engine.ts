/**
 * Builds the routing engine from the environment configuration.
 */

import type { Logger } from 'pino';
import { CrossQL, loadCatalog, sourceNames } from 'crossql';
import { connectionsFor, type Config } from './config.js';

export function createEngine(config: Config, logger: Logger): CrossQL {
  const catalog = config.CATALOG_PATH ? loadCatalog(config.CATALOG_PATH) : loadCatalog();

  logger.info(
    { sources: sourceNames(catalog), client: config.DATABASE_TYPE, readOnly: config.READ_ONLY },
    'Loaded source catalog'
  );

  return new CrossQL({
    catalog,
    logger,
    connections: connectionsFor(config, sourceNames(catalog)),
    readOnly: config.READ_ONLY,
  });
}
