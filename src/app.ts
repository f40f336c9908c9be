/**
 * Fastify server assembly: plugins, routes and error mapping.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { CatalogError, UnknownSourceError, type CrossQL } from 'crossql';
import crossqlPlugin from './plugins/crossql.js';
import { queryRoutes } from './routes/query.js';
import { toolRoutes } from './routes/tools.js';
import { utilityRoutes } from './routes/utility.js';

export interface ServerOptions {
  engine: CrossQL;
  logger?: FastifyServerOptions['logger'];

  /**
   * Close the engine when the server closes.
   * @default true
   */
  closeOnShutdown?: boolean;
}

/**
 * Create and configure the Fastify server.
 */
export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? false,
  });

  /**
   * Register CORS plugin.
   */
  await fastify.register(cors, {
    origin: '*',
  });

  /**
   * Register Swagger documentation.
   */
  await fastify.register(swagger, {
    openapi: {
      info: {
        title: 'crossql API',
        description: 'Route natural language questions across several SQL databases',
        version: '0.1.0',
      },
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
  });

  await fastify.register(crossqlPlugin, {
    engine: options.engine,
    closeOnShutdown: options.closeOnShutdown,
  });

  /**
   * Register route handlers.
   */
  await fastify.register(queryRoutes);
  await fastify.register(toolRoutes);
  await fastify.register(utilityRoutes);

  /**
   * Global error handler. Operation failures are returned as data by the
   * routes; only thrown errors reach this point.
   */
  fastify.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      reply.status(400).send({
        error: 'ValidationError',
        message: error.message,
      });
    } else if (error instanceof UnknownSourceError) {
      reply.status(404).send({
        error: 'UnknownSourceError',
        message: `Unknown database: ${error.source}`,
        available_databases: error.available,
      });
    } else if (error instanceof CatalogError) {
      request.log.error({ err: error }, 'Catalog error');
      reply.status(500).send({
        error: 'CatalogError',
        message: error.message,
        suggestions: error.suggestions,
      });
    } else {
      request.log.error({ err: error }, 'Unhandled error');
      reply.status(error.statusCode ?? 500).send({
        error: 'InternalServerError',
        message: error.message || 'An unexpected error occurred',
      });
    }
  });

  return fastify;
}
