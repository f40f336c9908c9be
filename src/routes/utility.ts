/**
 * Utility endpoints (databases, health, root).
 */

import type { FastifyInstance } from 'fastify';

export async function utilityRoutes(fastify: FastifyInstance) {
  // GET /databases - Configured sources
  fastify.get('/databases', async () => fastify.crossql.databases());

  // GET /health - Health check
  fastify.get('/health', async (_request, reply) => {
    const report = await fastify.crossql.checkConnections();
    if (!report.healthy) {
      reply.code(503);
    }
    return {
      status: report.healthy ? 'ok' : 'degraded',
      databases: fastify.crossql.catalog.sources.length,
      connections: report.databases,
      schema_cache: fastify.crossql.getCacheStats(),
    };
  });

  // GET / - Root endpoint
  fastify.get('/', async () => {
    return {
      name: 'crossql API',
      version: '0.1.0',
      description: 'Route natural language questions across several SQL databases',
      docs: '/docs',
      tools: '/tools',
    };
  });
}
