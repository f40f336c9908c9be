/**
 * Fastify plugin exposing a routing engine on the instance.
 */

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import type { CrossQL } from 'crossql';

export interface CrossQLPluginOptions {
  engine: CrossQL;

  /**
   * Close the engine's connections when the server closes.
   * @default true
   */
  closeOnShutdown?: boolean;
}

const crossqlPlugin: FastifyPluginAsync<CrossQLPluginOptions> = async (
  fastify,
  options
) => {
  const { engine, closeOnShutdown = true } = options;

  // Decorate Fastify instance with the engine
  fastify.decorate('crossql', engine);

  if (closeOnShutdown) {
    fastify.addHook('onClose', async () => {
      fastify.log.info('Closing database connections...');
      await engine.close();
    });
  }
};

export default fp(crossqlPlugin, {
  fastify: '4.x',
  name: 'crossql',
});

// Type augmentation for TypeScript
declare module 'fastify' {
  interface FastifyInstance {
    crossql: CrossQL;
  }
}
