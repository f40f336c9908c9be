/**
 * Tool endpoints: list the registry and invoke a tool by name.
 */

import type { FastifyInstance } from 'fastify';
import { invokeTool, isToolName, listTools } from 'crossql';

export async function toolRoutes(fastify: FastifyInstance) {
  // GET /tools - Tool descriptions with JSON input schemas
  fastify.get('/tools', async () => {
    const tools = listTools(fastify.crossql);
    return { tools, total: tools.length };
  });

  // POST /tools/:name - Invoke a tool; the body is its arguments
  fastify.post<{ Params: { name: string }; Body: unknown }>(
    '/tools/:name',
    {
      schema: {
        description: 'Invoke a tool by name',
        tags: ['tools'],
        params: {
          type: 'object',
          properties: {
            name: { type: 'string' },
          },
          required: ['name'],
        },
      },
    },
    async (request, reply) => {
      const { name } = request.params;
      const result = await invokeTool(fastify.crossql, name, request.body ?? {});

      if (!isToolName(name)) {
        reply.code(404);
      } else if ('error_type' in result && result.error_type === 'InvalidArguments') {
        reply.code(400);
      }
      return result;
    }
  );
}
