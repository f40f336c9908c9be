/**
 * Query endpoints for natural language questions.
 */

import type { FastifyInstance } from 'fastify';

interface QueryRequest {
  question: string;
}

export async function queryRoutes(fastify: FastifyInstance) {
  // POST /query - Main query endpoint
  fastify.post<{ Body: QueryRequest }>(
    '/query',
    {
      schema: {
        description: 'Answer a natural language question from the database it is about',
        tags: ['query'],
        body: {
          type: 'object',
          properties: {
            question: { type: 'string', minLength: 1, maxLength: 500 },
          },
          required: ['question'],
        },
      },
    },
    async (request) => fastify.crossql.query(request.body.question)
  );

  // GET /query - Convenience endpoint
  fastify.get<{ Querystring: { q: string } }>(
    '/query',
    {
      schema: {
        description: 'Answer a natural language question (GET)',
        tags: ['query'],
        querystring: {
          type: 'object',
          properties: {
            q: { type: 'string', minLength: 1, maxLength: 500 },
          },
          required: ['q'],
        },
      },
    },
    async (request) => fastify.crossql.query(request.query.q)
  );

  // POST /explain - Classify and select a statement without executing it
  fastify.post<{ Body: QueryRequest }>(
    '/explain',
    {
      schema: {
        description: 'Show the detected database and the statement that would run',
        tags: ['query'],
        body: {
          type: 'object',
          properties: {
            question: { type: 'string', minLength: 1, maxLength: 500 },
          },
          required: ['question'],
        },
      },
    },
    async (request) => fastify.crossql.explain(request.body.question)
  );
}
