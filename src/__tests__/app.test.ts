import type { FastifyInstance } from 'fastify';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { CrossQL, parseCatalog } from 'crossql';
import { buildServer } from '../app.js';

const catalog = parseCatalog({
  broadTerms: ['all'],
  sources: [
    {
      name: 'library',
      description: 'Lending library',
      keywords: ['book', 'author'],
      templates: [
        {
          id: 'author-list',
          guard: { any: ['author'] },
          statement: 'SELECT author_name FROM authors ORDER BY author_name',
        },
      ],
      fallback: "SELECT 'Ask about books or authors' AS info",
      comparisonDefault: 'SELECT COUNT(*) AS count FROM authors',
      search: {
        name: 'SELECT author_name AS name FROM authors WHERE author_name LIKE :pattern',
        all: 'SELECT author_name AS name FROM authors WHERE author_name LIKE :pattern',
      },
    },
    {
      name: 'garden',
      description: 'Garden planner',
      keywords: ['plant', 'seed'],
      templates: [],
      fallback: "SELECT 'Ask about plants' AS info",
      comparisonDefault: 'SELECT COUNT(*) AS count FROM plants',
      search: { all: 'SELECT name FROM plants WHERE name LIKE :pattern' },
    },
  ],
});

function memoryDatabase() {
  return {
    client: 'better-sqlite3',
    connection: { filename: ':memory:' },
    useNullAsDefault: true,
  };
}

describe('HTTP server', () => {
  let engine: CrossQL;
  let fastify: FastifyInstance;

  beforeAll(async () => {
    engine = new CrossQL({
      catalog,
      connections: { library: memoryDatabase(), garden: memoryDatabase() },
    });
    await engine.sql(
      'library',
      'CREATE TABLE authors (author_id INTEGER PRIMARY KEY, author_name TEXT NOT NULL)'
    );
    await engine.sql('library', "INSERT INTO authors (author_name) VALUES ('Grace'), ('Ada')");
    await engine.sql('garden', 'CREATE TABLE plants (plant_id INTEGER PRIMARY KEY, name TEXT)');

    fastify = await buildServer({ engine, logger: false });
    await fastify.ready();
  });

  afterAll(async () => {
    await fastify.close();
  });

  it('reports health', async () => {
    const response = await fastify.inject({ method: 'GET', url: '/health' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'ok',
      databases: 2,
      connections: [
        { database: 'library', ok: true },
        { database: 'garden', ok: true },
      ],
      schema_cache: { cached_sources: 0, total_tables: 0 },
    });
  });

  it('answers questions over POST and GET', async () => {
    const post = await fastify.inject({
      method: 'POST',
      url: '/query',
      payload: { question: 'list authors' },
    });
    expect(post.statusCode).toBe(200);
    expect(post.json()).toMatchObject({
      success: true,
      detected_database: 'library',
      template: 'author-list',
      data: [{ author_name: 'Ada' }, { author_name: 'Grace' }],
      row_count: 2,
    });

    const get = await fastify.inject({ method: 'GET', url: '/query?q=list%20authors' });
    expect(get.json()).toEqual(post.json());
  });

  it('rejects a query without a question', async () => {
    const response = await fastify.inject({ method: 'POST', url: '/query', payload: {} });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ error: 'ValidationError' });
  });

  it('explains without executing', async () => {
    const response = await fastify.inject({
      method: 'POST',
      url: '/explain',
      payload: { question: 'when do seeds sprout' },
    });
    expect(response.json()).toMatchObject({
      sql: "SELECT 'Ask about plants' AS info",
      template: 'fallback',
      classification: { kind: 'resolved', source: 'garden' },
    });
  });

  it('lists tools', async () => {
    const response = await fastify.inject({ method: 'GET', url: '/tools' });
    expect(response.json()).toMatchObject({ total: 7 });
  });

  it('invokes tools by name', async () => {
    const schema = await fastify.inject({
      method: 'POST',
      url: '/tools/schema',
      payload: { database: 'library' },
    });
    expect(schema.json()).toEqual({
      database: 'library',
      description: 'Lending library',
      tables: ['authors'],
      table_count: 1,
    });

    const search = await fastify.inject({
      method: 'POST',
      url: '/tools/unified_search',
      payload: { search_term: 'ada' },
    });
    expect(search.json()).toMatchObject({
      total_matches: 1,
      results_by_database: { library: { matches: [{ name: 'Ada' }], count: 1 } },
      databases_searched: ['library', 'garden'],
      failures: [],
    });
  });

  it('maps unknown tools to 404 and bad arguments to 400', async () => {
    const unknown = await fastify.inject({ method: 'POST', url: '/tools/nope', payload: {} });
    expect(unknown.statusCode).toBe(404);
    expect(unknown.json()).toEqual({ success: false, error: 'Unknown tool: nope' });

    const invalid = await fastify.inject({
      method: 'POST',
      url: '/tools/sql',
      payload: { database: 'library' },
    });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json()).toMatchObject({ error_type: 'InvalidArguments', details: ['query: Required'] });
  });

  it('lists databases with their clients', async () => {
    const response = await fastify.inject({ method: 'GET', url: '/databases' });
    expect(response.json()).toEqual({
      databases: [
        { name: 'library', description: 'Lending library', client: 'better-sqlite3', host: null },
        { name: 'garden', description: 'Garden planner', client: 'better-sqlite3', host: null },
      ],
      total: 2,
    });
  });
});

describe('HTTP server with an unreachable source', () => {
  let fastify: FastifyInstance;

  beforeAll(async () => {
    const engine = new CrossQL({
      catalog,
      connections: {
        library: memoryDatabase(),
        garden: {
          client: 'better-sqlite3',
          connection: { filename: '/nonexistent-crossql-dir/garden.sqlite' },
          useNullAsDefault: true,
        },
      },
    });
    fastify = await buildServer({ engine, logger: false });
    await fastify.ready();
  });

  afterAll(async () => {
    await fastify.close();
  });

  it('reports a degraded health check', async () => {
    const response = await fastify.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    const body = response.json();
    expect(body.status).toBe('degraded');
    expect(body.connections[0]).toEqual({ database: 'library', ok: true });
    expect(body.connections[1]).toMatchObject({
      database: 'garden',
      ok: false,
      error_type: 'ConnectionFailure',
    });
  });
});
