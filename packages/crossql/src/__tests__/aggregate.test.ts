import { describe, expect, it } from 'vitest';
import { AggregateCompiler, TOTAL_RECORDS_TABLE_LIMIT } from '../aggregate.js';
import { SchemaCache } from '../schema-cache.js';
import type { Bindings } from '../utils.js';
import { silentLogger, STATEMENTS, testCatalog } from './helpers/catalog.js';
import {
  executionFailure,
  FakeExecutor,
  rows,
  type FakeSource,
} from './helpers/fake-executor.js';

function compilerFor(sources: Record<string, FakeSource>) {
  const executor = new FakeExecutor(sources);
  const compiler = new AggregateCompiler(
    testCatalog(),
    executor,
    new SchemaCache(executor, silentLogger),
    silentLogger
  );
  return { executor, compiler };
}

function tableName(bindings?: Bindings): string | undefined {
  return Array.isArray(bindings) && typeof bindings[0] === 'string' ? bindings[0] : undefined;
}

describe('AggregateCompiler', () => {
  it('counts records per table and totals them per source', async () => {
    const { compiler } = compilerFor({
      school: {
        tables: { students: [], teachers: [] },
        respond: (_statement, bindings) => {
          const table = tableName(bindings);
          if (table === 'students') return rows({ count: 30 });
          if (table === 'teachers') return rows({ count: '4' });
          return undefined;
        },
      },
      music: {
        tables: { albums: [] },
        respond: () => executionFailure('no such table: albums'),
      },
      movies: {},
    });

    const result = await compiler.aggregate('total_records');

    expect(result).toEqual({
      metric: 'total_records',
      by_database: {
        school: { students: 30, teachers: 4 },
        music: {},
        movies: {},
      },
      totals: { school: 34, music: 0, movies: 0 },
      failures: [{ database: 'music', item: 'albums', message: 'no such table: albums' }],
    });
  });

  it('counts at most twenty tables per source', async () => {
    const tables: Record<string, []> = {};
    for (let i = 0; i < 25; i++) {
      tables[`table_${i}`] = [];
    }
    const { compiler, executor } = compilerFor({
      school: { tables, respond: () => rows({ count: 1 }) },
      music: {},
      movies: {},
    });

    const result = await compiler.aggregate('total_records');

    expect(executor.statementsFor('school')).toHaveLength(TOTAL_RECORDS_TABLE_LIMIT);
    expect(result.totals.school).toBe(20);
    expect(executor.calls[0]).toEqual({
      source: 'school',
      statement: 'SELECT COUNT(*) AS count FROM ??',
      bindings: ['table_0'],
    });
  });

  it('sums customer counts across sources that define them', async () => {
    const { compiler, executor } = compilerFor({
      school: { results: { [STATEMENTS.schoolCustomers]: rows({ count: 30 }) } },
      music: { results: { [STATEMENTS.musicCustomers]: rows({ count: 12 }) } },
      movies: {},
    });

    const result = await compiler.aggregate('customers');

    expect(result.by_database).toEqual({ school: 30, music: 12 });
    expect(result.totals).toEqual({ customers: 42 });
    expect(executor.statementsFor('movies')).toEqual([]);
  });

  it('keeps the payment row per source and sums count and total', async () => {
    const { compiler } = compilerFor({
      school: { results: { [STATEMENTS.schoolPayments]: rows({ count: 3, total: 150.5 }) } },
      music: { results: { [STATEMENTS.musicPayments]: executionFailure('boom') } },
      movies: {},
    });

    const result = await compiler.aggregate('payments');

    expect(result.by_database).toEqual({ school: { count: 3, total: 150.5 } });
    expect(result.totals).toEqual({ count: 3, total: 150.5 });
    expect(result.failures).toEqual([{ database: 'music', item: 'payments', message: 'boom' }]);
  });

  it('counts named entities per source', async () => {
    const { compiler } = compilerFor({
      school: {
        results: {
          [STATEMENTS.schoolCustomers]: rows({ count: 30 }),
          [STATEMENTS.schoolTeachers]: rows({ count: 4 }),
        },
      },
      music: { results: { [STATEMENTS.musicAlbums]: rows({ count: 9 }) } },
      movies: {},
    });

    const result = await compiler.aggregate('entity_counts');

    expect(result.by_database).toEqual({
      school: { students: 30, teachers: 4 },
      music: { albums: 9 },
      movies: {},
    });
    expect(result.totals).toEqual({ school: 34, music: 9, movies: 0 });
    expect(result.failures).toEqual([]);
  });

  it('records a count statement without a count column as a failure', async () => {
    const { compiler } = compilerFor({
      school: { results: { [STATEMENTS.schoolCustomers]: rows({ total: 5 }) } },
      music: { results: { [STATEMENTS.musicCustomers]: rows() } },
      movies: {},
    });

    const result = await compiler.aggregate('customers');

    expect(result.by_database).toEqual({});
    expect(result.totals).toEqual({});
    expect(result.failures).toEqual([
      { database: 'school', item: 'customers', message: 'Count column missing from result' },
      { database: 'music', item: 'customers', message: 'Statement returned no rows' },
    ]);
  });
});
