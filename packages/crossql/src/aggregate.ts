/**
 * Aggregate statistics across every configured source.
 */

import type { Logger } from 'pino';
import type { Catalog, SourceEntry } from './catalog.js';
import type { ExecutionResult, SourceExecutor } from './executor.js';
import type { SchemaCache } from './schema-cache.js';
import type {
  AggregateMetric,
  AggregateStatsResult,
  ItemFailure,
  JsonObject,
  JsonValue,
} from './types.js';
import { toCount } from './utils.js';

/**
 * Tables per source counted by the total_records metric.
 */
export const TOTAL_RECORDS_TABLE_LIMIT = 20;

const COUNT_TABLE_STATEMENT = 'SELECT COUNT(*) AS count FROM ??';

type Collected = { ok: true; row: JsonObject } | { ok: false; message: string };

/**
 * Runs fixed per-source count/sum statements. Every item is collected as a
 * success or failure; a failing item is left out of the tally and reported.
 */
export class AggregateCompiler {
  constructor(
    private catalog: Catalog,
    private executor: SourceExecutor,
    private schemaCache: SchemaCache,
    private logger: Logger
  ) {}

  async aggregate(metric: AggregateMetric): Promise<AggregateStatsResult> {
    this.logger.info(`Calculating aggregate metric: ${metric}`);

    const stats: AggregateStatsResult = {
      metric,
      by_database: {},
      totals: {},
      failures: [],
    };

    for (const source of this.catalog.sources) {
      switch (metric) {
        case 'total_records':
          await this.totalRecords(source, stats);
          break;
        case 'customers':
          await this.customers(source, stats);
          break;
        case 'payments':
          await this.payments(source, stats);
          break;
        case 'entity_counts':
          await this.entityCounts(source, stats);
          break;
      }
    }

    return stats;
  }

  private async totalRecords(source: SourceEntry, stats: AggregateStatsResult): Promise<void> {
    const tables = await this.schemaCache.getTables(source.name);
    const counts: Record<string, number> = {};

    for (const table of tables.slice(0, TOTAL_RECORDS_TABLE_LIMIT)) {
      const count = await this.count(source.name, table, COUNT_TABLE_STATEMENT, [table], stats.failures);
      if (count !== undefined) {
        counts[table] = count;
      }
    }

    stats.by_database[source.name] = counts;
    stats.totals[source.name] = sum(Object.values(counts));
  }

  private async customers(source: SourceEntry, stats: AggregateStatsResult): Promise<void> {
    const statement = source.aggregates.customers;
    if (!statement) {
      return;
    }

    const count = await this.count(source.name, 'customers', statement, undefined, stats.failures);
    if (count !== undefined) {
      stats.by_database[source.name] = count;
      stats.totals.customers = (stats.totals.customers ?? 0) + count;
    }
  }

  private async payments(source: SourceEntry, stats: AggregateStatsResult): Promise<void> {
    const statement = source.aggregates.payments;
    if (!statement) {
      return;
    }

    const collected = this.firstRow(await this.executor.run(source.name, statement));
    if (!collected.ok) {
      this.recordFailure(stats.failures, source.name, 'payments', collected.message);
      return;
    }

    stats.by_database[source.name] = collected.row;
    for (const key of ['count', 'total']) {
      const value = toCount(collected.row[key]);
      if (value !== undefined) {
        stats.totals[key] = (stats.totals[key] ?? 0) + value;
      }
    }
  }

  private async entityCounts(source: SourceEntry, stats: AggregateStatsResult): Promise<void> {
    const counts: Record<string, number> = {};

    for (const [entity, statement] of Object.entries(source.aggregates.entities)) {
      const count = await this.count(source.name, entity, statement, undefined, stats.failures);
      if (count !== undefined) {
        counts[entity] = count;
      }
    }

    stats.by_database[source.name] = counts;
    stats.totals[source.name] = sum(Object.values(counts));
  }

  /**
   * Run a single-row count statement and read its `count` column.
   */
  private async count(
    database: string,
    item: string,
    statement: string,
    bindings: string[] | undefined,
    failures: ItemFailure[]
  ): Promise<number | undefined> {
    const collected = this.firstRow(await this.executor.run(database, statement, bindings));
    if (!collected.ok) {
      this.recordFailure(failures, database, item, collected.message);
      return undefined;
    }

    const value: JsonValue | undefined = collected.row.count;
    const count = toCount(value);
    if (count === undefined) {
      this.recordFailure(failures, database, item, 'Count column missing from result');
    }
    return count;
  }

  private firstRow(result: ExecutionResult): Collected {
    if (result.status === 'failure') {
      return { ok: false, message: result.message };
    }
    if (result.status === 'write' || result.rows.length === 0) {
      return { ok: false, message: 'Statement returned no rows' };
    }
    return { ok: true, row: result.rows[0] };
  }

  private recordFailure(
    failures: ItemFailure[],
    database: string,
    item: string,
    message: string
  ): void {
    this.logger.debug({ database, item }, `Skipping aggregate item: ${message}`);
    failures.push({ database, item, message });
  }
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
