/**
 * Process-lifetime cache of table names per source.
 */

import type { Logger } from 'pino';
import type { SourceExecutor } from './executor.js';
import type { ColumnInfo, SchemaSnapshot } from './types.js';

export interface SchemaCacheStats {
  cached_sources: number;
  total_tables: number;
}

/**
 * Get-or-populate cache of lowercased table names.
 *
 * Concurrent callers for the same source share one in-flight lookup, so a
 * burst of requests issues a single listing. Failed lookups are not cached
 * and are retried on the next call. There is no invalidation: a schema change
 * during the process lifetime is never observed.
 */
export class SchemaCache {
  private tables = new Map<string, string[]>();
  private pending = new Map<string, Promise<string[]>>();

  constructor(
    private executor: SourceExecutor,
    private logger: Logger
  ) {}

  /**
   * Lowercased table names for a source, or an empty list when the lookup fails.
   */
  async getTables(source: string): Promise<string[]> {
    const cached = this.tables.get(source);
    if (cached) {
      return [...cached];
    }

    let inflight = this.pending.get(source);
    if (!inflight) {
      inflight = this.fetchTables(source).finally(() => {
        this.pending.delete(source);
      });
      this.pending.set(source, inflight);
    }

    return [...(await inflight)];
  }

  /**
   * Column descriptions for one table. Not cached.
   */
  async getColumns(source: string, table: string): Promise<ColumnInfo[]> {
    const result = await this.executor.describeTable(source, table);
    if (result.status === 'failure') {
      this.logger.warn(
        { source, table, failure: result.failure },
        `Could not describe ${source}.${table}: ${result.message}`
      );
      return [];
    }
    return result.value;
  }

  /**
   * The cached snapshot for a source, if one has been taken.
   */
  snapshot(source: string): SchemaSnapshot | undefined {
    const cached = this.tables.get(source);
    return cached ? { source, tables: [...cached] } : undefined;
  }

  getStats(): SchemaCacheStats {
    let totalTables = 0;
    for (const tables of this.tables.values()) {
      totalTables += tables.length;
    }
    return {
      cached_sources: this.tables.size,
      total_tables: totalTables,
    };
  }

  private async fetchTables(source: string): Promise<string[]> {
    const result = await this.executor.listTables(source);
    if (result.status === 'failure') {
      this.logger.warn(
        { source, failure: result.failure },
        `Error fetching tables from ${source}: ${result.message}`
      );
      return [];
    }

    const tables = result.value.map((table) => table.toLowerCase());
    this.tables.set(source, tables);
    this.logger.debug({ source, count: tables.length }, 'Cached table list');
    return tables;
  }
}
