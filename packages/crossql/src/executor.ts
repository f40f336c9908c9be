/**
 * Statement execution and introspection against the configured sources.
 * Every failure is returned as data; nothing here throws past the executor boundary.
 */

import { knex, type Knex } from 'knex';
import { SchemaInspector } from 'knex-schema-inspector';
import type { Logger } from 'pino';
import type { ColumnInfo, ErrorType } from './types.js';
import {
  isRecord,
  toJsonObject,
  type Bindings,
  type JsonObject,
} from './utils.js';

export type FailureKind = 'connection' | 'execution';

export interface RowsResult {
  readonly status: 'rows';
  rows: JsonObject[];
  count: number;
}

export interface WriteResult {
  readonly status: 'write';
  rowsAffected: number;
}

export interface FailureResult {
  readonly status: 'failure';
  failure: FailureKind;
  message: string;
}

/**
 * Outcome of one statement against one source.
 */
export type ExecutionResult = RowsResult | WriteResult | FailureResult;

/**
 * Outcome of a schema lookup. Failure is explicit so callers can tell
 * "no tables" apart from "could not list tables".
 */
export type Introspection<T> = { readonly status: 'ok'; value: T } | FailureResult;

export interface ConnectionInfo {
  client: string;
  host: string | null;
}

/**
 * Everything the routing and dispatch layers need from the data sources.
 */
export interface SourceExecutor {
  run(source: string, statement: string, bindings?: Bindings): Promise<ExecutionResult>;
  listTables(source: string): Promise<Introspection<string[]>>;
  describeTable(source: string, table: string): Promise<Introspection<ColumnInfo[]>>;
  describeConnection(source: string): ConnectionInfo | undefined;
  close(): Promise<void>;
}

const READ_STATEMENT = /^\s*(SELECT|WITH|SHOW|DESCRIBE|DESC|EXPLAIN|PRAGMA)\b/i;

/**
 * Statements that return rows rather than an affected-row count.
 */
export function isReadStatement(statement: string): boolean {
  return READ_STATEMENT.test(statement);
}

/**
 * Map an executor failure onto the reported error taxonomy.
 */
export function errorTypeFor(failure: FailureKind): ErrorType {
  return failure === 'connection' ? 'ConnectionFailure' : 'ExecutionFailure';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize the dialect-specific result of a raw SELECT.
 * Order matters: check more specific structures first.
 */
export function extractRows(result: unknown): Record<string, unknown>[] {
  // PostgreSQL: returns { rows: [...] }
  if (isRecord(result) && Array.isArray(result.rows)) {
    return result.rows.filter(isRecord);
  }

  // SQL Server: returns { recordset: [...] }
  if (isRecord(result) && Array.isArray(result.recordset)) {
    return result.recordset.filter(isRecord);
  }

  if (Array.isArray(result)) {
    // MySQL: returns [[rows], [fields]]
    if (result.length === 2 && Array.isArray(result[0])) {
      return result[0].filter(isRecord);
    }
    // SQLite: returns array of rows directly
    return result.filter(isRecord);
  }

  return [];
}

/**
 * Normalize the dialect-specific result of a raw write.
 */
export function extractAffectedRows(result: unknown): number {
  if (isRecord(result)) {
    if (typeof result.rowCount === 'number') return result.rowCount; // PostgreSQL
    if (typeof result.changes === 'number') return result.changes; // SQLite
    if (Array.isArray(result.rowsAffected) && typeof result.rowsAffected[0] === 'number') {
      return result.rowsAffected[0]; // SQL Server
    }
  }

  if (Array.isArray(result) && isRecord(result[0])) {
    const header = result[0];
    if (typeof header.affectedRows === 'number') return header.affectedRows; // MySQL
  }

  return 0;
}

function connectionHost(connection: Knex.Config['connection']): string | null {
  if (typeof connection === 'string') {
    try {
      return new URL(connection).hostname || null;
    } catch {
      return null;
    }
  }
  if (isRecord(connection)) {
    if (typeof connection.host === 'string') return connection.host;
    if (typeof connection.server === 'string') return connection.server;
  }
  return null;
}

interface Connection {
  db: Knex;
  inspector: ReturnType<typeof SchemaInspector>;
}

export interface KnexExecutorOptions {
  logger: Logger;

  /**
   * Reject statements that are not reads before they reach the database.
   * @default false
   */
  readOnly?: boolean;
}

/**
 * Executor backed by one lazily-opened Knex instance per source.
 * A connection that fails its health check is discarded and retried on next use.
 */
export class KnexSourceExecutor implements SourceExecutor {
  private connections = new Map<string, Promise<Connection>>();
  private logger: Logger;
  private readOnly: boolean;

  constructor(
    private configs: Record<string, Knex.Config>,
    options: KnexExecutorOptions
  ) {
    this.logger = options.logger;
    this.readOnly = options.readOnly ?? false;
  }

  async run(
    source: string,
    statement: string,
    bindings?: Bindings
  ): Promise<ExecutionResult> {
    const read = isReadStatement(statement);
    if (this.readOnly && !read) {
      return {
        status: 'failure',
        failure: 'execution',
        message: 'Read-only mode: only SELECT, WITH, SHOW, DESCRIBE, DESC, EXPLAIN and PRAGMA statements are allowed',
      };
    }

    const connection = await this.connectOrFail(source);
    if ('status' in connection) {
      return connection;
    }

    try {
      const result: unknown =
        bindings === undefined
          ? await connection.db.raw(statement)
          : await connection.db.raw(statement, bindings);

      if (read) {
        const rows = extractRows(result).map(toJsonObject);
        return { status: 'rows', rows, count: rows.length };
      }
      return { status: 'write', rowsAffected: extractAffectedRows(result) };
    } catch (error) {
      this.logger.error({ err: error, source }, 'Query execution failed');
      return { status: 'failure', failure: 'execution', message: errorMessage(error) };
    }
  }

  async listTables(source: string): Promise<Introspection<string[]>> {
    const connection = await this.connectOrFail(source);
    if ('status' in connection) {
      return connection;
    }

    try {
      const tables = await connection.inspector.tables();
      return { status: 'ok', value: tables.map((table) => table.toLowerCase()) };
    } catch (error) {
      this.logger.error({ err: error, source }, 'Could not list tables');
      return { status: 'failure', failure: 'execution', message: errorMessage(error) };
    }
  }

  async describeTable(
    source: string,
    table: string
  ): Promise<Introspection<ColumnInfo[]>> {
    const connection = await this.connectOrFail(source);
    if ('status' in connection) {
      return connection;
    }

    try {
      const columns = await connection.inspector.columnInfo(table);
      return {
        status: 'ok',
        value: columns.map((column) => ({
          name: column.name,
          type: column.data_type,
        })),
      };
    } catch (error) {
      this.logger.error({ err: error, source, table }, 'Could not describe table');
      return { status: 'failure', failure: 'execution', message: errorMessage(error) };
    }
  }

  describeConnection(source: string): ConnectionInfo | undefined {
    const config = this.configs[source];
    if (!config) {
      return undefined;
    }
    return {
      client: typeof config.client === 'string' ? config.client : 'custom',
      host: connectionHost(config.connection),
    };
  }

  /**
   * Destroy every open connection. Connections still opening are awaited;
   * one that fails to open has already released its pool.
   */
  async close(): Promise<void> {
    const pending = Array.from(this.connections.values());
    this.connections.clear();

    const opened = await Promise.allSettled(pending);
    const destroyed = await Promise.allSettled(
      opened.map(async (outcome) => {
        if (outcome.status === 'fulfilled') {
          await outcome.value.db.destroy();
        }
      })
    );

    for (const outcome of destroyed) {
      if (outcome.status === 'rejected') {
        this.logger.warn({ err: outcome.reason }, 'Could not close database connection');
      }
    }
    this.logger.info('Database connections closed');
  }

  private async connectOrFail(source: string): Promise<Connection | FailureResult> {
    try {
      return await this.connect(source);
    } catch (error) {
      this.logger.error({ err: error, source }, 'Database connection failed');
      return {
        status: 'failure',
        failure: 'connection',
        message: `Database connection failed for ${source}: ${errorMessage(error)}`,
      };
    }
  }

  private async connect(source: string): Promise<Connection> {
    const existing = this.connections.get(source);
    if (existing) {
      return existing;
    }

    const config = this.configs[source];
    if (!config) {
      throw new Error(`No connection configured for ${source}`);
    }

    const pending = this.open(source, config);
    this.connections.set(source, pending);
    try {
      return await pending;
    } catch (error) {
      this.connections.delete(source);
      throw error;
    }
  }

  private async open(source: string, config: Knex.Config): Promise<Connection> {
    this.logger.info({ source }, 'Connecting to database');
    const db = knex(config);

    // Test connection
    try {
      await db.raw('SELECT 1');
    } catch (error) {
      await db.destroy();
      throw error;
    }

    this.logger.info({ source }, 'Database connected');
    return { db, inspector: SchemaInspector(db) };
  }
}
