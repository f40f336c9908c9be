/**
 * Main crossql class - programmatic API for routing questions across several databases.
 */

import type { Logger } from 'pino';
import { AggregateCompiler } from './aggregate.js';
import { getSource, hasSource, loadCatalog, sourceNames, type Catalog } from './catalog.js';
import { RoutingClassifier } from './classifier.js';
import { TemplateDispatcher } from './dispatcher.js';
import {
  errorTypeFor,
  KnexSourceExecutor,
  type SourceExecutor,
} from './executor.js';
import { createSilentLogger } from './logger.js';
import { CrossSourceOrchestrator } from './orchestrator.js';
import { SchemaCache, type SchemaCacheStats } from './schema-cache.js';
import { SearchCompiler } from './search.js';
import type {
  AggregateMetric,
  AggregateStatsResult,
  ClassificationResult,
  ConnectionCheck,
  ConnectionReport,
  CrossDatabaseResult,
  CrossQLConfig,
  DatabasesResult,
  ExplainResult,
  OperationFailure,
  QueryClassificationFailure,
  QueryResult,
  SchemaResult,
  SearchKind,
  SqlResult,
  UnifiedSearchResult,
} from './types.js';
import { toCount } from './utils.js';

const EXECUTION_SUGGESTION =
  "Try rephrasing your question or use the 'sql' tool for direct queries";
const CLASSIFICATION_ACTION =
  'Please rephrase your question or specify the database';

/**
 * crossql - route natural language questions to the right database
 *
 * @example
 * ```typescript
 * const engine = new CrossQL({
 *   connections: {
 *     chinook: { client: 'mysql2', connection: process.env.CHINOOK_DATABASE_URL },
 *     sakila: { client: 'mysql2', connection: process.env.SAKILA_DATABASE_URL },
 *   },
 * });
 *
 * const result = await engine.query('show me albums by artist');
 * ```
 */
export class CrossQL {
  readonly catalog: Catalog;
  readonly logger: Logger;
  private executor: SourceExecutor;
  private schemaCache: SchemaCache;
  private classifier: RoutingClassifier;
  private dispatcher: TemplateDispatcher;
  private orchestrator: CrossSourceOrchestrator;
  private searchCompiler: SearchCompiler;
  private aggregateCompiler: AggregateCompiler;

  constructor(config: CrossQLConfig) {
    this.catalog = config.catalog ?? loadCatalog();
    this.logger = config.logger ?? createSilentLogger();

    this.executor =
      'executor' in config
        ? config.executor
        : new KnexSourceExecutor(config.connections, {
            logger: this.logger,
            readOnly: config.readOnly,
          });

    this.schemaCache = new SchemaCache(this.executor, this.logger);
    this.classifier = new RoutingClassifier(this.catalog, this.schemaCache, this.logger);
    this.dispatcher = new TemplateDispatcher(this.catalog);
    this.orchestrator = new CrossSourceOrchestrator(
      this.catalog,
      this.dispatcher,
      this.executor,
      this.logger
    );
    this.searchCompiler = new SearchCompiler(this.catalog, this.executor, this.logger);
    this.aggregateCompiler = new AggregateCompiler(
      this.catalog,
      this.executor,
      this.schemaCache,
      this.logger
    );
  }

  /**
   * Decide which source a question is about.
   */
  async classify(question: string): Promise<ClassificationResult> {
    return this.classifier.classify(question);
  }

  /**
   * Classification plus the statement that would run, without executing it.
   */
  async explain(question: string): Promise<ExplainResult> {
    const classification = await this.classifier.classify(question);
    if (classification.kind !== 'resolved') {
      return { question, classification, sql: null, template: null };
    }

    const { templateId, statement } = this.dispatcher.select(classification.source, question);
    return { question, classification, sql: statement, template: templateId };
  }

  /**
   * Answer a question from the single source it is about.
   *
   * @example
   * ```typescript
   * const result = await engine.query('how many students in each class');
   * if (result.success) console.log(result.detected_database, result.data);
   * ```
   */
  async query(question: string): Promise<QueryResult> {
    this.logger.info(`Processing query: ${question}`);
    const classification = await this.classifier.classify(question);

    if (classification.kind !== 'resolved') {
      return this.classificationFailure(question, classification);
    }

    const { source, confidence, reasoning } = classification;
    const { templateId, statement } = this.dispatcher.select(source, question);
    const result = await this.executor.run(source, statement);

    if (result.status === 'failure') {
      return {
        success: false,
        question,
        detected_database: source,
        confidence,
        sql: statement,
        error: result.message,
        error_type: errorTypeFor(result.failure),
        suggestion: EXECUTION_SUGGESTION,
      };
    }

    const data = result.status === 'rows' ? result.rows : [];
    return {
      success: true,
      question,
      detected_database: source,
      confidence,
      reasoning,
      database_description: getSource(this.catalog, source).description,
      sql: statement,
      template: templateId,
      data,
      row_count: data.length,
    };
  }

  /**
   * Run one description against several sources and merge the results.
   */
  async crossDatabaseQuery(
    description: string,
    databases?: string[]
  ): Promise<CrossDatabaseResult> {
    return this.orchestrator.combine(description, databases);
  }

  /**
   * Run a raw statement against a named source.
   */
  async sql(database: string, statement: string): Promise<SqlResult> {
    if (!hasSource(this.catalog, database)) {
      return this.unknownDatabase(database);
    }

    this.logger.info(`Executing direct SQL on ${database}`);
    const result = await this.executor.run(database, statement);

    switch (result.status) {
      case 'rows':
        return { success: true, database, data: result.rows, row_count: result.count };
      case 'write':
        return { success: true, database, rows_affected: result.rowsAffected };
      case 'failure':
        return {
          success: false,
          database,
          sql: statement,
          error: result.message,
          error_type: errorTypeFor(result.failure),
        };
    }
  }

  /**
   * Table listing for a source, or the columns and row count of one table.
   */
  async schema(database: string, table?: string): Promise<SchemaResult> {
    if (!hasSource(this.catalog, database)) {
      return this.unknownDatabase(database);
    }

    const listing = await this.executor.listTables(database);
    if (listing.status === 'failure') {
      return {
        success: false,
        database,
        error: listing.message,
        error_type: errorTypeFor(listing.failure),
      };
    }

    const tables = listing.value.map((name) => name.toLowerCase());
    if (table === undefined) {
      return {
        database,
        description: getSource(this.catalog, database).description,
        tables,
        table_count: tables.length,
      };
    }

    if (!tables.includes(table.toLowerCase())) {
      return {
        success: false,
        database,
        error: `Table '${table}' not found in ${database}`,
        error_type: 'InvalidArguments',
      };
    }

    const columns = await this.executor.describeTable(database, table);
    if (columns.status === 'failure') {
      return {
        success: false,
        database,
        error: columns.message,
        error_type: errorTypeFor(columns.failure),
      };
    }

    const count = await this.executor.run(database, 'SELECT COUNT(*) AS count FROM ??', [table]);
    const rowCount =
      count.status === 'rows' && count.rows.length > 0 ? toCount(count.rows[0].count) : undefined;

    return {
      database,
      table,
      columns: columns.value,
      row_count: rowCount ?? null,
    };
  }

  /**
   * Every configured source with its connection summary.
   */
  databases(): DatabasesResult {
    const databases = this.catalog.sources.map((source) => {
      const connection = this.executor.describeConnection(source.name);
      return {
        name: source.name,
        description: source.description,
        client: connection?.client ?? null,
        host: connection?.host ?? null,
      };
    });
    return { databases, total: databases.length };
  }

  async unifiedSearch(term: string, kind: SearchKind = 'all'): Promise<UnifiedSearchResult> {
    return this.searchCompiler.search(term, kind);
  }

  async aggregateStats(metric: AggregateMetric): Promise<AggregateStatsResult> {
    return this.aggregateCompiler.aggregate(metric);
  }

  /**
   * Run `SELECT 1` against every source in catalog order.
   */
  async checkConnections(): Promise<ConnectionReport> {
    const databases: ConnectionCheck[] = [];
    for (const { name } of this.catalog.sources) {
      const result = await this.executor.run(name, 'SELECT 1');
      if (result.status === 'failure') {
        databases.push({
          database: name,
          ok: false,
          error: result.message,
          error_type: errorTypeFor(result.failure),
        });
      } else {
        databases.push({ database: name, ok: true });
      }
    }
    return { healthy: databases.every((check) => check.ok), databases };
  }

  getCacheStats(): SchemaCacheStats {
    return this.schemaCache.getStats();
  }

  /**
   * Close every database connection.
   */
  async close(): Promise<void> {
    await this.executor.close();
  }

  private classificationFailure(
    question: string,
    classification: Exclude<ClassificationResult, { kind: 'resolved' }>
  ): QueryClassificationFailure {
    const failure: QueryClassificationFailure = {
      success: false,
      question,
      error: classification.reasoning,
      error_type:
        classification.kind === 'ambiguous'
          ? 'ClassificationAmbiguous'
          : 'ClassificationUnresolved',
      suggestion: classification.suggestion,
      scores: classification.scores,
      action_required: CLASSIFICATION_ACTION,
      available_databases: this.catalog.sources.map(({ name, description }) => ({
        name,
        description,
      })),
    };
    if (classification.kind === 'ambiguous') {
      failure.tied_databases = [...classification.tied];
    }
    return failure;
  }

  private unknownDatabase(database: string): OperationFailure {
    return {
      success: false,
      database,
      error: `Unknown database: ${database}`,
      error_type: 'UnknownSource',
      available_databases: sourceNames(this.catalog),
    };
  }
}
