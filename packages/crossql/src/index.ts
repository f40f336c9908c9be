/**
 * crossql - route natural language questions across several SQL databases
 */

export { CrossQL } from './CrossQL.js';
export { invokeTool, isToolName, listTools, TOOL_NAMES } from './tools.js';
export type { ToolDefinition, ToolName } from './tools.js';
export {
  DEFAULT_CATALOG_URL,
  loadCatalog,
  parseCatalog,
  sourceNames,
} from './catalog.js';
export type { Catalog, Guard, QueryTemplate, SourceEntry } from './catalog.js';
export { KnexSourceExecutor, isReadStatement } from './executor.js';
export type {
  ConnectionInfo,
  ExecutionResult,
  Introspection,
  SourceExecutor,
} from './executor.js';
export type { SchemaCacheStats } from './schema-cache.js';
export { AGGREGATE_METRICS, SEARCH_KINDS } from './types.js';
export type {
  AggregateMetric,
  AggregateStatsResult,
  ClassificationResult,
  ColumnInfo,
  ConnectionCheck,
  ConnectionReport,
  CrossDatabaseResult,
  CrossQLConfig,
  DatabasesResult,
  ErrorType,
  ExplainResult,
  JsonObject,
  JsonValue,
  QueryResult,
  SchemaResult,
  SearchKind,
  SqlResult,
  ToolResult,
  UnifiedSearchResult,
} from './types.js';
export { CatalogError, UnknownSourceError } from './errors.js';
