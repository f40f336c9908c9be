/**
 * TypeScript types for crossql
 */

import type { Knex } from 'knex';
import type { Logger } from 'pino';
import type { Catalog } from './catalog.js';
import type { SourceExecutor } from './executor.js';
import type { JsonObject, JsonValue } from './utils.js';

// Re-export utility types for convenience
export type {
	JsonPrimitive,
	JsonValue,
	JsonObject,
	Bindings,
} from './utils.js';

/**
 * Options shared by every crossql configuration.
 */
interface BaseConfig {
	/**
	 * Source catalog. Defaults to the bundled catalog.
	 */
	catalog?: Catalog;

	/**
	 * Pino logger. Defaults to a silent logger.
	 */
	logger?: Logger;
}

/**
 * crossql configuration backed by knex connections, one per source.
 *
 * @example
 * ```typescript
 * const engine = new CrossQL({
 *   connections: {
 *     chinook: { client: 'mysql2', connection: process.env.CHINOOK_DATABASE_URL },
 *   },
 * });
 * ```
 */
export interface ConnectionsConfig extends BaseConfig {
	connections: Record<string, Knex.Config>;

	/**
	 * Reject statements that are not reads.
	 * @default false
	 */
	readOnly?: boolean;
}

/**
 * crossql configuration backed by a caller-supplied executor.
 */
export interface ExecutorConfig extends BaseConfig {
	executor: SourceExecutor;
}

export type CrossQLConfig = ConnectionsConfig | ExecutorConfig;

// ============================================================================
// SCHEMA
// ============================================================================

export interface ColumnInfo {
	name: string;
	type: string;
}

export interface SchemaSnapshot {
	source: string;
	tables: string[];
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

/**
 * Score per source name. Always carries an entry for every configured source.
 */
export type ScoreVector = Record<string, number>;

/**
 * The last classification phase that ran.
 */
export type ClassificationPhase = 'keyword' | 'table' | 'column';

export interface ResolvedClassification {
	readonly kind: 'resolved';
	source: string;
	confidence: number;
	reasoning: string;
	matched: string[];
	scores: ScoreVector;
	phase: ClassificationPhase;
}

export interface AmbiguousClassification {
	readonly kind: 'ambiguous';
	tied: string[];
	confidence: 50;
	reasoning: string;
	suggestion: string;
	scores: ScoreVector;
	phase: ClassificationPhase;
}

export interface UnresolvedClassification {
	readonly kind: 'unresolved';
	confidence: 0;
	reasoning: string;
	suggestion: string;
	scores: ScoreVector;
	phase: ClassificationPhase;
}

export type ClassificationResult =
	| ResolvedClassification
	| AmbiguousClassification
	| UnresolvedClassification;

// ============================================================================
// ERRORS AS DATA
// ============================================================================

export type ErrorType =
	| 'ConnectionFailure'
	| 'ExecutionFailure'
	| 'ClassificationUnresolved'
	| 'ClassificationAmbiguous'
	| 'UnknownSource'
	| 'InvalidArguments';

// ============================================================================
// OPERATION RESULTS
// ============================================================================

export interface SourceDescription {
	name: string;
	description: string;
}

export interface QuerySuccess {
	success: true;
	question: string;
	detected_database: string;
	confidence: number;
	reasoning: string;
	database_description: string;
	sql: string;
	template: string;
	data: JsonObject[];
	row_count: number;
}

export interface QueryClassificationFailure {
	success: false;
	question: string;
	error: string;
	error_type: 'ClassificationUnresolved' | 'ClassificationAmbiguous';
	suggestion: string;
	scores: ScoreVector;
	action_required: string;
	available_databases: SourceDescription[];
	tied_databases?: string[];
}

export interface QueryExecutionFailure {
	success: false;
	question: string;
	detected_database: string;
	confidence: number;
	sql: string;
	error: string;
	error_type: ErrorType;
	suggestion: string;
}

export type QueryResult =
	| QuerySuccess
	| QueryClassificationFailure
	| QueryExecutionFailure;

export interface ExplainResult {
	question: string;
	classification: ClassificationResult;
	sql: string | null;
	template: string | null;
}

export interface SourceOutcomeSuccess {
	data: JsonObject[];
	row_count: number;
	sql: string;
	template: string;
}

export interface SourceOutcomeFailure {
	error: string;
	error_type: ErrorType;
	sql?: string;
}

export type SourceOutcome = SourceOutcomeSuccess | SourceOutcomeFailure;

export interface SourceSummary {
	database: string;
	records_found: number;
	description: string;
}

export interface CombinedAnalysis {
	per_source_summary: SourceSummary[];
	numeric_totals: Record<string, number>;
}

export interface CrossDatabaseResult {
	query_description: string;
	databases_queried: string[];
	individual_results: Record<string, SourceOutcome>;
	combined_analysis: CombinedAnalysis;
}

export interface SqlRowsResult {
	success: true;
	database: string;
	data: JsonObject[];
	row_count: number;
}

export interface SqlWriteResult {
	success: true;
	database: string;
	rows_affected: number;
}

export interface OperationFailure {
	success: false;
	error: string;
	error_type: ErrorType;
	database?: string;
	sql?: string;
	available_databases?: string[];
}

export type SqlResult = SqlRowsResult | SqlWriteResult | OperationFailure;

export interface DatabaseSchemaResult {
	database: string;
	description: string;
	tables: string[];
	table_count: number;
}

export interface TableSchemaResult {
	database: string;
	table: string;
	columns: ColumnInfo[];
	row_count: number | null;
}

export type SchemaResult =
	| DatabaseSchemaResult
	| TableSchemaResult
	| OperationFailure;

export interface DatabaseListing {
	name: string;
	description: string;
	client: string | null;
	host: string | null;
}

export interface DatabasesResult {
	databases: DatabaseListing[];
	total: number;
}

// ============================================================================
// CONNECTIVITY
// ============================================================================

export type ConnectionCheck =
	| { database: string; ok: true }
	| { database: string; ok: false; error: string; error_type: ErrorType };

/**
 * Result of probing every configured source with `SELECT 1`.
 */
export interface ConnectionReport {
	healthy: boolean;
	databases: ConnectionCheck[];
}

// ============================================================================
// SEARCH AND AGGREGATES
// ============================================================================

export const SEARCH_KINDS = ['name', 'email', 'id', 'title', 'all'] as const;
export type SearchKind = (typeof SEARCH_KINDS)[number];

export interface SearchHits {
	matches: JsonObject[];
	count: number;
}

export interface ItemFailure {
	database: string;
	item: string;
	message: string;
}

export interface UnifiedSearchResult {
	search_term: string;
	search_type: SearchKind;
	total_matches: number;
	results_by_database: Record<string, SearchHits>;
	databases_searched: string[];
	failures: ItemFailure[];
}

export const AGGREGATE_METRICS = [
	'total_records',
	'customers',
	'payments',
	'entity_counts',
] as const;
export type AggregateMetric = (typeof AGGREGATE_METRICS)[number];

export interface AggregateStatsResult {
	metric: AggregateMetric;
	by_database: Record<string, JsonValue>;
	totals: Record<string, number>;
	failures: ItemFailure[];
}

export interface ToolFailure {
	success: false;
	error: string;
	error_type?: ErrorType;
	details?: string[];
}

export type ToolResult =
	| QueryResult
	| CrossDatabaseResult
	| SqlResult
	| SchemaResult
	| DatabasesResult
	| UnifiedSearchResult
	| AggregateStatsResult
	| ToolFailure;
