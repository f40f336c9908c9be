/**
 * Routing classifier: decides which source a free-text question is about.
 */

import type { Logger } from 'pino';
import type { Catalog } from './catalog.js';
import type { SchemaCache } from './schema-cache.js';
import type {
  ClassificationPhase,
  ClassificationResult,
  ScoreVector,
} from './types.js';

/**
 * A table name in the question outweighs any single keyword.
 */
export const TABLE_MATCH_WEIGHT = 5;

/**
 * Tables per source inspected during the column phase.
 */
export const COLUMN_SCAN_TABLE_LIMIT = 10;

/**
 * Normalized column names must be longer than this to count.
 */
export const MIN_COLUMN_LENGTH = 3;

const REASONING_MARKERS = 5;

/**
 * Confidence for a winning score: approaches 100 but never reaches it.
 */
export function confidenceFor(score: number): number {
  if (score <= 0) return 0;
  return Math.min(100, (100 * score) / (score + 1));
}

/**
 * Strip a trailing `_id`, then a trailing `_name`, from a lowercased column name.
 */
export function normalizeColumnName(column: string): string {
  return column.toLowerCase().replace(/_id$/, '').replace(/_name$/, '');
}

class ScoreBoard {
  readonly scores: ScoreVector = {};
  readonly matches: Record<string, string[]> = {};

  constructor(sources: string[]) {
    for (const source of sources) {
      this.scores[source] = 0;
      this.matches[source] = [];
    }
  }

  add(source: string, weight: number, marker: string): void {
    this.scores[source] = (this.scores[source] ?? 0) + weight;
    (this.matches[source] ??= []).push(marker);
  }

  max(): number {
    return Math.max(0, ...Object.values(this.scores));
  }
}

/**
 * Phased classifier. Each phase runs only when every score is still zero:
 * keywords, then table names, then column names.
 */
export class RoutingClassifier {
  constructor(
    private catalog: Catalog,
    private schemaCache: SchemaCache,
    private logger: Logger
  ) {}

  async classify(question: string): Promise<ClassificationResult> {
    const text = question.toLowerCase();
    const board = new ScoreBoard(this.catalog.sources.map((source) => source.name));

    // Phase 1: keywords
    let phase: ClassificationPhase = 'keyword';
    this.scoreKeywords(text, board);

    // Phase 2: table names
    if (board.max() === 0) {
      phase = 'table';
      this.logger.debug('No keyword matches found. Attempting table name matching...');
      await this.scoreTables(text, board);
    }

    // Phase 3: column names
    if (board.max() === 0) {
      phase = 'column';
      this.logger.debug('No table matches found. Attempting column name matching...');
      await this.scoreColumns(text, board);
    }

    return this.resolve(board, phase);
  }

  private scoreKeywords(text: string, board: ScoreBoard): void {
    for (const source of this.catalog.sources) {
      for (const keyword of source.keywords) {
        if (text.includes(keyword)) {
          board.add(source.name, 1, keyword);
        }
      }
    }
  }

  private async scoreTables(text: string, board: ScoreBoard): Promise<void> {
    for (const source of this.catalog.sources) {
      const tables = await this.schemaCache.getTables(source.name);
      for (const table of tables) {
        if (text.includes(table)) {
          board.add(source.name, TABLE_MATCH_WEIGHT, `table:${table}`);
          this.logger.debug(`Found table name '${table}' in question for ${source.name}`);
        }
      }
    }
  }

  private async scoreColumns(text: string, board: ScoreBoard): Promise<void> {
    for (const source of this.catalog.sources) {
      const tables = await this.schemaCache.getTables(source.name);
      for (const table of tables.slice(0, COLUMN_SCAN_TABLE_LIMIT)) {
        const columns = await this.schemaCache.getColumns(source.name, table);
        for (const column of columns) {
          const normalized = normalizeColumnName(column.name);
          if (normalized.length > MIN_COLUMN_LENGTH && text.includes(normalized)) {
            board.add(source.name, 1, `column:${table}.${column.name.toLowerCase()}`);
            this.logger.debug(`Found column match '${column.name}' in ${source.name}.${table}`);
          }
        }
      }
    }
  }

  private resolve(board: ScoreBoard, phase: ClassificationPhase): ClassificationResult {
    const maxScore = board.max();
    const scores = { ...board.scores };

    if (maxScore === 0) {
      return {
        kind: 'unresolved',
        confidence: 0,
        reasoning: 'Could not determine database from question',
        suggestion: `Please specify or ask about: ${this.describe(
          this.catalog.sources.map((source) => source.name)
        )}`,
        scores,
        phase,
      };
    }

    const top = this.catalog.sources
      .map((source) => source.name)
      .filter((name) => scores[name] === maxScore);

    if (top.length > 1) {
      return {
        kind: 'ambiguous',
        tied: top,
        confidence: 50,
        reasoning: `Ambiguous query matches multiple databases: ${top.join(', ')}`,
        suggestion: `Please clarify if you want data from: ${this.describe(top)}`,
        scores,
        phase,
      };
    }

    const [source] = top;
    const matched = [...(board.matches[source] ?? [])];
    const confidence = confidenceFor(maxScore);

    this.logger.info(
      `Detected database: ${source} (score: ${maxScore}, confidence: ${confidence.toFixed(1)}%)`
    );

    return {
      kind: 'resolved',
      source,
      confidence,
      reasoning: `Matched keywords/patterns: ${matched.slice(0, REASONING_MARKERS).join(', ')}`,
      matched,
      scores,
      phase,
    };
  }

  private describe(names: string[]): string {
    return this.catalog.sources
      .filter((source) => names.includes(source.name))
      .map((source) => `${source.name} (${source.description})`)
      .join(', ');
  }
}
