/**
 * Cross-source orchestration: fan one description out to several sources and
 * merge the differently-shaped rows into one numeric summary.
 */

import type { Logger } from 'pino';
import { hasSource, sourceNames, type Catalog } from './catalog.js';
import type { TemplateDispatcher } from './dispatcher.js';
import { errorTypeFor, type SourceExecutor } from './executor.js';
import type {
  CombinedAnalysis,
  CrossDatabaseResult,
  SourceOutcome,
  SourceOutcomeSuccess,
} from './types.js';
import { toCount } from './utils.js';

function isSuccess(outcome: SourceOutcome): outcome is SourceOutcomeSuccess {
  return 'data' in outcome;
}

/**
 * Merge per-source outcomes.
 *
 * Only fields holding a count-like value in a source's first row are
 * accumulated; that field's values across every row of the source are added
 * to a total shared by every source reporting the same field name. Numeric
 * strings count too (pg returns COUNT(*) and SUM(numeric) as text).
 */
export function analyzeResults(
  catalog: Catalog,
  results: Record<string, SourceOutcome>
): CombinedAnalysis {
  const analysis: CombinedAnalysis = {
    per_source_summary: [],
    numeric_totals: {},
  };

  for (const [database, outcome] of Object.entries(results)) {
    if (!isSuccess(outcome) || outcome.data.length === 0) {
      continue;
    }

    const [firstRow] = outcome.data;
    for (const [key, value] of Object.entries(firstRow)) {
      if (toCount(value) === undefined) {
        continue;
      }
      let total = analysis.numeric_totals[key] ?? 0;
      for (const row of outcome.data) {
        total += toCount(row[key]) ?? 0;
      }
      analysis.numeric_totals[key] = total;
    }

    analysis.per_source_summary.push({
      database,
      records_found: outcome.row_count,
      description:
        catalog.sources.find((source) => source.name === database)?.description ?? '',
    });
  }

  return analysis;
}

export class CrossSourceOrchestrator {
  constructor(
    private catalog: Catalog,
    private dispatcher: TemplateDispatcher,
    private executor: SourceExecutor,
    private logger: Logger
  ) {}

  /**
   * Sources relevant to a description. Never empty: a description with no
   * detectable source goes to every source. Explicit lists are used in the
   * given order, without repeats.
   */
  selectSources(description: string, explicitSources?: string[]): string[] {
    if (explicitSources) {
      return [...new Set(explicitSources)];
    }

    const text = description.toLowerCase();
    const all = sourceNames(this.catalog);

    if (this.catalog.broadTerms.some((term) => text.includes(term))) {
      return all;
    }

    const relevant = this.catalog.sources
      .filter((source) => source.keywords.some((keyword) => text.includes(keyword)))
      .map((source) => source.name);

    return relevant.length > 0 ? relevant : all;
  }

  /**
   * Query each selected source in turn. A failing source is recorded and the
   * remaining sources still run.
   */
  async combine(
    description: string,
    explicitSources?: string[]
  ): Promise<CrossDatabaseResult> {
    this.logger.info(`Processing cross-database query: ${description}`);
    const databases = this.selectSources(description, explicitSources);
    const results: Record<string, SourceOutcome> = {};

    for (const database of databases) {
      results[database] = await this.runSource(database, description);
    }

    return {
      query_description: description,
      databases_queried: databases,
      individual_results: results,
      combined_analysis: analyzeResults(this.catalog, results),
    };
  }

  private async runSource(database: string, description: string): Promise<SourceOutcome> {
    if (!hasSource(this.catalog, database)) {
      return {
        error: `Unknown database: ${database}`,
        error_type: 'UnknownSource',
      };
    }

    const { templateId, statement } = this.dispatcher.selectComparison(database, description);
    const result = await this.executor.run(database, statement);

    switch (result.status) {
      case 'rows':
        return {
          data: result.rows,
          row_count: result.count,
          sql: statement,
          template: templateId,
        };
      case 'write':
        return { data: [], row_count: 0, sql: statement, template: templateId };
      case 'failure': {
        const errorType = errorTypeFor(result.failure);
        this.logger.warn({ database, errorType }, `Cross-database query failed: ${result.message}`);
        return { error: result.message, error_type: errorType, sql: statement };
      }
    }
  }
}
