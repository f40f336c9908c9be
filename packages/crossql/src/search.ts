/**
 * Unified search across every configured source.
 */

import type { Logger } from 'pino';
import { getSource, type Catalog } from './catalog.js';
import type { SourceExecutor } from './executor.js';
import type {
  ItemFailure,
  SearchHits,
  SearchKind,
  UnifiedSearchResult,
} from './types.js';

export interface CompiledSearch {
  statement: string;
  bindings: { pattern: string };
}

/**
 * Builds per-source lookup statements. The term is always bound as the
 * `:pattern` parameter, never spliced into the statement text.
 */
export class SearchCompiler {
  constructor(
    private catalog: Catalog,
    private executor: SourceExecutor,
    private logger: Logger
  ) {}

  /**
   * Statement for one source, or undefined when the source has nothing to
   * match for that kind. `id` lookups use the broadest statement, as does `all`.
   */
  compile(source: string, term: string, kind: SearchKind): CompiledSearch | undefined {
    const { search } = getSource(this.catalog, source);
    const statement = kind === 'id' || kind === 'all' ? search.all : search[kind];
    if (!statement) {
      return undefined;
    }
    return { statement, bindings: { pattern: `%${term}%` } };
  }

  /**
   * Search every source in turn. Only sources with at least one hit are reported.
   */
  async search(term: string, kind: SearchKind = 'all'): Promise<UnifiedSearchResult> {
    this.logger.info(`Unified search for '${term}' (type: ${kind})`);

    const resultsByDatabase: Record<string, SearchHits> = {};
    const failures: ItemFailure[] = [];
    const searched: string[] = [];

    for (const { name } of this.catalog.sources) {
      searched.push(name);
      const compiled = this.compile(name, term, kind);
      if (!compiled) {
        this.logger.debug(`No ${kind} search defined for ${name}`);
        continue;
      }

      const result = await this.executor.run(name, compiled.statement, compiled.bindings);
      if (result.status === 'failure') {
        failures.push({ database: name, item: kind, message: result.message });
        continue;
      }
      if (result.status === 'rows' && result.count > 0) {
        resultsByDatabase[name] = { matches: result.rows, count: result.count };
      }
    }

    const totalMatches = Object.values(resultsByDatabase).reduce(
      (sum, hits) => sum + hits.count,
      0
    );

    return {
      search_term: term,
      search_type: kind,
      total_matches: totalMatches,
      results_by_database: resultsByDatabase,
      databases_searched: searched,
      failures,
    };
  }
}
