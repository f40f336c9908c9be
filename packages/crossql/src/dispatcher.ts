/**
 * Template dispatch: picks one canned statement per source from the catalog.
 */

import { getSource, matchesGuard, type Catalog, type QueryTemplate } from './catalog.js';

export interface SelectedStatement {
  templateId: string;
  statement: string;
}

export const FALLBACK_TEMPLATE_ID = 'fallback';
export const DEFAULT_COMPARISON_ID = 'default';

function firstMatch(
  templates: QueryTemplate[],
  text: string
): QueryTemplate | undefined {
  return templates.find((template) => matchesGuard(template.guard, text));
}

/**
 * Pure text-to-statement mapping. Guards are tried in catalog order and the
 * first match wins; question text never enters the statement.
 */
export class TemplateDispatcher {
  constructor(private catalog: Catalog) {}

  /**
   * Select the single-source template for a question.
   * Falls back to the source's help statement when no guard matches.
   */
  select(source: string, question: string): SelectedStatement {
    const entry = getSource(this.catalog, source);
    const template = firstMatch(entry.templates, question.toLowerCase());
    return template
      ? { templateId: template.id, statement: template.statement }
      : { templateId: FALLBACK_TEMPLATE_ID, statement: entry.fallback };
  }

  buildStatement(source: string, question: string): string {
    return this.select(source, question).statement;
  }

  /**
   * Select the comparison template used when fanning a description out to
   * several sources. Falls back to the source's entity-count listing.
   */
  selectComparison(source: string, description: string): SelectedStatement {
    const entry = getSource(this.catalog, source);
    const template = firstMatch(entry.comparisons, description.toLowerCase());
    return template
      ? { templateId: template.id, statement: template.statement }
      : { templateId: DEFAULT_COMPARISON_ID, statement: entry.comparisonDefault };
  }

  buildComparisonStatement(source: string, description: string): string {
    return this.selectComparison(source, description).statement;
  }
}
