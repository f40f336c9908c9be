import { describe, expect, it } from 'vitest';
import { TemplateDispatcher } from '../dispatcher.js';
import { analyzeResults, CrossSourceOrchestrator } from '../orchestrator.js';
import { silentLogger, STATEMENTS, testCatalog } from './helpers/catalog.js';
import { FakeExecutor, rows, type FakeSource } from './helpers/fake-executor.js';

function orchestratorFor(sources: Record<string, FakeSource>) {
  const catalog = testCatalog();
  const executor = new FakeExecutor(sources);
  const orchestrator = new CrossSourceOrchestrator(
    catalog,
    new TemplateDispatcher(catalog),
    executor,
    silentLogger
  );
  return { catalog, executor, orchestrator };
}

describe('CrossSourceOrchestrator.selectSources', () => {
  const { orchestrator } = orchestratorFor({});

  it('uses explicit sources as given', () => {
    expect(orchestrator.selectSources('anything', ['movies', 'school'])).toEqual(['movies', 'school']);
  });

  it('drops repeated explicit sources and keeps their order', () => {
    expect(orchestrator.selectSources('anything', ['music', 'school', 'music'])).toEqual([
      'music',
      'school',
    ]);
  });

  it('uses every source for broad descriptions', () => {
    expect(orchestrator.selectSources('Compare album sales')).toEqual(['school', 'music', 'movies']);
  });

  it('uses keyword-matching sources', () => {
    expect(orchestrator.selectSources('revenue from albums')).toEqual(['music']);
    expect(orchestrator.selectSources('customer revenue')).toEqual(['music', 'movies']);
  });

  it('uses every source when nothing matches', () => {
    expect(orchestrator.selectSources('quarterly numbers')).toEqual(['school', 'music', 'movies']);
  });
});

describe('CrossSourceOrchestrator.combine', () => {
  it('runs the comparison template per source and sums numeric fields', async () => {
    const { orchestrator } = orchestratorFor({
      school: { results: { [STATEMENTS.schoolRevenue]: rows({ total_revenue: 1500.5 }) } },
      music: { results: { [STATEMENTS.musicRevenue]: rows({ total_revenue: 2000 }) } },
    });

    const result = await orchestrator.combine('total revenue', ['school', 'music']);

    expect(result.query_description).toBe('total revenue');
    expect(result.databases_queried).toEqual(['school', 'music']);
    expect(result.individual_results.school).toEqual({
      data: [{ total_revenue: 1500.5 }],
      row_count: 1,
      sql: STATEMENTS.schoolRevenue,
      template: 'revenue',
    });
    expect(result.combined_analysis).toEqual({
      per_source_summary: [
        { database: 'school', records_found: 1, description: 'School records' },
        { database: 'music', records_found: 1, description: 'Music store' },
      ],
      numeric_totals: { total_revenue: 3500.5 },
    });
  });

  it('records failing sources and still runs the rest', async () => {
    const { orchestrator, executor } = orchestratorFor({
      school: { results: { [STATEMENTS.schoolRevenue]: rows({ total_revenue: 10 }) } },
      music: { unreachable: 'connect ECONNREFUSED' },
    });

    const result = await orchestrator.combine('revenue', ['music', 'warehouse', 'school']);

    expect(result.individual_results.music).toEqual({
      error: 'connect ECONNREFUSED',
      error_type: 'ConnectionFailure',
      sql: STATEMENTS.musicRevenue,
    });
    expect(result.individual_results.warehouse).toEqual({
      error: 'Unknown database: warehouse',
      error_type: 'UnknownSource',
    });
    expect(result.combined_analysis.numeric_totals).toEqual({ total_revenue: 10 });
    expect(executor.calls.map((call) => call.source)).toEqual(['music', 'school']);
  });

  it('runs a repeated explicit source once', async () => {
    const { orchestrator, executor } = orchestratorFor({
      music: { results: { [STATEMENTS.musicRevenue]: rows({ total_revenue: 20 }) } },
    });

    const result = await orchestrator.combine('revenue', ['music', 'music']);

    expect(result.databases_queried).toEqual(['music']);
    expect(executor.calls).toHaveLength(1);
    expect(result.combined_analysis.numeric_totals).toEqual({ total_revenue: 20 });
  });

  it('sums counts that arrive as numeric strings', async () => {
    const { orchestrator } = orchestratorFor({
      school: { results: { [STATEMENTS.schoolDefault]: rows({ entity: 'Students', count: '10' }) } },
      music: { results: { [STATEMENTS.musicDefault]: rows({ entity: 'Albums', count: '7' }) } },
    });

    const result = await orchestrator.combine('anything', ['school', 'music']);

    expect(result.combined_analysis.numeric_totals).toEqual({ count: 17 });
  });
});

describe('analyzeResults', () => {
  const catalog = testCatalog();

  it('accumulates fields that are numeric or numeric strings in the first row', () => {
    const analysis = analyzeResults(catalog, {
      school: {
        data: [
          { entity: 'Students', count: 10 },
          { entity: 'Teachers', count: 4 },
        ],
        row_count: 2,
        sql: STATEMENTS.schoolDefault,
        template: 'default',
      },
      music: {
        data: [{ entity: 'Albums', count: '7' }],
        row_count: 1,
        sql: STATEMENTS.musicDefault,
        template: 'default',
      },
    });

    expect(analysis.numeric_totals).toEqual({ count: 21 });
    expect(analysis.per_source_summary.map((summary) => summary.database)).toEqual([
      'school',
      'music',
    ]);
  });

  it('skips failed and empty sources', () => {
    const analysis = analyzeResults(catalog, {
      school: { data: [], row_count: 0, sql: STATEMENTS.schoolDefault, template: 'default' },
      music: { error: 'timeout', error_type: 'ExecutionFailure' },
    });

    expect(analysis).toEqual({ per_source_summary: [], numeric_totals: {} });
  });
});
