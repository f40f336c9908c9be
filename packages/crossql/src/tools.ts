/**
 * Tool registry: the seven named operations with validated arguments.
 */

import { z } from 'zod';
import { sourceNames } from './catalog.js';
import type { CrossQL } from './CrossQL.js';
import { errorMessage } from './executor.js';
import { AGGREGATE_METRICS, SEARCH_KINDS, type ToolResult } from './types.js';
import type { JsonObject } from './utils.js';

const QueryArgs = z.object({
  question: z.string().min(1),
});

const CrossDatabaseArgs = z.object({
  query_description: z.string().min(1),
  databases: z.array(z.string().min(1)).optional(),
});

const SqlArgs = z.object({
  database: z.string().min(1),
  query: z.string().min(1),
});

const SchemaArgs = z.object({
  database: z.string().min(1),
  table: z.string().min(1).optional(),
});

const DatabasesArgs = z.object({});

const SearchArgs = z.object({
  search_term: z.string().min(1),
  search_type: z.enum(SEARCH_KINDS).default('all'),
});

const AggregateArgs = z.object({
  metric: z.enum(AGGREGATE_METRICS),
});

export const TOOL_NAMES = [
  'query',
  'cross_database_query',
  'sql',
  'schema',
  'databases',
  'unified_search',
  'aggregate_stats',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export interface ToolDefinition {
  name: ToolName;
  description: string;
  inputSchema: JsonObject;
}

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}

/**
 * Tool descriptions with JSON input schemas. Database enums follow the catalog.
 */
export function listTools(engine: CrossQL): ToolDefinition[] {
  const databases = sourceNames(engine.catalog);

  return [
    {
      name: 'query',
      description:
        'Ask a question in natural language; the database is detected automatically',
      inputSchema: {
        type: 'object',
        required: ['question'],
        properties: {
          question: {
            type: 'string',
            description: 'Natural language question',
          },
        },
      },
    },
    {
      name: 'cross_database_query',
      description: 'Run one question against several databases and combine the results',
      inputSchema: {
        type: 'object',
        required: ['query_description'],
        properties: {
          query_description: {
            type: 'string',
            description: 'What to compare or combine across databases',
          },
          databases: {
            type: 'array',
            items: { type: 'string', enum: databases },
            description: 'Databases to query (detected from the description when omitted)',
          },
        },
      },
    },
    {
      name: 'sql',
      description: 'Execute a raw SQL statement against a specific database',
      inputSchema: {
        type: 'object',
        required: ['database', 'query'],
        properties: {
          database: { type: 'string', enum: databases },
          query: { type: 'string', description: 'SQL statement' },
        },
      },
    },
    {
      name: 'schema',
      description: 'List the tables of a database, or the columns of one table',
      inputSchema: {
        type: 'object',
        required: ['database'],
        properties: {
          database: { type: 'string', enum: databases },
          table: { type: 'string', description: 'Table to describe' },
        },
      },
    },
    {
      name: 'databases',
      description: 'List the configured databases',
      inputSchema: { type: 'object', properties: {} },
    },
    {
      name: 'unified_search',
      description: 'Search for a term across every database',
      inputSchema: {
        type: 'object',
        required: ['search_term'],
        properties: {
          search_term: { type: 'string' },
          search_type: {
            type: 'string',
            enum: [...SEARCH_KINDS],
            default: 'all',
          },
        },
      },
    },
    {
      name: 'aggregate_stats',
      description: 'Compute a statistic across every database',
      inputSchema: {
        type: 'object',
        required: ['metric'],
        properties: {
          metric: { type: 'string', enum: [...AGGREGATE_METRICS] },
        },
      },
    },
  ];
}

function invalidArguments(tool: string, error: z.ZodError): ToolResult {
  return {
    success: false,
    error: `Invalid arguments for ${tool}`,
    error_type: 'InvalidArguments',
    details: error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
  };
}

async function dispatch(engine: CrossQL, name: ToolName, args: unknown): Promise<ToolResult> {
  switch (name) {
    case 'query': {
      const parsed = QueryArgs.safeParse(args);
      if (!parsed.success) return invalidArguments(name, parsed.error);
      return engine.query(parsed.data.question);
    }
    case 'cross_database_query': {
      const parsed = CrossDatabaseArgs.safeParse(args);
      if (!parsed.success) return invalidArguments(name, parsed.error);
      return engine.crossDatabaseQuery(parsed.data.query_description, parsed.data.databases);
    }
    case 'sql': {
      const parsed = SqlArgs.safeParse(args);
      if (!parsed.success) return invalidArguments(name, parsed.error);
      return engine.sql(parsed.data.database, parsed.data.query);
    }
    case 'schema': {
      const parsed = SchemaArgs.safeParse(args);
      if (!parsed.success) return invalidArguments(name, parsed.error);
      return engine.schema(parsed.data.database, parsed.data.table);
    }
    case 'databases': {
      const parsed = DatabasesArgs.safeParse(args);
      if (!parsed.success) return invalidArguments(name, parsed.error);
      return engine.databases();
    }
    case 'unified_search': {
      const parsed = SearchArgs.safeParse(args);
      if (!parsed.success) return invalidArguments(name, parsed.error);
      return engine.unifiedSearch(parsed.data.search_term, parsed.data.search_type);
    }
    case 'aggregate_stats': {
      const parsed = AggregateArgs.safeParse(args);
      if (!parsed.success) return invalidArguments(name, parsed.error);
      return engine.aggregateStats(parsed.data.metric);
    }
  }
}

/**
 * Invoke a tool by name. Never throws: unknown tools, invalid arguments and
 * unexpected errors all come back as `{ success: false }` results.
 */
export async function invokeTool(
  engine: CrossQL,
  name: string,
  args: unknown
): Promise<ToolResult> {
  if (!isToolName(name)) {
    return { success: false, error: `Unknown tool: ${name}` };
  }

  try {
    return await dispatch(engine, name, args ?? {});
  } catch (error) {
    engine.logger.error({ err: error, tool: name }, 'Tool invocation failed');
    return { success: false, error: errorMessage(error) };
  }
}
