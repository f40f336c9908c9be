/**
 * CLI commands. Each one builds an engine in-process and closes it when done.
 */

import pino from 'pino';
import { invokeTool, listTools, type CrossQL } from 'crossql';
import { config } from '../config.js';
import { createEngine } from '../engine.js';
import * as logger from './logger.js';

export type OutputFormat = 'json' | 'table';

async function withEngine<T>(action: (engine: CrossQL) => Promise<T>): Promise<T> {
  // Only warnings and errors; command output goes to stdout
  const engine = createEngine(config, pino({ level: 'warn' }));
  try {
    return await action(engine);
  } finally {
    await engine.close();
  }
}

/**
 * crossql query <question>
 */
export async function runQuery(question: string, format: OutputFormat): Promise<void> {
  await withEngine(async (engine) => {
    const spinner = logger.spinner('Routing question...');
    const result = await engine.query(question);

    if (!result.success) {
      spinner.fail('Query failed');
      logger.error(result.error, result.suggestion);
      if ('sql' in result) {
        logger.code(result.sql, 'sql');
      }
      process.exitCode = 1;
      return;
    }

    spinner.succeed(
      `${result.detected_database} (confidence ${result.confidence.toFixed(1)}%, ${result.row_count} rows)`
    );
    logger.row('Reasoning', result.reasoning);
    logger.section('SQL');
    logger.code(result.sql, 'sql');
    logger.section('Data');

    if (format === 'json') {
      logger.json(result.data);
    } else {
      logger.table(result.data);
    }
  });
}

/**
 * crossql call <tool> [json-args]
 */
export async function runTool(name: string, rawArgs?: string): Promise<void> {
  let args: unknown = {};
  if (rawArgs !== undefined) {
    try {
      args = JSON.parse(rawArgs);
    } catch (error) {
      logger.error(
        `Arguments are not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        `Example: crossql call schema '{"database": "chinook"}'`
      );
      process.exitCode = 1;
      return;
    }
  }

  await withEngine(async (engine) => {
    const result = await invokeTool(engine, name, args);
    logger.json(result);
    if ('success' in result && result.success === false) {
      process.exitCode = 1;
    }
  });
}

/**
 * crossql tools
 */
export async function printTools(): Promise<void> {
  await withEngine(async (engine) => {
    logger.section('Tools');
    for (const tool of listTools(engine)) {
      logger.row(tool.name, tool.description);
    }
    logger.newline();
  });
}

/**
 * crossql databases
 */
export async function printDatabases(): Promise<void> {
  await withEngine(async (engine) => {
    const { databases, total } = engine.databases();
    logger.section(`Databases (${total})`);
    logger.table(
      databases.map(({ name, description, client, host }) => ({
        name,
        description,
        client,
        host,
      }))
    );
  });
}
