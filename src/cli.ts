#!/usr/bin/env node
/**
 * crossql CLI
 * Command-line interface for routing questions across databases
 */

import { cac } from 'cac';
import {
  printDatabases,
  printTools,
  runQuery,
  runTool,
  type OutputFormat,
} from './cli/commands.js';
import * as logger from './cli/logger.js';

const cli = cac('crossql');

cli.version('0.1.0');
cli.help();

function fail(message: string, err: unknown): never {
  logger.error(message, err instanceof Error ? err.message : String(err));
  process.exit(1);
}

function parseFormat(value: unknown): OutputFormat {
  return value === 'json' ? 'json' : 'table';
}

/**
 * crossql query <question>
 * Answer a question from the database it is about
 */
cli
  .command('query <question>', 'Answer a natural language question')
  .option('--format <format>', 'Output format: json or table', { default: 'table' })
  .action(async (question: string, options: { format?: unknown }) => {
    try {
      await runQuery(question, parseFormat(options.format));
    } catch (error) {
      fail('Query failed', error);
    }
  });

/**
 * crossql call <tool> [args]
 * Invoke a tool with JSON arguments
 */
cli
  .command('call <tool> [args]', 'Invoke a tool with JSON arguments')
  .example(`crossql call unified_search '{"search_term": "smith", "search_type": "name"}'`)
  .action(async (tool: string, args: string | undefined) => {
    try {
      await runTool(tool, args);
    } catch (error) {
      fail('Tool call failed', error);
    }
  });

/**
 * crossql tools
 */
cli.command('tools', 'List available tools').action(async () => {
  try {
    await printTools();
  } catch (error) {
    fail('Could not list tools', error);
  }
});

/**
 * crossql databases
 */
cli.command('databases', 'List configured databases').action(async () => {
  try {
    await printDatabases();
  } catch (error) {
    fail('Could not list databases', error);
  }
});

/**
 * crossql serve
 * Start the HTTP server
 */
cli
  .command('serve', 'Start the HTTP server')
  .option('-p, --port <port>', 'Server port')
  .action(async (options: { port?: unknown }) => {
    logger.printBanner();
    logger.newline();

    const port = options.port === undefined ? undefined : Number(options.port);
    if (port !== undefined && !Number.isInteger(port)) {
      logger.error(`Invalid port: ${String(options.port)}`);
      process.exit(1);
    }

    try {
      const { startServer } = await import('./server.js');
      await startServer(port);
    } catch (error) {
      fail('Failed to start server', error);
    }
  });

// Parse CLI arguments
cli.parse();
