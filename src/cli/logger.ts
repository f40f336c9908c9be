/**
 * CLI output helpers with colors and formatting.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import Table from 'cli-table3';
import type { JsonObject, JsonValue } from 'crossql';

/**
 * Print crossql banner.
 */
export function printBanner(): void {
  console.log('');
  console.log(`  ${chalk.bold.cyan('crossql')}`);
  console.log(`  ${chalk.gray('one question, the right database')}`);
}

/**
 * Error message.
 */
export function error(message: string, suggestion?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

/**
 * Create a spinner.
 */
export function spinner(text: string): Ora {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  }).start();
}

/**
 * Print code block.
 */
export function code(content: string, language?: string): void {
  const border = chalk.gray('─'.repeat(50));
  console.log(border);
  if (language) {
    console.log(chalk.gray(`# ${language}`));
  }
  console.log(chalk.cyan(content));
  console.log(border);
}

/**
 * Print a section header.
 */
export function section(title: string): void {
  console.log('');
  console.log(chalk.cyan.bold(`▶ ${title}`));
  console.log(chalk.gray('─'.repeat(50)));
}

/**
 * Print empty line.
 */
export function newline(): void {
  console.log('');
}

/**
 * Print a labelled value.
 */
export function row(label: string, value: string): void {
  console.log(`  ${chalk.bold(label)}: ${chalk.cyan(value)}`);
}

/**
 * Pretty-printed JSON.
 */
export function json(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function cell(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return chalk.gray('null');
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Render result rows as a table. Columns come from the first row.
 */
export function table(rows: JsonObject[]): void {
  if (rows.length === 0) {
    console.log(chalk.gray('(no rows)'));
    return;
  }

  const head = Object.keys(rows[0]);
  const output = new Table({ head: head.map((key) => chalk.cyan(key)) });
  for (const data of rows) {
    output.push(head.map((key) => cell(data[key])));
  }
  console.log(output.toString());
}
