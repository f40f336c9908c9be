/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import type { Knex } from 'knex';
import { ConfigError } from './types/errors.js';

// Get directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const rootDir = join(__dirname, '..');

const SOURCE_URL_PATTERN = /^([A-Z][A-Z0-9_]*)_DATABASE_URL$/;

const DEFAULT_PORTS = {
  mysql2: 3306,
  pg: 5432,
} as const;

const POOL = { min: 2, max: 10 };

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // Server Configuration
  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'])
    .default('INFO'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().max(65535).default(8000),

  // Database Configuration
  DATABASE_TYPE: z.enum(['mysql2', 'pg', 'sqlite3']).default('mysql2'),
  DATABASE_HOST: z.string().min(1).default('localhost'),
  DATABASE_PORT: z.coerce.number().int().positive().max(65535).optional(),
  DATABASE_USER: z.string().min(1).default('root'),
  DATABASE_PASSWORD: z.string().default(''),
  SQLITE_DIR: z
    .string()
    .min(1)
    .default('./data')
    .describe('Directory holding one <source>.sqlite file per source'),

  // Routing Configuration
  CATALOG_PATH: z
    .string()
    .min(1)
    .optional()
    .describe('Path to a source catalog JSON file (defaults to the bundled catalog)'),
  READ_ONLY: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

type BaseConfig = z.infer<typeof ConfigSchema>;

/**
 * Validated configuration plus the per-source connection URL overrides
 * (`<SOURCE>_DATABASE_URL`, keyed by lowercased source name).
 */
export interface Config extends BaseConfig {
  DATABASE_URLS: Record<string, string>;
}

function collectSourceUrls(env: NodeJS.ProcessEnv): Record<string, string> {
  const urls: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    const match = SOURCE_URL_PATTERN.exec(key);
    if (match && value) {
      urls[match[1].toLowerCase()] = value;
    }
  }
  return urls;
}

/**
 * Validate an environment mapping. Pure: throws ConfigError instead of exiting.
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    ...result.data,
    DATABASE_URLS: collectSourceUrls(env),
  };
}

function mysqlConnection(config: Config, source: string, url?: string): Knex.Config {
  let connection = {
    host: config.DATABASE_HOST,
    port: config.DATABASE_PORT ?? DEFAULT_PORTS.mysql2,
    user: config.DATABASE_USER,
    password: config.DATABASE_PASSWORD,
    database: source,
    decimalNumbers: true,
  };

  if (url) {
    const parsed = new URL(url);
    connection = {
      ...connection,
      host: parsed.hostname,
      port: parsed.port ? Number(parsed.port) : DEFAULT_PORTS.mysql2,
      user: decodeURIComponent(parsed.username),
      password: decodeURIComponent(parsed.password),
      database: parsed.pathname.replace(/^\//, '') || source,
    };
  }

  return { client: 'mysql2', connection, pool: POOL };
}

function pgConnection(config: Config, source: string, url?: string): Knex.Config {
  return {
    client: 'pg',
    connection: url ?? {
      host: config.DATABASE_HOST,
      port: config.DATABASE_PORT ?? DEFAULT_PORTS.pg,
      user: config.DATABASE_USER,
      password: config.DATABASE_PASSWORD,
      database: source,
    },
    pool: POOL,
  };
}

function sqliteConnection(config: Config, source: string, url?: string): Knex.Config {
  return {
    client: 'better-sqlite3',
    connection: {
      filename: url ?? join(config.SQLITE_DIR, `${source}.sqlite`),
    },
    useNullAsDefault: true,
  };
}

/**
 * Build one Knex config per source. A `<SOURCE>_DATABASE_URL` variable
 * replaces the shared host settings for that source.
 */
export function connectionsFor(
  config: Config,
  sources: string[]
): Record<string, Knex.Config> {
  const connections: Record<string, Knex.Config> = {};

  for (const source of sources) {
    const url = config.DATABASE_URLS[source];
    switch (config.DATABASE_TYPE) {
      case 'mysql2':
        connections[source] = mysqlConnection(config, source, url);
        break;
      case 'pg':
        connections[source] = pgConnection(config, source, url);
        break;
      case 'sqlite3':
        connections[source] = sqliteConnection(config, source, url);
        break;
    }
  }

  return connections;
}

/**
 * Parse and validate configuration from environment variables.
 */
export function loadConfig(): Config {
  // Load .env file if it exists
  const envPath = join(rootDir, '.env');
  if (existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }

  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('Configuration validation failed:');
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Global configuration instance.
 */
export const config = loadConfig();
