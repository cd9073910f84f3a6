/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { join } from 'path';
import type { Knex } from 'knex';

// Load .env file if it exists
const envPath = join(process.cwd(), '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // Database Configuration
  DATABASE_PATH: z.string().default('./data/data_warehouse.db'),
  BACKUP_DIR: z.string().default('./data/backups'),
  MAX_BACKUPS: z.coerce.number().int().positive().default(10),

  // Server Configuration
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8000),
  API_PREFIX: z
    .string()
    .regex(/^\/[\w\-/]*[^/]$/, 'must start with "/" and not end with "/"')
    .default('/api/v1'),
  LOG_LEVEL: z
    .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'])
    .default('INFO'),

  // LLM Configuration
  LLM_MODEL: z.string().default('gpt-4'),
  OPENAI_API_KEY: z
    .string()
    .min(1)
    .optional()
    .describe('Initial key for the NL-to-SQL gateway; can also be set at runtime'),
  DEFAULT_QUERY_LIMIT: z.coerce.number().int().positive().default(100),
});

/**
 * Type for the validated configuration object.
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse configuration from an environment map. Throws ZodError on invalid input.
 */
export function parseConfig(env: Record<string, string | undefined>): Config {
  return ConfigSchema.parse(env);
}

/**
 * Parse and validate configuration from environment variables.
 * Exits the process with a readable report when validation fails.
 */
export function loadConfig(): Config {
  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Configuration validation failed:');
      for (const issue of error.issues) {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

/**
 * The part of a better-sqlite3 connection the pool hook touches.
 */
interface SqliteConnection {
  pragma(source: string): unknown;
}

/**
 * Build the Knex config for the SQLite database file.
 * Pass ':memory:' for a throwaway database.
 *
 * better-sqlite3 enforces foreign keys by default; the warehouse does not,
 * so deleting a user or policy leaves its dependent rows in place.
 */
export function buildKnexConfig(filename: string): Knex.Config {
  return {
    client: 'better-sqlite3',
    connection: {
      filename,
    },
    useNullAsDefault: true,
    pool: {
      afterCreate: (
        conn: SqliteConnection,
        done: (err: Error | null, conn: SqliteConnection) => void
      ) => {
        conn.pragma('foreign_keys = OFF');
        done(null, conn);
      },
    },
  };
}

/**
 * Global configuration instance.
 */
export const config = loadConfig();
