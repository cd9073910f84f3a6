/**
 * Database service using Knex.js over a single SQLite file (better-sqlite3).
 * Owns the table layout, row types and the raw-query helpers.
 */

import { mkdirSync } from 'fs';
import { dirname } from 'path';
import knex, { type Knex } from 'knex';
import { buildKnexConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import type { QueryRow } from '../types/utils.js';

/**
 * Table names.
 */
export const TABLES = {
  users: 'users',
  quotes: 'quotes',
  policies: 'policies',
  payments: 'payment_transactions',
  features: 'features',
  featureMetadata: 'feature_metadata',
} as const;

/**
 * Tables holding warehouse entities (as opposed to feature store bookkeeping).
 */
export const ENTITY_TABLES = [
  TABLES.users,
  TABLES.quotes,
  TABLES.policies,
  TABLES.payments,
] as const;

// SQLite hands booleans back as 0/1, so row types accept both.

export interface UserRow {
  id: number;
  name: string;
  email: string | null;
}

export interface QuoteRow {
  id: number;
  user_id: number;
  create_time: string | null;
  bind_time: string | null;
  bindable: boolean | number | null;
}

export interface PolicyRow {
  id: number;
  user_id: number;
  quote_id: number;
}

export interface PaymentRow {
  id: number;
  time: string;
  payment_type: string | null;
  policy_id: number;
  success: boolean | number | null;
}

export interface FeatureRow {
  id: number;
  feature_type: string;
  entity_id: string;
  feature_value: string | null;
  computed_at: string;
}

export interface FeatureMetadataRow {
  id: number;
  feature_type: string;
  name: string;
  description: string;
  entity_type: string;
  data_type: string;
  created_at: string;
}

/**
 * Create a Knex instance. Nothing is opened until the first query.
 */
export function createDb(knexConfig: Knex.Config): Knex {
  return knex(knexConfig);
}

/**
 * Open the SQLite file at `filename`, creating its directory if needed.
 */
export function openDatabase(filename: string): Knex {
  if (filename !== ':memory:') {
    mkdirSync(dirname(filename), { recursive: true });
  }
  return createDb(buildKnexConfig(filename));
}

/**
 * Test the connection and make sure every table exists.
 */
export async function initDb(db: Knex): Promise<void> {
  try {
    await db.raw('SELECT 1');
  } catch (error) {
    logger.error({ err: error }, 'Failed to connect to database');
    throw error;
  }

  await createSchema(db);
  logger.info('Database initialized');
}

/**
 * Create all tables that do not exist yet.
 */
export async function createSchema(db: Knex): Promise<void> {
  if (!(await db.schema.hasTable(TABLES.users))) {
    await db.schema.createTable(TABLES.users, (table) => {
      table.increments('id');
      table.string('name', 80).notNullable();
      table.string('email', 120).nullable();
    });
  }

  if (!(await db.schema.hasTable(TABLES.quotes))) {
    await db.schema.createTable(TABLES.quotes, (table) => {
      table.increments('id');
      table.integer('user_id').notNullable().references('id').inTable(TABLES.users);
      table.datetime('create_time').nullable();
      table.datetime('bind_time').nullable();
      table.boolean('bindable').nullable();
    });
  }

  if (!(await db.schema.hasTable(TABLES.policies))) {
    await db.schema.createTable(TABLES.policies, (table) => {
      table.increments('id');
      table.integer('user_id').notNullable().references('id').inTable(TABLES.users);
      table.integer('quote_id').notNullable().references('id').inTable(TABLES.quotes);
    });
  }

  if (!(await db.schema.hasTable(TABLES.payments))) {
    await db.schema.createTable(TABLES.payments, (table) => {
      table.increments('id');
      table.datetime('time').notNullable();
      table.string('payment_type', 16).nullable();
      table.integer('policy_id').notNullable().references('id').inTable(TABLES.policies);
      table.boolean('success').nullable();
    });
  }

  if (!(await db.schema.hasTable(TABLES.features))) {
    await db.schema.createTable(TABLES.features, (table) => {
      table.increments('id');
      table.string('feature_type', 64).notNullable();
      table.string('entity_id', 50).notNullable();
      table.text('feature_value').nullable();
      table.datetime('computed_at').notNullable();
      table.index(['feature_type', 'entity_id'], 'idx_feature_type_entity');
    });
  }

  if (!(await db.schema.hasTable(TABLES.featureMetadata))) {
    await db.schema.createTable(TABLES.featureMetadata, (table) => {
      table.increments('id');
      table.string('feature_type', 64).notNullable().unique();
      table.string('name', 100).notNullable();
      table.text('description').notNullable();
      table.string('entity_type', 50).notNullable();
      table.string('data_type', 50).notNullable();
      table.datetime('created_at').notNullable();
    });
  }
}

/**
 * Drop every table, dependents first.
 */
export async function dropSchema(db: Knex): Promise<void> {
  await db.schema.dropTableIfExists(TABLES.featureMetadata);
  await db.schema.dropTableIfExists(TABLES.features);
  await db.schema.dropTableIfExists(TABLES.payments);
  await db.schema.dropTableIfExists(TABLES.policies);
  await db.schema.dropTableIfExists(TABLES.quotes);
  await db.schema.dropTableIfExists(TABLES.users);
}

function isQueryRow(value: unknown): value is QueryRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Execute a raw SELECT query and return its rows.
 * better-sqlite3 returns the row array directly from knex.raw.
 */
export async function executeQuery(
  db: Knex,
  sql: string
): Promise<QueryRow[]> {
  const result: unknown = await db.raw(sql);

  if (Array.isArray(result)) {
    return result.filter(isQueryRow);
  }

  return [];
}

/**
 * Run a count(*) over the given query builder.
 */
export async function countRows(query: Knex.QueryBuilder): Promise<number> {
  const row: unknown = await query.count({ count: '*' }).first();
  return isQueryRow(row) ? Number(row.count ?? 0) : 0;
}

/**
 * Run a count(distinct column) over the given query builder.
 */
export async function countDistinct(
  query: Knex.QueryBuilder,
  column: string
): Promise<number> {
  const row: unknown = await query.countDistinct({ count: column }).first();
  return isQueryRow(row) ? Number(row.count ?? 0) : 0;
}

/**
 * Normalize a SQLite boolean column.
 */
export function toBoolean(value: boolean | number | null): boolean {
  return value === true || value === 1;
}

/**
 * Close database connection.
 */
export async function closeDb(db: Knex): Promise<void> {
  await db.destroy();
  logger.info('Database connection closed');
}
