/**
 * Natural language to SQL gateway: describes the warehouse schema to the
 * LLM, parses the generated query, and runs read-only SQL.
 */

import type { Knex } from 'knex';
import { SchemaInspector } from 'knex-schema-inspector';
import { ENTITY_TABLES, executeQuery } from './database.js';
import type { LLMService } from './llm.js';
import { logger } from '../utils/logger.js';
import { SQLExecutionError, ValidationError } from '../types/errors.js';
import { PAYMENT_TYPE_LABELS, type SqlConversion, type SqlExecutionResult } from '../types/models.js';

const SYSTEM_PROMPT = 'You are a helpful SQL expert assistant.';

const RELATIONSHIPS = [
  'User has many Quotes and Policies',
  'Quote belongs to User and has many Policies',
  'Policy belongs to User and Quote, has many PaymentTransactions',
  'PaymentTransaction belongs to Policy',
];

function buildPrompt(schema: string, question: string): string {
  return `
You are a SQL expert. Convert the following natural language query to SQL based on the database schema provided.

Database Schema:
${schema}

Natural Language Query: ${question}

Please provide:
1. A valid SQL query
2. A brief explanation of what the query does

Format your response as:
SQL: [your sql query here]
EXPLANATION: [brief explanation here]

Important notes:
- Use proper table and column names from the schema
- Use appropriate JOINs when needed
- Consider using LIMIT for large result sets
- Make sure the query is syntactically correct for SQLite
- Do NOT include semicolons at the end of the SQL query
- Return only the SQL query without any extra formatting or semicolons
`;
}

/**
 * Pull the `SQL:` and `EXPLANATION:` lines out of a completion.
 */
export function parseConversion(content: string): SqlConversion {
  const raw = content.trim();
  let sql = '';
  let explanation = '';

  for (const line of raw.split('\n')) {
    if (line.startsWith('SQL:')) {
      sql = line.slice(4).trim();
    } else if (line.startsWith('EXPLANATION:')) {
      explanation = line.slice(12).trim();
    }
  }

  return { sql, explanation, raw_response: raw };
}

/**
 * Strip one trailing semicolon and add a LIMIT to SELECTs without one.
 * Anything other than a SELECT is rejected.
 */
export function prepareQuery(sql: string, limit: number): string {
  let query = sql.trim();
  if (query.endsWith(';')) {
    query = query.slice(0, -1);
  }

  const lowered = query.toLowerCase().trim();
  if (!lowered.startsWith('select')) {
    throw new ValidationError('Only SELECT queries are allowed');
  }
  if (!lowered.includes('limit')) {
    query = `${query} LIMIT ${limit}`;
  }
  return query;
}

export class SqlGateway {
  private readonly inspector: ReturnType<typeof SchemaInspector>;

  constructor(
    private readonly db: Knex,
    private readonly llm: LLMService,
    private readonly defaultLimit: number = 100
  ) {
    this.inspector = SchemaInspector(db);
  }

  /**
   * Flat text description of the entity tables for the prompt.
   */
  async describeSchema(): Promise<string> {
    const lines: string[] = [];

    for (const table of ENTITY_TABLES) {
      lines.push('', `Table: ${table}`);

      const columns = await this.inspector.columnInfo(table);
      for (const column of columns) {
        const nullable = column.is_nullable ? 'NULL' : 'NOT NULL';
        const pk = column.is_primary_key ? 'PRIMARY KEY' : '';
        lines.push(`  - ${column.name}: ${column.data_type} ${nullable} ${pk}`.trimEnd());
      }

      const foreignKeys = await this.inspector.foreignKeys(table);
      for (const fk of foreignKeys) {
        lines.push(
          `  - Foreign Key: ${fk.table}.${fk.column} -> ${fk.foreign_key_table}.${fk.foreign_key_column}`
        );
      }
    }

    lines.push('', 'Enums:', `  - PaymentType: ${PAYMENT_TYPE_LABELS.join(', ')}`);
    lines.push('', 'Relationships:', ...RELATIONSHIPS.map((line) => `  - ${line}`));

    return lines.join('\n');
  }

  /**
   * Ask the LLM for a SQLite query answering `question`.
   *
   * @throws LLMAuthError when no key is configured
   * @throws LLMError when the provider call fails
   */
  async convert(question: string): Promise<SqlConversion> {
    const schema = await this.describeSchema();
    const content = await this.llm.complete(buildPrompt(schema, question), SYSTEM_PROMPT, {
      temperature: 0.1,
      maxOutputTokens: 500,
    });

    const conversion = parseConversion(content);
    logger.info(`Generated SQL: ${conversion.sql}`);
    return conversion;
  }

  /**
   * Run a read-only query, capped at `limit` rows unless it sets its own LIMIT.
   */
  async execute(sql: string, limit: number = this.defaultLimit): Promise<SqlExecutionResult> {
    const query = prepareQuery(sql, limit);

    try {
      const data = await executeQuery(this.db, query);
      const columns = data.length > 0 ? Object.keys(data[0]) : [];
      return { data, columns, row_count: data.length, query };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`SQL execution error: ${message}`);
      throw new SQLExecutionError(`Failed to execute query: ${message}`, query);
    }
  }
}
