/**
 * Natural language to SQL endpoints.
 */

import type { FastifyInstance } from 'fastify';

interface SetKeyBody {
  api_key?: string;
}

interface NaturalLanguageQueryBody {
  query?: string;
  limit?: number;
}

interface SqlQueryBody {
  sql?: string;
  limit?: number;
}

const limitSchema = {
  type: 'integer',
  minimum: 1,
  description: 'Maximum number of rows to return',
} as const;

export async function openaiRoutes(fastify: FastifyInstance) {
  const { llm, sql } = fastify.warehouse;

  fastify.post<{ Body: SetKeyBody }>(
    '/set-key',
    {
      schema: {
        description: 'Set the OpenAI API key',
        tags: ['openai'],
        body: {
          type: 'object',
          properties: { api_key: { type: 'string' } },
        },
      },
    },
    async (request, reply) => {
      const apiKey = request.body?.api_key;
      if (!apiKey) {
        return reply.code(400).send({ error: 'API key is required' });
      }

      if (await llm.setApiKey(apiKey)) {
        return { message: 'OpenAI API key set successfully' };
      }
      return reply.code(400).send({ error: 'Invalid OpenAI API key' });
    }
  );

  fastify.get(
    '/status',
    { schema: { description: 'Check if OpenAI is properly authenticated', tags: ['openai'] } },
    async (_request, reply) => {
      if (!llm.isAuthenticated()) {
        return reply.code(401).send({
          authenticated: false,
          message:
            'OpenAI API key not configured. Please set your API key using the /openai/set-key endpoint.',
        });
      }

      const { valid, message } = await llm.verify();
      if (!valid) {
        return reply.code(401).send({ authenticated: false, message });
      }
      return { authenticated: true, message };
    }
  );

  fastify.get(
    '/schema',
    { schema: { description: 'Get the database schema description', tags: ['openai'] } },
    async () => ({ schema: await sql.describeSchema() })
  );

  // POST /query - Convert natural language to SQL and execute it
  fastify.post<{ Body: NaturalLanguageQueryBody }>(
    '/query',
    {
      schema: {
        description: 'Convert natural language query to SQL and execute it',
        tags: ['openai'],
        body: {
          type: 'object',
          properties: {
            query: { type: 'string' },
            limit: limitSchema,
          },
        },
      },
    },
    async (request, reply) => {
      if (!llm.isAuthenticated()) {
        return reply.code(401).send({
          error:
            'OpenAI not configured. Please set your API key first using the /openai/set-key endpoint.',
        });
      }

      const question = request.body?.query;
      if (!question) {
        return reply.code(400).send({ error: 'Query is required' });
      }

      const conversion = await sql.convert(question);
      if (!conversion.sql) {
        return reply.code(400).send({ error: 'Failed to generate SQL query' });
      }

      const result = await sql.execute(conversion.sql, request.body.limit);
      return {
        sql: conversion.sql,
        explanation: conversion.explanation,
        data: result.data,
        columns: result.columns,
        row_count: result.row_count,
      };
    }
  );

  // POST /sql - Execute SQL directly
  fastify.post<{ Body: SqlQueryBody }>(
    '/sql',
    {
      schema: {
        description: 'Execute a SQL query directly',
        tags: ['openai'],
        body: {
          type: 'object',
          properties: {
            sql: { type: 'string' },
            limit: limitSchema,
          },
        },
      },
    },
    async (request, reply) => {
      const query = request.body?.sql;
      if (!query) {
        return reply.code(400).send({ error: 'SQL query is required' });
      }

      const result = await sql.execute(query, request.body.limit);
      return {
        sql: result.query,
        explanation: 'Direct SQL execution',
        data: result.data,
        columns: result.columns,
        row_count: result.row_count,
      };
    }
  );
}
