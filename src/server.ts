/**
 * Server lifecycle: open the database, build the app, listen.
 */

import type { FastifyInstance } from 'fastify';
import { buildApp } from './app.js';
import { config } from './config.js';
import { initDb, openDatabase } from './services/database.js';
import { createWarehouse } from './services/warehouse.js';
import { LLMService } from './services/llm.js';
import { logger } from './utils/logger.js';

export interface ServerOptions {
  host?: string;
  port?: number;
  databasePath?: string;
}

export async function startServer(options: ServerOptions = {}): Promise<FastifyInstance> {
  const host = options.host ?? config.HOST;
  const port = options.port ?? config.PORT;

  logger.info('Starting Policy Warehouse API server...');

  const db = openDatabase(options.databasePath ?? config.DATABASE_PATH);
  await initDb(db);

  const warehouse = createWarehouse(db, {
    llm: new LLMService({ apiKey: config.OPENAI_API_KEY, model: config.LLM_MODEL }),
    queryLimit: config.DEFAULT_QUERY_LIMIT,
  });

  const fastify = await buildApp({
    warehouse,
    prefix: config.API_PREFIX,
    closeOnShutdown: true,
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      logger.info('Shutting down Policy Warehouse API server...');
      fastify.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, 'Error during shutdown');
          process.exit(1);
        }
      );
    });
  }

  await fastify.listen({ port, host });
  logger.info(`Server running at http://localhost:${port}`);
  logger.info(`API docs at http://localhost:${port}/docs`);

  return fastify;
}
