/**
 * Fastify application factory.
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { LoggerOptions } from 'pino';
import warehousePlugin from './plugins/warehouse.js';
import type { Warehouse } from './services/warehouse.js';
import { userRoutes } from './routes/users.js';
import { quoteRoutes } from './routes/quotes.js';
import { policyRoutes } from './routes/policies.js';
import { paymentRoutes } from './routes/payments.js';
import { analyticsRoutes } from './routes/analytics.js';
import { featureRoutes } from './routes/features.js';
import { openaiRoutes } from './routes/openai.js';
import { utilityRoutes } from './routes/utility.js';
import { loggerConfig } from './utils/logger.js';
import {
  LLMAuthError,
  LLMError,
  NotFoundError,
  SQLExecutionError,
  ValidationError,
} from './types/errors.js';

export interface AppOptions {
  warehouse: Warehouse;
  prefix?: string;
  logger?: LoggerOptions | boolean;
  closeOnShutdown?: boolean;
}

export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const prefix = options.prefix ?? '/api/v1';

  const fastify = Fastify({
    logger: options.logger ?? loggerConfig,
    ignoreTrailingSlash: true,
  });

  await fastify.register(cors, {
    origin: '*',
  });

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: 'Policy Warehouse API',
        description: 'Insurance data warehouse with analytics, a feature store and NL-to-SQL',
        version: '1.0.0',
      },
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
  });

  await fastify.register(warehousePlugin, {
    warehouse: options.warehouse,
    closeOnShutdown: options.closeOnShutdown,
  });

  // Set before the route plugins so their contexts inherit it.
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof NotFoundError) {
      reply.status(404).send({
        error: 'NotFoundError',
        message: error.message,
      });
    } else if (error instanceof ValidationError) {
      reply.status(400).send({
        error: 'ValidationError',
        message: error.message,
      });
    } else if (error.validation) {
      reply.status(400).send({
        error: 'ValidationError',
        message: error.message,
      });
    } else if (error instanceof LLMAuthError) {
      reply.status(401).send({
        error: 'LLMAuthError',
        message: error.message,
      });
    } else if (error instanceof LLMError) {
      reply.status(500).send({
        error: 'LLMError',
        message: error.message,
      });
    } else if (error instanceof SQLExecutionError) {
      reply.status(500).send({
        error: 'SQLExecutionError',
        message: error.message,
        sql: error.sql,
      });
    } else if (error.statusCode !== undefined && error.statusCode < 500) {
      reply.status(error.statusCode).send({
        error: error.name,
        message: error.message,
      });
    } else {
      request.log.error(error);
      reply.status(500).send({
        error: 'InternalServerError',
        message: error.message || 'An unexpected error occurred',
      });
    }
  });

  await fastify.register(userRoutes, { prefix: `${prefix}/users` });
  await fastify.register(quoteRoutes, { prefix: `${prefix}/quotes` });
  await fastify.register(policyRoutes, { prefix: `${prefix}/policies` });
  await fastify.register(paymentRoutes, { prefix: `${prefix}/payments` });
  await fastify.register(analyticsRoutes, { prefix: `${prefix}/analytics` });
  await fastify.register(featureRoutes, { prefix: `${prefix}/features` });
  await fastify.register(openaiRoutes, { prefix: `${prefix}/openai` });
  await fastify.register(utilityRoutes, { apiPrefix: prefix });

  return fastify;
}
