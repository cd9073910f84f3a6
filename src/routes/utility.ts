/**
 * Utility endpoints (health, service index).
 */

import type { FastifyInstance } from 'fastify';

export interface UtilityRouteOptions {
  apiPrefix: string;
}

export async function utilityRoutes(fastify: FastifyInstance, options: UtilityRouteOptions) {
  // GET / - Service index
  fastify.get('/', async () => ({
    name: 'Policy Warehouse API',
    version: '1.0.0',
    api: options.apiPrefix,
    docs: '/docs',
  }));

  // GET /health - Health check
  fastify.get('/health', async (_request, reply) => {
    try {
      await fastify.warehouse.db.raw('SELECT 1');
      return { status: 'healthy', database: 'connected' };
    } catch (error) {
      fastify.log.error(error);
      return reply.code(503).send({ status: 'unhealthy', database: 'disconnected' });
    }
  });
}
