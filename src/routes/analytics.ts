/**
 * Analytics and reporting endpoints.
 */

import type { FastifyInstance } from 'fastify';

export async function analyticsRoutes(fastify: FastifyInstance) {
  const { analytics } = fastify.warehouse;

  fastify.get(
    '/stats',
    { schema: { description: 'Get comprehensive database statistics', tags: ['analytics'] } },
    async () => analytics.getGeneralStats()
  );

  fastify.get(
    '/payment-stats',
    { schema: { description: 'Get detailed payment statistics by type', tags: ['analytics'] } },
    async () => analytics.getPaymentStatsByType()
  );

  fastify.get(
    '/user-stats',
    { schema: { description: 'Get user-related statistics', tags: ['analytics'] } },
    async () => analytics.getUserStats()
  );

  fastify.get(
    '/quote-stats',
    { schema: { description: 'Get quote binding statistics', tags: ['analytics'] } },
    async () => analytics.getQuoteStats()
  );

  fastify.get(
    '/policy-stats',
    { schema: { description: 'Get policy payment adoption statistics', tags: ['analytics'] } },
    async () => analytics.getPolicyStats()
  );
}
