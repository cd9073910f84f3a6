/**
 * Quote endpoints. PATCH binds a quote.
 */

import type { FastifyInstance } from 'fastify';
import type { IdParams, QuoteBody } from '../types/models.js';
import { NotFoundError } from '../types/errors.js';
import { idParamsSchema, quoteSchema } from './schemas.js';

export async function quoteRoutes(fastify: FastifyInstance) {
  const { quotes } = fastify.warehouse;

  fastify.get(
    '/',
    {
      schema: {
        description: 'Get all quotes',
        tags: ['quotes'],
        response: { 200: { type: 'array', items: quoteSchema } },
      },
    },
    async () => quotes.listAll()
  );

  fastify.post<{ Body: QuoteBody }>(
    '/',
    {
      schema: {
        description: 'Create a new quote',
        tags: ['quotes'],
        body: {
          type: 'object',
          properties: {
            user_id: { type: 'integer' },
            bindable: { type: 'boolean', default: true },
          },
          required: ['user_id'],
        },
        response: { 201: quoteSchema },
      },
    },
    async (request, reply) => {
      const quote = await quotes.create(request.body.user_id, request.body.bindable ?? true);
      if (!quote) {
        throw new NotFoundError(`User ${request.body.user_id} not found`);
      }
      reply.code(201);
      return quote;
    }
  );

  fastify.get<{ Params: IdParams }>(
    '/:id',
    {
      schema: {
        description: 'Get a quote by ID',
        tags: ['quotes'],
        params: idParamsSchema,
        response: { 200: quoteSchema },
      },
    },
    async (request) => {
      const quote = await quotes.getById(request.params.id);
      if (!quote) {
        throw new NotFoundError(`Quote ${request.params.id} not found`);
      }
      return quote;
    }
  );

  fastify.patch<{ Params: IdParams }>(
    '/:id',
    {
      schema: {
        description: 'Bind a quote (set bind_time)',
        tags: ['quotes'],
        params: idParamsSchema,
        response: { 200: quoteSchema },
      },
    },
    async (request) => {
      const quote = await quotes.bind(request.params.id);
      if (!quote) {
        throw new NotFoundError(`Quote ${request.params.id} not found`);
      }
      return quote;
    }
  );
}
