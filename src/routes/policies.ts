/**
 * Policy endpoints.
 */

import type { FastifyInstance } from 'fastify';
import type { IdParams, PolicyBody } from '../types/models.js';
import { NotFoundError } from '../types/errors.js';
import { idParamsSchema, policySchema } from './schemas.js';

export async function policyRoutes(fastify: FastifyInstance) {
  const { policies } = fastify.warehouse;

  fastify.get(
    '/',
    {
      schema: {
        description: 'Get all policies',
        tags: ['policies'],
        response: { 200: { type: 'array', items: policySchema } },
      },
    },
    async () => policies.listAll()
  );

  fastify.post<{ Body: PolicyBody }>(
    '/',
    {
      schema: {
        description: 'Create a policy from a bound quote',
        tags: ['policies'],
        body: {
          type: 'object',
          properties: {
            user_id: { type: 'integer' },
            quote_id: { type: 'integer' },
          },
          required: ['user_id', 'quote_id'],
        },
        response: { 201: policySchema },
      },
    },
    async (request, reply) => {
      const policy = await policies.create(request.body.user_id, request.body.quote_id);
      reply.code(201);
      return policy;
    }
  );

  fastify.get<{ Params: IdParams }>(
    '/:id',
    {
      schema: {
        description: 'Get a policy by ID',
        tags: ['policies'],
        params: idParamsSchema,
        response: { 200: policySchema },
      },
    },
    async (request) => {
      const policy = await policies.getById(request.params.id);
      if (!policy) {
        throw new NotFoundError(`Policy ${request.params.id} not found`);
      }
      return policy;
    }
  );
}
