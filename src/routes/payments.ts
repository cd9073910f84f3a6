/**
 * Payment transaction endpoints.
 */

import type { FastifyInstance } from 'fastify';
import type { IdParams, PaymentBody } from '../types/models.js';
import { NotFoundError } from '../types/errors.js';
import { idParamsSchema, paymentSchema } from './schemas.js';

export async function paymentRoutes(fastify: FastifyInstance) {
  const { payments } = fastify.warehouse;

  fastify.get(
    '/',
    {
      schema: {
        description: 'Get all payment transactions',
        tags: ['payments'],
        response: { 200: { type: 'array', items: paymentSchema } },
      },
    },
    async () => payments.listAll()
  );

  // POST / - Record a payment; the outcome is simulated
  fastify.post<{ Body: PaymentBody }>(
    '/',
    {
      schema: {
        description: 'Create a new payment transaction',
        tags: ['payments'],
        body: {
          type: 'object',
          properties: {
            policy_id: { type: 'integer' },
            payment_type: { type: 'string', description: 'CREDIT, DEBIT or PREPAID' },
          },
          required: ['policy_id', 'payment_type'],
        },
        response: { 201: paymentSchema },
      },
    },
    async (request, reply) => {
      const payment = await payments.create(request.body.policy_id, request.body.payment_type);
      reply.code(201);
      return payment;
    }
  );

  fastify.get<{ Params: IdParams }>(
    '/:id',
    {
      schema: {
        description: 'Get a payment transaction by ID',
        tags: ['payments'],
        params: idParamsSchema,
        response: { 200: paymentSchema },
      },
    },
    async (request) => {
      const payment = await payments.getById(request.params.id);
      if (!payment) {
        throw new NotFoundError(`Payment ${request.params.id} not found`);
      }
      return payment;
    }
  );
}
