/**
 * User endpoints.
 */

import type { FastifyInstance } from 'fastify';
import type { IdParams, UserBody } from '../types/models.js';
import { NotFoundError, ValidationError } from '../types/errors.js';
import { sanitizeString, validateEmail, validateName } from '../utils/validators.js';
import { idParamsSchema, userSchema } from './schemas.js';

const userBodySchema = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    email: { type: ['string', 'null'] },
  },
  required: ['name'],
} as const;

/**
 * Validate and normalize a user payload. Blank emails become null.
 */
function readUserBody(body: UserBody): { name: string; email: string | null } {
  if (!validateName(body.name)) {
    throw new ValidationError(
      'Invalid name. Use 1-80 letters, spaces, hyphens or apostrophes.'
    );
  }

  const email = sanitizeString(body.email, 120);
  if (email !== null && !validateEmail(email)) {
    throw new ValidationError('Invalid email address');
  }

  return { name: body.name.trim(), email };
}

export async function userRoutes(fastify: FastifyInstance) {
  const { users } = fastify.warehouse;

  // GET / - List users
  fastify.get(
    '/',
    {
      schema: {
        description: 'Get all users',
        tags: ['users'],
        response: { 200: { type: 'array', items: userSchema } },
      },
    },
    async () => users.listAll()
  );

  // POST / - Create user
  fastify.post<{ Body: UserBody }>(
    '/',
    {
      schema: {
        description: 'Create a new user',
        tags: ['users'],
        body: userBodySchema,
        response: { 201: userSchema },
      },
    },
    async (request, reply) => {
      const { name, email } = readUserBody(request.body);
      const user = await users.create(name, email);
      reply.code(201);
      return user;
    }
  );

  // GET /:id - Get user
  fastify.get<{ Params: IdParams }>(
    '/:id',
    {
      schema: {
        description: 'Get a user by ID',
        tags: ['users'],
        params: idParamsSchema,
        response: { 200: userSchema },
      },
    },
    async (request) => {
      const user = await users.getById(request.params.id);
      if (!user) {
        throw new NotFoundError(`User ${request.params.id} not found`);
      }
      return user;
    }
  );

  // PUT /:id - Update user
  fastify.put<{ Params: IdParams; Body: UserBody }>(
    '/:id',
    {
      schema: {
        description: 'Update a user',
        tags: ['users'],
        params: idParamsSchema,
        body: userBodySchema,
        response: { 200: userSchema },
      },
    },
    async (request) => {
      const { name, email } = readUserBody(request.body);
      const changes = request.body.email === undefined ? { name } : { name, email };

      const user = await users.update(request.params.id, changes);
      if (!user) {
        throw new NotFoundError(`User ${request.params.id} not found`);
      }
      return user;
    }
  );

  // DELETE /:id - Delete user
  fastify.delete<{ Params: IdParams }>(
    '/:id',
    {
      schema: {
        description: 'Delete a user',
        tags: ['users'],
        params: idParamsSchema,
      },
    },
    async (request, reply) => {
      const deleted = await users.delete(request.params.id);
      if (!deleted) {
        throw new NotFoundError(`User ${request.params.id} not found`);
      }
      return reply.code(204).send();
    }
  );
}
