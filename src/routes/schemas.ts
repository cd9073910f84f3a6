/**
 * JSON schemas shared by the route plugins.
 */

export const idParamsSchema = {
  type: 'object',
  properties: {
    id: { type: 'integer' },
  },
  required: ['id'],
} as const;

export const userSchema = {
  type: 'object',
  properties: {
    id: { type: 'integer' },
    name: { type: 'string' },
    email: { type: ['string', 'null'] },
  },
} as const;

export const quoteSchema = {
  type: 'object',
  properties: {
    id: { type: 'integer' },
    user_id: { type: 'integer' },
    create_time: { type: ['string', 'null'] },
    bind_time: { type: ['string', 'null'] },
    bindable: { type: 'boolean' },
  },
} as const;

export const policySchema = {
  type: 'object',
  properties: {
    id: { type: 'integer' },
    user_id: { type: 'integer' },
    quote_id: { type: 'integer' },
  },
} as const;

export const paymentSchema = {
  type: 'object',
  properties: {
    id: { type: 'integer' },
    time: { type: 'string' },
    payment_type: { type: ['string', 'null'] },
    policy_id: { type: 'integer' },
    success: { type: 'boolean' },
  },
} as const;
