/**
 * Feature store endpoints: single inference lookups, batch training
 * lookups, discovery and full extraction.
 *
 * These keep a `{ success, error }` envelope instead of the global error
 * body so that batch callers can read every outcome the same way.
 */

import type { FastifyInstance } from 'fastify';
import { ValidationError } from '../types/errors.js';
import {
  isFeatureType,
  type FeatureRequest,
  type FeatureValue,
} from '../types/models.js';

type WireFeatureValue = string | number | null;

function toWireValue(value: FeatureValue): WireFeatureValue {
  return value instanceof Date ? value.toISOString() : value;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const featureRequestSchema = {
  type: 'object',
  properties: {
    feature_type: { type: 'string' },
    entity_id: { type: ['string', 'integer'] },
  },
} as const;

export async function featureRoutes(fastify: FastifyInstance) {
  const { features, clock } = fastify.warehouse;

  // POST /inference - Single feature for real-time serving
  fastify.post<{ Body: FeatureRequest }>(
    '/inference',
    {
      schema: {
        description: 'Get a single feature for real-time inference',
        tags: ['features'],
        body: featureRequestSchema,
      },
    },
    async (request, reply) => {
      const featureType = request.body?.feature_type;
      const entityId = request.body?.entity_id;

      const failure = (status: number, error: string) =>
        reply.code(status).send({
          feature_type: featureType ?? null,
          entity_id: entityId ?? null,
          feature_value: null,
          computed_at: null,
          success: false,
          error,
        });

      if (!featureType || entityId === undefined || entityId === '') {
        return failure(400, 'Missing feature_type or entity_id');
      }
      if (!isFeatureType(featureType)) {
        return failure(400, `Invalid feature_type: ${featureType}`);
      }

      try {
        const value = await features.getOrCompute(featureType, entityId);
        return {
          feature_type: featureType,
          entity_id: String(entityId),
          feature_value: toWireValue(value),
          computed_at: clock.now().toISOString(),
          success: true,
        };
      } catch (error) {
        const status = error instanceof ValidationError ? 400 : 500;
        return failure(status, errorMessage(error));
      }
    }
  );

  // POST /training - Batch features for model training
  fastify.post<{ Body: { features?: FeatureRequest[] } }>(
    '/training',
    {
      schema: {
        description: 'Get multiple features for training purposes',
        tags: ['features'],
        body: {
          type: 'object',
          properties: {
            features: { type: 'array', items: featureRequestSchema },
          },
        },
      },
    },
    async (request, reply) => {
      const requests = request.body?.features ?? [];
      if (requests.length === 0) {
        return reply.code(400).send({
          results: [],
          total_requested: 0,
          total_successful: 0,
        });
      }

      try {
        const results = await features.batchCompute(requests);
        const computedAt = clock.now().toISOString();

        return {
          results: results.map((result) => ({
            ...result,
            feature_value: toWireValue(result.feature_value),
            computed_at: computedAt,
          })),
          total_requested: requests.length,
          total_successful: results.filter((result) => result.success).length,
        };
      } catch (error) {
        return reply.code(500).send({
          results: [],
          total_requested: 0,
          total_successful: 0,
          error: errorMessage(error),
        });
      }
    }
  );

  // GET /discovery - Available features
  fastify.get(
    '/discovery',
    { schema: { description: 'Discover available features', tags: ['features'] } },
    async () => features.listMetadata()
  );

  // POST /extract - Recompute every feature for every entity
  fastify.post(
    '/extract',
    { schema: { description: 'Run batch feature extraction', tags: ['features'] } },
    async (_request, reply) => {
      try {
        const counts = await features.extractAll();
        const total = Object.values(counts).reduce((sum, count) => sum + count, 0);
        return {
          message: 'Feature extraction completed successfully',
          features_extracted: counts,
          total_features: total,
        };
      } catch (error) {
        return reply.code(500).send({
          message: `Feature extraction failed: ${errorMessage(error)}`,
          features_extracted: {},
          total_features: 0,
        });
      }
    }
  );
}
