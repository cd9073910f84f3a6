/**
 * Feature store: four deterministic features computed from the warehouse
 * tables, cached one row per (feature type, entity id).
 *
 * Reads go through the cache first and fall back to computing and storing
 * the value. A stored null reads as absent, so it is recomputed next time.
 */

import type { Knex } from 'knex';
import {
  TABLES,
  countRows,
  type FeatureMetadataRow,
  type FeatureRow,
  type PaymentRow,
  type QuoteRow,
  type UserRow,
} from './database.js';
import { logger } from '../utils/logger.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { ValidationError } from '../types/errors.js';
import { isIntegerString } from '../types/utils.js';
import {
  FEATURE_TYPES,
  FeatureType,
  isFeatureType,
  isPaymentTypeLabel,
  type ExtractionCounts,
  type FeatureDefinition,
  type FeatureMetadata,
  type FeatureRequest,
  type FeatureResult,
  type FeatureValue,
} from '../types/models.js';

export const FEATURE_DEFINITIONS: Readonly<Record<FeatureType, FeatureDefinition>> = {
  [FeatureType.USER_POLICY_TIME_OF_PURCHASE]: {
    feature_type: FeatureType.USER_POLICY_TIME_OF_PURCHASE,
    name: 'User Policy Time of Purchase',
    description: 'For a given user_id, returns the policy payment transaction time',
    entity_type: 'user_id',
    data_type: 'datetime',
  },
  [FeatureType.QUOTE_CREATION_TO_BINDING_TIME]: {
    feature_type: FeatureType.QUOTE_CREATION_TO_BINDING_TIME,
    name: 'Time from Quote Creation to Binding',
    description:
      'For a given quote_id, returns the difference between binding time and creation time in seconds',
    entity_type: 'quote_id',
    data_type: 'integer',
  },
  [FeatureType.USER_FAILED_TRANSACTION_COUNT]: {
    feature_type: FeatureType.USER_FAILED_TRANSACTION_COUNT,
    name: 'Count of User Failed Transactions',
    description: 'For a given user_id, returns the number of failed payment transactions',
    entity_type: 'user_id',
    data_type: 'integer',
  },
  [FeatureType.PAYMENT_TYPE]: {
    feature_type: FeatureType.PAYMENT_TYPE,
    name: 'Type of Payment',
    description: 'For a given payment_transaction_id, returns the payment type',
    entity_type: 'payment_transaction_id',
    data_type: 'string',
  },
};

/**
 * Normalize an entity id to the integer it names.
 */
export function parseEntityId(entityId: string | number): number {
  const text = String(entityId).trim();
  const id = isIntegerString(text) ? Number(text) : Number.NaN;
  if (!Number.isSafeInteger(id)) {
    throw new ValidationError(`Invalid entity id: ${entityId}`);
  }
  return id;
}

/**
 * Timestamps become ISO strings, other values JSON text. Null stays null.
 */
export function serializeFeatureValue(value: FeatureValue): string | null {
  if (value === null) {
    return null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return JSON.stringify(value);
}

export function deserializeFeatureValue(
  featureType: FeatureType,
  stored: string
): FeatureValue {
  if (FEATURE_DEFINITIONS[featureType].data_type === 'datetime') {
    return new Date(stored);
  }

  const parsed: unknown = JSON.parse(stored);
  if (typeof parsed === 'number' || typeof parsed === 'string') {
    return parsed;
  }
  return null;
}

export class FeatureStoreService {
  private initialized = false;

  constructor(
    private readonly db: Knex,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Seed feature_metadata with any missing feature types.
   */
  async init(): Promise<void> {
    const existing = await this.db<FeatureMetadataRow>(TABLES.featureMetadata).pluck(
      'feature_type'
    );
    const missing = FEATURE_TYPES.filter((type) => !existing.includes(type));

    for (const type of missing) {
      await this.db(TABLES.featureMetadata).insert({
        ...FEATURE_DEFINITIONS[type],
        created_at: this.clock.now().toISOString(),
      });
    }

    if (missing.length > 0) {
      logger.info(`Seeded metadata for ${missing.length} feature types`);
    }
    this.initialized = true;
  }

  private async ensureInitialized(): Promise<void> {
    if (!this.initialized) {
      await this.init();
    }
  }

  // ==========================================================================
  // FORMULAS
  // ==========================================================================

  /**
   * Time of the user's most recent successful payment, across all policies.
   */
  private async userPolicyTimeOfPurchase(userId: number): Promise<Date | null> {
    const row: Pick<PaymentRow, 'time'> | undefined = await this.db(TABLES.payments)
      .select(`${TABLES.payments}.time`)
      .join(TABLES.policies, `${TABLES.payments}.policy_id`, `${TABLES.policies}.id`)
      .where(`${TABLES.policies}.user_id`, userId)
      .andWhere(`${TABLES.payments}.success`, true)
      .orderBy(`${TABLES.payments}.time`, 'desc')
      .first();

    return row ? new Date(row.time) : null;
  }

  private async quoteCreationToBindingTime(quoteId: number): Promise<number | null> {
    const quote = await this.db<QuoteRow>(TABLES.quotes).where({ id: quoteId }).first();
    if (!quote || !quote.create_time || !quote.bind_time) {
      return null;
    }

    const elapsed = new Date(quote.bind_time).getTime() - new Date(quote.create_time).getTime();
    return Math.trunc(elapsed / 1000);
  }

  private async userFailedTransactionCount(userId: number): Promise<number> {
    return countRows(
      this.db(TABLES.payments)
        .join(TABLES.policies, `${TABLES.payments}.policy_id`, `${TABLES.policies}.id`)
        .where(`${TABLES.policies}.user_id`, userId)
        .andWhere(`${TABLES.payments}.success`, false)
    );
  }

  private async paymentType(paymentId: number): Promise<string | null> {
    const payment = await this.db<PaymentRow>(TABLES.payments).where({ id: paymentId }).first();
    if (!payment || !isPaymentTypeLabel(payment.payment_type)) {
      return null;
    }
    return payment.payment_type;
  }

  // ==========================================================================
  // CACHE-ASIDE
  // ==========================================================================

  /**
   * Compute a feature from the warehouse tables, bypassing the cache.
   */
  async compute(featureType: string, entityId: string | number): Promise<FeatureValue> {
    if (!isFeatureType(featureType)) {
      throw new ValidationError(`Unknown feature type: ${featureType}`);
    }
    const id = parseEntityId(entityId);

    switch (featureType) {
      case FeatureType.USER_POLICY_TIME_OF_PURCHASE:
        return this.userPolicyTimeOfPurchase(id);
      case FeatureType.QUOTE_CREATION_TO_BINDING_TIME:
        return this.quoteCreationToBindingTime(id);
      case FeatureType.USER_FAILED_TRANSACTION_COUNT:
        return this.userFailedTransactionCount(id);
      case FeatureType.PAYMENT_TYPE:
        return this.paymentType(id);
    }
  }

  /**
   * Upsert the cached value. Concurrent writers are not serialized;
   * the last write wins.
   */
  async store(
    featureType: FeatureType,
    entityId: string | number,
    value: FeatureValue
  ): Promise<void> {
    const key = {
      feature_type: featureType,
      entity_id: String(parseEntityId(entityId)),
    };
    const row = {
      feature_value: serializeFeatureValue(value),
      computed_at: this.clock.now().toISOString(),
    };

    const existing = await this.db<FeatureRow>(TABLES.features).where(key).first();
    if (existing) {
      await this.db(TABLES.features).where({ id: existing.id }).update(row);
    } else {
      await this.db(TABLES.features).insert({ ...key, ...row });
    }
  }

  /**
   * Cached value, or null when nothing (or a null) is stored.
   */
  async get(featureType: FeatureType, entityId: string | number): Promise<FeatureValue> {
    const row = await this.db<FeatureRow>(TABLES.features)
      .where({
        feature_type: featureType,
        entity_id: String(parseEntityId(entityId)),
      })
      .first();

    if (!row || row.feature_value === null) {
      return null;
    }
    return deserializeFeatureValue(featureType, row.feature_value);
  }

  async computeAndStore(
    featureType: FeatureType,
    entityId: string | number
  ): Promise<FeatureValue> {
    const value = await this.compute(featureType, entityId);
    await this.store(featureType, entityId, value);
    return value;
  }

  async getOrCompute(
    featureType: string,
    entityId: string | number,
    force: boolean = false
  ): Promise<FeatureValue> {
    if (!isFeatureType(featureType)) {
      throw new ValidationError(`Unknown feature type: ${featureType}`);
    }
    await this.ensureInitialized();

    if (!force) {
      const cached = await this.get(featureType, entityId);
      if (cached !== null) {
        logger.debug(`Feature cache hit: ${featureType}/${entityId}`);
        return cached;
      }
    }

    logger.debug(`Feature cache miss: ${featureType}/${entityId}`);
    return this.computeAndStore(featureType, entityId);
  }

  /**
   * Resolve each request independently; one failure does not stop the batch.
   * Results keep the request order.
   */
  async batchCompute(requests: readonly FeatureRequest[]): Promise<FeatureResult[]> {
    const results: FeatureResult[] = [];

    for (const request of requests) {
      const requestedType = request.feature_type ?? 'unknown';
      const requestedId = request.entity_id ?? 'unknown';

      try {
        if (!isFeatureType(request.feature_type)) {
          throw new ValidationError(`Unknown feature type: ${requestedType}`);
        }
        if (request.entity_id === undefined) {
          throw new ValidationError('Missing entity_id');
        }

        const value = await this.getOrCompute(request.feature_type, request.entity_id);
        results.push({
          feature_type: request.feature_type,
          entity_id: String(request.entity_id),
          feature_value: value,
          success: true,
        });
      } catch (error) {
        results.push({
          feature_type: requestedType,
          entity_id: String(requestedId),
          feature_value: null,
          success: false,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return results;
  }

  async listMetadata(): Promise<FeatureMetadata[]> {
    await this.ensureInitialized();
    const rows = await this.db<FeatureMetadataRow>(TABLES.featureMetadata)
      .select('*')
      .orderBy('id');

    const metadata: FeatureMetadata[] = [];
    for (const row of rows) {
      if (isFeatureType(row.feature_type)) {
        const definition = FEATURE_DEFINITIONS[row.feature_type];
        metadata.push({
          feature_type: row.feature_type,
          name: row.name,
          description: row.description,
          entity_type: definition.entity_type,
          data_type: definition.data_type,
          created_at: row.created_at,
        });
      }
    }
    return metadata;
  }

  /**
   * Recompute and store every feature for every entity.
   * Entities whose computation fails are skipped and not counted.
   */
  async extractAll(): Promise<ExtractionCounts> {
    await this.ensureInitialized();

    const counts: ExtractionCounts = {
      [FeatureType.USER_POLICY_TIME_OF_PURCHASE]: 0,
      [FeatureType.QUOTE_CREATION_TO_BINDING_TIME]: 0,
      [FeatureType.USER_FAILED_TRANSACTION_COUNT]: 0,
      [FeatureType.PAYMENT_TYPE]: 0,
    };

    const userIds = await this.db<UserRow>(TABLES.users).orderBy('id').pluck('id');
    const quoteIds = await this.db<QuoteRow>(TABLES.quotes).orderBy('id').pluck('id');
    const paymentIds = await this.db<PaymentRow>(TABLES.payments).orderBy('id').pluck('id');

    const jobs: Array<[FeatureType, number[]]> = [
      [FeatureType.USER_POLICY_TIME_OF_PURCHASE, userIds],
      [FeatureType.QUOTE_CREATION_TO_BINDING_TIME, quoteIds],
      [FeatureType.USER_FAILED_TRANSACTION_COUNT, userIds],
      [FeatureType.PAYMENT_TYPE, paymentIds],
    ];

    for (const [featureType, ids] of jobs) {
      for (const id of ids) {
        try {
          await this.computeAndStore(featureType, id);
          counts[featureType] += 1;
        } catch (error) {
          logger.warn({ err: error }, `Skipping ${featureType} for entity ${id}`);
        }
      }
    }

    logger.info(counts, 'Feature extraction complete');
    return counts;
  }
}
