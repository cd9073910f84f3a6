/**
 * Payment transactions against existing policies.
 */

import type { Knex } from 'knex';
import { TABLES, toBoolean, type PaymentRow, type PolicyRow } from './database.js';
import { RandomPaymentAuthorizer, type PaymentAuthorizer } from './payment-authorizer.js';
import { logger } from '../utils/logger.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { NotFoundError, ValidationError } from '../types/errors.js';
import {
  PAYMENT_TYPES,
  PAYMENT_TYPE_KEYS,
  isPaymentTypeKey,
  isPaymentTypeLabel,
  type PaymentTransaction,
  type PaymentTypeKey,
} from '../types/models.js';

function toPayment(row: PaymentRow): PaymentTransaction {
  return {
    id: row.id,
    time: row.time,
    payment_type: isPaymentTypeLabel(row.payment_type) ? row.payment_type : null,
    policy_id: row.policy_id,
    success: toBoolean(row.success),
  };
}

export interface PaymentServiceOptions {
  clock?: Clock;
  authorizer?: PaymentAuthorizer;
}

export class PaymentService {
  private readonly clock: Clock;
  private readonly authorizer: PaymentAuthorizer;

  constructor(
    private readonly db: Knex,
    options: PaymentServiceOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.authorizer = options.authorizer ?? new RandomPaymentAuthorizer();
  }

  async listAll(): Promise<PaymentTransaction[]> {
    const rows = await this.db<PaymentRow>(TABLES.payments).select('*').orderBy('id');
    return rows.map(toPayment);
  }

  async getById(id: number): Promise<PaymentTransaction | undefined> {
    const row = await this.db<PaymentRow>(TABLES.payments).where({ id }).first();
    return row ? toPayment(row) : undefined;
  }

  async listByPolicy(policyId: number): Promise<PaymentTransaction[]> {
    const rows = await this.db<PaymentRow>(TABLES.payments)
      .where({ policy_id: policyId })
      .orderBy('id');
    return rows.map(toPayment);
  }

  async listSuccessful(): Promise<PaymentTransaction[]> {
    const rows = await this.db<PaymentRow>(TABLES.payments)
      .where({ success: true })
      .orderBy('id');
    return rows.map(toPayment);
  }

  async listFailed(): Promise<PaymentTransaction[]> {
    const rows = await this.db<PaymentRow>(TABLES.payments)
      .where({ success: false })
      .orderBy('id');
    return rows.map(toPayment);
  }

  async listByType(paymentType: PaymentTypeKey): Promise<PaymentTransaction[]> {
    const rows = await this.db<PaymentRow>(TABLES.payments)
      .where({ payment_type: PAYMENT_TYPES[paymentType] })
      .orderBy('id');
    return rows.map(toPayment);
  }

  /**
   * Record a payment for a policy. The outcome comes from the authorizer.
   * `paymentType` must be one of CREDIT, DEBIT or PREPAID, exactly.
   */
  async create(policyId: number, paymentType: string): Promise<PaymentTransaction> {
    const policy = await this.db<PolicyRow>(TABLES.policies).where({ id: policyId }).first();
    if (!policy) {
      throw new NotFoundError(`Policy ${policyId} not found`);
    }

    if (!isPaymentTypeKey(paymentType)) {
      throw new ValidationError(
        `Invalid payment type. Must be one of: ${PAYMENT_TYPE_KEYS.join(', ')}`
      );
    }

    const label = PAYMENT_TYPES[paymentType];
    const success = this.authorizer.authorize(paymentType);
    const time = this.clock.now().toISOString();

    const [id] = await this.db(TABLES.payments).insert({
      time,
      payment_type: label,
      policy_id: policyId,
      success,
    });

    logger.info(
      `Payment ${id} on policy ${policyId} (${label}): ${success ? 'approved' : 'declined'}`
    );

    return { id, time, payment_type: label, policy_id: policyId, success };
  }
}
