/**
 * Read-only aggregate statistics over the warehouse tables.
 */

import type { Knex } from 'knex';
import { TABLES, countDistinct, countRows } from './database.js';
import { percentage } from '../types/utils.js';
import {
  PAYMENT_TYPE_LABELS,
  type GeneralStats,
  type PaymentStatsByType,
  type PaymentTypeLabel,
  type PaymentTypeStats,
  type PolicyStats,
  type QuoteStats,
  type UserStats,
} from '../types/models.js';

export class AnalyticsService {
  constructor(private readonly db: Knex) {}

  async getGeneralStats(): Promise<GeneralStats> {
    const [totalUsers, totalQuotes, totalPolicies, totalPayments, successfulPayments] =
      await Promise.all([
        countRows(this.db(TABLES.users)),
        countRows(this.db(TABLES.quotes)),
        countRows(this.db(TABLES.policies)),
        countRows(this.db(TABLES.payments)),
        countRows(this.db(TABLES.payments).where({ success: true })),
      ]);

    return {
      total_users: totalUsers,
      total_quotes: totalQuotes,
      total_policies: totalPolicies,
      total_payments: totalPayments,
      successful_payments: successfulPayments,
      payment_success_rate: percentage(successfulPayments, totalPayments),
    };
  }

  async getPaymentStatsByType(): Promise<PaymentStatsByType> {
    const entries = await Promise.all(
      PAYMENT_TYPE_LABELS.map(
        async (label): Promise<[PaymentTypeLabel, PaymentTypeStats]> => {
          const total = await countRows(
            this.db(TABLES.payments).where({ payment_type: label })
          );
          const successful = await countRows(
            this.db(TABLES.payments).where({ payment_type: label, success: true })
          );
          return [
            label,
            {
              total,
              successful,
              failed: total - successful,
              success_rate: percentage(successful, total),
            },
          ];
        }
      )
    );

    const byLabel = new Map(entries);
    const stats = (label: PaymentTypeLabel): PaymentTypeStats =>
      byLabel.get(label) ?? { total: 0, successful: 0, failed: 0, success_rate: 0 };

    return {
      Credit: stats('Credit'),
      Debit: stats('Debit'),
      Prepaid: stats('Prepaid'),
    };
  }

  /**
   * Users counted through joins, so dangling rows of deleted users are ignored.
   */
  async getUserStats(): Promise<UserStats> {
    const totalUsers = await countRows(this.db(TABLES.users));
    const usersWithQuotes = await countDistinct(
      this.db(TABLES.users).join(TABLES.quotes, `${TABLES.quotes}.user_id`, `${TABLES.users}.id`),
      `${TABLES.users}.id`
    );
    const usersWithPolicies = await countDistinct(
      this.db(TABLES.users).join(
        TABLES.policies,
        `${TABLES.policies}.user_id`,
        `${TABLES.users}.id`
      ),
      `${TABLES.users}.id`
    );

    return {
      total_users: totalUsers,
      users_with_quotes: usersWithQuotes,
      users_with_policies: usersWithPolicies,
      users_without_quotes: totalUsers - usersWithQuotes,
      conversion_rate: percentage(usersWithPolicies, usersWithQuotes),
    };
  }

  async getQuoteStats(): Promise<QuoteStats> {
    const totalQuotes = await countRows(this.db(TABLES.quotes));
    const boundQuotes = await countRows(this.db(TABLES.quotes).whereNotNull('bind_time'));
    const bindableQuotes = await countRows(this.db(TABLES.quotes).where({ bindable: true }));

    return {
      total_quotes: totalQuotes,
      bound_quotes: boundQuotes,
      unbound_quotes: totalQuotes - boundQuotes,
      bindable_quotes: bindableQuotes,
      bind_rate: percentage(boundQuotes, totalQuotes),
    };
  }

  async getPolicyStats(): Promise<PolicyStats> {
    const totalPolicies = await countRows(this.db(TABLES.policies));
    const policiesWithPayments = await countDistinct(
      this.db(TABLES.policies).join(
        TABLES.payments,
        `${TABLES.payments}.policy_id`,
        `${TABLES.policies}.id`
      ),
      `${TABLES.policies}.id`
    );

    return {
      total_policies: totalPolicies,
      policies_with_payments: policiesWithPayments,
      policies_without_payments: totalPolicies - policiesWithPayments,
      payment_adoption_rate: percentage(policiesWithPayments, totalPolicies),
    };
  }
}
