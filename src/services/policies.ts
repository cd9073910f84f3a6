/**
 * Policy creation from a bound quote.
 */

import type { Knex } from 'knex';
import { TABLES, type PolicyRow, type QuoteRow, type UserRow } from './database.js';
import { logger } from '../utils/logger.js';
import { NotFoundError, ValidationError } from '../types/errors.js';
import type { Policy } from '../types/models.js';

export class PolicyService {
  constructor(private readonly db: Knex) {}

  async listAll(): Promise<Policy[]> {
    return this.db<PolicyRow>(TABLES.policies).select('id', 'user_id', 'quote_id').orderBy('id');
  }

  async getById(id: number): Promise<Policy | undefined> {
    return this.db<PolicyRow>(TABLES.policies)
      .select('id', 'user_id', 'quote_id')
      .where({ id })
      .first();
  }

  async listByUser(userId: number): Promise<Policy[]> {
    return this.db<PolicyRow>(TABLES.policies)
      .select('id', 'user_id', 'quote_id')
      .where({ user_id: userId })
      .orderBy('id');
  }

  async getByQuote(quoteId: number): Promise<Policy | undefined> {
    return this.db<PolicyRow>(TABLES.policies)
      .select('id', 'user_id', 'quote_id')
      .where({ quote_id: quoteId })
      .first();
  }

  /**
   * Create a policy for a user from one of their bound quotes.
   * Each quote yields at most one policy.
   */
  async create(userId: number, quoteId: number): Promise<Policy> {
    const user = await this.db<UserRow>(TABLES.users).where({ id: userId }).first();
    if (!user) {
      throw new NotFoundError(`User ${userId} not found`);
    }

    const quote = await this.db<QuoteRow>(TABLES.quotes).where({ id: quoteId }).first();
    if (!quote) {
      throw new NotFoundError(`Quote ${quoteId} not found`);
    }

    if (quote.user_id !== userId) {
      throw new ValidationError('Quote does not belong to the specified user');
    }
    if (!quote.bind_time) {
      throw new ValidationError('Quote must be bound before creating a policy');
    }
    if (await this.getByQuote(quoteId)) {
      throw new ValidationError('Quote already has a policy');
    }

    const [id] = await this.db(TABLES.policies).insert({
      user_id: userId,
      quote_id: quoteId,
    });

    logger.info(`Created policy ${id} from quote ${quoteId}`);
    return { id, user_id: userId, quote_id: quoteId };
  }

  async delete(id: number): Promise<boolean> {
    const deleted = await this.db(TABLES.policies).where({ id }).del();
    return deleted > 0;
  }
}
