/**
 * Quote lifecycle: creation for an existing user and one-way binding.
 */

import type { Knex } from 'knex';
import { TABLES, toBoolean, type QuoteRow, type UserRow } from './database.js';
import { logger } from '../utils/logger.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { ValidationError } from '../types/errors.js';
import type { Quote } from '../types/models.js';

function toQuote(row: QuoteRow): Quote {
  return {
    id: row.id,
    user_id: row.user_id,
    create_time: row.create_time ?? null,
    bind_time: row.bind_time ?? null,
    bindable: toBoolean(row.bindable),
  };
}

export class QuoteService {
  constructor(
    private readonly db: Knex,
    private readonly clock: Clock = systemClock
  ) {}

  async listAll(): Promise<Quote[]> {
    const rows = await this.db<QuoteRow>(TABLES.quotes).select('*').orderBy('id');
    return rows.map(toQuote);
  }

  async getById(id: number): Promise<Quote | undefined> {
    const row = await this.db<QuoteRow>(TABLES.quotes).where({ id }).first();
    return row ? toQuote(row) : undefined;
  }

  async listByUser(userId: number): Promise<Quote[]> {
    const rows = await this.db<QuoteRow>(TABLES.quotes)
      .where({ user_id: userId })
      .orderBy('id');
    return rows.map(toQuote);
  }

  /**
   * Quotes that can still be bound.
   */
  async listBindable(): Promise<Quote[]> {
    const rows = await this.db<QuoteRow>(TABLES.quotes)
      .where({ bindable: true })
      .whereNull('bind_time')
      .orderBy('id');
    return rows.map(toQuote);
  }

  /**
   * Create an unbound quote stamped with the current time.
   * Returns undefined when the user does not exist.
   */
  async create(userId: number, bindable: boolean = true): Promise<Quote | undefined> {
    const user = await this.db<UserRow>(TABLES.users).where({ id: userId }).first();
    if (!user) {
      return undefined;
    }

    const createTime = this.clock.now().toISOString();
    const [id] = await this.db(TABLES.quotes).insert({
      user_id: userId,
      create_time: createTime,
      bind_time: null,
      bindable,
    });

    logger.debug(`Created quote ${id} for user ${userId}`);

    return {
      id,
      user_id: userId,
      create_time: createTime,
      bind_time: null,
      bindable,
    };
  }

  /**
   * Bind a quote. A quote binds at most once and only while bindable.
   * Returns undefined when the quote does not exist.
   */
  async bind(quoteId: number): Promise<Quote | undefined> {
    const quote = await this.getById(quoteId);
    if (!quote) {
      return undefined;
    }

    if (!quote.bindable) {
      throw new ValidationError('Quote is not bindable');
    }
    if (quote.bind_time !== null) {
      throw new ValidationError('Quote is already bound');
    }

    const bindTime = this.clock.now().toISOString();
    await this.db(TABLES.quotes).where({ id: quoteId }).update({ bind_time: bindTime });

    logger.info(`Bound quote ${quoteId}`);
    return { ...quote, bind_time: bindTime };
  }

  isBound(quote: Quote): boolean {
    return quote.bind_time !== null;
  }
}
