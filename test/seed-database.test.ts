import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Knex } from 'knex';
import { clearData, seedDatabase } from '../src/cli/seed-database.js';
import {
  TABLES,
  closeDb,
  countRows,
  type PaymentRow,
  type PolicyRow,
  type QuoteRow,
} from '../src/services/database.js';
import { isPaymentTypeLabel } from '../src/types/models.js';
import { ManualClock } from '../src/utils/clock.js';
import { createTestDb, T0 } from './helpers.js';

describe('seedDatabase', () => {
  let db: Knex;

  beforeEach(async () => {
    db = await createTestDb();
  });

  afterEach(async () => {
    await closeDb(db);
  });

  it('inserts consistent sample data', async () => {
    const summary = await seedDatabase(db, {
      counts: { users: 6, quotesPerUser: 3 },
      clock: new ManualClock(T0),
      seed: 7,
    });

    expect(summary.users).toBe(6);
    expect(summary.quotes).toBe(18);
    expect(await countRows(db(TABLES.users))).toBe(summary.users);
    expect(await countRows(db(TABLES.quotes))).toBe(summary.quotes);
    expect(await countRows(db(TABLES.policies))).toBe(summary.policies);
    expect(await countRows(db(TABLES.payments))).toBe(summary.payments);

    const quotes = new Map(
      (await db<QuoteRow>(TABLES.quotes).select('*')).map((quote) => [quote.id, quote])
    );
    for (const quote of quotes.values()) {
      const created = Date.parse(quote.create_time ?? '');
      expect(created).toBeLessThan(Date.parse(T0));
      if (quote.bind_time !== null) {
        expect(quote.bindable).toBe(1);
        expect(Date.parse(quote.bind_time)).toBeGreaterThan(created);
      }
    }

    const policies = await db<PolicyRow>(TABLES.policies).select('*');
    for (const policy of policies) {
      const quote = quotes.get(policy.quote_id);
      expect(quote?.user_id).toBe(policy.user_id);
      expect(quote?.bind_time).not.toBeNull();
    }

    const payments = await db<PaymentRow>(TABLES.payments).select('*');
    for (const payment of payments) {
      expect(isPaymentTypeLabel(payment.payment_type)).toBe(true);
      expect(policies.some((policy) => policy.id === payment.policy_id)).toBe(true);
    }
  });

  it('clears every warehouse row', async () => {
    await seedDatabase(db, { counts: { users: 2 }, seed: 1 });

    await clearData(db);

    expect(await countRows(db(TABLES.users))).toBe(0);
    expect(await countRows(db(TABLES.quotes))).toBe(0);
    expect(await countRows(db(TABLES.payments))).toBe(0);
  });
});
