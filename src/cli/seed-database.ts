/**
 * Sample data generator for development databases.
 * Generates users, quotes, policies and payments with Faker.js.
 */

import { faker } from '@faker-js/faker';
import type { Knex } from 'knex';
import { TABLES } from '../services/database.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { PAYMENT_TYPE_LABELS } from '../types/models.js';

export interface SeedCounts {
  users: number;
  quotesPerUser: number;
  maxPaymentsPerPolicy: number;
}

export const DEFAULT_COUNTS: SeedCounts = {
  users: 10,
  quotesPerUser: 2,
  maxPaymentsPerPolicy: 3,
};

export interface SeedOptions {
  counts?: Partial<SeedCounts>;
  clock?: Clock;
  /** Fixed Faker seed for reproducible data. */
  seed?: number;
}

export interface SeedSummary {
  users: number;
  quotes: number;
  policies: number;
  payments: number;
}

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Remove every warehouse row, dependents first.
 */
export async function clearData(db: Knex): Promise<void> {
  await db(TABLES.features).del();
  await db(TABLES.payments).del();
  await db(TABLES.policies).del();
  await db(TABLES.quotes).del();
  await db(TABLES.users).del();
}

/**
 * Insert a consistent sample data set: about 75% of quotes are bindable,
 * half of those are bound 1-48 hours after creation, 80% of bound quotes
 * become policies, and each policy gets 1 to `maxPaymentsPerPolicy` payments.
 */
export async function seedDatabase(db: Knex, options: SeedOptions = {}): Promise<SeedSummary> {
  const counts = { ...DEFAULT_COUNTS, ...options.counts };
  const now = (options.clock ?? systemClock).now().getTime();
  if (options.seed !== undefined) {
    faker.seed(options.seed);
  }

  const summary: SeedSummary = { users: 0, quotes: 0, policies: 0, payments: 0 };

  await db.transaction(async (trx) => {
    for (let u = 0; u < counts.users; u++) {
      const firstName = faker.person.firstName();
      const lastName = faker.person.lastName();
      const [userId] = await trx(TABLES.users).insert({
        name: `${firstName} ${lastName}`,
        email: faker.internet.email({ firstName, lastName, provider: 'example.com' }).toLowerCase(),
      });
      summary.users++;

      for (let q = 0; q < counts.quotesPerUser; q++) {
        const createTime = now - faker.number.int({ min: 1, max: 30 }) * DAY_MS;
        const bindable = faker.datatype.boolean({ probability: 0.75 });
        const bound = bindable && faker.datatype.boolean();
        const bindTime = bound
          ? createTime + faker.number.int({ min: 1, max: 48 }) * HOUR_MS
          : null;

        const [quoteId] = await trx(TABLES.quotes).insert({
          user_id: userId,
          create_time: new Date(createTime).toISOString(),
          bind_time: bindTime === null ? null : new Date(bindTime).toISOString(),
          bindable,
        });
        summary.quotes++;

        if (!bound || !faker.datatype.boolean({ probability: 0.8 })) {
          continue;
        }

        const [policyId] = await trx(TABLES.policies).insert({
          user_id: userId,
          quote_id: quoteId,
        });
        summary.policies++;

        const paymentCount = faker.number.int({ min: 1, max: counts.maxPaymentsPerPolicy });
        for (let p = 0; p < paymentCount; p++) {
          await trx(TABLES.payments).insert({
            time: new Date(now - faker.number.int({ min: 0, max: 15 }) * DAY_MS).toISOString(),
            payment_type: faker.helpers.arrayElement(PAYMENT_TYPE_LABELS),
            policy_id: policyId,
            success: faker.datatype.boolean({ probability: 0.75 }),
          });
          summary.payments++;
        }
      }
    }
  });

  return summary;
}
