/**
 * Shared fixtures: in-memory databases, a fixed clock, scripted payment
 * outcomes and a canned LLM.
 */

import type { Knex } from 'knex';
import { buildKnexConfig } from '../src/config.js';
import { createDb, createSchema } from '../src/services/database.js';
import { createWarehouse, type Warehouse } from '../src/services/warehouse.js';
import { LLMService, type TextGenerator } from '../src/services/llm.js';
import type { PaymentAuthorizer } from '../src/services/payment-authorizer.js';
import { ManualClock } from '../src/utils/clock.js';

export const T0 = '2024-01-01T00:00:00.000Z';

export async function createTestDb(): Promise<Knex> {
  const db = createDb(buildKnexConfig(':memory:'));
  await createSchema(db);
  return db;
}

/**
 * Returns the given outcomes in order, then repeats the last one.
 */
export class ScriptedPaymentAuthorizer implements PaymentAuthorizer {
  readonly calls: string[] = [];

  constructor(private readonly outcomes: readonly boolean[]) {}

  authorize(paymentType: string): boolean {
    const outcome = this.outcomes[Math.min(this.calls.length, this.outcomes.length - 1)];
    this.calls.push(paymentType);
    return outcome;
  }
}

/**
 * A text generator that always answers `response`, or always fails.
 */
export function cannedGenerator(response: string | Error): TextGenerator {
  return async () => {
    if (response instanceof Error) {
      throw response;
    }
    return response;
  };
}

export interface TestWarehouse {
  db: Knex;
  clock: ManualClock;
  authorizer: ScriptedPaymentAuthorizer;
  warehouse: Warehouse;
}

export async function createTestWarehouse(
  options: { outcomes?: boolean[]; llm?: LLMService } = {}
): Promise<TestWarehouse> {
  const db = await createTestDb();
  const clock = new ManualClock(T0);
  const authorizer = new ScriptedPaymentAuthorizer(options.outcomes ?? [true]);
  const warehouse = createWarehouse(db, {
    clock,
    authorizer,
    llm: options.llm ?? new LLMService({ maxRetries: 1 }),
  });
  return { db, clock, authorizer, warehouse };
}

/**
 * User with one bound quote and a policy on it. Returns their ids.
 */
export async function seedPolicy(
  warehouse: Warehouse,
  name: string = 'Ada Lovelace'
): Promise<{ userId: number; quoteId: number; policyId: number }> {
  const user = await warehouse.users.create(name, null);
  const quote = await warehouse.quotes.create(user.id);
  if (!quote) {
    throw new Error('quote was not created');
  }
  await warehouse.quotes.bind(quote.id);
  const policy = await warehouse.policies.create(user.id, quote.id);
  return { userId: user.id, quoteId: quote.id, policyId: policy.id };
}
