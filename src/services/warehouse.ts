/**
 * Service container. One instance per database handle.
 */

import type { Knex } from 'knex';
import { UserService } from './users.js';
import { QuoteService } from './quotes.js';
import { PolicyService } from './policies.js';
import { PaymentService } from './payments.js';
import { AnalyticsService } from './analytics.js';
import { FeatureStoreService } from './feature-store.js';
import { LLMService } from './llm.js';
import { SqlGateway } from './sql-gateway.js';
import type { PaymentAuthorizer } from './payment-authorizer.js';
import { systemClock, type Clock } from '../utils/clock.js';

export interface WarehouseOptions {
  clock?: Clock;
  authorizer?: PaymentAuthorizer;
  llm?: LLMService;
  queryLimit?: number;
}

export interface Warehouse {
  db: Knex;
  clock: Clock;
  users: UserService;
  quotes: QuoteService;
  policies: PolicyService;
  payments: PaymentService;
  analytics: AnalyticsService;
  features: FeatureStoreService;
  llm: LLMService;
  sql: SqlGateway;
}

export function createWarehouse(db: Knex, options: WarehouseOptions = {}): Warehouse {
  const clock = options.clock ?? systemClock;
  const llm = options.llm ?? new LLMService();

  return {
    db,
    clock,
    users: new UserService(db),
    quotes: new QuoteService(db, clock),
    policies: new PolicyService(db),
    payments: new PaymentService(db, { clock, authorizer: options.authorizer }),
    analytics: new AnalyticsService(db),
    features: new FeatureStoreService(db, clock),
    llm,
    sql: new SqlGateway(db, llm, options.queryLimit),
  };
}
