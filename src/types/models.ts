/**
 * Domain types for the warehouse entities, analytics results and feature store.
 * Field names follow the wire format (snake_case) so services can return
 * them to routes unchanged.
 */

// ============================================================================
// ENTITIES
// ============================================================================

export interface User {
  id: number;
  name: string;
  email: string | null;
}

export interface Quote {
  id: number;
  user_id: number;
  create_time: string | null;
  bind_time: string | null;
  bindable: boolean;
}

export interface Policy {
  id: number;
  user_id: number;
  quote_id: number;
}

export interface PaymentTransaction {
  id: number;
  time: string;
  payment_type: PaymentTypeLabel | null;
  policy_id: number;
  success: boolean;
}

// ============================================================================
// PAYMENT TYPES
// ============================================================================

/**
 * Accepted payment type keys and the display strings they are stored as.
 * This is a lookup table on purpose: 'CREDIT' maps to 'Credit', and no
 * other casing of either form is accepted on input.
 */
export const PAYMENT_TYPES = {
  CREDIT: 'Credit',
  DEBIT: 'Debit',
  PREPAID: 'Prepaid',
} as const;

export type PaymentTypeKey = keyof typeof PAYMENT_TYPES;
export type PaymentTypeLabel = (typeof PAYMENT_TYPES)[PaymentTypeKey];

export const PAYMENT_TYPE_KEYS: readonly PaymentTypeKey[] = ['CREDIT', 'DEBIT', 'PREPAID'];
export const PAYMENT_TYPE_LABELS: readonly PaymentTypeLabel[] = Object.values(PAYMENT_TYPES);

export function isPaymentTypeKey(value: string): value is PaymentTypeKey {
  return Object.hasOwn(PAYMENT_TYPES, value);
}

export function isPaymentTypeLabel(value: unknown): value is PaymentTypeLabel {
  return PAYMENT_TYPE_LABELS.some((label) => label === value);
}

// ============================================================================
// ANALYTICS
// ============================================================================

export interface GeneralStats {
  total_users: number;
  total_quotes: number;
  total_policies: number;
  total_payments: number;
  successful_payments: number;
  payment_success_rate: number;
}

export interface PaymentTypeStats {
  total: number;
  successful: number;
  failed: number;
  success_rate: number;
}

export type PaymentStatsByType = Record<PaymentTypeLabel, PaymentTypeStats>;

export interface UserStats {
  total_users: number;
  users_with_quotes: number;
  users_with_policies: number;
  users_without_quotes: number;
  conversion_rate: number;
}

export interface QuoteStats {
  total_quotes: number;
  bound_quotes: number;
  unbound_quotes: number;
  bindable_quotes: number;
  bind_rate: number;
}

export interface PolicyStats {
  total_policies: number;
  policies_with_payments: number;
  policies_without_payments: number;
  payment_adoption_rate: number;
}

// ============================================================================
// FEATURE STORE
// ============================================================================

export const FeatureType = {
  USER_POLICY_TIME_OF_PURCHASE: 'user_policy_time_of_purchase',
  QUOTE_CREATION_TO_BINDING_TIME: 'quote_creation_to_binding_time',
  USER_FAILED_TRANSACTION_COUNT: 'user_failed_transaction_count',
  PAYMENT_TYPE: 'payment_type',
} as const;

export type FeatureType = (typeof FeatureType)[keyof typeof FeatureType];

export const FEATURE_TYPES: readonly FeatureType[] = Object.values(FeatureType);

export function isFeatureType(value: unknown): value is FeatureType {
  return FEATURE_TYPES.some((type) => type === value);
}

export type FeatureDataType = 'datetime' | 'integer' | 'string';

/**
 * A computed or cached feature value.
 * Timestamps are Dates in memory and ISO-8601 strings on the wire.
 */
export type FeatureValue = Date | number | string | null;

export interface FeatureDefinition {
  feature_type: FeatureType;
  name: string;
  description: string;
  entity_type: 'user_id' | 'quote_id' | 'payment_transaction_id';
  data_type: FeatureDataType;
}

export interface FeatureMetadata extends FeatureDefinition {
  created_at: string;
}

/**
 * One entry of a batch feature request. Values arrive untyped from the
 * training endpoint, so the feature type is validated per item.
 */
export interface FeatureRequest {
  feature_type?: string;
  entity_id?: string | number;
}

export interface FeatureResultSuccess {
  feature_type: FeatureType;
  entity_id: string;
  feature_value: FeatureValue;
  success: true;
}

export interface FeatureResultFailure {
  feature_type: string;
  entity_id: string;
  feature_value: null;
  success: false;
  error: string;
}

export type FeatureResult = FeatureResultSuccess | FeatureResultFailure;

/**
 * Counts of successfully extracted features, by feature type.
 */
export type ExtractionCounts = Record<FeatureType, number>;

// ============================================================================
// NL-TO-SQL
// ============================================================================

export interface SqlConversion {
  sql: string;
  explanation: string;
  raw_response: string;
}

export interface SqlExecutionResult {
  data: Record<string, unknown>[];
  columns: string[];
  row_count: number;
  query: string;
}

// ============================================================================
// REQUEST BODIES
// ============================================================================

export interface UserBody {
  name: string;
  email?: string | null;
}

export interface QuoteBody {
  user_id: number;
  bindable?: boolean;
}

export interface PolicyBody {
  user_id: number;
  quote_id: number;
}

export interface PaymentBody {
  policy_id: number;
  payment_type: string;
}

export interface IdParams {
  id: number;
}
