import { describe, expect, it } from 'vitest';
import { RandomPaymentAuthorizer, SUCCESS_RATES } from '../src/services/payment-authorizer.js';

describe('RandomPaymentAuthorizer', () => {
  it('approves draws below the success rate of the type', () => {
    expect(new RandomPaymentAuthorizer(() => 0.84).authorize('CREDIT')).toBe(true);
    expect(new RandomPaymentAuthorizer(() => 0.89).authorize('DEBIT')).toBe(true);
    expect(new RandomPaymentAuthorizer(() => 0.74).authorize('PREPAID')).toBe(true);
  });

  it('declines draws at or above the success rate', () => {
    expect(new RandomPaymentAuthorizer(() => 0.85).authorize('CREDIT')).toBe(false);
    expect(new RandomPaymentAuthorizer(() => 0.9).authorize('DEBIT')).toBe(false);
    expect(new RandomPaymentAuthorizer(() => 0.75).authorize('PREPAID')).toBe(false);
  });

  it('uses the documented rates', () => {
    expect(SUCCESS_RATES).toEqual({ CREDIT: 0.85, DEBIT: 0.9, PREPAID: 0.75 });
  });
});
