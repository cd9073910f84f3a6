/**
 * Decides whether a simulated payment goes through.
 */

import type { PaymentTypeKey } from '../types/models.js';

export interface PaymentAuthorizer {
  authorize(paymentType: PaymentTypeKey): boolean;
}

export const SUCCESS_RATES: Readonly<Record<PaymentTypeKey, number>> = {
  CREDIT: 0.85,
  DEBIT: 0.9,
  PREPAID: 0.75,
};

export const DEFAULT_SUCCESS_RATE = 0.8;

/**
 * Approves a payment with the success rate of its type.
 */
export class RandomPaymentAuthorizer implements PaymentAuthorizer {
  constructor(private readonly random: () => number = Math.random) {}

  authorize(paymentType: PaymentTypeKey): boolean {
    const rate = SUCCESS_RATES[paymentType] ?? DEFAULT_SUCCESS_RATE;
    return this.random() < rate;
  }
}
