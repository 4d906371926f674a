import { PaymentIntentSnapshot } from '../../../../domain/commerce';
import { StripePaymentIntent, StripeRefund } from '../adapters/stripe-api.types';

/** Refund statuses that mean Stripe took the refund. */
const ACCEPTED_REFUND_STATUSES: readonly string[] = ['succeeded', 'pending'];

export class StripeMapper {
  static toSnapshot(intent: StripePaymentIntent): PaymentIntentSnapshot {
    return {
      id: intent.id,
      status: intent.status,
      amount: intent.amount,
      currency: intent.currency,
      clientSecret: intent.client_secret,
      lastPaymentErrorMessage: intent.last_payment_error?.message ?? null,
    };
  }

  static isRefundAccepted(refund: StripeRefund): boolean {
    return (
      refund.status !== null && ACCEPTED_REFUND_STATUSES.includes(refund.status)
    );
  }
}
