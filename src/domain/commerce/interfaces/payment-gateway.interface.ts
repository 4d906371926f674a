/**
 * Contract every payment provider adapter implements.
 *
 * Amounts passed in are decimal strings in major units ("19.98"); snapshots
 * report amounts in the provider's minor units.
 */

export const PAYMENT_GATEWAY = Symbol('PAYMENT_GATEWAY');

/**
 * Provider-side status of a payment intent, as reported by the provider.
 */
export enum IntentStatus {
  REQUIRES_PAYMENT_METHOD = 'requires_payment_method',
  REQUIRES_CONFIRMATION = 'requires_confirmation',
  REQUIRES_ACTION = 'requires_action',
  PROCESSING = 'processing',
  REQUIRES_CAPTURE = 'requires_capture',
  SUCCEEDED = 'succeeded',
  CANCELED = 'canceled',
}

export interface InitiatePaymentOptions {
  /**
   * Forwarded to the provider so that repeated calls with the same key
   * return the same intent.
   */
  idempotencyKey?: string;
  metadata?: Record<string, string>;
}

export interface RefundOptions {
  /** Repeated refunds with the same key are applied once. */
  idempotencyKey?: string;
}

export interface PaymentIntentHandle {
  /** Secret the client uses to confirm the intent. */
  clientSecret: string;
  /** Provider's id of the intent (stored as `externalPaymentId`). */
  externalId: string;
}

export interface PaymentIntentSnapshot {
  id: string;
  status: IntentStatus | string;
  /** Minor units */
  amount: number;
  currency: string;
  clientSecret: string | null;
  lastPaymentErrorMessage: string | null;
}

export interface PaymentGateway {
  readonly providerName: string;

  initiatePayment(
    orderId: number,
    amount: string,
    currency: string,
    options?: InitiatePaymentOptions,
  ): Promise<PaymentIntentHandle>;

  /**
   * External id of the intent created by the most recent `initiatePayment`
   * call on this instance. Concurrent callers overwrite it; prefer the id on
   * the returned handle.
   */
  getLastPaymentIntentId(): string | null;

  getPaymentIntent(externalId: string): Promise<PaymentIntentSnapshot>;

  /** True iff the intent has succeeded. */
  completePayment(externalId: string): Promise<boolean>;

  /**
   * Refund a payment; the whole amount when `amount` is omitted.
   * @returns true when the provider accepted the refund
   */
  refundPayment(
    externalId: string,
    amount?: string,
    options?: RefundOptions,
  ): Promise<boolean>;
}
