/**
 * Subset of the Stripe REST API objects this service reads.
 * https://stripe.com/docs/api/payment_intents/object
 */

export interface StripePaymentIntent {
  id: string;
  object: 'payment_intent';
  amount: number;
  currency: string;
  status: string;
  client_secret: string | null;
  last_payment_error: { message?: string; code?: string } | null;
  metadata: Record<string, string>;
}

export interface StripeRefund {
  id: string;
  object: 'refund';
  amount: number;
  currency: string;
  payment_intent: string | null;
  /** pending, requires_action, succeeded, failed or canceled */
  status: string | null;
}

export interface StripeErrorBody {
  error?: {
    type?: string;
    code?: string;
    message?: string;
  };
}

export type StripeFormValue = string | number | undefined;

export interface StripeRequest {
  method: 'GET' | 'POST';
  path: string;
  form?: Record<string, StripeFormValue>;
  idempotencyKey?: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

export function isStripePaymentIntent(
  value: unknown,
): value is StripePaymentIntent {
  return (
    isRecord(value) &&
    value.object === 'payment_intent' &&
    typeof value.id === 'string' &&
    typeof value.status === 'string' &&
    typeof value.amount === 'number'
  );
}

export function isStripeRefund(value: unknown): value is StripeRefund {
  return (
    isRecord(value) && value.object === 'refund' && typeof value.id === 'string'
  );
}
