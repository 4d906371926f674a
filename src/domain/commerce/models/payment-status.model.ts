/**
 * Payment status
 *
 * Lifecycle of one attempt to pay an order. `pending` and `processing` are
 * the open statuses; an order has at most one open payment at a time.
 */
export enum PaymentStatus {
  PENDING = 'pending',
  PROCESSING = 'processing',
  SUCCESSFUL = 'successful',
  CANCELED = 'canceled',
  REFUNDED = 'refunded',
}

const PAYMENT_TRANSITIONS: Record<PaymentStatus, readonly PaymentStatus[]> = {
  [PaymentStatus.PENDING]: [
    PaymentStatus.PROCESSING,
    PaymentStatus.SUCCESSFUL,
    PaymentStatus.CANCELED,
  ],
  // the provider can send a processing intent back to requires_payment_method
  [PaymentStatus.PROCESSING]: [
    PaymentStatus.PENDING,
    PaymentStatus.SUCCESSFUL,
    PaymentStatus.CANCELED,
  ],
  [PaymentStatus.SUCCESSFUL]: [PaymentStatus.REFUNDED],
  [PaymentStatus.CANCELED]: [],
  [PaymentStatus.REFUNDED]: [],
};

export const OPEN_PAYMENT_STATUSES: readonly PaymentStatus[] = [
  PaymentStatus.PENDING,
  PaymentStatus.PROCESSING,
];

/** A settled payment is the one a refund applies to. */
export const SETTLED_PAYMENT_STATUSES: readonly PaymentStatus[] = [
  PaymentStatus.SUCCESSFUL,
  PaymentStatus.REFUNDED,
];

export function isOpenPaymentStatus(status: PaymentStatus): boolean {
  return OPEN_PAYMENT_STATUSES.includes(status);
}

export function canTransitionPayment(
  from: PaymentStatus,
  to: PaymentStatus,
): boolean {
  return PAYMENT_TRANSITIONS[from].includes(to);
}

export function paymentSourcesFor(to: PaymentStatus): PaymentStatus[] {
  return Object.values(PaymentStatus).filter((from) =>
    canTransitionPayment(from, to),
  );
}
