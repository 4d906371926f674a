/**
 * Order status
 *
 * An order is created `pending` and ends either `paid` (a payment for it
 * succeeded) or `canceled` (by its owner). Both outcomes are terminal.
 */
export enum OrderStatus {
  PENDING = 'pending',
  PAID = 'paid',
  CANCELED = 'canceled',
}

const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  [OrderStatus.PENDING]: [OrderStatus.PAID, OrderStatus.CANCELED],
  [OrderStatus.PAID]: [],
  [OrderStatus.CANCELED]: [],
};

export function canTransitionOrder(
  from: OrderStatus,
  to: OrderStatus,
): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

/**
 * Statuses an order may be in for a move to `to` to be legal. Used as the
 * guard of compare-and-set updates.
 */
export function orderSourcesFor(to: OrderStatus): OrderStatus[] {
  return Object.values(OrderStatus).filter((from) =>
    canTransitionOrder(from, to),
  );
}

/** Orders in these statuses block re-ordering the same movie. */
export const ORDER_STATUSES_HOLDING_MOVIES: readonly OrderStatus[] = [
  OrderStatus.PAID,
  OrderStatus.PENDING,
];
