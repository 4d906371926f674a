import {
  canTransitionPayment,
  isOpenPaymentStatus,
  paymentSourcesFor,
  PaymentStatus,
} from './payment-status.model';
import {
  canTransitionOrder,
  orderSourcesFor,
  OrderStatus,
} from './order-status.model';

describe('payment state machine', () => {
  it.each([
    [PaymentStatus.PENDING, PaymentStatus.PROCESSING],
    [PaymentStatus.PENDING, PaymentStatus.SUCCESSFUL],
    [PaymentStatus.PENDING, PaymentStatus.CANCELED],
    [PaymentStatus.PROCESSING, PaymentStatus.PENDING],
    [PaymentStatus.PROCESSING, PaymentStatus.SUCCESSFUL],
    [PaymentStatus.PROCESSING, PaymentStatus.CANCELED],
    [PaymentStatus.SUCCESSFUL, PaymentStatus.REFUNDED],
  ])('allows %s -> %s', (from, to) => {
    expect(canTransitionPayment(from, to)).toBe(true);
  });

  it.each([
    [PaymentStatus.SUCCESSFUL, PaymentStatus.PENDING],
    [PaymentStatus.SUCCESSFUL, PaymentStatus.CANCELED],
    [PaymentStatus.CANCELED, PaymentStatus.SUCCESSFUL],
    [PaymentStatus.REFUNDED, PaymentStatus.SUCCESSFUL],
    [PaymentStatus.PENDING, PaymentStatus.REFUNDED],
  ])('rejects %s -> %s', (from, to) => {
    expect(canTransitionPayment(from, to)).toBe(false);
  });

  it('derives compare-and-set guards from the transition table', () => {
    expect(paymentSourcesFor(PaymentStatus.SUCCESSFUL)).toEqual([
      PaymentStatus.PENDING,
      PaymentStatus.PROCESSING,
    ]);
    expect(paymentSourcesFor(PaymentStatus.REFUNDED)).toEqual([
      PaymentStatus.SUCCESSFUL,
    ]);
    expect(paymentSourcesFor(PaymentStatus.PENDING)).toEqual([
      PaymentStatus.PROCESSING,
    ]);
  });

  it('treats pending and processing as open', () => {
    expect(isOpenPaymentStatus(PaymentStatus.PENDING)).toBe(true);
    expect(isOpenPaymentStatus(PaymentStatus.PROCESSING)).toBe(true);
    expect(isOpenPaymentStatus(PaymentStatus.SUCCESSFUL)).toBe(false);
  });
});

describe('order state machine', () => {
  it('only leaves pending', () => {
    expect(canTransitionOrder(OrderStatus.PENDING, OrderStatus.PAID)).toBe(true);
    expect(canTransitionOrder(OrderStatus.PENDING, OrderStatus.CANCELED)).toBe(
      true,
    );
    expect(canTransitionOrder(OrderStatus.PAID, OrderStatus.CANCELED)).toBe(
      false,
    );
    expect(canTransitionOrder(OrderStatus.CANCELED, OrderStatus.PAID)).toBe(
      false,
    );
    expect(orderSourcesFor(OrderStatus.PAID)).toEqual([OrderStatus.PENDING]);
  });
});
