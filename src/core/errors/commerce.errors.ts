import {
  ConflictError,
  InvalidStateError,
  NotFoundError,
} from './domain.errors';

export class CartNotFoundError extends NotFoundError {
  readonly code = 'cart_not_found';

  constructor(userId: number) {
    super(`Cart not found for user_id ${userId}`, { userId });
  }
}

export class MovieNotFoundError extends NotFoundError {
  readonly code = 'movie_not_found';

  constructor(movieId: number) {
    super(`Movie with id ${movieId} not found`, { movieId });
  }
}

export class MovieAlreadyInCartError extends ConflictError {
  readonly code = 'movie_already_in_cart';

  constructor(movieId: number) {
    super(`Movie with id ${movieId} already in cart`, { movieId });
  }
}

export class MovieNotInCartError extends NotFoundError {
  readonly code = 'movie_not_in_cart';

  constructor(movieId: number) {
    super(`Movie with id ${movieId} not found in cart`, { movieId });
  }
}

export class EmptyCartError extends InvalidStateError {
  readonly code = 'empty_cart';

  constructor(userId: number) {
    super('Cart is empty.', { userId });
  }
}

export class NoValidItemsError extends InvalidStateError {
  readonly code = 'no_valid_items';

  constructor(userId: number) {
    super('No valid items in cart.', { userId });
  }
}

export class OrderNotFoundError extends NotFoundError {
  readonly code = 'order_not_found';

  constructor(orderId: number) {
    super(`Order with id ${orderId} not found`, { orderId });
  }
}

export class OrderCannotBeCanceledError extends InvalidStateError {
  readonly code = 'order_cannot_be_canceled';

  constructor(orderId: number, status: string) {
    super(`Order ${orderId} cannot be canceled`, { orderId, status });
  }
}

export class OrderCannotBePaidError extends InvalidStateError {
  readonly code = 'order_cannot_be_paid';

  constructor(orderId: number, status: string) {
    super(`Order ${orderId} cannot be paid`, { orderId, status });
  }
}

export class PaymentNotFoundError extends NotFoundError {
  readonly code = 'payment_not_found';

  constructor(externalPaymentId: string) {
    super(`Payment with external id ${externalPaymentId} not found`, {
      externalPaymentId,
    });
  }
}

export class PaymentCannotBeCompletedError extends InvalidStateError {
  readonly code = 'payment_cannot_be_completed';

  constructor(paymentId: number, status: string) {
    super(`Payment ${paymentId} cannot be completed`, { paymentId, status });
  }
}

export class NoSuccessfulPaymentError extends NotFoundError {
  readonly code = 'no_successful_payment';

  constructor(orderId: number) {
    super('No successful payment found for this order', { orderId });
  }
}

export class PaymentCannotBeRefundedError extends InvalidStateError {
  readonly code = 'payment_cannot_be_refunded';

  constructor(paymentId: number, status: string) {
    super(`Payment ${paymentId} cannot be refunded`, { paymentId, status });
  }
}

export class RefundFailedError extends InvalidStateError {
  readonly code = 'refund_failed';

  constructor(paymentId: number) {
    super(`Refund for payment ${paymentId} was not accepted by the provider`, {
      paymentId,
    });
  }
}

export class InvalidRefundAmountError extends InvalidStateError {
  readonly code = 'invalid_refund_amount';

  constructor(paymentId: number, amount: string, maximum: string) {
    super(
      `Refund amount ${amount} must be greater than 0.00 and at most ${maximum}`,
      { paymentId, amount, maximum },
    );
  }
}

export class PaymentInProgressError extends ConflictError {
  readonly code = 'payment_in_progress';

  constructor(orderId: number, paymentId: number | null) {
    super(`Another payment attempt for order ${orderId} is in progress`, {
      orderId,
      paymentId,
    });
  }
}

export class InvalidPaymentTransitionError extends InvalidStateError {
  readonly code = 'invalid_payment_transition';

  constructor(paymentId: number, from: string, to: string) {
    super(`Payment ${paymentId} cannot move from ${from} to ${to}`, {
      paymentId,
      from,
      to,
    });
  }
}
