import { Inject, Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { PaymentsConfig, paymentsConfig } from '../../../config/configuration';
import {
  InvalidPaymentTransitionError,
  InvalidRefundAmountError,
  NoSuccessfulPaymentError,
  OrderCannotBePaidError,
  PaymentCannotBeCompletedError,
  PaymentCannotBeRefundedError,
  PaymentInProgressError,
  PaymentNotFoundError,
  ProviderError,
  RefundFailedError,
} from '../../../core/errors';
import { logger } from '../../../core/logger/logger.config';
import { fromMinorUnits, toMinorUnits } from '../../../core/utils/money.util';
import {
  canTransitionPayment,
  IntentStatusMapper,
  isOpenPaymentStatus,
  OrderStatus,
  PAYMENT_GATEWAY,
  PaymentGateway,
  PaymentStatus,
} from '../../../domain/commerce';
import { OrderRepository } from '../../orders/repositories/order.repository';
import { OrdersService } from '../../orders/services/orders.service';
import { Payment } from '../entities/payment.entity';
import { PaymentRepository } from '../repositories/payment.repository';

function refundKey(paymentId: number, amount?: string): string {
  return `refund-${paymentId}-${amount ?? 'full'}`;
}

/**
 * Drives Payment and Order state from provider outcomes.
 *
 * Provider calls always happen outside database transactions; every status
 * write is a compare-and-set so duplicate or out-of-order provider signals
 * cannot move a payment backwards.
 */
@Injectable()
export class PaymentsService {
  private readonly logger = logger();

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly paymentRepository: PaymentRepository,
    private readonly orderRepository: OrderRepository,
    private readonly ordersService: OrdersService,
    @Inject(PAYMENT_GATEWAY) private readonly gateway: PaymentGateway,
    @Inject(paymentsConfig.KEY) private readonly config: PaymentsConfig,
  ) {}

  /**
   * Starts (or resumes) paying an order.
   * @returns the client secret the buyer confirms the payment with
   */
  async initiatePayment(orderId: number, userId: number): Promise<string> {
    const order = await this.ordersService.getOwnedOrder(orderId, userId);
    if (order.status !== OrderStatus.PENDING) {
      throw new OrderCannotBePaidError(orderId, order.status);
    }

    const open = await this.paymentRepository.findOpenForOrder(orderId);
    if (open?.externalPaymentId) {
      const snapshot = await this.gateway.getPaymentIntent(
        open.externalPaymentId,
      );
      if (!snapshot.clientSecret) {
        throw new ProviderError(
          `Payment intent ${open.externalPaymentId} has no client secret`,
          null,
          { paymentId: open.id },
        );
      }
      this.logger.info(
        { orderId, paymentId: open.id, externalPaymentId: snapshot.id },
        'Resuming open payment attempt',
      );
      return snapshot.clientSecret;
    }

    const attempt = (await this.paymentRepository.countForOrder(orderId)) + 1;
    const handle = await this.gateway.initiatePayment(
      orderId,
      order.totalAmount,
      this.config.currency,
      { idempotencyKey: `order-${orderId}-attempt-${attempt}` },
    );

    const known = await this.paymentRepository.findByExternalId(
      handle.externalId,
    );
    if (known) {
      return handle.clientSecret;
    }

    const inserted = await this.dataSource.transaction(async (manager) => {
      const current = await this.orderRepository.findById(orderId, manager);
      if (!current || current.status !== OrderStatus.PENDING) {
        throw new OrderCannotBePaidError(
          orderId,
          current?.status ?? order.status,
        );
      }

      return this.paymentRepository.insertWithItems(
        {
          userId,
          orderId,
          amount: order.totalAmount,
          externalPaymentId: handle.externalId,
          items: order.items.map((item) => ({
            orderItemId: item.id,
            priceAtPayment: item.priceAtOrder,
          })),
        },
        manager,
      );
    });

    if (inserted.ok) {
      this.logger.info(
        {
          orderId,
          userId,
          paymentId: inserted.value.id,
          externalPaymentId: handle.externalId,
          amount: order.totalAmount,
          attempt,
        },
        'Payment initiated',
      );
      return handle.clientSecret;
    }

    // lost a race: either the same intent was recorded or another attempt holds the slot
    const winner = await this.paymentRepository.findByExternalId(
      handle.externalId,
    );
    if (winner) {
      return handle.clientSecret;
    }

    const holder = await this.paymentRepository.findOpenForOrder(orderId);
    this.logger.warn(
      { orderId, externalPaymentId: handle.externalId, holderId: holder?.id },
      'Concurrent payment attempt detected',
    );
    throw new PaymentInProgressError(orderId, holder?.id ?? null);
  }

  /**
   * Reconciles a payment with the provider's view of its intent.
   */
  async completePayment(externalPaymentId: string): Promise<Payment> {
    const payment =
      await this.paymentRepository.findByExternalId(externalPaymentId);
    if (!payment) {
      throw new PaymentNotFoundError(externalPaymentId);
    }
    if (payment.status === PaymentStatus.SUCCESSFUL) {
      return payment;
    }
    if (!isOpenPaymentStatus(payment.status)) {
      throw new PaymentCannotBeCompletedError(payment.id, payment.status);
    }

    const snapshot = await this.gateway.getPaymentIntent(externalPaymentId);
    const target = IntentStatusMapper.toPaymentStatus(snapshot.status);

    if (target === payment.status) {
      return payment;
    }
    if (!canTransitionPayment(payment.status, target)) {
      throw new InvalidPaymentTransitionError(
        payment.id,
        payment.status,
        target,
      );
    }

    let applied: boolean;
    try {
      applied = await this.applyOutcome(payment, target);
    } catch (error) {
      if (error instanceof OrderCannotBePaidError) {
        await this.refundOrphanedCharge(payment, externalPaymentId);
      }
      throw error;
    }

    if (!applied) {
      const current =
        await this.paymentRepository.findByExternalId(externalPaymentId);
      if (
        current &&
        (current.status === target ||
          current.status === PaymentStatus.SUCCESSFUL)
      ) {
        return current;
      }
      throw new PaymentCannotBeCompletedError(
        payment.id,
        current?.status ?? payment.status,
      );
    }

    this.logger.info(
      {
        paymentId: payment.id,
        orderId: payment.orderId,
        externalPaymentId,
        from: payment.status,
        to: target,
        intentStatus: snapshot.status,
      },
      'Payment status updated',
    );

    payment.status = target;
    return payment;
  }

  /**
   * Refunds the order's settled payment, fully or by `amount`.
   */
  async refundPayment(
    orderId: number,
    userId: number,
    amount?: string,
  ): Promise<Payment> {
    await this.ordersService.getOwnedOrder(orderId, userId);

    const payment =
      await this.paymentRepository.findLatestSettledForOrder(orderId);
    if (!payment) {
      throw new NoSuccessfulPaymentError(orderId);
    }
    if (payment.status !== PaymentStatus.SUCCESSFUL || !payment.externalPaymentId) {
      throw new PaymentCannotBeRefundedError(payment.id, payment.status);
    }

    const refundAmount =
      amount === undefined ? undefined : this.checkRefundAmount(payment, amount);

    const accepted = await this.gateway.refundPayment(
      payment.externalPaymentId,
      refundAmount,
      { idempotencyKey: refundKey(payment.id, refundAmount) },
    );
    if (!accepted) {
      this.logger.warn(
        { orderId, paymentId: payment.id, amount: refundAmount ?? 'full' },
        'Refund rejected by provider',
      );
      throw new RefundFailedError(payment.id);
    }

    const moved = await this.paymentRepository.transitionStatus(
      payment.id,
      PaymentStatus.REFUNDED,
    );
    if (!moved) {
      const current = await this.paymentRepository.findById(payment.id);
      throw new PaymentCannotBeRefundedError(
        payment.id,
        current?.status ?? payment.status,
      );
    }

    this.logger.info(
      {
        orderId,
        userId,
        paymentId: payment.id,
        externalPaymentId: payment.externalPaymentId,
        amount: refundAmount ?? payment.amount,
      },
      'Payment refunded',
    );

    payment.status = PaymentStatus.REFUNDED;
    return payment;
  }

  /**
   * Writes the payment's new status and, on success, pays the order in the
   * same transaction. Throws `OrderCannotBePaidError` (rolling both back)
   * when the order is no longer pending.
   */
  private async applyOutcome(
    payment: Payment,
    target: PaymentStatus,
  ): Promise<boolean> {
    return this.dataSource.transaction(async (manager) => {
      const moved = await this.paymentRepository.transitionStatus(
        payment.id,
        target,
        manager,
      );
      if (!moved) return false;

      if (target === PaymentStatus.SUCCESSFUL) {
        const paid = await this.orderRepository.transitionStatus(
          payment.orderId,
          OrderStatus.PAID,
          manager,
        );
        if (!paid) {
          const order = await this.orderRepository.findById(
            payment.orderId,
            manager,
          );
          this.logger.error(
            {
              paymentId: payment.id,
              orderId: payment.orderId,
              orderStatus: order?.status,
            },
            'Payment succeeded for an order that is no longer pending',
          );
          throw new OrderCannotBePaidError(
            payment.orderId,
            order?.status ?? 'missing',
          );
        }
      }
      return true;
    });
  }

  /**
   * Gives the money back when an intent succeeded after its order stopped
   * being payable. A rejected or failed refund leaves the payment open, so
   * the next webhook or sweep tries again under the same idempotency key.
   */
  private async refundOrphanedCharge(
    payment: Payment,
    externalPaymentId: string,
  ): Promise<void> {
    let accepted: boolean;
    try {
      accepted = await this.gateway.refundPayment(
        externalPaymentId,
        undefined,
        { idempotencyKey: refundKey(payment.id) },
      );
    } catch (error) {
      if (!(error instanceof ProviderError)) throw error;
      this.logger.error(
        { paymentId: payment.id, externalPaymentId, error: error.message },
        'Refund of orphaned charge failed',
      );
      return;
    }
    if (!accepted) {
      this.logger.error(
        { paymentId: payment.id, externalPaymentId },
        'Refund of orphaned charge rejected by provider',
      );
      return;
    }

    await this.dataSource.transaction(async (manager) => {
      const settled = await this.paymentRepository.transitionStatus(
        payment.id,
        PaymentStatus.SUCCESSFUL,
        manager,
      );
      if (!settled) return;
      await this.paymentRepository.transitionStatus(
        payment.id,
        PaymentStatus.REFUNDED,
        manager,
      );
    });

    this.logger.warn(
      {
        paymentId: payment.id,
        orderId: payment.orderId,
        externalPaymentId,
        amount: payment.amount,
      },
      'Refunded a charge for an order that can no longer be paid',
    );
  }

  async getUserPayments(userId: number): Promise<Payment[]> {
    return this.paymentRepository.findByUser(userId);
  }

  async getOrderPayments(orderId: number, userId: number): Promise<Payment[]> {
    await this.ordersService.getOwnedOrder(orderId, userId);
    return this.paymentRepository.findByOrder(orderId);
  }

  private checkRefundAmount(payment: Payment, amount: string): string {
    let requested: number;
    try {
      requested = toMinorUnits(amount);
    } catch (error) {
      if (error instanceof RangeError) {
        throw new InvalidRefundAmountError(payment.id, amount, payment.amount);
      }
      throw error;
    }

    if (requested <= 0 || requested > toMinorUnits(payment.amount)) {
      throw new InvalidRefundAmountError(
        payment.id,
        fromMinorUnits(requested),
        payment.amount,
      );
    }
    return fromMinorUnits(requested);
  }
}
