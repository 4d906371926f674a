import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, LessThanOrEqual } from 'typeorm';
import { isUniqueViolation } from '../../../core/database/query-errors';
import {
  duplicate,
  ok,
  RepositoryResult,
} from '../../../core/database/repository-result';
import {
  OPEN_PAYMENT_STATUSES,
  paymentSourcesFor,
  PaymentStatus,
  SETTLED_PAYMENT_STATUSES,
} from '../../../domain/commerce';
import { PaymentItem } from '../entities/payment-item.entity';
import { Payment } from '../entities/payment.entity';

export interface NewPayment {
  userId: number;
  orderId: number;
  amount: string;
  externalPaymentId: string;
  items: Array<{ orderItemId: number; priceAtPayment: string }>;
}

const NEWEST_FIRST = {
  createdAt: 'DESC',
  id: 'DESC',
  items: { id: 'ASC' },
} as const;

@Injectable()
export class PaymentRepository {
  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  /**
   * Inserts a pending payment with its items. Fails with `duplicate` when
   * the external id is taken or the order already has an open payment.
   */
  async insertWithItems(
    data: NewPayment,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<RepositoryResult<Payment>> {
    try {
      const payment = await manager.transaction((tx) => {
        const repository = tx.getRepository(Payment);
        return repository.save(
          repository.create({
            userId: data.userId,
            orderId: data.orderId,
            amount: data.amount,
            status: PaymentStatus.PENDING,
            externalPaymentId: data.externalPaymentId,
            items: data.items.map((item) =>
              tx.getRepository(PaymentItem).create(item),
            ),
          }),
        );
      });
      return ok(payment);
    } catch (error) {
      if (isUniqueViolation(error)) return duplicate();
      throw error;
    }
  }

  async findById(
    paymentId: number,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<Payment | null> {
    return manager.getRepository(Payment).findOne({
      where: { id: paymentId },
      relations: { items: true },
      order: { items: { id: 'ASC' } },
    });
  }

  async findByExternalId(
    externalPaymentId: string,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<Payment | null> {
    return manager.getRepository(Payment).findOne({
      where: { externalPaymentId },
      relations: { items: true },
      order: { items: { id: 'ASC' } },
    });
  }

  async findOpenForOrder(
    orderId: number,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<Payment | null> {
    return manager.getRepository(Payment).findOne({
      where: { orderId, status: In([...OPEN_PAYMENT_STATUSES]) },
      order: { id: 'DESC' },
    });
  }

  async countForOrder(
    orderId: number,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<number> {
    return manager.getRepository(Payment).countBy({ orderId });
  }

  /** Latest payment of the order that succeeded (and may since be refunded). */
  async findLatestSettledForOrder(orderId: number): Promise<Payment | null> {
    return this.dataSource.getRepository(Payment).findOne({
      where: { orderId, status: In([...SETTLED_PAYMENT_STATUSES]) },
      relations: { items: true },
      order: NEWEST_FIRST,
    });
  }

  async findByUser(userId: number): Promise<Payment[]> {
    return this.dataSource.getRepository(Payment).find({
      where: { userId },
      relations: { items: true },
      order: NEWEST_FIRST,
    });
  }

  async findByOrder(orderId: number): Promise<Payment[]> {
    return this.dataSource.getRepository(Payment).find({
      where: { orderId },
      relations: { items: true },
      order: NEWEST_FIRST,
    });
  }

  /**
   * Open payments created at or before `cutoff`. Never-checked payments
   * come first, then the ones checked longest ago.
   */
  async findStaleOpen(cutoff: Date, limit: number): Promise<Payment[]> {
    return this.dataSource.getRepository(Payment).find({
      where: {
        status: In([...OPEN_PAYMENT_STATUSES]),
        createdAt: LessThanOrEqual(cutoff),
      },
      order: {
        lastCheckedAt: { direction: 'ASC', nulls: 'FIRST' },
        createdAt: 'ASC',
        id: 'ASC',
      },
      take: limit,
    });
  }

  async markChecked(paymentIds: number[], at: Date): Promise<void> {
    if (paymentIds.length === 0) return;
    await this.dataSource
      .getRepository(Payment)
      .update({ id: In(paymentIds) }, { lastCheckedAt: at });
  }

  /**
   * Compare-and-set status write. Only succeeds while the payment is in a
   * status from which `to` is reachable.
   */
  async transitionStatus(
    paymentId: number,
    to: PaymentStatus,
    manager: EntityManager = this.dataSource.manager,
  ): Promise<boolean> {
    const result = await manager
      .getRepository(Payment)
      .update(
        { id: paymentId, status: In(paymentSourcesFor(to)) },
        { status: to },
      );
    return (result.affected ?? 0) === 1;
  }
}
