import { Inject, Injectable } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { PaymentsConfig, paymentsConfig } from '../../../config/configuration';
import { logger } from '../../../core/logger/logger.config';
import { batchProcessWithErrors } from '../../../core/utils/promise-batch.util';
import { Payment } from '../entities/payment.entity';
import { PaymentRepository } from '../repositories/payment.repository';
import { PaymentsService } from './payments.service';

export interface SweepResult {
  checked: number;
  updated: number;
  unchanged: number;
  errors: Array<{ paymentId: number; error: string }>;
}

/**
 * Polls the provider for open payments whose webhook never arrived.
 */
@Injectable()
export class PaymentSweepService {
  private readonly logger = logger();

  constructor(
    private readonly paymentRepository: PaymentRepository,
    private readonly paymentsService: PaymentsService,
    @Inject(paymentsConfig.KEY) private readonly config: PaymentsConfig,
  ) {}

  @Cron(CronExpression.EVERY_5_MINUTES)
  async scheduledSweep(): Promise<void> {
    if (!this.config.sweepEnabled) return;

    try {
      await this.sweep();
    } catch (error) {
      this.logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Scheduled payment sweep failed',
      );
    }
  }

  async sweep(now: Date = new Date()): Promise<SweepResult> {
    const cutoff = new Date(
      now.getTime() - this.config.sweepStaleAfterMinutes * 60_000,
    );
    const stale = await this.paymentRepository.findStaleOpen(
      cutoff,
      this.config.sweepBatchSize,
    );

    const { successful, failed } = await batchProcessWithErrors(
      stale,
      (payment) => this.reconcile(payment),
    );
    // rotates the batch so abandoned payments cannot starve newer ones
    await this.paymentRepository.markChecked(
      stale.map((payment) => payment.id),
      now,
    );

    const updated = successful.filter((changed) => changed).length;
    const result: SweepResult = {
      checked: stale.length,
      updated,
      unchanged: successful.length - updated,
      errors: failed.map(({ item, error }) => ({
        paymentId: item.id,
        error: error.message,
      })),
    };

    if (result.checked > 0) {
      this.logger.info({ result }, 'Payment sweep completed');
    }
    return result;
  }

  private async reconcile(payment: Payment): Promise<boolean> {
    if (!payment.externalPaymentId) {
      throw new Error(`Payment ${payment.id} has no external payment id`);
    }
    const current = await this.paymentsService.completePayment(
      payment.externalPaymentId,
    );
    return current.status !== payment.status;
  }
}
