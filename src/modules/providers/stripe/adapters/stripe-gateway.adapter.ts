import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { paymentsConfig } from '../../../../config/configuration';
import { ProviderError } from '../../../../core/errors';
import { logger } from '../../../../core/logger/logger.config';
import { toMinorUnits } from '../../../../core/utils/money.util';
import {
  InitiatePaymentOptions,
  IntentStatus,
  PaymentGateway,
  PaymentIntentHandle,
  PaymentIntentSnapshot,
  RefundOptions,
} from '../../../../domain/commerce';
import { StripeMapper } from '../mappers/stripe.mapper';
import { StripeApiClientService, STRIPE_PROVIDER } from './stripe-api-client.service';

@Injectable()
export class StripeGatewayAdapter implements PaymentGateway {
  private readonly logger = logger();
  readonly providerName = STRIPE_PROVIDER;
  private lastPaymentIntentId: string | null = null;

  constructor(
    private readonly stripeApiClient: StripeApiClientService,
    @Inject(paymentsConfig.KEY)
    private readonly payments: ConfigType<typeof paymentsConfig>,
  ) {}

  async initiatePayment(
    orderId: number,
    amount: string,
    currency: string = this.payments.currency,
    options: InitiatePaymentOptions = {},
  ): Promise<PaymentIntentHandle> {
    const intent = await this.stripeApiClient.createPaymentIntent(
      {
        amount: toMinorUnits(amount),
        currency: currency.toLowerCase(),
        metadata: { order_id: String(orderId), ...options.metadata },
      },
      options.idempotencyKey,
    );

    if (!intent.client_secret) {
      throw new ProviderError(
        `Stripe returned payment intent ${intent.id} without a client secret`,
        null,
        { externalPaymentId: intent.id },
      );
    }

    this.lastPaymentIntentId = intent.id;
    this.logger.info(
      { orderId, externalPaymentId: intent.id, amount, currency },
      'Stripe payment intent created',
    );

    return { clientSecret: intent.client_secret, externalId: intent.id };
  }

  getLastPaymentIntentId(): string | null {
    return this.lastPaymentIntentId;
  }

  async getPaymentIntent(externalId: string): Promise<PaymentIntentSnapshot> {
    const intent = await this.stripeApiClient.retrievePaymentIntent(externalId);
    return StripeMapper.toSnapshot(intent);
  }

  async completePayment(externalId: string): Promise<boolean> {
    const snapshot = await this.getPaymentIntent(externalId);
    return snapshot.status === IntentStatus.SUCCEEDED;
  }

  async refundPayment(
    externalId: string,
    amount?: string,
    options: RefundOptions = {},
  ): Promise<boolean> {
    const refund = await this.stripeApiClient.createRefund(
      {
        paymentIntent: externalId,
        amount: amount === undefined ? undefined : toMinorUnits(amount),
      },
      options.idempotencyKey,
    );

    const accepted = StripeMapper.isRefundAccepted(refund);
    this.logger.info(
      {
        externalPaymentId: externalId,
        refundId: refund.id,
        refundStatus: refund.status,
        amount: amount ?? 'full',
        accepted,
      },
      'Stripe refund requested',
    );
    return accepted;
  }
}
