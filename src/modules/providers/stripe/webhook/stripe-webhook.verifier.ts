import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import Stripe from 'stripe';
import { stripeConfig } from '../../../../config/configuration';
import { WebhookSignatureError } from '../../../../core/errors';
import { logger } from '../../../../core/logger/logger.config';
import { WebhookVerifier } from '../../../../domain/commerce';

/**
 * Checks the `Stripe-Signature` header with the Stripe SDK and returns the
 * decoded event. The body is only parsed once its signature matched.
 */
@Injectable()
export class StripeWebhookVerifier implements WebhookVerifier {
  private readonly logger = logger();
  private readonly stripe: Stripe;

  constructor(
    @Inject(stripeConfig.KEY)
    private readonly config: ConfigType<typeof stripeConfig>,
  ) {
    this.stripe = new Stripe(config.apiKey);
  }

  verify(rawBody: Buffer, signatureHeader: string | undefined): Stripe.Event {
    if (!this.config.webhookSecret) {
      throw new WebhookSignatureError('webhook secret is not configured');
    }
    if (!signatureHeader) {
      throw new WebhookSignatureError('missing signature header');
    }

    try {
      return this.stripe.webhooks.constructEvent(
        rawBody,
        signatureHeader,
        this.config.webhookSecret,
        this.config.webhookToleranceSeconds,
      );
    } catch (error) {
      if (error instanceof Stripe.errors.StripeSignatureVerificationError) {
        throw new WebhookSignatureError(error.message);
      }
      if (error instanceof SyntaxError) {
        this.logger.warn({ error: error.message }, 'Payload is not valid JSON');
        throw new BadRequestException('Payload is not valid JSON');
      }
      throw error;
    }
  }
}
