import { Inject, Injectable } from '@nestjs/common';
import { logger } from '../../../core/logger/logger.config';
import { PayloadValidatorService } from '../../../core/validation/payload-validator.service';
import { WEBHOOK_VERIFIER, WebhookVerifier } from '../../../domain/commerce';
import { WebhookResponse } from '../dto/payment-response.dto';
import { StripeEventDto } from '../dto/stripe-event.dto';
import { PaymentsService } from './payments.service';

export const PAYMENT_SUCCEEDED_EVENT = 'payment_intent.succeeded';
export const PAYMENT_FAILED_EVENT = 'payment_intent.payment_failed';

const DEFAULT_FAILURE_MESSAGE = 'Payment failed';

@Injectable()
export class PaymentWebhookService {
  private readonly logger = logger();

  constructor(
    @Inject(WEBHOOK_VERIFIER) private readonly verifier: WebhookVerifier,
    private readonly payloadValidator: PayloadValidatorService,
    private readonly paymentsService: PaymentsService,
  ) {}

  /**
   * Verifies, validates and applies one provider event. Signature and payload
   * failures surface before any state is touched.
   */
  async handleEvent(
    rawBody: Buffer,
    signature: string | undefined,
  ): Promise<WebhookResponse> {
    const event = await this.payloadValidator.validatePayload(
      this.verifier.verify(rawBody, signature),
      StripeEventDto,
    );
    const intent = event.data.object;

    switch (event.type) {
      case PAYMENT_SUCCEEDED_EVENT: {
        const payment = await this.paymentsService.completePayment(intent.id);
        this.logger.info(
          { eventId: event.id, paymentId: payment.id, status: payment.status },
          'Payment webhook processed',
        );
        return {
          status: 'success',
          paymentId: payment.id,
          paymentStatus: payment.status,
        };
      }

      case PAYMENT_FAILED_EVENT: {
        const payment = await this.paymentsService.completePayment(intent.id);
        const message =
          intent.last_payment_error?.message || DEFAULT_FAILURE_MESSAGE;
        this.logger.warn(
          {
            eventId: event.id,
            paymentId: payment.id,
            status: payment.status,
            reason: message,
          },
          'Payment failure webhook processed',
        );
        return {
          status: 'failed',
          paymentId: payment.id,
          paymentStatus: payment.status,
          message,
        };
      }

      default:
        this.logger.debug(
          { eventId: event.id, eventType: event.type },
          'Ignoring unsupported webhook event',
        );
        return { status: 'ignored', eventType: event.type };
    }
  }
}
