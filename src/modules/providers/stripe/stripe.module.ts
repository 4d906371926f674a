import { Module } from '@nestjs/common';
import { CoreModule } from '../../../core/core.module';
import {
  PAYMENT_GATEWAY,
  WEBHOOK_VERIFIER,
} from '../../../domain/commerce';
import { StripeApiClientService } from './adapters/stripe-api-client.service';
import { StripeGatewayAdapter } from './adapters/stripe-gateway.adapter';
import { StripeWebhookVerifier } from './webhook/stripe-webhook.verifier';

@Module({
  imports: [CoreModule],
  providers: [
    StripeApiClientService,
    StripeGatewayAdapter,
    StripeWebhookVerifier,
    { provide: PAYMENT_GATEWAY, useExisting: StripeGatewayAdapter },
    { provide: WEBHOOK_VERIFIER, useExisting: StripeWebhookVerifier },
  ],
  exports: [PAYMENT_GATEWAY, WEBHOOK_VERIFIER, StripeApiClientService],
})
export class StripeModule {}
