import {
  BadRequestException,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Post,
  RawBodyRequest,
  Req,
  UseInterceptors,
} from '@nestjs/common';
import { Request } from 'express';
import { TimeoutInterceptor } from '../../../core/timeout/timeout.interceptor';
import { WebhookResponse } from '../dto/payment-response.dto';
import { PaymentWebhookService } from '../services/payment-webhook.service';

/** Provider callbacks. Authenticated by signature, not by caller headers. */
@Controller('orders/webhooks')
@UseInterceptors(TimeoutInterceptor)
export class PaymentWebhookController {
  constructor(private readonly webhookService: PaymentWebhookService) {}

  @Post('payment')
  @HttpCode(HttpStatus.OK)
  async handlePaymentWebhook(
    @Req() request: RawBodyRequest<Request>,
    @Headers('stripe-signature') signature: string | undefined,
  ): Promise<WebhookResponse> {
    if (!request.rawBody) {
      throw new BadRequestException('Missing request body');
    }
    return this.webhookService.handleEvent(request.rawBody, signature);
  }
}
