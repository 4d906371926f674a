import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { OrdersModule } from '../orders/orders.module';
import { StripeModule } from '../providers/stripe/stripe.module';
import { PaymentWebhookController } from './controllers/payment-webhook.controller';
import { PaymentsController } from './controllers/payments.controller';
import { PaymentItem } from './entities/payment-item.entity';
import { Payment } from './entities/payment.entity';
import { PaymentRepository } from './repositories/payment.repository';
import { PaymentSweepService } from './services/payment-sweep.service';
import { PaymentWebhookService } from './services/payment-webhook.service';
import { PaymentsService } from './services/payments.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Payment, PaymentItem]),
    OrdersModule,
    StripeModule,
  ],
  controllers: [PaymentsController, PaymentWebhookController],
  providers: [
    PaymentRepository,
    PaymentsService,
    PaymentSweepService,
    PaymentWebhookService,
  ],
  exports: [PaymentsService],
})
export class PaymentsModule {}
