import { BadRequestException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { FakePaymentGateway } from '../../../../test/utils/fake-payment-gateway';
import { seedCart, seedMovie } from '../../../../test/utils/seed';
import {
  signStripePayload,
  TEST_WEBHOOK_SECRET,
} from '../../../../test/utils/stripe-signature';
import {
  createTestingContext,
  TestingContext,
} from '../../../../test/utils/testing-module';
import { WebhookSignatureError } from '../../../core/errors';
import {
  IntentStatus,
  OrderStatus,
  PAYMENT_GATEWAY,
  PaymentStatus,
} from '../../../domain/commerce';
import { CartService } from '../../cart/services/cart.service';
import { Order } from '../../orders/entities/order.entity';
import { OrdersService } from '../../orders/services/orders.service';
import { Payment } from '../entities/payment.entity';
import { PaymentsModule } from '../payments.module';
import { PaymentWebhookService } from './payment-webhook.service';
import { PaymentsService } from './payments.service';

function event(type: string, object: Record<string, unknown>): string {
  return JSON.stringify({ id: 'evt_test_1', type, data: { object } });
}

describe('PaymentWebhookService', () => {
  let context: TestingContext;
  let dataSource: DataSource;
  let gateway: FakePaymentGateway;
  let service: PaymentWebhookService;
  let paymentId: number;

  beforeAll(() => {
    process.env.STRIPE_WEBHOOK_SECRET = TEST_WEBHOOK_SECRET;
  });

  afterAll(() => {
    delete process.env.STRIPE_WEBHOOK_SECRET;
  });

  beforeEach(async () => {
    gateway = new FakePaymentGateway();
    context = await createTestingContext({
      imports: [PaymentsModule],
      overrides: [{ token: PAYMENT_GATEWAY, useValue: gateway }],
    });
    dataSource = context.dataSource;
    service = context.module.get(PaymentWebhookService);

    const movie = await seedMovie(dataSource, 'Heat', '9.99');
    await seedCart(dataSource, 7, [movie.id]);
    const { order } = await context.module.get(OrdersService).createOrder(7);
    await context.module.get(PaymentsService).initiatePayment(order.id, 7);
    paymentId = (
      await dataSource
        .getRepository(Payment)
        .findOneByOrFail({ externalPaymentId: 'pi_test_1' })
    ).id;
  });

  afterEach(async () => {
    await context.close();
  });

  async function deliver(payload: string, signature = signStripePayload(payload)) {
    return service.handleEvent(Buffer.from(payload, 'utf8'), signature);
  }

  it('completes the payment on payment_intent.succeeded', async () => {
    gateway.setStatus('pi_test_1', IntentStatus.SUCCEEDED);

    const response = await deliver(
      event('payment_intent.succeeded', { id: 'pi_test_1' }),
    );

    expect(response).toEqual({
      status: 'success',
      paymentId,
      paymentStatus: PaymentStatus.SUCCESSFUL,
    });
  });

  it('reports the provider failure message on payment_intent.payment_failed', async () => {
    gateway.setStatus(
      'pi_test_1',
      IntentStatus.REQUIRES_PAYMENT_METHOD,
      'Your card was declined.',
    );

    const response = await deliver(
      event('payment_intent.payment_failed', {
        id: 'pi_test_1',
        last_payment_error: { message: 'Your card was declined.' },
      }),
    );

    expect(response).toEqual({
      status: 'failed',
      paymentId,
      paymentStatus: PaymentStatus.PENDING,
      message: 'Your card was declined.',
    });
  });

  it('falls back to a generic failure message', async () => {
    gateway.setStatus('pi_test_1', IntentStatus.CANCELED);

    const response = await deliver(
      event('payment_intent.payment_failed', { id: 'pi_test_1' }),
    );

    expect(response).toEqual({
      status: 'failed',
      paymentId,
      paymentStatus: PaymentStatus.CANCELED,
      message: 'Payment failed',
    });
  });

  it('acknowledges unsupported events without side effects', async () => {
    gateway.setStatus('pi_test_1', IntentStatus.SUCCEEDED);

    const response = await deliver(
      event('charge.refunded', { id: 'ch_test_1' }),
    );

    expect(response).toEqual({ status: 'ignored', eventType: 'charge.refunded' });
    const payment = await dataSource
      .getRepository(Payment)
      .findOneByOrFail({ id: paymentId });
    expect(payment.status).toBe(PaymentStatus.PENDING);
  });

  it('rejects a tampered body before touching any payment', async () => {
    gateway.setStatus('pi_test_1', IntentStatus.SUCCEEDED);
    const original = event('payment_intent.succeeded', { id: 'pi_test_1' });
    const tampered = event('payment_intent.succeeded', { id: 'pi_test_2' });

    await expect(
      deliver(tampered, signStripePayload(original)),
    ).rejects.toBeInstanceOf(WebhookSignatureError);
    const payment = await dataSource
      .getRepository(Payment)
      .findOneByOrFail({ id: paymentId });
    expect(payment.status).toBe(PaymentStatus.PENDING);
  });

  it('rejects a delivery without a signature header', async () => {
    await expect(
      service.handleEvent(Buffer.from('{}'), undefined),
    ).rejects.toBeInstanceOf(WebhookSignatureError);
  });

  it('rejects signed bodies that are not JSON', async () => {
    await expect(deliver('not json')).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });

  it('rejects events without an intent id', async () => {
    await expect(
      deliver(event('payment_intent.succeeded', {})),
    ).rejects.toBeInstanceOf(BadRequestException);
  });

  it('takes a cart through checkout to a paid order', async () => {
    const movie = await seedMovie(dataSource, 'Alien', '9.99');
    await context.module.get(CartService).addMovie(9, movie.id);

    const { order } = await context.module.get(OrdersService).createOrder(9);
    expect(order.totalAmount).toBe('9.99');

    const clientSecret = await context.module
      .get(PaymentsService)
      .initiatePayment(order.id, 9);
    expect(clientSecret).toBe('pi_test_2_secret');
    expect(gateway.intents.get('pi_test_2')?.amount).toBe(999);

    gateway.setStatus('pi_test_2', IntentStatus.SUCCEEDED);
    const response = await deliver(
      event('payment_intent.succeeded', { id: 'pi_test_2' }),
    );

    expect(response).toMatchObject({
      status: 'success',
      paymentStatus: PaymentStatus.SUCCESSFUL,
    });
    const paid = await dataSource
      .getRepository(Order)
      .findOneByOrFail({ id: order.id });
    expect(paid.status).toBe(OrderStatus.PAID);
  });
});
