import { BadRequestException, RawBodyRequest } from '@nestjs/common';
import { Request } from 'express';
import { Caller } from '../../../core/auth';
import { PaymentStatus } from '../../../domain/commerce';
import { Payment } from '../entities/payment.entity';
import { PaymentItem } from '../entities/payment-item.entity';
import { PaymentWebhookService } from '../services/payment-webhook.service';
import { PaymentsService } from '../services/payments.service';
import { PaymentWebhookController } from './payment-webhook.controller';
import { PaymentsController } from './payments.controller';

const caller: Caller = { userId: 7, group: 'user' };

function payment(): Payment {
  const item = new PaymentItem();
  item.id = 3;
  item.paymentId = 11;
  item.orderItemId = 5;
  item.priceAtPayment = '9.99';

  const entity = new Payment();
  entity.id = 11;
  entity.userId = 7;
  entity.orderId = 2;
  entity.createdAt = new Date('2026-01-02T03:04:05Z');
  entity.status = PaymentStatus.REFUNDED;
  entity.amount = '9.99';
  entity.externalPaymentId = 'pi_test_1';
  entity.items = [item];
  return entity;
}

describe('PaymentsController', () => {
  const service = {
    initiatePayment: jest.fn(),
    refundPayment: jest.fn(),
    getUserPayments: jest.fn(),
    getOrderPayments: jest.fn(),
  };
  const controller = new PaymentsController(
    service as unknown as PaymentsService,
  );

  beforeEach(() => jest.resetAllMocks());

  it('wraps the client secret', async () => {
    service.initiatePayment.mockResolvedValue('pi_test_1_secret');

    await expect(controller.pay(caller, 2)).resolves.toEqual({
      clientSecret: 'pi_test_1_secret',
    });
    expect(service.initiatePayment).toHaveBeenCalledWith(2, 7);
  });

  it('maps the refunded payment', async () => {
    service.refundPayment.mockResolvedValue(payment());

    const response = await controller.refund(caller, 2, { amount: '9.99' });

    expect(service.refundPayment).toHaveBeenCalledWith(2, 7, '9.99');
    expect(response).toEqual({
      id: 11,
      userId: 7,
      orderId: 2,
      createdAt: new Date('2026-01-02T03:04:05Z'),
      status: PaymentStatus.REFUNDED,
      amount: '9.99',
      externalPaymentId: 'pi_test_1',
      items: [{ id: 3, orderItemId: 5, priceAtPayment: '9.99' }],
    });
  });

  it('passes an omitted refund amount through as undefined', async () => {
    service.refundPayment.mockResolvedValue(payment());

    await controller.refund(caller, 2, {});

    expect(service.refundPayment).toHaveBeenCalledWith(2, 7, undefined);
  });

  it('lists the payments of the caller and of one order', async () => {
    service.getUserPayments.mockResolvedValue([payment()]);
    service.getOrderPayments.mockResolvedValue([]);

    const mine = await controller.getMyPayments(caller);
    const ofOrder = await controller.getOrderPayments(caller, 2);

    expect(mine.map((p) => p.id)).toEqual([11]);
    expect(ofOrder).toEqual([]);
    expect(service.getOrderPayments).toHaveBeenCalledWith(2, 7);
  });
});

describe('PaymentWebhookController', () => {
  const service = { handleEvent: jest.fn() };
  const controller = new PaymentWebhookController(
    service as unknown as PaymentWebhookService,
  );

  beforeEach(() => jest.resetAllMocks());

  it('hands the raw body and signature to the webhook service', async () => {
    const rawBody = Buffer.from('{"id":"evt_test_1"}');
    service.handleEvent.mockResolvedValue({
      status: 'ignored',
      eventType: 'charge.refunded',
    });

    const response = await controller.handlePaymentWebhook(
      { rawBody } as unknown as RawBodyRequest<Request>,
      't=1,v1=00',
    );

    expect(response).toEqual({ status: 'ignored', eventType: 'charge.refunded' });
    expect(service.handleEvent).toHaveBeenCalledWith(rawBody, 't=1,v1=00');
  });

  it('rejects requests without a raw body', async () => {
    await expect(
      controller.handlePaymentWebhook(
        {} as unknown as RawBodyRequest<Request>,
        't=1,v1=00',
      ),
    ).rejects.toBeInstanceOf(BadRequestException);
    expect(service.handleEvent).not.toHaveBeenCalled();
  });
});
