import { Test, TestingModule } from '@nestjs/testing';
import { paymentsConfig } from '../../../../config/configuration';
import { ProviderError } from '../../../../core/errors';
import { StripeApiClientService } from './stripe-api-client.service';
import { StripePaymentIntent, StripeRefund } from './stripe-api.types';
import { StripeGatewayAdapter } from './stripe-gateway.adapter';

const intent = (
  overrides: Partial<StripePaymentIntent> = {},
): StripePaymentIntent => ({
  id: 'pi_test_1',
  object: 'payment_intent',
  amount: 1998,
  currency: 'usd',
  status: 'requires_payment_method',
  client_secret: 'pi_test_1_secret_abc',
  last_payment_error: null,
  metadata: {},
  ...overrides,
});

const refund = (status: string | null): StripeRefund => ({
  id: 're_1',
  object: 'refund',
  amount: 1998,
  currency: 'usd',
  payment_intent: 'pi_test_1',
  status,
});

describe('StripeGatewayAdapter', () => {
  let module: TestingModule;
  let adapter: StripeGatewayAdapter;
  const client = {
    createPaymentIntent: jest.fn(),
    retrievePaymentIntent: jest.fn(),
    createRefund: jest.fn(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    module = await Test.createTestingModule({
      providers: [
        StripeGatewayAdapter,
        { provide: StripeApiClientService, useValue: client },
        {
          provide: paymentsConfig.KEY,
          useValue: {
            currency: 'usd',
            sweepEnabled: false,
            sweepStaleAfterMinutes: 5,
            sweepBatchSize: 50,
          },
        },
      ],
    }).compile();
    adapter = module.get(StripeGatewayAdapter);
  });

  it('creates an intent in minor units and returns its handle', async () => {
    client.createPaymentIntent.mockResolvedValue(intent());

    const handle = await adapter.initiatePayment(12, '19.98', 'USD', {
      idempotencyKey: 'order-12-attempt-1',
    });

    expect(handle).toEqual({
      clientSecret: 'pi_test_1_secret_abc',
      externalId: 'pi_test_1',
    });
    expect(adapter.getLastPaymentIntentId()).toBe('pi_test_1');
    expect(client.createPaymentIntent).toHaveBeenCalledWith(
      { amount: 1998, currency: 'usd', metadata: { order_id: '12' } },
      'order-12-attempt-1',
    );
  });

  it('fails when Stripe returns no client secret', async () => {
    client.createPaymentIntent.mockResolvedValue(
      intent({ client_secret: null }),
    );

    await expect(adapter.initiatePayment(12, '19.98', 'usd')).rejects.toBeInstanceOf(
      ProviderError,
    );
    expect(adapter.getLastPaymentIntentId()).toBeNull();
  });

  it('reports intent snapshots with the last error message', async () => {
    client.retrievePaymentIntent.mockResolvedValue(
      intent({
        status: 'requires_payment_method',
        last_payment_error: { message: 'Your card was declined.' },
      }),
    );

    await expect(adapter.getPaymentIntent('pi_test_1')).resolves.toEqual({
      id: 'pi_test_1',
      status: 'requires_payment_method',
      amount: 1998,
      currency: 'usd',
      clientSecret: 'pi_test_1_secret_abc',
      lastPaymentErrorMessage: 'Your card was declined.',
    });
  });

  it('completes only succeeded intents', async () => {
    client.retrievePaymentIntent
      .mockResolvedValueOnce(intent({ status: 'succeeded' }))
      .mockResolvedValueOnce(intent({ status: 'processing' }));

    await expect(adapter.completePayment('pi_test_1')).resolves.toBe(true);
    await expect(adapter.completePayment('pi_test_1')).resolves.toBe(false);
  });

  it('refunds partially in minor units', async () => {
    client.createRefund.mockResolvedValue(refund('succeeded'));

    await expect(
      adapter.refundPayment('pi_test_1', '5.50', {
        idempotencyKey: 'refund-4-5.50',
      }),
    ).resolves.toBe(true);
    expect(client.createRefund).toHaveBeenCalledWith(
      { paymentIntent: 'pi_test_1', amount: 550 },
      'refund-4-5.50',
    );
  });

  it.each([
    ['succeeded', true],
    ['pending', true],
    ['failed', false],
    ['canceled', false],
    [null, false],
  ])('treats refund status %s as accepted=%s', async (status, accepted) => {
    client.createRefund.mockResolvedValue(refund(status));

    await expect(adapter.refundPayment('pi_test_1')).resolves.toBe(accepted);
    expect(client.createRefund).toHaveBeenCalledWith(
      { paymentIntent: 'pi_test_1', amount: undefined },
      undefined,
    );
  });
});
