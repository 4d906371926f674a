import { BadRequestException } from '@nestjs/common';
import {
  signStripePayload,
  TEST_WEBHOOK_SECRET,
} from '../../../../../test/utils/stripe-signature';
import { WebhookSignatureError } from '../../../../core/errors';
import { StripeConfig } from '../../../../config/configuration';
import { StripeWebhookVerifier } from './stripe-webhook.verifier';

const config: StripeConfig = {
  baseUrl: 'https://stripe.test/v1',
  apiKey: 'sk_test_placeholder',
  webhookSecret: TEST_WEBHOOK_SECRET,
  webhookToleranceSeconds: 300,
  timeoutMs: 1000,
  maxRetries: 0,
  retryBackoffBaseMs: 1,
};

describe('StripeWebhookVerifier', () => {
  const verifier = new StripeWebhookVerifier(config);
  const event = {
    id: 'evt_1',
    type: 'payment_intent.succeeded',
    data: { object: { id: 'pi_test_1' } },
  };
  const payload = JSON.stringify(event);
  const nowSeconds = () => Math.floor(Date.now() / 1000);

  it('returns the decoded event for a correctly signed body', () => {
    const header = signStripePayload(payload);

    expect(verifier.verify(Buffer.from(payload), header)).toEqual(event);
  });

  it('accepts a header where any v1 entry matches', () => {
    const timestamp = nowSeconds();
    const valid = signStripePayload(payload, timestamp).split('v1=')[1];
    const header = `t=${timestamp},v1=${'0'.repeat(64)},v1=${valid}`;

    expect(verifier.verify(Buffer.from(payload), header)).toEqual(event);
  });

  it('rejects a tampered body', () => {
    const header = signStripePayload(payload);
    const tampered = payload.replace('pi_test_1', 'pi_test_2');

    expect(() => verifier.verify(Buffer.from(tampered), header)).toThrow(
      WebhookSignatureError,
    );
  });

  it('rejects a body signed with another secret', () => {
    const header = signStripePayload(payload, nowSeconds(), 'whsec_other');

    expect(() => verifier.verify(Buffer.from(payload), header)).toThrow(
      WebhookSignatureError,
    );
  });

  it('rejects a missing header', () => {
    expect(() => verifier.verify(Buffer.from(payload), undefined)).toThrow(
      'Webhook signature verification failed: missing signature header',
    );
  });

  it('rejects a header without a timestamp', () => {
    expect(() => verifier.verify(Buffer.from(payload), 'v1=abcdef')).toThrow(
      WebhookSignatureError,
    );
  });

  it('rejects stale deliveries', () => {
    const header = signStripePayload(payload, nowSeconds() - 301);

    expect(() => verifier.verify(Buffer.from(payload), header)).toThrow(
      WebhookSignatureError,
    );
  });

  it('rejects every delivery while no secret is configured', () => {
    const unconfigured = new StripeWebhookVerifier({
      ...config,
      webhookSecret: '',
    });

    expect(() =>
      unconfigured.verify(Buffer.from(payload), signStripePayload(payload)),
    ).toThrow(
      'Webhook signature verification failed: webhook secret is not configured',
    );
  });

  it('rejects a signed body that is not JSON', () => {
    const header = signStripePayload('not json');

    expect(() => verifier.verify(Buffer.from('not json'), header)).toThrow(
      BadRequestException,
    );
  });

  it('reports a 400 status', () => {
    expect(new WebhookSignatureError('x').status).toBe(400);
  });
});
