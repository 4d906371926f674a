import { HttpService } from '@nestjs/axios';
import { HttpStatus, Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { AxiosRequestConfig, isAxiosError } from 'axios';
import CircuitBreaker from 'opossum';
import { firstValueFrom } from 'rxjs';
import { CircuitBreakerService } from '../../../../core/circuit-breaker/circuit-breaker.service';
import { ProviderError } from '../../../../core/errors';
import { logger } from '../../../../core/logger/logger.config';
import {
  delayWithJitter,
  parseRetryAfter,
} from '../../../../core/utils/delay.util';
import { stripeConfig } from '../../../../config/configuration';
import {
  isStripePaymentIntent,
  isStripeRefund,
  StripeErrorBody,
  StripeFormValue,
  StripePaymentIntent,
  StripeRefund,
  StripeRequest,
} from './stripe-api.types';

export const STRIPE_PROVIDER = 'stripe';

@Injectable()
export class StripeApiClientService {
  private readonly logger = logger();
  private circuitBreaker: CircuitBreaker<[StripeRequest], unknown> | null =
    null;

  constructor(
    private readonly httpService: HttpService,
    @Inject(stripeConfig.KEY)
    private readonly config: ConfigType<typeof stripeConfig>,
    private readonly circuitBreakerService: CircuitBreakerService,
  ) {}

  async createPaymentIntent(
    params: {
      amount: number;
      currency: string;
      metadata?: Record<string, string>;
    },
    idempotencyKey?: string,
  ): Promise<StripePaymentIntent> {
    const form: Record<string, StripeFormValue> = {
      amount: params.amount,
      currency: params.currency,
      'automatic_payment_methods[enabled]': 'true',
    };
    for (const [key, value] of Object.entries(params.metadata ?? {})) {
      form[`metadata[${key}]`] = value;
    }

    return this.fire(
      { method: 'POST', path: '/payment_intents', form, idempotencyKey },
      isStripePaymentIntent,
    );
  }

  async retrievePaymentIntent(id: string): Promise<StripePaymentIntent> {
    return this.fire(
      { method: 'GET', path: `/payment_intents/${encodeURIComponent(id)}` },
      isStripePaymentIntent,
    );
  }

  async createRefund(
    params: { paymentIntent: string; amount?: number },
    idempotencyKey?: string,
  ): Promise<StripeRefund> {
    return this.fire(
      {
        method: 'POST',
        path: '/refunds',
        form: { payment_intent: params.paymentIntent, amount: params.amount },
        idempotencyKey,
      },
      isStripeRefund,
    );
  }

  private getCircuitBreaker(): CircuitBreaker<[StripeRequest], unknown> {
    if (!this.circuitBreaker) {
      // covers every retry of one logical call
      const breakerTimeout =
        this.config.timeoutMs * (this.config.maxRetries + 2);

      this.circuitBreaker =
        this.circuitBreakerService.createProviderCircuitBreaker(
          STRIPE_PROVIDER,
          (request: StripeRequest) => this.makeRequestWithRetry(request),
          {
            timeout: breakerTimeout,
            errorFilter: (error) =>
              error instanceof ProviderError && error.isClientError,
          },
        );
    }
    return this.circuitBreaker;
  }

  private async fire<T>(
    request: StripeRequest,
    isExpected: (data: unknown) => data is T,
  ): Promise<T> {
    let data: unknown;
    try {
      data = await this.getCircuitBreaker().fire(request);
    } catch (error) {
      if (error instanceof ProviderError) throw error;

      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        { method: request.method, path: request.path, error: message },
        'Stripe request aborted',
      );
      throw new ProviderError(`Stripe request failed: ${message}`, null, {
        path: request.path,
      });
    }

    if (!isExpected(data)) {
      this.logger.error(
        { method: request.method, path: request.path },
        'Unexpected Stripe response body',
      );
      throw new ProviderError('Stripe returned an unexpected response', null, {
        path: request.path,
      });
    }
    return data;
  }

  /**
   * Retries rate-limited calls with backoff outside the HTTP timeout.
   * Stripe replays POSTs carrying the same Idempotency-Key safely.
   */
  private async makeRequestWithRetry(
    request: StripeRequest,
    attempt: number = 0,
  ): Promise<unknown> {
    try {
      return await this.makeRequest(request);
    } catch (error) {
      if (
        error instanceof ProviderError &&
        error.upstreamStatus === HttpStatus.TOO_MANY_REQUESTS &&
        attempt < this.config.maxRetries
      ) {
        const retryAfter = parseRetryAfter(
          error.details?.retryAfter ?? undefined,
          0,
        );
        const backoffDelay = this.config.retryBackoffBaseMs * 2 ** attempt;
        const waitTime = Math.max(retryAfter, backoffDelay);

        this.logger.warn(
          {
            path: request.path,
            method: request.method,
            attempt,
            waitTime,
            nextAttempt: attempt + 1,
            maxRetries: this.config.maxRetries,
          },
          'Stripe rate limit hit, retrying with backoff',
        );

        await delayWithJitter(waitTime, 30);
        return this.makeRequestWithRetry(request, attempt + 1);
      }

      throw error;
    }
  }

  private async makeRequest(request: StripeRequest): Promise<unknown> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.config.apiKey}`,
    };
    if (request.idempotencyKey) {
      headers['Idempotency-Key'] = request.idempotencyKey;
    }

    const requestConfig: AxiosRequestConfig = {
      method: request.method,
      url: `${this.config.baseUrl}${request.path}`,
      headers,
      timeout: this.config.timeoutMs,
    };
    if (request.method === 'POST') {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      requestConfig.data = StripeApiClientService.encodeForm(
        request.form ?? {},
      );
    }

    this.logger.debug(
      { method: request.method, path: request.path },
      'Calling Stripe',
    );

    try {
      const response = await firstValueFrom(
        this.httpService.request<unknown>(requestConfig),
      );
      return response.data;
    } catch (error) {
      throw this.toProviderError(error, request);
    }
  }

  private toProviderError(error: unknown, request: StripeRequest): ProviderError {
    if (!isAxiosError<StripeErrorBody>(error)) {
      const message = error instanceof Error ? error.message : String(error);
      return new ProviderError(`Stripe request failed: ${message}`, null, {
        path: request.path,
      });
    }

    const statusCode = error.response?.status ?? null;
    const stripeError = error.response?.data?.error;
    const errorMessage =
      stripeError?.message || error.message || 'Stripe request failed';
    const retryAfterHeader: unknown = error.response?.headers?.['retry-after'];

    if (statusCode !== HttpStatus.TOO_MANY_REQUESTS) {
      this.logger.error(
        {
          method: request.method,
          path: request.path,
          statusCode,
          errorType: stripeError?.type,
          errorCode: stripeError?.code ?? error.code,
          errorMessage,
        },
        'Stripe request failed',
      );
    }

    return new ProviderError(`Stripe: ${errorMessage}`, statusCode, {
      path: request.path,
      stripeCode: stripeError?.code ?? null,
      retryAfter:
        typeof retryAfterHeader === 'string' ? retryAfterHeader : null,
    });
  }

  private static encodeForm(form: Record<string, StripeFormValue>): string {
    const body = new URLSearchParams();
    for (const [key, value] of Object.entries(form)) {
      if (value !== undefined) body.append(key, String(value));
    }
    return body.toString();
  }
}
