import { Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { CircuitBreakerService } from '../../core/circuit-breaker/circuit-breaker.service';
import { STRIPE_PROVIDER } from '../providers/stripe/adapters/stripe-api-client.service';

@Injectable()
export class HealthService extends HealthIndicator {
  constructor(private readonly circuitBreakerService: CircuitBreakerService) {
    super();
  }

  /** Healthy until the provider breaker opens; a breaker is created on first use. */
  async checkPaymentProvider(): Promise<HealthIndicatorResult> {
    const key = 'payment-provider';
    const state =
      this.circuitBreakerService.getProviderCircuitBreakerState(
        STRIPE_PROVIDER,
      );
    if (!state) {
      return this.getStatus(key, true, {
        provider: STRIPE_PROVIDER,
        message: 'Circuit breaker not initialized',
      });
    }

    return this.getStatus(key, state.state !== 'open', {
      provider: STRIPE_PROVIDER,
      state: state.state,
      enabled: state.enabled,
      failures: state.failures,
      fires: state.fires,
      timeouts: state.timeouts,
    });
  }

  async checkCircuitBreakers(): Promise<HealthIndicatorResult> {
    const allBreakers = this.circuitBreakerService.getAllCircuitBreakersState();
    const openBreakers = Object.entries(allBreakers).filter(
      ([, state]) => state.state === 'open',
    );

    const isHealthy = openBreakers.length === 0;

    return this.getStatus('circuit-breakers', isHealthy, {
      total: Object.keys(allBreakers).length,
      open: openBreakers.length,
      breakers: allBreakers,
      message: isHealthy
        ? 'All circuit breakers closed'
        : `${openBreakers.length} circuit breaker(s) open`,
    });
  }
}
