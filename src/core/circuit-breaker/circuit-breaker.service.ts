import { Injectable, OnModuleDestroy } from '@nestjs/common';
import CircuitBreaker from 'opossum';
import { logger } from '../logger/logger.config';

export interface CircuitBreakerOptions {
  timeout?: number;
  errorThresholdPercentage?: number;
  resetTimeout?: number;
  /** Calls within the rolling window before the breaker may open. */
  volumeThreshold?: number;
  name?: string;
  /**
   * Return true for errors that should NOT count as a failure
   * (for example a 4xx from the upstream API).
   */
  errorFilter?: (error: unknown) => boolean;
}

export type CircuitBreakerStateName = 'closed' | 'open' | 'halfOpen';

export interface CircuitBreakerState {
  state: CircuitBreakerStateName;
  enabled: boolean;
  failures: number;
  fires: number;
  timeouts: number;
}

const DEFAULT_TIMEOUT_MS = 10000;
const DEFAULT_ERROR_THRESHOLD_PERCENTAGE = 50;
const DEFAULT_RESET_TIMEOUT_MS = 30000;
const DEFAULT_VOLUME_THRESHOLD = 5;

@Injectable()
export class CircuitBreakerService implements OnModuleDestroy {
  private readonly logger = logger();
  private readonly breakers = new Map<string, CircuitBreaker>();

  createCircuitBreaker<TArgs extends unknown[], TResult>(
    fn: (...args: TArgs) => Promise<TResult>,
    options?: CircuitBreakerOptions,
  ): CircuitBreaker<TArgs, TResult> {
    const name = options?.name || 'default';

    const breaker = new CircuitBreaker(fn, {
      timeout: options?.timeout ?? DEFAULT_TIMEOUT_MS,
      errorThresholdPercentage:
        options?.errorThresholdPercentage ?? DEFAULT_ERROR_THRESHOLD_PERCENTAGE,
      resetTimeout: options?.resetTimeout ?? DEFAULT_RESET_TIMEOUT_MS,
      volumeThreshold: options?.volumeThreshold ?? DEFAULT_VOLUME_THRESHOLD,
      errorFilter: options?.errorFilter,
      name,
    });

    breaker.on('open', () => {
      this.logger.warn(
        { circuitBreaker: name, state: 'open' },
        'Circuit breaker opened',
      );
    });

    breaker.on('halfOpen', () => {
      this.logger.info(
        { circuitBreaker: name, state: 'halfOpen' },
        'Circuit breaker half-open',
      );
    });

    breaker.on('close', () => {
      this.logger.info(
        { circuitBreaker: name, state: 'close' },
        'Circuit breaker closed',
      );
    });

    breaker.on('failure', (error: unknown) => {
      this.logger.error(
        {
          circuitBreaker: name,
          error: error instanceof Error ? error.message : String(error),
        },
        'Circuit breaker failure',
      );
    });

    const previous = this.breakers.get(name);
    if (previous) {
      previous.shutdown();
    }
    this.breakers.set(name, breaker);
    return breaker;
  }

  createProviderCircuitBreaker<TArgs extends unknown[], TResult>(
    provider: string,
    fn: (...args: TArgs) => Promise<TResult>,
    options?: Omit<CircuitBreakerOptions, 'name'>,
  ): CircuitBreaker<TArgs, TResult> {
    return this.createCircuitBreaker(fn, {
      ...options,
      name: `${provider}-api`,
    });
  }

  getCircuitBreakerState(name: string): CircuitBreakerState | null {
    const breaker = this.breakers.get(name);
    if (!breaker) return null;
    return this.describe(breaker);
  }

  getProviderCircuitBreakerState(provider: string): CircuitBreakerState | null {
    return this.getCircuitBreakerState(`${provider}-api`);
  }

  isProviderCircuitBreakerOpen(provider: string): boolean {
    return this.getProviderCircuitBreakerState(provider)?.state === 'open';
  }

  getAllCircuitBreakersState(): Record<string, CircuitBreakerState> {
    const states: Record<string, CircuitBreakerState> = {};
    this.breakers.forEach((breaker, name) => {
      states[name] = this.describe(breaker);
    });
    return states;
  }

  onModuleDestroy(): void {
    this.breakers.forEach((breaker) => breaker.shutdown());
    this.breakers.clear();
  }

  private describe(breaker: CircuitBreaker): CircuitBreakerState {
    let state: CircuitBreakerStateName = 'closed';
    if (breaker.opened) {
      state = 'open';
    } else if (breaker.halfOpen) {
      state = 'halfOpen';
    }

    return {
      state,
      enabled: breaker.enabled,
      failures: breaker.stats.failures,
      fires: breaker.stats.fires,
      timeouts: breaker.stats.timeouts,
    };
  }
}
