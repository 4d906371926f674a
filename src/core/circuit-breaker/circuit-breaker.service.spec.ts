import { CircuitBreakerService } from './circuit-breaker.service';

describe('CircuitBreakerService', () => {
  let service: CircuitBreakerService;

  beforeEach(() => {
    service = new CircuitBreakerService();
  });

  afterEach(() => {
    service.onModuleDestroy();
  });

  it('passes calls through while closed', async () => {
    const breaker = service.createProviderCircuitBreaker(
      'stripe',
      async (value: number) => value * 2,
    );

    await expect(breaker.fire(21)).resolves.toBe(42);
    expect(service.getProviderCircuitBreakerState('stripe')).toEqual({
      state: 'closed',
      enabled: true,
      failures: 0,
      fires: 1,
      timeouts: 0,
    });
  });

  it('does not count filtered errors as failures', async () => {
    const breaker = service.createProviderCircuitBreaker(
      'stripe',
      async () => {
        throw new Error('card_declined');
      },
      { errorFilter: () => true },
    );

    await expect(breaker.fire()).rejects.toThrow('card_declined');
    expect(service.getProviderCircuitBreakerState('stripe')?.failures).toBe(0);
  });

  it('stays closed until enough calls have been seen', async () => {
    const breaker = service.createProviderCircuitBreaker('stripe', async () => {
      throw new Error('timeout');
    });

    for (let call = 0; call < 4; call++) {
      await expect(breaker.fire()).rejects.toThrow('timeout');
    }
    expect(service.isProviderCircuitBreakerOpen('stripe')).toBe(false);

    await expect(breaker.fire()).rejects.toThrow('timeout');
    expect(service.isProviderCircuitBreakerOpen('stripe')).toBe(true);
    await expect(breaker.fire()).rejects.toThrow('Breaker is open');
  });

  it('reports unknown breakers as null and not open', () => {
    expect(service.getCircuitBreakerState('missing')).toBeNull();
    expect(service.isProviderCircuitBreakerOpen('missing')).toBe(false);
  });

  it('lists every breaker by name', () => {
    service.createCircuitBreaker(async () => 1, { name: 'a' });
    service.createProviderCircuitBreaker('stripe', async () => 2);

    expect(Object.keys(service.getAllCircuitBreakersState())).toEqual([
      'a',
      'stripe-api',
    ]);
  });
});
