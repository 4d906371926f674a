import { ExecutionContext, RequestTimeoutException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { lastValueFrom, of, timer } from 'rxjs';
import { map } from 'rxjs/operators';
import { Timeout } from './timeout.decorator';
import { TimeoutInterceptor } from './timeout.interceptor';

class SlowController {
  @Timeout(10)
  slow(): void {}

  fast(): void {}
}

const contextFor = (handler: () => void): ExecutionContext => {
  const request = { method: 'GET', url: '/api/slow' };
  return {
    getHandler: () => handler,
    getClass: () => SlowController,
    switchToHttp: () => ({
      getRequest: () => request,
      getResponse: () => ({}),
      getNext: () => undefined,
    }),
  } as unknown as ExecutionContext;
};

describe('TimeoutInterceptor', () => {
  const interceptor = new TimeoutInterceptor(new Reflector());

  it('fails with 408 when the handler exceeds its budget', async () => {
    const result$ = interceptor.intercept(
      contextFor(SlowController.prototype.slow),
      { handle: () => timer(200).pipe(map(() => 'late')) },
    );

    await expect(lastValueFrom(result$)).rejects.toBeInstanceOf(
      RequestTimeoutException,
    );
  });

  it('passes values through within the budget', async () => {
    const result$ = interceptor.intercept(
      contextFor(SlowController.prototype.fast),
      { handle: () => of('ok') },
    );

    await expect(lastValueFrom(result$)).resolves.toBe('ok');
  });
});
