import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
  RequestTimeoutException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { Observable, throwError, TimeoutError } from 'rxjs';
import { catchError, timeout } from 'rxjs/operators';
import { logger } from '../logger/logger.config';
import { TIMEOUT_KEY } from './timeout.decorator';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

/**
 * Bounds request handling time. Handlers opt into a different budget with
 * `@Timeout(ms)` on the method or the controller class.
 */
@Injectable()
export class TimeoutInterceptor implements NestInterceptor {
  private readonly logger = logger();

  constructor(private readonly reflector: Reflector) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const timeoutMs =
      this.reflector.getAllAndOverride<number | undefined>(TIMEOUT_KEY, [
        context.getHandler(),
        context.getClass(),
      ]) ?? DEFAULT_REQUEST_TIMEOUT_MS;

    return next.handle().pipe(
      timeout(timeoutMs),
      catchError((err: unknown) => {
        if (err instanceof TimeoutError) {
          const request = context.switchToHttp().getRequest<Request>();
          this.logger.error(
            { timeoutMs, method: request.method, path: request.url },
            'Request timed out',
          );
          return throwError(
            () =>
              new RequestTimeoutException(
                `Operation timed out after ${timeoutMs}ms`,
              ),
          );
        }
        return throwError(() => err);
      }),
    );
  }
}
