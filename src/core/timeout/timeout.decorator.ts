import { SetMetadata } from '@nestjs/common';

export const TIMEOUT_KEY = 'request-timeout';

/** Overrides the request time budget read by `TimeoutInterceptor`. */
export const Timeout = (timeoutMs: number) =>
  SetMetadata(TIMEOUT_KEY, timeoutMs);
