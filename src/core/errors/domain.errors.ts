import { HttpStatus } from '@nestjs/common';

export enum DomainErrorKind {
  NOT_FOUND = 'not_found',
  CONFLICT = 'conflict',
  INVALID_STATE = 'invalid_state',
  UNAUTHORIZED = 'unauthorized',
  PROVIDER = 'provider_error',
}

const STATUS_BY_KIND: Record<DomainErrorKind, HttpStatus> = {
  [DomainErrorKind.NOT_FOUND]: HttpStatus.NOT_FOUND,
  [DomainErrorKind.CONFLICT]: HttpStatus.BAD_REQUEST,
  [DomainErrorKind.INVALID_STATE]: HttpStatus.BAD_REQUEST,
  [DomainErrorKind.UNAUTHORIZED]: HttpStatus.FORBIDDEN,
  [DomainErrorKind.PROVIDER]: HttpStatus.BAD_GATEWAY,
};

export type ErrorDetails = Record<string, string | number | null>;

/**
 * Base class for every failure the core reports to its callers.
 *
 * `code` is stable and machine readable; `details` names the offending
 * resource ids. The HTTP status defaults from `kind` and can be overridden
 * by subclasses whose transport status differs from their category.
 */
export abstract class DomainError extends Error {
  abstract readonly kind: DomainErrorKind;
  abstract readonly code: string;

  constructor(
    message: string,
    readonly details?: ErrorDetails,
  ) {
    super(message);
    this.name = new.target.name;
  }

  get status(): HttpStatus {
    return STATUS_BY_KIND[this.kind];
  }
}

export abstract class NotFoundError extends DomainError {
  readonly kind = DomainErrorKind.NOT_FOUND;
}

export abstract class ConflictError extends DomainError {
  readonly kind = DomainErrorKind.CONFLICT;
}

export abstract class InvalidStateError extends DomainError {
  readonly kind = DomainErrorKind.INVALID_STATE;
}

export class NotAuthorizedError extends DomainError {
  readonly kind = DomainErrorKind.UNAUTHORIZED;
  readonly code = 'not_authorized';

  constructor(resource: 'order', resourceId: number) {
    super(`Not authorized to access ${resource} ${resourceId}`, {
      [`${resource}Id`]: resourceId,
    });
  }
}

/**
 * Upstream payment provider failure: timeouts, open circuit, transport
 * errors and provider-side rejections of a request.
 */
export class ProviderError extends DomainError {
  readonly kind = DomainErrorKind.PROVIDER;
  readonly code = 'provider_error';

  constructor(
    message: string,
    readonly upstreamStatus: number | null = null,
    details?: ErrorDetails,
  ) {
    super(message, { upstreamStatus, ...details });
  }

  /** Client-side rejections (bad request, card declined) are not outages. */
  get isClientError(): boolean {
    return (
      this.upstreamStatus !== null &&
      this.upstreamStatus >= 400 &&
      this.upstreamStatus < 500 &&
      this.upstreamStatus !== HttpStatus.TOO_MANY_REQUESTS
    );
  }
}

export class WebhookSignatureError extends DomainError {
  readonly kind = DomainErrorKind.PROVIDER;
  readonly code = 'invalid_webhook_signature';

  constructor(reason: string) {
    super(`Webhook signature verification failed: ${reason}`);
  }

  get status(): HttpStatus {
    return HttpStatus.BAD_REQUEST;
  }
}
