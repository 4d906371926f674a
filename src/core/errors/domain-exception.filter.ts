import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { logger } from '../logger/logger.config';
import { DomainError, ErrorDetails } from './domain.errors';

export interface ErrorResponseBody {
  statusCode: number;
  error: string;
  message: string | string[];
  details?: ErrorDetails;
  errors?: string[];
}

@Catch()
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger = logger();

  catch(exception: unknown, host: ArgumentsHost): void {
    const context = host.switchToHttp();
    const request = context.getRequest<Request>();
    const response = context.getResponse<Response>();

    const { status, body } = this.toResponse(exception, request);
    response.status(status).json(body);
  }

  toResponse(
    exception: unknown,
    request: Pick<Request, 'method' | 'url'>,
  ): { status: number; body: ErrorResponseBody } {
    if (exception instanceof DomainError) {
      const status = exception.status;
      const log = { code: exception.code, details: exception.details };
      if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(
          { ...log, method: request.method, path: request.url },
          exception.message,
        );
      } else {
        this.logger.warn(log, exception.message);
      }

      return {
        status,
        body: {
          statusCode: status,
          error: exception.code,
          message: exception.message,
          ...(exception.details && { details: exception.details }),
        },
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const payload = exception.getResponse();
      const message =
        typeof payload === 'string'
          ? payload
          : this.extractMessage(payload) ?? exception.message;

      const errors =
        typeof payload === 'object' ? this.extractErrors(payload) : undefined;

      return {
        status,
        body: {
          statusCode: status,
          error: this.statusLabel(status),
          message,
          ...(errors && { errors }),
        },
      };
    }

    const error =
      exception instanceof Error ? exception : new Error(String(exception));
    this.logger.error(
      {
        error: error.message,
        stack: error.stack,
        method: request.method,
        path: request.url,
      },
      'Unhandled error',
    );

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'internal_error',
        message: 'Internal server error',
      },
    };
  }

  private extractMessage(payload: object): string | string[] | undefined {
    if (!('message' in payload)) return undefined;
    const { message } = payload;
    if (typeof message === 'string') return message;
    if (
      Array.isArray(message) &&
      message.every((item): item is string => typeof item === 'string')
    ) {
      return message;
    }
    return undefined;
  }

  private extractErrors(payload: object): string[] | undefined {
    if (!('errors' in payload)) return undefined;
    const { errors } = payload;
    return Array.isArray(errors) &&
      errors.every((item): item is string => typeof item === 'string')
      ? errors
      : undefined;
  }

  private statusLabel(status: number): string {
    const label = HttpStatus[status];
    return label ? label.toLowerCase() : 'error';
  }
}
