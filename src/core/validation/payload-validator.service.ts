import { BadRequestException, Injectable } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { logger } from '../logger/logger.config';

/**
 * Validates payloads that do not arrive through the global ValidationPipe,
 * such as provider webhooks that must be verified on their raw bytes first.
 */
@Injectable()
export class PayloadValidatorService {
  private readonly logger = logger();

  isValidPayloadStructure(
    payload: unknown,
  ): payload is Record<string, unknown> {
    return (
      payload !== null && typeof payload === 'object' && !Array.isArray(payload)
    );
  }

  async validateWithDto<T extends object>(
    payload: Record<string, unknown>,
    dtoClass: ClassConstructor<T>,
  ): Promise<T> {
    const dto = plainToInstance(dtoClass, payload);
    const errors = await validate(dto);

    if (errors.length > 0) {
      const errorMessages = this.flattenErrors(errors);
      this.logger.warn({ errors: errorMessages }, 'Payload validation failed');
      throw new BadRequestException({
        message: 'Validation failed',
        errors: errorMessages,
      });
    }

    return dto;
  }

  async validatePayload<T extends object>(
    payload: unknown,
    dtoClass: ClassConstructor<T>,
  ): Promise<T> {
    if (!this.isValidPayloadStructure(payload)) {
      this.logger.warn('Invalid payload structure');
      throw new BadRequestException('Invalid payload structure');
    }

    return this.validateWithDto(payload, dtoClass);
  }

  private flattenErrors(errors: ValidationError[], prefix = ''): string[] {
    return errors.flatMap((error) => {
      const path = prefix ? `${prefix}.${error.property}` : error.property;
      const own = Object.values(error.constraints || {}).map(
        (message) => `${path}: ${message}`,
      );
      return [...own, ...this.flattenErrors(error.children || [], path)];
    });
  }
}
