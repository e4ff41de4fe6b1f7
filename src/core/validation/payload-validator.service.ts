import { BadRequestException, Injectable } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { logger } from '../logger/logger.config';
import { describeError } from '../utils/timestamp.util';

const collectMessages = (errors: ValidationError[], prefix = ''): string[] =>
  errors.flatMap((error) => {
    const own = Object.values(error.constraints || {}).map((message) =>
      prefix ? `${prefix}: ${message}` : message,
    );
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    return [...own, ...collectMessages(error.children || [], path)];
  });

@Injectable()
export class PayloadValidatorService {
  private readonly logger = logger();

  /**
   * Parses a JSON document received as a string field, e.g. the `data` field of
   * a form-encoded webhook.
   */
  parseJson(raw: string | undefined): unknown {
    if (raw === undefined) {
      throw new BadRequestException('Invalid JSON format');
    }
    try {
      return JSON.parse(raw);
    } catch (error) {
      this.logger.warn(
        { error: describeError(error) },
        'Rejected malformed JSON payload',
      );
      throw new BadRequestException('Invalid JSON format');
    }
  }

  async validateWithDto<T extends object>(
    payload: unknown,
    dtoClass: ClassConstructor<T>,
  ): Promise<T> {
    if (!payload || typeof payload !== 'object' || Array.isArray(payload)) {
      this.logger.warn('Invalid payload structure');
      throw new BadRequestException('Invalid payload structure');
    }

    const dto = plainToInstance(dtoClass, payload);
    const errors = await validate(dto);

    if (errors.length > 0) {
      const errorMessages = collectMessages(errors);
      this.logger.warn(
        { errors: errorMessages },
        'Payload validation failed',
      );
      throw new BadRequestException({
        message: 'Validation failed',
        errors: errorMessages,
      });
    }

    return dto;
  }
}
