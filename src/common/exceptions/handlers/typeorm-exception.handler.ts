import { ArgumentsHost, HttpStatus } from '@nestjs/common';
import { EntityNotFoundError, QueryFailedError } from 'typeorm';
import { ErrorResponse } from '../../interfaces/exception-handler.interface';
import { BaseExceptionHandler } from './base-exception.handler';

interface PostgresErrorFields {
  code?: string;
  detail?: string;
  constraint?: string;
}

export class TypeOrmExceptionHandler extends BaseExceptionHandler {
  canHandle(exception: unknown): boolean {
    return (
      exception instanceof QueryFailedError ||
      exception instanceof EntityNotFoundError
    );
  }

  handle(exception: unknown, host: ArgumentsHost): ErrorResponse {
    if (exception instanceof EntityNotFoundError) {
      return this.createErrorResponse(
        HttpStatus.NOT_FOUND,
        'The requested record does not exist',
        'Database Error',
        host,
      );
    }

    const fields = this.extractDriverFields(exception);
    const { httpStatus, userMessage } = this.mapPostgresError(fields);

    return this.createErrorResponse(
      httpStatus,
      userMessage,
      `Database Error${fields.code ? ` (${fields.code})` : ''}`,
      host,
    );
  }

  getPriority(): number {
    return 3;
  }

  private extractDriverFields(exception: unknown): PostgresErrorFields {
    if (!(exception instanceof QueryFailedError)) {
      return {};
    }

    const driverError: unknown = exception.driverError;
    if (typeof driverError !== 'object' || driverError === null) {
      return {};
    }

    const read = (key: keyof PostgresErrorFields): string | undefined => {
      const value: unknown = Reflect.get(driverError, key);
      return typeof value === 'string' ? value : undefined;
    };

    return {
      code: read('code'),
      detail: read('detail'),
      constraint: read('constraint'),
    };
  }

  private mapPostgresError(fields: PostgresErrorFields): {
    httpStatus: HttpStatus;
    userMessage: string;
  } {
    switch (fields.code) {
      case '23505':
        return {
          httpStatus: HttpStatus.CONFLICT,
          userMessage: this.formatUniqueConstraintError(fields.detail),
        };
      case '23503':
        return {
          httpStatus: HttpStatus.BAD_REQUEST,
          userMessage: 'Operation failed due to missing related data',
        };
      case '23502':
        return {
          httpStatus: HttpStatus.BAD_REQUEST,
          userMessage: 'A required field cannot be empty',
        };
      case '22P02':
        return {
          httpStatus: HttpStatus.BAD_REQUEST,
          userMessage: 'Invalid data format',
        };
      case '57P01':
      case '53300':
        return {
          httpStatus: HttpStatus.SERVICE_UNAVAILABLE,
          userMessage: 'Database service is temporarily unavailable',
        };
      case undefined:
        return {
          httpStatus: HttpStatus.INTERNAL_SERVER_ERROR,
          userMessage: 'A database error occurred',
        };
      default:
        return {
          httpStatus: HttpStatus.BAD_REQUEST,
          userMessage: 'Invalid data provided',
        };
    }
  }

  // pg reports e.g. `Key (email)=(a@b.c) already exists.`
  private formatUniqueConstraintError(detail?: string): string {
    const match = detail?.match(/^Key \(([^)]+)\)=/);
    if (match) {
      return `A record with this ${match[1]} already exists`;
    }
    return 'A record with this data already exists';
  }
}
