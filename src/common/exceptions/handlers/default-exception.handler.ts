import { ArgumentsHost, HttpStatus } from '@nestjs/common';
import { ErrorResponse } from '../../interfaces/exception-handler.interface';
import { BaseExceptionHandler } from './base-exception.handler';

export class DefaultExceptionHandler extends BaseExceptionHandler {
    canHandle(): boolean {
        return true; // catch-all
    }

    handle(exception: unknown, host: ArgumentsHost): ErrorResponse {
        let message = 'An internal error occurred';
        let error = 'InternalServerError';

        if (exception instanceof Error && !this.isProduction()) {
            message = exception.message || message;
            error = exception.name || error;
        }

        return this.createErrorResponse(
            HttpStatus.INTERNAL_SERVER_ERROR,
            message,
            error,
            host,
        );
    }

    getPriority(): number {
        return 999;
    }
}
