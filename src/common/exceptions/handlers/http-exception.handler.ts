import { ArgumentsHost, HttpException, HttpStatus } from '@nestjs/common';
import { ErrorResponse } from '../../interfaces/exception-handler.interface';
import { BaseExceptionHandler } from './base-exception.handler';

export class HttpExceptionHandler extends BaseExceptionHandler {
    canHandle(exception: unknown): exception is HttpException {
        return exception instanceof HttpException;
    }

    handle(exception: unknown, host: ArgumentsHost): ErrorResponse {
        if (!this.canHandle(exception)) {
            throw new TypeError('HttpExceptionHandler received a foreign exception');
        }

        const status = exception.getStatus();
        const exceptionResponse = exception.getResponse();

        let message: string | string[] = exception.message;
        let error = 'Error';

        if (typeof exceptionResponse === 'string') {
            message = exceptionResponse;
        } else {
            if (
                'message' in exceptionResponse &&
                (typeof exceptionResponse.message === 'string' ||
                    Array.isArray(exceptionResponse.message))
            ) {
                message = exceptionResponse.message;
            }
            if (
                'error' in exceptionResponse &&
                typeof exceptionResponse.error === 'string'
            ) {
                error = exceptionResponse.error;
            }
        }

        // Only server faults are masked
        if (typeof message === 'string' && status >= HttpStatus.INTERNAL_SERVER_ERROR) {
            message = this.sanitizeErrorMessage(message, this.isProduction());
        }

        return this.createErrorResponse(status, message, error, host);
    }

    getPriority(): number {
        return 1; // Higher priority for HTTP exceptions
    }
}
