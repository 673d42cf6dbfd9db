import { ArgumentsHost, HttpStatus } from '@nestjs/common';
import { FastifyRequest } from 'fastify';
import {
    ErrorResponse,
    IExceptionHandler,
} from '../../interfaces/exception-handler.interface';

const SENSITIVE_PATTERNS = [
    /password/i,
    /token/i,
    /secret/i,
    /key/i,
    /credential/i,
];

export abstract class BaseExceptionHandler implements IExceptionHandler {
    abstract canHandle(exception: unknown): boolean;
    abstract handle(exception: unknown, host: ArgumentsHost): ErrorResponse;
    abstract getPriority(): number;

    protected createErrorResponse(
        statusCode: HttpStatus,
        message: string | string[],
        error: string,
        host: ArgumentsHost,
    ): ErrorResponse {
        const request = host
            .switchToHttp()
            .getRequest<Pick<FastifyRequest, 'url' | 'id'>>();

        return {
            statusCode,
            message,
            error,
            timestamp: new Date().toISOString(),
            path: request.url,
            requestId: request.id,
        };
    }

    protected isProduction(): boolean {
        return process.env.NODE_ENV === 'production';
    }

    protected sanitizeErrorMessage(
        message: string,
        isProduction: boolean,
    ): string {
        if (
            isProduction &&
            SENSITIVE_PATTERNS.some((pattern) => pattern.test(message))
        ) {
            return 'An error occurred processing your request';
        }

        return message;
    }
}
