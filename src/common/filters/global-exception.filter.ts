import {
    ArgumentsHost,
    Catch,
    ExceptionFilter,
    Injectable,
    Logger,
} from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { ExceptionHandlerRegistry } from '../exceptions/exception-handler.registry';
import { DefaultExceptionHandler } from '../exceptions/handlers/default-exception.handler';

type RequestWithUser = FastifyRequest & { user?: { id?: string } };

@Catch()
@Injectable()
export class GlobalExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(GlobalExceptionFilter.name);
    private readonly defaultHandler = new DefaultExceptionHandler();

    constructor(private readonly handlerRegistry: ExceptionHandlerRegistry) {}

    catch(exception: unknown, host: ArgumentsHost): void {
        const ctx = host.switchToHttp();
        const response = ctx.getResponse<FastifyReply>();
        const request = ctx.getRequest<RequestWithUser>();

        const handler =
            this.handlerRegistry.findHandler(exception) || this.defaultHandler;
        const errorResponse = handler.handle(exception, host);

        this.logException(exception, request, errorResponse.statusCode);

        response.status(errorResponse.statusCode).send(errorResponse);
    }

    private logException(
        exception: unknown,
        request: RequestWithUser,
        statusCode: number,
    ): void {
        const logContext = {
            path: request.url,
            method: request.method,
            requestId: request.id,
            statusCode,
            ip: request.ip || 'unknown',
            userAgent: request.headers['user-agent'] || 'unknown',
            userId: request.user?.id || 'anonymous',
        };

        // 4xx are client mistakes; only server faults carry a stack
        if (statusCode < 500) {
            this.logger.warn({
                ...logContext,
                msg: exception instanceof Error ? exception.message : 'Request rejected',
            });
            return;
        }

        if (exception instanceof Error) {
            this.logger.error(
                { ...logContext, exceptionName: exception.name, msg: `Exception: ${exception.message}` },
                exception.stack,
            );
        } else {
            this.logger.error({
                ...logContext,
                msg: 'Unknown exception type',
                exception: JSON.stringify(exception),
            });
        }
    }
}
