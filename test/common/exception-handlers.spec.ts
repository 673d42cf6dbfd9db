import {
    BadRequestException,
    HttpStatus,
    NotFoundException,
    UnprocessableEntityException,
} from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { EntityNotFoundError, QueryFailedError } from 'typeorm';
import { ExceptionHandlerRegistry } from '../../src/common/exceptions/exception-handler.registry';
import { DefaultExceptionHandler } from '../../src/common/exceptions/handlers/default-exception.handler';
import { HttpExceptionHandler } from '../../src/common/exceptions/handlers/http-exception.handler';
import { TypeOrmExceptionHandler } from '../../src/common/exceptions/handlers/typeorm-exception.handler';
import { User } from '../../src/modules/users/entities/user.entity';

function hostFor(url: string): ExecutionContextHost {
    return new ExecutionContextHost([{ url, id: 'req-1' }, {}]);
}

function queryFailed(fields: Record<string, string>): QueryFailedError {
    return new QueryFailedError(
        'INSERT INTO "users" ...',
        [],
        Object.assign(new Error('query failed'), fields),
    );
}

describe('HttpExceptionHandler', () => {
    const handler = new HttpExceptionHandler();
    const originalEnv = process.env.NODE_ENV;

    afterEach(() => {
        process.env.NODE_ENV = originalEnv;
    });

    it('keeps the status, message and error label', () => {
        const response = handler.handle(
            new BadRequestException('User with given email already exists.'),
            hostFor('/users'),
        );

        expect(response).toMatchObject({
            statusCode: HttpStatus.BAD_REQUEST,
            message: 'User with given email already exists.',
            error: 'Bad Request',
            path: '/users',
            requestId: 'req-1',
        });
        expect(Number.isNaN(Date.parse(response.timestamp))).toBe(false);
    });

    it('passes validation message lists through', () => {
        const response = handler.handle(
            new UnprocessableEntityException(['email must be an email', 'password is too short']),
            hostFor('/register'),
        );

        expect(response.statusCode).toBe(HttpStatus.UNPROCESSABLE_ENTITY);
        expect(response.message).toEqual(['email must be an email', 'password is too short']);
    });

    it('does not mask client errors in production', () => {
        process.env.NODE_ENV = 'production';

        const response = handler.handle(
            new BadRequestException('Invalid or expired verification token'),
            hostFor('/verify-email/a/b'),
        );

        expect(response.message).toBe('Invalid or expired verification token');
    });

    it('only accepts http exceptions', () => {
        expect(handler.canHandle(new NotFoundException())).toBe(true);
        expect(handler.canHandle(new Error('boom'))).toBe(false);
        expect(() => handler.handle(new Error('boom'), hostFor('/'))).toThrow(TypeError);
    });
});

describe('TypeOrmExceptionHandler', () => {
    const handler = new TypeOrmExceptionHandler();

    it('maps unique violations to 409 naming the column', () => {
        const response = handler.handle(
            queryFailed({ code: '23505', detail: 'Key (email)=(jane.doe@example.com) already exists.' }),
            hostFor('/users'),
        );

        expect(response.statusCode).toBe(HttpStatus.CONFLICT);
        expect(response.message).toBe('A record with this email already exists');
        expect(response.error).toBe('Database Error (23505)');
    });

    it('falls back to a generic conflict message without details', () => {
        const response = handler.handle(queryFailed({ code: '23505' }), hostFor('/users'));

        expect(response.message).toBe('A record with this data already exists');
    });

    it.each([
        ['23503', HttpStatus.BAD_REQUEST, 'Operation failed due to missing related data'],
        ['23502', HttpStatus.BAD_REQUEST, 'A required field cannot be empty'],
        ['22P02', HttpStatus.BAD_REQUEST, 'Invalid data format'],
        ['57P01', HttpStatus.SERVICE_UNAVAILABLE, 'Database service is temporarily unavailable'],
        ['42P01', HttpStatus.BAD_REQUEST, 'Invalid data provided'],
    ])('maps code %s to %d', (code, status, message) => {
        const response = handler.handle(queryFailed({ code }), hostFor('/users'));

        expect(response.statusCode).toBe(status);
        expect(response.message).toBe(message);
    });

    it('maps a driver error without code to 500', () => {
        const response = handler.handle(queryFailed({}), hostFor('/users'));

        expect(response.statusCode).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
        expect(response.error).toBe('Database Error');
    });

    it('maps missing entities to 404', () => {
        const response = handler.handle(
            new EntityNotFoundError(User, { id: 'missing' }),
            hostFor('/users/missing'),
        );

        expect(response.statusCode).toBe(HttpStatus.NOT_FOUND);
        expect(response.message).toBe('The requested record does not exist');
    });

    it('ignores other errors', () => {
        expect(handler.canHandle(new Error('boom'))).toBe(false);
        expect(handler.canHandle(new BadRequestException())).toBe(false);
    });
});

describe('DefaultExceptionHandler', () => {
    const handler = new DefaultExceptionHandler();
    const originalEnv = process.env.NODE_ENV;

    afterEach(() => {
        process.env.NODE_ENV = originalEnv;
    });

    it('exposes the error outside production', () => {
        process.env.NODE_ENV = 'test';

        const response = handler.handle(new RangeError('out of range'), hostFor('/'));

        expect(response).toMatchObject({
            statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
            message: 'out of range',
            error: 'RangeError',
        });
    });

    it('hides the error in production', () => {
        process.env.NODE_ENV = 'production';

        const response = handler.handle(new RangeError('out of range'), hostFor('/'));

        expect(response.message).toBe('An internal error occurred');
        expect(response.error).toBe('InternalServerError');
    });
});

describe('ExceptionHandlerRegistry', () => {
    it('orders handlers by priority and picks the first that matches', () => {
        const registry = new ExceptionHandlerRegistry();
        const fallback = new DefaultExceptionHandler();
        const http = new HttpExceptionHandler();
        const typeOrm = new TypeOrmExceptionHandler();

        registry.register(fallback);
        registry.register(typeOrm);
        registry.register(http);

        expect(registry.getHandlers()).toEqual([http, typeOrm, fallback]);
        expect(registry.findHandler(new NotFoundException())).toBe(http);
        expect(registry.findHandler(queryFailed({ code: '23505' }))).toBe(typeOrm);
        expect(registry.findHandler('plain string')).toBe(fallback);
    });

    it('returns null when nothing matches', () => {
        expect(new ExceptionHandlerRegistry().findHandler(new Error('boom'))).toBeNull();
    });
});
