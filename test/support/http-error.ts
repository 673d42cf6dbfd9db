import { HttpException } from '@nestjs/common';

/**
 * Awaits a promise expected to reject with an HttpException and returns it.
 */
export async function captureHttpError(promise: Promise<unknown>): Promise<HttpException> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof HttpException) {
            return error;
        }
        throw error;
    }
    throw new Error('Expected the promise to reject with an HttpException');
}
