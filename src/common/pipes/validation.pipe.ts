import {
    HttpStatus,
    UnprocessableEntityException,
    ValidationPipe,
} from '@nestjs/common';
import { formatValidationErrors } from '../validation/validate-input';

/**
 * Request body and query validation. Undeclared fields are stripped and
 * failures answer 422 in the same format services use.
 */
export function createValidationPipe(): ValidationPipe {
    return new ValidationPipe({
        whitelist: true,
        transform: true,
        errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY,
        exceptionFactory: (errors) =>
            new UnprocessableEntityException(formatValidationErrors(errors)),
    });
}
