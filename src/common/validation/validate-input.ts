import { UnprocessableEntityException } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';

/**
 * Loose view of a DTO: every field optional and of unknown type, which is
 * what a service receives before validation has run.
 */
export type RawInput<T> = { [K in keyof T]?: unknown };

export function formatValidationErrors(errors: ValidationError[]): string {
    const details = errors.map((error) => {
        const messages = Object.values(error.constraints ?? {});
        return `${error.property}: ${messages.join(', ')}`;
    });

    return `Validation error: ${details.join('; ')}`;
}

/**
 * Turns a plain object into a validated DTO instance, or throws a 422 whose
 * message lists every offending field.
 */
export async function validateInput<T extends object>(
    dtoClass: ClassConstructor<T>,
    input: RawInput<T>,
): Promise<T> {
    const instance = plainToInstance(dtoClass, input);
    const errors = await validate(instance, {
        whitelist: true,
        forbidUnknownValues: true,
    });

    if (errors.length > 0) {
        throw new UnprocessableEntityException(formatValidationErrors(errors));
    }

    return instance;
}
