import { applyDecorators } from '@nestjs/common';
import { IsString, Matches, MaxLength, MinLength } from 'class-validator';

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 100;
export const PASSWORD_STRENGTH_PATTERN =
    /^(?=.*[a-z])(?=.*[A-Z])(?=.*\d)(?=.*[^A-Za-z\d]).+$/;

/**
 * Password constraints shared by creation, update and reset.
 */
export function IsStrongPassword() {
    return applyDecorators(
        IsString({ message: 'must be a string' }),
        MinLength(PASSWORD_MIN_LENGTH, {
            message: `must be at least ${PASSWORD_MIN_LENGTH} characters long`,
        }),
        MaxLength(PASSWORD_MAX_LENGTH, {
            message: `must be at most ${PASSWORD_MAX_LENGTH} characters long`,
        }),
        Matches(PASSWORD_STRENGTH_PATTERN, {
            message:
                'must contain an upper-case letter, a lower-case letter, a digit and a special character',
        }),
    );
}
