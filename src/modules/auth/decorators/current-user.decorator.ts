import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { AuthenticatedUser } from '../interfaces/jwt-payload.interface';

type AuthenticatedRequest = { user?: AuthenticatedUser };

/**
 * Resolves the user attached by the JWT strategy.
 * Usage: @CurrentUser() user or @CurrentUser('id') userId
 */
export const CurrentUser = createParamDecorator(
    (data: keyof AuthenticatedUser | undefined, ctx: ExecutionContext) => {
        const { user } = ctx.switchToHttp().getRequest<AuthenticatedRequest>();

        if (!user) {
            return null;
        }

        return data ? user[data] : user;
    },
);
