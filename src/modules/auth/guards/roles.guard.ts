import {
    CanActivate,
    ExecutionContext,
    ForbiddenException,
    Injectable,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { UserRole } from '../../users/enums/user-role.enum';
import { ROLES_KEY } from '../decorators/roles.decorator';
import { AuthenticatedUser } from '../interfaces/jwt-payload.interface';

@Injectable()
export class RolesGuard implements CanActivate {
    constructor(private readonly reflector: Reflector) {}

    canActivate(context: ExecutionContext): boolean {
        const requiredRoles = this.reflector.getAllAndOverride<UserRole[] | undefined>(
            ROLES_KEY,
            [context.getHandler(), context.getClass()],
        );

        if (!requiredRoles || requiredRoles.length === 0) {
            return true;
        }

        const { user } = context
            .switchToHttp()
            .getRequest<{ user?: AuthenticatedUser }>();

        if (!user || !user.role) {
            throw new ForbiddenException('Access denied: missing user role');
        }

        if (!requiredRoles.includes(user.role)) {
            throw new ForbiddenException('Access denied: insufficient role');
        }

        return true;
    }
}
