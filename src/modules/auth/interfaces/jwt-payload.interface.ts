import { UserRole } from '../../users/enums/user-role.enum';

export interface JwtPayload {
    sub: string; // user id
    email: string;
    role: UserRole;
    iat?: number;
    exp?: number;
}

/**
 * Shape attached to `request.user` once a bearer token is accepted.
 */
export interface AuthenticatedUser {
    id: string;
    email: string;
    role: UserRole;
}

export interface IJwtTokenService {
    generateAccessToken(payload: JwtPayload): string;
}
