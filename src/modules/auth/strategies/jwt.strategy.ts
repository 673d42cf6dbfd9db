import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { UsersService } from '../../users/users.service';
import {
    AuthenticatedUser,
    JwtPayload,
} from '../interfaces/jwt-payload.interface';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
    constructor(
        configService: ConfigService,
        private readonly usersService: UsersService,
    ) {
        const secret = configService.get<string>('security.jwt.accessSecret');
        if (!secret) {
            throw new Error('JWT_ACCESS_SECRET is not defined');
        }

        super({
            jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
            ignoreExpiration: false,
            secretOrKey: secret,
        });
    }

    /**
     * Runs after the signature check; the account must still exist and be open.
     */
    async validate(payload: JwtPayload): Promise<AuthenticatedUser> {
        const user = await this.usersService.getById(payload.sub);

        if (!user) {
            throw new UnauthorizedException('Invalid token');
        }

        if (user.isLocked) {
            throw new UnauthorizedException('Account is locked');
        }

        return { id: user.id, email: user.email, role: user.role };
    }
}
