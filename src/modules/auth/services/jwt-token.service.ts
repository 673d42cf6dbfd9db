import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import {
    IJwtTokenService,
    JwtPayload,
} from '../interfaces/jwt-payload.interface';

@Injectable()
export class JwtTokenService implements IJwtTokenService {
    private readonly accessSecret: string;
    private readonly accessExpiration: string;

    constructor(
        private readonly jwtService: JwtService,
        private readonly configService: ConfigService,
    ) {
        const secret = this.configService.get<string>('security.jwt.accessSecret');
        if (!secret) {
            throw new Error('JWT_ACCESS_SECRET is not defined');
        }
        this.accessSecret = secret;
        this.accessExpiration = this.configService.get<string>(
            'security.jwt.accessExpiration',
            '15m',
        );
    }

    generateAccessToken(payload: JwtPayload): string {
        const { sub, email, role } = payload;
        return this.jwtService.sign(
            { sub, email, role },
            {
                secret: this.accessSecret,
                expiresIn: this.accessExpiration,
            },
        );
    }
}
