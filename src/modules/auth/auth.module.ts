import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { UsersModule } from '../users/users.module';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { RolesGuard } from './guards/roles.guard';
import { JwtTokenService } from './services/jwt-token.service';
import { JwtStrategy } from './strategies/jwt.strategy';

const authProviders = [
    AuthService,
    {
        provide: INJECTION_TOKENS.JWT_TOKEN_SERVICE,
        useClass: JwtTokenService,
    },
    JwtStrategy,
    // Guards
    {
        provide: APP_GUARD,
        useClass: JwtAuthGuard,
    },
    {
        provide: APP_GUARD,
        useClass: RolesGuard,
    },
];

@Module({
    imports: [
        UsersModule,
        PassportModule.register({ defaultStrategy: 'jwt' }),
        JwtModule.registerAsync({
            imports: [ConfigModule],
            inject: [ConfigService],
            useFactory: (configService: ConfigService) => ({
                secret: configService.get<string>('security.jwt.accessSecret'),
                signOptions: {
                    expiresIn: configService.get<string>(
                        'security.jwt.accessExpiration',
                        '15m',
                    ),
                },
            }),
        }),
    ],
    controllers: [AuthController],
    providers: authProviders,
    exports: [AuthService, INJECTION_TOKENS.JWT_TOKEN_SERVICE],
})
export class AuthModule {}
