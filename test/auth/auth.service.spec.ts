import { HttpStatus } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { INJECTION_TOKENS } from '../../src/common/constants/injection-tokens';
import {
    ACCOUNT_LOCKED_MESSAGE,
    AuthService,
    INVALID_CREDENTIALS_MESSAGE,
    INVALID_VERIFICATION_MESSAGE,
} from '../../src/modules/auth/auth.service';
import { JwtPayload } from '../../src/modules/auth/interfaces/jwt-payload.interface';
import { JwtTokenService } from '../../src/modules/auth/services/jwt-token.service';
import { User } from '../../src/modules/users/entities/user.entity';
import { UserRole } from '../../src/modules/users/enums/user-role.enum';
import { UsersService } from '../../src/modules/users/users.service';
import { captureHttpError } from '../support/http-error';
import { createUsersTestingModule } from '../support/users-testing-module';

const PASSWORD = 'Secure*Password1';

describe('AuthService', () => {
    let authService: AuthService;
    let usersService: UsersService;
    let jwtService: JwtService;

    beforeEach(async () => {
        const context = await createUsersTestingModule([
            AuthService,
            { provide: JwtService, useValue: new JwtService() },
            { provide: INJECTION_TOKENS.JWT_TOKEN_SERVICE, useClass: JwtTokenService },
        ]);
        authService = context.moduleRef.get(AuthService);
        jwtService = context.moduleRef.get(JwtService);
        usersService = context.usersService;
    });

    function createAdmin(): Promise<User> {
        return usersService.create({ email: 'admin@example.com', password: PASSWORD, nickname: 'admin' });
    }

    describe('login', () => {
        it('issues a bearer token carrying the user id, email and role', async () => {
            const admin = await createAdmin();

            const response = await authService.login({ email: 'admin@example.com', password: PASSWORD });

            expect(response.tokenType).toBe('bearer');
            const payload = jwtService.verify<JwtPayload>(response.accessToken, { secret: 'test-secret' });
            expect(payload).toMatchObject({ sub: admin.id, email: 'admin@example.com', role: UserRole.ADMIN });
        });

        it('ignores the case of the email', async () => {
            await createAdmin();

            await expect(
                authService.login({ email: 'Admin@Example.com', password: PASSWORD }),
            ).resolves.toMatchObject({ tokenType: 'bearer' });
        });

        it('answers 401 for a wrong password', async () => {
            await createAdmin();

            const error = await captureHttpError(
                authService.login({ email: 'admin@example.com', password: 'Wrong*Password1' }),
            );

            expect(error.getStatus()).toBe(HttpStatus.UNAUTHORIZED);
            expect(error.message).toBe(INVALID_CREDENTIALS_MESSAGE);
        });

        it('answers 401 for an unverified account', async () => {
            await createAdmin();
            await usersService.create({ email: 'member@example.com', password: PASSWORD });

            const error = await captureHttpError(
                authService.login({ email: 'member@example.com', password: PASSWORD }),
            );

            expect(error.getStatus()).toBe(HttpStatus.UNAUTHORIZED);
        });

        it('answers 400 once the account is locked', async () => {
            await createAdmin();
            for (let i = 0; i < 3; i++) {
                const failure = await captureHttpError(
                    authService.login({ email: 'admin@example.com', password: 'Wrong*Password1' }),
                );
                expect(failure.getStatus()).toBe(HttpStatus.UNAUTHORIZED);
            }

            const error = await captureHttpError(
                authService.login({ email: 'admin@example.com', password: PASSWORD }),
            );

            expect(error.getStatus()).toBe(HttpStatus.BAD_REQUEST);
            expect(error.message).toBe(ACCOUNT_LOCKED_MESSAGE);
        });
    });

    describe('register', () => {
        it('creates an anonymous, unverified account', async () => {
            await createAdmin();

            const user = await authService.register({ email: 'new@example.com', password: PASSWORD });

            expect(user.role).toBe(UserRole.ANONYMOUS);
            expect(user.emailVerified).toBe(false);
        });
    });

    describe('verifyEmail', () => {
        it('confirms a valid token', async () => {
            await createAdmin();
            const user = await authService.register({ email: 'new@example.com', password: PASSWORD });

            await expect(
                authService.verifyEmail(user.id, user.verificationToken ?? ''),
            ).resolves.toEqual({ message: 'Email verified successfully' });
        });

        it('answers 400 for an invalid token', async () => {
            await createAdmin();
            const user = await authService.register({ email: 'new@example.com', password: PASSWORD });

            const error = await captureHttpError(authService.verifyEmail(user.id, 'wrong-token'));

            expect(error.getStatus()).toBe(HttpStatus.BAD_REQUEST);
            expect(error.message).toBe(INVALID_VERIFICATION_MESSAGE);
        });
    });

    describe('getProfile', () => {
        it('answers 404 for an unknown user', async () => {
            const error = await captureHttpError(
                authService.getProfile('00000000-0000-4000-8000-000000000000'),
            );

            expect(error.getStatus()).toBe(HttpStatus.NOT_FOUND);
        });
    });
});
