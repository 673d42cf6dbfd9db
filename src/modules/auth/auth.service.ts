import {
    BadRequestException,
    Inject,
    Injectable,
    Logger,
    NotFoundException,
    UnauthorizedException,
} from '@nestjs/common';
import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { RawInput } from '../../common/validation/validate-input';
import { User } from '../users/entities/user.entity';
import { UsersService } from '../users/users.service';
import { LoginDto } from './dto/login.dto';
import { RegisterDto } from './dto/register.dto';
import {
    LoginResponse,
    MessageResponse,
} from './interfaces/auth-responses.interface';
import { IJwtTokenService } from './interfaces/jwt-payload.interface';

export const ACCOUNT_LOCKED_MESSAGE =
    'Account locked due to too many failed login attempts.';
export const INVALID_CREDENTIALS_MESSAGE = 'Incorrect email or password.';
export const INVALID_VERIFICATION_MESSAGE =
    'Invalid or expired verification token';

@Injectable()
export class AuthService {
    private readonly logger = new Logger(AuthService.name);

    constructor(
        private readonly usersService: UsersService,
        @Inject(INJECTION_TOKENS.JWT_TOKEN_SERVICE)
        private readonly jwtTokenService: IJwtTokenService,
    ) {}

    async register(input: RawInput<RegisterDto>): Promise<User> {
        return this.usersService.registerUser(input);
    }

    /**
     * Exchanges credentials for a bearer token. A locked account is reported
     * before the password is checked.
     */
    async login(dto: LoginDto): Promise<LoginResponse> {
        const email = dto.email.toLowerCase();

        if (await this.usersService.isAccountLocked(email)) {
            this.logger.warn(`Login attempt on locked account: ${email}`);
            throw new BadRequestException(ACCOUNT_LOCKED_MESSAGE);
        }

        const user = await this.usersService.loginUser(email, dto.password);
        if (!user) {
            throw new UnauthorizedException(INVALID_CREDENTIALS_MESSAGE);
        }

        const accessToken = this.jwtTokenService.generateAccessToken({
            sub: user.id,
            email: user.email,
            role: user.role,
        });

        this.logger.log(`User logged in: ${user.id}`);
        return { accessToken, tokenType: 'bearer' };
    }

    async verifyEmail(userId: string, token: string): Promise<MessageResponse> {
        const verified = await this.usersService.verifyEmailWithToken(userId, token);
        if (!verified) {
            throw new BadRequestException(INVALID_VERIFICATION_MESSAGE);
        }
        return { message: 'Email verified successfully' };
    }

    async getProfile(userId: string): Promise<User> {
        const user = await this.usersService.getById(userId);
        if (!user) {
            throw new NotFoundException('User not found');
        }
        return user;
    }
}
