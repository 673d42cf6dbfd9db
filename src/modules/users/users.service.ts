import {
    BadRequestException,
    Inject,
    Injectable,
    Logger,
    UnprocessableEntityException,
} from '@nestjs/common';
import { isUUID } from 'class-validator';
import { v4 as uuidv4 } from 'uuid';
import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { IHashingService } from '../../common/interfaces/hashing.interface';
import { generateNickname } from '../../common/utils/nickname.util';
import {
    RawInput,
    validateInput,
} from '../../common/validation/validate-input';
import { IEmailService } from '../mail/interfaces/email-provider.interface';
import { CreateUserDto } from './dto/create-user.dto';
import { ResetPasswordDto } from './dto/reset-password.dto';
import { UpdateUserDto } from './dto/update-user.dto';
import { User } from './entities/user.entity';
import { UserRole } from './enums/user-role.enum';
import { IAccountLockService } from './interfaces/account-lock.interface';
import {
    CreateUserData,
    IUserRepository,
    UpdateUserData,
} from './interfaces/user-repository.interface';

export const EMAIL_TAKEN_MESSAGE = 'User with given email already exists.';
export const NICKNAME_TAKEN_MESSAGE = 'User with given nickname already exists.';

const NICKNAME_GENERATION_ATTEMPTS = 10;

export interface CreateUserOptions {
    /** Set when an administrator creates the account; honours `role`. */
    isAdmin?: boolean;
}

@Injectable()
export class UsersService {
    private readonly logger = new Logger(UsersService.name);

    constructor(
        @Inject(INJECTION_TOKENS.USER_REPOSITORY)
        private readonly userRepository: IUserRepository,
        @Inject(INJECTION_TOKENS.ACCOUNT_LOCK_SERVICE)
        private readonly accountLockService: IAccountLockService,
        @Inject(INJECTION_TOKENS.HASHING_SERVICE)
        private readonly hashingService: IHashingService,
        @Inject(INJECTION_TOKENS.EMAIL_SERVICE)
        private readonly emailService: IEmailService,
    ) {}

    /**
     * Creates a user. The very first account becomes a verified ADMIN; every
     * other account starts unverified and is sent a verification email.
     */
    async create(
        input: RawInput<CreateUserDto>,
        options: CreateUserOptions = {},
    ): Promise<User> {
        const dto = await validateInput(CreateUserDto, input);
        const email = dto.email.toLowerCase();

        if (await this.userRepository.findByEmail(email)) {
            this.logger.warn(`Attempt to create an account with an existing email: ${email}`);
            throw new BadRequestException(EMAIL_TAKEN_MESSAGE);
        }

        if (dto.nickname && (await this.userRepository.findByNickname(dto.nickname))) {
            throw new BadRequestException(NICKNAME_TAKEN_MESSAGE);
        }

        const nickname = dto.nickname ?? (await this.generateUniqueNickname());
        const isFirstUser = (await this.userRepository.count()) === 0;

        let role = UserRole.ANONYMOUS;
        if (isFirstUser) {
            role = UserRole.ADMIN;
        } else if (options.isAdmin && dto.role) {
            role = dto.role;
        }

        const data: CreateUserData = {
            email,
            nickname,
            hashedPassword: await this.hashingService.hash(dto.password),
            role,
            emailVerified: isFirstUser,
            verificationToken: isFirstUser ? null : uuidv4(),
            firstName: dto.firstName ?? null,
            lastName: dto.lastName ?? null,
            bio: dto.bio ?? null,
            profilePictureUrl: dto.profilePictureUrl ?? null,
            linkedinProfileUrl: dto.linkedinProfileUrl ?? null,
            githubProfileUrl: dto.githubProfileUrl ?? null,
        };

        const user = await this.userRepository.create(data);
        this.logger.log(`User created: ${user.id} (${user.role})`);

        if (!user.emailVerified) {
            const sent = await this.emailService.sendVerificationEmail(user);
            if (!sent) {
                this.logger.warn(`Verification email could not be sent to user ${user.id}`);
            }
        }

        return user;
    }

    async registerUser(input: RawInput<CreateUserDto>): Promise<User> {
        return this.create(input);
    }

    async getById(id: string): Promise<User | null> {
        if (!isUUID(id)) {
            return null;
        }
        return this.userRepository.findById(id);
    }

    async getByNickname(nickname: string): Promise<User | null> {
        return this.userRepository.findByNickname(nickname);
    }

    async getByEmail(email: string): Promise<User | null> {
        return this.userRepository.findByEmail(email);
    }

    async update(id: string, input: RawInput<UpdateUserDto>): Promise<User | null> {
        const dto = await validateInput(UpdateUserDto, input);

        const existing = await this.getById(id);
        if (!existing) {
            return null;
        }

        const { password, email, ...rest } = dto;
        const changes: UpdateUserData = { ...rest };

        if (email !== undefined) {
            const normalizedEmail = email.toLowerCase();
            const owner = await this.userRepository.findByEmail(normalizedEmail);
            if (owner && owner.id !== id) {
                throw new UnprocessableEntityException(EMAIL_TAKEN_MESSAGE);
            }
            changes.email = normalizedEmail;
        }

        if (dto.nickname !== undefined) {
            const owner = await this.userRepository.findByNickname(dto.nickname);
            if (owner && owner.id !== id) {
                throw new UnprocessableEntityException(NICKNAME_TAKEN_MESSAGE);
            }
        }

        if (password !== undefined) {
            changes.hashedPassword = await this.hashingService.hash(password);
        }

        const updated = await this.userRepository.update(id, changes);
        this.logger.log(`User updated: ${id}`);
        return updated;
    }

    async delete(id: string): Promise<boolean> {
        if (!isUUID(id)) {
            return false;
        }

        const deleted = await this.userRepository.delete(id);
        if (deleted) {
            this.logger.log(`User deleted: ${id}`);
        }
        return deleted;
    }

    async listUsers(skip = 0, limit = 10): Promise<User[]> {
        return this.userRepository.findMany({ skip, take: limit });
    }

    async count(): Promise<number> {
        return this.userRepository.count();
    }

    /**
     * Returns the user on a correct password. Unknown, unverified and locked
     * accounts yield null without touching the failed-attempt counter.
     */
    async loginUser(email: string, password: string): Promise<User | null> {
        const user = await this.userRepository.findByEmail(email);
        if (!user) {
            return null;
        }

        if (!user.emailVerified) {
            this.logger.debug(`Login refused, email not verified: ${user.id}`);
            return null;
        }

        if (user.isLocked) {
            this.logger.debug(`Login refused, account locked: ${user.id}`);
            return null;
        }

        if (await this.hashingService.verify(password, user.hashedPassword)) {
            await this.accountLockService.resetFailedAttempts(user.id);
            return this.userRepository.findById(user.id);
        }

        const { locked } = await this.accountLockService.registerFailedAttempt(user);
        if (locked) {
            await this.emailService.sendAccountLockedEmail(user);
        }

        return null;
    }

    async isAccountLocked(email: string): Promise<boolean> {
        const user = await this.userRepository.findByEmail(email);
        return user?.isLocked ?? false;
    }

    /**
     * Administrative reset: sets a new password and reopens the account.
     */
    async resetPassword(id: string, newPassword: string): Promise<boolean> {
        const dto = await validateInput(ResetPasswordDto, { password: newPassword });

        const user = await this.getById(id);
        if (!user) {
            return false;
        }

        const hashedPassword = await this.hashingService.hash(dto.password);
        await this.userRepository.updatePassword(user.id, hashedPassword);

        this.logger.log(`Password reset for user: ${user.id}`);
        return true;
    }

    async verifyEmailWithToken(id: string, token: string): Promise<boolean> {
        const user = await this.getById(id);
        if (!user || !user.verificationToken || user.verificationToken !== token) {
            return false;
        }

        const role = user.role === UserRole.ANONYMOUS ? UserRole.AUTHENTICATED : user.role;
        await this.userRepository.verifyEmail(user.id, role);

        this.logger.log(`Email verified for user: ${user.id}`);
        return true;
    }

    async unlockUserAccount(id: string): Promise<boolean> {
        const user = await this.getById(id);
        if (!user || !user.isLocked) {
            return false;
        }

        await this.accountLockService.unlockAccount(user.id);
        return true;
    }

    async updateProfessionalStatus(id: string, isProfessional: boolean): Promise<User | null> {
        const user = await this.getById(id);
        if (!user) {
            return null;
        }

        return this.userRepository.update(id, {
            isProfessional,
            professionalStatusUpdatedAt: new Date(),
        });
    }

    private async generateUniqueNickname(): Promise<string> {
        for (let attempt = 0; attempt < NICKNAME_GENERATION_ATTEMPTS; attempt++) {
            const candidate = generateNickname();
            if (!(await this.userRepository.findByNickname(candidate))) {
                return candidate;
            }
        }

        // The adjective/animal space is small; fall back to a random suffix
        return `user_${uuidv4().slice(0, 8)}`;
    }
}
