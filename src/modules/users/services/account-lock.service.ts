import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { INJECTION_TOKENS } from '../../../common/constants/injection-tokens';
import { User } from '../entities/user.entity';
import {
    FailedAttemptResult,
    IAccountLockService,
} from '../interfaces/account-lock.interface';
import { IUserRepository } from '../interfaces/user-repository.interface';

const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * Failed-login counter and lock flag. An account stays open while its counter
 * is below the threshold and locks on the attempt that reaches it; only an
 * explicit unlock or a password reset opens it again.
 */
@Injectable()
export class AccountLockService implements IAccountLockService {
    private readonly logger = new Logger(AccountLockService.name);
    readonly maxAttempts: number;

    constructor(
        @Inject(INJECTION_TOKENS.USER_REPOSITORY)
        private readonly userRepository: IUserRepository,
        private readonly configService: ConfigService,
    ) {
        const configured = Number(
            this.configService.get<number | string>(
                'security.attemptLockout.maxAttempts',
                DEFAULT_MAX_ATTEMPTS,
            ),
        );
        this.maxAttempts =
            Number.isInteger(configured) && configured > 0
                ? configured
                : DEFAULT_MAX_ATTEMPTS;
    }

    async registerFailedAttempt(
        user: Pick<User, 'id' | 'failedLoginAttempts'>,
    ): Promise<FailedAttemptResult> {
        await this.userRepository.incrementFailedLoginAttempts(user.id);

        const attempts = user.failedLoginAttempts + 1;
        this.logger.debug(
            `Failed login attempts for ${user.id}: ${attempts}/${this.maxAttempts}`,
        );

        if (attempts >= this.maxAttempts) {
            await this.lockAccount(user.id);
            return { attempts, locked: true };
        }

        return { attempts, locked: false };
    }

    async resetFailedAttempts(userId: string): Promise<void> {
        await this.userRepository.resetFailedLoginAttempts(userId);
    }

    async isLocked(userId: string): Promise<boolean> {
        const user = await this.userRepository.findById(userId);
        return user?.isLocked ?? false;
    }

    async lockAccount(userId: string): Promise<void> {
        await this.userRepository.lockAccount(userId);
        this.logger.warn(`Account locked: ${userId}`);
    }

    async unlockAccount(userId: string): Promise<void> {
        await this.userRepository.unlockAccount(userId);
        this.logger.log(`Account unlocked: ${userId}`);
    }
}
