import { User } from '../entities/user.entity';

export interface FailedAttemptResult {
  attempts: number;
  locked: boolean;
}

export interface IAccountLockService {
  registerFailedAttempt(
    user: Pick<User, 'id' | 'failedLoginAttempts'>,
  ): Promise<FailedAttemptResult>;
  resetFailedAttempts(userId: string): Promise<void>;
  isLocked(userId: string): Promise<boolean>;
  lockAccount(userId: string): Promise<void>;
  unlockAccount(userId: string): Promise<void>;
}
