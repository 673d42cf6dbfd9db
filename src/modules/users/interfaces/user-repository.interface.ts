import { IBaseRepository } from '../../../common/interfaces/repository.interface';
import { User } from '../entities/user.entity';

type ProfileFields =
  | 'firstName'
  | 'lastName'
  | 'bio'
  | 'profilePictureUrl'
  | 'linkedinProfileUrl'
  | 'githubProfileUrl';

export type CreateUserData = Pick<
  User,
  'email' | 'nickname' | 'hashedPassword' | 'role' | 'emailVerified' | 'verificationToken'
> &
  Partial<Pick<User, ProfileFields>>;

export type UpdateUserData = Partial<
  Pick<
    User,
    | ProfileFields
    | 'email'
    | 'nickname'
    | 'role'
    | 'hashedPassword'
    | 'isProfessional'
    | 'professionalStatusUpdatedAt'
  >
>;

export interface IUserRepository
  extends IBaseRepository<User, CreateUserData, UpdateUserData> {
  findByEmail(email: string): Promise<User | null>;
  findByNickname(nickname: string): Promise<User | null>;
  incrementFailedLoginAttempts(userId: string): Promise<void>;
  resetFailedLoginAttempts(userId: string): Promise<void>;
  updatePassword(userId: string, hashedPassword: string): Promise<void>;
  verifyEmail(userId: string, role: User['role']): Promise<void>;
  lockAccount(userId: string): Promise<void>;
  unlockAccount(userId: string): Promise<void>;
}
