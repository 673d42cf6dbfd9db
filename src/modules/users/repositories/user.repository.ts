import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { PaginationParams } from '../../../common/interfaces/repository.interface';
import { User } from '../entities/user.entity';
import { UserRole } from '../enums/user-role.enum';
import {
  CreateUserData,
  IUserRepository,
  UpdateUserData,
} from '../interfaces/user-repository.interface';

@Injectable()
export class UserRepository implements IUserRepository {
  constructor(
    @InjectRepository(User)
    private readonly repository: Repository<User>,
  ) { }

  async findById(id: string): Promise<User | null> {
    return this.repository.findOneBy({ id });
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.repository.findOneBy({ email: email.toLowerCase() });
  }

  async findByNickname(nickname: string): Promise<User | null> {
    return this.repository.findOneBy({ nickname });
  }

  async findMany({ skip, take }: PaginationParams): Promise<User[]> {
    return this.repository.find({
      skip,
      take,
      order: { createdAt: 'ASC', id: 'ASC' },
    });
  }

  async count(): Promise<number> {
    return this.repository.count();
  }

  async create(data: CreateUserData): Promise<User> {
    return this.repository.save(this.repository.create(data));
  }

  async update(id: string, data: UpdateUserData): Promise<User | null> {
    const result = await this.repository.update({ id }, data);
    if (!result.affected) {
      return null;
    }
    return this.findById(id);
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.repository.delete({ id });
    return (result.affected ?? 0) > 0;
  }

  async incrementFailedLoginAttempts(userId: string): Promise<void> {
    await this.repository.increment({ id: userId }, 'failedLoginAttempts', 1);
  }

  async resetFailedLoginAttempts(userId: string): Promise<void> {
    await this.repository.update(
      { id: userId },
      { failedLoginAttempts: 0, lastLoginAt: new Date() },
    );
  }

  async updatePassword(userId: string, hashedPassword: string): Promise<void> {
    await this.repository.update(
      { id: userId },
      { hashedPassword, failedLoginAttempts: 0, isLocked: false },
    );
  }

  async verifyEmail(userId: string, role: UserRole): Promise<void> {
    await this.repository.update(
      { id: userId },
      { emailVerified: true, verificationToken: null, role },
    );
  }

  async lockAccount(userId: string): Promise<void> {
    await this.repository.update({ id: userId }, { isLocked: true });
  }

  async unlockAccount(userId: string): Promise<void> {
    await this.repository.update(
      { id: userId },
      { isLocked: false, failedLoginAttempts: 0 },
    );
  }
}
