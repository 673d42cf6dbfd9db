import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as argon2 from 'argon2';
import { IHashingService } from '../interfaces/hashing.interface';

const DEFAULT_ARGON2 = {
  memoryCost: 65536,
  timeCost: 3,
  parallelism: 4,
};

@Injectable()
export class HashingService implements IHashingService {
  private readonly logger = new Logger(HashingService.name);
  private readonly argon2Options: argon2.Options & { raw?: false };

  constructor(private readonly configService: ConfigService) {
    this.argon2Options = {
      type: argon2.argon2id,
      memoryCost: this.positiveOrDefault(
        'security.argon2.memoryCost',
        DEFAULT_ARGON2.memoryCost,
      ),
      timeCost: this.positiveOrDefault(
        'security.argon2.timeCost',
        DEFAULT_ARGON2.timeCost,
      ),
      parallelism: this.positiveOrDefault(
        'security.argon2.parallelism',
        DEFAULT_ARGON2.parallelism,
      ),
    };
  }

  async hash(plainText: string): Promise<string> {
    if (typeof plainText !== 'string' || plainText.trim().length === 0) {
      throw new Error('Invalid input for hashing');
    }

    try {
      return await argon2.hash(plainText, this.argon2Options);
    } catch (error) {
      this.logger.error(
        `Hashing error: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new Error('Failed to hash password');
    }
  }

  async verify(plainText: string, digest: string): Promise<boolean> {
    try {
      return await argon2.verify(digest, plainText);
    } catch (error) {
      // A malformed stored hash is a failed match, not a server error
      this.logger.error(
        `Verification error: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  private positiveOrDefault(key: string, fallback: number): number {
    const value = Number(this.configService.get<number | string>(key, fallback));
    if (!Number.isInteger(value) || value <= 0) {
      this.logger.warn(
        `Invalid Argon2 setting ${key}, falling back to ${fallback}`,
      );
      return fallback;
    }
    return value;
  }
}
