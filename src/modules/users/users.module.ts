import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { MailModule } from '../mail/mail.module';
import { User } from './entities/user.entity';
import { UserRepository } from './repositories/user.repository';
import { AccountLockService } from './services/account-lock.service';
import { UsersController } from './users.controller';
import { UsersService } from './users.service';

const userProviders = [
    UsersService,
    {
        provide: INJECTION_TOKENS.USER_REPOSITORY,
        useClass: UserRepository,
    },
    {
        provide: INJECTION_TOKENS.ACCOUNT_LOCK_SERVICE,
        useClass: AccountLockService,
    },
];

@Module({
    imports: [TypeOrmModule.forFeature([User]), MailModule],
    controllers: [UsersController],
    providers: userProviders,
    exports: [
        UsersService,
        INJECTION_TOKENS.USER_REPOSITORY,
        INJECTION_TOKENS.ACCOUNT_LOCK_SERVICE,
    ],
})
export class UsersModule {}
