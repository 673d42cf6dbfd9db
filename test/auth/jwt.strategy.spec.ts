import { UnauthorizedException } from '@nestjs/common';
import { JwtStrategy } from '../../src/modules/auth/strategies/jwt.strategy';
import { UserRole } from '../../src/modules/users/enums/user-role.enum';
import { InMemoryUserRepository } from '../support/in-memory-user.repository';
import { createTestConfig } from '../support/test-config';
import { createUsersTestingModule } from '../support/users-testing-module';

describe('JwtStrategy', () => {
    let strategy: JwtStrategy;
    let repository: InMemoryUserRepository;

    beforeEach(async () => {
        const context = await createUsersTestingModule();
        repository = context.repository;
        strategy = new JwtStrategy(createTestConfig(), context.usersService);
    });

    async function seedUser() {
        return repository.create({
            email: 'jane.doe@example.com',
            nickname: 'jane_doe',
            hashedPassword: 'hashed-password',
            role: UserRole.MANAGER,
            emailVerified: true,
            verificationToken: null,
        });
    }

    it('resolves the request user from the token subject', async () => {
        const user = await seedUser();

        await expect(
            strategy.validate({ sub: user.id, email: user.email, role: UserRole.ANONYMOUS }),
        ).resolves.toEqual({ id: user.id, email: 'jane.doe@example.com', role: UserRole.MANAGER });
    });

    it('rejects tokens of deleted users', async () => {
        await expect(
            strategy.validate({
                sub: '00000000-0000-4000-8000-000000000000',
                email: 'ghost@example.com',
                role: UserRole.ADMIN,
            }),
        ).rejects.toThrow(UnauthorizedException);
    });

    it('rejects tokens of locked users', async () => {
        const user = await seedUser();
        await repository.lockAccount(user.id);

        await expect(
            strategy.validate({ sub: user.id, email: user.email, role: user.role }),
        ).rejects.toThrow('Account is locked');
    });
});
