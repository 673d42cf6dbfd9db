import { v4 as uuidv4 } from 'uuid';
import { User } from '../../src/modules/users/entities/user.entity';
import { UserRole } from '../../src/modules/users/enums/user-role.enum';

export function buildUser(overrides: Partial<User> = {}): User {
    const now = new Date('2024-01-01T00:00:00.000Z');
    return Object.assign(new User(), {
        id: uuidv4(),
        nickname: 'jane_doe',
        email: 'jane.doe@example.com',
        firstName: 'Jane',
        lastName: 'Doe',
        bio: null,
        profilePictureUrl: null,
        linkedinProfileUrl: null,
        githubProfileUrl: null,
        role: UserRole.AUTHENTICATED,
        isProfessional: false,
        professionalStatusUpdatedAt: null,
        lastLoginAt: null,
        failedLoginAttempts: 0,
        isLocked: false,
        hashedPassword: 'hashed-password',
        verificationToken: null,
        emailVerified: true,
        createdAt: now,
        updatedAt: now,
        ...overrides,
    });
}
