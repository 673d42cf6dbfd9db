import { registerAs } from '@nestjs/config';

export const securityConfig = registerAs('security', () => ({
    // JWT
    jwt: {
        accessSecret: process.env.JWT_ACCESS_SECRET,
        accessExpiration: process.env.JWT_ACCESS_EXPIRATION || '15m',
    },

    argon2: {
        memoryCost: parseInt(process.env.ARGON2_MEMORY_COST || '65536', 10),
        timeCost: parseInt(process.env.ARGON2_TIME_COST || '3', 10),
        parallelism: parseInt(process.env.ARGON2_PARALLELISM || '4', 10),
    },

    // Rate Limiting
    rateLimit: {
        max: parseInt(process.env.RATE_LIMIT_MAX || '5', 10),
        ttl: parseInt(process.env.RATE_LIMIT_TTL || '60000', 10),
    },

    // Attempt Lockout
    attemptLockout: {
        maxAttempts: parseInt(
            process.env.ACCOUNT_LOCKOUT_MAX_ATTEMPTS || '3',
            10,
        ),
    },
}));
