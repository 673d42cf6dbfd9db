/**
 * DI tokens for providers consumed through their interfaces.
 */
export const INJECTION_TOKENS = {
    // users
    USER_REPOSITORY: Symbol('IUserRepository'),
    ACCOUNT_LOCK_SERVICE: Symbol('IAccountLockService'),

    // auth & security
    JWT_TOKEN_SERVICE: Symbol('IJwtTokenService'),
    HASHING_SERVICE: Symbol('IHashingService'),

    // mail
    EMAIL_SERVICE: Symbol('IEmailService'),
    EMAIL_PROVIDER: Symbol('IEmailProvider'),
} as const;
