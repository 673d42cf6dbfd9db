import { ConfigService } from '@nestjs/config';
import * as path from 'path';

export const TEMPLATES_DIR = path.join(
    __dirname,
    '..',
    '..',
    'src',
    'modules',
    'mail',
    'templates',
);

export interface TestConfigOverrides {
    nodeEnv?: string;
    serverBaseUrl?: string;
    maxAttempts?: number | string;
}

/**
 * Configuration tree shaped like the `app` and `security` namespaces.
 * Argon2 costs are kept low so tests hash quickly.
 */
export function testConfigTree(overrides: TestConfigOverrides = {}): Record<string, unknown> {
    return {
        app: {
            general: {
                nodeEnv: overrides.nodeEnv ?? 'test',
                name: 'User Accounts',
                serverBaseUrl: overrides.serverBaseUrl ?? 'http://localhost:3000',
            },
            mail: {
                host: 'localhost',
                port: 2525,
                encryption: 'none',
                auth: { user: 'mailer', pass: 'test-secret' },
                from: 'no-reply@example.com',
                templatesDir: TEMPLATES_DIR,
            },
        },
        security: {
            jwt: { accessSecret: 'test-secret', accessExpiration: '15m' },
            argon2: { memoryCost: 4096, timeCost: 2, parallelism: 1 },
            attemptLockout: { maxAttempts: overrides.maxAttempts ?? 3 },
        },
    };
}

export function createTestConfig(overrides: TestConfigOverrides = {}): ConfigService {
    return new ConfigService(testConfigTree(overrides));
}
