import { registerAs } from '@nestjs/config';

export const appConfig = registerAs('app', () => ({
    // Application
    general: {
        nodeEnv: process.env.NODE_ENV || 'development',
        name: process.env.APP_NAME || 'User Accounts',
        port: parseInt(process.env.PORT || '3000', 10),
        serverBaseUrl: process.env.SERVER_BASE_URL || 'http://localhost:3000',
    },

    // Cors
    cors: {
        origin: process.env.CORS_ORIGIN,
    },

    // Logging
    log: {
        level: process.env.LOG_LEVEL,
        dir: process.env.LOG_DIR,
        maxSize: process.env.LOG_MAX_SIZE,
        maxFiles: process.env.LOG_MAX_FILES,
    },

    // Database
    database: {
        host: process.env.DB_HOST || 'localhost',
        port: parseInt(process.env.DB_PORT || '5432', 10),
        username: process.env.DB_USERNAME,
        password: process.env.DB_PASSWORD,
        name: process.env.DB_NAME || 'user_accounts',
        synchronize: process.env.DB_SYNCHRONIZE === 'true',
    },

    //  Mail
    mail: {
        host: process.env.MAIL_HOST,
        port: parseInt(process.env.MAIL_PORT || '465', 10),
        encryption: process.env.MAIL_ENCRYPTION,
        auth: {
            user: process.env.MAIL_USER,
            pass: process.env.MAIL_PASSWORD,
        },
        from: process.env.MAIL_FROM,
        templatesDir:
            process.env.MAIL_TEMPLATES_DIR || 'src/modules/mail/templates',
    },
}));
