import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { User } from '../modules/users/entities/user.entity';
import { CreateUsersTable1717171717171 } from './migrations/1717171717171-CreateUsersTable';

/**
 * Maps the `app.database` namespace onto TypeORM's Postgres options.
 * Migrations run on startup unless schema synchronisation is switched on.
 */
export function buildTypeOrmOptions(configService: ConfigService): TypeOrmModuleOptions {
    const synchronize = configService.get<boolean>('app.database.synchronize', false);
    const isDevelopment =
        configService.get<string>('app.general.nodeEnv') === 'development';

    return {
        type: 'postgres',
        host: configService.get<string>('app.database.host', 'localhost'),
        port: configService.get<number>('app.database.port', 5432),
        username: configService.get<string>('app.database.username'),
        password: configService.get<string>('app.database.password'),
        database: configService.get<string>('app.database.name'),
        entities: [User],
        migrations: [CreateUsersTable1717171717171],
        migrationsRun: !synchronize,
        synchronize,
        logging: isDevelopment ? ['query', 'error'] : ['error'],
    };
}
