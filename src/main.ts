import 'reflect-metadata';
import helmet from '@fastify/helmet';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import {
    FastifyAdapter,
    NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { createValidationPipe } from './common/pipes/validation.pipe';

async function bootstrap(): Promise<void> {
    const app = await NestFactory.create<NestFastifyApplication>(
        AppModule,
        new FastifyAdapter(),
        { bufferLogs: true },
    );

    const logger = app.get(Logger);
    app.useLogger(logger);

    const configService = app.get(ConfigService);
    const port = configService.get<number>('app.general.port', 3000);
    const nodeEnv = configService.get<string>('app.general.nodeEnv', 'development');
    const appName = configService.get<string>('app.general.name', 'User Accounts');

    await app.register(helmet);

    app.enableCors({
        origin: configService.get<string>('app.cors.origin', '*'),
        methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
        credentials: true,
    });

    app.useGlobalPipes(createValidationPipe());

    if (nodeEnv !== 'production') {
        const config = new DocumentBuilder()
            .setTitle(`${appName} API`)
            .setDescription('User accounts, authentication and email verification')
            .setVersion('1.0')
            .addBearerAuth(
                {
                    type: 'http',
                    scheme: 'bearer',
                    bearerFormat: 'JWT',
                    in: 'header',
                },
                'access-token',
            )
            .build();

        const document = SwaggerModule.createDocument(app, config);
        SwaggerModule.setup('api/docs', app, document);
    }

    await app.listen(port, '0.0.0.0');
    logger.log(`Application listening on port ${port} (${nodeEnv})`);
}

bootstrap().catch((error: unknown) => {
    console.error('Application failed to start', error);
    process.exit(1);
});
