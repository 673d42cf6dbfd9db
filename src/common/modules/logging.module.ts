import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import { LoggerModule as PinoLoggerModule, Params } from 'nestjs-pino';
import * as path from 'path';
import * as rfs from 'rotating-file-stream';

export const REDACTED_PATHS = ['req.headers.authorization', 'req.headers.cookie'];

const ERROR_LEVEL = 50;

type FileNameGenerator = (time: number | Date, index?: number) => string;

/**
 * Builds a rotating file name generator such as `app-20240131.log.gz`.
 */
export function rotatedFileName(prefix: string): FileNameGenerator {
    return (time: number | Date, index?: number): string => {
        if (!time) return `${prefix}.log`;

        const date = time instanceof Date ? time : new Date(time);
        const stamp = [
            date.getFullYear(),
            String(date.getMonth() + 1).padStart(2, '0'),
            String(date.getDate()).padStart(2, '0'),
        ].join('');

        return index
            ? `${prefix}-${stamp}-${index}.log.gz`
            : `${prefix}-${stamp}.log.gz`;
    };
}

/**
 * Maps `LOG_MAX_SIZE` / `LOG_MAX_FILES` ("20m", "14d") onto rotation options.
 */
export function parseRotation(
    maxSize: string,
    maxFiles: string,
): { size: string; interval: string; maxFiles: number } {
    let size = '20M';
    const sizeMatch = maxSize.match(/^(\d+)([kmg])$/i);
    if (sizeMatch) {
        size = `${sizeMatch[1]}${sizeMatch[2].toUpperCase()}`;
    }

    let interval = '1d';
    let files = 14;
    const filesMatch = maxFiles.match(/^(\d+)([dhw])$/i);
    if (filesMatch) {
        files = parseInt(filesMatch[1], 10);
        interval = `1${filesMatch[2].toLowerCase()}`;
    }

    return { size, interval, maxFiles: files };
}

function isErrorLine(line: string): boolean {
    try {
        const info: unknown = JSON.parse(line);
        if (typeof info === 'object' && info !== null && 'level' in info) {
            return info.level === ERROR_LEVEL || info.level === 'error';
        }
        return false;
    } catch {
        return line.includes('"level":"error"');
    }
}

function buildPinoParams(configService: ConfigService): Params {
    const logLevel = configService.get<string>('app.log.level') || 'info';
    const isProduction =
        configService.get<string>('app.general.nodeEnv') === 'production';

    if (!isProduction) {
        return {
            pinoHttp: {
                level: logLevel,
                transport: {
                    target: 'pino-pretty',
                    options: { singleLine: true, colorize: true },
                },
                redact: { paths: REDACTED_PATHS, remove: true },
            },
        };
    }

    const logDir = configService.get<string>('app.log.dir') || 'logs';
    const logDirPath = path.isAbsolute(logDir)
        ? logDir
        : path.join(process.cwd(), logDir);
    if (!fs.existsSync(logDirPath)) {
        fs.mkdirSync(logDirPath, { recursive: true });
    }

    const rotation = parseRotation(
        configService.get<string>('app.log.maxSize') || '20m',
        configService.get<string>('app.log.maxFiles') || '14d',
    );
    const streamOptions: rfs.Options = {
        ...rotation,
        path: logDirPath,
        compress: 'gzip',
    };

    const appLogStream = rfs.createStream(rotatedFileName('app'), streamOptions);
    const errorLogStream = rfs.createStream(
        rotatedFileName('error'),
        streamOptions,
    );

    return {
        pinoHttp: [
            {
                level: logLevel,
                formatters: {
                    level: (label: string) => ({ level: label }),
                },
                redact: { paths: REDACTED_PATHS, remove: true },
            },
            {
                write: (line: string) => {
                    appLogStream.write(line);
                    if (isErrorLine(line)) {
                        errorLogStream.write(line);
                    }
                },
            },
        ],
    };
}

@Module({
    imports: [
        PinoLoggerModule.forRootAsync({
            imports: [ConfigModule],
            inject: [ConfigService],
            useFactory: buildPinoParams,
        }),
    ],
    exports: [PinoLoggerModule],
})
export class LoggingModule {}
