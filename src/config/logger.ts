import pino from 'pino';
import { Env, getEnv } from './env';

/**
 * Logger Interface
 *
 * Defines the contract for logging operations across the application.
 * Structured fields come first, the message second, as pino expects.
 */
export interface ILogger {
    info(data: object, message: string): void;
    warn(data: object, message: string): void;
    error(data: object, message: string): void;
    debug(data: object, message: string): void;
}

/**
 * Logger Configuration
 *
 * JSON logger for the catalog similarity API. Pretty-printed in development,
 * raw JSON in production and tests.
 */
export function createLogger(env: Pick<Env, 'LOG_LEVEL' | 'NODE_ENV'> = getEnv()): pino.Logger {
    return pino({
        level: env.LOG_LEVEL,
        transport: env.NODE_ENV === 'development'
            ? {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                    singleLine: false
                }
            }
            : undefined,
        serializers: {
            req: pino.stdSerializers.req,
            res: pino.stdSerializers.res,
            err: pino.stdSerializers.err
        }
    });
}

export const logger = createLogger();
