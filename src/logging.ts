import winston from 'winston';
import { PROGRAM_NAME } from './constants';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

/**
 * The slice of a logger the pipeline components depend on.
 * A winston logger satisfies it; tests hand in plain spies.
 */
export interface Logger {
    error(message: string, ...meta: unknown[]): unknown;
    warn(message: string, ...meta: unknown[]): unknown;
    info(message: string, ...meta: unknown[]): unknown;
    debug(message: string, ...meta: unknown[]): unknown;
}

const formatMeta = (meta: Record<string, unknown>): string => {
    const { service: _service, ...rest } = meta;
    return Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
};

const createLogger = (level: LogLevel): winston.Logger => {
    let format;
    if (level === 'info') {
        format = winston.format.combine(
            winston.format.errors({ stack: true }),
            winston.format.splat(),
            winston.format.printf(({ message }) => `${message}`),
        );
    } else {
        format = winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.splat(),
            winston.format.printf(({ timestamp, level, message, ...meta }) =>
                `${timestamp} ${level}: ${message}${formatMeta(meta)}`),
        );
    }

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports: [
            new winston.transports.Console(),
        ],
    });
};

let logger = createLogger('info');

export const setLogLevel = (level: LogLevel): void => {
    logger = createLogger(level);
};

export const getLogger = (): winston.Logger => logger;

export const isLogLevel = (value: string): value is LogLevel =>
    LOG_LEVELS.some(level => level === value);
