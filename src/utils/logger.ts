// src/utils/logger.ts
import winston from 'winston';
import config from '../config/index.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const lineFormat = printf(({ level, message, timestamp: ts, context, stack }) => {
    const prefix = context ? `[${String(context)}] ` : '';
    const suffix = stack ? `\n${String(stack)}` : '';
    return `${String(ts)} ${level}: ${prefix}${String(message)}${suffix}`;
});

/**
 * Root logger. Every level goes to stderr so stdout carries only the report.
 */
export const logger = winston.createLogger({
    level: config.logLevel,
    format: combine(errors({ stack: true }), timestamp(), lineFormat),
    transports: [
        new winston.transports.Console({
            format: combine(colorize(), errors({ stack: true }), timestamp(), lineFormat),
            stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
        }),
    ],
});

/**
 * Creates a child logger tagged with a context name, e.g. `createContextLogger('ModelBuilder')`.
 */
export function createContextLogger(context: string): winston.Logger {
    return logger.child({ context });
}

export default logger;
