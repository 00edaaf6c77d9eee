import winston from 'winston';
import { config } from '../config';

const SERVICE_NAME = 'gomoku-engine';

const jsonFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
);

const prettyFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${timestamp} ${level}: ${message}${metaStr}`;
    })
);

export const logger = winston.createLogger({
    level: config.logging.level,
    defaultMeta: { service: SERVICE_NAME },
    silent: config.nodeEnv === 'test',
    transports: [
        new winston.transports.Console({
            format: config.logging.format === 'json' ? jsonFormat : prettyFormat
        })
    ]
});

/**
 * Returns a child logger tagging every entry with the emitting component
 */
export function getLogger(component: string): winston.Logger {
    return logger.child({ component });
}
