// src/lib/logger.ts
import { createLogger as winstonCreateLogger, format, transports } from 'winston';
import { config } from './config/settings';
import * as path from 'path';
import * as fs from 'fs';

const logDir = path.resolve(process.cwd(), 'logs');

/**
 * Renders log metadata as `key=value` pairs in insertion order.
 * Strings with whitespace and structured values are JSON-encoded;
 * undefined values are dropped.
 */
export function formatMeta(meta: Record<string, unknown>): string {
    const pairs: string[] = [];
    for (const [key, value] of Object.entries(meta)) {
        if (value === undefined) continue;
        if (typeof value === 'string') {
            pairs.push(`${key}=${/\s/.test(value) || value === '' ? JSON.stringify(value) : value}`);
        } else if (typeof value === 'object' && value !== null) {
            pairs.push(`${key}=${JSON.stringify(value)}`);
        } else {
            pairs.push(`${key}=${String(value)}`);
        }
    }
    return pairs.join(' ');
}

/**
 * Creates a Winston logger instance with console and file transports.
 * - Level from LOG_LEVEL (defaults to 'info').
 * - File transport (logs/app.log) is skipped under ENV=test.
 * @param label - Logger label (e.g., 'simulation', 'positions').
 */
export function createLogger(label: string) {
    const logLevel = (config.log_level || 'info').toLowerCase();

    const logFormat = format.combine(
        format.label({ label }),
        format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        format.errors({ stack: true }),
        format.splat(),
        format.printf(({ level, message, label, timestamp, stack, ...meta }) => {
            let logMessage = `${timestamp} [${label}] ${level.toUpperCase()}: ${message}`;

            const fields = formatMeta(meta);
            if (fields) {
                logMessage += ` | ${fields}`;
            }
            if (stack) {
                logMessage += `\n${stack}`;
            }

            return logMessage;
        })
    );

    const sinks: Array<transports.ConsoleTransportInstance | transports.FileTransportInstance> = [
        new transports.Console(),
    ];
    if (config.env !== 'test') {
        if (!fs.existsSync(logDir)) {
            fs.mkdirSync(logDir, { recursive: true });
        }
        sinks.push(new transports.File({ filename: path.join(logDir, 'app.log') }));
    }

    return winstonCreateLogger({
        level: logLevel,
        format: logFormat,
        transports: sinks,
    });
}

export type Logger = ReturnType<typeof createLogger>;
