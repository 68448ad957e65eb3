import winston from 'winston';
import path from 'path';
import { config } from '../config';

// Define log levels
const levels = {
    error: 0,
    warn: 1,
    info: 2,
    http: 3,
    debug: 4,
};

const colors = {
    error: 'red',
    warn: 'yellow',
    info: 'green',
    http: 'magenta',
    debug: 'white',
};

winston.addColors(colors);

// Keys whose values must never reach a log line
export const REDACTED_KEYS = new Set([
    'password',
    'currentpassword',
    'newpassword',
    'confirmpassword',
    'passwordhash',
    'password_hash',
    'token',
    'sessiontoken',
    'csrftoken',
    'cookie',
    'authorization',
    'secret',
]);

export function redact(value: unknown, depth = 0): unknown {
    if (depth > 5 || value === null || typeof value !== 'object') {
        return value;
    }
    if (Array.isArray(value)) {
        return value.map((entry) => redact(entry, depth + 1));
    }
    if (value instanceof Date) {
        return value;
    }
    // Driver failures travel as `cause` or as StorageError's `reason`
    if (value instanceof Error) {
        const flat: Record<string, unknown> = { name: value.name, message: value.message };
        if ('reason' in value && value.reason !== undefined) {
            flat.reason = redact(value.reason, depth + 1);
        }
        if (value.cause !== undefined) {
            flat.cause = redact(value.cause, depth + 1);
        }
        return flat;
    }
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
        result[key] = REDACTED_KEYS.has(key.toLowerCase()) ? '[REDACTED]' : redact(entry, depth + 1);
    }
    return result;
}

const redactFormat = winston.format((info) => {
    for (const key of Object.keys(info)) {
        if (REDACTED_KEYS.has(key.toLowerCase())) {
            info[key] = '[REDACTED]';
        } else if (key !== 'message' && key !== 'level') {
            info[key] = redact(info[key]);
        }
    }
    return info;
});

// Splat metadata (everything but level/message/timestamp) is appended as JSON
const format = winston.format.combine(
    redactFormat(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
    winston.format.colorize({ all: true }),
    winston.format.printf((info) => {
        const { timestamp, level, message, ...meta } = info;
        const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} ${level}: ${String(message)}${extra}`;
    }),
);

const transports: winston.transport[] = [new winston.transports.Console()];

if (config.logToFile) {
    transports.push(
        new winston.transports.File({
            filename: path.join('logs', 'error.log'),
            level: 'error',
        }),
        new winston.transports.File({
            filename: path.join('logs', 'all.log'),
        }),
    );
}

const logger = winston.createLogger({
    level: config.logLevel,
    levels,
    format,
    transports,
    silent: config.nodeEnv === 'test',
});

export default logger;
