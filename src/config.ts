import dotenv from 'dotenv';

dotenv.config(); // Load .env file

type Env = Record<string, string | undefined>;

interface DatabaseConfig {
    url: string;
    maxConnections: number;
    idleTimeoutSeconds: number;
    connectTimeoutSeconds: number;
    statementTimeoutMs: number;
}

export interface SessionConfig {
    cookieName: string;
    ttlSeconds: number;
    rolling: boolean; // Extend expiry on activity
    secret?: string; // When set, session cookies are signed
    secureCookie: boolean;
    sweepIntervalMs: number;
}

export interface AuthPolicyConfig {
    usernameCaseSensitive: boolean;
    minPasswordLength: number;
    allowRegistration: boolean;
}

export interface PasswordHashConfig {
    memoryCostKib: number;
    timeCost: number;
    parallelism: number;
}

export interface AppConfig {
    serviceName: string;
    version: string;
    nodeEnv: string;
    port: number;
    host: string;
    logLevel: string;
    logToFile: boolean;
    httpRequestLogging: boolean;
    viewsDir: string;
    database: DatabaseConfig;
    session: SessionConfig;
    auth: AuthPolicyConfig;
    password: PasswordHashConfig;
}

const THIRTY_DAYS_SECONDS = 30 * 24 * 60 * 60;

const invalidSettings: string[] = [];

function intFrom(env: Env, key: string, fallback: number, min = 0): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        invalidSettings.push(key);
        return fallback;
    }
    return value;
}

function boolFrom(env: Env, key: string, fallback: boolean): boolean {
    const raw = env[key]?.trim().toLowerCase();
    if (raw === undefined || raw === '') {
        return fallback;
    }
    if (['true', '1', 'yes', 'on'].includes(raw)) return true;
    if (['false', '0', 'no', 'off'].includes(raw)) return false;
    invalidSettings.push(key);
    return fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
    const nodeEnv = env.NODE_ENV || 'development';
    const secret = env.SESSION_SECRET?.trim();

    return {
        serviceName: 'crud-session-starter',
        version: env.npm_package_version || '0.1.0',
        nodeEnv,
        port: intFrom(env, 'PORT', 3093, 1),
        host: env.HOST || '0.0.0.0',
        logLevel: env.LOG_LEVEL || (nodeEnv === 'development' ? 'debug' : 'info'),
        logToFile: boolFrom(env, 'LOG_TO_FILE', false),
        httpRequestLogging: boolFrom(env, 'HTTP_REQUEST_LOGGING', false),
        viewsDir: env.VIEWS_DIR || 'views',
        database: {
            url: env.DATABASE_URL || '',
            maxConnections: intFrom(env, 'DATABASE_MAX_CONNECTIONS', 20, 1),
            idleTimeoutSeconds: intFrom(env, 'DATABASE_IDLE_TIMEOUT_SECONDS', 8),
            connectTimeoutSeconds: intFrom(env, 'DATABASE_CONNECT_TIMEOUT_SECONDS', 8, 1),
            statementTimeoutMs: intFrom(env, 'DATABASE_STATEMENT_TIMEOUT_MS', 5000),
        },
        session: {
            cookieName: env.SESSION_COOKIE_NAME || 'sid',
            ttlSeconds: intFrom(env, 'SESSION_TTL_SECONDS', THIRTY_DAYS_SECONDS, 1),
            rolling: boolFrom(env, 'SESSION_ROLLING', true),
            secret: secret ? secret : undefined,
            secureCookie: boolFrom(env, 'SESSION_COOKIE_SECURE', nodeEnv === 'production'),
            sweepIntervalMs: intFrom(env, 'SESSION_SWEEP_INTERVAL_MS', 60 * 60 * 1000, 1000),
        },
        auth: {
            usernameCaseSensitive: boolFrom(env, 'AUTH_USERNAME_CASE_SENSITIVE', false),
            minPasswordLength: intFrom(env, 'AUTH_MIN_PASSWORD_LENGTH', 8, 1),
            allowRegistration: boolFrom(env, 'AUTH_ALLOW_REGISTRATION', false),
        },
        password: {
            // OWASP baseline for argon2id: 19 MiB, 2 iterations, 1 lane
            memoryCostKib: intFrom(env, 'PASSWORD_MEMORY_COST_KIB', 19456, 1024),
            timeCost: intFrom(env, 'PASSWORD_TIME_COST', 2, 2),
            parallelism: intFrom(env, 'PASSWORD_PARALLELISM', 1, 1),
        },
    };
}

/** Settings that were present but unparseable and fell back to defaults. */
export function drainInvalidSettings(): string[] {
    return invalidSettings.splice(0, invalidSettings.length);
}

export const config: AppConfig = loadConfig();
