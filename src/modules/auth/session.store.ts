import { createHash, randomBytes } from 'crypto';
import logger from '../../config/logger';
import type { IssuedSession, ResolvedSession } from './auth.types';
import type { SessionRepository } from './session.repository';

export const TOKEN_BYTES = 32;
const TOKEN_PATTERN = /^[A-Za-z0-9_-]{43}$/; // 32 bytes, base64url without padding

export interface SessionStoreOptions {
    ttlSeconds: number;
    rolling: boolean;
}

export function generateToken(): string {
    return randomBytes(TOKEN_BYTES).toString('base64url');
}

/** Storage key for a token. A leaked sessions table does not yield usable cookies. */
export function hashToken(token: string): string {
    return createHash('sha256').update(token).digest('hex');
}

export class SessionStore {
    constructor(
        private readonly repository: SessionRepository,
        private readonly options: SessionStoreOptions,
        private readonly now: () => Date = () => new Date(),
    ) { }

    get ttlSeconds(): number {
        return this.options.ttlSeconds;
    }

    async createSession(userId: number, ttlSeconds: number = this.options.ttlSeconds): Promise<IssuedSession> {
        const token = generateToken();
        const csrfToken = generateToken();
        const expiresAt = new Date(this.now().getTime() + ttlSeconds * 1000);

        await this.repository.insert({ id: hashToken(token), userId, csrfToken, expiresAt, ttlSeconds });

        return { token, csrfToken, expiresAt };
    }

    /**
     * Expiry is checked here on every call; expired rows are removed on sight.
     * Under rolling expiry a session past half its lifetime is pushed out by
     * the TTL it was issued with. Concurrent extensions race harmlessly: last write wins.
     */
    async resolve(token: string): Promise<ResolvedSession | null> {
        if (!TOKEN_PATTERN.test(token)) {
            return null;
        }

        const id = hashToken(token);
        const session = await this.repository.findById(id);
        if (!session) {
            return null;
        }

        const now = this.now().getTime();
        if (session.expiresAt.getTime() <= now) {
            await this.repository.delete(id);
            logger.debug(`Removed expired session for user ${session.userId}`);
            return null;
        }

        const ttlMs = (session.ttlSeconds ?? this.options.ttlSeconds) * 1000;
        if (this.options.rolling && session.expiresAt.getTime() - now < ttlMs / 2) {
            const expiresAt = new Date(now + ttlMs);
            await this.repository.updateExpiry(id, expiresAt);
            return { userId: session.userId, csrfToken: session.csrfToken, expiresAt, renewed: true };
        }

        return { userId: session.userId, csrfToken: session.csrfToken, expiresAt: session.expiresAt, renewed: false };
    }

    /** Idempotent. */
    async destroy(token: string): Promise<void> {
        if (!TOKEN_PATTERN.test(token)) {
            return;
        }
        await this.repository.delete(hashToken(token));
    }

    async destroyAllForUser(userId: number): Promise<number> {
        const count = await this.repository.deleteForUser(userId);
        if (count > 0) {
            logger.info(`Revoked ${count} session(s) for user ${userId}`);
        }
        return count;
    }

    async purgeExpired(): Promise<number> {
        const count = await this.repository.deleteExpired(this.now());
        if (count > 0) {
            logger.info(`Cleaned up ${count} expired sessions`);
        }
        return count;
    }
}
