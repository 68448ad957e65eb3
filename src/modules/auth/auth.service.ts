import logger from '../../config/logger';
import { AuthError, ForbiddenError } from '../../errors';
import type { IssuedSession, LoginResult, PublicUser, ResolvedSession } from './auth.types';
import type { CredentialStore } from './credential.store';
import type { SessionStore } from './session.store';

export interface AuthServiceOptions {
    allowRegistration: boolean;
}

export interface Identity {
    user: PublicUser;
    session: ResolvedSession;
}

export class AuthService {
    constructor(
        private readonly credentials: CredentialStore,
        private readonly sessions: SessionStore,
        private readonly options: AuthServiceOptions,
    ) { }

    async register(username: string, email: string, password: string): Promise<PublicUser> {
        if (!this.options.allowRegistration) {
            throw new ForbiddenError('Registration is disabled');
        }
        return this.credentials.createUser(username, email, password);
    }

    /**
     * Any failure is the same generic `invalid_credentials` error. On success
     * the session the client already held, if any, is destroyed.
     */
    async login(identifier: string, password: string, previousToken?: string): Promise<LoginResult> {
        const user = await this.credentials.verifyCredentials(identifier, password);
        if (!user) {
            logger.warn('Failed login attempt');
            throw new AuthError('invalid_credentials');
        }

        await this.logout(previousToken);
        const session = await this.sessions.createSession(user.id);
        const lastLogin = await this.credentials.touchLastLogin(user.id);

        logger.info(`User logged in: ${user.username}`);
        return { user: { ...user, lastLogin }, session };
    }

    /** Idempotent: an unknown or already destroyed token is not an error. */
    async logout(token: string | undefined): Promise<void> {
        if (!token) {
            return;
        }
        await this.sessions.destroy(token);
    }

    /**
     * Resolves a session token to an active user. A session owned by a
     * missing or deactivated user is destroyed so later requests skip it.
     */
    async identify(token: string): Promise<Identity | null> {
        const session = await this.sessions.resolve(token);
        if (!session) {
            return null;
        }

        const user = await this.credentials.findById(session.userId);
        if (!user || !user.isActive) {
            await this.sessions.destroy(token);
            logger.info(`Dropped session of inactive user ${session.userId}`);
            return null;
        }

        return { user, session };
    }

    /**
     * Verifies the current password, stores the new one (revoking every
     * session of the user, including the caller's) and issues a fresh session.
     */
    async changePassword(userId: number, currentPassword: string, newPassword: string): Promise<IssuedSession> {
        const changed = await this.credentials.changePassword(userId, currentPassword, newPassword);
        if (!changed) {
            throw new AuthError('invalid_credentials');
        }
        return this.sessions.createSession(userId);
    }

    async updateEmail(userId: number, email: string): Promise<PublicUser> {
        return this.credentials.updateEmail(userId, email);
    }

    async cleanupExpiredSessions(): Promise<number> {
        return this.sessions.purgeExpired();
    }
}
