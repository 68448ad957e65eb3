import logger from '../../config/logger';
import { NotFoundError, ValidationError } from '../../errors';
import { toPublicUser, type PublicUser, type StoredUser } from './auth.types';
import type { PasswordService } from './password.service';
import type { UserRepository } from './user.repository';

export interface CredentialPolicy {
    usernameCaseSensitive: boolean;
    minPasswordLength: number;
}

const USERNAME_RE = /^[A-Za-z0-9_.-]{3,100}$/;
const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const MAX_PASSWORD_LENGTH = 1024;

/**
 * Owns user credentials. Password hashes enter and leave only through this
 * class; everything it returns is a `PublicUser`.
 */
export class CredentialStore {
    constructor(
        private readonly users: UserRepository,
        private readonly hasher: PasswordService,
        private readonly policy: CredentialPolicy,
    ) { }

    normalizeUsername(username: string): string {
        const trimmed = username.trim();
        return this.policy.usernameCaseSensitive ? trimmed : trimmed.toLowerCase();
    }

    normalizeEmail(email: string): string {
        return email.trim().toLowerCase();
    }

    async createUser(username: string, email: string, plaintextPassword: string): Promise<PublicUser> {
        const normalizedUsername = this.normalizeUsername(username);
        const normalizedEmail = this.normalizeEmail(email);

        if (!USERNAME_RE.test(normalizedUsername)) {
            throw new ValidationError(
                'Username must be 3-100 characters of letters, digits, dot, dash or underscore',
                'username',
            );
        }
        this.assertEmail(normalizedEmail);
        this.assertPasswordPolicy(plaintextPassword);

        const passwordHash = await this.hasher.hash(plaintextPassword);
        const user = await this.users.insert({
            username: normalizedUsername,
            email: normalizedEmail,
            passwordHash,
        });

        logger.info(`User created: ${user.username}`);
        return toPublicUser(user);
    }

    async findByUsernameOrEmail(identifier: string): Promise<PublicUser | null> {
        const user = await this.lookup(identifier);
        return user ? toPublicUser(user) : null;
    }

    async findById(id: number): Promise<PublicUser | null> {
        const user = await this.users.findById(id);
        return user ? toPublicUser(user) : null;
    }

    /**
     * Returns the user only when the password matches and the account is
     * active. Unknown identifiers still pay for one verification.
     */
    async verifyCredentials(identifier: string, plaintextPassword: string): Promise<PublicUser | null> {
        const user = await this.lookup(identifier);

        if (!user) {
            await this.hasher.verify(plaintextPassword, await this.hasher.dummyHash());
            return null;
        }

        const valid = await this.hasher.verify(plaintextPassword, user.passwordHash);
        if (!valid || !user.isActive) {
            return null;
        }
        return toPublicUser(user);
    }

    /** Re-hashes and revokes all of the user's sessions in one transaction. */
    async setPassword(userId: number, newPlaintext: string): Promise<void> {
        this.assertPasswordPolicy(newPlaintext);
        const passwordHash = await this.hasher.hash(newPlaintext);
        const updated = await this.users.replacePasswordHash(userId, passwordHash);
        if (!updated) {
            throw new NotFoundError(`User with ID ${userId} not found`);
        }
        logger.info(`Password changed for user ${userId}; existing sessions revoked`);
    }

    /** False when the current password does not match. */
    async changePassword(userId: number, currentPassword: string, newPassword: string): Promise<boolean> {
        const user = await this.users.findById(userId);
        if (!user || !user.isActive) {
            return false;
        }
        if (!(await this.hasher.verify(currentPassword, user.passwordHash))) {
            return false;
        }
        await this.setPassword(userId, newPassword);
        return true;
    }

    async touchLastLogin(userId: number): Promise<Date> {
        const at = new Date();
        await this.users.touchLastLogin(userId, at);
        return at;
    }

    async updateEmail(userId: number, email: string): Promise<PublicUser> {
        const normalizedEmail = this.normalizeEmail(email);
        this.assertEmail(normalizedEmail);
        const updated = await this.users.updateEmail(userId, normalizedEmail);
        const user = updated ? await this.users.findById(userId) : null;
        if (!user) {
            throw new NotFoundError(`User with ID ${userId} not found`);
        }
        return toPublicUser(user);
    }

    async setActive(userId: number, active: boolean): Promise<void> {
        const updated = await this.users.setActive(userId, active);
        if (!updated) {
            throw new NotFoundError(`User with ID ${userId} not found`);
        }
        logger.info(`User ${active ? 'activated' : 'deactivated'}: ${userId}`);
    }

    async listUsers(): Promise<PublicUser[]> {
        const users = await this.users.list();
        return users.map(toPublicUser);
    }

    private lookup(identifier: string): Promise<StoredUser | null> {
        return identifier.includes('@')
            ? this.users.findByEmail(this.normalizeEmail(identifier))
            : this.users.findByUsername(this.normalizeUsername(identifier));
    }

    private assertEmail(email: string): void {
        if (email.length > 255 || !EMAIL_RE.test(email)) {
            throw new ValidationError('Invalid email address', 'email');
        }
    }

    private assertPasswordPolicy(password: string): void {
        if (password.length < this.policy.minPasswordLength) {
            throw new ValidationError(
                `Password must be at least ${this.policy.minPasswordLength} characters long`,
                'password',
            );
        }
        if (password.length > MAX_PASSWORD_LENGTH) {
            throw new ValidationError('Password is too long', 'password');
        }
    }
}
