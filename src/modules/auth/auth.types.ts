export interface LoginRequestBody {
    /** Username or email address. */
    username: string;
    password: string;
}

export interface CreateUserBody {
    username: string;
    email: string;
    password: string;
}

export interface ChangePasswordBody {
    currentPassword: string;
    newPassword: string;
}

export interface UpdateProfileBody {
    email: string;
}

/** A user as seen outside the credential store. Carries no password hash. */
export interface PublicUser {
    id: number;
    username: string;
    email: string;
    emailVerified: boolean;
    isActive: boolean;
    lastLogin: Date | null;
    createdAt: Date;
}

/** A user row including its hash; only the credential store handles these. */
export interface StoredUser extends PublicUser {
    passwordHash: string;
    updatedAt: Date;
}

export interface NewUserRecord {
    username: string;
    email: string;
    passwordHash: string;
}

export interface IssuedSession {
    /** Opaque token handed to the client. Only its digest is stored. */
    token: string;
    csrfToken: string;
    expiresAt: Date;
}

export interface ResolvedSession {
    userId: number;
    csrfToken: string;
    expiresAt: Date;
    /** True when this resolve pushed the expiry out (rolling sessions). */
    renewed: boolean;
}

export interface StoredSession {
    id: string;
    userId: number;
    csrfToken: string;
    expiresAt: Date;
    /** Lifetime the session was issued with; rolling renewal extends by this much. */
    ttlSeconds?: number;
}

export type AuthTransport = 'cookie' | 'bearer';

/** Request-scoped identity attached by the auth pipeline. */
export interface RequestAuth {
    user: PublicUser;
    sessionToken: string;
    csrfToken: string;
    via: AuthTransport;
}

export interface LoginResult {
    user: PublicUser;
    session: IssuedSession;
}

export function toPublicUser(user: StoredUser): PublicUser {
    return {
        id: user.id,
        username: user.username,
        email: user.email,
        emailVerified: user.emailVerified,
        isActive: user.isActive,
        lastLogin: user.lastLogin,
        createdAt: user.createdAt,
    };
}
