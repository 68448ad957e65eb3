import { asc, eq, type SQL } from 'drizzle-orm';
import type { Database } from '../../db/client';
import { withStorage } from '../../db/errors';
import { sessions, users, type UserRow } from '../../db/schema';
import type { NewUserRecord, StoredUser } from './auth.types';

/**
 * Persistence boundary for user rows. Implementations enforce username and
 * email uniqueness and report collisions as `DuplicateError`.
 */
export interface UserRepository {
    insert(record: NewUserRecord): Promise<StoredUser>;
    findById(id: number): Promise<StoredUser | null>;
    findByUsername(username: string): Promise<StoredUser | null>;
    findByEmail(email: string): Promise<StoredUser | null>;
    list(): Promise<StoredUser[]>;
    touchLastLogin(id: number, at: Date): Promise<void>;
    updateEmail(id: number, email: string): Promise<boolean>;
    /** Replaces the hash and deletes every session of the user atomically. */
    replacePasswordHash(id: number, passwordHash: string): Promise<boolean>;
    /** Deactivation also deletes the user's sessions in the same transaction. */
    setActive(id: number, active: boolean): Promise<boolean>;
}

function toStoredUser(row: UserRow): StoredUser {
    return {
        id: row.id,
        username: row.username,
        email: row.email,
        passwordHash: row.passwordHash,
        emailVerified: row.emailVerified,
        isActive: row.isActive,
        lastLogin: row.lastLogin,
        createdAt: row.createdAt,
        updatedAt: row.updatedAt,
    };
}

export class DrizzleUserRepository implements UserRepository {
    constructor(private readonly db: Database) { }

    insert(record: NewUserRecord): Promise<StoredUser> {
        return withStorage(async () => {
            const [row] = await this.db.insert(users).values(record).returning();
            if (!row) {
                throw new Error('Insert returned no row');
            }
            return toStoredUser(row);
        });
    }

    findById(id: number): Promise<StoredUser | null> {
        return this.findOne(eq(users.id, id));
    }

    findByUsername(username: string): Promise<StoredUser | null> {
        return this.findOne(eq(users.username, username));
    }

    findByEmail(email: string): Promise<StoredUser | null> {
        return this.findOne(eq(users.email, email));
    }

    list(): Promise<StoredUser[]> {
        return withStorage(async () => {
            const rows = await this.db.select().from(users).orderBy(asc(users.id));
            return rows.map(toStoredUser);
        });
    }

    touchLastLogin(id: number, at: Date): Promise<void> {
        return withStorage(async () => {
            await this.db.update(users).set({ lastLogin: at, updatedAt: at }).where(eq(users.id, id));
        });
    }

    updateEmail(id: number, email: string): Promise<boolean> {
        return withStorage(async () => {
            const updated = await this.db
                .update(users)
                .set({ email, updatedAt: new Date() })
                .where(eq(users.id, id))
                .returning({ id: users.id });
            return updated.length > 0;
        });
    }

    replacePasswordHash(id: number, passwordHash: string): Promise<boolean> {
        return withStorage(() =>
            this.db.transaction(async (tx) => {
                const updated = await tx
                    .update(users)
                    .set({ passwordHash, updatedAt: new Date() })
                    .where(eq(users.id, id))
                    .returning({ id: users.id });
                if (updated.length === 0) {
                    return false;
                }
                await tx.delete(sessions).where(eq(sessions.userId, id));
                return true;
            }),
        );
    }

    setActive(id: number, active: boolean): Promise<boolean> {
        return withStorage(() =>
            this.db.transaction(async (tx) => {
                const updated = await tx
                    .update(users)
                    .set({ isActive: active, updatedAt: new Date() })
                    .where(eq(users.id, id))
                    .returning({ id: users.id });
                if (updated.length === 0) {
                    return false;
                }
                if (!active) {
                    await tx.delete(sessions).where(eq(sessions.userId, id));
                }
                return true;
            }),
        );
    }

    private findOne(condition: SQL): Promise<StoredUser | null> {
        return withStorage(async () => {
            const [row] = await this.db.select().from(users).where(condition).limit(1);
            return row ? toStoredUser(row) : null;
        });
    }
}
