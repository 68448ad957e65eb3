import { eq, lt } from 'drizzle-orm';
import type { Database } from '../../db/client';
import { withStorage } from '../../db/errors';
import { sessions } from '../../db/schema';
import type { StoredSession } from './auth.types';

/** Session rows keyed by token digest. Every method is a single statement. */
export interface SessionRepository {
    insert(session: StoredSession): Promise<void>;
    findById(id: string): Promise<StoredSession | null>;
    updateExpiry(id: string, expiresAt: Date): Promise<void>;
    delete(id: string): Promise<void>;
    deleteForUser(userId: number): Promise<number>;
    deleteExpired(now: Date): Promise<number>;
}

export class DrizzleSessionRepository implements SessionRepository {
    constructor(private readonly db: Database) { }

    insert(session: StoredSession): Promise<void> {
        return withStorage(async () => {
            await this.db.insert(sessions).values({
                id: session.id,
                userId: session.userId,
                data: { csrfToken: session.csrfToken, ttlSeconds: session.ttlSeconds },
                expiresAt: session.expiresAt,
            });
        });
    }

    findById(id: string): Promise<StoredSession | null> {
        return withStorage(async () => {
            const [row] = await this.db.select().from(sessions).where(eq(sessions.id, id)).limit(1);
            if (!row) {
                return null;
            }
            return {
                id: row.id,
                userId: row.userId,
                csrfToken: row.data.csrfToken,
                expiresAt: row.expiresAt,
                ttlSeconds: row.data.ttlSeconds,
            };
        });
    }

    updateExpiry(id: string, expiresAt: Date): Promise<void> {
        return withStorage(async () => {
            await this.db.update(sessions).set({ expiresAt, updatedAt: new Date() }).where(eq(sessions.id, id));
        });
    }

    delete(id: string): Promise<void> {
        return withStorage(async () => {
            await this.db.delete(sessions).where(eq(sessions.id, id));
        });
    }

    deleteForUser(userId: number): Promise<number> {
        return withStorage(async () => {
            const deleted = await this.db
                .delete(sessions)
                .where(eq(sessions.userId, userId))
                .returning({ id: sessions.id });
            return deleted.length;
        });
    }

    deleteExpired(now: Date): Promise<number> {
        return withStorage(async () => {
            const deleted = await this.db
                .delete(sessions)
                .where(lt(sessions.expiresAt, now))
                .returning({ id: sessions.id });
            return deleted.length;
        });
    }
}
