import postgres from 'postgres';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import * as schema from './schema';
import type { AppConfig } from '../config';

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseHandle {
    db: Database;
    /** Raw postgres client for migrations and health checks. */
    sql: postgres.Sql;
    close: () => Promise<void>;
}

export function createDatabase(dbConfig: AppConfig['database']): DatabaseHandle {
    if (!dbConfig.url) {
        throw new Error('DATABASE_URL must be set in environment or .env file');
    }

    const sql = postgres(dbConfig.url, {
        max: dbConfig.maxConnections,
        idle_timeout: dbConfig.idleTimeoutSeconds,
        connect_timeout: dbConfig.connectTimeoutSeconds,
        connection: {
            statement_timeout: dbConfig.statementTimeoutMs,
        },
        onnotice: () => undefined,
    });

    return {
        db: drizzle(sql, { schema }),
        sql,
        close: () => sql.end({ timeout: 5 }),
    };
}

export interface DatabaseInfo {
    connected: boolean;
    databaseName: string;
    serverTime?: Date;
}

export async function getConnectionInfo(sql: postgres.Sql): Promise<DatabaseInfo> {
    const rows = await sql<{ database_name: string; server_time: Date }[]>`
        SELECT current_database() AS database_name, NOW() AS server_time
    `;
    const row = rows[0];
    if (!row) {
        return { connected: false, databaseName: 'unknown' };
    }
    return { connected: true, databaseName: row.database_name, serverTime: row.server_time };
}
