import fs from 'fs';
import path from 'path';
import type postgres from 'postgres';
import logger from '../config/logger';

export const DEFAULT_MIGRATIONS_DIR = path.resolve(process.cwd(), 'migrations');

export interface MigrationFile {
    version: string;
    name: string;
    filePath: string;
}

/** `NNNN_description.sql` files in lexical order. */
export function listMigrationFiles(dir: string = DEFAULT_MIGRATIONS_DIR): MigrationFile[] {
    return fs
        .readdirSync(dir)
        .filter((file) => /^\d+_[\w-]+\.sql$/.test(file))
        .sort()
        .map((file) => {
            const separator = file.indexOf('_');
            return {
                version: file.slice(0, separator),
                name: file.slice(separator + 1, -'.sql'.length),
                filePath: path.join(dir, file),
            };
        });
}

/**
 * Applies every migration not yet recorded in `schema_migrations`.
 * Each file runs in its own transaction together with its bookkeeping row.
 */
export async function runMigrations(sql: postgres.Sql, dir: string = DEFAULT_MIGRATIONS_DIR): Promise<string[]> {
    await sql`
        CREATE TABLE IF NOT EXISTS schema_migrations (
            version    VARCHAR(32) PRIMARY KEY,
            name       VARCHAR(255) NOT NULL,
            applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
    `;

    const appliedRows = await sql<{ version: string }[]>`SELECT version FROM schema_migrations`;
    const applied = new Set(appliedRows.map((row) => row.version));
    const executed: string[] = [];

    for (const migration of listMigrationFiles(dir)) {
        if (applied.has(migration.version)) {
            continue;
        }

        const statements = fs.readFileSync(migration.filePath, 'utf8');
        logger.info(`Applying migration ${migration.version}_${migration.name}`);

        await sql.begin(async (tx) => {
            await tx.unsafe(statements);
            await tx`
                INSERT INTO schema_migrations (version, name)
                VALUES (${migration.version}, ${migration.name})
            `;
        });

        executed.push(migration.version);
    }

    if (executed.length === 0) {
        logger.info('Database schema is up to date');
    } else {
        logger.info(`Applied ${executed.length} migration(s)`);
    }

    return executed;
}
