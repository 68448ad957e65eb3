import { createRepositories, createServices, type Services } from '../src/bootstrap';
import { config, drainInvalidSettings } from '../src/config';
import { createDatabase, type DatabaseHandle } from '../src/db/client';

export interface ScriptContext extends Services {
    database: DatabaseHandle;
}

/** Connects, runs the task, disconnects; any failure exits with status 1. */
export async function runScript(task: (context: ScriptContext) => Promise<void>): Promise<void> {
    for (const key of drainInvalidSettings()) {
        console.warn(`⚠️  Ignoring invalid value for ${key}; using the default`);
    }

    let database: DatabaseHandle | undefined;
    try {
        database = createDatabase(config.database);
        const services = createServices(createRepositories(database.db), config);
        await task({ ...services, database });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`❌ ${message}`);
        process.exitCode = 1;
    } finally {
        await database?.close();
    }
}

export function parseUserId(raw: string | undefined): number {
    const id = Number(raw);
    if (!raw || !Number.isInteger(id) || id <= 0) {
        throw new Error('User ID must be a positive integer');
    }
    return id;
}

export function usage(text: string): never {
    console.error(`Usage: ${text}`);
    process.exit(1);
}
