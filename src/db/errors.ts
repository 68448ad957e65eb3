import { AppError, DuplicateError, StorageError, type DuplicateField } from '../errors';

const UNIQUE_VIOLATION = '23505';

interface PgErrorFields {
    code?: unknown;
    constraint_name?: unknown;
    cause?: unknown;
}

function asPgError(error: unknown): PgErrorFields | null {
    if (typeof error !== 'object' || error === null) {
        return null;
    }
    return {
        code: 'code' in error ? error.code : undefined,
        constraint_name: 'constraint_name' in error ? error.constraint_name : undefined,
        cause: 'cause' in error ? error.cause : undefined,
    };
}

/**
 * Returns the user column behind a unique violation, looking through
 * wrapped causes (drizzle wraps driver errors in newer releases).
 */
export function uniqueViolationField(error: unknown): DuplicateField | null {
    let current = asPgError(error);
    for (let depth = 0; current && depth < 5; depth++) {
        if (current.code === UNIQUE_VIOLATION && typeof current.constraint_name === 'string') {
            if (current.constraint_name.includes('username')) return 'username';
            if (current.constraint_name.includes('email')) return 'email';
            return null;
        }
        current = asPgError(current.cause);
    }
    return null;
}

/** Runs a storage operation, mapping driver failures onto the app's error taxonomy. */
export async function withStorage<T>(operation: () => Promise<T>): Promise<T> {
    try {
        return await operation();
    } catch (error) {
        if (error instanceof AppError) {
            throw error;
        }
        const field = uniqueViolationField(error);
        if (field) {
            throw new DuplicateError(field);
        }
        throw new StorageError(error);
    }
}
