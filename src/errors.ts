export type ErrorKind =
    | 'validation_error'
    | 'duplicate_username'
    | 'duplicate_email'
    | 'invalid_credentials'
    | 'unauthorized'
    | 'forbidden'
    | 'not_found'
    | 'internal_error';

/**
 * Base class for every error the HTTP layer knows how to render.
 * `kind` is the stable machine-readable field in API responses.
 */
export class AppError extends Error {
    constructor(
        message: string,
        readonly kind: ErrorKind,
        readonly statusCode: number,
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class ValidationError extends AppError {
    constructor(message: string, readonly field?: string) {
        super(message, 'validation_error', 400);
    }
}

export type DuplicateField = 'username' | 'email';

export class DuplicateError extends AppError {
    constructor(readonly field: DuplicateField) {
        super(
            field === 'username' ? 'Username is already taken' : 'Email is already registered',
            field === 'username' ? 'duplicate_username' : 'duplicate_email',
            409,
        );
    }
}

/** Never says which check failed. */
export class AuthError extends AppError {
    constructor(kind: 'invalid_credentials' | 'unauthorized' = 'unauthorized') {
        super(
            kind === 'invalid_credentials' ? 'Invalid username or password' : 'Authentication required',
            kind,
            401,
        );
    }
}

export class ForbiddenError extends AppError {
    constructor(message = 'Forbidden') {
        super(message, 'forbidden', 403);
    }
}

export class NotFoundError extends AppError {
    constructor(message = 'Not found') {
        super(message, 'not_found', 404);
    }
}

/** Connection and timeout failures; the cause is kept for logging only. */
export class StorageError extends AppError {
    constructor(readonly reason?: unknown) {
        super('Internal Server Error', 'internal_error', 500);
    }
}

export function isAppError(error: unknown): error is AppError {
    return error instanceof AppError;
}
