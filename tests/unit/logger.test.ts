import { describe, it, expect } from '@jest/globals';
import { redact } from '../../src/config/logger';
import { StorageError } from '../../src/errors';

describe('redact', () => {
    it('masks secrets at any depth', () => {
        expect(
            redact({
                username: 'alice',
                password: 'test-password-1',
                session: { token: 'test-token', csrfToken: 'test-csrf', userId: 1 },
                headers: [{ Authorization: 'Bearer test-token', accept: 'text/html' }],
            }),
        ).toEqual({
            username: 'alice',
            password: '[REDACTED]',
            session: { token: '[REDACTED]', csrfToken: '[REDACTED]', userId: 1 },
            headers: [{ Authorization: '[REDACTED]', accept: 'text/html' }],
        });
    });

    it('keeps primitives and dates and flattens errors', () => {
        const at = new Date('2025-01-01T00:00:00.000Z');

        expect(redact('plain')).toBe('plain');
        expect(redact(at)).toBe(at);
        expect(redact(new TypeError('bad input'))).toEqual({ name: 'TypeError', message: 'bad input' });
    });

    it('keeps the underlying failure of a storage error', () => {
        const driver = new Error('connect ECONNREFUSED 127.0.0.1:5432', {
            cause: { password: 'test-secret', code: 'ECONNREFUSED' },
        });

        expect(redact({ error: new StorageError(driver) })).toEqual({
            error: {
                name: 'StorageError',
                message: 'Internal Server Error',
                reason: {
                    name: 'Error',
                    message: 'connect ECONNREFUSED 127.0.0.1:5432',
                    cause: { password: '[REDACTED]', code: 'ECONNREFUSED' },
                },
            },
        });
    });
});
