import { describe, it, expect } from '@jest/globals';
import { uniqueViolationField, withStorage } from '../../src/db/errors';
import { DuplicateError, NotFoundError, StorageError } from '../../src/errors';

describe('uniqueViolationField', () => {
    it('maps unique constraint names to the user column', () => {
        expect(uniqueViolationField({ code: '23505', constraint_name: 'users_username_key' })).toBe('username');
        expect(uniqueViolationField({ code: '23505', constraint_name: 'users_email_key' })).toBe('email');
        expect(uniqueViolationField({ code: '23505', constraint_name: 'category_category_name_key' })).toBeNull();
    });

    it('looks through wrapped causes', () => {
        const wrapped = new Error('Failed query', {
            cause: { code: '23505', constraint_name: 'users_email_key' },
        });

        expect(uniqueViolationField(wrapped)).toBe('email');
    });

    it('ignores other errors', () => {
        expect(uniqueViolationField({ code: '57014' })).toBeNull();
        expect(uniqueViolationField('boom')).toBeNull();
        expect(uniqueViolationField(null)).toBeNull();
    });
});

describe('withStorage', () => {
    it('passes results through', async () => {
        await expect(withStorage(async () => 42)).resolves.toBe(42);
    });

    it('rethrows application errors untouched', async () => {
        const error = new NotFoundError('gone');

        await expect(withStorage(async () => { throw error; })).rejects.toBe(error);
    });

    it('turns unique violations into DuplicateError', async () => {
        const failing = withStorage(async () => {
            throw Object.assign(new Error('duplicate key'), { code: '23505', constraint_name: 'users_username_key' });
        });

        await expect(failing).rejects.toEqual(new DuplicateError('username'));
    });

    it('wraps anything else in a StorageError that hides the driver message', async () => {
        const cause = new Error('connection refused');
        const error = await withStorage(async () => { throw cause; }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(StorageError);
        expect(error).toMatchObject({ message: 'Internal Server Error', kind: 'internal_error', reason: cause });
    });
});
