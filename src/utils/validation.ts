import type { z } from 'zod';
import { ValidationError } from '../errors';

/** Parses a request payload, turning the first zod issue into a `ValidationError`. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issue = result.error.issues[0];
        const field = issue?.path.join('.') || undefined;
        const message = issue ? (field ? `${field}: ${issue.message}` : issue.message) : 'Invalid request';
        throw new ValidationError(message, field);
    }
    return result.data;
}

export function parseId(raw: string, label = 'ID'): number {
    const id = Number(raw);
    if (!Number.isInteger(id) || id <= 0) {
        throw new ValidationError(`Invalid ${label} format.`);
    }
    return id;
}
