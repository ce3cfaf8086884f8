import type { z } from 'zod';

import { ValidationError } from './errors.js';

/**
 * Validates caller input at the library boundary. Unknown keys are stripped,
 * so only the fields the schema names reach the wire.
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        const details = parsed.error.errors
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ValidationError(`Invalid ${what}: ${details}`, parsed.error.errors);
    }
    return parsed.data;
}

export function requireId(value: string | undefined | null, what: string): string {
    if (value === undefined || value === null || value.trim() === '') {
        throw new ValidationError(`${what} is required`);
    }
    return value;
}

/** Encodes an opaque identifier for use as a path segment. */
export function segment(value: string): string {
    return encodeURIComponent(value);
}
