import type { z } from 'zod';
import { DecodeError } from '../application/errors.js';
import { fail, ok, type Result } from '../shared/result.js';

/**
 * Parses JSON text and validates it against `schema`. Works the same for a
 * bare representation schema and for a wrapper kind's schema, so both report
 * identical failures.
 */
export function decodeJson<T, I>(schema: z.ZodType<T, z.ZodTypeDef, I>, text: string): Result<T, DecodeError> {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        return fail(DecodeError.malformed(error instanceof Error ? error.message : 'Malformed JSON'));
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        return fail(DecodeError.invalid(parsed.error));
    }
    return ok(parsed.data);
}

export function encodeJson(value: unknown): string {
    return JSON.stringify(value);
}
