import type { z } from 'zod';

export type ErrorType = 'decode' | 'config';

export class TaggedValueError extends Error {
    constructor(
        message: string,
        public readonly type: ErrorType
    ) {
        super(message);
        this.name = 'TaggedValueError';
    }
}

export type DecodeFailure = 'malformed' | 'invalid';

/**
 * Decoding failed: either the text was not JSON, or the representation
 * schema rejected the value. `issues` are the representation's own issues.
 */
export class DecodeError extends TaggedValueError {
    private constructor(
        message: string,
        public readonly reason: DecodeFailure,
        public readonly issues: readonly z.ZodIssue[]
    ) {
        super(message, 'decode');
        this.name = 'DecodeError';
    }

    static malformed(message: string): DecodeError {
        return new DecodeError(message, 'malformed', []);
    }

    static invalid(error: z.ZodError): DecodeError {
        const message = error.issues.map(issue => {
            const path = issue.path.join('.');
            return path ? `${path}: ${issue.message}` : issue.message;
        }).join('\n');
        return new DecodeError(message, 'invalid', error.issues);
    }
}

export class ConfigError extends TaggedValueError {
    constructor(message: string) {
        super(message, 'config');
        this.name = 'ConfigError';
    }
}
