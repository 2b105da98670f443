import type { z } from 'zod';
import type { DecodeError } from '../application/errors.js';
import type { Logger } from '../application/ports/logger.js';
import { defaultLogger } from '../composition/container.js';
import { mapResult, type Result } from '../shared/result.js';
import { decodeJson, encodeJson } from './codec.js';
import type { DisplayerOf, Formatter } from './display.js';
import type { TaggedValue } from './tagged-value.js';

export type WrapperName = 'Amount' | 'Instant' | 'Id';

export interface KindOptions<W> {
    /** Marker-supplied formatting used by `display()`. */
    readonly display?: (value: W, f: Formatter) => void;
    readonly logger?: Logger;
}

/**
 * Everything bound to one `(marker, representation)` pair: construction,
 * the representation-transparent codec and a sort comparator.
 */
export interface Kind<W, Repr, I = Repr> {
    readonly marker: string;
    from(repr: Repr): W;
    /** Same as `from`; reads better for module-level constants. */
    readonly new: (repr: Repr) => W;
    /** The representation schema, transformed into the wrapper. */
    readonly schema: z.ZodType<W, z.ZodTypeDef, I>;
    /** @throws {z.ZodError} exactly as the representation schema would */
    parse(input: unknown): W;
    decode(text: string): Result<W, DecodeError>;
    encode(value: W): string;
    /** `Array.prototype.sort` comparator; unordered pairs compare as 0. */
    compare(lhs: W, rhs: W): number;
}

export function displayerFrom<W>(display?: (value: W, f: Formatter) => void): DisplayerOf<W> | undefined {
    return display ? { display } : undefined;
}

export function defineKind<W extends TaggedValue<string, Repr>, Repr, I>(
    wrapper: WrapperName,
    marker: string,
    repr: z.ZodType<Repr, z.ZodTypeDef, I>,
    from: (repr: Repr) => W,
    logger: Logger = defaultLogger()
): Kind<W, Repr, I> {
    const log = logger.child({ wrapper, marker });
    const schema = repr.transform(from);

    log.debug('Kind defined');

    return {
        marker,
        from,
        new: from,
        schema,
        parse: (input) => schema.parse(input),
        decode: (text) => {
            const result = mapResult(decodeJson(repr, text), from);
            if (!result.ok) {
                log.debug('Decode failed', { reason: result.error.reason, issues: result.error.issues });
            }
            return result;
        },
        encode: (value) => encodeJson(value),
        compare: (lhs, rhs) => lhs.compareTo(rhs) ?? 0
    };
}
