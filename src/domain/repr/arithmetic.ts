/** Representations the arithmetic wrappers compute with. */
export type Scalar = number | bigint;

/** Representations an `Instant` may hold. */
export type Temporal = Scalar | Date;

/**
 * Representation of the distance between two instants: the scalar itself,
 * or milliseconds for `Date`.
 */
export type Elapsed<R> = R extends Date ? number : R;

// Same message V8 throws for `1n + 1`.
const MIXED = 'Cannot mix BigInt and other types, use explicit conversions';

export function isScalar(value: unknown): value is Scalar {
    return typeof value === 'number' || typeof value === 'bigint';
}

export function sum<R extends Scalar>(lhs: R, rhs: R): R;
export function sum(lhs: Scalar, rhs: Scalar): Scalar {
    if (typeof lhs === 'number' && typeof rhs === 'number') return lhs + rhs;
    if (typeof lhs === 'bigint' && typeof rhs === 'bigint') return lhs + rhs;
    throw new TypeError(MIXED);
}

export function difference<R extends Scalar>(lhs: R, rhs: R): R;
export function difference(lhs: Scalar, rhs: Scalar): Scalar {
    if (typeof lhs === 'number' && typeof rhs === 'number') return lhs - rhs;
    if (typeof lhs === 'bigint' && typeof rhs === 'bigint') return lhs - rhs;
    throw new TypeError(MIXED);
}

export function product<R extends Scalar>(lhs: R, factor: R): R;
export function product(lhs: Scalar, factor: Scalar): Scalar {
    if (typeof lhs === 'number' && typeof factor === 'number') return lhs * factor;
    if (typeof lhs === 'bigint' && typeof factor === 'bigint') return lhs * factor;
    throw new TypeError(MIXED);
}

/** `bigint` division truncates and throws `RangeError` on a zero divisor. */
export function quotient<R extends Scalar>(lhs: R, rhs: R): R;
export function quotient(lhs: Scalar, rhs: Scalar): Scalar {
    if (typeof lhs === 'number' && typeof rhs === 'number') return lhs / rhs;
    if (typeof lhs === 'bigint' && typeof rhs === 'bigint') return lhs / rhs;
    throw new TypeError(MIXED);
}

export function elapsed<R extends Temporal>(later: R, earlier: R): Elapsed<R>;
export function elapsed(later: Temporal, earlier: Temporal): Scalar {
    if (later instanceof Date && earlier instanceof Date) {
        return later.getTime() - earlier.getTime();
    }
    if (later instanceof Date || earlier instanceof Date) {
        throw new TypeError('Cannot subtract a Date from a number');
    }
    return difference(later, earlier);
}

/** Moves `instant` by `span`; `direction` is 1 forwards, -1 backwards. */
export function shift<R extends Temporal>(instant: R, span: Elapsed<R>, direction: 1 | -1): R;
export function shift(instant: Temporal, span: Scalar, direction: 1 | -1): Temporal {
    if (instant instanceof Date) {
        if (typeof span !== 'number') throw new TypeError(MIXED);
        return new Date(instant.getTime() + direction * span);
    }
    return direction === 1 ? sum(instant, span) : difference(instant, span);
}
