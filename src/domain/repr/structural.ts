export type Primitive = string | number | bigint | boolean;

/** Result of comparing two values: less, equal or greater. */
export type Ordering = -1 | 0 | 1;

/** A value usable as a `Map`/`Set` key standing in for a representation. */
export type HashKey = Primitive;

export interface Equatable {
    equals(rhs: unknown): boolean;
}

export interface Comparable {
    compareTo(rhs: unknown): Ordering | undefined;
}

export interface Hashable {
    hashKey(): HashKey;
}

export type HashableRepr = Primitive | Date | Uint8Array | Hashable;

function isEquatable(value: unknown): value is Equatable {
    return typeof value === 'object' && value !== null && 'equals' in value && typeof value.equals === 'function';
}

function isComparable(value: unknown): value is Comparable {
    return typeof value === 'object' && value !== null && 'compareTo' in value && typeof value.compareTo === 'function';
}

function isJsonable(value: unknown): value is { toJSON(key: string): unknown } {
    return typeof value === 'object' && value !== null && 'toJSON' in value && typeof value.toJSON === 'function';
}

function ordering(less: boolean, greater: boolean, equal: boolean): Ordering | undefined {
    if (less) return -1;
    if (greater) return 1;
    return equal ? 0 : undefined;
}

function compareBytes(lhs: Uint8Array, rhs: Uint8Array): Ordering {
    const length = Math.min(lhs.length, rhs.length);
    for (let i = 0; i < length; i++) {
        if (lhs[i] !== rhs[i]) {
            return lhs[i] < rhs[i] ? -1 : 1;
        }
    }
    if (lhs.length === rhs.length) return 0;
    return lhs.length < rhs.length ? -1 : 1;
}

export function toHex(bytes: Uint8Array): string {
    return Array.from(bytes, (byte) => byte.toString(16).padStart(2, '0')).join('');
}

export function equalsRepr(lhs: unknown, rhs: unknown): boolean {
    if (lhs instanceof Date && rhs instanceof Date) {
        return lhs.getTime() === rhs.getTime();
    }
    if (lhs instanceof Uint8Array && rhs instanceof Uint8Array) {
        return compareBytes(lhs, rhs) === 0;
    }
    if (isEquatable(lhs)) {
        return lhs.equals(rhs);
    }
    return lhs === rhs;
}

/**
 * Partial ordering over representations. `undefined` means the pair is
 * unordered: `NaN`, an invalid `Date`, or objects that expose neither
 * `compareTo` nor a matching `equals`.
 */
export function compareRepr(lhs: unknown, rhs: unknown): Ordering | undefined {
    if (typeof lhs === 'number' && typeof rhs === 'number') {
        return ordering(lhs < rhs, lhs > rhs, lhs === rhs);
    }
    if (typeof lhs === 'bigint' && typeof rhs === 'bigint') {
        return ordering(lhs < rhs, lhs > rhs, lhs === rhs);
    }
    if (typeof lhs === 'string' && typeof rhs === 'string') {
        return ordering(lhs < rhs, lhs > rhs, lhs === rhs);
    }
    if (typeof lhs === 'boolean' && typeof rhs === 'boolean') {
        return ordering(!lhs && rhs, lhs && !rhs, lhs === rhs);
    }
    if (lhs instanceof Date && rhs instanceof Date) {
        return compareRepr(lhs.getTime(), rhs.getTime());
    }
    if (lhs instanceof Uint8Array && rhs instanceof Uint8Array) {
        return compareBytes(lhs, rhs);
    }
    if (isComparable(lhs)) {
        return lhs.compareTo(rhs);
    }
    return equalsRepr(lhs, rhs) ? 0 : undefined;
}

/** Equal representations always produce equal keys. */
export function hashKeyOf(repr: HashableRepr): HashKey {
    if (typeof repr !== 'object') return repr;
    if (repr instanceof Date) return repr.getTime();
    if (repr instanceof Uint8Array) return toHex(repr);
    return repr.hashKey();
}

/**
 * JSON form of a representation, following its own `toJSON` when it has one
 * so nested wrappers flatten to the innermost value.
 */
export function jsonOf(repr: unknown, key: string): unknown {
    return isJsonable(repr) ? repr.toJSON(key) : repr;
}

interface Cloneable {
    clone(): unknown;
}

function isCloneable(value: unknown): value is Cloneable {
    return typeof value === 'object' && value !== null && 'clone' in value && typeof value.clone === 'function';
}

/** Copies mutable built-ins and defers to `clone()`; primitives come back as-is. */
export function cloneRepr<R>(repr: R): R;
export function cloneRepr(repr: unknown): unknown {
    if (repr instanceof Uint8Array) return repr.slice();
    if (repr instanceof Date) return new Date(repr.getTime());
    if (isCloneable(repr)) return repr.clone();
    return repr;
}
