import { inspect, type InspectOptionsStylized } from 'node:util';
import { DisplayProxy, type DisplayerOf } from './display.js';
import {
    compareRepr,
    equalsRepr,
    hashKeyOf,
    jsonOf,
    type HashableRepr,
    type HashKey,
    type Ordering
} from './repr/structural.js';

/**
 * Runtime companion of a marker, bound once per kind on the prototype.
 */
export interface Descriptor<Marker extends string, W> {
    readonly marker: Marker;
    readonly displayer?: DisplayerOf<W>;
}

/**
 * Shared shape of `Amount`, `Instant` and `Id`: a frozen object whose only
 * own property is the representation. Comparisons take `this`, so only
 * values of the same wrapper class, marker and representation type-check.
 */
export abstract class TaggedValue<Marker extends string, Repr> {
    protected constructor(protected readonly repr: Repr) {
        Object.freeze(this);
    }

    protected abstract describe(): Descriptor<Marker, this>;

    get(): Repr {
        return this.repr;
    }

    equals(rhs: this): boolean {
        return equalsRepr(this.repr, rhs.repr);
    }

    compareTo(rhs: this): Ordering | undefined {
        return compareRepr(this.repr, rhs.repr);
    }

    isLessThan(rhs: this): boolean {
        return this.compareTo(rhs) === -1;
    }

    isLessThanOrEqual(rhs: this): boolean {
        const ordering = this.compareTo(rhs);
        return ordering === -1 || ordering === 0;
    }

    isGreaterThan(rhs: this): boolean {
        return this.compareTo(rhs) === 1;
    }

    isGreaterThanOrEqual(rhs: this): boolean {
        const ordering = this.compareTo(rhs);
        return ordering === 1 || ordering === 0;
    }

    hashKey(this: TaggedValue<Marker, Extract<Repr, HashableRepr>>): HashKey {
        return hashKeyOf(this.repr);
    }

    display(): DisplayProxy<this> {
        return new DisplayProxy(this, this.describe().displayer);
    }

    toString(): string {
        return String(this.repr);
    }

    toJSON(key = ''): unknown {
        return jsonOf(this.repr, key);
    }

    [inspect.custom](_depth: number, options: InspectOptionsStylized): string {
        return inspect(this.repr, options);
    }
}
