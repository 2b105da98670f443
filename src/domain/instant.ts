import { z } from 'zod';
import { Amount, type AmountKind } from './amount.js';
import { defineKind, displayerFrom, type Kind, type KindOptions } from './kind.js';
import {
    elapsed,
    isScalar,
    product,
    quotient,
    shift,
    type Elapsed,
    type Scalar,
    type Temporal
} from './repr/arithmetic.js';
import { cloneRepr } from './repr/structural.js';
import { TaggedValue, type Descriptor } from './tagged-value.js';

export type InstantKind<Unit extends string, Repr, I = Repr> = Kind<Instant<Unit, Repr>, Repr, I>;

export interface InstantOptions<Unit extends string, Repr> extends KindOptions<Instant<Unit, Repr>> {
    /**
     * Kind of the amounts produced by `instant.sub(instant)`. Defaults to a
     * plain amount kind of the same unit.
     */
    readonly span?: Pick<AmountKind<Unit, Elapsed<Repr>>, 'from'>;
}

/**
 * A point in time measured in some `Unit`.
 *
 * ```ts
 * type Timestamp = Instant<'SecondsFromEpoch', number>;
 * const Timestamp = Instant.of('SecondsFromEpoch', z.number().int());
 *
 * const epoch = Timestamp.new(0);
 * const date = Timestamp.from(123456789);
 * date.sub(epoch).get(); // 123456789
 * ```
 *
 * Two instants never add up. Their difference is an `Amount` of the same
 * unit, and an instant moved by such an amount is again an instant.
 * `Date` instants measure their spans in milliseconds.
 */
export abstract class Instant<Unit extends string, Repr> extends TaggedValue<Unit, Repr> {
    private declare readonly instantOf: (unit: Unit) => Unit;

    static of<Unit extends string, Repr, I = Repr>(
        unit: Unit,
        repr: z.ZodType<Repr, z.ZodTypeDef, I>,
        options: InstantOptions<Unit, Repr> = {}
    ): InstantKind<Unit, Repr, I> {
        const descriptor: Descriptor<Unit, Instant<Unit, Repr>> = {
            marker: unit,
            displayer: displayerFrom(options.display)
        };
        const span = options.span ?? Amount.of(unit, z.custom<Elapsed<Repr>>(isScalar), { logger: options.logger });

        class UnitInstant extends Instant<Unit, Repr> {
            constructor(value: Repr) {
                super(cloneRepr(value));
            }

            protected describe(): Descriptor<Unit, Instant<Unit, Repr>> {
                return descriptor;
            }

            protected wrap(value: Repr): Instant<Unit, Repr> {
                return new UnitInstant(value);
            }

            protected spanOf(value: Elapsed<Repr>): Amount<Unit, Elapsed<Repr>> {
                return span.from(value);
            }
        }

        return defineKind<Instant<Unit, Repr>, Repr, I>('Instant', unit, repr, (value) => new UnitInstant(value), options.logger);
    }

    protected abstract wrap(value: Repr): Instant<Unit, Repr>;

    protected abstract spanOf(value: Elapsed<Repr>): Amount<Unit, Elapsed<Repr>>;

    /** A copy for mutable representations such as `Date`. */
    get(): Repr {
        return cloneRepr(this.repr);
    }

    unit(): Unit {
        return this.describe().marker;
    }

    add(
        this: Instant<Unit, Extract<Repr, Temporal>>,
        span: Amount<Unit, Elapsed<Extract<Repr, Temporal>>>
    ): Instant<Unit, Extract<Repr, Temporal>> {
        return this.wrap(shift(this.repr, span.get(), 1));
    }

    /** Span between two instants. */
    sub(
        this: Instant<Unit, Extract<Repr, Temporal>>,
        rhs: Instant<Unit, Extract<Repr, Temporal>>
    ): Amount<Unit, Elapsed<Extract<Repr, Temporal>>>;
    /** Instant moved back by a span. */
    sub(
        this: Instant<Unit, Extract<Repr, Temporal>>,
        rhs: Amount<Unit, Elapsed<Extract<Repr, Temporal>>>
    ): Instant<Unit, Extract<Repr, Temporal>>;
    sub(
        this: Instant<Unit, Extract<Repr, Temporal>>,
        rhs: Instant<Unit, Extract<Repr, Temporal>> | Amount<Unit, Elapsed<Extract<Repr, Temporal>>>
    ): Amount<Unit, Elapsed<Extract<Repr, Temporal>>> | Instant<Unit, Extract<Repr, Temporal>> {
        if (rhs instanceof Amount) {
            return this.wrap(shift(this.repr, rhs.get(), -1));
        }
        return this.spanOf(elapsed(this.repr, rhs.repr));
    }

    mul(this: Instant<Unit, Extract<Repr, Scalar>>, factor: Extract<Repr, Scalar>): Instant<Unit, Extract<Repr, Scalar>> {
        return this.wrap(product(this.repr, factor));
    }

    div(this: Instant<Unit, Extract<Repr, Scalar>>, rhs: Instant<Unit, Extract<Repr, Scalar>>): Extract<Repr, Scalar> {
        return quotient(this.repr, rhs.repr);
    }
}
