import type { z } from 'zod';
import { defineKind, displayerFrom, type Kind, type KindOptions } from './kind.js';
import { difference, product, quotient, sum, type Scalar } from './repr/arithmetic.js';
import { TaggedValue, type Descriptor } from './tagged-value.js';

export type AmountKind<Unit extends string, Repr, I = Repr> = Kind<Amount<Unit, Repr>, Repr, I>;

export type AmountOptions<Unit extends string, Repr> = KindOptions<Amount<Unit, Repr>>;

/**
 * An amount of some `Unit`: counts, durations, balances.
 *
 * ```ts
 * type NumApples = Amount<'Apples', number>;
 * const NumApples = Amount.of('Apples', z.number().int());
 *
 * NumApples.from(3).add(NumApples.from(3)).equals(NumApples.from(6)); // true
 * ```
 *
 * Amounts of different units never mix, even over the same representation.
 * There is no amount × amount (meters × meters are square meters); scale by
 * a bare scalar with `mul`, or take the ratio of two amounts with `div`.
 */
export abstract class Amount<Unit extends string, Repr> extends TaggedValue<Unit, Repr> {
    private declare readonly amountOf: (unit: Unit) => Unit;

    static of<Unit extends string, Repr, I = Repr>(
        unit: Unit,
        repr: z.ZodType<Repr, z.ZodTypeDef, I>,
        options: AmountOptions<Unit, Repr> = {}
    ): AmountKind<Unit, Repr, I> {
        const descriptor: Descriptor<Unit, Amount<Unit, Repr>> = {
            marker: unit,
            displayer: displayerFrom(options.display)
        };

        class UnitAmount extends Amount<Unit, Repr> {
            constructor(value: Repr) {
                super(value);
            }

            protected describe(): Descriptor<Unit, Amount<Unit, Repr>> {
                return descriptor;
            }

            protected wrap(value: Repr): Amount<Unit, Repr> {
                return new UnitAmount(value);
            }
        }

        return defineKind<Amount<Unit, Repr>, Repr, I>('Amount', unit, repr, (value) => new UnitAmount(value), options.logger);
    }

    protected abstract wrap(value: Repr): Amount<Unit, Repr>;

    unit(): Unit {
        return this.describe().marker;
    }

    add(this: Amount<Unit, Extract<Repr, Scalar>>, rhs: Amount<Unit, Extract<Repr, Scalar>>): Amount<Unit, Extract<Repr, Scalar>> {
        return this.wrap(sum(this.repr, rhs.repr));
    }

    sub(this: Amount<Unit, Extract<Repr, Scalar>>, rhs: Amount<Unit, Extract<Repr, Scalar>>): Amount<Unit, Extract<Repr, Scalar>> {
        return this.wrap(difference(this.repr, rhs.repr));
    }

    mul(this: Amount<Unit, Extract<Repr, Scalar>>, factor: Extract<Repr, Scalar>): Amount<Unit, Extract<Repr, Scalar>> {
        return this.wrap(product(this.repr, factor));
    }

    /** Ratio of two amounts: a bare scalar, since the units cancel out. */
    div(this: Amount<Unit, Extract<Repr, Scalar>>, rhs: Amount<Unit, Extract<Repr, Scalar>>): Extract<Repr, Scalar> {
        return quotient(this.repr, rhs.repr);
    }
}
