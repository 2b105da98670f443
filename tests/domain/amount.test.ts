import { describe, it, expect, expectTypeOf } from 'vitest';
import { inspect } from 'node:util';
import { z } from 'zod';
import { Amount } from '@domain/amount.js';
import type { Instant } from '@domain/instant.js';

type NumApples = Amount<'Apples', number>;
const NumApples = Amount.of('Apples', z.number().int());

type NumOranges = Amount<'Oranges', number>;
const NumOranges = Amount.of('Oranges', z.number().int());

const Ratio = Amount.of('Ratio', z.number());
const Cents = Amount.of('Cents', z.bigint());

describe('Amount', () => {
    describe('construction', () => {
        it('should hold the representation as its only own property', () => {
            const apples = NumApples.from(3);

            expect(Object.keys(apples)).toEqual(['repr']);
            expect(Object.isFrozen(apples)).toBe(true);
            expect(apples.get()).toBe(3);
        });

        it('should build the same value with new and from', () => {
            expect(NumApples.new(4).equals(NumApples.from(4))).toBe(true);
        });

        it('should report the unit it was defined with', () => {
            expect(NumApples.from(1).unit()).toBe('Apples');
            expect(NumOranges.from(1).unit()).toBe('Oranges');
        });
    });

    describe('arithmetic', () => {
        it('should add apples to apples', () => {
            const total = NumApples.from(3).add(NumApples.from(3));

            expect(total.equals(NumApples.from(6))).toBe(true);
        });

        it('should subtract down to zero', () => {
            const q = NumApples.from(9);

            expect(q.sub(q).get()).toBe(0);
        });

        it('should agree that q + q equals q * 2', () => {
            const q = NumApples.from(21);

            expect(q.add(q).equals(q.mul(2))).toBe(true);
        });

        it('should divide two amounts into a bare ratio', () => {
            const q = NumApples.from(7);

            expect(q.mul(3).div(q)).toBe(3);
        });

        it('should compute with bigint representations', () => {
            const price = Cents.from(250n);

            expect(price.add(Cents.from(50n)).get()).toBe(300n);
            expect(price.mul(4n).get()).toBe(1000n);
            expect(Cents.from(7n).div(Cents.from(2n))).toBe(3n);
        });

        it('should surface bigint division by zero unchanged', () => {
            expect(() => Cents.from(1n).div(Cents.from(0n))).toThrow(RangeError);
        });

        it('should leave both operands untouched', () => {
            const lhs = NumApples.from(2);
            const rhs = NumApples.from(5);

            lhs.add(rhs);

            expect(lhs.get()).toBe(2);
            expect(rhs.get()).toBe(5);
        });
    });

    describe('comparison', () => {
        it('should order like the representation', () => {
            const small = NumApples.from(1);
            const large = NumApples.from(2);

            expect(small.compareTo(large)).toBe(-1);
            expect(large.compareTo(small)).toBe(1);
            expect(small.compareTo(NumApples.from(1))).toBe(0);
            expect(small.isLessThan(large)).toBe(true);
            expect(small.isLessThanOrEqual(small)).toBe(true);
            expect(large.isGreaterThan(small)).toBe(true);
            expect(large.isGreaterThanOrEqual(large)).toBe(true);
            expect(large.isLessThan(small)).toBe(false);
        });

        it('should treat NaN as unordered', () => {
            const nan = Ratio.from(Number.NaN);
            const one = Ratio.from(1);

            expect(nan.compareTo(one)).toBeUndefined();
            expect(nan.equals(nan)).toBe(false);
            expect(nan.isLessThan(one)).toBe(false);
            expect(nan.isGreaterThanOrEqual(one)).toBe(false);
            expect(Ratio.compare(nan, one)).toBe(0);
        });

        it('should sort with the kind comparator', () => {
            const sorted = [5, 1, 3].map(n => NumApples.from(n)).sort(NumApples.compare);

            expect(sorted.map(a => a.get())).toEqual([1, 3, 5]);
        });

        it('should hash equal amounts to the same key', () => {
            const counts = new Map<unknown, string>();
            counts.set(NumApples.from(3).hashKey(), 'three');

            expect(counts.get(NumApples.from(3).hashKey())).toBe('three');
            expect(Cents.from(3n).hashKey()).toBe(3n);
        });
    });

    describe('formatting', () => {
        it('should format like the representation', () => {
            const apples = NumApples.from(3);

            expect(String(apples)).toBe('3');
            expect(`${apples.display()}`).toBe('3');
            expect(inspect(apples)).toBe('3');
            expect(inspect({ apples })).toBe('{ apples: 3 }');
        });

        it('should serialize exactly like the representation', () => {
            expect(JSON.stringify(NumApples.from(3))).toBe(JSON.stringify(3));
            expect(JSON.stringify({ basket: [NumApples.from(1), NumApples.from(2)] })).toBe('{"basket":[1,2]}');
        });
    });

    describe('types', () => {
        it('should keep markers apart', () => {
            expectTypeOf<NumOranges>().not.toMatchTypeOf<NumApples>();
            expectTypeOf<NumApples>().not.toMatchTypeOf<NumOranges>();
            expectTypeOf<Amount<'Apples', bigint>>().not.toMatchTypeOf<NumApples>();
        });

        it('should keep wrapper kinds apart', () => {
            expectTypeOf<Instant<'Apples', number>>().not.toMatchTypeOf<NumApples>();
            expectTypeOf<NumApples>().not.toMatchTypeOf<Instant<'Apples', number>>();
        });

        it('should reject unsupported arithmetic', () => {
            const apples = NumApples.from(1);
            const oranges = NumOranges.from(1);
            const label = Amount.of('Label', z.string()).from('x');
            const rejected = () => {
                // @ts-expect-error apples and oranges do not add up
                apples.add(oranges);
                // @ts-expect-error there is no amount times amount
                apples.mul(apples);
                // @ts-expect-error number and bigint amounts do not mix
                apples.mul(2n);
                // @ts-expect-error string amounts do not compute
                label.add(label);
                // @ts-expect-error amounts of different units do not compare
                apples.equals(oranges);
            };

            expect(rejected).toBeTypeOf('function');
        });

        it('should stay in the same kind through arithmetic', () => {
            const q = NumApples.from(1);

            expectTypeOf(q.add(q)).toEqualTypeOf<NumApples>();
            expectTypeOf(q.mul(2)).toEqualTypeOf<NumApples>();
            expectTypeOf(q.div(q)).toEqualTypeOf<number>();
            expectTypeOf(q.unit()).toEqualTypeOf<'Apples'>();
        });
    });
});
