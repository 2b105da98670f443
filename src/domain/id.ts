import type { z } from 'zod';
import { defineKind, displayerFrom, type Kind, type KindOptions } from './kind.js';
import { cloneRepr } from './repr/structural.js';
import { TaggedValue, type Descriptor } from './tagged-value.js';

export type IdKind<Entity extends string, Repr, I = Repr> = Kind<Id<Entity, Repr>, Repr, I>;

export type IdOptions<Entity extends string, Repr> = KindOptions<Id<Entity, Repr>>;

/**
 * Identifier of some `Entity`. Ids compare, sort and hash like their
 * representation but never compute.
 *
 * ```ts
 * type UserId = Id<'User', number>;
 * const UserId = Id.of('User', z.number().int().nonnegative());
 * ```
 */
export abstract class Id<Entity extends string, Repr> extends TaggedValue<Entity, Repr> {
    private declare readonly idOf: (entity: Entity) => Entity;

    static of<Entity extends string, Repr, I = Repr>(
        entity: Entity,
        repr: z.ZodType<Repr, z.ZodTypeDef, I>,
        options: IdOptions<Entity, Repr> = {}
    ): IdKind<Entity, Repr, I> {
        const descriptor: Descriptor<Entity, Id<Entity, Repr>> = {
            marker: entity,
            displayer: displayerFrom(options.display)
        };

        class EntityId extends Id<Entity, Repr> {
            constructor(value: Repr) {
                super(value);
            }

            protected describe(): Descriptor<Entity, Id<Entity, Repr>> {
                return descriptor;
            }

            protected wrap(value: Repr): Id<Entity, Repr> {
                return new EntityId(value);
            }
        }

        return defineKind<Id<Entity, Repr>, Repr, I>('Id', entity, repr, (value) => new EntityId(value), options.logger);
    }

    protected abstract wrap(value: Repr): Id<Entity, Repr>;

    clone(): Id<Entity, Repr> {
        return this.wrap(cloneRepr(this.repr));
    }
}
