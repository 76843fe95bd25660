/**
 * Relations between dimensions and the dimension-changing operators.
 *
 * An algebra is built by piping declarations onto {@link make}:
 *
 * ```ts
 * const algebra = pipe(
 *   Algebra.make(),
 *   Algebra.product(Power, Time, Energy),
 *   Algebra.inverse(Time, Frequency)
 * )
 * ```
 *
 * Each declaration is recorded twice: in the algebra's type, where the
 * compiler resolves `multiply` and `divide` and rejects conflicting or
 * missing relations, and in runtime tables used when the operand types were
 * widened.
 *
 * @since 0.1.0
 */

import { Data, Equal, HashMap, Inspectable, Option, Predicate } from "effect"
import * as Dimension from "./Dimension.js"
import { MissingRelationError, RelationConflictError } from "./Errors.js"
import * as Quantity from "./Quantity.js"
import * as Representation from "./Representation.js"
import * as Scale from "./Scale.js"
import * as Unit from "./Unit.js"

/**
 * @category Symbols
 * @since 0.1.0
 */
export const TypeId: unique symbol = Symbol.for("quantity-algebra/Algebra")

/**
 * @category Symbols
 * @since 0.1.0
 */
export type TypeId = typeof TypeId

/**
 * One declared product `left × right = result`. It implies the commuted
 * product and both quotients.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Relation<A extends Dimension.Any, B extends Dimension.Any, C extends Dimension.Any> {
  readonly left: A
  readonly right: B
  readonly result: C
}

/**
 * @category Models
 * @since 0.1.0
 */
export type AnyRelation = Relation<Dimension.Any, Dimension.Any, Dimension.Any>

type Widened<A extends Dimension.Any> = string extends A["name"] ? true : false

type IsDimensionless<A extends Dimension.Any> = A["name"] extends Dimension.Dimensionless["name"] ? true : false

type Identity<A extends Dimension.Any> = readonly [A["name"], A["duration"]]

type Same<A extends Dimension.Any, B extends Dimension.Any> = [Identity<A>] extends [Identity<B>]
  ? [Identity<B>] extends [Identity<A>] ? true : false
  : false

/**
 * Dimension of `A × B` under the relations `Rels`, `never` when undeclared.
 *
 * @category Type-level
 * @since 0.1.0
 */
export type ProductOf<Rels extends AnyRelation, A extends Dimension.Any, B extends Dimension.Any> = true extends
  Widened<A> | Widened<B> ? Dimension.Any
  : IsDimensionless<A> extends true ? B
  : IsDimensionless<B> extends true ? A
  : Rels extends Relation<infer X extends Dimension.Any, infer Y extends Dimension.Any, infer Z extends Dimension.Any>
    ? Same<A, X> extends true ? Same<B, Y> extends true ? Z : never
    : Same<A, Y> extends true ? Same<B, X> extends true ? Z : never
    : never
  : never

/**
 * Dimension of `A / B` under the relations `Rels`, `never` when undeclared.
 *
 * @category Type-level
 * @since 0.1.0
 */
export type QuotientOf<Rels extends AnyRelation, A extends Dimension.Any, B extends Dimension.Any> = true extends
  Widened<A> | Widened<B> ? Dimension.Any
  : IsDimensionless<B> extends true ? A
  : Same<A, B> extends true ? Dimension.Dimensionless
  : Rels extends Relation<infer X extends Dimension.Any, infer Y extends Dimension.Any, infer Z extends Dimension.Any>
    ? Same<A, Z> extends true ? Same<B, X> extends true ? Y
      : Same<B, Y> extends true ? X
      : never
    : never
  : never

/**
 * Every dimension `A` may be multiplied by.
 *
 * @category Type-level
 * @since 0.1.0
 */
export type MultiplierOf<Rels extends AnyRelation, A extends Dimension.Any> = Widened<A> extends true ? Dimension.Any
  : IsDimensionless<A> extends true ? Dimension.Any
  :
    | Dimension.Dimensionless
    | (Rels extends Relation<infer X extends Dimension.Any, infer Y extends Dimension.Any, Dimension.Any>
      ? (Same<A, X> extends true ? Y : never) | (Same<A, Y> extends true ? X : never)
      : never)

/**
 * Every dimension `A` may be divided by.
 *
 * @category Type-level
 * @since 0.1.0
 */
export type DivisorOf<Rels extends AnyRelation, A extends Dimension.Any> = Widened<A> extends true ? Dimension.Any
  :
    | Dimension.Dimensionless
    | A
    | (Rels extends Relation<infer X extends Dimension.Any, infer Y extends Dimension.Any, infer Z extends Dimension.Any>
      ? Same<A, Z> extends true ? X | Y : never
      : never)

/**
 * What multiplying or dividing yields: a quantity of `C`, or a plain count
 * when `C` is dimensionless.
 *
 * @category Type-level
 * @since 0.1.0
 */
export type Outcome<C extends Dimension.Any, R extends Representation.Name> = C extends Dimension.Any
  ? Widened<C> extends true ? Quantity.Quantity<Dimension.Any, R> | Representation.Count<R>
  : IsDimensionless<C> extends true ? Representation.Count<R>
  : Quantity.Quantity<C, R>
  : never

type Clash<Existing extends Dimension.Any, Proposed extends Dimension.Any> = [Existing] extends [never] ? never
  : Same<Existing, Proposed> extends true ? never
  : Existing

/**
 * Results a new relation `A × B = C` would contradict.
 *
 * @category Type-level
 * @since 0.1.0
 */
export type Conflicts<Rels extends AnyRelation, A extends Dimension.Any, B extends Dimension.Any, C extends Dimension.Any> =
  | Clash<ProductOf<Rels, A, B>, C>
  | Clash<QuotientOf<Rels, C, A>, B>
  | Clash<QuotientOf<Rels, C, B>, A>

type NoConflict<Rels extends AnyRelation, A extends Dimension.Any, B extends Dimension.Any, C extends Dimension.Any> =
  [Conflicts<Rels, A, B, C>] extends [never] ? unknown
    : { readonly "relation already yields": Conflicts<Rels, A, B, C> }

/**
 * @category Models
 * @since 0.1.0
 */
export type Key = readonly [Dimension.Any, Dimension.Any]

/**
 * Runtime relation tables, keyed by ordered dimension pairs.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Tables {
  readonly products: HashMap.HashMap<Key, Dimension.Any>
  readonly quotients: HashMap.HashMap<Key, Dimension.Any>
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface Algebra<Rels extends AnyRelation = never> extends Tables, Inspectable.Inspectable {
  readonly [TypeId]: TypeId
  readonly relations: ReadonlyArray<AnyRelation>

  /**
   * Product of two quantities: the result dimension comes from the declared
   * relations, the representation is promoted and the scales multiply.
   */
  multiply<
    DA extends Dimension.Any,
    RA extends Representation.Name,
    DB extends MultiplierOf<Rels, DA>,
    RB extends Representation.Name,
  >(
    self: Quantity.Quantity<DA, RA>,
    that: Quantity.Quantity<DB, RB>,
  ): Outcome<ProductOf<Rels, DA, DB>, Representation.Common<RA, RB>>

  /**
   * Quotient of two quantities; integral representations divide toward zero.
   */
  divide<
    DA extends Dimension.Any,
    RA extends Representation.Name,
    DB extends DivisorOf<Rels, DA>,
    RB extends Representation.Name,
  >(
    self: Quantity.Quantity<DA, RA>,
    that: Quantity.Quantity<DB, RB>,
  ): Outcome<QuotientOf<Rels, DA, DB>, Representation.Common<RA, RB>>
}

const key = (left: Dimension.Any, right: Dimension.Any): Key => Data.tuple(left, right)

const describe = (left: Dimension.Any, operator: string, right: Dimension.Any): string =>
  `${left.name} ${operator} ${right.name}`

class AlgebraImpl<Rels extends AnyRelation> implements Algebra<Rels> {
  readonly [TypeId]: TypeId = TypeId

  constructor(
    readonly relations: ReadonlyArray<AnyRelation>,
    readonly products: HashMap.HashMap<Key, Dimension.Any>,
    readonly quotients: HashMap.HashMap<Key, Dimension.Any>,
  ) {}

  multiply<
    DA extends Dimension.Any,
    RA extends Representation.Name,
    DB extends MultiplierOf<Rels, DA>,
    RB extends Representation.Name,
  >(
    self: Quantity.Quantity<DA, RA>,
    that: Quantity.Quantity<DB, RB>,
  ): Outcome<ProductOf<Rels, DA, DB>, Representation.Common<RA, RB>>
  multiply(self: Quantity.Any, that: Quantity.Any): unknown {
    const dimension = productOf(this, self.unit.dimension, that.unit.dimension)
    if (Option.isNone(dimension)) {
      throw new MissingRelationError({
        operation: "multiply",
        left: self.unit.dimension.name,
        right: that.unit.dimension.name,
      })
    }
    const representation = Representation.common(self.unit.representation, that.unit.representation)
    const scale = Scale.multiply(self.unit.scale, that.unit.scale)
    const count = representation.multiply(representation.cast(self.count), representation.cast(that.count))
    if (Dimension.isDimensionless(dimension.value)) {
      return representation.rescale(count, scale.num, scale.den)
    }
    return Quantity.make(Unit.make(dimension.value, representation, scale), count)
  }

  divide<
    DA extends Dimension.Any,
    RA extends Representation.Name,
    DB extends DivisorOf<Rels, DA>,
    RB extends Representation.Name,
  >(
    self: Quantity.Quantity<DA, RA>,
    that: Quantity.Quantity<DB, RB>,
  ): Outcome<QuotientOf<Rels, DA, DB>, Representation.Common<RA, RB>>
  divide(self: Quantity.Any, that: Quantity.Any): unknown {
    const dimension = quotientOf(this, self.unit.dimension, that.unit.dimension)
    if (Option.isNone(dimension)) {
      throw new MissingRelationError({
        operation: "divide",
        left: self.unit.dimension.name,
        right: that.unit.dimension.name,
      })
    }
    const representation = Representation.common(self.unit.representation, that.unit.representation)
    const scale = Scale.divide(self.unit.scale, that.unit.scale)
    const dividend = representation.cast(self.count)
    const divisor = representation.cast(that.count)
    if (Dimension.isDimensionless(dimension.value)) {
      return representation.scaledQuotient(dividend, divisor, scale.num, scale.den)
    }
    return Quantity.make(
      Unit.make(dimension.value, representation, scale),
      representation.divide(dividend, divisor),
    )
  }

  toJSON() {
    return {
      _id: "Algebra",
      relations: this.relations.map((relation) =>
        `${describe(relation.left, "*", relation.right)} = ${relation.result.name}`
      ),
    }
  }

  toString() {
    return Inspectable.format(this.toJSON())
  }

  [Inspectable.NodeInspectSymbol]() {
    return this.toJSON()
  }
}

/**
 * @category Guards
 * @since 0.1.0
 */
export const isAlgebra = (u: unknown): u is Algebra<AnyRelation> => Predicate.hasProperty(u, TypeId)

/**
 * An algebra holding only the built-in dimensionless relations.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const make = (): Algebra => new AlgebraImpl<never>([], HashMap.empty<Key, Dimension.Any>(), HashMap.empty<Key, Dimension.Any>())

/**
 * Dimension of `left × right`, including the dimensionless built-ins.
 *
 * @category Lookups
 * @since 0.1.0
 */
export const productOf = (
  self: Tables,
  left: Dimension.Any,
  right: Dimension.Any,
): Option.Option<Dimension.Any> => {
  if (Dimension.isDimensionless(left)) {
    return Option.some(right)
  }
  if (Dimension.isDimensionless(right)) {
    return Option.some(left)
  }
  return HashMap.get(self.products, key(left, right))
}

/**
 * Dimension of `left / right`, including the dimensionless built-ins.
 *
 * @category Lookups
 * @since 0.1.0
 */
export const quotientOf = (
  self: Tables,
  left: Dimension.Any,
  right: Dimension.Any,
): Option.Option<Dimension.Any> => {
  if (Dimension.isDimensionless(right)) {
    return Option.some(left)
  }
  if (Equal.equals(left, right)) {
    return Option.some(Dimension.dimensionless)
  }
  return HashMap.get(self.quotients, key(left, right))
}

const ensure = (existing: Option.Option<Dimension.Any>, proposed: Dimension.Any, relation: string): void => {
  if (Option.isSome(existing) && !Equal.equals(existing.value, proposed)) {
    throw new RelationConflictError({ relation, existing: existing.value.name, proposed: proposed.name })
  }
}

/**
 * Declare `left × right = result`, which also gives `right × left`,
 * `result / left` and `result / right`. Re-declaring a relation is a no-op;
 * contradicting one does not type-check and throws `RelationConflictError`.
 *
 * @category Declarations
 * @since 0.1.0
 */
export const product = <A extends Dimension.Any, B extends Dimension.Any, C extends Dimension.Any>(
  left: A,
  right: B,
  result: C,
) =>
<Rels extends AnyRelation>(self: Algebra<Rels> & NoConflict<Rels, A, B, C>): Algebra<Rels | Relation<A, B, C>> => {
  ensure(productOf(self, left, right), result, describe(left, "*", right))
  ensure(quotientOf(self, result, left), right, describe(result, "/", left))
  ensure(quotientOf(self, result, right), left, describe(result, "/", right))
  return new AlgebraImpl<Rels | Relation<A, B, C>>(
    [...self.relations, { left, right, result }],
    HashMap.set(HashMap.set(self.products, key(left, right), result), key(right, left), result),
    HashMap.set(HashMap.set(self.quotients, key(result, left), right), key(result, right), left),
  )
}

/**
 * Declare `dividend / divisor = result`, i.e. `result × divisor = dividend`.
 *
 * @category Declarations
 * @since 0.1.0
 */
export const quotient = <A extends Dimension.Any, B extends Dimension.Any, C extends Dimension.Any>(
  dividend: A,
  divisor: B,
  result: C,
) =>
<Rels extends AnyRelation>(self: Algebra<Rels> & NoConflict<Rels, C, B, A>): Algebra<Rels | Relation<C, B, A>> =>
  product(result, divisor, dividend)(self)

/**
 * Declare two dimensions inverse to each other: `left × right` is
 * dimensionless, so dividing a dimensionless quantity by one yields the
 * other.
 *
 * @category Declarations
 * @since 0.1.0
 */
export const inverse = <A extends Dimension.Any, B extends Dimension.Any>(left: A, right: B) =>
<Rels extends AnyRelation>(
  self: Algebra<Rels> & NoConflict<Rels, A, B, Dimension.Dimensionless>,
): Algebra<Rels | Relation<A, B, Dimension.Dimensionless>> => product(left, right, Dimension.dimensionless)(self)
