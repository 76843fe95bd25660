/**
 * Quantities: one stored count of a unit.
 *
 * The count always means `count × scale` base units of the unit's dimension.
 * Every operation between quantities of the same dimension but different
 * units goes through {@link unitCast} into a jointly resolved unit; nothing is
 * silently reinterpreted. Quantities are immutable, so the compound assignment
 * operators return a new quantity of exactly the same unit.
 *
 * @since 0.1.0
 */

import { Either, Equal, Hash, Inspectable, Predicate } from "effect"
import { dual } from "effect/Function"
import * as Dimension from "./Dimension.js"
import { DimensionMismatchError, NarrowingConversionError, UnitMismatchError } from "./Errors.js"
import * as Representation from "./Representation.js"
import * as Scale from "./Scale.js"
import * as Unit from "./Unit.js"

/**
 * @category Symbols
 * @since 0.1.0
 */
export const TypeId: unique symbol = Symbol.for("quantity-algebra/Quantity")

/**
 * @category Symbols
 * @since 0.1.0
 */
export type TypeId = typeof TypeId

/**
 * @category Models
 * @since 0.1.0
 */
export interface Quantity<
  D extends Dimension.Any = Dimension.Any,
  R extends Representation.Name = Representation.Name,
> extends Equal.Equal, Inspectable.Inspectable {
  readonly [TypeId]: TypeId
  readonly unit: Unit.Unit<D, R>
  readonly count: Representation.Count<R>
}

/**
 * @category Models
 * @since 0.1.0
 */
export type Any = Quantity<Dimension.Any, Representation.Name>

class QuantityImpl<D extends Dimension.Any, R extends Representation.Name> implements Quantity<D, R> {
  readonly [TypeId]: TypeId = TypeId

  constructor(
    readonly unit: Unit.Unit<D, R>,
    readonly count: Representation.Count<R>,
  ) {}

  [Equal.symbol](that: unknown): boolean {
    return isQuantity(that) && Equal.equals(this.unit.dimension, that.unit.dimension) && equivalent(this, that)
  }

  [Hash.symbol](): number {
    return Hash.hash(this.unit.dimension)
  }

  toJSON() {
    return { _id: "Quantity", unit: this.unit.toJSON(), count: `${this.count}` }
  }

  toString() {
    return `Quantity(${this.count} ${Unit.describe(this.unit)})`
  }

  [Inspectable.NodeInspectSymbol]() {
    return this.toJSON()
  }
}

const unsafeMake = <D extends Dimension.Any, R extends Representation.Name>(
  unit: Unit.Unit<D, R>,
  count: Representation.Count<R>,
): Quantity<D, R> => new QuantityImpl(unit, count)

const narrowing = (from: string, to: Unit.Any): NarrowingConversionError =>
  new NarrowingConversionError({ source: from, target: Unit.describe(to) })

/**
 * @category Guards
 * @since 0.1.0
 */
export const isQuantity = (u: unknown): u is Any => Predicate.hasProperty(u, TypeId)

/**
 * Construct a quantity from a raw count in the unit's own scale. Integral
 * units only accept a `bigint`: a `number` may carry a fraction.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const kettle = Quantity.make(kilowatt, 2n)
 * ```
 */
export const make = <D extends Dimension.Any, R extends Representation.Name>(
  unit: Unit.Unit<D, R>,
  raw: Representation.RawSource<R>,
): Quantity<D, R> => {
  if (!unit.representation.floating && typeof raw === "number") {
    throw narrowing("number", unit)
  }
  return unsafeMake(unit, unit.representation.cast(raw))
}

/**
 * Curried {@link make}, handy for naming a unit's constructor once.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const factory = <D extends Dimension.Any, R extends Representation.Name>(unit: Unit.Unit<D, R>) =>
(raw: Representation.RawSource<R>): Quantity<D, R> => make(unit, raw)

/** @category Constructors */
export const zero = <D extends Dimension.Any, R extends Representation.Name>(unit: Unit.Unit<D, R>): Quantity<D, R> =>
  unsafeMake(unit, unit.representation.zero)

/**
 * The lowest finite count of the representation.
 *
 * @category Constructors
 */
export const min = <D extends Dimension.Any, R extends Representation.Name>(unit: Unit.Unit<D, R>): Quantity<D, R> =>
  unsafeMake(unit, unit.representation.lowest)

/** @category Constructors */
export const max = <D extends Dimension.Any, R extends Representation.Name>(unit: Unit.Unit<D, R>): Quantity<D, R> =>
  unsafeMake(unit, unit.representation.highest)

const unity = (scale: Scale.Scale): Quantity<Dimension.Dimensionless, "int64"> =>
  unsafeMake(Unit.make(Dimension.dimensionless, Representation.int64, scale), scale.den / scale.num)

/**
 * Dimensionless one at nano scale; dividing it by a frequency yields a period
 * counted in nanoseconds.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const asNano: Quantity<Dimension.Dimensionless, "int64"> = unity(Scale.nano)

/** @category Constructors */
export const asMicro: Quantity<Dimension.Dimensionless, "int64"> = unity(Scale.micro)

/** @category Constructors */
export const asMilli: Quantity<Dimension.Dimensionless, "int64"> = unity(Scale.milli)

/**
 * The conversion primitive. Expresses `self` in `unit`: the count is widened
 * to the representation both units promote to, multiplied by the numerator
 * of `self.scale / unit.scale`, divided by its denominator and narrowed to
 * the target representation. Integral targets truncate toward zero; use
 * {@link convert} when truncation must be impossible.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const unitCast: {
  <D extends Dimension.Any, R extends Representation.Name>(
    unit: Unit.Unit<D, R>,
  ): <S extends Representation.Name>(self: Quantity<D, S>) => Quantity<D, R>
  <D extends Dimension.Any, S extends Representation.Name, R extends Representation.Name>(
    self: Quantity<D, S>,
    unit: Unit.Unit<D, R>,
  ): Quantity<D, R>
} = dual(
  2,
  <D extends Dimension.Any, S extends Representation.Name, R extends Representation.Name>(
    self: Quantity<D, S>,
    unit: Unit.Unit<D, R>,
  ): Quantity<D, R> => {
    if (!Equal.equals(self.unit.dimension, unit.dimension)) {
      throw new DimensionMismatchError({ expected: unit.dimension.name, actual: self.unit.dimension.name })
    }
    const ratio = Scale.divide(self.unit.scale, unit.scale)
    const common = Representation.common(unit.representation, self.unit.representation)
    const scaled = common.rescale(common.cast(self.count), ratio.num, ratio.den)
    return unsafeMake(unit, unit.representation.cast(scaled))
  },
)

/**
 * Implicit-style conversion into another unit of the same dimension. Allowed
 * when the target is floating, or when the source is integral and the scale
 * ratio is whole. The representation half is checked by the compiler; a
 * fractional scale ratio into an integral target throws
 * `NarrowingConversionError`.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const convert: {
  <D extends Dimension.Any, R extends Representation.Name>(
    unit: Unit.Unit<D, R>,
  ): <S extends Representation.AllowedSource<R>>(self: Quantity<D, S>) => Quantity<D, R>
  <D extends Dimension.Any, R extends Representation.Name, S extends Representation.AllowedSource<R>>(
    self: Quantity<D, S>,
    unit: Unit.Unit<D, R>,
  ): Quantity<D, R>
} = dual(2, (self: Any, unit: Unit.Any): Any => {
  if (Unit.isNarrowing(self.unit, unit)) {
    throw narrowing(Unit.describe(self.unit), unit)
  }
  return unitCast(self, unit)
})

/**
 * {@link convert} returning the narrowing failure as a value.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const convertEither = <
  D extends Dimension.Any,
  R extends Representation.Name,
  S extends Representation.AllowedSource<R>,
>(
  self: Quantity<D, S>,
  unit: Unit.Unit<D, R>,
): Either.Either<Quantity<D, R>, NarrowingConversionError> =>
  Unit.isNarrowing(self.unit, unit)
    ? Either.left(narrowing(Unit.describe(self.unit), unit))
    : Either.right(unitCast(self, unit))

/**
 * The raw stored count, in the quantity's own scale.
 *
 * @category Getters
 * @since 0.1.0
 */
export const count = <R extends Representation.Name>(self: Quantity<Dimension.Any, R>): Representation.Count<R> =>
  self.count

/**
 * The magnitude in whole units of the dimension (scale one), in the given
 * representation.
 *
 * @category Getters
 * @since 0.1.0
 */
export const valueAs = <D extends Dimension.Any, S extends Representation.Name, R extends Representation.Name>(
  self: Quantity<D, S>,
  representation: Representation.Representation<R>,
): Representation.Count<R> => unitCast(self, Unit.make(self.unit.dimension, representation)).count

/**
 * The magnitude in whole units of the dimension, as a `float64`.
 *
 * @category Getters
 * @since 0.1.0
 */
export const value = (self: Any): number => valueAs(self, Representation.float64)

/** @category Unary */
export const positive = <D extends Dimension.Any, R extends Representation.Name>(self: Quantity<D, R>): Quantity<D, R> =>
  unsafeMake(self.unit, self.count)

/** @category Unary */
export const negate = <D extends Dimension.Any, R extends Representation.Name>(self: Quantity<D, R>): Quantity<D, R> =>
  unsafeMake(self.unit, self.unit.representation.negate(self.count))

const assertSameUnit = (self: Any, that: Any): void => {
  if (!Unit.equals(self.unit, that.unit)) {
    throw new UnitMismatchError({ expected: Unit.describe(self.unit), actual: Unit.describe(that.unit) })
  }
}

/**
 * `self += that`. Both operands must be the very same unit; nothing is
 * widened.
 *
 * @category Compound assignment
 * @since 0.1.0
 */
export const addAssign: {
  <D extends Dimension.Any, R extends Representation.Name>(
    that: Quantity<D, R>,
  ): (self: Quantity<D, R>) => Quantity<D, R>
  <D extends Dimension.Any, R extends Representation.Name>(self: Quantity<D, R>, that: Quantity<D, NoInfer<R>>): Quantity<D, R>
} = dual(
  2,
  <D extends Dimension.Any, R extends Representation.Name>(self: Quantity<D, R>, that: Quantity<D, R>): Quantity<D, R> => {
    assertSameUnit(self, that)
    return unsafeMake(self.unit, self.unit.representation.add(self.count, that.count))
  },
)

/** @category Compound assignment */
export const subtractAssign: {
  <D extends Dimension.Any, R extends Representation.Name>(
    that: Quantity<D, R>,
  ): (self: Quantity<D, R>) => Quantity<D, R>
  <D extends Dimension.Any, R extends Representation.Name>(self: Quantity<D, R>, that: Quantity<D, NoInfer<R>>): Quantity<D, R>
} = dual(
  2,
  <D extends Dimension.Any, R extends Representation.Name>(self: Quantity<D, R>, that: Quantity<D, R>): Quantity<D, R> => {
    assertSameUnit(self, that)
    return unsafeMake(self.unit, self.unit.representation.subtract(self.count, that.count))
  },
)

/**
 * `self *= scalar`, with the scalar already in the quantity's representation.
 *
 * @category Compound assignment
 */
export const multiplyAssign = <D extends Dimension.Any, R extends Representation.Name>(
  self: Quantity<D, R>,
  scalar: Representation.Count<R>,
): Quantity<D, R> => unsafeMake(self.unit, self.unit.representation.multiply(self.count, scalar))

/** @category Compound assignment */
export const divideAssign = <D extends Dimension.Any, R extends Representation.Name>(
  self: Quantity<D, R>,
  scalar: Representation.Count<R>,
): Quantity<D, R> => unsafeMake(self.unit, self.unit.representation.divide(self.count, scalar))

const isOperand = <D extends Dimension.Any, R extends Representation.Name>(
  u: Quantity<D, R> | Representation.Count<R>,
): u is Quantity<D, R> => isQuantity(u)

/**
 * `self %= that` for a quantity of the same unit or a scalar of the same
 * representation.
 *
 * @category Compound assignment
 */
export const remainderAssign = <D extends Dimension.Any, R extends Representation.Name>(
  self: Quantity<D, R>,
  that: Quantity<D, NoInfer<R>> | Representation.Count<R>,
): Quantity<D, R> => {
  if (isOperand<D, R>(that)) {
    assertSameUnit(self, that)
    return unsafeMake(self.unit, self.unit.representation.remainder(self.count, that.count))
  }
  return unsafeMake(self.unit, self.unit.representation.remainder(self.count, that))
}

const combine = <D extends Dimension.Any, A extends Representation.Name, B extends Representation.Name, Z>(
  self: Quantity<D, A>,
  that: Quantity<D, B>,
  f: (
    unit: Unit.Unit<D, Representation.Common<A, B>>,
    self: Representation.Count<Representation.Common<A, B>>,
    that: Representation.Count<Representation.Common<A, B>>,
  ) => Z,
): Z => {
  const unit = Unit.common(self.unit, that.unit)
  return f(unit, unitCast(self, unit).count, unitCast(that, unit).count)
}

/**
 * Sum of two quantities of the same dimension, in their common unit.
 *
 * @category Arithmetic
 * @since 0.1.0
 * @example
 * ```ts
 * Quantity.sum(Quantity.make(watt, 500n), Quantity.make(kilowatt, 2n)) // 2500 W
 * ```
 */
export const sum: {
  <D extends Dimension.Any, B extends Representation.Name>(
    that: Quantity<D, B>,
  ): <A extends Representation.Name>(self: Quantity<D, A>) => Quantity<D, Representation.Common<A, B>>
  <D extends Dimension.Any, A extends Representation.Name, B extends Representation.Name>(
    self: Quantity<D, A>,
    that: Quantity<D, B>,
  ): Quantity<D, Representation.Common<A, B>>
} = dual(
  2,
  <D extends Dimension.Any, A extends Representation.Name, B extends Representation.Name>(
    self: Quantity<D, A>,
    that: Quantity<D, B>,
  ): Quantity<D, Representation.Common<A, B>> =>
    combine(self, that, (unit, x, y) => unsafeMake(unit, unit.representation.add(x, y))),
)

/** @category Arithmetic */
export const subtract: {
  <D extends Dimension.Any, B extends Representation.Name>(
    that: Quantity<D, B>,
  ): <A extends Representation.Name>(self: Quantity<D, A>) => Quantity<D, Representation.Common<A, B>>
  <D extends Dimension.Any, A extends Representation.Name, B extends Representation.Name>(
    self: Quantity<D, A>,
    that: Quantity<D, B>,
  ): Quantity<D, Representation.Common<A, B>>
} = dual(
  2,
  <D extends Dimension.Any, A extends Representation.Name, B extends Representation.Name>(
    self: Quantity<D, A>,
    that: Quantity<D, B>,
  ): Quantity<D, Representation.Common<A, B>> =>
    combine(self, that, (unit, x, y) => unsafeMake(unit, unit.representation.subtract(x, y))),
)

/** @category Arithmetic */
export const remainder: {
  <D extends Dimension.Any, B extends Representation.Name>(
    that: Quantity<D, B>,
  ): <A extends Representation.Name>(self: Quantity<D, A>) => Quantity<D, Representation.Common<A, B>>
  <D extends Dimension.Any, A extends Representation.Name, B extends Representation.Name>(
    self: Quantity<D, A>,
    that: Quantity<D, B>,
  ): Quantity<D, Representation.Common<A, B>>
} = dual(
  2,
  <D extends Dimension.Any, A extends Representation.Name, B extends Representation.Name>(
    self: Quantity<D, A>,
    that: Quantity<D, B>,
  ): Quantity<D, Representation.Common<A, B>> =>
    combine(self, that, (unit, x, y) => unsafeMake(unit, unit.representation.remainder(x, y))),
)

const withScalar = <D extends Dimension.Any, R extends Representation.Name, S extends Representation.Name>(
  self: Quantity<D, R>,
  representation: Representation.Representation<S>,
  scalar: Representation.Count<S>,
  operation: "multiply" | "divide" | "remainder",
): Quantity<D, Representation.Common<R, S>> => {
  const common = Representation.common(self.unit.representation, representation)
  const unit = Unit.make(self.unit.dimension, common, self.unit.scale)
  return unsafeMake(unit, common[operation](common.cast(self.count), common.cast(scalar)))
}

const scalarOperation = (operation: "multiply" | "divide" | "remainder") => (self: Any, scalar: number | bigint): Any =>
  typeof scalar === "bigint"
    ? withScalar(self, Representation.int64, scalar, operation)
    : withScalar(self, Representation.float64, scalar, operation)

/**
 * Multiply by a plain number. The scale is kept; the representation promotes
 * with the scalar's (`bigint` as `int64`, `number` as `float64`).
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const times: {
  <S extends number | bigint>(
    scalar: S,
  ): <D extends Dimension.Any, R extends Representation.Name>(
    self: Quantity<D, R>,
  ) => Quantity<D, Representation.Common<R, Representation.ScalarName<S>>>
  <D extends Dimension.Any, R extends Representation.Name, S extends number | bigint>(
    self: Quantity<D, R>,
    scalar: S,
  ): Quantity<D, Representation.Common<R, Representation.ScalarName<S>>>
} = dual(2, scalarOperation("multiply"))

/** @category Arithmetic */
export const divideScalar: {
  <S extends number | bigint>(
    scalar: S,
  ): <D extends Dimension.Any, R extends Representation.Name>(
    self: Quantity<D, R>,
  ) => Quantity<D, Representation.Common<R, Representation.ScalarName<S>>>
  <D extends Dimension.Any, R extends Representation.Name, S extends number | bigint>(
    self: Quantity<D, R>,
    scalar: S,
  ): Quantity<D, Representation.Common<R, Representation.ScalarName<S>>>
} = dual(2, scalarOperation("divide"))

/** @category Arithmetic */
export const remainderScalar: {
  <S extends number | bigint>(
    scalar: S,
  ): <D extends Dimension.Any, R extends Representation.Name>(
    self: Quantity<D, R>,
  ) => Quantity<D, Representation.Common<R, Representation.ScalarName<S>>>
  <D extends Dimension.Any, R extends Representation.Name, S extends number | bigint>(
    self: Quantity<D, R>,
    scalar: S,
  ): Quantity<D, Representation.Common<R, Representation.ScalarName<S>>>
} = dual(2, scalarOperation("remainder"))

const equivalent = (self: Any, that: Any): boolean =>
  combine(self, that, (unit, x, y) => unit.representation.equals(x, y))

/**
 * Order of two quantities of the same dimension, compared in their common
 * unit.
 *
 * @category Comparisons
 * @since 0.1.0
 */
export const compare: {
  <D extends Dimension.Any>(that: Quantity<D>): (self: Quantity<D>) => -1 | 0 | 1
  <D extends Dimension.Any>(self: Quantity<D>, that: Quantity<D>): -1 | 0 | 1
} = dual(
  2,
  (self: Any, that: Any): -1 | 0 | 1 => combine(self, that, (unit, x, y) => unit.representation.compare(x, y)),
)

/** @category Comparisons */
export const equals: {
  <D extends Dimension.Any>(that: Quantity<D>): (self: Quantity<D>) => boolean
  <D extends Dimension.Any>(self: Quantity<D>, that: Quantity<D>): boolean
} = dual(2, equivalent)

/** @category Comparisons */
export const lessThan: {
  <D extends Dimension.Any>(that: Quantity<D>): (self: Quantity<D>) => boolean
  <D extends Dimension.Any>(self: Quantity<D>, that: Quantity<D>): boolean
} = dual(2, (self: Any, that: Any): boolean => compare(self, that) < 0)

/** @category Comparisons */
export const lessThanOrEqualTo: {
  <D extends Dimension.Any>(that: Quantity<D>): (self: Quantity<D>) => boolean
  <D extends Dimension.Any>(self: Quantity<D>, that: Quantity<D>): boolean
} = dual(2, (self: Any, that: Any): boolean => compare(self, that) <= 0)

/** @category Comparisons */
export const greaterThan: {
  <D extends Dimension.Any>(that: Quantity<D>): (self: Quantity<D>) => boolean
  <D extends Dimension.Any>(self: Quantity<D>, that: Quantity<D>): boolean
} = dual(2, (self: Any, that: Any): boolean => compare(self, that) > 0)

/** @category Comparisons */
export const greaterThanOrEqualTo: {
  <D extends Dimension.Any>(that: Quantity<D>): (self: Quantity<D>) => boolean
  <D extends Dimension.Any>(self: Quantity<D>, that: Quantity<D>): boolean
} = dual(2, (self: Any, that: Any): boolean => compare(self, that) >= 0)
