/**
 * Quantity types.
 *
 * A unit is the "type" of a quantity: a dimension, a numeric representation
 * and a scale. Units are created once and shared by every quantity of that
 * type; two quantities have the same type only when dimension, representation
 * and scale all match.
 *
 * @since 0.1.0
 */

import { Equal, Hash, Inspectable, Predicate } from "effect"
import type * as Dimension from "./Dimension.js"
import * as Representation from "./Representation.js"
import * as Scale from "./Scale.js"

/**
 * @category Symbols
 * @since 0.1.0
 */
export const TypeId: unique symbol = Symbol.for("quantity-algebra/Unit")

/**
 * @category Symbols
 * @since 0.1.0
 */
export type TypeId = typeof TypeId

/**
 * @category Models
 * @since 0.1.0
 */
export interface Unit<
  D extends Dimension.Any = Dimension.Any,
  R extends Representation.Name = Representation.Name,
> extends Equal.Equal, Inspectable.Inspectable {
  readonly [TypeId]: TypeId
  readonly dimension: D
  readonly representation: Representation.Representation<R>
  readonly scale: Scale.Scale
}

/**
 * @category Models
 * @since 0.1.0
 */
export type Any = Unit<Dimension.Any, Representation.Name>

class UnitImpl<D extends Dimension.Any, R extends Representation.Name> implements Unit<D, R> {
  readonly [TypeId]: TypeId = TypeId

  constructor(
    readonly dimension: D,
    readonly representation: Representation.Representation<R>,
    readonly scale: Scale.Scale,
  ) {}

  [Equal.symbol](that: unknown): boolean {
    return isUnit(that) && equals(this, that)
  }

  [Hash.symbol](): number {
    return Hash.combine(Hash.string(this.representation.name))(Hash.hash(this.dimension))
  }

  toJSON() {
    return {
      _id: "Unit",
      dimension: this.dimension.name,
      representation: this.representation.name,
      scale: Scale.format(this.scale),
    }
  }

  toString() {
    return describe(this)
  }

  [Inspectable.NodeInspectSymbol]() {
    return this.toJSON()
  }
}

/**
 * @category Guards
 * @since 0.1.0
 */
export const isUnit = (u: unknown): u is Any => Predicate.hasProperty(u, TypeId)

/**
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const kilowatt = Unit.make(Power, Representation.int64, Scale.kilo)
 * ```
 */
export const make = <D extends Dimension.Any, R extends Representation.Name>(
  dimension: D,
  representation: Representation.Representation<R>,
  scale: Scale.Scale = Scale.one,
): Unit<D, R> => new UnitImpl(dimension, representation, scale)

/**
 * True when both units are the very same quantity type.
 *
 * @category Predicates
 * @since 0.1.0
 */
export const equals = (self: Any, that: Any): boolean =>
  Equal.equals(self.dimension, that.dimension) &&
  self.representation.name === that.representation.name &&
  Scale.equals(self.scale, that.scale)

/**
 * The unit both operands of a same-dimension operation are converted to:
 * the promoted representation and the finest common scale. Both operands are
 * exactly representable in it, so sums, differences and comparisons never
 * need the narrowing guard.
 *
 * @category Resolution
 * @since 0.1.0
 */
export const common = <D extends Dimension.Any, A extends Representation.Name, B extends Representation.Name>(
  self: Unit<D, A>,
  that: Unit<D, B>,
): Unit<D, Representation.Common<A, B>> =>
  make(
    self.dimension,
    Representation.common(self.representation, that.representation),
    Scale.equals(self.scale, that.scale) ? self.scale : Scale.common(self.scale, that.scale),
  )

/**
 * The narrowing guard: converting from `from` to `to` is lossless when the
 * target is floating, or when the source is integral and the scale ratio
 * `from / to` is a whole number. Depends on the two units only, never on a
 * count.
 *
 * @category Predicates
 * @since 0.1.0
 */
export const isNarrowing = (from: Any, to: Any): boolean =>
  !to.representation.floating &&
  (from.representation.floating || !Scale.isIntegral(Scale.divide(from.scale, to.scale)))

/**
 * Human-readable form such as `power<int64, 1000>`.
 *
 * @category Formatting
 * @since 0.1.0
 */
export const describe = (self: Any): string =>
  `${self.dimension.name}<${self.representation.name}, ${Scale.format(self.scale)}>`
