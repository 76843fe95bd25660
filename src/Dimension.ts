/**
 * Dimension tags.
 *
 * A dimension carries no data beyond its identity: the literal `name` is part
 * of its type, so quantities of different dimensions are different types and
 * cannot be mixed. The `duration` flag marks dimensions that may be bridged to
 * Effect's `Duration`.
 *
 * @since 0.1.0
 */

import { Equal, Hash, Inspectable, Predicate } from "effect"
import { ReservedDimensionError } from "./Errors.js"

/**
 * @category Symbols
 * @since 0.1.0
 */
export const TypeId: unique symbol = Symbol.for("quantity-algebra/Dimension")

/**
 * @category Symbols
 * @since 0.1.0
 */
export type TypeId = typeof TypeId

/**
 * @category Models
 * @since 0.1.0
 */
export interface Dimension<Name extends string = string, IsDuration extends boolean = boolean>
  extends Equal.Equal, Inspectable.Inspectable
{
  readonly [TypeId]: TypeId
  readonly name: Name
  readonly symbol: string
  readonly duration: IsDuration
}

/**
 * @category Models
 * @since 0.1.0
 */
export type Any = Dimension<string, boolean>

/**
 * Dimensions that may be bridged to `Duration`.
 *
 * @category Models
 * @since 0.1.0
 */
export type DurationCompatible = Dimension<string, true>

/**
 * The "no dimension" marker.
 *
 * @category Models
 * @since 0.1.0
 */
export type Dimensionless = Dimension<"dimensionless", false>

class DimensionImpl<Name extends string, IsDuration extends boolean> implements Dimension<Name, IsDuration> {
  readonly [TypeId]: TypeId = TypeId

  constructor(
    readonly name: Name,
    readonly symbol: string,
    readonly duration: IsDuration,
  ) {}

  [Equal.symbol](that: unknown): boolean {
    return isDimension(that) && that.name === this.name && that.duration === this.duration
  }

  [Hash.symbol](): number {
    return Hash.string(this.name)
  }

  toJSON() {
    return { _id: "Dimension", name: this.name, symbol: this.symbol, duration: this.duration }
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
export const isDimension = (u: unknown): u is Any => Predicate.hasProperty(u, TypeId)

/**
 * The dimensionless marker. Multiplying or dividing any dimension by it
 * yields that dimension; dividing a dimension by itself yields it.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const dimensionless: Dimensionless = new DimensionImpl("dimensionless", "", false)

/**
 * @category Guards
 * @since 0.1.0
 */
export const isDimensionless = (self: Any): boolean => self.name === dimensionless.name

const makeDimension = <Name extends string, IsDuration extends boolean>(
  name: Name,
  symbol: string,
  duration: IsDuration,
): Dimension<Name, IsDuration> => {
  if (name === dimensionless.name) {
    throw new ReservedDimensionError({ name })
  }
  return new DimensionImpl(name, symbol, duration)
}

/**
 * Declare a dimension.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const Power = Dimension.make("power", "W")
 * ```
 */
export const make = <const Name extends string>(name: Name, symbol: string): Dimension<Name, false> =>
  makeDimension(name, symbol, false)

/**
 * Declare a dimension that can be converted to and from `Duration`.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const duration = <const Name extends string>(name: Name, symbol: string): Dimension<Name, true> =>
  makeDimension(name, symbol, true)
