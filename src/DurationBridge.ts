/**
 * Interop with Effect's `Duration`.
 *
 * Only quantities whose dimension was declared with `Dimension.duration` can
 * cross the bridge. A `Duration` counts whole nanoseconds, so it enters the
 * algebra as an `int64` count of its tick (nanoseconds unless stated
 * otherwise) and leaves it the same way.
 *
 * @since 0.1.0
 */

import { Duration, Option } from "effect"
import type * as Dimension from "./Dimension.js"
import {
  InfiniteDurationError,
  NarrowingConversionError,
  NegativeDurationError,
  NonDurationDimensionError,
} from "./Errors.js"
import * as Quantity from "./Quantity.js"
import * as Representation from "./Representation.js"
import * as Scale from "./Scale.js"
import * as Unit from "./Unit.js"

const nanosecond = <D extends Dimension.Any>(dimension: D): Unit.Unit<D, "int64"> =>
  Unit.make(dimension, Representation.int64, Scale.nano)

const ensureDuration = (dimension: Dimension.Any): void => {
  if (!dimension.duration) {
    throw new NonDurationDimensionError({ dimension: dimension.name })
  }
}

const toNanos = <D extends Dimension.Any>(dimension: D, input: Duration.DurationInput): Quantity.Quantity<D, "int64"> =>
  Option.match(Duration.toNanos(Duration.decode(input)), {
    onNone: () => {
      throw new InfiniteDurationError({ dimension: dimension.name })
    },
    onSome: (nanos) => Quantity.make(nanosecond(dimension), nanos),
  })

/**
 * Express a quantity as a `Duration`, truncating to whole nanoseconds. A
 * floating `+Infinity` becomes `Duration.infinity`. A `Duration` is never
 * negative, so a negative count throws `NegativeDurationError` and a `NaN`
 * throws `NonFiniteCountError`.
 *
 * @category Conversions
 * @since 0.1.0
 * @example
 * ```ts
 * DurationBridge.toDuration(Quantity.make(second, 5n)) // Duration.seconds(5)
 * ```
 */
export const toDuration = <D extends Dimension.DurationCompatible, R extends Representation.Name>(
  self: Quantity.Quantity<D, R>,
): Duration.Duration => {
  ensureDuration(self.unit.dimension)
  const { representation } = self.unit
  if (self.count === Infinity) {
    return Duration.infinity
  }
  if (representation.compare(self.count, representation.zero) < 0) {
    throw new NegativeDurationError({ dimension: self.unit.dimension.name, count: String(self.count) })
  }
  return Duration.nanos(Quantity.unitCast(self, nanosecond(self.unit.dimension)).count)
}

/**
 * Build a quantity from a `Duration`. The duration is first counted as an
 * `int64` number of `tick`s, then converted under the same narrowing rule as
 * `Quantity.convert`: an integral target coarser than the tick throws
 * `NarrowingConversionError`, and so does a duration that is not a whole
 * number of ticks.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const fromDuration = <D extends Dimension.DurationCompatible, R extends Representation.Name>(
  unit: Unit.Unit<D, R>,
  duration: Duration.DurationInput,
  tick: Scale.Scale = Scale.nano,
): Quantity.Quantity<D, R> => {
  ensureDuration(unit.dimension)
  const native = Unit.make(unit.dimension, Representation.int64, tick)
  if (Unit.isNarrowing(native, unit)) {
    throw new NarrowingConversionError({ source: Unit.describe(native), target: Unit.describe(unit) })
  }
  const nanos = toNanos(unit.dimension, duration)
  const ratio = Scale.divide(Scale.nano, tick)
  if ((nanos.count * ratio.num) % ratio.den !== 0n) {
    throw new NarrowingConversionError({ source: Unit.describe(nanos.unit), target: Unit.describe(native) })
  }
  return Quantity.unitCast(Quantity.unitCast(nanos, native), unit)
}

/**
 * Build a quantity from a `Duration`, truncating toward zero when `unit` is
 * coarser than a nanosecond.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const castDuration = <D extends Dimension.DurationCompatible, R extends Representation.Name>(
  unit: Unit.Unit<D, R>,
  duration: Duration.DurationInput,
): Quantity.Quantity<D, R> => {
  ensureDuration(unit.dimension)
  return Quantity.unitCast(toNanos(unit.dimension, duration), unit)
}
