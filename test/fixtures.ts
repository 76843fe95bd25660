import { pipe } from "effect"
import { Algebra, Dimension, Representation, Scale, Unit } from "../src/index.js"

export const Power = Dimension.make("power", "W")
export const Time = Dimension.duration("time", "s")
export const Energy = Dimension.make("energy", "J")
export const Frequency = Dimension.make("frequency", "Hz")
export const Length = Dimension.make("length", "m")
export const Velocity = Dimension.make("velocity", "m/s")

export const watt = Unit.make(Power, Representation.int64)
export const kilowatt = Unit.make(Power, Representation.int64, Scale.kilo)
export const kilowattF64 = Unit.make(Power, Representation.float64, Scale.kilo)
export const wattF64 = Unit.make(Power, Representation.float64)

export const second = Unit.make(Time, Representation.int64)
export const secondF64 = Unit.make(Time, Representation.float64)
export const kilosecond = Unit.make(Time, Representation.int64, Scale.kilo)
export const millisecond = Unit.make(Time, Representation.int64, Scale.milli)
export const microsecond = Unit.make(Time, Representation.int64, Scale.micro)
export const nanosecond = Unit.make(Time, Representation.int64, Scale.nano)

export const joule = Unit.make(Energy, Representation.int64)
export const megajouleF64 = Unit.make(Energy, Representation.float64, Scale.mega)

export const hertz = Unit.make(Frequency, Representation.int64)
export const meter = Unit.make(Length, Representation.int64)
export const meterPerSecond = Unit.make(Velocity, Representation.int64)

/**
 * Power × time = energy, plus time and frequency as inverses.
 */
export const algebra = pipe(
  Algebra.make(),
  Algebra.product(Power, Time, Energy),
  Algebra.inverse(Time, Frequency),
)
