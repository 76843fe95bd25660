import { describe, expect, it } from "@effect/vitest"
import { Equal, Option } from "effect"
import {
  Algebra,
  Dimension,
  MissingRelationError,
  Quantity,
  RelationConflictError,
  Representation,
  Scale,
  Unit,
} from "../src/index.js"
import {
  algebra,
  Energy,
  Frequency,
  hertz,
  joule,
  kilosecond,
  kilowatt,
  Length,
  megajouleF64,
  meter,
  meterPerSecond,
  millisecond,
  nanosecond,
  Power,
  second,
  secondF64,
  Time,
  Velocity,
  watt,
} from "./fixtures.js"

describe("Algebra", () => {
  describe("multiply", () => {
    it("resolves the product dimension and multiplies scales", () => {
      const energy = algebra.multiply(Quantity.make(kilowatt, 2n), Quantity.make(second, 4n))
      expect(energy.unit.dimension.name).toBe("energy")
      expect(energy.count).toBe(8n)
      expect(Scale.equals(energy.unit.scale, Scale.kilo)).toBe(true)
      expect(Quantity.equals(energy, Quantity.make(joule, 8000n))).toBe(true)
      expect(Quantity.equals(energy, Quantity.make(megajouleF64, 0.008))).toBe(true)
      expect(Quantity.unitCast(energy, megajouleF64).count).toBe(0.008)
    })

    it("commutes", () => {
      const energy = algebra.multiply(Quantity.make(second, 4n), Quantity.make(kilowatt, 2n))
      expect(Quantity.equals(energy, Quantity.make(joule, 8000n))).toBe(true)
    })

    it("keeps the dimension when multiplied by a dimensionless quantity", () => {
      const power = algebra.multiply(Quantity.make(watt, 5n), Quantity.asMilli)
      expect(power.count).toBe(5000n)
      expect(Quantity.equals(power, Quantity.make(watt, 5n))).toBe(true)
    })

    it("folds the scale into dimensionless results", () => {
      expect(algebra.multiply(Quantity.make(second, 2n), Quantity.make(hertz, 3n))).toBe(6n)
      expect(algebra.multiply(Quantity.make(millisecond, 2000n), Quantity.make(hertz, 3n))).toBe(6n)
    })

    it("rejects undeclared products", () => {
      expect(() =>
        // @ts-expect-error no relation for power × length
        algebra.multiply(Quantity.make(watt, 1n), Quantity.make(meter, 1n))
      ).toThrow(MissingRelationError)
    })

    it("checks widened operands at run time", () => {
      const left: Quantity.Any = Quantity.make(watt, 1n)
      const right: Quantity.Any = Quantity.make(meter, 1n)
      expect(() => algebra.multiply(left, right)).toThrow(MissingRelationError)
    })
  })

  describe("divide", () => {
    it("yields a plain count for same-dimension quotients", () => {
      expect(algebra.divide(Quantity.make(kilowatt, 2n), Quantity.make(watt, 500n))).toBe(4n)
      expect(algebra.divide(Quantity.make(second, 6n), Quantity.make(second, 3n))).toBe(2n)
      expect(algebra.divide(Quantity.make(second, 1n), Quantity.make(second, 2n))).toBe(0n)
      expect(algebra.divide(Quantity.make(secondF64, 1), Quantity.make(second, 2n))).toBe(0.5)
      expect(algebra.divide(Quantity.make(kilosecond, 1n), Quantity.make(second, 2n))).toBe(500n)
    })

    it("folds scales wider than the representation into the quotient", () => {
      const megasecond16 = Unit.make(Time, Representation.int16, Scale.mega)
      const second16 = Unit.make(Time, Representation.int16)
      expect(algebra.divide(Quantity.make(megasecond16, 1n), Quantity.make(second16, 1000n))).toBe(1000n)
      expect(algebra.divide(Quantity.make(second16, 30_000n), Quantity.make(megasecond16, 1n))).toBe(0n)
    })

    it("resolves implied quotients", () => {
      const power = algebra.divide(Quantity.make(joule, 8000n), Quantity.make(second, 4n))
      expect(Quantity.equals(power, Quantity.make(kilowatt, 2n))).toBe(true)

      const time = algebra.divide(Quantity.make(joule, 8000n), Quantity.make(kilowatt, 2n))
      expect(time.count).toBe(4000n)
      expect(Quantity.equals(time, Quantity.make(second, 4n))).toBe(true)
    })

    it("turns a frequency into a period through an inverse relation", () => {
      const period = algebra.divide(Quantity.asNano, Quantity.make(hertz, 20_000_000n))
      expect(period.count).toBe(50n)
      expect(Quantity.equals(period, Quantity.make(nanosecond, 50n))).toBe(true)
    })

    it("rejects undeclared quotients", () => {
      expect(() =>
        // @ts-expect-error no relation for power / length
        algebra.divide(Quantity.make(watt, 1n), Quantity.make(meter, 1n))
      ).toThrow(MissingRelationError)
    })
  })

  describe("declarations", () => {
    it("declares quotients", () => {
      const kinematics = Algebra.quotient(Length, Time, Velocity)(Algebra.make())
      const distance = kinematics.multiply(Quantity.make(meterPerSecond, 3n), Quantity.make(second, 2n))
      expect(Quantity.equals(distance, Quantity.make(meter, 6n))).toBe(true)
      const speed = kinematics.divide(Quantity.make(meter, 6n), Quantity.make(second, 2n))
      expect(Quantity.equals(speed, Quantity.make(meterPerSecond, 3n))).toBe(true)
    })

    it("accepts redeclaring the same relation", () => {
      const again = Algebra.product(Power, Time, Energy)(algebra)
      expect(again.relations).toHaveLength(3)
    })

    it("rejects a conflicting relation", () => {
      // @ts-expect-error power × time already yields energy
      expect(() => Algebra.product(Power, Time, Length)(algebra)).toThrow(RelationConflictError)
    })

    it("rejects redefining the dimensionless built-ins", () => {
      // @ts-expect-error dimensionless × power is power
      expect(() => Algebra.product(Dimension.dimensionless, Power, Time)(Algebra.make())).toThrow(
        RelationConflictError,
      )
    })

    it("tells dimensions apart by their duration flag", () => {
      const PlainTime = Dimension.make("time", "s")
      const extended = Algebra.product(Power, PlainTime, Length)(algebra)
      expect(Option.getOrThrow(Algebra.productOf(extended, Power, PlainTime))).toBe(Length)
      expect(Option.getOrThrow(Algebra.productOf(extended, Power, Time))).toBe(Energy)
      const plainSecond = Unit.make(PlainTime, Representation.int64)
      const distance = extended.multiply(Quantity.make(watt, 2n), Quantity.make(plainSecond, 3n))
      expect(Quantity.equals(distance, Quantity.make(meter, 6n))).toBe(true)
    })

    it("looks up relations", () => {
      expect(Option.isNone(Algebra.productOf(algebra, Power, Length))).toBe(true)
      expect(Option.getOrThrow(Algebra.quotientOf(algebra, Energy, Power))).toBe(Time)
      expect(Option.getOrThrow(Algebra.productOf(algebra, Frequency, Time))).toBe(Dimension.dimensionless)
      expect(Option.getOrThrow(Algebra.quotientOf(algebra, Time, Time))).toBe(Dimension.dimensionless)
      expect(Option.getOrThrow(Algebra.productOf(algebra, Dimension.dimensionless, Power))).toBe(Power)
    })

    it("serialises its relations", () => {
      expect(Algebra.isAlgebra(algebra)).toBe(true)
      expect(algebra.toJSON()).toEqual({
        _id: "Algebra",
        relations: ["power * time = energy", "time * frequency = dimensionless"],
      })
    })

    it("keeps tables immutable", () => {
      const extended = Algebra.quotient(Length, Time, Velocity)(algebra)
      expect(Option.isSome(Algebra.productOf(extended, Velocity, Time))).toBe(true)
      expect(Option.isNone(Algebra.productOf(algebra, Velocity, Time))).toBe(true)
      expect(Equal.equals(extended, algebra)).toBe(false)
    })
  })
})
