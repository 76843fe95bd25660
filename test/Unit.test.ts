import { describe, expect, it } from "@effect/vitest"
import { Equal } from "effect"
import { Representation, Scale, Unit } from "../src/index.js"
import { kilowatt, millisecond, Power, second, secondF64, Time, watt } from "./fixtures.js"

describe("Unit", () => {
  it("describes itself", () => {
    expect(Unit.describe(kilowatt)).toBe("power<int64, 1000>")
    expect(String(millisecond)).toBe("time<int64, 1/1000>")
    expect(kilowatt.toJSON()).toEqual({ _id: "Unit", dimension: "power", representation: "int64", scale: "1000" })
  })

  it("is the same type only when dimension, representation and scale match", () => {
    expect(Equal.equals(Unit.make(Power, Representation.int64, Scale.kilo), kilowatt)).toBe(true)
    expect(Equal.equals(watt, kilowatt)).toBe(false)
    expect(Unit.equals(second, secondF64)).toBe(false)
    expect(Unit.isUnit(watt)).toBe(true)
    expect(Unit.isUnit(Power)).toBe(false)
  })

  it("resolves the common unit", () => {
    expect(Unit.equals(Unit.common(watt, kilowatt), watt)).toBe(true)
    expect(Unit.equals(Unit.common(kilowatt, kilowatt), kilowatt)).toBe(true)

    const common = Unit.common(
      Unit.make(Time, Representation.int32, Scale.milli),
      Unit.make(Time, Representation.float32, Scale.kilo),
    )
    expect(common.representation.name).toBe("float32")
    expect(Scale.equals(common.scale, Scale.milli)).toBe(true)
  })

  it("flags narrowing conversions from the units alone", () => {
    expect(Unit.isNarrowing(second, millisecond)).toBe(false)
    expect(Unit.isNarrowing(millisecond, second)).toBe(true)
    expect(Unit.isNarrowing(secondF64, second)).toBe(true)
    expect(Unit.isNarrowing(millisecond, secondF64)).toBe(false)
  })
})
