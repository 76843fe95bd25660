import { describe, expect, it } from "@effect/vitest"
import { ConfigProvider, Effect, HashMap, Layer, Logger, Option } from "effect"
import { Display, Quantity, Representation, Scale, Unit } from "../src/index.js"
import { kilowatt, kilowattF64, Length, microsecond, nanosecond, Time } from "./fixtures.js"

describe("Display", () => {
  it("prints SI prefixes", () => {
    expect(Display.format(Quantity.make(kilowatt, 2n))).toBe("2kW")
    expect(Display.format(Quantity.make(kilowattF64, 2.5))).toBe("2.5kW")
    expect(Display.format(Quantity.make(nanosecond, 50n))).toBe("50ns")
    expect(Display.format(Quantity.make(microsecond, 3n))).toBe("3μs")
    expect(Display.format(Quantity.make(microsecond, 3n), { microSymbol: "u" })).toBe("3us")
  })

  it("prints other scales as ratios", () => {
    expect(Display.format(Quantity.make(Unit.make(Time, Representation.int64, Scale.make(60n)), 2n))).toBe("2[60]s")
    expect(Display.format(Quantity.make(Unit.make(Length, Representation.int64, Scale.make(1n, 3n)), 1n))).toBe(
      "1[1/3]m",
    )
  })

  it.effect("formats through the service", () =>
    Effect.gen(function* () {
      const display = yield* Display.Display
      expect(display.format(Quantity.make(kilowatt, 2n))).toBe("2kW")
    }).pipe(Effect.provide(Display.Display.layer)))

  it.effect("reads the micro symbol from configuration", () =>
    Effect.gen(function* () {
      const display = yield* Display.Display
      expect(display.format(Quantity.make(microsecond, 3n))).toBe("3us")
    }).pipe(
      Effect.provide(Display.Display.layerConfig),
      Effect.withConfigProvider(ConfigProvider.fromMap(new Map([["QUANTITY_MICRO_SYMBOL", "u"]]))),
    ))

  it.effect("logs with dimension and scale annotations", () => {
    const entries: Array<{ message: string; dimension: Option.Option<unknown>; scale: Option.Option<unknown> }> = []
    const capture = Logger.make(({ annotations, message }) => {
      entries.push({
        message: String(message),
        dimension: HashMap.get(annotations, "dimension"),
        scale: HashMap.get(annotations, "scale"),
      })
    })
    return Effect.gen(function* () {
      const display = yield* Display.Display
      yield* display.log("kettle", Quantity.make(kilowatt, 2n))
      expect(entries).toHaveLength(1)
      expect(entries[0]?.message).toBe("kettle: 2kW")
      expect(entries[0]?.dimension).toEqual(Option.some("power"))
      expect(entries[0]?.scale).toEqual(Option.some("1000"))
    }).pipe(Effect.provide(Layer.merge(Display.Display.layer, Logger.add(capture))))
  })
})
