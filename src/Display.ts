/**
 * Human-readable rendering of quantities and a logging service built on it.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, HashMap, Layer, Option } from "effect"
import type * as Quantity from "./Quantity.js"
import * as Scale from "./Scale.js"

/**
 * @category Models
 * @since 0.1.0
 */
export interface FormatOptions {
  /** Symbol printed for the micro prefix. Defaults to `"μ"`. */
  readonly microSymbol?: string
}

/**
 * SI prefixes, keyed by the formatted scale they stand for. The micro entry
 * is filled in from {@link FormatOptions}.
 *
 * @category Constants
 * @since 0.1.0
 */
export const prefixes: HashMap.HashMap<string, string> = HashMap.make(
  [Scale.format(Scale.exa), "E"],
  [Scale.format(Scale.peta), "P"],
  [Scale.format(Scale.tera), "T"],
  [Scale.format(Scale.giga), "G"],
  [Scale.format(Scale.mega), "M"],
  [Scale.format(Scale.kilo), "k"],
  [Scale.format(Scale.one), ""],
  [Scale.format(Scale.milli), "m"],
  [Scale.format(Scale.nano), "n"],
  [Scale.format(Scale.pico), "p"],
  [Scale.format(Scale.femto), "f"],
  [Scale.format(Scale.atto), "a"],
)

/**
 * The prefix printed for a scale: an SI prefix when one exists, otherwise the
 * ratio in brackets.
 *
 * @category Formatting
 * @since 0.1.0
 */
export const prefix = (scale: Scale.Scale, options: FormatOptions = {}): string => {
  if (Scale.equals(scale, Scale.micro)) {
    return options.microSymbol ?? "μ"
  }
  const formatted = Scale.format(scale)
  return Option.getOrElse(HashMap.get(prefixes, formatted), () => `[${formatted}]`)
}

/**
 * Render a quantity as `<count><prefix><symbol>`, e.g. `2kW` or `50ns`.
 *
 * @category Formatting
 * @since 0.1.0
 */
export const format = (quantity: Quantity.Any, options: FormatOptions = {}): string =>
  `${quantity.count}${prefix(quantity.unit.scale, options)}${quantity.unit.dimension.symbol}`

/**
 * @category Models
 * @since 0.1.0
 */
export interface DisplayService {
  readonly format: (quantity: Quantity.Any) => string
  readonly log: (message: string, quantity: Quantity.Any) => Effect.Effect<void>
}

const makeService = (options: FormatOptions): DisplayService => {
  const render = (quantity: Quantity.Any) => format(quantity, options)
  return {
    format: render,
    log: (message, quantity) =>
      Effect.logInfo(`${message}: ${render(quantity)}`).pipe(
        Effect.annotateLogs({
          dimension: quantity.unit.dimension.name,
          representation: quantity.unit.representation.name,
          scale: Scale.format(quantity.unit.scale),
        }),
      ),
  }
}

/**
 * @category Services
 * @since 0.1.0
 */
export class Display extends Context.Tag("quantity-algebra/Display")<Display, DisplayService>() {
  static readonly layer = Layer.succeed(this, makeService({}))

  /** Reads the micro symbol from `QUANTITY_MICRO_SYMBOL`. */
  static readonly layerConfig = Layer.effect(
    this,
    Effect.map(
      Config.string("QUANTITY_MICRO_SYMBOL").pipe(Config.withDefault("μ")),
      (microSymbol) => makeService({ microSymbol }),
    ),
  )
}
