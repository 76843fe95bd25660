/**
 * Rational scale factors.
 *
 * A scale is the multiplier from a quantity's stored count to the canonical
 * base unit of its dimension: `kilo` means one stored count is 1000 base
 * units. Scales are always positive and kept in lowest terms, so two equal
 * ratios are structurally equal.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * A positive ratio of two integers in lowest terms.
 *
 * @category Models
 * @since 0.1.0
 */
export class Scale extends Schema.Class<Scale>("Scale")({
  num: Schema.BigIntFromSelf.pipe(Schema.positiveBigInt()),
  den: Schema.BigIntFromSelf.pipe(Schema.positiveBigInt()),
}) {}

/**
 * Greatest common divisor of two integers (always non-negative).
 *
 * @category Math
 * @since 0.1.0
 */
export const gcd = (a: bigint, b: bigint): bigint => {
  let x = a < 0n ? -a : a
  let y = b < 0n ? -b : b
  while (y !== 0n) {
    const t = x % y
    x = y
    y = t
  }
  return x
}

/**
 * Least common multiple of two integers.
 *
 * @category Math
 * @since 0.1.0
 */
export const lcm = (a: bigint, b: bigint): bigint => {
  if (a === 0n || b === 0n) {
    return 0n
  }
  const product = (a / gcd(a, b)) * b
  return product < 0n ? -product : product
}

/**
 * Build a scale from a numerator and denominator, reducing it to lowest
 * terms.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const make = (num: bigint, den: bigint = 1n): Scale => {
  const divisor = gcd(num, den)
  return divisor === 0n ? new Scale({ num, den }) : new Scale({ num: num / divisor, den: den / divisor })
}

/** @category Prefixes */
export const atto = make(1n, 1_000_000_000_000_000_000n)
/** @category Prefixes */
export const femto = make(1n, 1_000_000_000_000_000n)
/** @category Prefixes */
export const pico = make(1n, 1_000_000_000_000n)
/** @category Prefixes */
export const nano = make(1n, 1_000_000_000n)
/** @category Prefixes */
export const micro = make(1n, 1_000_000n)
/** @category Prefixes */
export const milli = make(1n, 1_000n)
/** @category Prefixes */
export const one = make(1n)
/** @category Prefixes */
export const kilo = make(1_000n)
/** @category Prefixes */
export const mega = make(1_000_000n)
/** @category Prefixes */
export const giga = make(1_000_000_000n)
/** @category Prefixes */
export const tera = make(1_000_000_000_000n)
/** @category Prefixes */
export const peta = make(1_000_000_000_000_000n)
/** @category Prefixes */
export const exa = make(1_000_000_000_000_000_000n)

/**
 * Product of two scales.
 *
 * @category Math
 * @since 0.1.0
 */
export const multiply = (self: Scale, that: Scale): Scale => make(self.num * that.num, self.den * that.den)

/**
 * Quotient of two scales.
 *
 * @category Math
 * @since 0.1.0
 */
export const divide = (self: Scale, that: Scale): Scale => make(self.num * that.den, self.den * that.num)

/**
 * The finest scale both inputs are whole multiples of: the gcd of the
 * numerators over the lcm of the denominators. A count expressed in either
 * input scale is an exact integer count in the result.
 *
 * @category Math
 * @since 0.1.0
 */
export const common = (self: Scale, that: Scale): Scale =>
  make(gcd(self.num, that.num), lcm(self.den, that.den))

/**
 * True when the scale is a whole number, i.e. multiplying by it never
 * introduces a fraction.
 *
 * @category Predicates
 * @since 0.1.0
 */
export const isIntegral = (self: Scale): boolean => self.den === 1n

/**
 * Structural equality of two scales.
 *
 * @category Predicates
 * @since 0.1.0
 */
export const equals = (self: Scale, that: Scale): boolean => self.num === that.num && self.den === that.den

/**
 * Render as `"num"` or `"num/den"`.
 *
 * @category Formatting
 * @since 0.1.0
 */
export const format = (self: Scale): string => (isIntegral(self) ? `${self.num}` : `${self.num}/${self.den}`)
