/**
 * Numeric representations a quantity stores its count in.
 *
 * Integral kinds store a `bigint` wrapped to their bit width; floating kinds
 * store a `number`. Each representation carries the arithmetic of its kind so
 * that generic code never has to branch on the count's runtime type.
 *
 * @since 0.1.0
 */

import { NonFiniteCountError } from "./Errors.js"

/**
 * @category Models
 * @since 0.1.0
 */
export type IntegralName = "int8" | "int16" | "int32" | "int64"

/**
 * @category Models
 * @since 0.1.0
 */
export type FloatingName = "float32" | "float64"

/**
 * @category Models
 * @since 0.1.0
 */
export type Name = IntegralName | FloatingName

/**
 * Runtime type of a count for every representation.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Counts {
  readonly int8: bigint
  readonly int16: bigint
  readonly int32: bigint
  readonly int64: bigint
  readonly float32: number
  readonly float64: number
}

/**
 * @category Models
 * @since 0.1.0
 */
export type Count<N extends Name> = Counts[N]

/**
 * Raw numbers a representation may be constructed from: a `number` may carry
 * a fraction, so only floating representations accept one.
 *
 * @category Models
 * @since 0.1.0
 */
export type RawSource<N extends Name> = N extends FloatingName ? number | bigint : bigint

/**
 * Representations a quantity may be implicitly converted from into `N`.
 *
 * @category Models
 * @since 0.1.0
 */
export type AllowedSource<N extends Name> = N extends FloatingName ? Name : IntegralName

/**
 * Representation a plain scalar operand promotes as.
 *
 * @category Models
 * @since 0.1.0
 */
export type ScalarName<S extends number | bigint> = S extends bigint ? "int64" : "float64"

/**
 * Representation both operands promote to.
 *
 * @category Models
 * @since 0.1.0
 */
export type Common<A extends Name, B extends Name> = A extends Name ? B extends Name ? Promote<A, B> : never
  : never

type Promote<A extends Name, B extends Name> = "float64" extends A | B ? "float64"
  : "float32" extends A | B ? "float32"
  : "int64" extends A | B ? "int64"
  : "int32" extends A | B ? "int32"
  : "int16" extends A | B ? "int16"
  : "int8"

interface Arithmetic<A> {
  readonly floating: boolean
  readonly bits: number
  readonly zero: A
  readonly lowest: A
  readonly highest: A
  /** Narrow any count into this representation (truncating toward zero for integral kinds). */
  cast(value: number | bigint): A
  add(self: A, that: A): A
  subtract(self: A, that: A): A
  multiply(self: A, that: A): A
  divide(self: A, that: A): A
  remainder(self: A, that: A): A
  negate(self: A): A
  /** `(self * multiplier) / divisor`, multiplying first. Only the result is narrowed. */
  rescale(self: A, multiplier: bigint, divisor: bigint): A
  /** `(multiplier * self) / (divisor * that)`. Only the result is narrowed. */
  scaledQuotient(self: A, that: A, multiplier: bigint, divisor: bigint): A
  equals(self: A, that: A): boolean
  compare(self: A, that: A): -1 | 0 | 1
}

/**
 * @category Models
 * @since 0.1.0
 */
export interface Representation<N extends Name = Name> extends Arithmetic<Count<N>> {
  readonly name: N
}

const order = <A extends number | bigint>(self: A, that: A): -1 | 0 | 1 =>
  self < that ? -1 : self > that ? 1 : 0

const integral = <N extends IntegralName>(name: N, bits: number): { readonly name: N } & Arithmetic<bigint> => {
  const wrap = (value: bigint): bigint => BigInt.asIntN(bits, value)
  const limit = 1n << BigInt(bits - 1)
  const truncate = (value: number): bigint => {
    if (!Number.isFinite(value)) {
      throw new NonFiniteCountError({ count: String(value), representation: name })
    }
    return BigInt(Math.trunc(value))
  }
  return {
    name,
    floating: false,
    bits,
    zero: 0n,
    lowest: -limit,
    highest: limit - 1n,
    cast: (value) => wrap(typeof value === "bigint" ? value : truncate(value)),
    add: (self, that) => wrap(self + that),
    subtract: (self, that) => wrap(self - that),
    multiply: (self, that) => wrap(self * that),
    divide: (self, that) => wrap(self / that),
    remainder: (self, that) => wrap(self % that),
    negate: (self) => wrap(-self),
    rescale: (self, multiplier, divisor) => wrap((self * multiplier) / divisor),
    scaledQuotient: (self, that, multiplier, divisor) => wrap((multiplier * self) / (divisor * that)),
    equals: (self, that) => self === that,
    compare: order,
  }
}

const floating = <N extends FloatingName>(
  name: N,
  bits: number,
  highest: number,
  round: (value: number) => number,
): { readonly name: N } & Arithmetic<number> => ({
  name,
  floating: true,
  bits,
  zero: 0,
  lowest: -highest,
  highest,
  cast: (value) => round(Number(value)),
  add: (self, that) => round(self + that),
  subtract: (self, that) => round(self - that),
  multiply: (self, that) => round(self * that),
  divide: (self, that) => round(self / that),
  remainder: (self, that) => round(self % that),
  negate: (self) => -self,
  rescale: (self, multiplier, divisor) => round((self * Number(multiplier)) / Number(divisor)),
  scaledQuotient: (self, that, multiplier, divisor) =>
    round((Number(multiplier) * self) / (Number(divisor) * that)),
  equals: (self, that) => self === that,
  compare: order,
})

/** @category Representations */
export const int8: Representation<"int8"> = integral("int8", 8)
/** @category Representations */
export const int16: Representation<"int16"> = integral("int16", 16)
/** @category Representations */
export const int32: Representation<"int32"> = integral("int32", 32)
/** @category Representations */
export const int64: Representation<"int64"> = integral("int64", 64)
/** @category Representations */
export const float32: Representation<"float32"> = floating("float32", 32, 3.4028234663852886e38, Math.fround)
/** @category Representations */
export const float64: Representation<"float64"> = floating("float64", 64, Number.MAX_VALUE, (value) => value)

const table: { readonly [A in Name]: { readonly [B in Name]: Representation<Common<A, B>> } } = {
  int8: { int8, int16, int32, int64, float32, float64 },
  int16: { int8: int16, int16, int32, int64, float32, float64 },
  int32: { int8: int32, int16: int32, int32, int64, float32, float64 },
  int64: { int8: int64, int16: int64, int32: int64, int64, float32, float64 },
  float32: { int8: float32, int16: float32, int32: float32, int64: float32, float32, float64 },
  float64: { int8: float64, int16: float64, int32: float64, int64: float64, float32: float64, float64 },
}

/**
 * The representation two representations promote to: `float64` wins, then
 * `float32`, then the wider integral kind.
 *
 * @category Promotion
 * @since 0.1.0
 */
export const common = <A extends Name, B extends Name>(
  self: Representation<A>,
  that: Representation<B>,
): Representation<Common<A, B>> => {
  const row: { readonly [K in Name]: Representation<Common<A, K>> } = table[self.name]
  return row[that.name]
}
