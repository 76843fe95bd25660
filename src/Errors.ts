/**
 * Error hierarchy for the unit algebra.
 *
 * Nearly every misuse of the algebra is rejected by the compiler. These
 * tagged errors cover the operations whose types were widened (for example a
 * `Unit.Any` built at runtime) and the scale half of the narrowing guard.
 * They are thrown by the synchronous API and can be recovered with
 * `Effect.catchTag` once lifted into an effect.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised when a conversion could silently drop a fractional part into an
 * integral representation.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new NarrowingConversionError({ source: "time<int64, 1/1000000000>", target: "time<int64, 1>" })
 * ```
 */
export class NarrowingConversionError extends Data.TaggedError("NarrowingConversionError")<{
  readonly source: string
  readonly target: string
}> {
  override get message(): string {
    return `Conversion from ${this.source} to ${this.target} may truncate a fractional value`
  }
}

/**
 * Raised by compound assignment when both operands are not the very same unit.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitMismatchError extends Data.TaggedError("UnitMismatchError")<{
  readonly expected: string
  readonly actual: string
}> {
  override get message(): string {
    return `Expected a quantity of ${this.expected}, received ${this.actual}`
  }
}

/**
 * Raised when two quantities of different dimensions meet in a
 * same-dimension operation.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DimensionMismatchError extends Data.TaggedError("DimensionMismatchError")<{
  readonly expected: string
  readonly actual: string
}> {
  override get message(): string {
    return `Dimension "${this.actual}" is not "${this.expected}"`
  }
}

/**
 * Raised when no relation is declared for a pair of dimensions.
 *
 * @category Errors
 * @since 0.1.0
 */
export class MissingRelationError extends Data.TaggedError("MissingRelationError")<{
  readonly operation: "multiply" | "divide"
  readonly left: string
  readonly right: string
}> {
  override get message(): string {
    const operator = this.operation === "multiply" ? "*" : "/"
    return `No relation declared for ${this.left} ${operator} ${this.right}`
  }
}

/**
 * Raised when a relation would remap a pair that already has a different
 * result.
 *
 * @category Errors
 * @since 0.1.0
 */
export class RelationConflictError extends Data.TaggedError("RelationConflictError")<{
  readonly relation: string
  readonly existing: string
  readonly proposed: string
}> {
  override get message(): string {
    return `Relation ${this.relation} already yields ${this.existing}, cannot redeclare it as ${this.proposed}`
  }
}

/**
 * Raised when a dimension without the duration flag is bridged to a
 * `Duration`.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NonDurationDimensionError extends Data.TaggedError("NonDurationDimensionError")<{
  readonly dimension: string
}> {
  override get message(): string {
    return `Dimension "${this.dimension}" is not duration-compatible`
  }
}

/**
 * Raised when an infinite `Duration` is converted into a quantity.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InfiniteDurationError extends Data.TaggedError("InfiniteDurationError")<{
  readonly dimension: string
}> {
  override get message(): string {
    return `An infinite duration has no "${this.dimension}" count`
  }
}

/**
 * Raised when a negative quantity is converted into a `Duration`, which
 * cannot hold one.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NegativeDurationError extends Data.TaggedError("NegativeDurationError")<{
  readonly dimension: string
  readonly count: string
}> {
  override get message(): string {
    return `A duration cannot hold the negative "${this.dimension}" count ${this.count}`
  }
}

/**
 * Raised when an infinite or NaN floating count is cast into an integral
 * representation.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NonFiniteCountError extends Data.TaggedError("NonFiniteCountError")<{
  readonly count: string
  readonly representation: string
}> {
  override get message(): string {
    return `The count ${this.count} has no ${this.representation} value`
  }
}

/**
 * Raised when a user dimension is declared under the dimensionless marker's
 * name.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ReservedDimensionError extends Data.TaggedError("ReservedDimensionError")<{
  readonly name: string
}> {
  override get message(): string {
    return `Dimension name "${this.name}" is reserved`
  }
}

/**
 * Union of all unit algebra errors.
 *
 * @category Errors
 * @since 0.1.0
 */
export type UnitAlgebraError =
  | NarrowingConversionError
  | UnitMismatchError
  | DimensionMismatchError
  | MissingRelationError
  | RelationConflictError
  | NonDurationDimensionError
  | InfiniteDurationError
  | NegativeDurationError
  | NonFiniteCountError
  | ReservedDimensionError
