/**
 * @since 0.1.0
 */
export * from "./Errors.js"

/**
 * @since 0.1.0
 */
export * as Scale from "./Scale.js"

/**
 * @since 0.1.0
 */
export * as Representation from "./Representation.js"

/**
 * @since 0.1.0
 */
export * as Dimension from "./Dimension.js"

/**
 * @since 0.1.0
 */
export * as Unit from "./Unit.js"

/**
 * @since 0.1.0
 */
export * as Quantity from "./Quantity.js"

/**
 * @since 0.1.0
 */
export * as Algebra from "./Algebra.js"

/**
 * @since 0.1.0
 */
export * as DurationBridge from "./DurationBridge.js"

/**
 * @since 0.1.0
 */
export * as Display from "./Display.js"
