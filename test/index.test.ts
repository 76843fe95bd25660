import { describe, expect, it } from "vitest"
import * as QuantityAlgebra from "../src/index.js"

describe("public API export surface", () => {
  it("exposes core modules", () => {
    expect(QuantityAlgebra).toHaveProperty("Scale")
    expect(QuantityAlgebra).toHaveProperty("Representation")
    expect(QuantityAlgebra).toHaveProperty("Dimension")
    expect(QuantityAlgebra).toHaveProperty("Unit")
    expect(QuantityAlgebra).toHaveProperty("Quantity")
    expect(QuantityAlgebra).toHaveProperty("Algebra")
    expect(QuantityAlgebra).toHaveProperty("DurationBridge")
    expect(QuantityAlgebra).toHaveProperty("Display")
    expect(QuantityAlgebra).toHaveProperty("NarrowingConversionError")
    expect(QuantityAlgebra).toHaveProperty("MissingRelationError")
  })
})
