import { describe, expect, expectTypeOf, it } from "vitest"
import { MeasurementConfig } from "../src/Config.js"
import { makeMeasurementService } from "../src/Measurement.js"
import { Quantity } from "../src/Quantity.js"
import { Length, Weight, type Unit } from "../src/Units.js"

describe("Quantity typing", () => {
  it("is invariant in its category", () => {
    expectTypeOf<Quantity<"Length">>().not.toMatchTypeOf<Quantity<"Length" | "Weight">>()
    expectTypeOf<Quantity<"Length" | "Weight">>().not.toMatchTypeOf<Quantity<"Length">>()
    expectTypeOf<Quantity<"Length">>().toMatchTypeOf<Quantity<"Length">>()
    expectTypeOf(Length.FEET).toMatchTypeOf<Unit<"Length">>()
    expectTypeOf(Length.FEET).not.toMatchTypeOf<Unit<"Weight">>()
  })

  it("rejects mixed categories at compile time", () => {
    const service = makeMeasurementService(MeasurementConfig.defaults)
    const length = Quantity.unsafeMake(1, Length.FEET)
    const weight = Quantity.unsafeMake(1, Weight.KILOGRAM)

    // Never invoked: each call only has to fail type-checking.
    const calls = [
      // @ts-expect-error a length and a weight cannot be added
      () => service.add(length, weight),
      // @ts-expect-error a length and a weight cannot be compared
      () => service.areEqual(length, weight),
      // @ts-expect-error the target unit must share the source's category
      () => service.convertValue(1, Length.FEET, Weight.GRAM),
      // @ts-expect-error a length and a weight cannot be added
      () => length.add(weight),
    ]
    expect(calls).toHaveLength(4)
  })
})
