import { describe, it, expect } from "@effect/vitest"
import { Effect, Equal, Hash } from "effect"
import { InvalidValueError } from "../src/Errors.js"
import { Quantity, isQuantity, quantityEquivalence } from "../src/Quantity.js"
import { Length, Temperature, Volume, Weight } from "../src/Units.js"

describe("Quantity", () => {
  describe("construction", () => {
    it.effect("keeps value and unit", () =>
      Effect.gen(function* () {
        const quantity = yield* Quantity.make(2.5, Weight.GRAM)
        expect(quantity.value).toBe(2.5)
        expect(quantity.unit).toBe(Weight.GRAM)
      }),
    )

    it.effect("rejects NaN", () =>
      Effect.gen(function* () {
        const error = yield* Quantity.make(Number.NaN, Length.FEET).pipe(Effect.flip)
        expect(error).toBeInstanceOf(InvalidValueError)
      }),
    )

    it("throws on infinity when constructed unsafely", () => {
      expect(() => Quantity.unsafeMake(Number.NEGATIVE_INFINITY, Volume.LITRE)).toThrow(InvalidValueError)
    })

    it("recognises quantities", () => {
      expect(isQuantity(Quantity.unsafeMake(1, Length.FEET))).toBe(true)
      expect(isQuantity({ value: 1, unit: Length.FEET })).toBe(false)
    })
  })

  describe("conversion", () => {
    it.effect("converts to a new quantity in the target unit", () =>
      Effect.gen(function* () {
        const yard = Quantity.unsafeMake(1, Length.YARD)
        const feet = yield* yard.convertTo(Length.FEET)
        expect(feet.value).toBeCloseTo(3)
        expect(feet.unit).toBe(Length.FEET)
        expect(yard.value).toBe(1)
      }),
    )

    it.effect("converts to a raw number", () =>
      Effect.gen(function* () {
        const inches = Quantity.unsafeMake(36, Length.INCH)
        expect(yield* inches.convertToScalar(Length.YARD)).toBeCloseTo(1)
      }),
    )

    it.effect("converts temperatures through Celsius", () =>
      Effect.gen(function* () {
        const body = Quantity.unsafeMake(98.6, Temperature.FAHRENHEIT)
        expect(yield* body.convertToScalar(Temperature.CELSIUS)).toBeCloseTo(37)
      }),
    )

    it.effect("fails when the converted value overflows", () =>
      Effect.gen(function* () {
        const huge = Quantity.unsafeMake(1e308, Length.YARD)
        const error = yield* huge.convertTo(Length.INCH).pipe(Effect.flip)
        expect(error).toBeInstanceOf(InvalidValueError)
        expect(error.value).toBe(Number.POSITIVE_INFINITY)
      }),
    )

    it.effect("keeps huge values when converting to their own unit", () =>
      Effect.gen(function* () {
        const huge = Quantity.unsafeMake(1e308, Length.YARD)
        const same = yield* huge.convertTo(Length.YARD)
        expect(same.value).toBe(1e308)
        expect(same.unit).toBe(Length.YARD)
      }),
    )
  })

  describe("equality", () => {
    const yard = Quantity.unsafeMake(1, Length.YARD)

    it("treats one yard as three feet", () => {
      expect(yard.equals(Quantity.unsafeMake(3, Length.FEET))).toBe(true)
    })

    it("distinguishes values beyond the tolerance", () => {
      expect(yard.equals(Quantity.unsafeMake(3.01, Length.FEET))).toBe(false)
    })

    it("is reflexive and symmetric", () => {
      const feet = Quantity.unsafeMake(3, Length.FEET)
      expect(yard.equals(yard)).toBe(true)
      expect(feet.equals(yard)).toBe(yard.equals(feet))
    })

    it("absorbs conversion rounding", () => {
      expect(Quantity.unsafeMake(1, Length.INCH).equals(Quantity.unsafeMake(2.54, Length.CENTIMETER))).toBe(true)
      expect(Quantity.unsafeMake(1, Weight.KILOGRAM).equals(Quantity.unsafeMake(1000, Weight.GRAM))).toBe(true)
      expect(Quantity.unsafeMake(1, Volume.LITRE).equals(Quantity.unsafeMake(1000, Volume.MILLILITRE))).toBe(true)
    })

    it("matches Celsius and Fahrenheit at minus forty", () => {
      const minusForty = Quantity.unsafeMake(-40, Temperature.CELSIUS)
      expect(minusForty.equals(Quantity.unsafeMake(-40, Temperature.FAHRENHEIT))).toBe(true)
      const freezing = Quantity.unsafeMake(0, Temperature.CELSIUS)
      expect(freezing.equals(Quantity.unsafeMake(273.15, Temperature.KELVIN))).toBe(true)
    })

    it("is false across categories and for other values", () => {
      expect(Quantity.unsafeMake(1, Length.FEET).equals(Quantity.unsafeMake(1, Weight.KILOGRAM))).toBe(false)
      expect(yard.equals("1 yd")).toBe(false)
      expect(yard.equals(null)).toBe(false)
    })

    it("compares quantities whose base value overflows", () => {
      const huge = Quantity.unsafeMake(1e308, Length.YARD)
      expect(huge.equals(Quantity.unsafeMake(1e308, Length.YARD))).toBe(true)
      expect(huge.equals(Quantity.unsafeMake(9e307, Length.YARD))).toBe(false)
      expect(huge.equals(Quantity.unsafeMake(1e308, Length.INCH))).toBe(false)
      expect(quantityEquivalence<"Length">()(huge, Quantity.unsafeMake(1e308, Length.YARD))).toBe(true)
    })

    it("plugs into Effect's Equal and Hash", () => {
      const feet = Quantity.unsafeMake(3, Length.FEET)
      expect(Equal.equals(yard, feet)).toBe(true)
      expect(Hash.hash(yard)).toBe(Hash.hash(feet))
    })

    it("builds an equivalence with a custom tolerance", () => {
      const loose = quantityEquivalence<"Length">(0.1)
      expect(loose(Quantity.unsafeMake(1, Length.FEET), Quantity.unsafeMake(1.05, Length.FEET))).toBe(true)
      expect(loose(Quantity.unsafeMake(1, Length.FEET), Quantity.unsafeMake(1.2, Length.FEET))).toBe(false)
    })
  })

  describe("formatting", () => {
    it("renders value and symbol", () => {
      expect(Quantity.unsafeMake(2, Length.FEET).toString()).toBe("2 ft")
      expect(String(Quantity.unsafeMake(-40, Temperature.CELSIUS))).toBe("-40 °C")
    })

    it("serialises to JSON", () => {
      expect(JSON.parse(JSON.stringify(Quantity.unsafeMake(1.5, Volume.GALLON)))).toStrictEqual({
        _id: "Quantity",
        value: 1.5,
        unit: "gal",
        category: "Volume",
      })
    })
  })
})
