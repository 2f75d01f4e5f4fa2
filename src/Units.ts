/**
 * Unit descriptors for the four measurement categories.
 *
 * Each category owns a closed catalogue of units. A unit carries its
 * conversion law relative to the category's base unit (feet, kilogram,
 * litre, Celsius): a fixed factor for linear categories, or a pair of
 * closed-form formulas for temperature. Units are never registered at run
 * time.
 *
 * @since 0.1.0
 */

import { Array as Arr, Data, Effect, Option } from "effect"
import { InvalidValueError, UnitNotFoundError, UnsupportedOperationError } from "./Errors.js"
import { ensureFinite } from "./internal/number.js"

/**
 * A closed grouping of mutually convertible units.
 *
 * @category Models
 * @since 0.1.0
 */
export type Category = "Length" | "Weight" | "Volume" | "Temperature"

/**
 * All categories, in declaration order.
 *
 * @category Models
 * @since 0.1.0
 */
export const categories: ReadonlyArray<Category> = ["Length", "Weight", "Volume", "Temperature"]

/**
 * How a unit relates to its category's base unit.
 *
 * @category Models
 * @since 0.1.0
 */
export type Conversion = Data.TaggedEnum<{
  Linear: { readonly factor: number }
  Formula: {
    readonly toBase: (value: number) => number
    readonly fromBase: (valueInBase: number) => number
  }
}>

/**
 * Constructors and matchers for {@link Conversion}.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const Conversion = Data.taggedEnum<Conversion>()

/**
 * A unit of measure belonging to category `C`.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Unit<C extends Category = Category> {
  readonly category: C
  readonly name: string
  readonly symbol: string
  readonly conversion: Conversion
}

export type LengthUnit = Unit<"Length">
export type WeightUnit = Unit<"Weight">
export type VolumeUnit = Unit<"Volume">
export type TemperatureUnit = Unit<"Temperature">

const makeUnit = <C extends Category>(
  category: C,
  name: string,
  symbol: string,
  conversion: Conversion,
): Unit<C> => Data.struct({ category, name, symbol, conversion })

const linear = <C extends Category>(category: C, name: string, symbol: string, factor: number): Unit<C> =>
  makeUnit(category, name, symbol, Conversion.Linear({ factor }))

/**
 * Length units, based on feet.
 *
 * @category Units
 * @since 0.1.0
 */
export const Length = {
  FEET: linear("Length", "feet", "ft", 1.0),
  INCH: linear("Length", "inches", "in", 1.0 / 12.0),
  YARD: linear("Length", "yards", "yd", 3.0),
  CENTIMETER: linear("Length", "centimeters", "cm", 1.0 / (2.54 * 12.0)),
} as const

/**
 * Weight units, based on kilograms.
 *
 * @category Units
 * @since 0.1.0
 */
export const Weight = {
  KILOGRAM: linear("Weight", "kilograms", "kg", 1.0),
  GRAM: linear("Weight", "grams", "g", 0.001),
  POUND: linear("Weight", "pounds", "lb", 0.45359237),
} as const

/**
 * Volume units, based on litres.
 *
 * @category Units
 * @since 0.1.0
 */
export const Volume = {
  LITRE: linear("Volume", "litres", "L", 1.0),
  MILLILITRE: linear("Volume", "millilitres", "mL", 0.001),
  GALLON: linear("Volume", "gallons", "gal", 3.78541),
} as const

/**
 * Temperature units, based on Celsius. Conversions are affine, so no single
 * factor describes them.
 *
 * @category Units
 * @since 0.1.0
 */
export const Temperature = {
  CELSIUS: makeUnit(
    "Temperature",
    "Celsius",
    "°C",
    Conversion.Formula({ toBase: (celsius) => celsius, fromBase: (celsius) => celsius }),
  ),
  FAHRENHEIT: makeUnit(
    "Temperature",
    "Fahrenheit",
    "°F",
    Conversion.Formula({
      toBase: (fahrenheit) => ((fahrenheit - 32) * 5) / 9,
      fromBase: (celsius) => (celsius * 9) / 5 + 32,
    }),
  ),
  KELVIN: makeUnit(
    "Temperature",
    "Kelvin",
    "K",
    Conversion.Formula({ toBase: (kelvin) => kelvin - 273.15, fromBase: (celsius) => celsius + 273.15 }),
  ),
} as const

const catalog: { readonly [C in Category]: ReadonlyArray<Unit<C>> } = {
  Length: Object.values(Length),
  Weight: Object.values(Weight),
  Volume: Object.values(Volume),
  Temperature: Object.values(Temperature),
}

const arithmeticSupport = {
  Length: true,
  Weight: true,
  Volume: true,
  Temperature: false,
} as const satisfies Record<Category, boolean>

/**
 * Every unit of a category, in declaration order.
 *
 * @category Lookup
 * @since 0.1.0
 */
export const unitsOf = <C extends Category>(category: C): ReadonlyArray<Unit<C>> => catalog[category]

const normalizeSymbol = (symbol: string): string => symbol.trim().toLowerCase()

/**
 * Look up a unit of `category` by symbol or name, ignoring case and
 * surrounding whitespace.
 *
 * @category Lookup
 * @since 0.1.0
 */
export const findUnit = <C extends Category>(
  category: C,
  symbol: string,
): Effect.Effect<Unit<C>, UnitNotFoundError> => {
  const wanted = normalizeSymbol(symbol)
  return Option.match(
    Arr.findFirst(
      unitsOf(category),
      (unit) => normalizeSymbol(unit.symbol) === wanted || normalizeSymbol(unit.name) === wanted,
    ),
    {
      onNone: () => Effect.fail(new UnitNotFoundError({ category, symbol })),
      onSome: Effect.succeed,
    },
  )
}

/**
 * Apply the unit's conversion law without validating the input. Callers must
 * already hold a finite value.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const baseValue = (unit: Unit, value: number): number =>
  Conversion.$match(unit.conversion, {
    Linear: ({ factor }) => value * factor,
    Formula: ({ toBase }) => toBase(value),
  })

/**
 * Inverse of {@link baseValue}.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const fromBaseValue = (unit: Unit, valueInBase: number): number =>
  Conversion.$match(unit.conversion, {
    Linear: ({ factor }) => valueInBase / factor,
    Formula: ({ fromBase }) => fromBase(valueInBase),
  })

/**
 * Express `value` (given in `unit`) in the category's base unit.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const toBase = (unit: Unit, value: number): Effect.Effect<number, InvalidValueError> =>
  Effect.map(ensureFinite(value), (finite) => baseValue(unit, finite))

/**
 * Express a base-unit value in `unit`.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const fromBase = (unit: Unit, valueInBase: number): Effect.Effect<number, InvalidValueError> =>
  Effect.map(ensureFinite(valueInBase), (finite) => fromBaseValue(unit, finite))

/**
 * Convert a value between two units of the same category, passing through
 * the base unit.
 *
 * @category Conversions
 * @since 0.1.0
 * @example
 * ```ts
 * const feet = yield* convert(Length.YARD, Length.FEET, 2) // 6
 * ```
 */
export const convert = <C extends Category>(
  source: Unit<C>,
  target: Unit<NoInfer<C>>,
  value: number,
): Effect.Effect<number, InvalidValueError> =>
  Effect.flatMap(toBase(source, value), (inBase) => fromBase(target, inBase))

/**
 * Linear factor relative to the base unit. Temperature units have none.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const conversionFactor = (unit: Unit): Effect.Effect<number, UnsupportedOperationError> =>
  Conversion.$match(unit.conversion, {
    Linear: ({ factor }) => Effect.succeed(factor),
    Formula: () =>
      Effect.fail(
        new UnsupportedOperationError({
          operation: "conversion factor",
          category: unit.category,
          reason: "non-linear conversion, use toBase/fromBase instead",
        }),
      ),
  })

/**
 * Whether the unit's category allows addition, subtraction and division.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const supportsArithmetic = (unit: Unit): boolean => arithmeticSupport[unit.category]

/**
 * Succeeds when `operation` is allowed for the unit's category.
 *
 * @category Arithmetic
 * @since 0.1.0
 */
export const validateOperationSupport = (
  unit: Unit,
  operation: string,
): Effect.Effect<void, UnsupportedOperationError> =>
  supportsArithmetic(unit)
    ? Effect.void
    : Effect.fail(
        new UnsupportedOperationError({
          operation,
          category: unit.category,
          reason: "absolute values cannot be added, subtracted or divided; only comparison and conversion apply",
        }),
      )

/**
 * Human-readable label, e.g. `"feet (ft)"`.
 *
 * @category Formatting
 * @since 0.1.0
 */
export const formatUnit = (unit: Unit): string => `${unit.name} (${unit.symbol})`
