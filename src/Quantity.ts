/**
 * Quantities: a finite value bound to a unit of one category.
 *
 * The category is a type parameter, and `Quantity` is invariant in it, so a
 * length and a weight can never meet in the same equality or arithmetic
 * call. All operations return new instances; arithmetic is carried out in
 * the category's base unit and converted to the requested unit afterwards.
 *
 * Equality is tolerance based (`|a - b| < 1e-6` in base units). The hash is
 * derived from the base value rounded to six decimals, so two quantities
 * that compare equal can still hash differently near a rounding boundary.
 * Do not use quantities as keys of hash-based collections.
 *
 * @since 0.1.0
 */

import { Effect, Equal, Equivalence, Hash, identity, Inspectable } from "effect"
import type { Types } from "effect"
import { DivisionByZeroError, InvalidValueError, UnsupportedOperationError } from "./Errors.js"
import { ensureFinite } from "./internal/number.js"
import { baseValue, fromBase, validateOperationSupport, type Category, type Unit } from "./Units.js"

/**
 * @category Symbols
 * @since 0.1.0
 */
export const QuantityTypeId: unique symbol = Symbol.for("quantity-measurement/Quantity")

/**
 * @category Symbols
 * @since 0.1.0
 */
export type QuantityTypeId = typeof QuantityTypeId

/**
 * Absolute tolerance for quantity equality, in base units.
 *
 * @category Equality
 * @since 0.1.0
 */
export const DEFAULT_TOLERANCE = 1e-6

const ZERO_DIVISOR_THRESHOLD = 1e-9
const HASH_SCALE = 1e6

/**
 * @category Models
 * @since 0.1.0
 */
export interface QuantityVariance<C extends Category> {
  readonly _C: Types.Invariant<C>
}

const variance = { _C: identity }

/**
 * A finite value expressed in a unit of category `C`.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const yard = Quantity.unsafeMake(1, Length.YARD)
 * yard.equals(Quantity.unsafeMake(3, Length.FEET)) // true
 * ```
 */
export class Quantity<C extends Category> implements Equal.Equal, Inspectable.Inspectable {
  readonly [QuantityTypeId]: QuantityVariance<C> = variance

  private constructor(
    readonly value: number,
    readonly unit: Unit<C>,
  ) {}

  /**
   * Fails with `InvalidValueError` when `value` is NaN or infinite.
   */
  static make<C extends Category>(value: number, unit: Unit<C>): Effect.Effect<Quantity<C>, InvalidValueError> {
    return Effect.map(ensureFinite(value), (finite) => new Quantity(finite, unit))
  }

  /**
   * Like {@link Quantity.make}, throwing the `InvalidValueError`.
   */
  static unsafeMake<C extends Category>(value: number, unit: Unit<C>): Quantity<C> {
    if (!Number.isFinite(value)) {
      throw new InvalidValueError({ value })
    }
    return new Quantity(value, unit)
  }

  /**
   * The value expressed in the category's base unit.
   */
  get inBase(): number {
    return baseValue(this.unit, this.value)
  }

  convertTo(target: Unit<C>): Effect.Effect<Quantity<C>, InvalidValueError> {
    if (Equal.equals(target, this.unit)) {
      return Effect.succeed(new Quantity(this.value, target))
    }
    return Effect.flatMap(fromBase(target, this.inBase), (value) => Quantity.make(value, target))
  }

  convertToScalar(target: Unit<C>): Effect.Effect<number, InvalidValueError> {
    return Effect.map(this.convertTo(target), (converted) => converted.value)
  }

  /**
   * Sum of both quantities, expressed in `target` (this quantity's unit by
   * default).
   */
  add(
    other: Quantity<C>,
    target: Unit<C> = this.unit,
  ): Effect.Effect<Quantity<C>, UnsupportedOperationError | InvalidValueError> {
    return this.combine("addition", other, target, (a, b) => a + b)
  }

  subtract(
    other: Quantity<C>,
    target: Unit<C> = this.unit,
  ): Effect.Effect<Quantity<C>, UnsupportedOperationError | InvalidValueError> {
    return this.combine("subtraction", other, target, (a, b) => a - b)
  }

  /**
   * Dimensionless ratio of the two base values.
   */
  divide(
    other: Quantity<C>,
  ): Effect.Effect<number, UnsupportedOperationError | DivisionByZeroError | InvalidValueError> {
    const ratio: Effect.Effect<number, DivisionByZeroError | InvalidValueError> =
      Math.abs(other.inBase) < ZERO_DIVISOR_THRESHOLD
        ? Effect.fail(new DivisionByZeroError({ dividend: this.value }))
        : ensureFinite(this.inBase / other.inBase)
    return validateOperationSupport(this.unit, "division").pipe(Effect.zipRight(ratio))
  }

  /**
   * Tolerance equality in base units. Anything that is not a quantity of the
   * same category is unequal.
   */
  equals(other: unknown): boolean {
    if (this === other) {
      return true
    }
    if (!isQuantity(other) || other.unit.category !== this.unit.category) {
      return false
    }
    return withinTolerance(this, other, DEFAULT_TOLERANCE)
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return this.equals(that)
  }

  [Hash.symbol](): number {
    return Hash.cached(
      this,
      Hash.combine(Hash.string(this.unit.category))(Hash.number(Math.round(this.inBase * HASH_SCALE))),
    )
  }

  toString(): string {
    return `${this.value} ${this.unit.symbol}`
  }

  toJSON(): unknown {
    return {
      _id: "Quantity",
      value: this.value,
      unit: this.unit.symbol,
      category: this.unit.category,
    }
  }

  [Inspectable.NodeInspectSymbol](): unknown {
    return this.toJSON()
  }

  // Operands already in the target unit are combined as-is, so values near
  // the float limit do not overflow on the way through the base unit.
  private combine(
    operation: string,
    other: Quantity<C>,
    target: Unit<C>,
    f: (self: number, that: number) => number,
  ): Effect.Effect<Quantity<C>, UnsupportedOperationError | InvalidValueError> {
    const result: Effect.Effect<number, InvalidValueError> =
      Equal.equals(this.unit, target) && Equal.equals(other.unit, target)
        ? Effect.succeed(f(this.value, other.value))
        : fromBase(target, f(this.inBase, other.inBase))
    return validateOperationSupport(this.unit, operation).pipe(
      Effect.zipRight(result),
      Effect.flatMap((value) => Quantity.make(value, target)),
    )
  }
}

/**
 * @category Guards
 * @since 0.1.0
 */
export const isQuantity = (u: unknown): u is Quantity<Category> => u instanceof Quantity

// Base values of huge quantities can overflow; same-unit pairs then compare
// their own values, and overflowed pairs across units are unequal.
const withinTolerance = <A extends Category, B extends Category>(
  self: Quantity<A>,
  that: Quantity<B>,
  tolerance: number,
): boolean => {
  const selfInBase = self.inBase
  const thatInBase = that.inBase
  if (Number.isFinite(selfInBase) && Number.isFinite(thatInBase)) {
    return Math.abs(selfInBase - thatInBase) < tolerance
  }
  return Equal.equals(self.unit, that.unit) && Math.abs(self.value - that.value) < tolerance
}

/**
 * Tolerance equivalence for quantities of one category.
 *
 * @category Equality
 * @since 0.1.0
 */
export const quantityEquivalence = <C extends Category>(
  tolerance: number = DEFAULT_TOLERANCE,
): Equivalence.Equivalence<Quantity<C>> =>
  Equivalence.make((self, that) => withinTolerance(self, that, tolerance))
