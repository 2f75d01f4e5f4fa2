/**
 * Error hierarchy for quantity measurement.
 *
 * Every failure is a tagged error so callers can pattern match with
 * `Effect.catchTag`. Malformed user input is not an error: parsing reports
 * `Option.none()` instead.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import type { Category } from "./Units.js"

/**
 * Raised when a value is NaN or infinite.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new InvalidValueError({ value: Number.NaN })
 * yield* Effect.fail(error)
 * ```
 */
export class InvalidValueError extends Data.TaggedError("InvalidValueError")<{
  readonly value: number
}> {
  override get message(): string {
    return `Invalid value: ${this.value}. Value must be a finite number.`
  }
}

/**
 * Raised when a category does not support the requested operation, such as
 * adding two temperatures or asking for a linear factor of a non-linear unit.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnsupportedOperationError extends Data.TaggedError("UnsupportedOperationError")<{
  readonly operation: string
  readonly category: Category
  readonly reason: string
}> {
  override get message(): string {
    return `${this.category} units do not support ${this.operation}: ${this.reason}`
  }
}

/**
 * Raised when the divisor of a quantity division is zero in base units.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DivisionByZeroError extends Data.TaggedError("DivisionByZeroError")<{
  readonly dividend: number
}> {
  override get message(): string {
    return `Cannot divide ${this.dividend} by a zero quantity`
  }
}

/**
 * Raised when a required quantity argument is missing.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NullArgumentError extends Data.TaggedError("NullArgumentError")<{
  readonly argument: string
}> {
  override get message(): string {
    return `Argument "${this.argument}" must not be null or undefined`
  }
}

/**
 * Raised when a unit symbol or name is not part of a category.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitNotFoundError extends Data.TaggedError("UnitNotFoundError")<{
  readonly category: Category
  readonly symbol: string
}> {
  override get message(): string {
    return `Unknown ${this.category.toLowerCase()} unit "${this.symbol}"`
  }
}

/**
 * Union of all errors an arithmetic operation can produce.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ArithmeticError = InvalidValueError | UnsupportedOperationError | DivisionByZeroError
