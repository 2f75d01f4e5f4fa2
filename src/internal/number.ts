import { Effect, Option, Schema } from "effect"
import { InvalidValueError } from "../Errors.js"

const decodeNumber = Schema.decodeUnknownOption(Schema.NumberFromString)

export const ensureFinite = (value: number): Effect.Effect<number, InvalidValueError> =>
  Number.isFinite(value) ? Effect.succeed(value) : Effect.fail(new InvalidValueError({ value }))

/**
 * Try-parse user input. Blank and non-numeric strings yield `None`; the
 * literals `NaN` and `Infinity` parse, and are rejected later on construction.
 */
export const tryParseNumber = (input: string | null | undefined): Option.Option<number> => {
  if (input === null || input === undefined) {
    return Option.none()
  }
  const trimmed = input.trim()
  return trimmed === "" ? Option.none() : decodeNumber(trimmed)
}

// Half away from zero. Values too large to scale have no fractional digits.
export const roundTo = (value: number, decimals: number): number => {
  const scale = 10 ** decimals
  const scaled = Math.abs(value) * scale
  if (!Number.isFinite(scaled)) {
    return value
  }
  return (Math.sign(value) * Math.round(scaled)) / scale
}
