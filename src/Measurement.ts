/**
 * Measurement service: the stateless façade used by user-facing layers.
 *
 * Every operation is generic over the unit category. Passing quantities of
 * two categories to one call does not type-check, because `Quantity` is
 * invariant in its category.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, Option, Predicate } from "effect"
import { MeasurementConfig, measurementConfig } from "./Config.js"
import type {
  DivisionByZeroError,
  InvalidValueError,
  UnsupportedOperationError,
} from "./Errors.js"
import { NullArgumentError } from "./Errors.js"
import { roundTo, tryParseNumber } from "./internal/number.js"
import { Quantity, quantityEquivalence } from "./Quantity.js"
import { convert, type Category, type Unit } from "./Units.js"

type Operand<C extends Category> = Quantity<C> | null | undefined

type CombineError = NullArgumentError | UnsupportedOperationError | InvalidValueError

export interface MeasurementServiceShape {
  readonly config: MeasurementConfig
  /**
   * `None` for missing, blank, non-numeric or non-finite input.
   */
  readonly parseQuantity: <C extends Category>(
    input: string | null | undefined,
    unit: Unit<C>,
  ) => Effect.Effect<Option.Option<Quantity<C>>>
  /**
   * `false` when either operand is missing.
   */
  readonly areEqual: <C extends Category>(first: Operand<C>, second: Operand<C>) => Effect.Effect<boolean>
  readonly convertValue: <C extends Category>(
    value: number,
    source: Unit<C>,
    target: Unit<NoInfer<C>>,
  ) => Effect.Effect<number, InvalidValueError>
  readonly add: <C extends Category>(first: Operand<C>, second: Operand<C>) => Effect.Effect<Quantity<C>, CombineError>
  readonly addWithTarget: <C extends Category>(
    first: Operand<C>,
    second: Operand<C>,
    target: Unit<NoInfer<C>>,
  ) => Effect.Effect<Quantity<C>, CombineError>
  readonly subtract: <C extends Category>(
    first: Operand<C>,
    second: Operand<C>,
  ) => Effect.Effect<Quantity<C>, CombineError>
  readonly subtractWithTarget: <C extends Category>(
    first: Operand<C>,
    second: Operand<C>,
    target: Unit<NoInfer<C>>,
  ) => Effect.Effect<Quantity<C>, CombineError>
  readonly divide: <C extends Category>(
    first: Operand<C>,
    second: Operand<C>,
  ) => Effect.Effect<number, CombineError | DivisionByZeroError>
}

const requireOperands = <C extends Category>(
  first: Operand<C>,
  second: Operand<C>,
): Effect.Effect<readonly [Quantity<C>, Quantity<C>], NullArgumentError> => {
  if (Predicate.isNullable(first)) {
    return Effect.fail(new NullArgumentError({ argument: "first" }))
  }
  if (Predicate.isNullable(second)) {
    return Effect.fail(new NullArgumentError({ argument: "second" }))
  }
  return Effect.succeed([first, second] as const)
}

const logged =
  (operation: string, annotations: Record<string, unknown>) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    self.pipe(
      Effect.tap((result) =>
        Effect.logDebug(`${operation} completed`).pipe(Effect.annotateLogs({ result: String(result) })),
      ),
      Effect.tapError(() => Effect.logDebug(`${operation} failed`)),
      Effect.annotateLogs({ operation, ...annotations }),
    )

const operandAnnotations = <C extends Category>(first: Operand<C>, second: Operand<C>) => ({
  first: String(first),
  second: String(second),
})

/**
 * Build the service for a given configuration.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeMeasurementService = (config: MeasurementConfig): MeasurementServiceShape => {
  const finish = <C extends Category>(quantity: Quantity<C>): Effect.Effect<Quantity<C>, InvalidValueError> =>
    config.resultDecimals === undefined
      ? Effect.succeed(quantity)
      : Quantity.make(roundTo(quantity.value, config.resultDecimals), quantity.unit)

  const parseQuantity = <C extends Category>(
    input: string | null | undefined,
    unit: Unit<C>,
  ): Effect.Effect<Option.Option<Quantity<C>>> =>
    Option.match(tryParseNumber(input), {
      onNone: () => Effect.succeed(Option.none<Quantity<C>>()),
      onSome: (value) => Effect.option(Quantity.make(value, unit)),
    }).pipe(
      Effect.tap((parsed) =>
        Option.isNone(parsed)
          ? Effect.logDebug("Rejected quantity input").pipe(
              Effect.annotateLogs({ input: String(input), unit: unit.symbol }),
            )
          : Effect.void,
      ),
    )

  const areEqual = <C extends Category>(first: Operand<C>, second: Operand<C>): Effect.Effect<boolean> => {
    const equivalence = quantityEquivalence<C>(config.tolerance)
    return Effect.succeed(
      Predicate.isNotNullable(first) && Predicate.isNotNullable(second) && equivalence(first, second),
    ).pipe(logged("areEqual", operandAnnotations(first, second)))
  }

  const convertValue = <C extends Category>(
    value: number,
    source: Unit<C>,
    target: Unit<NoInfer<C>>,
  ): Effect.Effect<number, InvalidValueError> =>
    Effect.flatMap(Quantity.make(value, source), (quantity) => convert(quantity.unit, target, quantity.value)).pipe(
      logged("convertValue", { value, source: source.symbol, target: target.symbol }),
    )

  const addWithTarget = <C extends Category>(
    first: Operand<C>,
    second: Operand<C>,
    target: Unit<NoInfer<C>>,
  ): Effect.Effect<Quantity<C>, CombineError> =>
    requireOperands(first, second).pipe(
      Effect.flatMap(([a, b]) => a.add(b, target)),
      Effect.flatMap((quantity) => finish(quantity)),
      logged("add", { ...operandAnnotations(first, second), target: target.symbol }),
    )

  const add = <C extends Category>(first: Operand<C>, second: Operand<C>): Effect.Effect<Quantity<C>, CombineError> =>
    requireOperands(first, second).pipe(
      Effect.flatMap(([a, b]) => a.add(b)),
      Effect.flatMap((quantity) => finish(quantity)),
      logged("add", operandAnnotations(first, second)),
    )

  const subtractWithTarget = <C extends Category>(
    first: Operand<C>,
    second: Operand<C>,
    target: Unit<NoInfer<C>>,
  ): Effect.Effect<Quantity<C>, CombineError> =>
    requireOperands(first, second).pipe(
      Effect.flatMap(([a, b]) => a.subtract(b, target)),
      Effect.flatMap((quantity) => finish(quantity)),
      logged("subtract", { ...operandAnnotations(first, second), target: target.symbol }),
    )

  const subtract = <C extends Category>(
    first: Operand<C>,
    second: Operand<C>,
  ): Effect.Effect<Quantity<C>, CombineError> =>
    requireOperands(first, second).pipe(
      Effect.flatMap(([a, b]) => a.subtract(b)),
      Effect.flatMap((quantity) => finish(quantity)),
      logged("subtract", operandAnnotations(first, second)),
    )

  const divide = <C extends Category>(
    first: Operand<C>,
    second: Operand<C>,
  ): Effect.Effect<number, CombineError | DivisionByZeroError> =>
    requireOperands(first, second).pipe(
      Effect.flatMap(([a, b]) => a.divide(b)),
      logged("divide", operandAnnotations(first, second)),
    )

  return {
    config,
    parseQuantity,
    areEqual,
    convertValue,
    add,
    addWithTarget,
    subtract,
    subtractWithTarget,
    divide,
  }
}

/**
 * @category Services
 * @since 0.1.0
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const measurement = yield* MeasurementService
 *   const a = Quantity.unsafeMake(2, Length.YARD)
 *   const b = Quantity.unsafeMake(36, Length.INCH)
 *   return yield* measurement.addWithTarget(a, b, Length.FEET) // 9 ft
 * }).pipe(Effect.provide(MeasurementService.Default))
 * ```
 */
export class MeasurementService extends Context.Tag("quantity-measurement/MeasurementService")<
  MeasurementService,
  MeasurementServiceShape
>() {
  /**
   * Reads {@link MeasurementConfig} from the current `ConfigProvider`.
   */
  static readonly layer = Layer.effect(this, Effect.map(measurementConfig, makeMeasurementService))

  static layerWith(config: MeasurementConfig) {
    return Layer.succeed(this, makeMeasurementService(config))
  }

  static readonly Default = Layer.succeed(this, makeMeasurementService(MeasurementConfig.defaults))
}
