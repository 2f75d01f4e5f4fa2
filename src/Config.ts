/**
 * Configuration for the measurement service.
 *
 * Values are read through Effect's `Config`, which defaults to environment
 * variables. Tests and embedders can provide a `ConfigProvider` or build a
 * {@link MeasurementConfig} directly.
 *
 * @since 0.1.0
 */

import { Config, Option, Schema } from "effect"
import { DEFAULT_TOLERANCE } from "./Quantity.js"

const MAX_RESULT_DECIMALS = 15

/**
 * Settings that shape how the service compares and reports quantities.
 *
 * - `tolerance`: absolute base-unit tolerance used by `areEqual`.
 * - `resultDecimals`: when set, sums and differences are rounded half away
 *   from zero to this many decimals.
 *
 * @category Models
 * @since 0.1.0
 */
export class MeasurementConfig extends Schema.Class<MeasurementConfig>("MeasurementConfig")({
  tolerance: Schema.Number.pipe(Schema.finite(), Schema.greaterThan(0)),
  resultDecimals: Schema.optional(
    Schema.Int.pipe(Schema.greaterThanOrEqualTo(0), Schema.lessThanOrEqualTo(MAX_RESULT_DECIMALS)),
  ),
}) {
  static readonly defaults = new MeasurementConfig({ tolerance: DEFAULT_TOLERANCE })
}

/**
 * Reads `MEASUREMENT_TOLERANCE` (default `1e-6`) and the optional
 * `MEASUREMENT_RESULT_DECIMALS`.
 *
 * @category Config
 * @since 0.1.0
 */
export const measurementConfig: Config.Config<MeasurementConfig> = Config.all({
  tolerance: Config.number("MEASUREMENT_TOLERANCE").pipe(
    Config.validate({
      message: "Expected a positive, finite tolerance",
      validation: (tolerance: number) => Number.isFinite(tolerance) && tolerance > 0,
    }),
    Config.withDefault(DEFAULT_TOLERANCE),
  ),
  resultDecimals: Config.option(
    Config.integer("MEASUREMENT_RESULT_DECIMALS").pipe(
      Config.validate({
        message: `Expected an integer between 0 and ${MAX_RESULT_DECIMALS}`,
        validation: (decimals: number) => decimals >= 0 && decimals <= MAX_RESULT_DECIMALS,
      }),
    ),
  ),
}).pipe(
  Config.map(
    ({ tolerance, resultDecimals }) =>
      new MeasurementConfig({ tolerance, resultDecimals: Option.getOrUndefined(resultDecimals) }),
  ),
)
