import { Effect, Option } from "effect"
import { MeasurementService } from "../src/Measurement.js"
import { Quantity } from "../src/Quantity.js"
import { Length, Temperature, Volume, formatUnit } from "../src/Units.js"

const program = Effect.gen(function* () {
  const measurement = yield* MeasurementService

  const flour = yield* measurement.parseQuantity("1.5", Volume.LITRE)
  const milk = Quantity.unsafeMake(250, Volume.MILLILITRE)
  const total = yield* Option.match(flour, {
    onNone: () => Effect.succeed(milk),
    onSome: (litres) => measurement.addWithTarget(litres, milk, Volume.MILLILITRE),
  })
  yield* Effect.logInfo(`Combined volume: ${total}`)

  const oven = yield* measurement.convertValue(180, Temperature.CELSIUS, Temperature.FAHRENHEIT)
  yield* Effect.logInfo(`Oven: ${oven.toFixed(0)} in ${formatUnit(Temperature.FAHRENHEIT)}`)

  const tray = Quantity.unsafeMake(30, Length.CENTIMETER)
  const sameTray = yield* measurement.areEqual(tray, Quantity.unsafeMake(11.811024, Length.INCH))
  yield* Effect.logInfo(`30 cm equals 11.811024 in: ${sameTray}`)

  yield* Quantity.unsafeMake(20, Temperature.CELSIUS)
    .add(Quantity.unsafeMake(5, Temperature.CELSIUS))
    .pipe(Effect.catchTag("UnsupportedOperationError", (error) => Effect.logWarning(error.message)))
}).pipe(Effect.provide(MeasurementService.layer))

Effect.runPromise(program).catch((error) => {
  console.error("Failed to run kitchen conversions", error)
  process.exitCode = 1
})
