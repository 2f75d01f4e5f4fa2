/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./Units.js"
export * from "./Quantity.js"
export * from "./Config.js"
export * from "./Measurement.js"
