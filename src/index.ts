/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./Types.js"
export * from "./Rational.js"
export * from "./Complex.js"
export * from "./Dimension.js"
export * from "./UnitConverter.js"
export * from "./Unit.js"
export * from "./Si.js"
export * from "./Units.js"
export * as Numeric from "./Numeric.js"
export * from "./Quantity.js"
export * from "./UncertainComponent.js"
export * from "./CUncertainComponent.js"
export * from "./UncertaintyContext.js"
export * from "./Uncertainty.js"
