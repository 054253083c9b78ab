/**
 * Quantities: a value tied to a unit.
 *
 * The value may be any member of the numeric tower other than a quantity or
 * a unit, including uncertain components, so unit bookkeeping and
 * uncertainty propagation happen in the same expression.
 *
 * @since 0.1.0
 */

import { Equal, Hash } from "effect"
import type { Complex } from "./Complex.js"
import { CUncertainComponent } from "./CUncertainComponent.js"
import type { Dimension } from "./Dimension.js"
import { UnsupportedOperationError } from "./Errors.js"
import {
  binary,
  equals as numericEquals,
  isClose as numericIsClose,
  applyConverter,
  toQuantityValue,
  unary,
  type BinaryOperation,
  type CloseOptions,
  type Numeric,
  type NumericArray,
  type UnaryOperation,
} from "./Numeric.js"
import { RationalNumber, toRational } from "./Rational.js"
import { UncertainComponent } from "./UncertainComponent.js"
import { ONE, Unit } from "./Unit.js"

/**
 * Values a quantity can carry.
 *
 * @category Models
 * @since 0.1.0
 */
export type QuantityValue = number | RationalNumber | Complex | UncertainComponent | CUncertainComponent | NumericArray

const formatValue = (value: QuantityValue): string =>
  typeof value === "object" && "map" in value ? `[${value.join(", ")}]` : value.toString()

/**
 * Immutable (unit, value) pair.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const distance = new Quantity(METER, 1200)
 * distance.to(KILOMETER).toString() // "6/5 km"
 * ```
 */
export class Quantity implements Equal.Equal {
  readonly _tag = "Quantity"

  constructor(
    readonly unit: Unit,
    readonly value: QuantityValue,
  ) {
    const candidate: unknown = value
    if (candidate instanceof Quantity || candidate instanceof Unit) {
      throw new UnsupportedOperationError({
        operation: "Quantity",
        left: String(candidate),
        reason: "a quantity cannot carry a quantity or a unit as its value",
      })
    }
  }

  /**
   * Unit the value is expressed in, as derived by the operations that
   * produced this quantity.
   */
  getDefaultUnit(): Unit {
    return this.unit
  }

  getDimension(): Dimension {
    return this.unit.dimension
  }

  isDimensionless(): boolean {
    return this.unit.dimension.isDimensionless()
  }

  isCompatible(that: Quantity | Unit): boolean {
    return this.unit.isCompatible(that instanceof Quantity ? that.unit : that)
  }

  /**
   * The value converted to `unit`. Fails with `IncompatibleUnitsError` when
   * the dimensions differ.
   */
  valueIn(unit: Unit): QuantityValue {
    return unit.equals(this.unit) ? this.value : applyConverter(this.unit.getConverterTo(unit), this.value)
  }

  to(unit: Unit): Quantity {
    return new Quantity(unit, this.valueIn(unit))
  }

  add(that: Numeric): Quantity {
    return this.binary("add", lift(that))
  }

  subtract(that: Numeric): Quantity {
    return this.binary("subtract", lift(that))
  }

  multiply(that: Numeric): Quantity {
    return this.binary("multiply", lift(that))
  }

  divide(that: Numeric): Quantity {
    return this.binary("divide", lift(that))
  }

  /**
   * Raise to a dimensionless, certain exponent. Dimensioned quantities need an
   * exponent with an exact rational form.
   */
  power(exponent: Numeric): Quantity {
    return this.binary("power", lift(exponent))
  }

  /** Two-argument arctangent of `this / x`, as a dimensionless angle in radians. */
  atan2(x: Numeric): Quantity {
    return this.binary("atan2", lift(x))
  }

  hypot(that: Numeric): Quantity {
    return this.binary("hypot", lift(that))
  }

  /**
   * Combine with another quantity. Addition-like operations convert `that` to
   * this quantity's unit; multiplication and division combine units.
   */
  binary(operation: BinaryOperation, that: Quantity): Quantity {
    switch (operation) {
      case "add":
      case "subtract":
      case "hypot":
        return new Quantity(this.unit, toQuantityValue(binary(operation, this.value, that.valueIn(this.unit))))
      case "atan2":
        return new Quantity(ONE, toQuantityValue(binary(operation, this.value, that.valueIn(this.unit))))
      case "multiply":
        return new Quantity(this.unit.multiply(that.unit), toQuantityValue(binary(operation, this.value, that.value)))
      case "divide":
        return new Quantity(this.unit.divide(that.unit), toQuantityValue(binary(operation, this.value, that.value)))
      case "power":
        return this.#power(that)
    }
  }

  #power(that: Quantity): Quantity {
    if (that.value instanceof UncertainComponent || that.value instanceof CUncertainComponent) {
      throw new UnsupportedOperationError({
        operation: "power",
        left: this.toString(),
        right: that.toString(),
        reason: "exponents of quantities must not be uncertain",
      })
    }
    const exponent = that.valueIn(ONE)
    if (this.isDimensionless()) {
      return new Quantity(ONE, toQuantityValue(binary("power", this.valueIn(ONE), exponent)))
    }
    if (!(typeof exponent === "number" || exponent instanceof RationalNumber)) {
      throw new UnsupportedOperationError({
        operation: "power",
        left: this.toString(),
        right: that.toString(),
        reason: "dimensioned quantities need a real exponent",
      })
    }
    return new Quantity(
      this.unit.pow(toRational(exponent, "Quantity.power")),
      toQuantityValue(binary("power", this.value, exponent)),
    )
  }

  negate(): Quantity {
    return this.unary("negate")
  }

  abs(): Quantity {
    return this.unary("abs")
  }

  /** Square root; the unit is raised to 1/2. */
  sqrt(): Quantity {
    return this.unary("sqrt")
  }

  exp(): Quantity {
    return this.unary("exp")
  }

  log(): Quantity {
    return this.unary("log")
  }

  log10(): Quantity {
    return this.unary("log10")
  }

  sin(): Quantity {
    return this.unary("sin")
  }

  cos(): Quantity {
    return this.unary("cos")
  }

  tan(): Quantity {
    return this.unary("tan")
  }

  asin(): Quantity {
    return this.unary("asin")
  }

  acos(): Quantity {
    return this.unary("acos")
  }

  atan(): Quantity {
    return this.unary("atan")
  }

  sinh(): Quantity {
    return this.unary("sinh")
  }

  cosh(): Quantity {
    return this.unary("cosh")
  }

  tanh(): Quantity {
    return this.unary("tanh")
  }

  conjugate(): Quantity {
    return this.unary("conjugate")
  }

  real(): Quantity {
    return this.unary("real")
  }

  imag(): Quantity {
    return this.unary("imag")
  }

  /** Phase angle of the value, in radians. */
  arg(): Quantity {
    return this.unary("arg")
  }

  /**
   * Apply a unary operation. Sign and part operations keep the unit;
   * transcendental functions need a dimensionless quantity and return one.
   */
  unary(operation: UnaryOperation): Quantity {
    switch (operation) {
      case "negate":
      case "abs":
      case "conjugate":
      case "real":
      case "imag":
        return new Quantity(this.unit, toQuantityValue(unary(operation, this.value)))
      case "sqrt":
        return new Quantity(this.unit.sqrt(), toQuantityValue(unary(operation, this.value)))
      case "arg":
        return new Quantity(ONE, toQuantityValue(unary(operation, this.value)))
      default:
        return new Quantity(ONE, toQuantityValue(unary(operation, this.valueIn(ONE))))
    }
  }

  /**
   * Equal when the units are convertible and the converted values are equal.
   * Uncertain values compare by nominal value.
   */
  equals(that: Quantity): boolean {
    return this.isCompatible(that) && numericEquals(this.value, that.valueIn(this.unit))
  }

  isClose(that: Quantity, options: Partial<CloseOptions> = {}): boolean {
    return this.isCompatible(that) && numericIsClose(this.value, that.valueIn(this.unit), options)
  }

  toString(): string {
    const value = formatValue(this.value)
    return this.unit.equals(ONE) ? value : `${value} ${this.unit.toString()}`
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof Quantity && this.equals(that)
  }

  [Hash.symbol](): number {
    return Hash.string(this.unit.dimension.toString())
  }
}

const lift = (value: Numeric): Quantity => (value instanceof Quantity ? value : new Quantity(ONE, toQuantityValue(value)))

/**
 * Type guard for quantities.
 *
 * @category Guards
 * @since 0.1.0
 */
export const isQuantity = (value: unknown): value is Quantity => value instanceof Quantity
