/**
 * The numeric coercion tower.
 *
 * Every value taking part in arithmetic belongs to one kind of the closed
 * `NumericKind` enumeration. A binary operation promotes both operands to
 * the common kind named by `promote`, or fails with
 * `UnsupportedOperationError` when the pair has none.
 *
 * | A | B | common kind |
 * |---|---|---|
 * | integer | integer | integer |
 * | rational | integer | rational |
 * | rational | float, complex, quantity, uncertain, complexUncertain | B |
 * | rational | array, unit | - |
 * | float | integer, float | float |
 * | complex | integer, float, complex | complex |
 * | array | integer, float, array | array |
 * | array | complex | - |
 * | quantity | anything but unit | quantity |
 * | uncertain | integer, rational, float | uncertain |
 * | uncertain | complex, complexUncertain, array, unit | - |
 * | complexUncertain | integer, rational, float, complex | complexUncertain |
 * | complexUncertain | array, unit | - |
 * | unit | unit | unit |
 *
 * @since 0.1.0
 */

import { Complex } from "./Complex.js"
import { CUncertainComponent, complexConstant } from "./CUncertainComponent.js"
import { DivisionByZeroError, UnsupportedOperationError } from "./Errors.js"
import { Quantity, type QuantityValue } from "./Quantity.js"
import { RationalNumber } from "./Rational.js"
import type { NumericKind } from "./Types.js"
import { REAL_OPERATORS, UncertainComponent, constant } from "./UncertainComponent.js"
import { ONE, Unit } from "./Unit.js"
import type { UnitConverter } from "./UnitConverter.js"

/**
 * Element-wise numeric array.
 *
 * @category Models
 * @since 0.1.0
 */
export type NumericArray = ReadonlyArray<number>

/**
 * Any member of the tower.
 *
 * @category Models
 * @since 0.1.0
 */
export type Numeric =
  | number
  | RationalNumber
  | Complex
  | Quantity
  | UncertainComponent
  | CUncertainComponent
  | NumericArray
  | Unit

/**
 * @category Operations
 * @since 0.1.0
 */
export type BinaryOperation = "add" | "subtract" | "multiply" | "divide" | "power" | "atan2" | "hypot"

/**
 * @category Operations
 * @since 0.1.0
 */
export type UnaryOperation =
  | "negate"
  | "abs"
  | "sqrt"
  | "exp"
  | "log"
  | "log10"
  | "sin"
  | "cos"
  | "tan"
  | "asin"
  | "acos"
  | "atan"
  | "sinh"
  | "cosh"
  | "tanh"
  | "conjugate"
  | "real"
  | "imag"
  | "arg"

/**
 * Tolerances for `isClose`, with the semantics of a relative-or-absolute
 * comparison: `|a - b| <= max(relativeTolerance * max(|a|, |b|), absoluteTolerance)`.
 *
 * @category Configuration
 * @since 0.1.0
 */
export interface CloseOptions {
  readonly relativeTolerance: number
  readonly absoluteTolerance: number
}

/**
 * @category Configuration
 * @since 0.1.0
 */
export const defaultCloseOptions: CloseOptions = Object.freeze({
  relativeTolerance: 1e-9,
  absoluteTolerance: 0,
})

/**
 * @category Guards
 * @since 0.1.0
 */
export const isNumericArray = (value: unknown): value is NumericArray =>
  Array.isArray(value) && value.every((element) => typeof element === "number")

/**
 * Classify a value.
 *
 * @category Kinds
 * @since 0.1.0
 */
export const kindOf = (value: Numeric): NumericKind => {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) ? "integer" : "float"
  }
  if (value instanceof RationalNumber) {
    return "rational"
  }
  if (value instanceof Complex) {
    return "complex"
  }
  if (value instanceof Quantity) {
    return "quantity"
  }
  if (value instanceof UncertainComponent) {
    return "uncertain"
  }
  if (value instanceof CUncertainComponent) {
    return "complexUncertain"
  }
  if (value instanceof Unit) {
    return "unit"
  }
  return "array"
}

const RANK: Readonly<Record<NumericKind, number>> = {
  integer: 0,
  rational: 1,
  float: 2,
  complex: 3,
  array: 4,
  uncertain: 5,
  complexUncertain: 6,
  quantity: 7,
  unit: 8,
}

const promoteOrdered = (low: NumericKind, high: NumericKind): NumericKind | undefined => {
  switch (high) {
    case "integer":
    case "rational":
    case "float":
    case "complex":
    case "quantity":
      return high
    case "array":
      return low === "rational" || low === "complex" ? undefined : "array"
    case "uncertain":
      return low === "complex" || low === "array" ? undefined : "uncertain"
    case "complexUncertain":
      return low === "array" || low === "uncertain" ? undefined : "complexUncertain"
    case "unit":
      return low === "unit" ? "unit" : undefined
  }
}

/**
 * Common kind of a pair, or `undefined` when the pair cannot be combined.
 * Symmetric in its arguments.
 *
 * @category Kinds
 * @since 0.1.0
 * @example
 * ```ts
 * promote("rational", "float") // "float"
 * promote("uncertain", "complex") // undefined
 * ```
 */
export const promote = (left: NumericKind, right: NumericKind): NumericKind | undefined =>
  RANK[left] <= RANK[right] ? promoteOrdered(left, right) : promoteOrdered(right, left)

const describe = (value: Numeric): string => `${kindOf(value)} ${String(value)}`

const cannotCoerce = (value: Numeric, kind: NumericKind): UnsupportedOperationError =>
  new UnsupportedOperationError({ operation: "coerce", left: describe(value), reason: `no conversion to ${kind}` })

const asRational = (value: Numeric): RationalNumber => {
  if (value instanceof RationalNumber) {
    return value
  }
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return RationalNumber.fromInteger(value)
  }
  throw cannotCoerce(value, "rational")
}

const asFloat = (value: Numeric): number => {
  if (typeof value === "number") {
    return value
  }
  if (value instanceof RationalNumber) {
    return value.toNumber()
  }
  throw cannotCoerce(value, "float")
}

const asComplex = (value: Numeric): Complex =>
  value instanceof Complex ? value : new Complex(asFloat(value), 0)

const asArrayOperand = (value: Numeric): number | NumericArray => (isNumericArray(value) ? value : asFloat(value))

const asUncertain = (value: Numeric): UncertainComponent =>
  value instanceof UncertainComponent ? value : constant(asFloat(value))

const asComplexUncertain = (value: Numeric): CUncertainComponent =>
  value instanceof CUncertainComponent ? value : complexConstant(asComplex(value))

const asQuantity = (value: Numeric): Quantity =>
  value instanceof Quantity ? value : new Quantity(ONE, toQuantityValue(value))

const asUnit = (value: Numeric): Unit => {
  if (value instanceof Unit) {
    return value
  }
  throw cannotCoerce(value, "unit")
}

/**
 * Narrow a tower member to a value a `Quantity` can carry.
 *
 * @internal
 */
export const toQuantityValue = (value: Numeric): QuantityValue => {
  if (value instanceof Quantity || value instanceof Unit) {
    throw new UnsupportedOperationError({
      operation: "Quantity",
      left: describe(value),
      reason: "a quantity cannot carry a quantity or a unit as its value",
    })
  }
  return value
}

/**
 * Convert a value to the representation of `kind`: integers become exact
 * fractions, reals gain a zero imaginary part, plain numbers become constant
 * uncertain inputs, and anything becomes a dimensionless quantity.
 *
 * @category Kinds
 * @since 0.1.0
 */
export const coerce = (value: Numeric, kind: NumericKind): Numeric => {
  switch (kind) {
    case "integer":
      if (kindOf(value) !== "integer") {
        throw cannotCoerce(value, kind)
      }
      return value
    case "rational":
      return asRational(value)
    case "float":
      return asFloat(value)
    case "complex":
      return asComplex(value)
    case "array":
      return asArrayOperand(value)
    case "uncertain":
      return asUncertain(value)
    case "complexUncertain":
      return asComplexUncertain(value)
    case "quantity":
      return asQuantity(value)
    case "unit":
      return asUnit(value)
  }
}

const divisionByZero = (operation: string, dividend: Numeric): DivisionByZeroError =>
  new DivisionByZeroError({ operation, dividend: String(dividend) })

const exactly = (x: number, y: number) => [RationalNumber.fromInteger(x), RationalNumber.fromInteger(y)] as const

/**
 * Integer arithmetic on safe integers. A sum, difference, product or power
 * that leaves the safe range is recomputed over `bigint` and returned as an
 * integral `RationalNumber`; a power too large for a double stays a float.
 */
const integerBinary = (operation: BinaryOperation, x: number, y: number): Numeric => {
  switch (operation) {
    case "add": {
      const sum = x + y
      return Number.isSafeInteger(sum) ? sum : rationalBinary(operation, ...exactly(x, y))
    }
    case "subtract": {
      const difference = x - y
      return Number.isSafeInteger(difference) ? difference : rationalBinary(operation, ...exactly(x, y))
    }
    case "multiply": {
      const product = x * y
      return Number.isSafeInteger(product) ? product : rationalBinary(operation, ...exactly(x, y))
    }
    case "divide":
      if (y === 0) {
        throw divisionByZero(operation, x)
      }
      return x % y === 0 ? x / y : RationalNumber.make(x, y)
    case "power": {
      if (y < 0) {
        return RationalNumber.fromInteger(x).pow(y)
      }
      const power = x ** y
      return Number.isSafeInteger(power) || !Number.isFinite(power) ? power : RationalNumber.fromInteger(x).pow(y)
    }
    case "atan2":
      return Math.atan2(x, y)
    case "hypot":
      return Math.hypot(x, y)
  }
}

const rationalBinary = (operation: BinaryOperation, x: RationalNumber, y: RationalNumber): Numeric => {
  switch (operation) {
    case "add":
      return x.add(y)
    case "subtract":
      return x.subtract(y)
    case "multiply":
      return x.multiply(y)
    case "divide":
      return x.divide(y)
    case "power":
      return y.isInteger() ? x.pow(Number(y.numerator)) : Math.pow(x.toNumber(), y.toNumber())
    case "atan2":
      return Math.atan2(x.toNumber(), y.toNumber())
    case "hypot":
      return Math.hypot(x.toNumber(), y.toNumber())
  }
}

const floatBinary = (operation: BinaryOperation, x: number, y: number): number => {
  switch (operation) {
    case "add":
      return x + y
    case "subtract":
      return x - y
    case "multiply":
      return x * y
    case "divide":
      return x / y
    case "power":
      return Math.pow(x, y)
    case "atan2":
      return Math.atan2(x, y)
    case "hypot":
      return Math.hypot(x, y)
  }
}

const complexBinary = (operation: BinaryOperation, z: Complex, w: Complex): Numeric => {
  switch (operation) {
    case "add":
      return z.add(w)
    case "subtract":
      return z.subtract(w)
    case "multiply":
      return z.multiply(w)
    case "divide":
      return z.divide(w)
    case "power":
      return z.pow(w)
    case "atan2":
    case "hypot":
      throw new UnsupportedOperationError({
        operation,
        left: describe(z),
        right: describe(w),
        reason: "only defined for real operands",
      })
  }
}

const arrayBinary = (operation: BinaryOperation, x: number | NumericArray, y: number | NumericArray): NumericArray => {
  if (typeof x === "number") {
    return typeof y === "number" ? [floatBinary(operation, x, y)] : y.map((element) => floatBinary(operation, x, element))
  }
  if (typeof y === "number") {
    return x.map((element) => floatBinary(operation, element, y))
  }
  if (x.length !== y.length) {
    throw new UnsupportedOperationError({
      operation,
      left: `array of length ${x.length}`,
      right: `array of length ${y.length}`,
      reason: "element-wise operations need equal lengths",
    })
  }
  return x.map((element, i) => floatBinary(operation, element, y[i] ?? Number.NaN))
}

const complexUncertainBinary = (
  operation: BinaryOperation,
  z: CUncertainComponent,
  w: CUncertainComponent,
): Numeric => {
  switch (operation) {
    case "add":
    case "subtract":
    case "multiply":
    case "divide":
    case "power":
      return z.apply(operation, w)
    case "atan2":
    case "hypot":
      throw new UnsupportedOperationError({
        operation,
        left: describe(z),
        right: describe(w),
        reason: "only defined for real operands",
      })
  }
}

const unitBinary = (operation: BinaryOperation, x: Unit, y: Unit): Numeric => {
  switch (operation) {
    case "multiply":
      return x.multiply(y)
    case "divide":
      return x.divide(y)
    default:
      throw new UnsupportedOperationError({
        operation,
        left: describe(x),
        right: describe(y),
        reason: "units only multiply and divide",
      })
  }
}

/**
 * Apply a binary operation after promoting both operands to their common
 * kind.
 *
 * @category Operations
 * @since 0.1.0
 * @example
 * ```ts
 * binary("divide", 1, 3) // RationalNumber 1/3
 * binary("add", RationalNumber.make(1, 2), 0.25) // 0.75
 * ```
 */
export const binary = (operation: BinaryOperation, left: Numeric, right: Numeric): Numeric => {
  const kind = promote(kindOf(left), kindOf(right))
  switch (kind) {
    case undefined:
      throw new UnsupportedOperationError({
        operation,
        left: describe(left),
        right: describe(right),
        reason: `no common kind for ${kindOf(left)} and ${kindOf(right)}`,
      })
    case "integer":
      return integerBinary(operation, asFloat(left), asFloat(right))
    case "rational":
      return rationalBinary(operation, asRational(left), asRational(right))
    case "float":
      return floatBinary(operation, asFloat(left), asFloat(right))
    case "complex":
      return complexBinary(operation, asComplex(left), asComplex(right))
    case "array":
      return arrayBinary(operation, asArrayOperand(left), asArrayOperand(right))
    case "uncertain":
      return asUncertain(left).apply(operation, asUncertain(right))
    case "complexUncertain":
      return complexUncertainBinary(operation, asComplexUncertain(left), asComplexUncertain(right))
    case "quantity":
      return asQuantity(left).binary(operation, asQuantity(right))
    case "unit":
      return unitBinary(operation, asUnit(left), asUnit(right))
  }
}

const floatUnary = (operation: UnaryOperation, x: number): number => {
  switch (operation) {
    case "conjugate":
    case "real":
      return x
    case "imag":
      return 0
    case "arg":
      return x < 0 ? Math.PI : 0
    default:
      return REAL_OPERATORS[operation].evaluate(x)
  }
}

const exactUnary = (operation: UnaryOperation, x: number | RationalNumber): Numeric => {
  switch (operation) {
    case "negate":
      return typeof x === "number" ? -x : x.negate()
    case "abs":
      return typeof x === "number" ? Math.abs(x) : x.abs()
    case "conjugate":
    case "real":
      return x
    default:
      return floatUnary(operation, typeof x === "number" ? x : x.toNumber())
  }
}

const complexUnary = (operation: UnaryOperation, z: Complex): Numeric => {
  switch (operation) {
    case "negate":
      return z.negate()
    case "abs":
      return z.abs()
    case "sqrt":
      return z.sqrt()
    case "exp":
      return z.exp()
    case "log":
      return z.log()
    case "log10":
      return z.log().scale(1 / Math.LN10)
    case "sin":
      return z.sin()
    case "cos":
      return z.cos()
    case "tan":
      return z.tan()
    case "conjugate":
      return z.conjugate()
    case "real":
      return z.re
    case "imag":
      return z.im
    case "arg":
      return z.arg()
    default:
      throw new UnsupportedOperationError({ operation, left: describe(z), reason: "not implemented for complex values" })
  }
}

const uncertainUnary = (operation: UnaryOperation, x: UncertainComponent): Numeric => {
  switch (operation) {
    case "conjugate":
    case "real":
      return x
    case "imag":
      return 0
    case "arg":
      return x.value < 0 ? Math.PI : 0
    default:
      return x.apply(operation)
  }
}

const complexUncertainUnary = (operation: UnaryOperation, z: CUncertainComponent): Numeric => {
  switch (operation) {
    case "negate":
    case "abs":
    case "sqrt":
    case "exp":
    case "log":
    case "sin":
    case "cos":
    case "tan":
    case "conjugate":
    case "real":
    case "imag":
    case "arg":
      return z.apply(operation)
    case "log10":
      return z.log().divide(Math.LN10)
    default:
      throw new UnsupportedOperationError({
        operation,
        left: describe(z),
        reason: "not implemented for complex uncertain values",
      })
  }
}

/**
 * Apply a unary operation. Exact kinds stay exact under `negate` and `abs`;
 * other real functions evaluate in floating point.
 *
 * @category Operations
 * @since 0.1.0
 */
export const unary = (operation: UnaryOperation, value: Numeric): Numeric => {
  if (typeof value === "number" || value instanceof RationalNumber) {
    return exactUnary(operation, value)
  }
  if (value instanceof Complex) {
    return complexUnary(operation, value)
  }
  if (value instanceof Quantity) {
    return value.unary(operation)
  }
  if (value instanceof UncertainComponent) {
    return uncertainUnary(operation, value)
  }
  if (value instanceof CUncertainComponent) {
    return complexUncertainUnary(operation, value)
  }
  if (value instanceof Unit) {
    throw new UnsupportedOperationError({ operation, left: describe(value), reason: "units have no unary operations" })
  }
  return value.map((element) => floatUnary(operation, element))
}

/** @category Operations */
export const add = (left: Numeric, right: Numeric): Numeric => binary("add", left, right)
/** @category Operations */
export const subtract = (left: Numeric, right: Numeric): Numeric => binary("subtract", left, right)
/** @category Operations */
export const multiply = (left: Numeric, right: Numeric): Numeric => binary("multiply", left, right)
/** @category Operations */
export const divide = (left: Numeric, right: Numeric): Numeric => binary("divide", left, right)
/** @category Operations */
export const power = (left: Numeric, right: Numeric): Numeric => binary("power", left, right)
/** @category Operations */
export const atan2 = (y: Numeric, x: Numeric): Numeric => binary("atan2", y, x)
/** @category Operations */
export const hypot = (left: Numeric, right: Numeric): Numeric => binary("hypot", left, right)
/** @category Operations */
export const negate = (value: Numeric): Numeric => unary("negate", value)
/** @category Operations */
export const abs = (value: Numeric): Numeric => unary("abs", value)
/** @category Operations */
export const sqrt = (value: Numeric): Numeric => unary("sqrt", value)
/** @category Operations */
export const exp = (value: Numeric): Numeric => unary("exp", value)
/** @category Operations */
export const log = (value: Numeric): Numeric => unary("log", value)
/** @category Operations */
export const sin = (value: Numeric): Numeric => unary("sin", value)
/** @category Operations */
export const cos = (value: Numeric): Numeric => unary("cos", value)
/** @category Operations */
export const conjugate = (value: Numeric): Numeric => unary("conjugate", value)

/**
 * Nominal real value, ignoring unit and uncertainty.
 */
const nominalReal = (value: Numeric): number => {
  if (value instanceof UncertainComponent) {
    return value.value
  }
  if (value instanceof Quantity) {
    return nominalReal(value.value)
  }
  return asFloat(value)
}

const nominalComplex = (value: Numeric): Complex =>
  value instanceof CUncertainComponent ? value.value : asComplex(value instanceof UncertainComponent ? value.value : value)

const sameArrays = (x: number | NumericArray, y: number | NumericArray, compare: (a: number, b: number) => boolean) => {
  const left = typeof x === "number" ? [x] : x
  const right = typeof y === "number" ? [y] : y
  if (left.length !== right.length && left.length !== 1 && right.length !== 1) {
    return false
  }
  const length = Math.max(left.length, right.length)
  for (let i = 0; i < length; i++) {
    const a = left.length === 1 ? left[0] : left[i]
    const b = right.length === 1 ? right[0] : right[i]
    if (a === undefined || b === undefined || !compare(a, b)) {
      return false
    }
  }
  return true
}

/**
 * Value equality across kinds. Uncertain components compare by nominal
 * value; pairs without a common kind are unequal.
 *
 * @category Comparisons
 * @since 0.1.0
 */
export const equals = (left: Numeric, right: Numeric): boolean => {
  switch (promote(kindOf(left), kindOf(right))) {
    case undefined:
      return false
    case "integer":
    case "float":
      return asFloat(left) === asFloat(right)
    case "rational":
      return asRational(left).equals(asRational(right))
    case "complex":
      return asComplex(left).equals(asComplex(right))
    case "array":
      return sameArrays(asArrayOperand(left), asArrayOperand(right), (a, b) => a === b)
    case "uncertain":
      return nominalReal(left) === nominalReal(right)
    case "complexUncertain":
      return nominalComplex(left).equals(nominalComplex(right))
    case "quantity":
      return asQuantity(left).equals(asQuantity(right))
    case "unit":
      return asUnit(left).equals(asUnit(right))
  }
}

const closeReals = (x: number, y: number, options: CloseOptions): boolean =>
  x === y ||
  Math.abs(x - y) <= Math.max(options.relativeTolerance * Math.max(Math.abs(x), Math.abs(y)), options.absoluteTolerance)

const closeComplex = (z: Complex, w: Complex, options: CloseOptions): boolean =>
  z.equals(w) ||
  z.subtract(w).abs() <= Math.max(options.relativeTolerance * Math.max(z.abs(), w.abs()), options.absoluteTolerance)

/**
 * Approximate equality with relative and absolute tolerances.
 *
 * @category Comparisons
 * @since 0.1.0
 */
export const isClose = (left: Numeric, right: Numeric, options: Partial<CloseOptions> = {}): boolean => {
  const resolved: CloseOptions = { ...defaultCloseOptions, ...options }
  switch (promote(kindOf(left), kindOf(right))) {
    case undefined:
      return false
    case "integer":
    case "rational":
    case "float":
    case "uncertain":
      return closeReals(nominalReal(left), nominalReal(right), resolved)
    case "complex":
    case "complexUncertain":
      return closeComplex(nominalComplex(left), nominalComplex(right), resolved)
    case "array":
      return sameArrays(asArrayOperand(left), asArrayOperand(right), (a, b) => closeReals(a, b, resolved))
    case "quantity":
      return asQuantity(left).isClose(asQuantity(right), resolved)
    case "unit":
      return asUnit(left).equals(asUnit(right))
  }
}

const exactOrFloat = (value: Numeric): QuantityValue =>
  value instanceof RationalNumber && value.isInteger() && Number.isSafeInteger(value.toNumber())
    ? value.toNumber()
    : toQuantityValue(value)

/**
 * Apply a unit converter to a quantity value. Exact values stay exact under
 * exact factors; uncertain values gain constant operation nodes.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const applyConverter = (converter: UnitConverter, value: QuantityValue): QuantityValue =>
  converter.steps().reduce<QuantityValue>((current, step) => {
    switch (step._tag) {
      case "Rational": {
        const kind = kindOf(current)
        const factor = kind === "integer" || kind === "rational" ? step.factor : step.factor.toNumber()
        return exactOrFloat(binary("multiply", current, factor))
      }
      case "Multiply":
        return toQuantityValue(binary("multiply", current, step.factor))
      case "Add":
        return toQuantityValue(binary("add", current, step.offset))
    }
  }, value)

/**
 * Element-wise helper that takes its result kind from the first argument
 * and does not consult the tower: the second argument is reduced to its
 * nominal real value (unit and uncertainty are dropped). `mapArrays(f, a, b)`
 * and `mapArrays(f, b, a)` may therefore differ in kind.
 *
 * @category Operations
 * @since 0.1.0
 * @example
 * ```ts
 * mapArrays(Math.atan2, [1, -1], 1) // [π/4, -π/4]
 * mapArrays(Math.atan2, 1, [1, -1]) // throws UnsupportedOperationError
 * ```
 */
export const mapArrays = (
  f: (x: number, y: number) => number,
  left: Numeric,
  right: Numeric,
): number | NumericArray => {
  if (isNumericArray(left)) {
    if (isNumericArray(right)) {
      if (right.length !== left.length) {
        throw new UnsupportedOperationError({
          operation: "mapArrays",
          left: `array of length ${left.length}`,
          right: `array of length ${right.length}`,
          reason: "element-wise operations need equal lengths",
        })
      }
      return left.map((element, i) => f(element, right[i] ?? Number.NaN))
    }
    const scalar = nominalReal(right)
    return left.map((element) => f(element, scalar))
  }
  if (isNumericArray(right)) {
    throw new UnsupportedOperationError({
      operation: "mapArrays",
      left: describe(left),
      right: describe(right),
      reason: "the result takes the kind of the first argument, which cannot hold an array",
    })
  }
  return f(nominalReal(left), nominalReal(right))
}
