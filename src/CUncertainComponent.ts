/**
 * Complex-valued uncertainty graph.
 *
 * Mirrors the real graph, with each input carrying a 2×2 covariance matrix
 * over (real part, imaginary part). Operators are treated as maps from ℝ² to
 * ℝ² and supply a 2×2 Jacobian per operand; holomorphic operators use the
 * Cauchy-Riemann form of their derivative.
 *
 * @since 0.1.0
 */

import { Complex } from "./Complex.js"
import { NegativeUncertaintyError, UnsupportedOperationError } from "./Errors.js"
import {
  IDENTITY2,
  ZERO2,
  holomorphic2,
  isPositiveSemidefinite2,
  scale2,
  type Matrix2,
} from "./internal/matrix.js"
import { allocateNodeId, type NodeId } from "./Types.js"

const ONE = new Complex(1, 0)

const hol = (derivative: Complex): Matrix2 => holomorphic2(derivative.re, derivative.im)

interface ComplexUnary {
  readonly arity: 1
  readonly evaluate: (z: Complex) => Complex
  readonly jacobian: (z: Complex, result: Complex) => Matrix2
}

interface ComplexBinary {
  readonly arity: 2
  readonly evaluate: (z: Complex, w: Complex) => Complex
  readonly jacobians: (z: Complex, w: Complex, result: Complex) => readonly [Matrix2, Matrix2]
}

const unary = (evaluate: ComplexUnary["evaluate"], jacobian: ComplexUnary["jacobian"]): ComplexUnary => ({
  arity: 1,
  evaluate,
  jacobian,
})

const binary = (evaluate: ComplexBinary["evaluate"], jacobians: ComplexBinary["jacobians"]): ComplexBinary => ({
  arity: 2,
  evaluate,
  jacobians,
})

/**
 * Complex operator catalogue. Each Jacobian maps a (Δre, Δim) perturbation of
 * an operand to the (Δre, Δim) perturbation of the result.
 *
 * @category Operators
 * @since 0.1.0
 */
export const COMPLEX_OPERATORS = {
  add: binary((z, w) => z.add(w), () => [IDENTITY2, IDENTITY2]),
  subtract: binary((z, w) => z.subtract(w), () => [IDENTITY2, scale2(IDENTITY2, -1)]),
  multiply: binary((z, w) => z.multiply(w), (z, w) => [hol(w), hol(z)]),
  divide: binary(
    (z, w) => z.divide(w),
    (z, w) => [hol(ONE.divide(w)), hol(z.divide(w.multiply(w)).negate())],
  ),
  power: binary(
    (z, w) => z.pow(w),
    (z, w, result) => {
      const isZero = (c: Complex) => c.re === 0 && c.im === 0
      const dz = isZero(w) ? ZERO2 : hol(w.multiply(z.pow(w.subtract(ONE))))
      const dw = isZero(z) ? ZERO2 : hol(result.multiply(z.log()))
      return [dz, dw]
    },
  ),
  negate: unary((z) => z.negate(), () => scale2(IDENTITY2, -1)),
  sqrt: unary((z) => z.sqrt(), (_, root) => hol(ONE.divide(root.scale(2)))),
  exp: unary((z) => z.exp(), (_, result) => hol(result)),
  log: unary((z) => z.log(), (z) => hol(ONE.divide(z))),
  sin: unary((z) => z.sin(), (z) => hol(z.cos())),
  cos: unary((z) => z.cos(), (z) => hol(z.sin().negate())),
  tan: unary(
    (z) => z.tan(),
    (z) => {
      const cosine = z.cos()
      return hol(ONE.divide(cosine.multiply(cosine)))
    },
  ),
  conjugate: unary((z) => z.conjugate(), () => [1, 0, 0, -1]),
  real: unary((z) => new Complex(z.re, 0), () => [1, 0, 0, 0]),
  imag: unary((z) => new Complex(z.im, 0), () => [0, 1, 0, 0]),
  abs: unary(
    (z) => new Complex(z.abs(), 0),
    (z, result) => (result.re === 0 ? ZERO2 : [z.re / result.re, z.im / result.re, 0, 0]),
  ),
  arg: unary(
    (z) => new Complex(z.arg(), 0),
    (z) => {
      const r2 = z.re * z.re + z.im * z.im
      return r2 === 0 ? ZERO2 : [-z.im / r2, z.re / r2, 0, 0]
    },
  ),
} satisfies Record<string, ComplexUnary | ComplexBinary>

/**
 * @category Operators
 * @since 0.1.0
 */
export type ComplexOperator = keyof typeof COMPLEX_OPERATORS

/**
 * Operands accepted by the fluent methods. Plain values become constants.
 *
 * @category Models
 * @since 0.1.0
 */
export type CUncertainOperand = CUncertainComponent | Complex | number

/**
 * A node of the complex uncertainty graph.
 *
 * @category Models
 * @since 0.1.0
 */
export abstract class CUncertainComponent {
  abstract readonly _tag: "CUncertainInput" | "CUncertainOperation"
  abstract readonly value: Complex
  abstract readonly operands: ReadonlyArray<CUncertainComponent>

  readonly id: NodeId = allocateNodeId()

  add(that: CUncertainOperand): CUncertainOperation {
    return new CUncertainOperation("add", [this, liftComplex(that)])
  }

  subtract(that: CUncertainOperand): CUncertainOperation {
    return new CUncertainOperation("subtract", [this, liftComplex(that)])
  }

  multiply(that: CUncertainOperand): CUncertainOperation {
    return new CUncertainOperation("multiply", [this, liftComplex(that)])
  }

  divide(that: CUncertainOperand): CUncertainOperation {
    return new CUncertainOperation("divide", [this, liftComplex(that)])
  }

  power(that: CUncertainOperand): CUncertainOperation {
    return new CUncertainOperation("power", [this, liftComplex(that)])
  }

  negate(): CUncertainOperation {
    return new CUncertainOperation("negate", [this])
  }

  sqrt(): CUncertainOperation {
    return new CUncertainOperation("sqrt", [this])
  }

  exp(): CUncertainOperation {
    return new CUncertainOperation("exp", [this])
  }

  log(): CUncertainOperation {
    return new CUncertainOperation("log", [this])
  }

  sin(): CUncertainOperation {
    return new CUncertainOperation("sin", [this])
  }

  cos(): CUncertainOperation {
    return new CUncertainOperation("cos", [this])
  }

  tan(): CUncertainOperation {
    return new CUncertainOperation("tan", [this])
  }

  conjugate(): CUncertainOperation {
    return new CUncertainOperation("conjugate", [this])
  }

  /** Real part, as a complex node with zero imaginary part. */
  real(): CUncertainOperation {
    return new CUncertainOperation("real", [this])
  }

  /** Imaginary part, as a complex node with zero imaginary part. */
  imag(): CUncertainOperation {
    return new CUncertainOperation("imag", [this])
  }

  abs(): CUncertainOperation {
    return new CUncertainOperation("abs", [this])
  }

  arg(): CUncertainOperation {
    return new CUncertainOperation("arg", [this])
  }

  apply(operator: ComplexOperator, ...rest: ReadonlyArray<CUncertainOperand>): CUncertainOperation {
    return new CUncertainOperation(operator, [this, ...rest.map(liftComplex)])
  }

  toString(): string {
    return this.value.toString()
  }
}

/**
 * Complex leaf with a covariance matrix over (re, im).
 *
 * @category Models
 * @since 0.1.0
 */
export class CUncertainInput extends CUncertainComponent {
  readonly _tag = "CUncertainInput"
  readonly operands: ReadonlyArray<CUncertainComponent> = []
  readonly value: Complex

  constructor(
    value: Complex | number,
    readonly covariance: Matrix2 = ZERO2,
    readonly label?: string,
  ) {
    super()
    this.value = typeof value === "number" ? new Complex(value, 0) : value
    if (!isPositiveSemidefinite2(covariance)) {
      throw new NegativeUncertaintyError({
        covariance,
        reason: `covariance [${covariance.join(", ")}] is not symmetric positive semidefinite`,
      })
    }
  }

  /**
   * Build an input from the standard uncertainties of its parts and their
   * correlation coefficient.
   *
   * @example
   * ```ts
   * const z = CUncertainInput.fromUncertainties(new Complex(1, 2), 0.1, 0.2)
   * z.covariance // [0.010000000000000002, 0, 0, 0.04000000000000001]
   * ```
   */
  static fromUncertainties(
    value: Complex | number,
    uncertaintyRe: number,
    uncertaintyIm: number = uncertaintyRe,
    correlation = 0,
    label?: string,
  ): CUncertainInput {
    if (!(uncertaintyRe >= 0) || !(uncertaintyIm >= 0)) {
      throw new NegativeUncertaintyError({
        uncertainty: Math.min(uncertaintyRe, uncertaintyIm),
        reason: `standard uncertainties must be non-negative, got ${uncertaintyRe} and ${uncertaintyIm}`,
      })
    }
    if (!(Math.abs(correlation) <= 1)) {
      throw new NegativeUncertaintyError({
        reason: `correlation coefficient must lie in [-1, 1], got ${correlation}`,
      })
    }
    const covariance = correlation * uncertaintyRe * uncertaintyIm
    return new CUncertainInput(
      value,
      [uncertaintyRe * uncertaintyRe, covariance, covariance, uncertaintyIm * uncertaintyIm],
      label,
    )
  }

  isConstant(): boolean {
    return this.covariance.every((entry) => entry === 0)
  }
}

/**
 * Result of applying a complex operator to operand nodes.
 *
 * @category Models
 * @since 0.1.0
 */
export class CUncertainOperation extends CUncertainComponent {
  readonly _tag = "CUncertainOperation"
  readonly value: Complex

  constructor(
    readonly operator: ComplexOperator,
    readonly operands: ReadonlyArray<CUncertainComponent>,
  ) {
    super()
    const definition: ComplexUnary | ComplexBinary = COMPLEX_OPERATORS[operator]
    const [z, w] = operands
    if (operands.length !== definition.arity || z === undefined) {
      throw new UnsupportedOperationError({
        operation: operator,
        left: `${operands.length} operand(s)`,
        reason: `expected ${definition.arity}`,
      })
    }
    this.value = definition.arity === 1 ? definition.evaluate(z.value) : definition.evaluate(z.value, w?.value ?? ONE)
  }

  /**
   * Jacobian of this node with respect to each operand.
   */
  jacobians(): ReadonlyArray<Matrix2> {
    const definition: ComplexUnary | ComplexBinary = COMPLEX_OPERATORS[this.operator]
    const [z, w] = this.operands
    if (z === undefined) {
      return []
    }
    if (definition.arity === 1) {
      return [definition.jacobian(z.value, this.value)]
    }
    return definition.jacobians(z.value, w?.value ?? ONE, this.value)
  }
}

/**
 * Wrap a plain value as a constant complex input.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const complexConstant = (value: Complex | number): CUncertainInput => new CUncertainInput(value)

const liftComplex = (operand: CUncertainOperand): CUncertainComponent =>
  operand instanceof CUncertainComponent ? operand : complexConstant(operand)

/**
 * Type guard for complex graph nodes.
 *
 * @category Guards
 * @since 0.1.0
 */
export const isCUncertainComponent = (value: unknown): value is CUncertainComponent =>
  value instanceof CUncertainComponent
