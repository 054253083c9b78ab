/**
 * Real-valued uncertainty graph (the "GUM tree").
 *
 * An `UncertainInput` is a leaf carrying a nominal value and a standard
 * uncertainty. Arithmetic on components builds `UncertainOperation` nodes that
 * keep references to their operands and evaluate their nominal value eagerly.
 * Uncertainty is never stored on a node; an `UncertaintyContext` derives it
 * from the accumulated sensitivity coefficients.
 *
 * @since 0.1.0
 */

import { NegativeUncertaintyError, UnsupportedOperationError } from "./Errors.js"
import { allocateNodeId, type NodeId } from "./Types.js"

interface UnaryOperator {
  readonly arity: 1
  readonly evaluate: (x: number) => number
  /** Derivative at `x`, given the result `y`. */
  readonly derivative: (x: number, y: number) => number
}

interface BinaryOperator {
  readonly arity: 2
  readonly evaluate: (x: number, y: number) => number
  /** Partial derivatives with respect to `x` and `y`, given the result `z`. */
  readonly partials: (x: number, y: number, z: number) => readonly [number, number]
}

const unary = (evaluate: UnaryOperator["evaluate"], derivative: UnaryOperator["derivative"]): UnaryOperator => ({
  arity: 1,
  evaluate,
  derivative,
})

const binary = (evaluate: BinaryOperator["evaluate"], partials: BinaryOperator["partials"]): BinaryOperator => ({
  arity: 2,
  evaluate,
  partials,
})

/**
 * Operator catalogue with closed-form partial derivatives, evaluated at the
 * operands' nominal values.
 *
 * @category Operators
 * @since 0.1.0
 */
export const REAL_OPERATORS = {
  add: binary((x, y) => x + y, () => [1, 1]),
  subtract: binary((x, y) => x - y, () => [1, -1]),
  multiply: binary((x, y) => x * y, (x, y) => [y, x]),
  divide: binary((x, y) => x / y, (x, y) => [1 / y, -x / (y * y)]),
  power: binary(
    (x, y) => Math.pow(x, y),
    (x, y, z) => [y === 0 ? 0 : y * Math.pow(x, y - 1), x === 0 ? 0 : z * Math.log(x)],
  ),
  atan2: binary(
    (y, x) => Math.atan2(y, x),
    (y, x) => {
      const r2 = x * x + y * y
      return [x / r2, -y / r2]
    },
  ),
  hypot: binary(
    (x, y) => Math.hypot(x, y),
    (x, y, h) => [x / h, y / h],
  ),
  negate: unary((x) => -x, () => -1),
  abs: unary(Math.abs, (x) => Math.sign(x)),
  sqrt: unary(Math.sqrt, (_, y) => 1 / (2 * y)),
  exp: unary(Math.exp, (_, y) => y),
  log: unary(Math.log, (x) => 1 / x),
  log10: unary(Math.log10, (x) => 1 / (x * Math.LN10)),
  sin: unary(Math.sin, Math.cos),
  cos: unary(Math.cos, (x) => -Math.sin(x)),
  tan: unary(Math.tan, (x) => 1 / (Math.cos(x) * Math.cos(x))),
  asin: unary(Math.asin, (x) => 1 / Math.sqrt(1 - x * x)),
  acos: unary(Math.acos, (x) => -1 / Math.sqrt(1 - x * x)),
  atan: unary(Math.atan, (x) => 1 / (1 + x * x)),
  sinh: unary(Math.sinh, Math.cosh),
  cosh: unary(Math.cosh, Math.sinh),
  tanh: unary(Math.tanh, (_, y) => 1 - y * y),
} satisfies Record<string, UnaryOperator | BinaryOperator>

/**
 * @category Operators
 * @since 0.1.0
 */
export type RealOperator = keyof typeof REAL_OPERATORS

/**
 * Operands accepted by the fluent methods. Plain numbers become constants.
 *
 * @category Models
 * @since 0.1.0
 */
export type UncertainOperand = UncertainComponent | number

/**
 * A node of the real uncertainty graph.
 *
 * @category Models
 * @since 0.1.0
 */
export abstract class UncertainComponent {
  abstract readonly _tag: "UncertainInput" | "UncertainOperation"
  abstract readonly value: number
  abstract readonly operands: ReadonlyArray<UncertainComponent>

  /** Handle unique to this node; larger than the handles of its operands. */
  readonly id: NodeId = allocateNodeId()

  add(that: UncertainOperand): UncertainOperation {
    return new UncertainOperation("add", [this, lift(that)])
  }

  subtract(that: UncertainOperand): UncertainOperation {
    return new UncertainOperation("subtract", [this, lift(that)])
  }

  multiply(that: UncertainOperand): UncertainOperation {
    return new UncertainOperation("multiply", [this, lift(that)])
  }

  divide(that: UncertainOperand): UncertainOperation {
    return new UncertainOperation("divide", [this, lift(that)])
  }

  power(that: UncertainOperand): UncertainOperation {
    return new UncertainOperation("power", [this, lift(that)])
  }

  /** Two-argument arctangent with `this` as the ordinate. */
  atan2(x: UncertainOperand): UncertainOperation {
    return new UncertainOperation("atan2", [this, lift(x)])
  }

  hypot(that: UncertainOperand): UncertainOperation {
    return new UncertainOperation("hypot", [this, lift(that)])
  }

  negate(): UncertainOperation {
    return new UncertainOperation("negate", [this])
  }

  abs(): UncertainOperation {
    return new UncertainOperation("abs", [this])
  }

  sqrt(): UncertainOperation {
    return new UncertainOperation("sqrt", [this])
  }

  exp(): UncertainOperation {
    return new UncertainOperation("exp", [this])
  }

  log(): UncertainOperation {
    return new UncertainOperation("log", [this])
  }

  log10(): UncertainOperation {
    return new UncertainOperation("log10", [this])
  }

  sin(): UncertainOperation {
    return new UncertainOperation("sin", [this])
  }

  cos(): UncertainOperation {
    return new UncertainOperation("cos", [this])
  }

  tan(): UncertainOperation {
    return new UncertainOperation("tan", [this])
  }

  asin(): UncertainOperation {
    return new UncertainOperation("asin", [this])
  }

  acos(): UncertainOperation {
    return new UncertainOperation("acos", [this])
  }

  atan(): UncertainOperation {
    return new UncertainOperation("atan", [this])
  }

  sinh(): UncertainOperation {
    return new UncertainOperation("sinh", [this])
  }

  cosh(): UncertainOperation {
    return new UncertainOperation("cosh", [this])
  }

  tanh(): UncertainOperation {
    return new UncertainOperation("tanh", [this])
  }

  /**
   * Apply any catalogued operator by name.
   */
  apply(operator: RealOperator, ...rest: ReadonlyArray<UncertainOperand>): UncertainOperation {
    return new UncertainOperation(operator, [this, ...rest.map(lift)])
  }

  toString(): string {
    return `${this.value}`
  }
}

/**
 * Leaf of the graph with a declared standard uncertainty. Two inputs are the
 * same quantity only when they are the same object.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * const x = new UncertainInput(1, 0.1)
 * const y = x.subtract(x) // uncertainty 0
 * ```
 */
export class UncertainInput extends UncertainComponent {
  readonly _tag = "UncertainInput"
  readonly operands: ReadonlyArray<UncertainComponent> = []

  constructor(
    readonly value: number,
    readonly uncertainty: number,
    readonly label?: string,
  ) {
    super()
    if (Number.isNaN(uncertainty) || uncertainty < 0) {
      throw new NegativeUncertaintyError({
        uncertainty,
        reason: `standard uncertainty must be a non-negative number, got ${uncertainty}`,
      })
    }
  }

  /** An input without uncertainty is a constant and takes no part in propagation. */
  isConstant(): boolean {
    return this.uncertainty === 0
  }

  override toString(): string {
    const name = this.label === undefined ? "" : `${this.label}=`
    return `${name}${this.value}±${this.uncertainty}`
  }
}

/**
 * Result of applying an operator to operand nodes.
 *
 * @category Models
 * @since 0.1.0
 */
export class UncertainOperation extends UncertainComponent {
  readonly _tag = "UncertainOperation"
  readonly value: number

  constructor(
    readonly operator: RealOperator,
    readonly operands: ReadonlyArray<UncertainComponent>,
  ) {
    super()
    const definition: UnaryOperator | BinaryOperator = REAL_OPERATORS[operator]
    const [x, y] = operands
    if (operands.length !== definition.arity || x === undefined) {
      throw new UnsupportedOperationError({
        operation: operator,
        left: `${operands.length} operand(s)`,
        reason: `expected ${definition.arity}`,
      })
    }
    this.value = definition.arity === 1 ? definition.evaluate(x.value) : definition.evaluate(x.value, y?.value ?? Number.NaN)
  }

  /**
   * Partial derivative of this node with respect to each operand.
   */
  partials(): ReadonlyArray<number> {
    const definition: UnaryOperator | BinaryOperator = REAL_OPERATORS[this.operator]
    const [x, y] = this.operands
    if (x === undefined) {
      return []
    }
    if (definition.arity === 1) {
      return [definition.derivative(x.value, this.value)]
    }
    return definition.partials(x.value, y?.value ?? Number.NaN, this.value)
  }
}

/**
 * Wrap a plain number as a constant input.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const constant = (value: number): UncertainInput => new UncertainInput(value, 0)

const lift = (operand: UncertainOperand): UncertainComponent =>
  typeof operand === "number" ? constant(operand) : operand

/**
 * Type guard for real graph nodes.
 *
 * @category Guards
 * @since 0.1.0
 */
export const isUncertainComponent = (value: unknown): value is UncertainComponent =>
  value instanceof UncertainComponent
