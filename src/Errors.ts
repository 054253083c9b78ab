/**
 * Error hierarchy for gum-quantities.
 *
 * Every failure is a local precondition failure on immutable data, so nothing
 * needs to be rolled back. The pure arithmetic core throws these errors; the
 * Effect services surface them on the error channel so callers can pattern
 * match with `Effect.catchTag`.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Unique symbol used to tag the uncertainty evaluator within the context graph.
 *
 * @since 0.1.0
 */
export const UncertaintyTypeId = Symbol.for("gum-quantities/Uncertainty")

/**
 * Raised when two units do not share a dimension, either on addition and
 * subtraction of quantities or on a requested conversion.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new IncompatibleUnitsError({ from: "m", to: "s", fromDimension: "L", toDimension: "T" })
 * yield* Effect.fail(error)
 * ```
 */
export class IncompatibleUnitsError extends Data.TaggedError("IncompatibleUnitsError")<{
  readonly from: string
  readonly to: string
  readonly fromDimension: string
  readonly toDimension: string
}> {
  override get message(): string {
    return `Cannot convert ${this.from} [${this.fromDimension}] to ${this.to} [${this.toDimension}]: dimensions do not match`
  }
}

/**
 * Raised when no coercion rule exists for a pair of numeric kinds, or when an
 * operator is applied to a kind that does not support it.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnsupportedOperationError extends Data.TaggedError("UnsupportedOperationError")<{
  readonly operation: string
  readonly left: string
  readonly right?: string
  readonly reason?: string
}> {
  override get message(): string {
    const operands = this.right === undefined ? this.left : `${this.left} and ${this.right}`
    const suffix = this.reason === undefined ? "" : `: ${this.reason}`
    return `Unsupported operation "${this.operation}" on ${operands}${suffix}`
  }
}

/**
 * Raised on a zero denominator when building or dividing exact numbers.
 *
 * @category Errors
 * @since 0.1.0
 */
export class DivisionByZeroError extends Data.TaggedError("DivisionByZeroError")<{
  readonly operation: string
  readonly dividend: string
}> {
  override get message(): string {
    return `Division by zero in ${this.operation} (dividend ${this.dividend})`
  }
}

/**
 * Raised when an input node declares a negative standard uncertainty or a
 * covariance matrix that is not positive semidefinite.
 *
 * @category Errors
 * @since 0.1.0
 */
export class NegativeUncertaintyError extends Data.TaggedError("NegativeUncertaintyError")<{
  readonly uncertainty?: number
  readonly covariance?: ReadonlyArray<number>
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid uncertainty declaration: ${this.reason}`
  }
}

/**
 * Raised when a node is reached again while it is still being evaluated.
 * Graphs built through the public constructors can never trigger it.
 *
 * @category Errors
 * @since 0.1.0
 */
export class CyclicGraphError extends Data.TaggedError("CyclicGraphError")<{
  readonly nodes: ReadonlyArray<number>
}> {
  override get message(): string {
    return `Uncertainty graph contains a cycle through nodes ${this.nodes.join(" -> ")}`
  }
}

/**
 * Raised when a requested unit symbol does not exist within a registry.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitNotFoundError extends Data.TaggedError("UnitNotFoundError")<{
  readonly symbol: string
}> {
  override get message(): string {
    return `Unknown unit symbol "${this.symbol}"`
  }
}

/**
 * Raised when a textual unit expression cannot be parsed.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitParseError extends Data.TaggedError("UnitParseError")<{
  readonly expression: string
  readonly column: number
  readonly problem: string
  readonly snippet: string
}> {
  override get message(): string {
    return `Unit parse error at column ${this.column}: ${this.problem}`
  }
}

/**
 * Union of failures raised by arithmetic on quantities and uncertain values.
 *
 * @category Errors
 * @since 0.1.0
 */
export type ArithmeticError = IncompatibleUnitsError | UnsupportedOperationError | DivisionByZeroError

/**
 * Union of failures raised while evaluating uncertainty.
 *
 * @category Errors
 * @since 0.1.0
 */
export type EvaluationError = CyclicGraphError | UnsupportedOperationError

/**
 * Union of failures raised by the unit registry.
 *
 * @category Errors
 * @since 0.1.0
 */
export type UnitLookupError = UnitNotFoundError | UnitParseError
