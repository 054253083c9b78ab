/**
 * Effect service over uncertainty evaluation.
 *
 * Every call runs against a fresh `UncertaintyContext`, so no cache outlives
 * the call that filled it; `session` runs several queries against one shared
 * context. Failures of the pure evaluation core surface on the error channel.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer } from "effect"
import type { Complex } from "./Complex.js"
import { CUncertainComponent } from "./CUncertainComponent.js"
import { CyclicGraphError, UncertaintyTypeId, UnsupportedOperationError, type EvaluationError } from "./Errors.js"
import { Quantity } from "./Quantity.js"
import type { RationalNumber } from "./Rational.js"
import { UncertainComponent } from "./UncertainComponent.js"
import {
  UncertaintyContext,
  type BudgetEntry,
  type ComplexUncertainty,
  type Evaluable,
} from "./UncertaintyContext.js"

const uncertaintyIdentifier = Symbol.keyFor(UncertaintyTypeId) ?? "gum-quantities/Uncertainty"

/**
 * @category Configuration
 * @since 0.1.0
 */
export interface EvaluatorOptions {
  /** Multiplier applied by `expanded`; 2 gives roughly 95 % coverage for normal distributions. */
  readonly coverageFactor?: number
}

interface ResolvedEvaluatorOptions {
  readonly coverageFactor: number
}

/**
 * @category Configuration
 * @since 0.1.0
 */
export const defaultEvaluatorOptions: ResolvedEvaluatorOptions = Object.freeze({
  coverageFactor: 2,
})

const resolveEvaluatorOptions = (overrides?: EvaluatorOptions): ResolvedEvaluatorOptions => {
  const coverageFactor = overrides?.coverageFactor ?? defaultEvaluatorOptions.coverageFactor
  return {
    coverageFactor:
      Number.isFinite(coverageFactor) && coverageFactor > 0 ? coverageFactor : defaultEvaluatorOptions.coverageFactor,
  }
}

/**
 * @category Services
 * @since 0.1.0
 */
export interface UncertaintyEvaluatorService {
  readonly coverageFactor: number
  readonly uncertainty: {
    (value: UncertainComponent | number | RationalNumber): Effect.Effect<number, EvaluationError>
    (value: CUncertainComponent | Complex): Effect.Effect<ComplexUncertainty, EvaluationError>
    (value: Quantity): Effect.Effect<Quantity, EvaluationError>
  }
  readonly covariance: (value: CUncertainComponent | Complex | number) => Effect.Effect<ComplexUncertainty, EvaluationError>
  readonly budget: (node: UncertainComponent) => Effect.Effect<ReadonlyArray<BudgetEntry>, EvaluationError>
  /** Expanded uncertainty `k · u` with the configured coverage factor `k`. */
  readonly expanded: (node: UncertainComponent) => Effect.Effect<number, EvaluationError>
  readonly session: <A>(f: (context: UncertaintyContext) => A) => Effect.Effect<A, EvaluationError>
}

const evaluate = <A>(operation: string, f: (context: UncertaintyContext) => A): Effect.Effect<A, EvaluationError> =>
  Effect.try({
    try: () => f(new UncertaintyContext()),
    catch: (error) =>
      error instanceof CyclicGraphError || error instanceof UnsupportedOperationError
        ? error
        : new UnsupportedOperationError({
            operation,
            left: error instanceof Error ? error.message : String(error),
          }),
  })

const nodeOf = (value: Evaluable): UncertainComponent | CUncertainComponent | undefined => {
  const inner = value instanceof Quantity ? value.value : value
  return inner instanceof UncertainComponent || inner instanceof CUncertainComponent ? inner : undefined
}

const countInputs = (context: UncertaintyContext, node: UncertainComponent | CUncertainComponent | undefined): number =>
  node === undefined ? 0 : node instanceof UncertainComponent ? context.sensitivities(node).size : context.jacobians(node).size

const logEvaluation = (message: string, node: UncertainComponent | CUncertainComponent | undefined, inputs: number) =>
  Effect.logDebug(message).pipe(Effect.annotateLogs({ node: node === undefined ? "constant" : node.id, inputs }))

function uncertaintyOf(value: UncertainComponent | number | RationalNumber): Effect.Effect<number, EvaluationError>
function uncertaintyOf(value: CUncertainComponent | Complex): Effect.Effect<ComplexUncertainty, EvaluationError>
function uncertaintyOf(value: Quantity): Effect.Effect<Quantity, EvaluationError>
function uncertaintyOf(
  value: Evaluable,
): Effect.Effect<number | ComplexUncertainty | Quantity | ReadonlyArray<number>, EvaluationError> {
  const node = nodeOf(value)
  return evaluate("uncertainty", (context) => ({
    result: context.uncertainty(value),
    inputs: countInputs(context, node),
  })).pipe(
    Effect.tap(({ inputs }) => logEvaluation("evaluated uncertainty", node, inputs)),
    Effect.map(({ result }) => result),
    Effect.withLogSpan("uncertainty"),
  )
}

/**
 * Uncertainty evaluation as a service.
 *
 * @category Services
 * @since 0.1.0
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const evaluator = yield* UncertaintyEvaluator
 *   return yield* evaluator.expanded(x1.add(x2))
 * }).pipe(Effect.provide(UncertaintyEvaluator.layer({ coverageFactor: 3 })))
 * ```
 */
export class UncertaintyEvaluator extends Context.Tag(uncertaintyIdentifier)<
  UncertaintyEvaluator,
  UncertaintyEvaluatorService
>() {
  static layer(options?: EvaluatorOptions) {
    const { coverageFactor } = resolveEvaluatorOptions(options)
    return Layer.succeed(this, {
      coverageFactor,
      uncertainty: uncertaintyOf,
      covariance: (value) =>
        evaluate("covariance", (context) => ({
          result: context.covariance(value),
          inputs: value instanceof CUncertainComponent ? context.jacobians(value).size : 0,
        })).pipe(
          Effect.tap(({ inputs }) =>
            logEvaluation("evaluated covariance", value instanceof CUncertainComponent ? value : undefined, inputs),
          ),
          Effect.map(({ result }) => result),
          Effect.withLogSpan("covariance"),
        ),
      budget: (node) =>
        evaluate("budget", (context) => context.budget(node)).pipe(
          Effect.tap((entries) => logEvaluation("evaluated budget", node, entries.length)),
          Effect.withLogSpan("budget"),
        ),
      expanded: (node) =>
        evaluate("expanded", (context) => context.expandedUncertainty(node, coverageFactor)).pipe(
          Effect.tap((value) =>
            Effect.logDebug("evaluated expanded uncertainty").pipe(
              Effect.annotateLogs({ node: node.id, coverageFactor, value }),
            ),
          ),
        ),
      session: (f) => evaluate("session", f),
    })
  }

  static readonly Default = UncertaintyEvaluator.layer()
}
