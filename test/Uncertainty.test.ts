import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import { Complex } from "../src/Complex.js"
import { CUncertainInput } from "../src/CUncertainComponent.js"
import { CyclicGraphError, UnsupportedOperationError } from "../src/Errors.js"
import { Quantity } from "../src/Quantity.js"
import { METER } from "../src/Si.js"
import { UncertainInput, UncertainOperation, type UncertainComponent } from "../src/UncertainComponent.js"
import { UncertaintyEvaluator, defaultEvaluatorOptions } from "../src/Uncertainty.js"

const x1 = new UncertainInput(1, 0.1, "x1")
const x2 = new UncertainInput(2, 0.2, "x2")

describe("UncertaintyEvaluator", () => {
  it.effect("evaluates standard uncertainty", () =>
    Effect.gen(function* () {
      const evaluator = yield* UncertaintyEvaluator
      expect(yield* evaluator.uncertainty(x1.add(x2))).toBeCloseTo(Math.sqrt(0.05), 12)
      expect(yield* evaluator.uncertainty(3)).toBe(0)
    }).pipe(Effect.provide(UncertaintyEvaluator.Default)),
  )

  it.effect("evaluates quantities in their own unit", () =>
    Effect.gen(function* () {
      const evaluator = yield* UncertaintyEvaluator
      const uncertainty = yield* evaluator.uncertainty(new Quantity(METER, x1.multiply(2)))
      expect(uncertainty.unit).toBe(METER)
      expect(uncertainty.value).toBeCloseTo(0.2, 12)
    }).pipe(Effect.provide(UncertaintyEvaluator.Default)),
  )

  it.effect("evaluates complex covariance", () =>
    Effect.gen(function* () {
      const evaluator = yield* UncertaintyEvaluator
      const z = CUncertainInput.fromUncertainties(new Complex(1, 2), 0.1, 0.2)
      const covariance = yield* evaluator.covariance(z.multiply(2))
      expect(covariance.uncertaintyRe).toBeCloseTo(0.2, 12)
      expect(covariance.uncertaintyIm).toBeCloseTo(0.4, 12)
      const same = yield* evaluator.uncertainty(z)
      expect(same.uncertaintyIm).toBeCloseTo(0.2, 12)
    }).pipe(Effect.provide(UncertaintyEvaluator.Default)),
  )

  it.effect("applies the default coverage factor", () =>
    Effect.gen(function* () {
      const evaluator = yield* UncertaintyEvaluator
      expect(evaluator.coverageFactor).toBe(defaultEvaluatorOptions.coverageFactor)
      expect(yield* evaluator.expanded(x1.add(x2))).toBeCloseTo(2 * Math.sqrt(0.05), 12)
    }).pipe(Effect.provide(UncertaintyEvaluator.Default)),
  )

  it.effect("applies a configured coverage factor", () =>
    Effect.gen(function* () {
      const evaluator = yield* UncertaintyEvaluator
      expect(yield* evaluator.expanded(x1.multiply(10))).toBeCloseTo(3, 12)
    }).pipe(Effect.provide(UncertaintyEvaluator.layer({ coverageFactor: 3 }))),
  )

  it.effect("falls back to the default for invalid coverage factors", () =>
    Effect.gen(function* () {
      const evaluator = yield* UncertaintyEvaluator
      expect(evaluator.coverageFactor).toBe(2)
    }).pipe(Effect.provide(UncertaintyEvaluator.layer({ coverageFactor: -1 }))),
  )

  it.effect("reports an uncertainty budget", () =>
    Effect.gen(function* () {
      const evaluator = yield* UncertaintyEvaluator
      const budget = yield* evaluator.budget(x1.add(x2))
      expect(budget.map(({ input }) => input.label)).toEqual(["x2", "x1"])
    }).pipe(Effect.provide(UncertaintyEvaluator.Default)),
  )

  it.effect("shares one context across a session", () =>
    Effect.gen(function* () {
      const evaluator = yield* UncertaintyEvaluator
      const y = x1.multiply(x2)
      const { uncertainty, sensitivity } = yield* evaluator.session((context) => ({
        uncertainty: context.uncertainty(y),
        sensitivity: context.sensitivity(y, x1),
      }))
      expect(uncertainty).toBeCloseTo(Math.sqrt(0.08), 12)
      expect(sensitivity).toBe(2)
    }).pipe(Effect.provide(UncertaintyEvaluator.Default)),
  )

  it.effect("surfaces cycles on the error channel", () =>
    Effect.gen(function* () {
      const evaluator = yield* UncertaintyEvaluator
      const operands: Array<UncertainComponent> = [x1, x2]
      const looped = new UncertainOperation("add", operands)
      operands[1] = looped
      const error = yield* evaluator.uncertainty(looped).pipe(Effect.flip)
      expect(error).toBeInstanceOf(CyclicGraphError)
      const recovered = yield* evaluator
        .uncertainty(looped)
        .pipe(Effect.catchTag("CyclicGraphError", () => Effect.succeed(-1)))
      expect(recovered).toBe(-1)
    }).pipe(Effect.provide(UncertaintyEvaluator.Default)),
  )

  it.effect("wraps unexpected failures", () =>
    Effect.gen(function* () {
      const evaluator = yield* UncertaintyEvaluator
      const error = yield* evaluator
        .session(() => {
          throw new Error("boom")
        })
        .pipe(Effect.flip)
      expect(error).toBeInstanceOf(UnsupportedOperationError)
      if (error instanceof UnsupportedOperationError) {
        expect(error.operation).toBe("session")
        expect(error.left).toBe("boom")
      }
    }).pipe(Effect.provide(UncertaintyEvaluator.Default)),
  )

  it("is keyed by a stable identifier", () => {
    expect(UncertaintyEvaluator.key).toBe("gum-quantities/Uncertainty")
  })
})
