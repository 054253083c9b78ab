/**
 * Evaluation sessions for uncertainty graphs.
 *
 * A context derives standard uncertainty from the accumulated sensitivity of
 * a node to each input leaf. Each query walks the graph below the queried
 * node once, and its result is cached for the lifetime of the context. A
 * context is cheap; create one per evaluation pass.
 *
 * @since 0.1.0
 */

import { Complex } from "./Complex.js"
import { CUncertainComponent, CUncertainInput, CUncertainOperation } from "./CUncertainComponent.js"
import { sensitivities, type Propagation, type SensitivityMap } from "./internal/graph.js"
import { IDENTITY2, ZERO2, add2, congruence2, multiply2, type Matrix2 } from "./internal/matrix.js"
import { Quantity, type QuantityValue } from "./Quantity.js"
import { RationalNumber } from "./Rational.js"
import type { NodeId } from "./Types.js"
import { UncertainComponent, UncertainInput, UncertainOperation } from "./UncertainComponent.js"

const realPropagation: Propagation<UncertainComponent, number> = {
  isConstant: (leaf) => leaf instanceof UncertainInput && leaf.isConstant(),
  edges: (node) => (node instanceof UncertainOperation ? node.partials() : []),
  identity: 1,
  compose: (outer, inner) => outer * inner,
  add: (left, right) => left + right,
}

const complexPropagation: Propagation<CUncertainComponent, Matrix2> = {
  isConstant: (leaf) => leaf instanceof CUncertainInput && leaf.isConstant(),
  edges: (node) => (node instanceof CUncertainOperation ? node.jacobians() : []),
  identity: IDENTITY2,
  compose: multiply2,
  add: add2,
}

/**
 * Covariance of the real and imaginary parts of a complex result.
 *
 * @category Models
 * @since 0.1.0
 */
export class ComplexUncertainty {
  readonly _tag = "ComplexUncertainty"

  constructor(readonly matrix: Matrix2) {}

  get varianceRe(): number {
    return this.matrix[0]
  }

  get varianceIm(): number {
    return this.matrix[3]
  }

  /** Covariance between the real and imaginary parts. */
  get covariance(): number {
    return this.matrix[1]
  }

  get uncertaintyRe(): number {
    return Math.sqrt(this.varianceRe)
  }

  get uncertaintyIm(): number {
    return Math.sqrt(this.varianceIm)
  }

  /** Correlation coefficient, 0 when either part is exact. */
  get correlation(): number {
    const denominator = this.uncertaintyRe * this.uncertaintyIm
    return denominator === 0 ? 0 : this.covariance / denominator
  }

  /** Standard uncertainties as `Complex(u_re, u_im)`. */
  toComplex(): Complex {
    return new Complex(this.uncertaintyRe, this.uncertaintyIm)
  }

  toString(): string {
    return `u=(${this.uncertaintyRe}, ${this.uncertaintyIm}) r=${this.correlation}`
  }
}

/**
 * Contribution of one input to the uncertainty of a result.
 *
 * @category Models
 * @since 0.1.0
 */
export interface BudgetEntry {
  readonly input: UncertainInput
  readonly sensitivity: number
  readonly uncertainty: number
  /** `|sensitivity| · uncertainty` */
  readonly contribution: number
}

/**
 * Anything whose uncertainty can be evaluated.
 *
 * @category Models
 * @since 0.1.0
 */
export type Evaluable = QuantityValue | Quantity

/**
 * Evaluation session with a per-node cache.
 *
 * @category Evaluation
 * @since 0.1.0
 * @example
 * ```ts
 * const x1 = new UncertainInput(1, 0.1)
 * const x2 = new UncertainInput(2, 0.2)
 * new UncertaintyContext().uncertainty(x1.add(x2)) // 0.223606797749979
 * ```
 */
export class UncertaintyContext {
  readonly #real = new Map<NodeId, SensitivityMap<UncertainComponent, number>>()
  readonly #complex = new Map<NodeId, SensitivityMap<CUncertainComponent, Matrix2>>()

  /**
   * Standard uncertainty. Plain numbers have none; a quantity yields a
   * quantity in the same unit; complex values yield their standard
   * uncertainties as `Complex(u_re, u_im)` inside a quantity, or a
   * `ComplexUncertainty` on their own.
   */
  uncertainty(value: UncertainComponent | number | RationalNumber): number
  uncertainty(value: CUncertainComponent | Complex): ComplexUncertainty
  uncertainty(value: Quantity): Quantity
  uncertainty(value: Evaluable): number | ComplexUncertainty | Quantity | ReadonlyArray<number>
  uncertainty(value: Evaluable): number | ComplexUncertainty | Quantity | ReadonlyArray<number> {
    if (value instanceof Quantity) {
      return new Quantity(value.unit, this.#valueUncertainty(value.value))
    }
    if (value instanceof CUncertainComponent || value instanceof Complex) {
      return this.covariance(value)
    }
    if (typeof value === "number" || value instanceof RationalNumber) {
      return 0
    }
    if (value instanceof UncertainComponent) {
      return Math.sqrt(this.variance(value))
    }
    return value.map(() => 0)
  }

  #valueUncertainty(value: QuantityValue): QuantityValue {
    if (value instanceof CUncertainComponent || value instanceof Complex) {
      return this.covariance(value).toComplex()
    }
    if (value instanceof UncertainComponent) {
      return Math.sqrt(this.variance(value))
    }
    if (typeof value === "number" || value instanceof RationalNumber) {
      return 0
    }
    return value.map(() => 0)
  }

  /**
   * `Σ sensitivity² · u²` over the contributing inputs.
   */
  variance(node: UncertainComponent): number {
    let total = 0
    for (const { leaf, coefficient } of this.sensitivities(node).values()) {
      if (leaf instanceof UncertainInput) {
        const contribution = coefficient * leaf.uncertainty
        total += contribution * contribution
      }
    }
    return total
  }

  /**
   * Accumulated sensitivity coefficients of `node`, keyed by input handle.
   * Constant inputs do not appear.
   */
  sensitivities(node: UncertainComponent): SensitivityMap<UncertainComponent, number> {
    return sensitivities(node, realPropagation, this.#real)
  }

  /**
   * Accumulated sensitivity of `node` to one input; 0 when the input does
   * not contribute.
   */
  sensitivity(node: UncertainComponent, input: UncertainInput): number {
    return this.sensitivities(node).get(input.id)?.coefficient ?? 0
  }

  /**
   * Per-input contributions, largest first.
   */
  budget(node: UncertainComponent): ReadonlyArray<BudgetEntry> {
    const entries: Array<BudgetEntry> = []
    for (const { leaf, coefficient } of this.sensitivities(node).values()) {
      if (leaf instanceof UncertainInput) {
        entries.push({
          input: leaf,
          sensitivity: coefficient,
          uncertainty: leaf.uncertainty,
          contribution: Math.abs(coefficient) * leaf.uncertainty,
        })
      }
    }
    return entries.sort((a, b) => b.contribution - a.contribution || a.input.id - b.input.id)
  }

  /**
   * `coverageFactor` times the standard uncertainty.
   */
  expandedUncertainty(node: UncertainComponent, coverageFactor: number): number {
    return coverageFactor * Math.sqrt(this.variance(node))
  }

  /**
   * Accumulated 2×2 Jacobians of a complex node, keyed by input handle.
   */
  jacobians(node: CUncertainComponent): SensitivityMap<CUncertainComponent, Matrix2> {
    return sensitivities(node, complexPropagation, this.#complex)
  }

  /**
   * Full covariance over (re, im): `Σ J · Cov(input) · Jᵀ`.
   */
  covariance(value: CUncertainComponent | Complex | number): ComplexUncertainty {
    if (!(value instanceof CUncertainComponent)) {
      return new ComplexUncertainty(ZERO2)
    }
    let total: Matrix2 = ZERO2
    for (const { leaf, coefficient } of this.jacobians(value).values()) {
      if (leaf instanceof CUncertainInput) {
        total = add2(total, congruence2(coefficient, leaf.covariance))
      }
    }
    return new ComplexUncertainty(total)
  }
}
