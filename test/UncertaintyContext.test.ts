import { describe, it, expect } from "@effect/vitest"
import { Complex } from "../src/Complex.js"
import { CUncertainInput } from "../src/CUncertainComponent.js"
import { Quantity } from "../src/Quantity.js"
import { RationalNumber } from "../src/Rational.js"
import { VOLT } from "../src/Si.js"
import { UncertainInput } from "../src/UncertainComponent.js"
import { ComplexUncertainty, UncertaintyContext } from "../src/UncertaintyContext.js"

describe("UncertaintyContext", () => {
  it("assigns no uncertainty to exact values", () => {
    const context = new UncertaintyContext()
    expect(context.uncertainty(2)).toBe(0)
    expect(context.uncertainty(RationalNumber.make(1, 3))).toBe(0)
    expect(context.uncertainty([1, 2])).toEqual([0, 0])
    expect(context.uncertainty(new Complex(1, 2))).toBeInstanceOf(ComplexUncertainty)
  })

  it("caches sensitivities per node", () => {
    const x = new UncertainInput(1, 0.1)
    const y = x.multiply(x)
    const context = new UncertaintyContext()
    const first = context.sensitivities(y)
    expect(context.sensitivities(y)).toBe(first)
    expect(context.sensitivity(y, x)).toBe(2)
    expect(context.variance(y)).toBeCloseTo(0.04, 12)
  })

  it("reports zero sensitivity to unrelated inputs", () => {
    const x = new UncertainInput(1, 0.1)
    const other = new UncertainInput(1, 0.1)
    expect(new UncertaintyContext().sensitivity(x.negate(), other)).toBe(0)
  })

  it("evaluates quantities with complex values", () => {
    const z = CUncertainInput.fromUncertainties(new Complex(3, 4), 0.3, 0.4)
    const uncertainty = new UncertaintyContext().uncertainty(new Quantity(VOLT, z))
    expect(uncertainty.unit).toBe(VOLT)
    const value = uncertainty.value
    expect(value).toBeInstanceOf(Complex)
    if (value instanceof Complex) {
      expect(value.re).toBeCloseTo(0.3, 12)
      expect(value.im).toBeCloseTo(0.4, 12)
    }
  })

  it("evaluates quantities with exact values", () => {
    const uncertainty = new UncertaintyContext().uncertainty(new Quantity(VOLT, 5))
    expect(uncertainty.value).toBe(0)
    expect(uncertainty.toString()).toBe("0 V")
  })
})
