import { describe, it, expect } from "@effect/vitest"
import { Equal } from "effect"
import { DivisionByZeroError, UnsupportedOperationError } from "../src/Errors.js"
import { RationalNumber, toRational } from "../src/Rational.js"

describe("RationalNumber", () => {
  it("stores fractions in lowest terms with a positive denominator", () => {
    const half = RationalNumber.make(4, 8)
    expect(half.numerator).toBe(1n)
    expect(half.denominator).toBe(2n)
    expect(RationalNumber.make(3, -6).toString()).toBe("-1/2")
    expect(RationalNumber.make(0, -5).toString()).toBe("0")
  })

  it("compares structurally through Equal", () => {
    expect(Equal.equals(RationalNumber.make(2, 4), RationalNumber.make(1, 2))).toBe(true)
    expect(Equal.equals(RationalNumber.make(1, 3), RationalNumber.make(1, 2))).toBe(false)
  })

  it("rejects a zero denominator", () => {
    expect(() => RationalNumber.make(1, 0)).toThrow(DivisionByZeroError)
    expect(() => RationalNumber.ONE.divide(RationalNumber.ZERO)).toThrow(DivisionByZeroError)
  })

  it("performs exact arithmetic", () => {
    const third = RationalNumber.make(1, 3)
    const half = RationalNumber.HALF
    expect(half.add(third).toString()).toBe("5/6")
    expect(half.subtract(third).toString()).toBe("1/6")
    expect(half.multiply(third).toString()).toBe("1/6")
    expect(half.divide(third).toString()).toBe("3/2")
    expect(RationalNumber.make(2, 3).pow(-2).toString()).toBe("9/4")
    expect(RationalNumber.make(-2, 3).abs().toString()).toBe("2/3")
  })

  it("orders fractions", () => {
    expect(RationalNumber.make(1, 3).compare(RationalNumber.HALF)).toBe(-1)
    expect(RationalNumber.make(2, 4).compare(RationalNumber.HALF)).toBe(0)
    expect(RationalNumber.ONE.compare(RationalNumber.HALF)).toBe(1)
  })

  it("refuses non-integer exact powers", () => {
    expect(() => RationalNumber.HALF.pow(0.5)).toThrow(UnsupportedOperationError)
  })

  it("approximates floats with small denominators", () => {
    expect(RationalNumber.approximate(0.5)?.toString()).toBe("1/2")
    expect(RationalNumber.approximate(1 / 3)?.toString()).toBe("1/3")
    expect(RationalNumber.approximate(-7)?.toString()).toBe("-7")
    expect(RationalNumber.approximate(Math.PI)).toBeUndefined()
    expect(RationalNumber.approximate(Number.NaN)).toBeUndefined()
  })

  it("coerces exponents through toRational", () => {
    expect(toRational(0.1).toString()).toBe("1/10")
    expect(toRational(RationalNumber.HALF)).toBe(RationalNumber.HALF)
    expect(() => toRational(Math.SQRT2)).toThrow(UnsupportedOperationError)
  })
})
