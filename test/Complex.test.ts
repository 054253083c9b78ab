import { describe, it, expect } from "@effect/vitest"
import { Equal } from "effect"
import { Complex, I } from "../src/Complex.js"

describe("Complex", () => {
  it("multiplies and divides", () => {
    const z = new Complex(1, 2)
    const w = new Complex(3, 4)
    expect(z.multiply(w).equals(new Complex(-5, 10))).toBe(true)
    expect(new Complex(-5, 10).divide(w).equals(z)).toBe(true)
    expect(I.multiply(I).equals(new Complex(-1, 0))).toBe(true)
  })

  it("takes principal square roots", () => {
    expect(new Complex(-4, 0).sqrt().equals(new Complex(0, 2))).toBe(true)
    expect(new Complex(9, 0).sqrt().equals(new Complex(3, 0))).toBe(true)
    const root = new Complex(3, 4).sqrt()
    expect(root.re).toBeCloseTo(2, 12)
    expect(root.im).toBeCloseTo(1, 12)
  })

  it("evaluates exp and log on the principal branch", () => {
    const euler = new Complex(0, Math.PI).exp()
    expect(euler.re).toBeCloseTo(-1, 12)
    expect(euler.im).toBeCloseTo(0, 12)
    const log = new Complex(-1, 0).log()
    expect(log.re).toBe(0)
    expect(log.im).toBe(Math.PI)
  })

  it("defines zero to the zeroth power as one", () => {
    const zero = new Complex(0, 0)
    expect(zero.pow(zero).equals(new Complex(1, 0))).toBe(true)
    expect(zero.pow(new Complex(2, 0)).equals(zero)).toBe(true)
  })

  it("reports modulus and phase", () => {
    const z = new Complex(3, 4)
    expect(z.abs()).toBe(5)
    expect(new Complex(0, 1).arg()).toBe(Math.PI / 2)
    expect(z.conjugate().equals(new Complex(3, -4))).toBe(true)
  })

  it("formats real and complex values", () => {
    expect(new Complex(1, 2).toString()).toBe("(1+2i)")
    expect(new Complex(1, -2).toString()).toBe("(1-2i)")
    expect(new Complex(3, 0).toString()).toBe("3")
  })

  it("compares structurally through Equal", () => {
    expect(Equal.equals(new Complex(1, 2), new Complex(1, 2))).toBe(true)
    expect(Equal.equals(new Complex(1, 2), new Complex(2, 1))).toBe(false)
  })
})
