import { describe, it, expect } from "@effect/vitest"
import { UnsupportedOperationError } from "../src/Errors.js"
import { RationalNumber } from "../src/Rational.js"
import {
  CompoundConverter,
  IDENTITY,
  MultiplyConverter,
  RationalConverter,
  offsetConverter,
  scaleConverter,
} from "../src/UnitConverter.js"

describe("UnitConverter", () => {
  it("collapses a factor followed by its reciprocal to the identity", () => {
    const roundTrip = scaleConverter(1000).andThen(scaleConverter(RationalNumber.make(1, 1000)))
    expect(roundTrip).toBe(IDENTITY)
    expect(roundTrip.isIdentity()).toBe(true)
  })

  it("keeps integer factors exact and float factors inexact", () => {
    expect(scaleConverter(1000)).toBeInstanceOf(RationalConverter)
    expect(scaleConverter(1.5)).toBeInstanceOf(MultiplyConverter)
    expect(scaleConverter(1000).convert(0.25)).toBe(250)
  })

  it("merges adjacent linear steps", () => {
    const merged = scaleConverter(3).andThen(scaleConverter(0.5))
    expect(merged).toBeInstanceOf(MultiplyConverter)
    expect(merged.convert(4)).toBe(6)
  })

  it("composes affine steps and inverts them in reverse order", () => {
    const affine = scaleConverter(2).andThen(offsetConverter(1))
    expect(affine).toBeInstanceOf(CompoundConverter)
    expect(affine.toString()).toBe("*2+1")
    expect(affine.isLinear()).toBe(false)
    expect(affine.convert(3)).toBe(7)
    expect(affine.inverse().convert(7)).toBe(3)
  })

  it("inverts offsets", () => {
    expect(offsetConverter(273.15).inverse().convert(273.15)).toBe(0)
  })

  it("raises linear converters to rational powers", () => {
    const cubed = scaleConverter(10).pow(RationalNumber.make(3))
    expect(cubed.convert(1)).toBe(1000)
    const root = scaleConverter(4).pow(RationalNumber.HALF)
    expect(root.convert(1)).toBe(2)
  })

  it("refuses to raise offset converters to a power", () => {
    expect(() => offsetConverter(1).pow(RationalNumber.make(2))).toThrow(UnsupportedOperationError)
  })

  it("compares converters step by step", () => {
    expect(scaleConverter(1000).equals(scaleConverter(RationalNumber.make(1000)))).toBe(true)
    expect(scaleConverter(1000).equals(scaleConverter(100))).toBe(false)
  })
})
