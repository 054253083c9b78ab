import { describe, it } from "@effect/vitest"
import { Arbitrary, Effect, Schema } from "effect"
import * as FastCheck from "effect/FastCheck"
import { Dimension } from "../src/Dimension.js"
import * as Numeric from "../src/Numeric.js"
import { RationalNumber } from "../src/Rational.js"
import { AMPERE, CELSIUS, HERTZ, KELVIN, KILOGRAM, KILOMETER, METER, NEWTON, SECOND, VOLT } from "../src/Si.js"
import { UncertainInput } from "../src/UncertainComponent.js"
import { UncertaintyContext } from "../src/UncertaintyContext.js"
import { ONE, type Unit } from "../src/Unit.js"

const SmallInt = Schema.Int.pipe(Schema.between(-50, 50))

const FractionSample = Schema.Struct({
  numerator: SmallInt,
  denominator: Schema.Int.pipe(Schema.between(1, 50)),
})

const ExponentSample = Schema.Struct({
  length: Schema.Int.pipe(Schema.between(-4, 4)),
  mass: Schema.Int.pipe(Schema.between(-4, 4)),
  time: Schema.Int.pipe(Schema.between(-4, 4)),
})

const UNIT_BASES: ReadonlyArray<Unit> = [METER, KILOGRAM, SECOND, AMPERE, KELVIN, VOLT, NEWTON, KILOMETER, HERTZ]

const UnitTermSample = Schema.Struct({
  index: Schema.Int.pipe(Schema.between(0, UNIT_BASES.length - 1)),
  exponent: Schema.Int.pipe(
    Schema.between(-3, 3),
    Schema.filter((n) => n !== 0),
  ),
})

const UnitSample = Schema.Array(UnitTermSample).pipe(Schema.minItems(1), Schema.maxItems(4))

const Magnitude = Schema.Number.pipe(Schema.between(-1e6, 1e6))

const UncertainSample = Schema.Struct({
  value: Schema.Number.pipe(Schema.between(-100, 100)),
  uncertainty: Schema.Number.pipe(Schema.between(0, 10)),
  factor: Schema.Number.pipe(Schema.between(-100, 100)),
})

const fractionArbitrary = Arbitrary.make(FractionSample).map(({ numerator, denominator }) =>
  RationalNumber.make(numerator, denominator),
)

const dimensionArbitrary = Arbitrary.make(ExponentSample).map((exponents) => Dimension.of(exponents))

const unitArbitrary = Arbitrary.make(UnitSample).map((terms) =>
  terms.reduce<Unit>((unit, { index, exponent }) => unit.multiply((UNIT_BASES[index] ?? ONE).pow(exponent)), ONE),
)

const assertProperty = <Args extends Array<unknown>>(property: FastCheck.IProperty<Args>) =>
  Effect.try({
    try: () => FastCheck.assert(property, { numRuns: 100 }),
    catch: (error) => error,
  })

describe("exact arithmetic properties", () => {
  it.effect("subtraction undoes addition", () =>
    assertProperty(
      FastCheck.property(fractionArbitrary, fractionArbitrary, (a, b) => a.add(b).subtract(b).equals(a)),
    ),
  )

  it.effect("multiplication is commutative", () =>
    assertProperty(
      FastCheck.property(fractionArbitrary, fractionArbitrary, (a, b) => a.multiply(b).equals(b.multiply(a))),
    ),
  )
})

describe("dimension algebra properties", () => {
  it.effect("division undoes multiplication", () =>
    assertProperty(
      FastCheck.property(dimensionArbitrary, dimensionArbitrary, (a, b) => a.multiply(b).divide(b).equals(a)),
    ),
  )

  it.effect("squaring multiplies a dimension by itself", () =>
    assertProperty(FastCheck.property(dimensionArbitrary, (a) => a.pow(2).equals(a.multiply(a)))),
  )
})

describe("unit algebra properties", () => {
  it.effect("multiplying units multiplies their dimensions", () =>
    assertProperty(
      FastCheck.property(unitArbitrary, unitArbitrary, (a, b) =>
        a.multiply(b).dimension.equals(a.dimension.multiply(b.dimension)),
      ),
    ),
  )

  it.effect("dividing units divides their dimensions", () =>
    assertProperty(
      FastCheck.property(unitArbitrary, unitArbitrary, (a, b) =>
        a.divide(b).dimension.equals(a.dimension.divide(b.dimension)),
      ),
    ),
  )

  it.effect("raising a unit raises its dimension", () =>
    assertProperty(FastCheck.property(unitArbitrary, (a) => a.pow(3).dimension.equals(a.dimension.pow(3)))),
  )

  it.effect("roots of units halve their exponents", () =>
    assertProperty(
      FastCheck.property(unitArbitrary, (a) => a.sqrt().dimension.equals(a.dimension.pow(RationalNumber.HALF))),
    ),
  )

  it.effect("nested roots compose", () =>
    assertProperty(
      FastCheck.property(unitArbitrary, (a) =>
        a.sqrt().sqrt().sqrt().dimension.equals(a.dimension.pow(RationalNumber.make(1, 8))),
      ),
    ),
  )

  it.effect("units stay compatible with themselves after a root and its power", () =>
    assertProperty(FastCheck.property(unitArbitrary, (a) => a.sqrt().pow(2).isCompatible(a))),
  )
})

describe("conversion properties", () => {
  it.effect("scaled conversions round trip", () =>
    assertProperty(
      FastCheck.property(Arbitrary.make(Magnitude), (value) => {
        const there = METER.getConverterTo(KILOMETER).convert(value)
        return Numeric.isClose(KILOMETER.getConverterTo(METER).convert(there), value)
      }),
    ),
  )

  it.effect("affine conversions round trip", () =>
    assertProperty(
      FastCheck.property(Arbitrary.make(Magnitude), (value) => {
        const converter = KELVIN.getConverterTo(CELSIUS)
        return Numeric.isClose(converter.inverse().convert(converter.convert(value)), value, {
          absoluteTolerance: 1e-9,
        })
      }),
    ),
  )
})

describe("propagation properties", () => {
  it.effect("scaling an input scales its uncertainty", () =>
    assertProperty(
      FastCheck.property(Arbitrary.make(UncertainSample), ({ value, uncertainty, factor }) => {
        const x = new UncertainInput(value, uncertainty)
        const scaled = new UncertaintyContext().uncertainty(x.multiply(factor))
        return Numeric.isClose(scaled, Math.abs(factor) * uncertainty, { absoluteTolerance: 1e-12 })
      }),
    ),
  )
})
