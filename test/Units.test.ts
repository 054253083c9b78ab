import { describe, it, expect } from "@effect/vitest"
import { Effect, Either, Schema } from "effect"
import { IncompatibleUnitsError, UnitNotFoundError, UnitParseError } from "../src/Errors.js"
import { Quantity } from "../src/Quantity.js"
import { GRAM, KILOGRAM, METER, MICROSECOND, MILLIMETER, MILLIVOLT, SECOND } from "../src/Si.js"
import {
  UnitDefinition,
  UnitRegistry,
  convertQuantity,
  convertValue,
  defineUnit,
  extendRegistry,
  lookupUnit,
  makeRegistry,
  parseUnit,
} from "../src/Units.js"

describe("Units module", () => {
  const decodeDefinition = Schema.decodeSync(UnitDefinition)
  const registry: UnitRegistry = makeRegistry()

  it.effect("converts scalar values between compatible units", () =>
    Effect.gen(function* () {
      expect(yield* convertValue(registry, 5000, "g", "kg")).toBe(5)
      expect(yield* convertValue(registry, 2, "V", "mV")).toBe(2000)
      expect(yield* convertValue(registry, 36, "km/h", "m/s")).toBe(10)
    }),
  )

  it.effect("fails when the target unit is unknown", () =>
    Effect.gen(function* () {
      const error = yield* convertValue(registry, 1, "kg", "unknown").pipe(Effect.flip)
      expect(error).toBeInstanceOf(UnitNotFoundError)
      if (error instanceof UnitNotFoundError) {
        expect(error.symbol).toBe("unknown")
      }
    }),
  )

  it.effect("fails when units do not share a dimension", () =>
    Effect.gen(function* () {
      const error = yield* convertValue(registry, 1, "kg", "m").pipe(Effect.flip)
      expect(error).toBeInstanceOf(IncompatibleUnitsError)
      expect(error.message).toBe("Cannot convert kg [M] to m [L]: dimensions do not match")
    }),
  )

  it.effect("fails on malformed expressions", () =>
    Effect.gen(function* () {
      const error = yield* parseUnit(registry, "kg*").pipe(Effect.flip)
      expect(error).toBeInstanceOf(UnitParseError)
    }),
  )

  it.effect("resolves prefixed symbols that are not listed", () =>
    Effect.gen(function* () {
      expect((yield* lookupUnit(registry, "mV")).equals(MILLIVOLT)).toBe(true)
      expect((yield* lookupUnit(registry, "µs")).equals(MICROSECOND)).toBe(true)
      expect((yield* lookupUnit(registry, "mm")).equals(MILLIMETER)).toBe(true)
      const megametre = yield* lookupUnit(registry, "Mm")
      expect(megametre.getConverterTo(METER).convert(1)).toBe(1_000_000)
    }),
  )

  it.effect("accepts the micro sign and the Greek mu", () =>
    Effect.gen(function* () {
      const greek = yield* lookupUnit(registry, "μs")
      expect(greek.getConverterTo(SECOND).convert(1)).toBe(1e-6)
      const parsed = yield* parseUnit(registry, "μs^-1")
      expect(parsed.isCompatible(SECOND.pow(-1))).toBe(true)
    }),
  )

  it.effect("prefers exact symbols over prefixed readings", () =>
    Effect.gen(function* () {
      expect(yield* lookupUnit(registry, "m")).toBe(METER)
      expect(yield* lookupUnit(registry, "g")).toBe(GRAM)
      expect(yield* lookupUnit(registry, "kg")).toBe(KILOGRAM)
    }),
  )

  it.effect("converts quantities into parsed units", () =>
    Effect.gen(function* () {
      const converted = yield* convertQuantity(registry, new Quantity(KILOGRAM, 2.5), "g")
      expect(converted.value).toBe(2500)
      expect(converted.unit).toBe(GRAM)
    }),
  )

  it.effect("registers scaled definitions", () =>
    Effect.gen(function* () {
      const extended = extendRegistry(registry, [
        decodeDefinition({ symbol: "ft", definition: "m", factor: 0.3048 }),
        decodeDefinition({ symbol: "yd", definition: "ft", factor: 3 }),
      ])
      expect(yield* convertValue(extended, 1, "yd", "m")).toBeCloseTo(0.9144, 12)
      expect(yield* convertValue(extended, 10, "ft", "mm")).toBeCloseTo(3048, 9)
    }),
  )

  it.effect("registers affine definitions", () =>
    Effect.gen(function* () {
      const extended = extendRegistry(registry, [
        decodeDefinition({ symbol: "°F", definition: "K", factor: 5 / 9, offset: 459.67 }),
      ])
      expect(yield* convertValue(extended, 32, "°F", "°C")).toBeCloseTo(0, 9)
      expect(yield* convertValue(extended, 212, "°F", "°C")).toBeCloseTo(100, 9)
    }),
  )

  it("names a definition after its symbol", () => {
    const unit = defineUnit(registry, decodeDefinition({ symbol: "Hz2", definition: "1/s^2" }))
    expect(unit.toString()).toBe("Hz2")
    expect(unit.isCompatible(SECOND.pow(-2))).toBe(true)
  })

  it("rejects definitions with a blank symbol or a non-positive factor", () => {
    const decode = Schema.decodeUnknownEither(UnitDefinition)
    expect(Either.isLeft(decode({ symbol: " ", definition: "m" }))).toBe(true)
    expect(Either.isLeft(decode({ symbol: "x", definition: "m", factor: 0 }))).toBe(true)
    expect(Either.isRight(decode({ symbol: "x", definition: "m" }))).toBe(true)
  })

  it("shadows earlier registrations with later ones", () => {
    const shadowing = extendRegistry(registry, [decodeDefinition({ symbol: "m", definition: "km" })])
    expect(shadowing.get("m")?.getConverterTo(METER).convert(1)).toBe(1000)
    expect(registry.get("m")).toBe(METER)
  })
})
