/**
 * Unit algebra: base, alternate, product and transformed units.
 *
 * Every unit knows its dimension, its decomposition into base units, and a
 * converter to the coherent SI unit of that dimension. Conversions between
 * two units go through the coherent unit, so any pair of units with equal
 * dimensions is convertible.
 *
 * @since 0.1.0
 */

import { Equal, Hash } from "effect"
import { Dimension, formatPower, type BaseDimension } from "./Dimension.js"
import { IncompatibleUnitsError, UnsupportedOperationError } from "./Errors.js"
import { RationalNumber, toRational } from "./Rational.js"
import { IDENTITY, offsetConverter, scaleConverter, type UnitConverter } from "./UnitConverter.js"

/**
 * A unit raised to a rational exponent.
 *
 * @category Models
 * @since 0.1.0
 */
export interface UnitFactor<U extends Unit = Unit> {
  readonly unit: U
  readonly exponent: RationalNumber
}

/**
 * Common behaviour of every unit.
 *
 * @category Models
 * @since 0.1.0
 */
export abstract class Unit implements Equal.Equal {
  abstract readonly _tag: "BaseUnit" | "AlternateUnit" | "ProductUnit" | "TransformedUnit"
  abstract readonly dimension: Dimension

  /** Converter from this unit to the coherent unit of its dimension. */
  abstract toCoherent(): UnitConverter

  /** Decomposition into base units. */
  abstract baseUnits(): ReadonlyArray<UnitFactor<BaseUnit>>

  abstract equals(that: Unit): boolean

  abstract toString(): string

  multiply(that: Unit): Unit {
    return productOf([factor(this, RationalNumber.ONE), factor(that, RationalNumber.ONE)])
  }

  divide(that: Unit): Unit {
    return productOf([factor(this, RationalNumber.ONE), factor(that, RationalNumber.ONE.negate())])
  }

  pow(exponent: RationalNumber | number): Unit {
    return productOf([factor(this, toRational(exponent, "Unit.pow"))])
  }

  root(n: number): Unit {
    return this.pow(RationalNumber.make(1, n))
  }

  sqrt(): Unit {
    return this.pow(RationalNumber.HALF)
  }

  inverse(): Unit {
    return this.pow(RationalNumber.ONE.negate())
  }

  /** Unit whose values are `factor` times this unit: `KILOGRAM.dividedBy(1000)` is a gram. */
  times(scale: RationalNumber | number): Unit {
    return transformed(this, scaleConverter(scale))
  }

  dividedBy(scale: RationalNumber | number): Unit {
    if (scale instanceof RationalNumber) {
      return this.times(scale.reciprocal())
    }
    return Number.isSafeInteger(scale) ? this.times(RationalNumber.make(1, scale)) : this.times(1 / scale)
  }

  /** Unit whose zero lies at `offset` in this unit: `KELVIN.plus(273.15)` is degree Celsius. */
  plus(offset: number): Unit {
    return transformed(this, offsetConverter(offset))
  }

  isCompatible(that: Unit): boolean {
    return this.dimension.equals(that.dimension)
  }

  /**
   * Converter from values in this unit to values in `that` unit.
   * Fails with `IncompatibleUnitsError` when the dimensions differ.
   */
  getConverterTo(that: Unit): UnitConverter {
    if (!this.isCompatible(that)) {
      throw new IncompatibleUnitsError({
        from: this.toString(),
        to: that.toString(),
        fromDimension: this.dimension.toString(),
        toDimension: that.dimension.toString(),
      })
    }
    return this.toCoherent().andThen(that.toCoherent().inverse())
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof Unit && this.equals(that)
  }

  [Hash.symbol](): number {
    return Hash.string(`${this._tag}:${this.dimension.toString()}`)
  }
}

/**
 * One unit per base dimension.
 *
 * @category Models
 * @since 0.1.0
 */
export class BaseUnit extends Unit {
  readonly _tag = "BaseUnit"
  readonly dimension: Dimension

  constructor(
    readonly symbol: string,
    readonly baseDimension: BaseDimension,
  ) {
    super()
    this.dimension = Dimension.base(baseDimension)
  }

  toCoherent(): UnitConverter {
    return IDENTITY
  }

  baseUnits(): ReadonlyArray<UnitFactor<BaseUnit>> {
    return [{ unit: this, exponent: RationalNumber.ONE }]
  }

  equals(that: Unit): boolean {
    return that instanceof BaseUnit && that.symbol === this.symbol && that.baseDimension === this.baseDimension
  }

  toString(): string {
    return this.symbol
  }
}

/**
 * A named unit defined by a converter from its values to values of a
 * reference unit (a volt is a watt per ampere; a millivolt is 1/1000 volt).
 *
 * @category Models
 * @since 0.1.0
 */
export class AlternateUnit extends Unit {
  readonly _tag = "AlternateUnit"

  constructor(
    readonly symbol: string,
    readonly reference: Unit,
    readonly converter: UnitConverter = IDENTITY,
  ) {
    super()
  }

  get dimension(): Dimension {
    return this.reference.dimension
  }

  toCoherent(): UnitConverter {
    return this.converter.andThen(this.reference.toCoherent())
  }

  baseUnits(): ReadonlyArray<UnitFactor<BaseUnit>> {
    return this.reference.baseUnits()
  }

  equals(that: Unit): boolean {
    return (
      that instanceof AlternateUnit &&
      that.symbol === this.symbol &&
      that.reference.equals(this.reference) &&
      that.converter.equals(this.converter)
    )
  }

  toString(): string {
    return this.symbol
  }
}

/**
 * An unnamed unit derived from a parent unit by a scale factor or offset.
 *
 * @category Models
 * @since 0.1.0
 */
export class TransformedUnit extends Unit {
  readonly _tag = "TransformedUnit"

  constructor(
    readonly parent: Unit,
    readonly converter: UnitConverter,
  ) {
    super()
  }

  get dimension(): Dimension {
    return this.parent.dimension
  }

  toCoherent(): UnitConverter {
    return this.converter.andThen(this.parent.toCoherent())
  }

  baseUnits(): ReadonlyArray<UnitFactor<BaseUnit>> {
    return this.parent.baseUnits()
  }

  equals(that: Unit): boolean {
    return that instanceof TransformedUnit && that.parent.equals(this.parent) && that.converter.equals(this.converter)
  }

  toString(): string {
    const parent = this.parent instanceof ProductUnit ? `(${this.parent.toString()})` : this.parent.toString()
    return `${parent}${this.converter.toString()}`
  }
}

/**
 * A product of units raised to rational powers. The empty product is the
 * dimensionless unit `ONE`.
 *
 * @category Models
 * @since 0.1.0
 */
export class ProductUnit extends Unit {
  readonly _tag = "ProductUnit"
  readonly dimension: Dimension

  constructor(readonly factors: ReadonlyArray<UnitFactor>) {
    super()
    this.dimension = factors.reduce(
      (dimension, { unit, exponent }) => dimension.multiply(unit.dimension.pow(exponent)),
      Dimension.of({}),
    )
  }

  toCoherent(): UnitConverter {
    return this.factors.reduce<UnitConverter>((converter, { unit, exponent }) => {
      const step = unit.toCoherent()
      if (!step.isLinear()) {
        throw new UnsupportedOperationError({
          operation: "multiply",
          left: unit.toString(),
          reason: "units with an offset cannot take part in a product",
        })
      }
      return converter.andThen(step.pow(exponent))
    }, IDENTITY)
  }

  baseUnits(): ReadonlyArray<UnitFactor<BaseUnit>> {
    return mergeFactors(
      this.factors.flatMap(({ unit, exponent }) =>
        unit.baseUnits().map((base) => ({ unit: base.unit, exponent: base.exponent.multiply(exponent) })),
      ),
    )
  }

  equals(that: Unit): boolean {
    return (
      that instanceof ProductUnit &&
      that.factors.length === this.factors.length &&
      this.factors.every((mine) =>
        that.factors.some((theirs) => theirs.unit.equals(mine.unit) && theirs.exponent.equals(mine.exponent)),
      )
    )
  }

  /**
   * Render as `kg*m/s^2`, `m^(1/2)` or `1/s`.
   */
  toString(): string {
    const render = ({ unit, exponent }: UnitFactor): string => {
      const symbol = unit instanceof TransformedUnit ? `(${unit.toString()})` : unit.toString()
      return formatPower(symbol, exponent)
    }
    const numerator = this.factors.filter(({ exponent }) => !exponent.isNegative())
    const denominator = this.factors.filter(({ exponent }) => exponent.isNegative())
    if (numerator.length === 0 && denominator.length === 0) {
      return "1"
    }
    const head = numerator.length === 0 ? "1" : numerator.map(render).join("*")
    const tail = denominator.map(({ unit, exponent }) => `/${render({ unit, exponent: exponent.negate() })}`)
    return `${head}${tail.join("")}`
  }
}

const factor = (unit: Unit, exponent: RationalNumber): UnitFactor => ({ unit, exponent })

const mergeFactors = <U extends Unit>(factors: ReadonlyArray<UnitFactor<U>>): ReadonlyArray<UnitFactor<U>> => {
  const merged: Array<UnitFactor<U>> = []
  for (const next of factors) {
    const index = merged.findIndex(({ unit }) => unit.equals(next.unit))
    const existing = merged[index]
    if (existing === undefined) {
      merged.push(next)
    } else {
      merged[index] = { unit: existing.unit, exponent: existing.exponent.add(next.exponent) }
    }
  }
  return merged.filter(({ exponent }) => !exponent.isZero())
}

/**
 * Compose a product unit. Nested products are flattened, equal factors are
 * merged and zero exponents dropped; a single factor with exponent 1 collapses
 * to that factor.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const productOf = (factors: ReadonlyArray<UnitFactor>): Unit => {
  const flattened = factors.flatMap(({ unit, exponent }) =>
    unit instanceof ProductUnit
      ? unit.factors.map((inner) => factor(inner.unit, inner.exponent.multiply(exponent)))
      : [factor(unit, exponent)],
  )
  const merged = mergeFactors(flattened)
  const [only] = merged
  if (only === undefined) {
    return ONE
  }
  return merged.length === 1 && only.exponent.equals(RationalNumber.ONE) ? only.unit : new ProductUnit(merged)
}

const transformed = (parent: Unit, converter: UnitConverter): Unit => {
  if (converter.isIdentity()) {
    return parent
  }
  return parent instanceof TransformedUnit
    ? transformed(parent.parent, converter.andThen(parent.converter))
    : new TransformedUnit(parent, converter)
}

/**
 * Name a unit. A transformed unit is unwrapped so that the alternate unit is
 * defined directly by its converter to the parent.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const mV = alternateUnit("mV", VOLT.dividedBy(1000))
 * VOLT.getConverterTo(mV).convert(2) // 2000
 * ```
 */
export const alternateUnit = (symbol: string, unit: Unit): AlternateUnit =>
  unit instanceof TransformedUnit ? new AlternateUnit(symbol, unit.parent, unit.converter) : new AlternateUnit(symbol, unit)

/**
 * Type guard for units.
 *
 * @category Guards
 * @since 0.1.0
 */
export const isUnit = (value: unknown): value is Unit => value instanceof Unit

/**
 * The dimensionless unit.
 *
 * @since 0.1.0
 */
export const ONE: ProductUnit = new ProductUnit([])
