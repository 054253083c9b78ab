/**
 * Physical dimensions as rational-exponent vectors over the seven SI base
 * dimensions.
 *
 * @since 0.1.0
 */

import { Equal, Hash } from "effect"
import { RationalNumber, toRational } from "./Rational.js"

const { ONE, ZERO } = RationalNumber

/**
 * Names of the base dimensions, in vector order.
 *
 * @since 0.1.0
 */
export const BASE_DIMENSIONS = [
  "length",
  "mass",
  "time",
  "current",
  "temperature",
  "amount",
  "luminousIntensity",
] as const

/**
 * @since 0.1.0
 */
export type BaseDimension = (typeof BASE_DIMENSIONS)[number]

const SYMBOLS: Readonly<Record<BaseDimension, string>> = {
  length: "L",
  mass: "M",
  time: "T",
  current: "I",
  temperature: "Θ",
  amount: "N",
  luminousIntensity: "J",
}

/**
 * Render a factor `symbol^exponent` the way units and dimensions print:
 * `x`, `x^2`, `x^-1`, `x^(1/2)`.
 *
 * @internal
 */
export const formatPower = (symbol: string, exponent: RationalNumber): string => {
  if (exponent.equals(ONE)) {
    return symbol
  }
  return exponent.isInteger() ? `${symbol}^${exponent}` : `${symbol}^(${exponent})`
}

/**
 * Immutable dimension vector. Two dimensions are equal exactly when every
 * exponent is equal.
 *
 * @category Models
 * @since 0.1.0
 */
export class Dimension implements Equal.Equal {
  readonly _tag = "Dimension"
  readonly exponents: ReadonlyArray<RationalNumber>

  private constructor(exponents: ReadonlyArray<RationalNumber>) {
    this.exponents = Object.freeze([...exponents])
  }

  /**
   * Build a dimension from a partial map of base dimension to exponent.
   */
  static of(exponents: Partial<Record<BaseDimension, RationalNumber | number>>): Dimension {
    return new Dimension(
      BASE_DIMENSIONS.map((name) => {
        const exponent = exponents[name]
        return exponent === undefined ? ZERO : toRational(exponent, "Dimension.of")
      }),
    )
  }

  static base(name: BaseDimension): Dimension {
    const exponents: Partial<Record<BaseDimension, RationalNumber>> = {}
    exponents[name] = ONE
    return Dimension.of(exponents)
  }

  exponentOf(name: BaseDimension): RationalNumber {
    return this.exponents[BASE_DIMENSIONS.indexOf(name)] ?? ZERO
  }

  multiply(that: Dimension): Dimension {
    return new Dimension(this.exponents.map((exponent, i) => exponent.add(that.exponents[i] ?? ZERO)))
  }

  divide(that: Dimension): Dimension {
    return this.multiply(that.pow(ONE.negate()))
  }

  pow(exponent: RationalNumber | number): Dimension {
    const r = toRational(exponent, "Dimension.pow")
    return new Dimension(this.exponents.map((e) => e.multiply(r)))
  }

  root(n: number): Dimension {
    return this.pow(RationalNumber.make(1, n))
  }

  isDimensionless(): boolean {
    return this.exponents.every((exponent) => exponent.isZero())
  }

  equals(that: Dimension): boolean {
    return this.exponents.every((exponent, i) => {
      const other = that.exponents[i]
      return other !== undefined && exponent.equals(other)
    })
  }

  /**
   * Render as `L*M*T^-2`; the dimensionless vector renders as `1`.
   */
  toString(): string {
    const factors = BASE_DIMENSIONS.flatMap((name, i) => {
      const exponent = this.exponents[i]
      return exponent === undefined || exponent.isZero() ? [] : [formatPower(SYMBOLS[name], exponent)]
    })
    return factors.length === 0 ? "1" : factors.join("*")
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof Dimension && this.equals(that)
  }

  [Hash.symbol](): number {
    return Hash.string(this.toString())
  }
}

/** @since 0.1.0 */
export const NONE: Dimension = Dimension.of({})
/** @since 0.1.0 */
export const LENGTH: Dimension = Dimension.base("length")
/** @since 0.1.0 */
export const MASS: Dimension = Dimension.base("mass")
/** @since 0.1.0 */
export const TIME: Dimension = Dimension.base("time")
/** @since 0.1.0 */
export const CURRENT: Dimension = Dimension.base("current")
/** @since 0.1.0 */
export const TEMPERATURE: Dimension = Dimension.base("temperature")
/** @since 0.1.0 */
export const AMOUNT: Dimension = Dimension.base("amount")
/** @since 0.1.0 */
export const LUMINOUS_INTENSITY: Dimension = Dimension.base("luminousIntensity")
