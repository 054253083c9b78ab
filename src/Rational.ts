/**
 * Exact rational arithmetic.
 *
 * A `RationalNumber` is always stored in lowest terms with a positive
 * denominator, so structural equality is value equality. Dimension exponents
 * and exact unit scale factors are rational numbers.
 *
 * @since 0.1.0
 */

import { Equal, Hash } from "effect"
import { DivisionByZeroError, UnsupportedOperationError } from "./Errors.js"

const abs = (value: bigint): bigint => (value < 0n ? -value : value)

const gcd = (left: bigint, right: bigint): bigint => {
  let a = abs(left)
  let b = abs(right)
  while (b !== 0n) {
    const t = a % b
    a = b
    b = t
  }
  return a
}

const toBigInt = (value: bigint | number, operation: string): bigint => {
  if (typeof value === "bigint") {
    return value
  }
  if (!Number.isSafeInteger(value)) {
    throw new UnsupportedOperationError({
      operation,
      left: String(value),
      reason: "rational components must be safe integers",
    })
  }
  return BigInt(value)
}

/**
 * Exact fraction `numerator / denominator`.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * RationalNumber.make(4, 8).equals(RationalNumber.make(1, 2)) // true
 * ```
 */
export class RationalNumber implements Equal.Equal {
  readonly _tag = "RationalNumber"

  static readonly ZERO: RationalNumber = new RationalNumber(0n, 1n)
  static readonly ONE: RationalNumber = new RationalNumber(1n, 1n)
  static readonly HALF: RationalNumber = new RationalNumber(1n, 2n)

  readonly numerator: bigint
  readonly denominator: bigint

  private constructor(numerator: bigint, denominator: bigint) {
    this.numerator = numerator
    this.denominator = denominator
  }

  /**
   * Build a reduced fraction. Fails with `DivisionByZeroError` when the
   * denominator is zero.
   */
  static make(numerator: bigint | number, denominator: bigint | number = 1n): RationalNumber {
    const n = toBigInt(numerator, "RationalNumber.make")
    const d = toBigInt(denominator, "RationalNumber.make")
    if (d === 0n) {
      throw new DivisionByZeroError({ operation: "RationalNumber.make", dividend: n.toString() })
    }
    const divisor = gcd(n, d)
    const sign = d < 0n ? -1n : 1n
    return n === 0n ? new RationalNumber(0n, 1n) : new RationalNumber((sign * n) / divisor, (sign * d) / divisor)
  }

  static fromInteger(value: bigint | number): RationalNumber {
    return RationalNumber.make(value, 1n)
  }

  /**
   * Find the fraction with the smallest denominator (up to `maxDenominator`)
   * that lies within `tolerance` of `value`, using continued fractions.
   * Returns `undefined` when no such fraction exists.
   */
  static approximate(value: number, maxDenominator = 1000, tolerance = 1e-12): RationalNumber | undefined {
    if (!Number.isFinite(value)) {
      return undefined
    }
    if (Number.isSafeInteger(value)) {
      return RationalNumber.fromInteger(value)
    }
    let [h0, h1] = [0, 1]
    let [k0, k1] = [1, 0]
    let x = value
    for (let i = 0; i < 64; i++) {
      const a = Math.floor(x)
      ;[h0, h1] = [h1, a * h1 + h0]
      ;[k0, k1] = [k1, a * k1 + k0]
      if (k1 > maxDenominator) {
        return undefined
      }
      if (Math.abs(value - h1 / k1) <= tolerance) {
        return RationalNumber.make(h1, k1)
      }
      const fraction = x - a
      if (fraction === 0) {
        return undefined
      }
      x = 1 / fraction
    }
    return undefined
  }

  add(that: RationalNumber): RationalNumber {
    return RationalNumber.make(
      this.numerator * that.denominator + that.numerator * this.denominator,
      this.denominator * that.denominator,
    )
  }

  subtract(that: RationalNumber): RationalNumber {
    return this.add(that.negate())
  }

  multiply(that: RationalNumber): RationalNumber {
    return RationalNumber.make(this.numerator * that.numerator, this.denominator * that.denominator)
  }

  divide(that: RationalNumber): RationalNumber {
    if (that.isZero()) {
      throw new DivisionByZeroError({ operation: "RationalNumber.divide", dividend: this.toString() })
    }
    return RationalNumber.make(this.numerator * that.denominator, this.denominator * that.numerator)
  }

  negate(): RationalNumber {
    return new RationalNumber(-this.numerator, this.denominator)
  }

  abs(): RationalNumber {
    return this.numerator < 0n ? this.negate() : this
  }

  reciprocal(): RationalNumber {
    return RationalNumber.ONE.divide(this)
  }

  /**
   * Raise to an integer power. Negative exponents invert the fraction.
   */
  pow(exponent: number): RationalNumber {
    if (!Number.isSafeInteger(exponent)) {
      throw new UnsupportedOperationError({
        operation: "RationalNumber.pow",
        left: this.toString(),
        right: String(exponent),
        reason: "exact powers need an integer exponent",
      })
    }
    const base = exponent < 0 ? this.reciprocal() : this
    const e = BigInt(Math.abs(exponent))
    return RationalNumber.make(base.numerator ** e, base.denominator ** e)
  }

  compare(that: RationalNumber): -1 | 0 | 1 {
    const difference = this.numerator * that.denominator - that.numerator * this.denominator
    return difference < 0n ? -1 : difference > 0n ? 1 : 0
  }

  isZero(): boolean {
    return this.numerator === 0n
  }

  isInteger(): boolean {
    return this.denominator === 1n
  }

  isNegative(): boolean {
    return this.numerator < 0n
  }

  toNumber(): number {
    return Number(this.numerator) / Number(this.denominator)
  }

  equals(that: RationalNumber): boolean {
    return this.numerator === that.numerator && this.denominator === that.denominator
  }

  toString(): string {
    return this.isInteger() ? this.numerator.toString() : `${this.numerator}/${this.denominator}`
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof RationalNumber && this.equals(that)
  }

  [Hash.symbol](): number {
    return Hash.string(this.toString())
  }
}

/**
 * Type guard for rational numbers.
 *
 * @category Guards
 * @since 0.1.0
 */
export const isRationalNumber = (value: unknown): value is RationalNumber => value instanceof RationalNumber

/**
 * Coerce an exponent given as a number or fraction into a `RationalNumber`.
 * Non-integer numbers must lie within 1e-12 of a fraction whose denominator
 * does not exceed 1000.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const toRational = (value: RationalNumber | number, operation = "toRational"): RationalNumber => {
  if (value instanceof RationalNumber) {
    return value
  }
  const approximation = RationalNumber.approximate(value)
  if (approximation === undefined) {
    throw new UnsupportedOperationError({
      operation,
      left: String(value),
      reason: "exponent has no exact rational form",
    })
  }
  return approximation
}
