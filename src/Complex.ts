/**
 * Immutable complex numbers over IEEE-754 doubles.
 *
 * @since 0.1.0
 */

import { Equal, Hash } from "effect"

/**
 * Complex number `re + i·im`.
 *
 * @category Models
 * @since 0.1.0
 */
export class Complex implements Equal.Equal {
  readonly _tag = "Complex"

  constructor(
    readonly re: number,
    readonly im: number = 0,
  ) {}

  static fromPolar(magnitude: number, phase: number): Complex {
    return new Complex(magnitude * Math.cos(phase), magnitude * Math.sin(phase))
  }

  add(that: Complex): Complex {
    return new Complex(this.re + that.re, this.im + that.im)
  }

  subtract(that: Complex): Complex {
    return new Complex(this.re - that.re, this.im - that.im)
  }

  multiply(that: Complex): Complex {
    return new Complex(this.re * that.re - this.im * that.im, this.re * that.im + this.im * that.re)
  }

  divide(that: Complex): Complex {
    const denominator = that.re * that.re + that.im * that.im
    return new Complex(
      (this.re * that.re + this.im * that.im) / denominator,
      (this.im * that.re - this.re * that.im) / denominator,
    )
  }

  scale(factor: number): Complex {
    return new Complex(this.re * factor, this.im * factor)
  }

  negate(): Complex {
    return new Complex(-this.re, -this.im)
  }

  conjugate(): Complex {
    return new Complex(this.re, -this.im)
  }

  abs(): number {
    return Math.hypot(this.re, this.im)
  }

  arg(): number {
    return Math.atan2(this.im, this.re)
  }

  /** Principal square root. */
  sqrt(): Complex {
    if (this.im === 0) {
      return this.re >= 0 ? new Complex(Math.sqrt(this.re), 0) : new Complex(0, Math.sqrt(-this.re))
    }
    const modulus = this.abs()
    const re = Math.sqrt((modulus + this.re) / 2)
    const im = Math.sign(this.im) * Math.sqrt((modulus - this.re) / 2)
    return new Complex(re, im)
  }

  exp(): Complex {
    return Complex.fromPolar(Math.exp(this.re), this.im)
  }

  /** Principal natural logarithm. */
  log(): Complex {
    return new Complex(Math.log(this.abs()), this.arg())
  }

  /** Principal power `this^that = exp(that · log(this))`; `0^w` is 0 for w ≠ 0. */
  pow(that: Complex): Complex {
    if (this.re === 0 && this.im === 0) {
      return that.re === 0 && that.im === 0 ? new Complex(1, 0) : new Complex(0, 0)
    }
    return that.multiply(this.log()).exp()
  }

  sin(): Complex {
    return new Complex(Math.sin(this.re) * Math.cosh(this.im), Math.cos(this.re) * Math.sinh(this.im))
  }

  cos(): Complex {
    return new Complex(Math.cos(this.re) * Math.cosh(this.im), -Math.sin(this.re) * Math.sinh(this.im))
  }

  tan(): Complex {
    return this.sin().divide(this.cos())
  }

  isReal(): boolean {
    return this.im === 0
  }

  equals(that: Complex): boolean {
    return this.re === that.re && this.im === that.im
  }

  toString(): string {
    if (this.im === 0) {
      return String(this.re)
    }
    const sign = this.im < 0 || Object.is(this.im, -0) ? "-" : "+"
    return `(${this.re}${sign}${Math.abs(this.im)}i)`
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof Complex && this.equals(that)
  }

  [Hash.symbol](): number {
    return Hash.combine(Hash.number(this.re))(Hash.number(this.im))
  }
}

/**
 * Type guard for complex numbers.
 *
 * @category Guards
 * @since 0.1.0
 */
export const isComplex = (value: unknown): value is Complex => value instanceof Complex

/** @since 0.1.0 */
export const I: Complex = new Complex(0, 1)
