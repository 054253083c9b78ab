/**
 * Invertible linear and affine converters between units.
 *
 * Every unit carries a converter to the coherent (SI) unit of its dimension.
 * Converters compose with `andThen`; adjacent linear steps merge so that a
 * round trip through the same factor collapses to the identity.
 *
 * @since 0.1.0
 */

import { Equal, Hash } from "effect"
import { UnsupportedOperationError } from "./Errors.js"
import { RationalNumber } from "./Rational.js"

/**
 * Common behaviour of all converters.
 *
 * @category Models
 * @since 0.1.0
 */
export abstract class BaseConverter implements Equal.Equal {
  abstract readonly _tag: "Identity" | "Rational" | "Multiply" | "Add" | "Compound"

  /** Apply the converter to a plain number. */
  abstract convert(value: number): number

  abstract inverse(): UnitConverter

  /** Individual steps, applied left to right. */
  abstract steps(): ReadonlyArray<ConverterStep>

  abstract toString(): string

  /** `true` when the converter has no additive offset. */
  isLinear(): boolean {
    return this.steps().every((step) => step._tag !== "Add")
  }

  isIdentity(): boolean {
    return this.steps().length === 0
  }

  /**
   * Converter applying `this` first and `next` afterwards.
   */
  andThen(next: UnitConverter): UnitConverter {
    return fromSteps([...this.steps(), ...next.steps()])
  }

  /**
   * Raise a linear converter to a rational power; used when a unit appears in
   * a product with an exponent.
   */
  pow(exponent: RationalNumber): UnitConverter {
    if (!this.isLinear()) {
      throw new UnsupportedOperationError({
        operation: "pow",
        left: `converter ${this.toString()}`,
        reason: "offset converters cannot be raised to a power",
      })
    }
    return fromSteps(this.steps().map((step) => powStep(step, exponent)))
  }

  equals(that: BaseConverter): boolean {
    const mine = this.steps()
    const theirs = that.steps()
    return mine.length === theirs.length && mine.every((step, i) => {
      const other = theirs[i]
      return other !== undefined && stepEquals(step, other)
    })
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof BaseConverter && this.equals(that)
  }

  [Hash.symbol](): number {
    return Hash.string(this.toString())
  }
}

/**
 * The identity converter.
 *
 * @category Models
 * @since 0.1.0
 */
export class IdentityConverter extends BaseConverter {
  readonly _tag = "Identity"

  convert(value: number): number {
    return value
  }

  inverse(): UnitConverter {
    return this
  }

  steps(): ReadonlyArray<ConverterStep> {
    return []
  }

  toString(): string {
    return ""
  }
}

/**
 * Exact multiplication by `dividend / divisor`.
 *
 * @category Models
 * @since 0.1.0
 */
export class RationalConverter extends BaseConverter {
  readonly _tag = "Rational"

  constructor(readonly factor: RationalNumber) {
    super()
  }

  convert(value: number): number {
    return (value * Number(this.factor.numerator)) / Number(this.factor.denominator)
  }

  inverse(): ConverterStep {
    return new RationalConverter(this.factor.reciprocal())
  }

  steps(): ReadonlyArray<ConverterStep> {
    return [this]
  }

  toString(): string {
    const { numerator, denominator } = this.factor
    const times = numerator === 1n ? "" : `*${numerator}`
    const over = denominator === 1n ? "" : `/${denominator}`
    return `${times}${over}`
  }
}

/**
 * Multiplication by an inexact floating-point factor.
 *
 * @category Models
 * @since 0.1.0
 */
export class MultiplyConverter extends BaseConverter {
  readonly _tag = "Multiply"

  constructor(readonly factor: number) {
    super()
  }

  convert(value: number): number {
    return value * this.factor
  }

  inverse(): ConverterStep {
    return new MultiplyConverter(1 / this.factor)
  }

  steps(): ReadonlyArray<ConverterStep> {
    return [this]
  }

  toString(): string {
    return `*${this.factor}`
  }
}

/**
 * Addition of a constant offset (an affine step, e.g. Celsius to kelvin).
 *
 * @category Models
 * @since 0.1.0
 */
export class AddConverter extends BaseConverter {
  readonly _tag = "Add"

  constructor(readonly offset: number) {
    super()
  }

  convert(value: number): number {
    return value + this.offset
  }

  inverse(): ConverterStep {
    return new AddConverter(-this.offset)
  }

  steps(): ReadonlyArray<ConverterStep> {
    return [this]
  }

  toString(): string {
    return this.offset < 0 ? `${this.offset}` : `+${this.offset}`
  }
}

/**
 * A sequence of steps that could not be merged into one.
 *
 * @category Models
 * @since 0.1.0
 */
export class CompoundConverter extends BaseConverter {
  readonly _tag = "Compound"

  constructor(readonly parts: ReadonlyArray<ConverterStep>) {
    super()
  }

  convert(value: number): number {
    return this.parts.reduce((current, step) => step.convert(current), value)
  }

  inverse(): UnitConverter {
    return fromSteps([...this.parts].reverse().map((step) => step.inverse()))
  }

  steps(): ReadonlyArray<ConverterStep> {
    return this.parts
  }

  toString(): string {
    return this.parts.map((step) => step.toString()).join("")
  }
}

/**
 * A single converter step.
 *
 * @category Models
 * @since 0.1.0
 */
export type ConverterStep = RationalConverter | MultiplyConverter | AddConverter

/**
 * Any unit converter.
 *
 * @category Models
 * @since 0.1.0
 */
export type UnitConverter = IdentityConverter | ConverterStep | CompoundConverter

/** @since 0.1.0 */
export const IDENTITY: IdentityConverter = new IdentityConverter()

const isNeutral = (step: ConverterStep): boolean => {
  switch (step._tag) {
    case "Rational":
      return step.factor.equals(RationalNumber.ONE)
    case "Multiply":
      return step.factor === 1
    case "Add":
      return step.offset === 0
  }
}

const merge = (first: ConverterStep, second: ConverterStep): ConverterStep | undefined => {
  if (first._tag === "Rational" && second._tag === "Rational") {
    return new RationalConverter(first.factor.multiply(second.factor))
  }
  if (first._tag === "Add" && second._tag === "Add") {
    return new AddConverter(first.offset + second.offset)
  }
  if (first._tag !== "Add" && second._tag !== "Add") {
    return new MultiplyConverter(scaleOf(first) * scaleOf(second))
  }
  return undefined
}

const scaleOf = (step: RationalConverter | MultiplyConverter): number =>
  step._tag === "Rational" ? step.factor.toNumber() : step.factor

const fromSteps = (input: ReadonlyArray<ConverterStep>): UnitConverter => {
  const merged: Array<ConverterStep> = []
  for (const step of input) {
    const previous = merged.at(-1)
    const combined = previous === undefined ? undefined : merge(previous, step)
    if (combined === undefined) {
      merged.push(step)
    } else {
      merged[merged.length - 1] = combined
    }
    const last = merged.at(-1)
    if (last !== undefined && isNeutral(last)) {
      merged.pop()
    }
  }
  const [only] = merged
  if (only === undefined) {
    return IDENTITY
  }
  return merged.length === 1 ? only : new CompoundConverter(merged)
}

const powStep = (step: ConverterStep, exponent: RationalNumber): ConverterStep => {
  switch (step._tag) {
    case "Rational":
      return exponent.isInteger()
        ? new RationalConverter(step.factor.pow(Number(exponent.numerator)))
        : new MultiplyConverter(Math.pow(step.factor.toNumber(), exponent.toNumber()))
    case "Multiply":
      return new MultiplyConverter(Math.pow(step.factor, exponent.toNumber()))
    case "Add":
      throw new UnsupportedOperationError({
        operation: "pow",
        left: `converter ${step.toString()}`,
        reason: "offset converters cannot be raised to a power",
      })
  }
}

const stepEquals = (left: ConverterStep, right: ConverterStep): boolean => {
  switch (left._tag) {
    case "Rational":
      return right._tag === "Rational" && left.factor.equals(right.factor)
    case "Multiply":
      return right._tag === "Multiply" && left.factor === right.factor
    case "Add":
      return right._tag === "Add" && left.offset === right.offset
  }
}

/**
 * Converter multiplying by an exact factor, or by a float when given one.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const scaleConverter = (factor: RationalNumber | number): UnitConverter => {
  if (factor instanceof RationalNumber) {
    return fromSteps([new RationalConverter(factor)])
  }
  return Number.isSafeInteger(factor)
    ? fromSteps([new RationalConverter(RationalNumber.fromInteger(factor))])
    : fromSteps([new MultiplyConverter(factor)])
}

/**
 * Converter adding a constant offset.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const offsetConverter = (offset: number): UnitConverter => fromSteps([new AddConverter(offset)])
