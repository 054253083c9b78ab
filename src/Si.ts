/**
 * The SI unit catalogue.
 *
 * Constants are created once when the module loads and are never modified;
 * `SI_UNITS` and `SI_PREFIXES` are frozen. Derived units are alternate units
 * of products of base units, so conversions between, say, a volt and a watt
 * per ampere are the identity.
 *
 * @since 0.1.0
 */

import { UnitNotFoundError } from "./Errors.js"
import { RationalNumber } from "./Rational.js"
import { AlternateUnit, BaseUnit, ONE, alternateUnit, type Unit } from "./Unit.js"

// Base units

/** @since 0.1.0 */
export const METER = new BaseUnit("m", "length")
/** @since 0.1.0 */
export const KILOGRAM = new BaseUnit("kg", "mass")
/** @since 0.1.0 */
export const SECOND = new BaseUnit("s", "time")
/** @since 0.1.0 */
export const AMPERE = new BaseUnit("A", "current")
/** @since 0.1.0 */
export const KELVIN = new BaseUnit("K", "temperature")
/** @since 0.1.0 */
export const MOLE = new BaseUnit("mol", "amount")
/** @since 0.1.0 */
export const CANDELA = new BaseUnit("cd", "luminousIntensity")

// Dimensionless

/** @since 0.1.0 */
export const RADIAN = new AlternateUnit("rad", ONE)
/** @since 0.1.0 */
export const STERADIAN = new AlternateUnit("sr", ONE)

// Derived units with special names

/** @since 0.1.0 */
export const HERTZ = new AlternateUnit("Hz", SECOND.inverse())
/** @since 0.1.0 */
export const NEWTON = new AlternateUnit("N", KILOGRAM.multiply(METER).divide(SECOND.pow(2)))
/** @since 0.1.0 */
export const PASCAL = new AlternateUnit("Pa", NEWTON.divide(METER.pow(2)))
/** @since 0.1.0 */
export const JOULE = new AlternateUnit("J", NEWTON.multiply(METER))
/** @since 0.1.0 */
export const WATT = new AlternateUnit("W", JOULE.divide(SECOND))
/** @since 0.1.0 */
export const COULOMB = new AlternateUnit("C", SECOND.multiply(AMPERE))
/** @since 0.1.0 */
export const VOLT = new AlternateUnit("V", WATT.divide(AMPERE))
/** @since 0.1.0 */
export const FARAD = new AlternateUnit("F", COULOMB.divide(VOLT))
/** @since 0.1.0 */
export const OHM = new AlternateUnit("Ω", VOLT.divide(AMPERE))
/** @since 0.1.0 */
export const SIEMENS = new AlternateUnit("S", AMPERE.divide(VOLT))
/** @since 0.1.0 */
export const WEBER = new AlternateUnit("Wb", VOLT.multiply(SECOND))
/** @since 0.1.0 */
export const TESLA = new AlternateUnit("T", WEBER.divide(METER.pow(2)))
/** @since 0.1.0 */
export const HENRY = new AlternateUnit("H", WEBER.divide(AMPERE))
/** @since 0.1.0 */
export const CELSIUS = alternateUnit("°C", KELVIN.plus(273.15))
/** @since 0.1.0 */
export const LUMEN = new AlternateUnit("lm", CANDELA.multiply(STERADIAN))
/** @since 0.1.0 */
export const LUX = new AlternateUnit("lx", LUMEN.divide(METER.pow(2)))
/** @since 0.1.0 */
export const BECQUEREL = new AlternateUnit("Bq", SECOND.inverse())
/** @since 0.1.0 */
export const GRAY = new AlternateUnit("Gy", JOULE.divide(KILOGRAM))
/** @since 0.1.0 */
export const SIEVERT = new AlternateUnit("Sv", JOULE.divide(KILOGRAM))
/** @since 0.1.0 */
export const KATAL = new AlternateUnit("kat", MOLE.divide(SECOND))

// Accepted non-coherent units

/** @since 0.1.0 */
export const GRAM = alternateUnit("g", KILOGRAM.dividedBy(1000))
/** @since 0.1.0 */
export const MINUTE = alternateUnit("min", SECOND.times(60))
/** @since 0.1.0 */
export const HOUR = alternateUnit("h", MINUTE.times(60))
/** @since 0.1.0 */
export const LITER = alternateUnit("L", METER.pow(3).dividedBy(1000))
/** @since 0.1.0 */
export const DEGREE_ANGLE = alternateUnit("deg", RADIAN.times(Math.PI / 180))
/** @since 0.1.0 */
export const PERCENT = alternateUnit("%", ONE.dividedBy(100))

/**
 * Decimal prefix with an exact scale factor.
 *
 * @category Models
 * @since 0.1.0
 */
export interface SiPrefix {
  readonly symbol: string
  readonly name: string
  readonly factor: RationalNumber
}

const prefix = (symbol: string, name: string, power: number): SiPrefix => ({
  symbol,
  name,
  factor: power >= 0 ? RationalNumber.make(10n ** BigInt(power)) : RationalNumber.make(1n, 10n ** BigInt(-power)),
})

/**
 * The SI decimal prefixes, longest symbol first so that lookups try `da`
 * before `d`.
 *
 * @since 0.1.0
 */
export const SI_PREFIXES: ReadonlyArray<SiPrefix> = Object.freeze([
  prefix("da", "deca", 1),
  prefix("Y", "yotta", 24),
  prefix("Z", "zetta", 21),
  prefix("E", "exa", 18),
  prefix("P", "peta", 15),
  prefix("T", "tera", 12),
  prefix("G", "giga", 9),
  prefix("M", "mega", 6),
  prefix("k", "kilo", 3),
  prefix("h", "hecto", 2),
  prefix("d", "deci", -1),
  prefix("c", "centi", -2),
  prefix("m", "milli", -3),
  prefix("µ", "micro", -6),
  prefix("μ", "micro", -6),
  prefix("u", "micro", -6),
  prefix("n", "nano", -9),
  prefix("p", "pico", -12),
  prefix("f", "femto", -15),
  prefix("a", "atto", -18),
  prefix("z", "zepto", -21),
  prefix("y", "yocto", -24),
])

/**
 * Apply a prefix to a unit, naming the result `prefix + symbol`.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const mV = withPrefix("m", VOLT) // 1/1000 V
 * ```
 */
export const withPrefix = (symbol: string, unit: Unit): AlternateUnit => {
  const match = SI_PREFIXES.find((candidate) => candidate.symbol === symbol)
  if (match === undefined) {
    throw new UnitNotFoundError({ symbol: `${symbol}${unit.toString()}` })
  }
  return alternateUnit(`${symbol}${unit.toString()}`, unit.times(match.factor))
}

/** @since 0.1.0 */
export const MILLIVOLT = withPrefix("m", VOLT)
/** @since 0.1.0 */
export const KILOMETER = withPrefix("k", METER)
/** @since 0.1.0 */
export const MILLIMETER = withPrefix("m", METER)
/** @since 0.1.0 */
export const MICROSECOND = withPrefix("µ", SECOND)

/**
 * Every named unit of the catalogue. Prefixed forms are resolved on lookup.
 *
 * @since 0.1.0
 */
export const SI_UNITS: ReadonlyArray<Unit> = Object.freeze([
  METER,
  KILOGRAM,
  SECOND,
  AMPERE,
  KELVIN,
  MOLE,
  CANDELA,
  RADIAN,
  STERADIAN,
  HERTZ,
  NEWTON,
  PASCAL,
  JOULE,
  WATT,
  COULOMB,
  VOLT,
  FARAD,
  OHM,
  SIEMENS,
  WEBER,
  TESLA,
  HENRY,
  CELSIUS,
  LUMEN,
  LUX,
  BECQUEREL,
  GRAY,
  SIEVERT,
  KATAL,
  GRAM,
  MINUTE,
  HOUR,
  LITER,
  DEGREE_ANGLE,
  PERCENT,
])
