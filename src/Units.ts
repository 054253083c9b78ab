/**
 * Unit registry, textual unit expressions and the `UnitManager` service.
 *
 * A registry maps symbols to units. Lookups are case-sensitive (`mm` is a
 * millimetre, `Mm` a megametre) and fall back to an SI prefix followed by a
 * registered symbol, so `mV`, `km` and `µs` resolve without being listed.
 *
 * The functions here wrap the pure unit algebra in Effects; failures surface
 * as tagged errors on the error channel.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer, Schema, SynchronizedRef } from "effect"
import {
  IncompatibleUnitsError,
  UnitNotFoundError,
  UnitParseError,
  UnsupportedOperationError,
  DivisionByZeroError,
  type ArithmeticError,
  type UnitLookupError,
} from "./Errors.js"
import { parseUnitExpression } from "./internal/units/UnitParser.js"
import type { Quantity } from "./Quantity.js"
import { SI_PREFIXES, SI_UNITS, withPrefix } from "./Si.js"
import { alternateUnit, type Unit } from "./Unit.js"

/**
 * Declarative unit definition. `definition` is a unit expression over units
 * already known to the registry; the new unit's values are `factor` times
 * the definition, shifted so that its zero lies at `offset`.
 *
 * @category Models
 * @since 0.1.0
 * @example
 * ```ts
 * new UnitDefinition({ symbol: "gal", definition: "L", factor: 3.785411784 })
 * new UnitDefinition({ symbol: "°F", definition: "K", factor: 5 / 9, offset: 459.67 })
 * ```
 */
export class UnitDefinition extends Schema.Class<UnitDefinition>("UnitDefinition")({
  symbol: Schema.NonEmptyTrimmedString,
  definition: Schema.String,
  factor: Schema.optional(Schema.Number.pipe(Schema.greaterThan(0))),
  offset: Schema.optional(Schema.Number),
  description: Schema.optional(Schema.String),
}) {}

/**
 * Immutable collection of named units.
 *
 * @category Models
 * @since 0.1.0
 */
export class UnitRegistry {
  readonly units: ReadonlyArray<Unit>
  readonly #bySymbol: ReadonlyMap<string, Unit>

  constructor(units: ReadonlyArray<Unit>) {
    this.units = Object.freeze([...units])
    this.#bySymbol = new Map(units.map((unit) => [unit.toString(), unit] as const))
  }

  /**
   * Lookup map keyed by unit symbol. Later registrations shadow earlier ones.
   */
  toMap(): ReadonlyMap<string, Unit> {
    return this.#bySymbol
  }

  /**
   * Find a unit by symbol, trying prefixed forms when there is no exact match.
   */
  get(symbol: string): Unit | undefined {
    const exact = this.#bySymbol.get(symbol)
    if (exact !== undefined) {
      return exact
    }
    for (const prefix of SI_PREFIXES) {
      if (symbol.length > prefix.symbol.length && symbol.startsWith(prefix.symbol)) {
        const base = this.#bySymbol.get(symbol.slice(prefix.symbol.length))
        if (base !== undefined) {
          return withPrefix(prefix.symbol, base)
        }
      }
    }
    return undefined
  }

  /**
   * Like `get`, but throws `UnitNotFoundError` for unknown symbols.
   */
  resolve(symbol: string): Unit {
    const unit = this.get(symbol)
    if (unit === undefined) {
      throw new UnitNotFoundError({ symbol })
    }
    return unit
  }

  /**
   * Parse a unit expression against this registry.
   */
  parse(expression: string): Unit {
    return parseUnitExpression(expression, (symbol) => this.resolve(symbol))
  }

  /**
   * Registry with `units` added.
   */
  extend(units: ReadonlyArray<Unit>): UnitRegistry {
    return new UnitRegistry([...this.units, ...units])
  }
}

/**
 * Build the named unit described by a definition.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const defineUnit = (registry: UnitRegistry, definition: UnitDefinition): Unit => {
  const reference = registry.parse(definition.definition)
  const scaled = definition.factor === undefined ? reference : reference.times(definition.factor)
  const shifted = definition.offset === undefined ? scaled : scaled.plus(definition.offset)
  return alternateUnit(definition.symbol, shifted)
}

/**
 * Create a registry from a list of units.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeRegistry = (units: ReadonlyArray<Unit> = SI_UNITS): UnitRegistry => new UnitRegistry(units)

/**
 * Append unit definitions to a registry. Each definition may refer to those
 * registered before it.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const extendRegistry = (registry: UnitRegistry, definitions: ReadonlyArray<UnitDefinition>): UnitRegistry =>
  definitions.reduce((current, definition) => current.extend([defineUnit(current, definition)]), registry)

const isLookupError = (error: unknown): error is UnitLookupError =>
  error instanceof UnitNotFoundError || error instanceof UnitParseError

const isArithmeticError = (error: unknown): error is ArithmeticError =>
  error instanceof IncompatibleUnitsError ||
  error instanceof UnsupportedOperationError ||
  error instanceof DivisionByZeroError

const tryLookup = <A>(expression: string, thunk: () => A): Effect.Effect<A, UnitLookupError> =>
  Effect.try({
    try: thunk,
    catch: (error) =>
      isLookupError(error)
        ? error
        : new UnitParseError({
            expression,
            column: 1,
            problem: error instanceof Error ? error.message : String(error),
            snippet: expression,
          }),
  })

const tryConvert = <A>(operation: string, thunk: () => A): Effect.Effect<A, ArithmeticError> =>
  Effect.try({
    try: thunk,
    catch: (error) =>
      isArithmeticError(error)
        ? error
        : new UnsupportedOperationError({
            operation,
            left: error instanceof Error ? error.message : String(error),
          }),
  })

/**
 * Look a unit up by symbol.
 *
 * @category Lookup
 * @since 0.1.0
 */
export const lookupUnit = (registry: UnitRegistry, symbol: string): Effect.Effect<Unit, UnitNotFoundError> =>
  Effect.suspend(() => {
    const unit = registry.get(symbol)
    return unit === undefined ? Effect.fail(new UnitNotFoundError({ symbol })) : Effect.succeed(unit)
  })

/**
 * Parse a unit expression such as `kg*m/s^2` or `W per A`.
 *
 * @category Lookup
 * @since 0.1.0
 */
export const parseUnit = (registry: UnitRegistry, expression: string): Effect.Effect<Unit, UnitLookupError> =>
  tryLookup(expression, () => registry.parse(expression))

/**
 * Explicitly convert a scalar value between two unit expressions of the same
 * dimension.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const convertValue = (
  registry: UnitRegistry,
  value: number,
  from: string,
  to: string,
): Effect.Effect<number, UnitLookupError | ArithmeticError> =>
  Effect.gen(function* () {
    const source = yield* parseUnit(registry, from)
    const target = yield* parseUnit(registry, to)
    const converter = yield* tryConvert("convert", () => source.getConverterTo(target))
    return converter.convert(value)
  })

/**
 * Convert a quantity to the unit named by an expression.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const convertQuantity = (
  registry: UnitRegistry,
  quantity: Quantity,
  to: string,
): Effect.Effect<Quantity, UnitLookupError | ArithmeticError> =>
  Effect.flatMap(parseUnit(registry, to), (target) => tryConvert("convert", () => quantity.to(target)))

/**
 * @category Services
 * @since 0.1.0
 */
export interface UnitManagerService {
  readonly register: (definitions: ReadonlyArray<UnitDefinition>) => Effect.Effect<UnitRegistry, UnitLookupError>
  readonly registry: Effect.Effect<UnitRegistry>
  readonly find: (symbol: string) => Effect.Effect<Unit, UnitNotFoundError>
  readonly parse: (expression: string) => Effect.Effect<Unit, UnitLookupError>
  readonly convertValue: (
    value: number,
    from: string,
    to: string,
  ) => Effect.Effect<number, UnitLookupError | ArithmeticError>
  readonly convertQuantity: (
    quantity: Quantity,
    to: string,
  ) => Effect.Effect<Quantity, UnitLookupError | ArithmeticError>
}

/**
 * Mutable view over a unit registry. The default layer starts from the SI
 * catalogue.
 *
 * @category Services
 * @since 0.1.0
 */
export class UnitManager extends Context.Tag("gum-quantities/UnitManager")<UnitManager, UnitManagerService>() {
  static layer(initialUnits: ReadonlyArray<Unit> = SI_UNITS) {
    return Layer.effect(
      this,
      Effect.gen(function* () {
        const registryRef = yield* SynchronizedRef.make(makeRegistry(initialUnits))
        const getRegistry = SynchronizedRef.get(registryRef)

        const service: UnitManagerService = {
          register: (definitions) =>
            SynchronizedRef.updateAndGetEffect(registryRef, (current) =>
              tryLookup(definitions.map(({ definition }) => definition).join(", "), () =>
                extendRegistry(current, definitions),
              ),
            ).pipe(
              Effect.tap((registry) =>
                Effect.logDebug("registered units").pipe(
                  Effect.annotateLogs({
                    symbols: definitions.map(({ symbol }) => symbol).join(","),
                    size: registry.units.length,
                  }),
                ),
              ),
            ),
          registry: getRegistry,
          find: (symbol) => Effect.flatMap(getRegistry, (registry) => lookupUnit(registry, symbol)),
          parse: (expression) => Effect.flatMap(getRegistry, (registry) => parseUnit(registry, expression)),
          convertValue: (value, from, to) =>
            Effect.flatMap(getRegistry, (registry) => convertValue(registry, value, from, to)),
          convertQuantity: (quantity, to) =>
            Effect.flatMap(getRegistry, (registry) => convertQuantity(registry, quantity, to)),
        }

        return service
      }),
    )
  }
}
