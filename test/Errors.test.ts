import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import {
  CyclicGraphError,
  DivisionByZeroError,
  IncompatibleUnitsError,
  NegativeUncertaintyError,
  UncertaintyTypeId,
  UnitNotFoundError,
  UnitParseError,
  UnsupportedOperationError,
} from "../src/Errors.js"

describe("Error hierarchy", () => {
  it("exposes a stable uncertainty type id", () => {
    expect(typeof UncertaintyTypeId).toBe("symbol")
    expect(UncertaintyTypeId.description).toBe("gum-quantities/Uncertainty")
  })

  it("formats incompatible unit messages", () => {
    const error = new IncompatibleUnitsError({ from: "m", to: "s", fromDimension: "L", toDimension: "T" })
    expect(error.message).toBe("Cannot convert m [L] to s [T]: dimensions do not match")
  })

  it("formats unsupported operation messages", () => {
    expect(new UnsupportedOperationError({ operation: "sqrt", left: "m" }).message).toBe(
      'Unsupported operation "sqrt" on m',
    )
    expect(
      new UnsupportedOperationError({ operation: "add", left: "unit", right: "complex", reason: "no common kind" })
        .message,
    ).toBe('Unsupported operation "add" on unit and complex: no common kind')
  })

  it("formats the remaining messages", () => {
    expect(new DivisionByZeroError({ operation: "divide", dividend: "1" }).message).toBe(
      "Division by zero in divide (dividend 1)",
    )
    expect(new NegativeUncertaintyError({ uncertainty: -1, reason: "negative" }).message).toBe(
      "Invalid uncertainty declaration: negative",
    )
    expect(new CyclicGraphError({ nodes: [3, 4, 3] }).message).toBe(
      "Uncertainty graph contains a cycle through nodes 3 -> 4 -> 3",
    )
    expect(new UnitNotFoundError({ symbol: "furlong" }).message).toBe('Unknown unit symbol "furlong"')
    expect(
      new UnitParseError({ expression: "m^", column: 3, problem: "expected an exponent", snippet: "m^\n  ^" })
        .message,
    ).toBe("Unit parse error at column 3: expected an exponent")
  })

  it.effect("supports catchTag on IncompatibleUnitsError", () =>
    Effect.gen(function* () {
      const handled = yield* Effect.fail(
        new IncompatibleUnitsError({ from: "kg", to: "m", fromDimension: "M", toDimension: "L" }),
      ).pipe(
        Effect.catchTag("IncompatibleUnitsError", (error) => {
          expect(error.from).toBe("kg")
          expect(error.toDimension).toBe("L")
          return Effect.succeed("handled")
        }),
      )

      expect(handled).toBe("handled")
    }),
  )

  it.effect("supports catchTag on CyclicGraphError", () =>
    Effect.gen(function* () {
      const handled = yield* Effect.fail(new CyclicGraphError({ nodes: [1, 1] })).pipe(
        Effect.catchTag("CyclicGraphError", (error) => Effect.succeed(error.nodes.length)),
      )

      expect(handled).toBe(2)
    }),
  )
})
