import { describe, it, expect } from "vitest"
import { Schema } from "effect"
import { NUMERIC_KINDS, NodeId, NumericKind, allocateNodeId } from "../src/Types.js"

describe("NodeId", () => {
  it("decodes non-negative integers", () => {
    expect(Schema.decodeUnknownSync(NodeId)(7)).toBe(7)
  })

  it("rejects negative or fractional handles", () => {
    expect(() => Schema.decodeUnknownSync(NodeId)(-1)).toThrow()
    expect(() => Schema.decodeUnknownSync(NodeId)(1.5)).toThrow()
  })

  it("allocates increasing handles", () => {
    const first = allocateNodeId()
    const second = allocateNodeId()
    expect(second).toBe(first + 1)
  })
})

describe("NumericKind", () => {
  it("lists kinds in promotion-table order", () => {
    expect(NUMERIC_KINDS).toEqual([
      "integer",
      "rational",
      "float",
      "complex",
      "quantity",
      "uncertain",
      "complexUncertain",
      "array",
      "unit",
    ])
  })

  it("rejects unknown kinds", () => {
    expect(Schema.is(NumericKind)("decimal")).toBe(false)
    expect(Schema.is(NumericKind)("complexUncertain")).toBe(true)
  })
})
