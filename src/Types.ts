/**
 * Type Foundations & Branded Handles
 *
 * Graph nodes are addressed by branded integer handles. Handles are allocated
 * in creation order, so an operation node always has a larger handle than any
 * of its operands.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * Branded non-negative integer identifying a node of an uncertainty graph.
 *
 * @since 0.1.0
 * @category IDs
 */
export const NodeId = Schema.Int.pipe(Schema.nonNegative(), Schema.brand("NodeId"))

/**
 * Type extracted from NodeId schema
 *
 * @since 0.1.0
 * @category IDs
 */
export type NodeId = typeof NodeId.Type

let nextNodeId = 0

/**
 * Allocate the next node handle.
 *
 * @since 0.1.0
 * @category IDs
 * @internal
 */
export const allocateNodeId = (): NodeId => NodeId.make(nextNodeId++)

/**
 * Closed enumeration of the numeric kinds taking part in the coercion tower.
 *
 * @since 0.1.0
 * @category Kinds
 */
export const NumericKind = Schema.Literal(
  "integer",
  "rational",
  "float",
  "complex",
  "quantity",
  "uncertain",
  "complexUncertain",
  "array",
  "unit",
)

/**
 * Type extracted from NumericKind schema
 *
 * @since 0.1.0
 * @category Kinds
 */
export type NumericKind = typeof NumericKind.Type

/**
 * Every numeric kind, in promotion-table order.
 *
 * @since 0.1.0
 * @category Kinds
 */
export const NUMERIC_KINDS: ReadonlyArray<NumericKind> = NumericKind.literals
