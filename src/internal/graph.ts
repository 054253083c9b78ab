import { CyclicGraphError } from "../Errors.js"
import type { NodeId } from "../Types.js"

/**
 * Minimal view of a computation-graph node: inputs have no operands.
 */
export interface PropagationNode<N> {
  readonly id: NodeId
  readonly operands: ReadonlyArray<N>
}

/**
 * Accumulated sensitivity of a node with respect to one input leaf.
 */
export interface Sensitivity<N, S> {
  readonly leaf: N
  readonly coefficient: S
}

export type SensitivityMap<N, S> = ReadonlyMap<NodeId, Sensitivity<N, S>>

/**
 * How coefficients of type `S` combine: scalars for real graphs, 2×2
 * Jacobians for complex ones.
 */
export interface Propagation<N, S> {
  /** Inputs with no uncertainty take no part in propagation. */
  readonly isConstant: (leaf: N) => boolean
  /** Partial derivative of the node with respect to each of its operands, in operand order. */
  readonly edges: (node: N) => ReadonlyArray<S>
  readonly identity: S
  /** Chain rule: `outer` is the sensitivity to the node, `inner` the node's own partial. */
  readonly compose: (outer: S, inner: S) => S
  readonly add: (left: S, right: S) => S
}

interface Frame<N> {
  readonly node: N
  expanded: boolean
}

/**
 * Nodes reachable from `root`, operands before the nodes that use them.
 * Traversal is iterative, so graph depth is bounded by memory rather than by
 * the call stack.
 *
 * Throws `CyclicGraphError` when a node is reached again while it is still
 * on the active path.
 */
export const topologicalOrder = <N extends PropagationNode<N>>(root: N): ReadonlyArray<N> => {
  const order: Array<N> = []
  const done = new Set<NodeId>()
  const active = new Set<NodeId>()
  const stack: Array<Frame<N>> = [{ node: root, expanded: false }]

  while (stack.length > 0) {
    const frame = stack[stack.length - 1]
    if (frame === undefined) {
      break
    }
    const { node } = frame
    if (frame.expanded) {
      stack.pop()
      active.delete(node.id)
      if (!done.has(node.id)) {
        done.add(node.id)
        order.push(node)
      }
      continue
    }
    if (done.has(node.id)) {
      stack.pop()
      continue
    }
    frame.expanded = true
    active.add(node.id)
    for (let i = node.operands.length - 1; i >= 0; i--) {
      const operand = node.operands[i]
      if (operand === undefined || done.has(operand.id)) {
        continue
      }
      if (active.has(operand.id)) {
        throw new CyclicGraphError({ nodes: [...active, operand.id] })
      }
      stack.push({ node: operand, expanded: false })
    }
  }

  return order
}

/**
 * Per-leaf sensitivities of `root` by reverse accumulation: the adjoint of
 * each node is pushed to its operands once, so a query costs time and memory
 * linear in the number of nodes and edges. Only the result for `root` is
 * stored in `cache`.
 */
export const sensitivities = <N extends PropagationNode<N>, S>(
  root: N,
  propagation: Propagation<N, S>,
  cache: Map<NodeId, SensitivityMap<N, S>>,
): SensitivityMap<N, S> => {
  const cached = cache.get(root.id)
  if (cached !== undefined) {
    return cached
  }

  const order = topologicalOrder(root)
  const adjoints = new Map<NodeId, S>([[root.id, propagation.identity]])

  for (let i = order.length - 1; i >= 0; i--) {
    const node = order[i]
    const adjoint = node === undefined ? undefined : adjoints.get(node.id)
    if (node === undefined || adjoint === undefined || node.operands.length === 0) {
      continue
    }
    const edges = propagation.edges(node)
    node.operands.forEach((operand, index) => {
      const edge = edges[index]
      if (edge === undefined) {
        return
      }
      const contribution = propagation.compose(adjoint, edge)
      const existing = adjoints.get(operand.id)
      adjoints.set(operand.id, existing === undefined ? contribution : propagation.add(existing, contribution))
    })
  }

  const result = new Map<NodeId, Sensitivity<N, S>>()
  for (const node of order) {
    const coefficient = adjoints.get(node.id)
    if (node.operands.length === 0 && coefficient !== undefined && !propagation.isConstant(node)) {
      result.set(node.id, { leaf: node, coefficient })
    }
  }
  cache.set(root.id, result)
  return result
}
