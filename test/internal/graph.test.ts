import { describe, it, expect } from "@effect/vitest"
import { CyclicGraphError } from "../../src/Errors.js"
import { sensitivities, topologicalOrder, type Propagation, type SensitivityMap } from "../../src/internal/graph.js"
import { allocateNodeId, type NodeId } from "../../src/Types.js"

interface TestNode {
  readonly id: NodeId
  readonly operands: Array<TestNode>
  readonly fixed?: boolean
}

const node = (operands: Array<TestNode> = [], fixed = false): TestNode => ({ id: allocateNodeId(), operands, fixed })

const counting: Propagation<TestNode, number> = {
  isConstant: (leaf) => leaf.fixed === true,
  edges: (n) => n.operands.map(() => 1),
  identity: 1,
  compose: (edge, inner) => edge * inner,
  add: (left, right) => left + right,
}

describe("sensitivities", () => {
  it("counts every path from root to leaf", () => {
    const leaf = node()
    const left = node([leaf])
    const right = node([leaf])
    const top = node([left, right])
    const cache = new Map<NodeId, SensitivityMap<TestNode, number>>()
    const result = sensitivities(top, counting, cache)
    expect(result.get(leaf.id)?.coefficient).toBe(2)
    expect(result.get(leaf.id)?.leaf).toBe(leaf)
    expect(cache.size).toBe(1)
  })

  it("caches results per queried node", () => {
    const leaf = node()
    const shared = node([leaf, leaf])
    const cache = new Map<NodeId, SensitivityMap<TestNode, number>>()
    const first = sensitivities(shared, counting, cache)
    const second = sensitivities(node([shared]), counting, cache)
    expect(first.get(leaf.id)?.coefficient).toBe(2)
    expect(second.get(leaf.id)?.coefficient).toBe(2)
    expect(cache.get(shared.id)).toBe(first)
    expect(sensitivities(shared, counting, cache)).toBe(first)
    expect(cache.size).toBe(2)
  })

  it("orders operands before their users", () => {
    const leaf = node()
    const left = node([leaf])
    const right = node([leaf])
    const top = node([left, right])
    expect(topologicalOrder(top).map(({ id }) => id)).toEqual([leaf.id, left.id, right.id, top.id])
  })

  it("scales linearly with graph width", () => {
    const leaves = Array.from({ length: 20_000 }, () => node())
    let sum = node([leaves[0] ?? node(), leaves[1] ?? node()])
    for (const leaf of leaves.slice(2)) {
      sum = node([sum, leaf])
    }
    const result = sensitivities(sum, counting, new Map())
    expect(result.size).toBe(20_000)
    expect([...result.values()].every(({ coefficient }) => coefficient === 1)).toBe(true)
  })

  it("leaves constant inputs out", () => {
    const leaf = node()
    const fixed = node([], true)
    const result = sensitivities(node([leaf, fixed]), counting, new Map())
    expect([...result.keys()]).toEqual([leaf.id])
  })

  it("detects cycles", () => {
    const a = node()
    const b = node([a])
    a.operands.push(b)
    expect(() => sensitivities(b, counting, new Map())).toThrow(CyclicGraphError)
    try {
      sensitivities(b, counting, new Map())
    } catch (error) {
      expect(error).toBeInstanceOf(CyclicGraphError)
      if (error instanceof CyclicGraphError) {
        expect(error.nodes).toEqual([b.id, a.id, b.id])
      }
    }
  })

  it("detects self references", () => {
    const loop = node()
    loop.operands.push(loop)
    expect(() => sensitivities(loop, counting, new Map())).toThrow(CyclicGraphError)
  })

  it("walks deep chains iteratively", () => {
    const leaf = node()
    let chain = leaf
    for (let i = 0; i < 100_000; i++) {
      chain = node([chain])
    }
    expect(sensitivities(chain, counting, new Map()).get(leaf.id)?.coefficient).toBe(1)
  })
})
