import { describe, it, expect } from "vitest"
import { MemoryGraph, ReadOnlyStrategy, UnsupportedOperationError } from "../src"

describe("ReadOnlyStrategy", () => {
  function decorated() {
    const base = new MemoryGraph({ graphName: "archive" })
    const garcia = base.addVertex("artist", { name: "Garcia" })
    const tide = base.addVertex("song", { name: "Morning Tide" })
    base.addEdge("sungBy", tide.id, garcia.id)
    base.tx().commit()
    return { base, graph: new ReadOnlyStrategy().decorate(base) }
  }

  it("should report write features as unsupported", () => {
    const { graph } = decorated()

    expect(graph.features.supports("vertex", "AddVertices")).toBe(false)
    expect(graph.features.supports("edge", "RemoveEdges")).toBe(false)
    expect(graph.features.supports("variables", "Variables")).toBe(false)
    expect(graph.features.supports("vertexProperty", "StringValues")).toBe(true)
    expect(graph.features.supportsTransactions()).toBe(true)
  })

  it("should pass reads through", () => {
    const { graph } = decorated()

    expect(graph.findVertices("name", "Garcia").map((v) => v.id)).toEqual([1])
    expect(graph.outEdges(2).map((e) => e.label)).toEqual(["sungBy"])
    expect(graph.stats()).toEqual({ vertices: 2, edges: 1, labels: 2, variables: 0 })
  })

  it("should reject writes", () => {
    const { graph } = decorated()

    expect(() => graph.addVertex("artist")).toThrow(UnsupportedOperationError)
    expect(() => graph.addVertex("artist")).toThrow(
      "Graph does not support add vertices on read-only graph archive (vertex.AddVertices)",
    )
    expect(() => graph.removeEdge(3)).toThrow("(edge.RemoveEdges)")
  })

  it("should expose the undecorated graph", () => {
    const { base, graph } = decorated()

    expect(graph.baseGraph()).toBe(base)
    graph.close()
    expect(base.isClosed()).toBe(true)
  })
})
