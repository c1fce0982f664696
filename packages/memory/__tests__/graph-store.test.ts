import { describe, it, expect, beforeEach } from "vitest"
import { GraphStore } from "../src"

describe("GraphStore", () => {
  let store: GraphStore

  beforeEach(() => {
    store = new GraphStore()
    store.createVertex({ id: 1, label: "artist", properties: { name: "Garcia" } })
    store.createVertex({ id: 2, label: "artist", properties: { name: "Hunter" } })
    store.createVertex({ id: 3, label: "song", properties: { name: "Morning Tide" } })
    store.createEdge({ id: 10, label: "sungBy", outId: 3, inId: 1, properties: {} })
    store.createEdge({ id: 11, label: "writtenBy", outId: 3, inId: 2, properties: {} })
  })

  // ===========================================================================
  // VERTICES & EDGES
  // ===========================================================================

  describe("vertices", () => {
    it("should return copies of stored vertices", () => {
      const vertex = store.getVertex(1)
      if (vertex) vertex.properties.name = "changed"

      expect(store.getVertex(1)?.properties).toEqual({ name: "Garcia" })
    })

    it("should reject a duplicate id", () => {
      expect(() => store.createVertex({ id: 1, label: "artist", properties: {} })).toThrow("Vertex already exists: 1")
    })

    it("should remove a property given undefined", () => {
      store.updateVertex(3, { performances: 41 })
      store.updateVertex(3, { name: undefined })

      expect(store.getVertex(3)?.properties).toEqual({ performances: 41 })
    })

    it("should delete incident edges with a vertex", () => {
      store.deleteVertex(3)

      expect(store.hasEdge(10)).toBe(false)
      expect(store.hasEdge(11)).toBe(false)
      expect(store.getIncomingEdges(1)).toEqual([])
    })

    it("should look vertices up by label", () => {
      expect(store.getVerticesByLabel("artist").map((v) => v.id)).toEqual([1, 2])
      expect(store.getVerticesByLabel("venue")).toEqual([])
    })
  })

  describe("edges", () => {
    it("should reject an edge whose endpoint is missing", () => {
      expect(() => store.createEdge({ id: 12, label: "sungBy", outId: 9, inId: 1, properties: {} })).toThrow(
        "Out vertex not found: 9",
      )
    })

    it("should filter adjacent edges by label", () => {
      expect(store.getOutgoingEdges(3).map((e) => e.id)).toEqual([10, 11])
      expect(store.getOutgoingEdges(3, "writtenBy").map((e) => e.id)).toEqual([11])
      expect(store.getIncomingEdges(2).map((e) => e.label)).toEqual(["writtenBy"])
    })
  })

  // ===========================================================================
  // INDEXES
  // ===========================================================================

  describe("property indexes", () => {
    it("should find vertices through an index", () => {
      store.createIndex("name")
      expect(store.findByProperty("name", "Hunter").map((v) => v.id)).toEqual([2])
    })

    it("should keep the index current on update", () => {
      store.createIndex("name")
      store.updateVertex(2, { name: "Lesh" })

      expect(store.findByProperty("name", "Hunter")).toEqual([])
      expect(store.findByProperty("name", "Lesh").map((v) => v.id)).toEqual([2])
    })

    it("should scan when no index exists", () => {
      expect(store.findByProperty("name", "Morning Tide").map((v) => v.id)).toEqual([3])
    })
  })

  // ===========================================================================
  // TRANSACTIONS
  // ===========================================================================

  describe("transactions", () => {
    it("should restore the snapshot on rollback", () => {
      store.createIndex("name")
      store.beginTransaction()
      store.deleteVertex(1)
      store.setVariable("creator", "someone")
      store.rollback()

      expect(store.getVertex(1)?.properties).toEqual({ name: "Garcia" })
      expect(store.getOutgoingEdges(3).map((e) => e.id)).toEqual([10, 11])
      expect(store.findByProperty("name", "Garcia").map((v) => v.id)).toEqual([1])
      expect(store.variableKeys()).toEqual([])
      expect(store.inTransaction()).toBe(false)
    })

    it("should keep changes on commit", () => {
      store.beginTransaction()
      store.deleteEdge(10)
      store.commit()

      expect(store.hasEdge(10)).toBe(false)
    })

    it("should refuse to end a transaction that never began", () => {
      expect(() => store.rollback()).toThrow("No transaction in progress")
      expect(() => store.commit()).toThrow("No transaction in progress")
    })

    it("should refuse nested transactions", () => {
      store.beginTransaction()
      expect(() => store.beginTransaction()).toThrow("Transaction already in progress")
    })
  })

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  describe("utilities", () => {
    it("should count only labels that still have vertices", () => {
      store.setVariable("revision", 3)
      store.deleteVertex(3)

      expect(store.stats()).toEqual({ vertices: 2, edges: 0, labels: 1, variables: 1 })
    })

    it("should import what it exported", () => {
      store.setVariable("creator", "fixture-author")
      const copy = new GraphStore()
      copy.import(store.export())

      expect(copy.stats()).toEqual(store.stats())
      expect(copy.getVariable("creator")).toBe("fixture-author")
      expect(copy.getOutgoingEdges(3, "sungBy").map((e) => e.inId)).toEqual([1])
    })

    it("should clear everything", () => {
      store.clear()
      expect(store.stats()).toEqual({ vertices: 0, edges: 0, labels: 0, variables: 0 })
    })
  })
})
