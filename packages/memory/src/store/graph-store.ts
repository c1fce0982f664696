/**
 * In-Memory Graph Store
 *
 * Core data structure for storing vertices, edges and graph variables.
 * Provides basic CRUD operations and property index management.
 */

import type { ElementId } from "@graphcheck/harness"
import type { StoredVertex, StoredEdge, StoreData, TransactionSnapshot } from "./types"

function clone<T>(value: T): T {
  return structuredClone(value)
}

function addToIndex<K, V>(index: Map<K, Set<V>>, key: K, value: V): void {
  const entries = index.get(key)
  if (entries) {
    entries.add(value)
  } else {
    index.set(key, new Set([value]))
  }
}

/**
 * Vertices, edges and variables keyed by id, with label, adjacency and
 * property indexes. One snapshot transaction at a time.
 */
export class GraphStore {
  /** All vertices by ID */
  private vertices = new Map<ElementId, StoredVertex>()

  /** All edges by ID */
  private edges = new Map<ElementId, StoredEdge>()

  /** Outgoing edges per vertex: vertexId -> Set<edgeId> */
  private outEdges = new Map<ElementId, Set<ElementId>>()

  /** Incoming edges per vertex: vertexId -> Set<edgeId> */
  private inEdges = new Map<ElementId, Set<ElementId>>()

  /** Vertices by label: label -> Set<vertexId> */
  private verticesByLabel = new Map<string, Set<ElementId>>()

  /** Property indexes: property -> Map<value, Set<vertexId>> */
  private propertyIndexes = new Map<string, Map<unknown, Set<ElementId>>>()

  /** Graph variables */
  private variables = new Map<string, unknown>()

  /** Transaction state */
  private transactionSnapshot: TransactionSnapshot | null = null

  // ===========================================================================
  // VERTEX OPERATIONS
  // ===========================================================================

  createVertex(vertex: StoredVertex): void {
    if (this.vertices.has(vertex.id)) {
      throw new Error(`Vertex already exists: ${vertex.id}`)
    }

    const stored = clone(vertex)
    this.vertices.set(vertex.id, stored)
    addToIndex(this.verticesByLabel, vertex.label, vertex.id)

    this.outEdges.set(vertex.id, new Set())
    this.inEdges.set(vertex.id, new Set())

    this.indexVertexProperties(stored)
  }

  getVertex(id: ElementId): StoredVertex | undefined {
    const vertex = this.vertices.get(id)
    return vertex ? clone(vertex) : undefined
  }

  /**
   * Merge properties into a vertex. An `undefined` value removes the property.
   */
  updateVertex(id: ElementId, properties: Record<string, unknown>): void {
    const vertex = this.vertices.get(id)
    if (!vertex) {
      throw new Error(`Vertex not found: ${id}`)
    }

    this.removeVertexFromIndexes(vertex)

    const next = { ...vertex.properties, ...clone(properties) }
    for (const [key, value] of Object.entries(properties)) {
      if (value === undefined) delete next[key]
    }
    vertex.properties = next

    this.indexVertexProperties(vertex)
  }

  /**
   * Delete a vertex and all its edges.
   */
  deleteVertex(id: ElementId): void {
    const vertex = this.vertices.get(id)
    if (!vertex) return

    for (const edgeId of this.outEdges.get(id) ?? []) {
      this.deleteEdge(edgeId)
    }
    for (const edgeId of this.inEdges.get(id) ?? []) {
      this.deleteEdge(edgeId)
    }

    this.removeVertexFromIndexes(vertex)
    this.verticesByLabel.get(vertex.label)?.delete(id)

    this.outEdges.delete(id)
    this.inEdges.delete(id)
    this.vertices.delete(id)
  }

  getVerticesByLabel(label: string): StoredVertex[] {
    const ids = this.verticesByLabel.get(label)
    if (!ids) return []
    return Array.from(ids)
      .map((id) => this.getVertex(id))
      .filter((v): v is StoredVertex => v !== undefined)
  }

  getAllVertices(): StoredVertex[] {
    return Array.from(this.vertices.values()).map(clone)
  }

  hasVertex(id: ElementId): boolean {
    return this.vertices.has(id)
  }

  // ===========================================================================
  // EDGE OPERATIONS
  // ===========================================================================

  createEdge(edge: StoredEdge): void {
    if (this.edges.has(edge.id)) {
      throw new Error(`Edge already exists: ${edge.id}`)
    }

    const out = this.outEdges.get(edge.outId)
    if (!out) {
      throw new Error(`Out vertex not found: ${edge.outId}`)
    }

    const incoming = this.inEdges.get(edge.inId)
    if (!incoming) {
      throw new Error(`In vertex not found: ${edge.inId}`)
    }

    this.edges.set(edge.id, clone(edge))
    out.add(edge.id)
    incoming.add(edge.id)
  }

  getEdge(id: ElementId): StoredEdge | undefined {
    const edge = this.edges.get(id)
    return edge ? clone(edge) : undefined
  }

  /**
   * Merge properties into an edge. An `undefined` value removes the property.
   */
  updateEdge(id: ElementId, properties: Record<string, unknown>): void {
    const edge = this.edges.get(id)
    if (!edge) {
      throw new Error(`Edge not found: ${id}`)
    }

    const next = { ...edge.properties, ...clone(properties) }
    for (const [key, value] of Object.entries(properties)) {
      if (value === undefined) delete next[key]
    }
    edge.properties = next
  }

  deleteEdge(id: ElementId): void {
    const edge = this.edges.get(id)
    if (!edge) return

    this.outEdges.get(edge.outId)?.delete(id)
    this.inEdges.get(edge.inId)?.delete(id)
    this.edges.delete(id)
  }

  getOutgoingEdges(vertexId: ElementId, label?: string): StoredEdge[] {
    return this.collectEdges(this.outEdges.get(vertexId), label)
  }

  getIncomingEdges(vertexId: ElementId, label?: string): StoredEdge[] {
    return this.collectEdges(this.inEdges.get(vertexId), label)
  }

  getAllEdges(): StoredEdge[] {
    return Array.from(this.edges.values()).map(clone)
  }

  hasEdge(id: ElementId): boolean {
    return this.edges.has(id)
  }

  private collectEdges(edgeIds: Set<ElementId> | undefined, label?: string): StoredEdge[] {
    if (!edgeIds) return []

    return Array.from(edgeIds)
      .map((id) => this.edges.get(id))
      .filter((e): e is StoredEdge => e !== undefined && (!label || e.label === label))
      .map(clone)
  }

  // ===========================================================================
  // VARIABLES
  // ===========================================================================

  getVariable(key: string): unknown {
    return clone(this.variables.get(key))
  }

  setVariable(key: string, value: unknown): void {
    this.variables.set(key, clone(value))
  }

  deleteVariable(key: string): void {
    this.variables.delete(key)
  }

  variableKeys(): string[] {
    return Array.from(this.variables.keys())
  }

  // ===========================================================================
  // PROPERTY INDEXES
  // ===========================================================================

  /**
   * Create a vertex property index.
   */
  createIndex(property: string): void {
    if (this.propertyIndexes.has(property)) return

    const index = new Map<unknown, Set<ElementId>>()
    this.propertyIndexes.set(property, index)

    for (const vertex of this.vertices.values()) {
      const value = vertex.properties[property]
      if (value !== undefined) addToIndex(index, value, vertex.id)
    }
  }

  /**
   * Find vertices by property value.
   */
  findByProperty(property: string, value: unknown): StoredVertex[] {
    const index = this.propertyIndexes.get(property)

    if (!index) {
      // Fall back to scan if no index exists
      return this.getAllVertices().filter((v) => v.properties[property] === value)
    }

    const ids = index.get(value)
    if (!ids) return []

    return Array.from(ids)
      .map((id) => this.getVertex(id))
      .filter((v): v is StoredVertex => v !== undefined)
  }

  private indexVertexProperties(vertex: StoredVertex): void {
    for (const [property, index] of this.propertyIndexes) {
      const value = vertex.properties[property]
      if (value !== undefined) addToIndex(index, value, vertex.id)
    }
  }

  private removeVertexFromIndexes(vertex: StoredVertex): void {
    for (const [property, index] of this.propertyIndexes) {
      const value = vertex.properties[property]
      if (value !== undefined) index.get(value)?.delete(vertex.id)
    }
  }

  // ===========================================================================
  // TRANSACTIONS
  // ===========================================================================

  beginTransaction(): void {
    if (this.transactionSnapshot) {
      throw new Error("Transaction already in progress")
    }

    this.transactionSnapshot = {
      vertices: new Map(Array.from(this.vertices.entries()).map(([k, v]) => [k, clone(v)])),
      edges: new Map(Array.from(this.edges.entries()).map(([k, v]) => [k, clone(v)])),
      outEdges: new Map(Array.from(this.outEdges.entries()).map(([k, v]) => [k, new Set(v)])),
      inEdges: new Map(Array.from(this.inEdges.entries()).map(([k, v]) => [k, new Set(v)])),
      variables: new Map(Array.from(this.variables.entries()).map(([k, v]) => [k, clone(v)])),
    }
  }

  commit(): void {
    if (!this.transactionSnapshot) {
      throw new Error("No transaction in progress")
    }
    this.transactionSnapshot = null
  }

  rollback(): void {
    if (!this.transactionSnapshot) {
      throw new Error("No transaction in progress")
    }

    this.vertices = this.transactionSnapshot.vertices
    this.edges = this.transactionSnapshot.edges
    this.outEdges = this.transactionSnapshot.outEdges
    this.inEdges = this.transactionSnapshot.inEdges
    this.variables = this.transactionSnapshot.variables

    this.rebuildLabelIndex()
    this.rebuildPropertyIndexes()

    this.transactionSnapshot = null
  }

  inTransaction(): boolean {
    return this.transactionSnapshot !== null
  }

  private rebuildLabelIndex(): void {
    this.verticesByLabel.clear()
    for (const vertex of this.vertices.values()) {
      addToIndex(this.verticesByLabel, vertex.label, vertex.id)
    }
  }

  private rebuildPropertyIndexes(): void {
    const properties = Array.from(this.propertyIndexes.keys())
    this.propertyIndexes.clear()
    for (const property of properties) {
      this.createIndex(property)
    }
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  /**
   * Clear all data. Indexes stay defined and empty.
   */
  clear(): void {
    this.vertices.clear()
    this.edges.clear()
    this.outEdges.clear()
    this.inEdges.clear()
    this.verticesByLabel.clear()
    this.variables.clear()
    for (const index of this.propertyIndexes.values()) index.clear()
    this.transactionSnapshot = null
  }

  stats(): { vertices: number; edges: number; labels: number; variables: number } {
    return {
      vertices: this.vertices.size,
      edges: this.edges.size,
      labels: Array.from(this.verticesByLabel.values()).filter((ids) => ids.size > 0).length,
      variables: this.variables.size,
    }
  }

  export(): StoreData {
    return {
      vertices: this.getAllVertices(),
      edges: this.getAllEdges(),
      variables: Object.fromEntries(Array.from(this.variables.entries()).map(([k, v]) => [k, clone(v)])),
    }
  }

  import(data: StoreData): void {
    this.clear()
    for (const vertex of data.vertices) {
      this.createVertex(vertex)
    }
    for (const edge of data.edges) {
      this.createEdge(edge)
    }
    for (const [key, value] of Object.entries(data.variables)) {
      this.setVariable(key, value)
    }
  }
}
