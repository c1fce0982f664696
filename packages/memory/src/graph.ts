/**
 * In-Memory Graph
 *
 * A property graph held in a GraphStore. Every write checks the features the
 * graph declares, so a graph configured without a feature behaves like a
 * backend that lacks it.
 */

import {
  ElementNotFoundError,
  FeatureTable,
  GraphClosedError,
  type ElementId,
  type EdgeRef,
  type FeatureClass,
  type FeatureDeclaration,
  type FeatureName,
  type FeatureOverride,
  type GraphFeatures,
  type GraphTransaction,
  type TestGraph,
  type VertexRef,
} from "@graphcheck/harness"
import { UnsupportedOperationError, UnsupportedPropertyValueError } from "./errors"
import { MEMORY_GRAPH_FEATURES, PERSISTENT_FEATURES } from "./features"
import { readPersistedGraph, writePersistedGraph } from "./persistence"
import { GraphStore } from "./store"
import { dataTypeOf, describeKind } from "./values"

// =============================================================================
// PUBLIC SURFACE
// =============================================================================

export type Properties = Record<string, unknown>

export interface MemoryTransaction extends GraphTransaction {
  isOpen(): boolean
  commit(): void
  rollback(): void
}

/**
 * Operations shared by the in-memory graph and its strategy decorators.
 */
export interface PropertyGraph extends TestGraph {
  readonly graphName: string
  readonly features: GraphFeatures
  readonly featureOverrides: readonly FeatureOverride[]

  addVertex(label: string, properties?: Properties, id?: ElementId): VertexRef
  addEdge(label: string, outId: ElementId, inId: ElementId, properties?: Properties, id?: ElementId): EdgeRef
  setVertexProperty(id: ElementId, key: string, value: unknown): void
  removeVertexProperty(id: ElementId, key: string): void
  setEdgeProperty(id: ElementId, key: string, value: unknown): void
  removeEdgeProperty(id: ElementId, key: string): void
  removeVertex(id: ElementId): void
  removeEdge(id: ElementId): void

  vertex(id: ElementId): VertexRef | undefined
  edge(id: ElementId): EdgeRef | undefined
  vertices(label?: string): VertexRef[]
  edges(label?: string): EdgeRef[]
  findVertices(property: string, value: unknown): VertexRef[]
  outEdges(vertexId: ElementId, label?: string): EdgeRef[]
  inEdges(vertexId: ElementId, label?: string): EdgeRef[]

  variable(key: string): unknown
  setVariable(key: string, value: unknown): void
  removeVariable(key: string): void
  variableKeys(): string[]

  tx(): MemoryTransaction
  stats(): { vertices: number; edges: number; labels: number; variables: number }
  close(): void
  isClosed(): boolean

  /** The undecorated graph, used to load fixtures past any strategy */
  baseGraph(): MemoryGraph
}

export interface MemoryGraphOptions {
  graphName: string
  /** JSON file the graph is persisted to on commit and close */
  location?: string
  /** Declared on top of the default in-memory features */
  features?: FeatureDeclaration
  featureOverrides?: readonly FeatureOverride[]
  /** Vertex properties to index */
  indexes?: readonly string[]
}

// =============================================================================
// GRAPH
// =============================================================================

export class MemoryGraph implements PropertyGraph {
  readonly graphName: string
  readonly features: FeatureTable
  readonly featureOverrides: readonly FeatureOverride[]
  readonly location: string | undefined

  private readonly store = new GraphStore()
  private readonly transaction: MemoryTransaction
  private nextId = 1
  private closed = false

  constructor(options: MemoryGraphOptions) {
    this.graphName = options.graphName
    this.location = options.location
    this.features = new FeatureTable(
      MEMORY_GRAPH_FEATURES,
      options.location ? PERSISTENT_FEATURES : {},
      options.features ?? {},
    )
    this.featureOverrides = Object.freeze([...(options.featureOverrides ?? [])])

    for (const property of options.indexes ?? []) {
      this.store.createIndex(property)
    }

    this.transaction = {
      isOpen: () => this.store.inTransaction(),
      commit: () => this.commit(),
      rollback: () => this.rollback(),
    }
  }

  /**
   * Open a graph, restoring persisted state when the location holds any.
   */
  static open(options: MemoryGraphOptions): MemoryGraph {
    const graph = new MemoryGraph(options)
    const persisted = options.location ? readPersistedGraph(options.location) : undefined
    if (persisted) {
      graph.store.import(persisted)
      graph.nextId = persisted.nextId
    }
    return graph
  }

  // ===========================================================================
  // WRITES
  // ===========================================================================

  addVertex(label: string, properties: Properties = {}, id?: ElementId): VertexRef {
    this.requireFeature("add vertices", "vertex", "AddVertices")
    this.checkProperties("vertexProperty", properties)
    const vertexId = this.assignId("vertex", id)

    return this.write(() => {
      this.store.createVertex({ id: vertexId, label, properties })
      return this.getVertexOrThrow(vertexId)
    })
  }

  addEdge(label: string, outId: ElementId, inId: ElementId, properties: Properties = {}, id?: ElementId): EdgeRef {
    this.requireFeature("add edges", "edge", "AddEdges")
    this.checkProperties("edgeProperty", properties)
    this.getVertexOrThrow(outId)
    this.getVertexOrThrow(inId)
    const edgeId = this.assignId("edge", id)

    return this.write(() => {
      this.store.createEdge({ id: edgeId, label, outId, inId, properties })
      return this.getEdgeOrThrow(edgeId)
    })
  }

  setVertexProperty(id: ElementId, key: string, value: unknown): void {
    this.requireFeature("add vertex properties", "vertex", "AddProperty")
    this.checkProperties("vertexProperty", { [key]: value })
    this.getVertexOrThrow(id)
    this.write(() => this.store.updateVertex(id, { [key]: value }))
  }

  removeVertexProperty(id: ElementId, key: string): void {
    this.requireFeature("remove vertex properties", "vertex", "RemoveProperty")
    this.getVertexOrThrow(id)
    this.write(() => this.store.updateVertex(id, { [key]: undefined }))
  }

  setEdgeProperty(id: ElementId, key: string, value: unknown): void {
    this.requireFeature("add edge properties", "edge", "AddProperty")
    this.checkProperties("edgeProperty", { [key]: value })
    this.getEdgeOrThrow(id)
    this.write(() => this.store.updateEdge(id, { [key]: value }))
  }

  removeEdgeProperty(id: ElementId, key: string): void {
    this.requireFeature("remove edge properties", "edge", "RemoveProperty")
    this.getEdgeOrThrow(id)
    this.write(() => this.store.updateEdge(id, { [key]: undefined }))
  }

  removeVertex(id: ElementId): void {
    this.requireFeature("remove vertices", "vertex", "RemoveVertices")
    this.getVertexOrThrow(id)
    this.write(() => this.store.deleteVertex(id))
  }

  removeEdge(id: ElementId): void {
    this.requireFeature("remove edges", "edge", "RemoveEdges")
    this.getEdgeOrThrow(id)
    this.write(() => this.store.deleteEdge(id))
  }

  setVariable(key: string, value: unknown): void {
    this.requireFeature("graph variables", "variables", "Variables")
    const kind = dataTypeOf(value)
    if (!kind || !this.features.supports("variables", kind)) {
      throw new UnsupportedPropertyValueError(key, kind ?? describeKind(value))
    }
    this.write(() => this.store.setVariable(key, value))
  }

  removeVariable(key: string): void {
    this.requireFeature("graph variables", "variables", "Variables")
    this.write(() => this.store.deleteVariable(key))
  }

  // ===========================================================================
  // READS
  // ===========================================================================

  vertex(id: ElementId): VertexRef | undefined {
    this.ensureOpen()
    return this.store.getVertex(id)
  }

  edge(id: ElementId): EdgeRef | undefined {
    this.ensureOpen()
    return this.store.getEdge(id)
  }

  vertices(label?: string): VertexRef[] {
    this.ensureOpen()
    return label === undefined ? this.store.getAllVertices() : this.store.getVerticesByLabel(label)
  }

  edges(label?: string): EdgeRef[] {
    this.ensureOpen()
    const edges = this.store.getAllEdges()
    return label === undefined ? edges : edges.filter((edge) => edge.label === label)
  }

  findVertices(property: string, value: unknown): VertexRef[] {
    this.ensureOpen()
    return this.store.findByProperty(property, value)
  }

  outEdges(vertexId: ElementId, label?: string): EdgeRef[] {
    this.ensureOpen()
    return this.store.getOutgoingEdges(vertexId, label)
  }

  inEdges(vertexId: ElementId, label?: string): EdgeRef[] {
    this.ensureOpen()
    return this.store.getIncomingEdges(vertexId, label)
  }

  variable(key: string): unknown {
    this.ensureOpen()
    return this.store.getVariable(key)
  }

  variableKeys(): string[] {
    this.ensureOpen()
    return this.store.variableKeys()
  }

  stats(): { vertices: number; edges: number; labels: number; variables: number } {
    return this.store.stats()
  }

  // ===========================================================================
  // TRANSACTIONS & LIFECYCLE
  // ===========================================================================

  /**
   * The graph's transaction. Writes open it automatically.
   */
  tx(): MemoryTransaction {
    this.ensureOpen()
    this.requireFeature("transactions", "graph", "Transactions")
    return this.transaction
  }

  /**
   * Roll back uncommitted work, persist and close. Closing twice is a no-op.
   */
  close(): void {
    if (this.closed) return
    if (this.store.inTransaction()) this.store.rollback()
    this.persist()
    this.closed = true
  }

  isClosed(): boolean {
    return this.closed
  }

  baseGraph(): MemoryGraph {
    return this
  }

  private commit(): void {
    this.ensureOpen()
    if (this.store.inTransaction()) this.store.commit()
    this.persist()
  }

  private rollback(): void {
    this.ensureOpen()
    if (this.store.inTransaction()) this.store.rollback()
  }

  private persist(): void {
    if (this.location) {
      writePersistedGraph(this.location, this.nextId, this.store.export())
    }
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private write<T>(apply: () => T): T {
    this.ensureOpen()
    if (this.features.supportsTransactions() && !this.store.inTransaction()) {
      this.store.beginTransaction()
    }
    return apply()
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new GraphClosedError(this.graphName)
    }
  }

  private requireFeature<C extends FeatureClass>(operation: string, featureClass: C, feature: FeatureName<C>): void {
    if (!this.features.supports(featureClass, feature)) {
      throw new UnsupportedOperationError(operation, featureClass, feature)
    }
  }

  private checkProperties(featureClass: "vertexProperty" | "edgeProperty", properties: Properties): void {
    const entries = Object.entries(properties)
    if (entries.length === 0) return
    this.requireFeature("properties", featureClass, "Properties")

    for (const [key, value] of entries) {
      const kind = dataTypeOf(value)
      if (!kind || !this.features.supports(featureClass, kind)) {
        throw new UnsupportedPropertyValueError(key, kind ?? describeKind(value))
      }
    }
  }

  private assignId(element: "vertex" | "edge", id: ElementId | undefined): ElementId {
    if (id === undefined) {
      while (this.store.hasVertex(this.nextId) || this.store.hasEdge(this.nextId)) this.nextId++
      return this.nextId++
    }

    this.requireFeature(`user supplied ${element} ids`, element, "UserSuppliedIds")
    if (typeof id === "number") {
      this.requireFeature(`numeric ${element} ids`, element, "NumericIds")
    } else {
      this.requireFeature(`string ${element} ids`, element, "StringIds")
    }
    return id
  }

  private getVertexOrThrow(id: ElementId): VertexRef {
    const vertex = this.vertex(id)
    if (!vertex) throw new ElementNotFoundError("vertex", `id=${JSON.stringify(id)}`)
    return vertex
  }

  private getEdgeOrThrow(id: ElementId): EdgeRef {
    const edge = this.edge(id)
    if (!edge) throw new ElementNotFoundError("edge", `id=${JSON.stringify(id)}`)
    return edge
  }
}
