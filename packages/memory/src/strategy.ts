/**
 * Graph Strategies
 *
 * Decorators a provider applies when it opens a graph.
 */

import {
  featureKey,
  type ElementId,
  type EdgeRef,
  type FeatureClass,
  type FeatureName,
  type FeatureOverride,
  type GraphFeatures,
  type GraphStrategy,
  type VertexRef,
} from "@graphcheck/harness"
import { UnsupportedOperationError } from "./errors"
import type { MemoryGraph, MemoryTransaction, Properties, PropertyGraph } from "./graph"

const WRITE_FEATURES = new Set([
  featureKey("vertex", "AddVertices"),
  featureKey("vertex", "RemoveVertices"),
  featureKey("vertex", "AddProperty"),
  featureKey("vertex", "RemoveProperty"),
  featureKey("edge", "AddEdges"),
  featureKey("edge", "RemoveEdges"),
  featureKey("edge", "AddProperty"),
  featureKey("edge", "RemoveProperty"),
  featureKey("variables", "Variables"),
])

class ReadOnlyFeatures implements GraphFeatures {
  constructor(private readonly inner: GraphFeatures) {}

  supports<C extends FeatureClass>(featureClass: C, feature: FeatureName<C>): boolean {
    // let the inner surface reject unknown features first
    const supported = this.inner.supports(featureClass, feature)
    return supported && !WRITE_FEATURES.has(featureKey(featureClass, feature))
  }

  supportsTransactions(): boolean {
    return this.inner.supportsTransactions()
  }
}

/**
 * View of a graph that rejects every write and reports write features as unsupported.
 */
export class ReadOnlyGraph implements PropertyGraph {
  readonly features: GraphFeatures

  constructor(private readonly inner: PropertyGraph) {
    this.features = new ReadOnlyFeatures(inner.features)
  }

  get graphName(): string {
    return this.inner.graphName
  }

  get featureOverrides(): readonly FeatureOverride[] {
    return this.inner.featureOverrides
  }

  addVertex(_label: string, _properties?: Properties, _id?: ElementId): VertexRef {
    throw this.rejected("add vertices", "vertex", "AddVertices")
  }

  addEdge(_label: string, _outId: ElementId, _inId: ElementId, _properties?: Properties, _id?: ElementId): EdgeRef {
    throw this.rejected("add edges", "edge", "AddEdges")
  }

  setVertexProperty(_id: ElementId, _key: string, _value: unknown): void {
    throw this.rejected("add vertex properties", "vertex", "AddProperty")
  }

  removeVertexProperty(_id: ElementId, _key: string): void {
    throw this.rejected("remove vertex properties", "vertex", "RemoveProperty")
  }

  setEdgeProperty(_id: ElementId, _key: string, _value: unknown): void {
    throw this.rejected("add edge properties", "edge", "AddProperty")
  }

  removeEdgeProperty(_id: ElementId, _key: string): void {
    throw this.rejected("remove edge properties", "edge", "RemoveProperty")
  }

  removeVertex(_id: ElementId): void {
    throw this.rejected("remove vertices", "vertex", "RemoveVertices")
  }

  removeEdge(_id: ElementId): void {
    throw this.rejected("remove edges", "edge", "RemoveEdges")
  }

  setVariable(_key: string, _value: unknown): void {
    throw this.rejected("graph variables", "variables", "Variables")
  }

  removeVariable(_key: string): void {
    throw this.rejected("graph variables", "variables", "Variables")
  }

  vertex(id: ElementId): VertexRef | undefined {
    return this.inner.vertex(id)
  }

  edge(id: ElementId): EdgeRef | undefined {
    return this.inner.edge(id)
  }

  vertices(label?: string): VertexRef[] {
    return this.inner.vertices(label)
  }

  edges(label?: string): EdgeRef[] {
    return this.inner.edges(label)
  }

  findVertices(property: string, value: unknown): VertexRef[] {
    return this.inner.findVertices(property, value)
  }

  outEdges(vertexId: ElementId, label?: string): EdgeRef[] {
    return this.inner.outEdges(vertexId, label)
  }

  inEdges(vertexId: ElementId, label?: string): EdgeRef[] {
    return this.inner.inEdges(vertexId, label)
  }

  variable(key: string): unknown {
    return this.inner.variable(key)
  }

  variableKeys(): string[] {
    return this.inner.variableKeys()
  }

  tx(): MemoryTransaction {
    return this.inner.tx()
  }

  stats(): { vertices: number; edges: number; labels: number; variables: number } {
    return this.inner.stats()
  }

  close(): void {
    this.inner.close()
  }

  isClosed(): boolean {
    return this.inner.isClosed()
  }

  baseGraph(): MemoryGraph {
    return this.inner.baseGraph()
  }

  private rejected(operation: string, featureClass: FeatureClass, feature: FeatureName): UnsupportedOperationError {
    return new UnsupportedOperationError(`${operation} on read-only graph ${this.graphName}`, featureClass, feature)
  }
}

export class ReadOnlyStrategy implements GraphStrategy<PropertyGraph> {
  readonly name = "read-only"

  decorate(graph: PropertyGraph): PropertyGraph {
    return new ReadOnlyGraph(graph)
  }
}
