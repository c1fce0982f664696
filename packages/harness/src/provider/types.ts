/**
 * Provider Contract
 *
 * What the harness needs from a graph backend: a way to obtain, reset, populate
 * and dispose of isolated graphs, and a feature surface on each graph.
 */

import type { FeatureClass, FeatureName } from '../features'
import type { FeatureOverride, FixtureSpec } from '../requirements'

export type Awaitable<T> = T | Promise<T>

export type ElementId = string | number

// =============================================================================
// GRAPH SURFACE
// =============================================================================

/**
 * Capability query exposed by every graph under test.
 */
export interface GraphFeatures {
  /**
   * Whether the graph supports a feature.
   * Throws UnknownFeatureError for a feature the surface does not expose.
   */
  supports<C extends FeatureClass>(featureClass: C, feature: FeatureName<C>): boolean
  supportsTransactions(): boolean
}

export interface GraphTransaction {
  commit(): Awaitable<void>
  rollback(): Awaitable<void>
}

export interface VertexRef {
  readonly id: ElementId
  readonly label: string
  readonly properties: Readonly<Record<string, unknown>>
}

export interface EdgeRef {
  readonly id: ElementId
  readonly label: string
  readonly outId: ElementId
  readonly inId: ElementId
  readonly properties: Readonly<Record<string, unknown>>
}

/**
 * A provisioned, isolated graph.
 */
export interface TestGraph {
  readonly features: GraphFeatures
  /** Forced feature values that win over the live feature surface */
  readonly featureOverrides?: readonly FeatureOverride[]
  tx(): GraphTransaction
  vertex(id: ElementId): Awaitable<VertexRef | undefined>
  findVertices(property: string, value: unknown): Awaitable<readonly VertexRef[]>
  outEdges(vertexId: ElementId, label?: string): Awaitable<readonly EdgeRef[]>
}

// =============================================================================
// PROVIDER
// =============================================================================

/**
 * Identity of one test invocation.
 */
export interface TestIdentity {
  readonly suite: string
  readonly test: string
}

export interface GraphConfiguration {
  readonly graphName: string
}

/**
 * Decorator applied to a graph when it is opened, e.g. a read-only view.
 */
export interface GraphStrategy<G extends TestGraph = TestGraph> {
  readonly name: string
  decorate(graph: G): G
}

/**
 * Implement this to run harness tests against a backend.
 * Must tolerate concurrent calls for distinct configurations.
 */
export interface GraphProvider<G extends TestGraph = TestGraph, C extends GraphConfiguration = GraphConfiguration> {
  readonly name: string

  /** Configuration for one test invocation */
  configurationFor(identity: TestIdentity): Awaitable<C>

  /** Remove any state left for this configuration. Succeeds when nothing exists. */
  clear(configuration: C): Awaitable<void>

  /** Open a fresh graph, decorated by the strategy when one is given */
  open(configuration: C, strategy?: GraphStrategy<G>): Awaitable<G>

  /** Load a named dataset into an opened graph */
  loadFixture(graph: G, fixture: FixtureSpec): Awaitable<void>

  /** Close an opened graph and remove its state */
  clearGraph(graph: G, configuration: C): Awaitable<void>
}
