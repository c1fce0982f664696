/**
 * graphcheck In-Memory Backend
 *
 * Zero-infrastructure graph backend for the graphcheck harness.
 *
 * @example
 * ```typescript
 * import { GraphTestLifecycle, feature } from '@graphcheck/harness'
 * import { MemoryGraphProvider } from '@graphcheck/memory'
 *
 * const lifecycle = new GraphTestLifecycle({
 *   provider: new MemoryGraphProvider({ features: { graph: { Transactions: false } } }),
 *   suite: 'structure',
 * })
 *
 * const result = await lifecycle.beforeTest({
 *   name: 'commitsVertices',
 *   requirements: [feature('graph', 'Transactions')],
 * })
 * // result.status === 'skipped'
 * await lifecycle.afterTest()
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// GRAPH
// =============================================================================

export { MemoryGraph } from "./graph"
export type { PropertyGraph, MemoryGraphOptions, MemoryTransaction, Properties } from "./graph"
export { MEMORY_GRAPH_FEATURES, PERSISTENT_FEATURES } from "./features"
export { ReadOnlyGraph, ReadOnlyStrategy } from "./strategy"
export { UnsupportedOperationError, UnsupportedPropertyValueError } from "./errors"

// =============================================================================
// PROVIDER
// =============================================================================

export { MemoryGraphProvider } from "./provider"
export type { MemoryGraphConfiguration, MemoryGraphProviderOptions } from "./provider"

// =============================================================================
// FIXTURES & STORE (for advanced use cases)
// =============================================================================

export { loadFixtureDataset } from "./fixtures"
export type { FixtureLoadOptions } from "./fixtures"
export { GraphStore } from "./store"
export type { StoredVertex, StoredEdge, StoreData, TransactionSnapshot } from "./store"
