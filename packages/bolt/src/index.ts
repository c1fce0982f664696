/**
 * graphcheck Bolt Backend
 *
 * Runs harness tests against Neo4j, Memgraph and other Bolt-compatible servers.
 *
 * @example
 * ```typescript
 * import { GraphTestLifecycle, loadHarnessConfig } from '@graphcheck/harness'
 * import { BoltGraphProvider, loadBoltConfig } from '@graphcheck/bolt'
 *
 * const provider = BoltGraphProvider.fromConfig(loadHarnessConfig(), loadBoltConfig())
 * const lifecycle = new GraphTestLifecycle({ provider, suite: 'traversal' })
 * ```
 *
 * @packageDocumentation
 */

export { BoltGraph, SCOPE_PROPERTY } from "./graph"
export type { BoltGraphOptions } from "./graph"
export { BoltGraphProvider } from "./provider"
export type { BoltGraphConfiguration, BoltGraphProviderOptions } from "./provider"
export { BoltConnection } from "./connection"
export { boltGraphFeatures } from "./features"
export { boltConfigSchema, parseBoltConfig, loadBoltConfig } from "./config"
export type { BoltConfig, IdFunction } from "./config"
export { BoltConnectionError, UnexpectedResultError } from "./errors"
export { convertValue, convertProperties, toVertex, toEdge, quoteIdentifier } from "./values"
export type { CypherParams, CypherRecord, CypherSession, CypherTransaction, SessionFactory } from "./session"
