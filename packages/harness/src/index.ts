/**
 * graphcheck Harness
 *
 * Feature-gated lifecycle for tests that run against pluggable graph backends.
 * Each test declares the features it needs; the harness provisions a fresh
 * graph, skips the test when the graph cannot meet them, loads fixture data and
 * tears the graph down afterwards.
 *
 * @example
 * ```typescript
 * import { GraphTestLifecycle, feature, requirementSet, vertexIdByName } from '@graphcheck/harness'
 *
 * const lifecycle = new GraphTestLifecycle({ provider, suite: 'traversal' })
 *
 * const result = await lifecycle.beforeTest({
 *   name: 'followsKnownEdges',
 *   fixture: 'grateful-dead',
 *   requirements: [requirementSet('SIMPLE'), feature('graph', 'Transactions')],
 * })
 *
 * try {
 *   if (result.status === 'ready') {
 *     const id = await vertexIdByName(result.context.graph, 'Garcia')
 *   }
 * } finally {
 *   await lifecycle.afterTest()
 * }
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// FEATURES
// =============================================================================

export { FEATURE_CATALOG, FEATURE_CLASSES, isFeatureClass, isKnownFeature, featureKey, FeatureTable } from './features'
export type { FeatureClass, FeatureName, DataTypeFeature, FeatureDeclaration } from './features'

// =============================================================================
// REQUIREMENT MODEL
// =============================================================================

export {
  requires,
  override,
  requirementKey,
  defineRequirementSet,
  defineFixture,
  formatRequirement,
  SIMPLE,
  VERTICES_ONLY,
  REMOVE,
  REQUIREMENT_SETS,
  CLASSIC,
  MODERN,
  CREW,
  GRATEFUL_DEAD,
  FIXTURES,
  featureDescriptorSchema,
  setDescriptorSchema,
  requirementDescriptorSchema,
  graphTestDeclarationSchema,
  feature,
  requirementSet,
  parseTestDeclaration,
} from './requirements'
export type {
  FeatureRequirement,
  FeatureRequirementSet,
  FeatureOverride,
  FixtureSpec,
  FeatureDescriptor,
  SetDescriptor,
  RequirementDescriptor,
  GraphTestDeclaration,
} from './requirements'

// =============================================================================
// FIXTURE DATASETS
// =============================================================================

export {
  DEFAULT_FIXTURES_DIR,
  fixtureDatasetSchema,
  FixtureDataError,
  readFixtureDataset,
  validateDatasetNames,
  datasetVertexName,
} from './fixtures'
export type { FixtureDataset } from './fixtures'

// =============================================================================
// RESOLVER
// =============================================================================

export {
  createRequirementRegistry,
  DEFAULT_REGISTRY,
  collectRequirements,
  dedupeRequirements,
  buildOverrideTable,
  resolveRequirements,
  describeOutcome,
  toSkipSignal,
} from './resolver'
export type {
  RequirementRegistry,
  RegistryAdditions,
  CollectedRequirements,
  ResolutionSource,
  RequirementOutcome,
  Resolution,
  SkipSignal,
} from './resolver'

// =============================================================================
// PROVIDER CONTRACT
// =============================================================================

export type {
  Awaitable,
  ElementId,
  GraphFeatures,
  GraphTransaction,
  VertexRef,
  EdgeRef,
  TestGraph,
  TestIdentity,
  GraphConfiguration,
  GraphStrategy,
  GraphProvider,
} from './provider'

// =============================================================================
// LIFECYCLE
// =============================================================================

export { GraphTestLifecycle, GraphTestContext, normalizeTestName, graphNameFor, runGraphTest } from './lifecycle'
export type {
  LifecycleState,
  PrepareGraph,
  GraphTestLifecycleOptions,
  BeforeTestResult,
  TestOutcome,
  GraphTestBody,
} from './lifecycle'

// =============================================================================
// HELPERS
// =============================================================================

export {
  commitIfSupported,
  rollbackIfSupported,
  DEFAULT_NAME_PROPERTY,
  vertexByName,
  vertexIdByName,
  edgeByNames,
  edgeIdByNames,
} from './helpers'
export type { GraphAssertion, LookupOptions } from './helpers'

// =============================================================================
// ERRORS, LOGGING, CONFIGURATION
// =============================================================================

export {
  HarnessError,
  FeatureDeclarationError,
  UnknownFeatureError,
  ProvisioningError,
  TeardownError,
  LifecycleStateError,
  ElementNotFoundError,
  ConfigurationError,
  GraphClosedError,
  toError,
} from './errors'
export type { ProvisioningStep } from './errors'

export { Logger, createLogger } from './logging'
export type { LogLevel, LoggerOptions } from './logging'

export { harnessConfigSchema, parseHarnessConfig, loadHarnessConfig } from './config'
export type { HarnessConfig, HarnessConfigInput, Environment } from './config'
