/**
 * Resolver Module
 */

export { createRequirementRegistry, DEFAULT_REGISTRY, collectRequirements, dedupeRequirements } from './collect'
export type { RequirementRegistry, RegistryAdditions, CollectedRequirements } from './collect'
export { buildOverrideTable, resolveRequirements, describeOutcome, toSkipSignal } from './resolve'
export type { ResolutionSource, RequirementOutcome, Resolution, SkipSignal } from './resolve'
