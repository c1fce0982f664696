/**
 * Requirement Collection
 *
 * Merges the requirements a test declares directly, the ones its requirement sets
 * expand to, and the ones its fixture brings, into one deduplicated list.
 */

import { FeatureDeclarationError } from '../errors'
import { isFeatureClass, isKnownFeature } from '../features'
import {
  FIXTURES,
  REQUIREMENT_SETS,
  requirementKey,
  requires,
  type FeatureDescriptor,
  type FeatureRequirement,
  type FeatureRequirementSet,
  type FixtureSpec,
  type GraphTestDeclaration,
} from '../requirements'

// =============================================================================
// REGISTRY
// =============================================================================

/**
 * Named requirement sets and fixtures a declaration may refer to.
 */
export interface RequirementRegistry {
  readonly sets: ReadonlyMap<string, FeatureRequirementSet>
  readonly fixtures: ReadonlyMap<string, FixtureSpec>
}

export interface RegistryAdditions {
  sets?: readonly FeatureRequirementSet[]
  fixtures?: readonly FixtureSpec[]
}

/**
 * Registry of the built-in sets and fixtures plus any additions.
 * An addition with a built-in name replaces the built-in.
 */
export function createRequirementRegistry(additions: RegistryAdditions = {}): RequirementRegistry {
  const sets = new Map(Object.entries(REQUIREMENT_SETS))
  for (const set of additions.sets ?? []) sets.set(set.name, set)

  const fixtures = new Map(Object.entries(FIXTURES))
  for (const fixture of additions.fixtures ?? []) fixtures.set(fixture.name, fixture)

  return { sets, fixtures }
}

export const DEFAULT_REGISTRY: RequirementRegistry = createRequirementRegistry()

// =============================================================================
// COLLECTION
// =============================================================================

export interface CollectedRequirements {
  readonly requirements: readonly FeatureRequirement[]
  readonly fixture?: FixtureSpec
}

export function collectRequirements(
  declaration: GraphTestDeclaration,
  registry: RequirementRegistry = DEFAULT_REGISTRY,
): CollectedRequirements {
  const collected: FeatureRequirement[] = []

  for (const descriptor of declaration.requirements ?? []) {
    if (descriptor.kind === 'feature') {
      collected.push(toRequirement(descriptor))
      continue
    }

    const set = registry.sets.get(descriptor.set)
    if (!set) {
      throw new FeatureDeclarationError(`Unknown requirement set: ${descriptor.set}`)
    }
    collected.push(...set.requirements().map(validateRequirement))
  }

  let fixture: FixtureSpec | undefined
  if (declaration.fixture !== undefined) {
    fixture = registry.fixtures.get(declaration.fixture)
    if (!fixture) {
      throw new FeatureDeclarationError(`Unknown fixture: ${declaration.fixture}`)
    }
    collected.push(...fixture.requirements.map(validateRequirement))
  }

  const requirements = Object.freeze(dedupeRequirements(collected))
  return fixture ? { requirements, fixture } : { requirements }
}

/**
 * Collapse requirements with the same class, feature and expected value,
 * keeping first-declared order.
 */
export function dedupeRequirements(requirements: readonly FeatureRequirement[]): FeatureRequirement[] {
  const unique = new Map<string, FeatureRequirement>()
  for (const requirement of requirements) {
    const key = requirementKey(requirement)
    if (!unique.has(key)) unique.set(key, requirement)
  }
  return Array.from(unique.values())
}

function toRequirement(descriptor: FeatureDescriptor): FeatureRequirement {
  const { featureClass, feature } = descriptor
  if (!isFeatureClass(featureClass)) {
    throw new FeatureDeclarationError(`[${featureClass}] is not a valid feature class`, featureClass, feature)
  }
  if (!isKnownFeature(featureClass, feature)) {
    throw new FeatureDeclarationError(
      `[supports${feature}] is not a valid feature on ${featureClass}`,
      featureClass,
      feature,
    )
  }
  return requires(featureClass, feature, descriptor.supported ?? true)
}

/**
 * Sets and fixtures are typed where they are declared, but may have been built
 * from untyped data.
 */
function validateRequirement(requirement: FeatureRequirement): FeatureRequirement {
  return toRequirement({ kind: 'feature', ...requirement })
}
