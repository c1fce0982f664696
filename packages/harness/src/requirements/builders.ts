/**
 * Requirement Builders
 */

import { featureKey, type FeatureClass, type FeatureName } from '../features'
import type { FeatureOverride, FeatureRequirement, FeatureRequirementSet, FixtureSpec } from './types'

export function requires<C extends FeatureClass>(
  featureClass: C,
  feature: FeatureName<C>,
  supported = true,
): FeatureRequirement<C> {
  return Object.freeze({ featureClass, feature, supported })
}

export function override<C extends FeatureClass>(
  featureClass: C,
  feature: FeatureName<C>,
  supported: boolean,
  reason?: string,
): FeatureOverride<C> {
  return Object.freeze(reason === undefined ? { featureClass, feature, supported } : { featureClass, feature, supported, reason })
}

/**
 * Identity of a requirement: two declarations with the same key are the same requirement.
 */
export function requirementKey(requirement: FeatureRequirement): string {
  return `${featureKey(requirement.featureClass, requirement.feature)}=${requirement.supported}`
}

export function defineRequirementSet(name: string, expand: () => FeatureRequirement[]): FeatureRequirementSet {
  let expanded: readonly FeatureRequirement[] | undefined
  return Object.freeze({
    name,
    requirements(): readonly FeatureRequirement[] {
      expanded ??= Object.freeze(expand())
      return expanded
    },
  })
}

export function defineFixture(name: string, description: string, requirements: FeatureRequirement[]): FixtureSpec {
  return Object.freeze({ name, description, requirements: Object.freeze(requirements) })
}

export function formatRequirement(requirement: FeatureRequirement): string {
  return `${requirement.featureClass}.${requirement.feature}=${requirement.supported}`
}
