/**
 * Requirement Model Types
 *
 * Immutable values declared once and read by every test invocation.
 */

import type { FeatureClass, FeatureName } from '../features'

/**
 * A single capability a test needs, and whether it must be supported or absent.
 */
export interface FeatureRequirement<C extends FeatureClass = FeatureClass> {
  readonly featureClass: C
  readonly feature: FeatureName<C>
  readonly supported: boolean
}

/**
 * A named bundle of requirements, expanded on first use.
 */
export interface FeatureRequirementSet {
  readonly name: string
  requirements(): readonly FeatureRequirement[]
}

/**
 * Attached to a backend: the actual value of a feature, regardless of what the
 * graph reports about itself.
 */
export interface FeatureOverride<C extends FeatureClass = FeatureClass> {
  readonly featureClass: C
  readonly feature: FeatureName<C>
  readonly supported: boolean
  readonly reason?: string
}

/**
 * A named dataset and the features a backend needs to hold it.
 */
export interface FixtureSpec {
  readonly name: string
  readonly description: string
  readonly requirements: readonly FeatureRequirement[]
}
