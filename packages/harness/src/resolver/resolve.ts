/**
 * Requirement Resolution
 *
 * Decides, for each requirement, whether the opened graph meets it. A backend
 * override for a feature always wins over what the graph reports.
 */

import { FeatureDeclarationError, UnknownFeatureError } from '../errors'
import { featureKey, isFeatureClass, isKnownFeature } from '../features'
import type { TestGraph } from '../provider'
import { formatRequirement, type FeatureOverride, type FeatureRequirement } from '../requirements'

export type ResolutionSource = 'override' | 'instance'

export interface RequirementOutcome {
  readonly requirement: FeatureRequirement
  /** Value the requirement was compared against */
  readonly actual: boolean
  readonly source: ResolutionSource
  readonly met: boolean
  readonly override?: FeatureOverride
}

export interface Resolution {
  readonly satisfied: boolean
  readonly outcomes: readonly RequirementOutcome[]
  readonly unmet: readonly RequirementOutcome[]
}

/**
 * What the runner reports for a test whose requirements were not met.
 */
export interface SkipSignal {
  readonly reason: string
  readonly unmet: readonly RequirementOutcome[]
}

/**
 * Index overrides by class and feature.
 * Two overrides for the same feature that disagree are a declaration error.
 */
export function buildOverrideTable(overrides: readonly FeatureOverride[] = []): ReadonlyMap<string, FeatureOverride> {
  const table = new Map<string, FeatureOverride>()

  for (const entry of overrides) {
    if (!isFeatureClass(entry.featureClass) || !isKnownFeature(entry.featureClass, entry.feature)) {
      throw new FeatureDeclarationError(
        `Override [supports${entry.feature}] is not a valid feature on ${entry.featureClass}`,
        entry.featureClass,
        entry.feature,
      )
    }

    const key = featureKey(entry.featureClass, entry.feature)
    const existing = table.get(key)
    if (existing && existing.supported !== entry.supported) {
      throw new FeatureDeclarationError(
        `Conflicting overrides for ${key}: ${existing.supported} and ${entry.supported}`,
        entry.featureClass,
        entry.feature,
      )
    }
    table.set(key, entry)
  }

  return table
}

export function resolveRequirements(
  requirements: readonly FeatureRequirement[],
  graph: Pick<TestGraph, 'features' | 'featureOverrides'>,
): Resolution {
  const overrides = buildOverrideTable(graph.featureOverrides)

  const outcomes = requirements.map((requirement): RequirementOutcome => {
    const found = overrides.get(featureKey(requirement.featureClass, requirement.feature))
    if (found) {
      return {
        requirement,
        actual: found.supported,
        source: 'override',
        met: found.supported === requirement.supported,
        override: found,
      }
    }

    const actual = querySupport(graph, requirement)
    return { requirement, actual, source: 'instance', met: actual === requirement.supported }
  })

  const unmet = outcomes.filter((outcome) => !outcome.met)
  return { satisfied: unmet.length === 0, outcomes, unmet }
}

export function describeOutcome(outcome: RequirementOutcome): string {
  const reported = outcome.source === 'override' ? 'overridden to' : 'graph reports'
  return `${formatRequirement(outcome.requirement)} (${reported} ${outcome.actual})`
}

export function toSkipSignal(resolution: Resolution): SkipSignal {
  return {
    reason: `Unmet feature requirements: ${resolution.unmet.map(describeOutcome).join(', ')}`,
    unmet: resolution.unmet,
  }
}

function querySupport(graph: Pick<TestGraph, 'features'>, requirement: FeatureRequirement): boolean {
  try {
    return graph.features.supports(requirement.featureClass, requirement.feature)
  } catch (error) {
    if (error instanceof UnknownFeatureError) {
      throw new FeatureDeclarationError(error.message, error.featureClass, error.feature, error)
    }
    throw error
  }
}
