/**
 * Requirements Module
 */

export type { FeatureRequirement, FeatureRequirementSet, FeatureOverride, FixtureSpec } from './types'
export { requires, override, requirementKey, defineRequirementSet, defineFixture, formatRequirement } from './builders'
export { SIMPLE, VERTICES_ONLY, REMOVE, REQUIREMENT_SETS } from './sets'
export { CLASSIC, MODERN, CREW, GRATEFUL_DEAD, FIXTURES } from './fixtures'
export {
  featureDescriptorSchema,
  setDescriptorSchema,
  requirementDescriptorSchema,
  graphTestDeclarationSchema,
  feature,
  requirementSet,
  parseTestDeclaration,
} from './descriptors'
export type { FeatureDescriptor, SetDescriptor, RequirementDescriptor, GraphTestDeclaration } from './descriptors'
