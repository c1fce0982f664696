/**
 * Requirement Descriptors
 *
 * Serializable form of what a test needs, attached to the test when it is
 * registered. Shape is validated here; names are validated on resolution.
 */

import { z } from 'zod'
import type { FeatureClass, FeatureName } from '../features'

export const featureDescriptorSchema = z.object({
  kind: z.literal('feature'),
  featureClass: z.string().min(1),
  feature: z.string().min(1),
  supported: z.boolean().optional(),
})

export const setDescriptorSchema = z.object({
  kind: z.literal('set'),
  set: z.string().min(1),
})

export const requirementDescriptorSchema = z.discriminatedUnion('kind', [featureDescriptorSchema, setDescriptorSchema])

export const graphTestDeclarationSchema = z.object({
  name: z.string().min(1),
  requirements: z.array(requirementDescriptorSchema).optional(),
  fixture: z.string().min(1).optional(),
})

export type FeatureDescriptor = z.infer<typeof featureDescriptorSchema>
export type SetDescriptor = z.infer<typeof setDescriptorSchema>
export type RequirementDescriptor = z.infer<typeof requirementDescriptorSchema>
export type GraphTestDeclaration = z.infer<typeof graphTestDeclarationSchema>

export function feature<C extends FeatureClass>(featureClass: C, name: FeatureName<C>, supported = true): FeatureDescriptor {
  return { kind: 'feature', featureClass, feature: name, supported }
}

export function requirementSet(name: string): SetDescriptor {
  return { kind: 'set', set: name }
}

/**
 * Validate a declaration read from outside the type system (JSON, YAML, a manifest).
 */
export function parseTestDeclaration(input: unknown): GraphTestDeclaration {
  return graphTestDeclarationSchema.parse(input)
}
