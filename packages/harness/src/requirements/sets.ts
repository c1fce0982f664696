/**
 * Built-in Requirement Sets
 */

import { defineRequirementSet, requires } from './builders'
import type { FeatureRequirementSet } from './types'

/** Vertices and edges with string properties */
export const SIMPLE = defineRequirementSet('SIMPLE', () => [
  requires('vertex', 'AddVertices'),
  requires('vertex', 'AddProperty'),
  requires('vertexProperty', 'StringValues'),
  requires('edge', 'AddEdges'),
])

/** Vertices with string properties on a backend that has no edges */
export const VERTICES_ONLY = defineRequirementSet('VERTICES_ONLY', () => [
  requires('vertex', 'AddVertices'),
  requires('vertex', 'AddProperty'),
  requires('vertexProperty', 'StringValues'),
  requires('edge', 'AddEdges', false),
])

/** Removal of vertices, edges and vertex properties */
export const REMOVE = defineRequirementSet('REMOVE', () => [
  requires('vertex', 'RemoveVertices'),
  requires('vertex', 'RemoveProperty'),
  requires('edge', 'RemoveEdges'),
])

export const REQUIREMENT_SETS: Readonly<Record<string, FeatureRequirementSet>> = Object.freeze({
  [SIMPLE.name]: SIMPLE,
  [VERTICES_ONLY.name]: VERTICES_ONLY,
  [REMOVE.name]: REMOVE,
})
