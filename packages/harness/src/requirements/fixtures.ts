/**
 * Built-in Fixtures
 *
 * Every element in a fixture carries a unique `name` property.
 */

import { defineFixture, requires } from './builders'
import type { FixtureSpec } from './types'

export const CLASSIC = defineFixture('classic', 'Small social graph with integer ages and weighted edges', [
  requires('vertexProperty', 'Properties'),
  requires('vertexProperty', 'StringValues'),
  requires('vertexProperty', 'IntegerValues'),
  requires('edgeProperty', 'Properties'),
  requires('edgeProperty', 'DoubleValues'),
])

export const MODERN = defineFixture('modern', 'Labelled people and software with typed properties', [
  requires('vertexProperty', 'Properties'),
  requires('vertexProperty', 'StringValues'),
  requires('vertexProperty', 'IntegerValues'),
  requires('edgeProperty', 'Properties'),
  requires('edgeProperty', 'DoubleValues'),
])

// locations are lists of maps carrying their validity period
export const CREW = defineFixture('crew', 'Multi-valued properties with meta-properties and graph variables', [
  requires('vertex', 'MetaProperties'),
  requires('vertex', 'MultiProperties'),
  requires('vertexProperty', 'Properties'),
  requires('vertexProperty', 'StringValues'),
  requires('vertexProperty', 'IntegerValues'),
  requires('vertexProperty', 'ListValues'),
  requires('vertexProperty', 'MapValues'),
  requires('edgeProperty', 'Properties'),
  requires('edgeProperty', 'IntegerValues'),
  requires('variables', 'Variables'),
  requires('variables', 'StringValues'),
  requires('variables', 'IntegerValues'),
])

export const GRATEFUL_DEAD = defineFixture('grateful-dead', 'Songs, artists and performance counts', [
  requires('vertexProperty', 'Properties'),
  requires('vertexProperty', 'StringValues'),
  requires('vertexProperty', 'IntegerValues'),
  requires('edgeProperty', 'Properties'),
  requires('edgeProperty', 'IntegerValues'),
])

export const FIXTURES: Readonly<Record<string, FixtureSpec>> = Object.freeze({
  [CLASSIC.name]: CLASSIC,
  [MODERN.name]: MODERN,
  [CREW.name]: CREW,
  [GRATEFUL_DEAD.name]: GRATEFUL_DEAD,
})
