/**
 * Feature Catalog & Table Tests
 */

import { describe, it, expect } from 'vitest'
import {
  FEATURE_CLASSES,
  FeatureTable,
  UnknownFeatureError,
  featureKey,
  isFeatureClass,
  isKnownFeature,
  type FeatureDeclaration,
  type FeatureName,
} from '../../src'

describe('Feature catalog', () => {
  it('should list every capability class', () => {
    expect(FEATURE_CLASSES).toEqual(['graph', 'variables', 'vertex', 'vertexProperty', 'edge', 'edgeProperty'])
  })

  it('should recognise classes and features', () => {
    expect(isFeatureClass('vertex')).toBe(true)
    expect(isFeatureClass('hyperedge')).toBe(false)
    expect(isKnownFeature('vertex', 'MetaProperties')).toBe(true)
    expect(isKnownFeature('edge', 'MetaProperties')).toBe(false)
    expect(isKnownFeature('edgeProperty', 'MapValues')).toBe(true)
  })

  it('should key features by class', () => {
    expect(featureKey('graph', 'Transactions')).toBe('graph.Transactions')
  })
})

describe('FeatureTable', () => {
  it('should report undeclared features as unsupported', () => {
    const table = new FeatureTable({ graph: { Transactions: true } })

    expect(table.supports('graph', 'Transactions')).toBe(true)
    expect(table.supports('graph', 'Persistence')).toBe(false)
    expect(table.supportsTransactions()).toBe(true)
  })

  it('should let later declarations win', () => {
    const table = new FeatureTable({ vertex: { AddVertices: true } }, { vertex: { AddVertices: false } })
    expect(table.supports('vertex', 'AddVertices')).toBe(false)
  })

  it('should apply changes on a copy', () => {
    const table = new FeatureTable({ graph: { Transactions: true } })
    const changed = table.with({ graph: { Transactions: false } })

    expect(table.supportsTransactions()).toBe(true)
    expect(changed.supportsTransactions()).toBe(false)
  })

  it('should throw for a feature outside the catalog', () => {
    const table = new FeatureTable()
    const teleport: FeatureName<'vertex'> = JSON.parse('"Teleport"')

    expect(() => table.supports('vertex', teleport)).toThrow(UnknownFeatureError)
    expect(() => table.supports('vertex', teleport)).toThrow('[supportsTeleport] is not a valid feature on vertex')
  })

  it('should reject a declaration naming an unknown feature', () => {
    const declaration: FeatureDeclaration = JSON.parse('{"edge":{"Teleport":true}}')
    expect(() => new FeatureTable(declaration)).toThrow('[supportsTeleport] is not a valid feature on edge')
  })
})
