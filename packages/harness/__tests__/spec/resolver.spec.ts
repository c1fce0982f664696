/**
 * Requirement Resolution Tests
 *
 * Collection from declarations, override precedence and skip reasons.
 */

import { describe, it, expect } from 'vitest'
import {
  FeatureDeclarationError,
  FeatureTable,
  buildOverrideTable,
  collectRequirements,
  createRequirementRegistry,
  defineFixture,
  defineRequirementSet,
  describeOutcome,
  feature,
  formatRequirement,
  override,
  requirementSet,
  requires,
  resolveRequirements,
  toSkipSignal,
  type FeatureOverride,
  type FeatureRequirement,
  type GraphFeatures,
} from '../../src'

describe('collectRequirements', () => {
  it('should merge direct, set and fixture requirements without duplicates', () => {
    const { requirements, fixture } = collectRequirements({
      name: 'readsSongs',
      fixture: 'grateful-dead',
      requirements: [feature('vertexProperty', 'StringValues'), requirementSet('SIMPLE'), feature('graph', 'Transactions')],
    })

    expect(fixture?.name).toBe('grateful-dead')
    expect(requirements.map(formatRequirement)).toEqual([
      'vertexProperty.StringValues=true',
      'vertex.AddVertices=true',
      'vertex.AddProperty=true',
      'edge.AddEdges=true',
      'graph.Transactions=true',
      'vertexProperty.Properties=true',
      'vertexProperty.IntegerValues=true',
      'edgeProperty.Properties=true',
      'edgeProperty.IntegerValues=true',
    ])
  })

  it('should keep opposite expectations for the same feature apart', () => {
    const { requirements } = collectRequirements({
      name: 'contradiction',
      requirements: [feature('edge', 'AddEdges'), feature('edge', 'AddEdges', false)],
    })

    expect(requirements.map(formatRequirement)).toEqual(['edge.AddEdges=true', 'edge.AddEdges=false'])
  })

  it('should return a frozen list and no fixture when none is declared', () => {
    const collected = collectRequirements({ name: 'bare' })

    expect(collected.requirements).toEqual([])
    expect(Object.isFrozen(collected.requirements)).toBe(true)
    expect(collected.fixture).toBeUndefined()
  })

  it('should reject an unknown requirement set', () => {
    expect(() => collectRequirements({ name: 't', requirements: [requirementSet('EVERYTHING')] })).toThrow(
      'Unknown requirement set: EVERYTHING',
    )
  })

  it('should reject an unknown fixture', () => {
    expect(() => collectRequirements({ name: 't', fixture: 'northwind' })).toThrow('Unknown fixture: northwind')
  })

  it('should reject an unknown feature class', () => {
    const descriptor = { kind: 'feature' as const, featureClass: 'hyperedge', feature: 'AddEdges' }
    expect(() => collectRequirements({ name: 't', requirements: [descriptor] })).toThrow(
      '[hyperedge] is not a valid feature class',
    )
  })

  it('should reject an unknown feature with a declaration error', () => {
    const descriptor = { kind: 'feature' as const, featureClass: 'vertex', feature: 'Teleport' }

    expect(() => collectRequirements({ name: 't', requirements: [descriptor] })).toThrow(FeatureDeclarationError)
    expect(() => collectRequirements({ name: 't', requirements: [descriptor] })).toThrow(
      '[supportsTeleport] is not a valid feature on vertex',
    )
  })

  it('should resolve sets and fixtures added to a registry', () => {
    const registry = createRequirementRegistry({
      sets: [defineRequirementSet('PERSISTENT', () => [requires('graph', 'Persistence')])],
      fixtures: [defineFixture('empty', 'No elements', [requires('vertex', 'AddVertices')])],
    })

    const { requirements, fixture } = collectRequirements(
      { name: 't', fixture: 'empty', requirements: [requirementSet('PERSISTENT')] },
      registry,
    )

    expect(fixture?.description).toBe('No elements')
    expect(requirements.map(formatRequirement)).toEqual(['graph.Persistence=true', 'vertex.AddVertices=true'])
    expect(registry.sets.has('SIMPLE')).toBe(true)
  })
})

describe('resolveRequirements', () => {
  const features = new FeatureTable({
    graph: { Transactions: true },
    vertex: { AddVertices: true, MetaProperties: true },
  })

  it('should be satisfied when every requirement matches the graph', () => {
    const resolution = resolveRequirements([requires('graph', 'Transactions'), requires('graph', 'Persistence', false)], {
      features,
    })

    expect(resolution.satisfied).toBe(true)
    expect(resolution.unmet).toEqual([])
    expect(resolution.outcomes.map((outcome) => outcome.source)).toEqual(['instance', 'instance'])
  })

  it('should let an override win over what the graph reports', () => {
    const resolution = resolveRequirements([requires('vertex', 'MetaProperties')], {
      features,
      featureOverrides: [override('vertex', 'MetaProperties', false, 'driver hides meta-properties')],
    })

    expect(resolution.satisfied).toBe(false)
    expect(resolution.unmet).toHaveLength(1)
    expect(resolution.unmet[0]?.source).toBe('override')
    expect(resolution.unmet[0]?.actual).toBe(false)
    expect(resolution.unmet[0]?.override?.reason).toBe('driver hides meta-properties')
  })

  it('should let an override satisfy a requirement the graph does not', () => {
    const resolution = resolveRequirements([requires('graph', 'Persistence')], {
      features,
      featureOverrides: [override('graph', 'Persistence', true)],
    })

    expect(resolution.satisfied).toBe(true)
  })

  it('should describe unmet requirements in the skip reason', () => {
    const resolution = resolveRequirements(
      [requires('graph', 'Persistence'), requires('vertex', 'MetaProperties'), requires('graph', 'Transactions')],
      { features, featureOverrides: [override('vertex', 'MetaProperties', false)] },
    )

    expect(resolution.unmet.map(describeOutcome)).toEqual([
      'graph.Persistence=true (graph reports false)',
      'vertex.MetaProperties=true (overridden to false)',
    ])
    expect(toSkipSignal(resolution).reason).toBe(
      'Unmet feature requirements: graph.Persistence=true (graph reports false), vertex.MetaProperties=true (overridden to false)',
    )
  })

  it('should turn an unknown feature on the graph into a declaration error', () => {
    const narrow: GraphFeatures = new FeatureTable()
    const unknown: FeatureRequirement = JSON.parse('{"featureClass":"vertex","feature":"Teleport","supported":true}')

    expect(() => resolveRequirements([unknown], { features: narrow })).toThrow(FeatureDeclarationError)
  })
})

describe('buildOverrideTable', () => {
  it('should index overrides by feature', () => {
    const table = buildOverrideTable([override('graph', 'Transactions', false)])
    expect(table.get('graph.Transactions')?.supported).toBe(false)
  })

  it('should accept repeated overrides that agree', () => {
    const table = buildOverrideTable([override('graph', 'Transactions', false), override('graph', 'Transactions', false)])
    expect(table.size).toBe(1)
  })

  it('should reject overrides that disagree', () => {
    expect(() =>
      buildOverrideTable([override('graph', 'Transactions', false), override('graph', 'Transactions', true)]),
    ).toThrow('Conflicting overrides for graph.Transactions: false and true')
  })

  it('should reject an override naming an unknown feature', () => {
    const bogus: FeatureOverride = JSON.parse('{"featureClass":"graph","feature":"Teleport","supported":true}')
    expect(() => buildOverrideTable([bogus])).toThrow('Override [supportsTeleport] is not a valid feature on graph')
  })
})
