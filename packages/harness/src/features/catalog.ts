/**
 * Feature Catalog
 *
 * Every capability a graph backend can be asked about, grouped by capability class.
 * A requirement naming anything outside this catalog is a declaration error.
 */

const DATA_TYPES = [
  'Properties',
  'BooleanValues',
  'IntegerValues',
  'DoubleValues',
  'StringValues',
  'ListValues',
  'MapValues',
] as const

export const FEATURE_CATALOG = {
  graph: ['Computer', 'Persistence', 'Transactions', 'ThreadedTransactions'],
  variables: ['Variables', 'BooleanValues', 'IntegerValues', 'DoubleValues', 'StringValues', 'ListValues', 'MapValues'],
  vertex: [
    'AddVertices',
    'RemoveVertices',
    'UserSuppliedIds',
    'NumericIds',
    'StringIds',
    'AddProperty',
    'RemoveProperty',
    'MetaProperties',
    'MultiProperties',
  ],
  vertexProperty: DATA_TYPES,
  edge: ['AddEdges', 'RemoveEdges', 'UserSuppliedIds', 'NumericIds', 'StringIds', 'AddProperty', 'RemoveProperty'],
  edgeProperty: DATA_TYPES,
} as const

export type FeatureClass = keyof typeof FEATURE_CATALOG

export type FeatureName<C extends FeatureClass = FeatureClass> = (typeof FEATURE_CATALOG)[C][number]

/** Value kinds a property, variable or meta-property can hold */
export type DataTypeFeature = (typeof DATA_TYPES)[number]

export const FEATURE_CLASSES = Object.keys(FEATURE_CATALOG).filter(isFeatureClass)

export function isFeatureClass(value: string): value is FeatureClass {
  return Object.prototype.hasOwnProperty.call(FEATURE_CATALOG, value)
}

export function isKnownFeature<C extends FeatureClass>(featureClass: C, feature: string): feature is FeatureName<C> {
  const names: readonly string[] = FEATURE_CATALOG[featureClass]
  return names.includes(feature)
}

export function featureKey(featureClass: FeatureClass, feature: string): string {
  return `${featureClass}.${feature}`
}
